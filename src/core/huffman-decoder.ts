import { HuffmanError } from '../errors.js';
import { BitInputStream } from './bit-stream.js';
import type { HuffmanTree } from './huffman-tree.js';

/**
 * Recover `symbolCount` bytes by walking the tree one bit at a time.
 *
 * The symbol count, not the pad count, terminates decoding: bits left after
 * the last symbol are never interpreted.
 *
 * @throws HuffmanError (CorruptedStream) if the body runs out early or a walk
 * lands on the placeholder node
 */
export function decodeSymbols(
  body: Uint8Array,
  tree: HuffmanTree,
  symbolCount: number,
  padBits: number,
  onProgress?: (symbolsDecoded: number, totalSymbols: number) => void,
  progressInterval: number = 64 * 1024
): Uint8Array {
  const input = new BitInputStream(body, padBits);
  const output = new Uint8Array(symbolCount);
  const { nodes, root } = tree;

  for (let i = 0; i < symbolCount; i++) {
    let index = root;

    while (true) {
      const node = nodes[index];
      if (node.kind === 'leaf') {
        output[i] = node.symbol;
        break;
      }
      if (node.kind === 'placeholder') {
        throw new HuffmanError(
          'CorruptedStream',
          `Bit pattern at position ${input.position} does not map to any symbol`
        );
      }
      index = input.readBit() === 0 ? node.left : node.right;
    }

    if (onProgress && (i + 1) % progressInterval === 0) {
      onProgress(i + 1, symbolCount);
    }
  }

  if (symbolCount % progressInterval !== 0) {
    onProgress?.(symbolCount, symbolCount);
  }
  return output;
}
