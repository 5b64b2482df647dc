import { BitOutputStream } from './bit-stream.js';
import type { Code, CodeTable } from './code-table.js';
import { ALPHABET_SIZE } from './frequency.js';

export interface EncodedBody {
  /** Packed codes, zero-padded to a whole byte */
  body: Uint8Array;

  /** Zero bits appended to the final byte (0-7) */
  padBits: number;

  /** Number of code bits, padding excluded */
  bitLength: number;
}

/**
 * Pack the code of every input byte, in input order.
 *
 * @param onProgress - Called every `progressInterval` bytes and after the last byte
 */
export function encodeSymbols(
  data: Uint8Array,
  codes: CodeTable,
  onProgress?: (bytesProcessed: number, totalBytes: number) => void,
  progressInterval: number = 64 * 1024
): EncodedBody {
  // Dense lookup; every byte in the input must have a code.
  const lookup: Array<Code | undefined> = new Array<Code | undefined>(ALPHABET_SIZE);
  for (const [symbol, code] of codes) {
    lookup[symbol] = code;
  }

  const output = new BitOutputStream(data.length);

  for (let i = 0; i < data.length; i++) {
    const code = lookup[data[i]];
    if (code === undefined) {
      throw new RangeError(`No code for symbol ${data[i]} at offset ${i}`);
    }
    output.writeCode(code);

    if (onProgress && (i + 1) % progressInterval === 0) {
      onProgress(i + 1, data.length);
    }
  }

  const bitLength = output.bitCount;
  const padBits = output.flush();
  if (data.length % progressInterval !== 0) {
    onProgress?.(data.length, data.length);
  }

  return { body: output.toUint8Array(), padBits, bitLength };
}
