import { HuffmanError } from './errors.js';
import {
  DEFAULT_CHUNK_SIZE,
  countFrequenciesChunked,
} from './core/frequency.js';
import { buildHuffmanTree, treeDepth } from './core/huffman-tree.js';
import { generateCodeTable, type CodeTable } from './core/code-table.js';
import { encodeSymbols } from './core/huffman-encoder.js';
import { decodeSymbols } from './core/huffman-decoder.js';
import {
  type Container,
  type ContainerHeader,
  MAX_ORIGINAL_LENGTH,
  calculateHeaderSize,
  createHeader,
  serializeHeader,
  splitHeaderAndPayload,
  combineHeaderAndPayload,
  validateHeader,
} from './format/header.js';

/**
 * Progress information callback payload.
 */
export interface ProgressInfo {
  stage: 'analyzing' | 'building' | 'encoding' | 'decoding';
  current: number;
  total: number;
}

/**
 * Options shared by compression and decompression.
 */
export interface CompressorOptions {
  /** Window size in bytes for frequency counting and progress reports (default: 64 KiB) */
  chunkSize?: number;

  /** Progress callback */
  onProgress?: (progress: ProgressInfo) => void;
}

export const DEFAULT_COMPRESSOR_OPTIONS: Required<Pick<CompressorOptions, 'chunkSize'>> = {
  chunkSize: DEFAULT_CHUNK_SIZE,
};

/**
 * Result of compression operation.
 */
export interface CompressionResult {
  /** Compressed data (header + body) */
  data: Uint8Array;

  /** Original size in bytes */
  originalSize: number;

  /** Compressed size in bytes, header included */
  compressedSize: number;

  /** Header size in bytes */
  headerSize: number;

  /** Packed body size in bytes */
  payloadSize: number;

  /** Distinct symbols in the input */
  alphabetSize: number;

  /** Zero bits padding the last body byte */
  padBits: number;

  /** compressedSize / originalSize; 1 for empty input */
  compressionRatio: number;
}

/**
 * Summary of a container, as shown by the CLI `info` command.
 */
export interface ContainerInfo {
  header: ContainerHeader;
  headerSize: number;
  payloadSize: number;
  codes: CodeTable;
  treeDepth: number;
}

/**
 * Compress bytes into a container.
 */
export function compress(data: Uint8Array, options: CompressorOptions = {}): Container {
  if (data.length > MAX_ORIGINAL_LENGTH) {
    throw new RangeError(
      `Input of ${data.length} bytes exceeds the maximum of ${MAX_ORIGINAL_LENGTH}`
    );
  }

  const chunkSize = options.chunkSize ?? DEFAULT_COMPRESSOR_OPTIONS.chunkSize;
  const report = options.onProgress;

  // Step 1: Count symbols
  const frequencies = countFrequenciesChunked(data, chunkSize, (current, total) =>
    report?.({ stage: 'analyzing', current, total })
  );

  // Step 2: Build tree and codes
  report?.({ stage: 'building', current: 0, total: 1 });
  const codes = generateCodeTable(buildHuffmanTree(frequencies));
  report?.({ stage: 'building', current: 1, total: 1 });

  // Step 3: Pack codes
  const { body, padBits } = encodeSymbols(
    data,
    codes,
    (current, total) => report?.({ stage: 'encoding', current, total }),
    chunkSize
  );

  return { header: createHeader(data.length, padBits, frequencies), body };
}

/**
 * Restore the original bytes from a container.
 *
 * @throws HuffmanError if the header breaks the container rules (see
 * `validateHeader`), or CorruptedStream if the body does not hold the declared symbols
 */
export function decompress(container: Container, options: CompressorOptions = {}): Uint8Array {
  const { header, body } = container;
  validateHeader(header);

  // Handle empty input
  if (header.originalLength === 0) {
    return new Uint8Array(0);
  }

  const tree = buildHuffmanTree(header.frequencies);
  if (tree === null) {
    throw new HuffmanError(
      'CorruptedStream',
      `Header declares ${header.originalLength} bytes but no symbols`
    );
  }

  const chunkSize = options.chunkSize ?? DEFAULT_COMPRESSOR_OPTIONS.chunkSize;
  const report = options.onProgress;

  return decodeSymbols(
    body,
    tree,
    header.originalLength,
    header.padBits,
    (current, total) => report?.({ stage: 'decoding', current, total }),
    chunkSize
  );
}

/**
 * Parse a serialized container and derive its code table.
 */
export function inspectContainer(data: Uint8Array): ContainerInfo {
  const { header, body } = splitHeaderAndPayload(data);
  const tree = buildHuffmanTree(header.frequencies);

  return {
    header,
    headerSize: calculateHeaderSize(header.alphabetSize),
    payloadSize: body.length,
    codes: generateCodeTable(tree),
    treeDepth: tree === null ? 0 : treeDepth(tree),
  };
}

/**
 * Static Huffman compressor working on serialized containers.
 *
 * Usage:
 * ```typescript
 * const compressor = new HuffmanCompressor({
 *   onProgress: ({ stage, current, total }) => console.log(stage, current, total),
 * });
 *
 * const result = compressor.compress(new TextEncoder().encode('abacabad'));
 * const bytes = compressor.decompress(result.data);
 * ```
 */
export class HuffmanCompressor {
  private options: CompressorOptions;

  constructor(options: CompressorOptions = {}) {
    this.options = options;
  }

  /**
   * Compress bytes to a serialized container.
   */
  compress(data: Uint8Array): CompressionResult {
    const container = compress(data, this.options);
    const headerBytes = serializeHeader(container.header);
    const output = combineHeaderAndPayload(headerBytes, container.body);

    return {
      data: output,
      originalSize: data.length,
      compressedSize: output.length,
      headerSize: headerBytes.length,
      payloadSize: container.body.length,
      alphabetSize: container.header.alphabetSize,
      padBits: container.header.padBits,
      compressionRatio: data.length === 0 ? 1 : output.length / data.length,
    };
  }

  /**
   * Decompress a serialized container back to the original bytes.
   */
  decompress(data: Uint8Array): Uint8Array {
    return decompress(splitHeaderAndPayload(data), this.options);
  }
}
