/**
 * huffzip
 *
 * Lossless byte compression with static Huffman coding.
 *
 * @example
 * ```typescript
 * import { HuffmanCompressor } from 'huffzip';
 *
 * const compressor = new HuffmanCompressor();
 *
 * // Compress
 * const result = compressor.compress(new TextEncoder().encode('abacabad'));
 * console.log(`Compression ratio: ${result.compressionRatio.toFixed(2)}`);
 *
 * // Decompress
 * const bytes = compressor.decompress(result.data);
 * console.log(new TextDecoder().decode(bytes)); // 'abacabad'
 * ```
 */

// Main compressor
export {
  HuffmanCompressor,
  compress,
  decompress,
  inspectContainer,
  DEFAULT_COMPRESSOR_OPTIONS,
  type CompressorOptions,
  type CompressionResult,
  type ContainerInfo,
  type ProgressInfo,
} from './compressor.js';

// Errors
export { HuffmanError, isHuffmanError, type HuffmanErrorKind } from './errors.js';

// Core Huffman coding (for advanced usage)
export {
  BitOutputStream,
  BitInputStream,
  encodeSymbols,
  decodeSymbols,
  MinHeap,
  buildHuffmanTree,
  treeDepth,
  generateCodeTable,
  isPrefixFree,
  codeToString,
  encodedBitLength,
  ALPHABET_SIZE,
  DEFAULT_CHUNK_SIZE,
  FrequencyCounter,
  createFrequencyTable,
  countFrequencies,
  countFrequenciesChunked,
  countStreamFrequencies,
  mergeFrequencyTables,
  symbolEntries,
  totalCount,
  type EncodedBody,
  type HuffmanTree,
  type HuffmanNode,
  type LeafNode,
  type InternalNode,
  type PlaceholderNode,
  type Bit,
  type Code,
  type CodeTable,
  type FrequencyTable,
  type SymbolEntry,
} from './core/index.js';

// File format (for advanced usage)
export {
  type ContainerHeader,
  type Container,
  MAGIC_BYTES,
  FORMAT_VERSION,
  HEADER_BASE_SIZE,
  SYMBOL_ENTRY_SIZE,
  MAX_ORIGINAL_LENGTH,
  createHeader,
  calculateHeaderSize,
  serializeHeader,
  deserializeHeader,
  validateHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
  serializeContainer,
  deserializeContainer,
  isContainerFormat,
} from './format/index.js';

// Utilities
export {
  getCompressionStats,
  formatBytes,
  formatDuration,
  getCompressedPath,
  getDecompressedPath,
  type CompressionStats,
} from './utils/stats.js';
