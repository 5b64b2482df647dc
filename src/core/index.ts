export { BitOutputStream, BitInputStream } from './bit-stream.js';
export { encodeSymbols, type EncodedBody } from './huffman-encoder.js';
export { decodeSymbols } from './huffman-decoder.js';
export { MinHeap } from './min-heap.js';
export {
  buildHuffmanTree,
  treeDepth,
  type HuffmanTree,
  type HuffmanNode,
  type LeafNode,
  type InternalNode,
  type PlaceholderNode,
} from './huffman-tree.js';
export {
  generateCodeTable,
  isPrefixFree,
  codeToString,
  encodedBitLength,
  type Bit,
  type Code,
  type CodeTable,
} from './code-table.js';
export {
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
  type FrequencyTable,
  type SymbolEntry,
} from './frequency.js';
