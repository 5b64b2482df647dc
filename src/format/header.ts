/**
 * Compressed container format.
 *
 * The header carries everything the decoder needs to rebuild the Huffman
 * tree; the tree itself is never stored.
 *
 * Format (multi-byte integers little-endian):
 * [Magic: 4 bytes "HUFZ"]
 * [Version: 1 byte]
 * [Original length: 4 bytes]
 * [Pad bits: 1 byte] (0-7, zero bits filling the last body byte)
 * [Alphabet size: 2 bytes] (distinct symbols, 0-256)
 * [Symbol entries: 5 bytes × alphabet size] (symbol: 1 byte, frequency: 4 bytes),
 *   ascending symbol order
 * [Body: variable] (packed codes, MSB first)
 */

import { HuffmanError } from '../errors.js';
import {
  ALPHABET_SIZE,
  createFrequencyTable,
  symbolEntries,
  type FrequencyTable,
} from '../core/frequency.js';

/**
 * Magic bytes identifying a compressed container.
 * "HUFZ" in ASCII.
 */
export const MAGIC_BYTES = new Uint8Array([0x48, 0x55, 0x46, 0x5a]);

/**
 * Current format version.
 */
export const FORMAT_VERSION = 1;

/**
 * Size of the fixed part of the header, before the symbol entries.
 */
export const HEADER_BASE_SIZE = 12;

/**
 * Size of one (symbol, frequency) entry.
 */
export const SYMBOL_ENTRY_SIZE = 5;

/**
 * Largest original length the 32-bit length field can hold.
 */
export const MAX_ORIGINAL_LENGTH = 0xffffffff;

/**
 * Compressed container header structure.
 */
export interface ContainerHeader {
  /** Magic bytes: "HUFZ" */
  magic: Uint8Array;

  /** Format version */
  version: number;

  /** Number of bytes in the uncompressed input */
  originalLength: number;

  /** Zero bits padding the final body byte */
  padBits: number;

  /** Number of symbols with a nonzero frequency */
  alphabetSize: number;

  /** Full 256-entry frequency table */
  frequencies: FrequencyTable;
}

/**
 * Header plus packed body.
 */
export interface Container {
  header: ContainerHeader;
  body: Uint8Array;
}

/**
 * Create a header for a compressed body.
 */
export function createHeader(
  originalLength: number,
  padBits: number,
  frequencies: FrequencyTable
): ContainerHeader {
  return {
    magic: new Uint8Array(MAGIC_BYTES),
    version: FORMAT_VERSION,
    originalLength,
    padBits,
    alphabetSize: symbolEntries(frequencies).length,
    frequencies: [...frequencies],
  };
}

/**
 * Check a header against the container rules. Parsed headers pass through
 * here, and so does every header handed to `decompress`.
 *
 * @throws HuffmanError InvalidFormat, CorruptedStream or UnsupportedAlphabetSize
 */
export function validateHeader(header: ContainerHeader): void {
  validateFixedFields(header.magic, header.version, header.padBits, header.alphabetSize);

  const { frequencies } = header;
  if (frequencies.length !== ALPHABET_SIZE) {
    throw new HuffmanError(
      'CorruptedStream',
      `Frequency table must have ${ALPHABET_SIZE} entries, got ${frequencies.length}`
    );
  }

  let present = 0;
  let total = 0;
  for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
    const count = frequencies[symbol];
    if (!Number.isInteger(count) || count < 0 || count > MAX_ORIGINAL_LENGTH) {
      throw new HuffmanError('CorruptedStream', `Invalid frequency ${count} for symbol ${symbol}`);
    }
    if (count > 0) present++;
    total += count;
  }

  if (present !== header.alphabetSize) {
    throw new HuffmanError(
      'CorruptedStream',
      `Alphabet size ${header.alphabetSize} disagrees with ${present} symbols in the frequency table`
    );
  }
  if (total !== header.originalLength) {
    throw new HuffmanError(
      'CorruptedStream',
      `Frequencies sum to ${total} but original length is ${header.originalLength}`
    );
  }
}

function validateFixedFields(
  magic: Uint8Array,
  version: number,
  padBits: number,
  alphabetSize: number
): void {
  if (magic.length !== MAGIC_BYTES.length || !isContainerFormat(magic)) {
    throw new HuffmanError('InvalidFormat', 'Invalid file format: magic bytes mismatch');
  }
  if (version !== FORMAT_VERSION) {
    throw new HuffmanError(
      'InvalidFormat',
      `Unsupported format version: ${version} (expected ${FORMAT_VERSION})`
    );
  }
  if (!Number.isInteger(padBits) || padBits < 0 || padBits > 7) {
    throw new HuffmanError('CorruptedStream', `Invalid pad bit count: ${padBits}`);
  }
  if (!Number.isInteger(alphabetSize) || alphabetSize < 0) {
    throw new HuffmanError('CorruptedStream', `Invalid alphabet size: ${alphabetSize}`);
  }
  if (alphabetSize > ALPHABET_SIZE) {
    throw new HuffmanError(
      'UnsupportedAlphabetSize',
      `Alphabet size ${alphabetSize} exceeds the ${ALPHABET_SIZE}-symbol domain`
    );
  }
}

/**
 * Calculate total header size for a given alphabet size.
 */
export function calculateHeaderSize(alphabetSize: number): number {
  return HEADER_BASE_SIZE + alphabetSize * SYMBOL_ENTRY_SIZE;
}

/**
 * Serialize a header to bytes.
 */
export function serializeHeader(header: ContainerHeader): Uint8Array {
  if (!Number.isInteger(header.originalLength) || header.originalLength < 0 ||
      header.originalLength > MAX_ORIGINAL_LENGTH) {
    throw new RangeError(
      `Original length ${header.originalLength} does not fit the 32-bit length field`
    );
  }
  if (!Number.isInteger(header.padBits) || header.padBits < 0 || header.padBits > 7) {
    throw new RangeError(`Pad bit count must be 0-7, got ${header.padBits}`);
  }
  if (header.version !== FORMAT_VERSION) {
    throw new RangeError(`Format version must be ${FORMAT_VERSION}, got ${header.version}`);
  }
  if (header.magic.length !== MAGIC_BYTES.length || !isContainerFormat(header.magic)) {
    throw new RangeError('Magic bytes must be "HUFZ"');
  }

  const entries = symbolEntries(header.frequencies);
  if (header.alphabetSize !== entries.length) {
    throw new RangeError(
      `Alphabet size ${header.alphabetSize} disagrees with ${entries.length} symbols in the frequency table`
    );
  }
  const buffer = new ArrayBuffer(calculateHeaderSize(entries.length));
  const view = new DataView(buffer);
  const bytes = new Uint8Array(buffer);

  let offset = 0;

  // Magic (4 bytes)
  bytes.set(header.magic, offset);
  offset += 4;

  // Version (1 byte)
  view.setUint8(offset, header.version);
  offset += 1;

  // Original length (4 bytes, little-endian)
  view.setUint32(offset, header.originalLength, true);
  offset += 4;

  // Pad bits (1 byte)
  view.setUint8(offset, header.padBits);
  offset += 1;

  // Alphabet size (2 bytes, little-endian)
  view.setUint16(offset, entries.length, true);
  offset += 2;

  // Symbol entries (5 bytes each)
  for (const { symbol, count } of entries) {
    if (count > MAX_ORIGINAL_LENGTH) {
      throw new RangeError(`Frequency ${count} of symbol ${symbol} exceeds 32 bits`);
    }
    view.setUint8(offset, symbol);
    view.setUint32(offset + 1, count, true);
    offset += SYMBOL_ENTRY_SIZE;
  }

  return bytes;
}

/**
 * Deserialize a header from bytes.
 *
 * @throws HuffmanError InvalidFormat, CorruptedStream or UnsupportedAlphabetSize
 */
export function deserializeHeader(data: Uint8Array): ContainerHeader {
  if (data.length < HEADER_BASE_SIZE) {
    throw new HuffmanError(
      'InvalidFormat',
      `Invalid header: expected at least ${HEADER_BASE_SIZE} bytes, got ${data.length}`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, data.length);

  const magic = data.slice(0, 4);
  const version = view.getUint8(4);
  const originalLength = view.getUint32(5, true);
  const padBits = view.getUint8(9);
  const alphabetSize = view.getUint16(10, true);
  validateFixedFields(magic, version, padBits, alphabetSize);

  const headerSize = calculateHeaderSize(alphabetSize);
  if (data.length < headerSize) {
    const present = Math.floor((data.length - HEADER_BASE_SIZE) / SYMBOL_ENTRY_SIZE);
    throw new HuffmanError(
      'CorruptedStream',
      `Header declares ${alphabetSize} symbols but only ${present} entries are present`
    );
  }

  // Read symbol entries
  const frequencies = createFrequencyTable();
  let offset = HEADER_BASE_SIZE;
  let previousSymbol = -1;

  for (let i = 0; i < alphabetSize; i++) {
    const symbol = view.getUint8(offset);
    const count = view.getUint32(offset + 1, true);
    offset += SYMBOL_ENTRY_SIZE;

    if (symbol <= previousSymbol) {
      throw new HuffmanError(
        'CorruptedStream',
        `Symbol entries out of order: ${symbol} follows ${previousSymbol}`
      );
    }
    if (count === 0) {
      throw new HuffmanError('CorruptedStream', `Symbol ${symbol} has a zero frequency`);
    }

    frequencies[symbol] = count;
    previousSymbol = symbol;
  }

  const header: ContainerHeader = {
    magic,
    version,
    originalLength,
    padBits,
    alphabetSize,
    frequencies,
  };
  validateHeader(header);
  return header;
}

/**
 * Combine header and payload into a single buffer.
 */
export function combineHeaderAndPayload(
  header: Uint8Array,
  payload: Uint8Array
): Uint8Array {
  const result = new Uint8Array(header.length + payload.length);
  result.set(header, 0);
  result.set(payload, header.length);
  return result;
}

/**
 * Split data into header and payload.
 */
export function splitHeaderAndPayload(data: Uint8Array): Container {
  const header = deserializeHeader(data);
  const body = data.slice(calculateHeaderSize(header.alphabetSize));
  return { header, body };
}

/**
 * Serialize a container to its binary form.
 */
export function serializeContainer(container: Container): Uint8Array {
  return combineHeaderAndPayload(serializeHeader(container.header), container.body);
}

/**
 * Parse the binary form of a container.
 */
export function deserializeContainer(data: Uint8Array): Container {
  return splitHeaderAndPayload(data);
}

/**
 * Check if data starts with the container magic bytes.
 */
export function isContainerFormat(data: Uint8Array): boolean {
  if (data.length < 4) return false;
  return (
    data[0] === MAGIC_BYTES[0] &&
    data[1] === MAGIC_BYTES[1] &&
    data[2] === MAGIC_BYTES[2] &&
    data[3] === MAGIC_BYTES[3]
  );
}
