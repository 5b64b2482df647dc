import { HuffmanError } from '../errors.js';
import type { Code } from './code-table.js';

const INITIAL_CAPACITY = 1024;

/**
 * Bit-level output stream for Huffman codes.
 * Packs bits most-significant-bit first into a growable byte buffer.
 */
export class BitOutputStream {
  private buffer: Uint8Array;
  private length: number = 0;
  private currentByte: number = 0;
  private bitPosition: number = 0;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
  }

  /**
   * Write a single bit to the stream.
   * @param bit - 0 or 1
   */
  writeBit(bit: number): void {
    this.currentByte = (this.currentByte << 1) | (bit & 1);
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.pushByte(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Write every bit of a code in order.
   */
  writeCode(code: Code): void {
    for (let i = 0; i < code.length; i++) {
      this.writeBit(code[i]);
    }
  }

  /**
   * Flush the final partial byte, padding with zeros.
   * @returns Number of pad bits appended (0-7)
   */
  flush(): number {
    if (this.bitPosition === 0) {
      return 0;
    }

    const padBits = 8 - this.bitPosition;
    this.pushByte(this.currentByte << padBits);
    this.currentByte = 0;
    this.bitPosition = 0;
    return padBits;
  }

  /**
   * Number of complete bytes written.
   */
  get byteCount(): number {
    return this.length;
  }

  /**
   * Total number of bits written, excluding padding.
   */
  get bitCount(): number {
    return this.length * 8 + this.bitPosition;
  }

  /**
   * Copy out the complete bytes.
   * Call flush() first to include a trailing partial byte.
   */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  private pushByte(byte: number): void {
    if (this.length === this.buffer.length) {
      const grown = new Uint8Array(this.buffer.length * 2);
      grown.set(this.buffer);
      this.buffer = grown;
    }
    this.buffer[this.length++] = byte & 0xff;
  }
}

/**
 * Bit-level input stream for Huffman decoding.
 * Reads bits MSB first; the trailing pad bits of the last byte are not readable.
 */
export class BitInputStream {
  private data: Uint8Array;
  private bitLimit: number;
  private bitOffset: number = 0;

  /**
   * @param padBits - Zero bits appended to fill the final byte (0-7)
   */
  constructor(data: Uint8Array, padBits: number = 0) {
    if (!Number.isInteger(padBits) || padBits < 0 || padBits > 7) {
      throw new HuffmanError(
        'CorruptedStream',
        `Invalid pad bit count: ${padBits} (expected 0-7)`
      );
    }
    if (data.length * 8 < padBits) {
      throw new HuffmanError(
        'CorruptedStream',
        `Pad bit count ${padBits} exceeds the ${data.length * 8}-bit stream`
      );
    }

    this.data = data;
    this.bitLimit = data.length * 8 - padBits;
  }

  /**
   * Read a single bit from the stream.
   * @throws HuffmanError (CorruptedStream) when no data bits remain
   */
  readBit(): number {
    if (this.bitOffset >= this.bitLimit) {
      throw new HuffmanError(
        'CorruptedStream',
        `Unexpected end of bitstream after ${this.bitLimit} bits`
      );
    }

    const byte = this.data[this.bitOffset >>> 3];
    const bit = (byte >>> (7 - (this.bitOffset & 7))) & 1;
    this.bitOffset++;
    return bit;
  }

  /**
   * Get current position in bits.
   */
  get position(): number {
    return this.bitOffset;
  }

  /**
   * Get the number of readable bits (padding excluded).
   */
  get size(): number {
    return this.bitLimit;
  }
}
