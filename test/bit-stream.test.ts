import { describe, it, expect } from 'vitest';
import { BitOutputStream, BitInputStream } from '../src/core/bit-stream.js';
import type { Bit } from '../src/core/code-table.js';
import { HuffmanError } from '../src/errors.js';

function byteBits(value: number): Bit[] {
  const bits: Bit[] = [];
  for (let i = 7; i >= 0; i--) {
    bits.push((value >>> i) & 1 ? 1 : 0);
  }
  return bits;
}

function readAll(stream: BitInputStream): number[] {
  const bits: number[] = [];
  while (stream.position < stream.size) {
    bits.push(stream.readBit());
  }
  return bits;
}

describe('BitOutputStream', () => {
  it('should write single bits MSB first', () => {
    const stream = new BitOutputStream();

    // Write 8 bits: 10110100
    for (const bit of [1, 0, 1, 1, 0, 1, 0, 0]) {
      stream.writeBit(bit);
    }

    const result = stream.toUint8Array();
    expect(result.length).toBe(1);
    expect(result[0]).toBe(0b10110100);
  });

  it('should pad a partial byte and report the pad count', () => {
    const stream = new BitOutputStream();

    // Write 5 bits: 10110
    stream.writeCode([1, 0, 1, 1, 0]);
    const padBits = stream.flush();

    const result = stream.toUint8Array();
    expect(padBits).toBe(3);
    expect(result.length).toBe(1);
    expect(result[0]).toBe(0b10110000);
  });

  it('should report zero pad bits on a byte boundary', () => {
    const stream = new BitOutputStream();
    stream.writeCode(byteBits(0xab));

    expect(stream.flush()).toBe(0);
    expect(stream.toUint8Array()).toEqual(new Uint8Array([0xab]));
  });

  it('should report zero pad bits when nothing was written', () => {
    const stream = new BitOutputStream();

    expect(stream.flush()).toBe(0);
    expect(stream.toUint8Array().length).toBe(0);
  });

  it('should write codes in order', () => {
    const stream = new BitOutputStream();
    stream.writeCode([1, 1, 0]);
    stream.writeCode([0]);
    stream.writeCode([1, 0, 1, 1]);

    expect(stream.toUint8Array()).toEqual(new Uint8Array([0b11001011]));
  });

  it('should grow past its initial capacity', () => {
    const stream = new BitOutputStream(1);
    for (let i = 0; i < 5; i++) {
      stream.writeCode(byteBits(i));
    }

    expect(stream.toUint8Array()).toEqual(new Uint8Array([0, 1, 2, 3, 4]));
  });

  it('should track bit count correctly', () => {
    const stream = new BitOutputStream();
    stream.writeBit(1);
    stream.writeBit(0);
    stream.writeBit(1);

    expect(stream.bitCount).toBe(3);
    expect(stream.byteCount).toBe(0);

    stream.writeCode([0, 0, 0, 0, 0]);
    expect(stream.bitCount).toBe(8);
    expect(stream.byteCount).toBe(1);
  });
});

describe('BitInputStream', () => {
  it('should read single bits correctly', () => {
    const stream = new BitInputStream(new Uint8Array([0b10110100]));
    const bits: number[] = [];
    for (let i = 0; i < 8; i++) {
      bits.push(stream.readBit());
    }

    expect(bits).toEqual([1, 0, 1, 1, 0, 1, 0, 0]);
    expect(stream.position).toBe(stream.size);
  });

  it('should exclude pad bits from the readable size', () => {
    const stream = new BitInputStream(new Uint8Array([0xff, 0b11000000]), 6);

    expect(stream.size).toBe(10);
    expect(readAll(stream)).toEqual([1, 1, 1, 1, 1, 1, 1, 1, 1, 1]);
    expect(() => stream.readBit()).toThrow('Unexpected end of bitstream after 10 bits');
  });

  it('should throw CorruptedStream when reading past the data bits', () => {
    const stream = new BitInputStream(new Uint8Array([0xff]), 4);
    expect(readAll(stream)).toEqual([1, 1, 1, 1]);

    expect(() => stream.readBit()).toThrow(HuffmanError);
    expect(() => stream.readBit()).toThrow('Unexpected end of bitstream after 4 bits');
  });

  it('should throw on an empty stream', () => {
    const stream = new BitInputStream(new Uint8Array(0));

    expect(stream.size).toBe(0);
    expect(() => stream.readBit()).toThrow(HuffmanError);
  });

  it('should reject invalid pad counts', () => {
    expect(() => new BitInputStream(new Uint8Array([0]), 8)).toThrow('Invalid pad bit count: 8');
    expect(() => new BitInputStream(new Uint8Array(0), 3)).toThrow('exceeds the 0-bit stream');
  });

  it('should track position correctly', () => {
    const stream = new BitInputStream(new Uint8Array([0xff, 0x00]));

    expect(stream.position).toBe(0);
    expect(stream.size).toBe(16);

    stream.readBit();
    expect(stream.position).toBe(1);

    expect(readAll(stream)).toEqual([1, 1, 1, 1, 1, 1, 1, 0, 0, 0, 0, 0, 0, 0, 0]);
    expect(stream.position).toBe(16);
  });
});

describe('BitStream roundtrip', () => {
  it('should preserve data through write/read cycle', () => {
    const outStream = new BitOutputStream();
    const testData = [1, 0, 1, 1, 0, 0, 1, 0, 1, 1, 1, 0];

    for (const bit of testData) {
      outStream.writeBit(bit);
    }
    const padBits = outStream.flush();

    const inStream = new BitInputStream(outStream.toUint8Array(), padBits);
    const result = readAll(inStream);

    expect(padBits).toBe(4);
    expect(result).toEqual(testData);
  });
});
