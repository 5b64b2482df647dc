import { describe, it, expect } from 'vitest';
import {
  HuffmanCompressor,
  HuffmanError,
  buildHuffmanTree,
  compress,
  countFrequencies,
  createFrequencyTable,
  createHeader,
  decompress,
  deserializeContainer,
  encodedBitLength,
  generateCodeTable,
  inspectContainer,
  isPrefixFree,
  serializeContainer,
  type ProgressInfo,
} from '../src/index.js';

const encoder = new TextEncoder();

/**
 * Deterministic byte generator (linear congruential) so failures reproduce.
 */
function pseudoRandomBytes(length: number, seed: number, alphabet: number = 256): Uint8Array {
  const bytes = new Uint8Array(length);
  let state = seed >>> 0;
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    // Square the uniform draw to skew toward low symbols
    const r = state / 0x100000000;
    bytes[i] = Math.floor(r * r * alphabet);
  }
  return bytes;
}

function roundTrip(data: Uint8Array): Uint8Array {
  return decompress(deserializeContainer(serializeContainer(compress(data))));
}

describe('compress / decompress scenarios', () => {
  it('should handle empty input', () => {
    const container = compress(new Uint8Array(0));

    expect(container.header.originalLength).toBe(0);
    expect(container.header.alphabetSize).toBe(0);
    expect(container.header.padBits).toBe(0);
    expect(container.body.length).toBe(0);
    expect(decompress(container)).toEqual(new Uint8Array(0));
  });

  it('should handle a single repeated symbol', () => {
    const container = compress(encoder.encode('aaaa'));

    expect(container.header.alphabetSize).toBe(1);
    expect(container.header.frequencies[97]).toBe(4);
    expect(container.header.padBits).toBe(4);
    expect(Array.from(container.body)).toEqual([0b00000000]);
    expect(decompress(container)).toEqual(encoder.encode('aaaa'));
  });

  it('should pack abacabad into two bytes', () => {
    const container = compress(encoder.encode('abacabad'));

    // a=0 b=10 c=110 d=111 → 0 10 0 110 0 10 0 111 + 00
    expect(Array.from(container.body)).toEqual([0b01001100, 0b10011100]);
    expect(container.header.padBits).toBe(2);
    expect(decompress(container)).toEqual(encoder.encode('abacabad'));
  });

  it('should fail with CorruptedStream on a truncated body', () => {
    const compressor = new HuffmanCompressor();
    const { data } = compressor.compress(encoder.encode('abacabad'));

    expect(() => compressor.decompress(data.slice(0, data.length - 1))).toThrow(HuffmanError);
    expect(() => compressor.decompress(data.slice(0, data.length - 1))).toThrow(
      'Unexpected end of bitstream after 6 bits'
    );
  });

  it('should fail with CorruptedStream when a walk reaches the placeholder', () => {
    const container = compress(encoder.encode('aaaa'));
    const corrupted = { ...container, body: new Uint8Array([0b10000000]) };

    expect(() => decompress(corrupted)).toThrow(
      'Bit pattern at position 1 does not map to any symbol'
    );
  });

  it('should fail with CorruptedStream when a nonempty header has no symbols', () => {
    const header = { ...createHeader(0, 0, createFrequencyTable()), originalLength: 3 };

    try {
      decompress({ header, body: new Uint8Array(1) });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(HuffmanError);
      expect(error instanceof HuffmanError && error.kind).toBe('CorruptedStream');
    }
  });

  it('should fail with InvalidFormat on a foreign version or magic', () => {
    const container = compress(encoder.encode('abacabad'));
    const foreignVersion = { ...container, header: { ...container.header, version: 9 } };
    const foreignMagic = {
      ...container,
      header: { ...container.header, magic: new Uint8Array([0, 0, 0, 0]) },
    };

    expect(() => decompress(foreignVersion)).toThrow('Unsupported format version: 9 (expected 1)');
    expect(() => decompress(foreignMagic)).toThrow('Invalid file format: magic bytes mismatch');
    try {
      decompress(foreignMagic);
      expect.unreachable();
    } catch (error) {
      expect(error instanceof HuffmanError && error.kind).toBe('InvalidFormat');
    }
  });

  it('should fail with CorruptedStream when the alphabet size disagrees with the table', () => {
    const container = compress(encoder.encode('abacabad'));
    const header = { ...container.header, alphabetSize: 7 };

    try {
      decompress({ header, body: container.body });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(HuffmanError);
      expect(error instanceof HuffmanError && error.kind).toBe('CorruptedStream');
      expect(error instanceof HuffmanError && error.message).toBe(
        'Alphabet size 7 disagrees with 4 symbols in the frequency table'
      );
    }
  });

  it('should fail with CorruptedStream when frequencies do not sum to the length', () => {
    const container = compress(encoder.encode('abacabad'));
    const header = { ...container.header, originalLength: 6 };

    expect(() => decompress({ header, body: container.body })).toThrow(
      'Frequencies sum to 8 but original length is 6'
    );
  });

  it('should ignore trailing pad bits that would decode as symbols', () => {
    // 'ab' with a=0, b=1 leaves six zero pad bits, each a valid code for 'a'
    const container = compress(encoder.encode('ab'));

    expect(container.header.padBits).toBe(6);
    expect(decompress(container)).toEqual(encoder.encode('ab'));
  });
});

describe('round trip', () => {
  const cases: Array<[string, Uint8Array]> = [
    ['empty', new Uint8Array(0)],
    ['single byte', new Uint8Array([42])],
    ['all identical', new Uint8Array(1000).fill(0xff)],
    ['two symbols', encoder.encode('ababababbbbbbba')],
    ['text', encoder.encode('The quick brown fox jumps over the lazy dog. 0123456789')],
    ['full alphabet', Uint8Array.from({ length: 256 * 3 }, (_, i) => i % 256)],
    ['skewed random', pseudoRandomBytes(50_000, 7)],
    ['small alphabet random', pseudoRandomBytes(10_000, 99, 5)],
  ];

  for (const [name, data] of cases) {
    it(`should restore ${name} input`, () => {
      expect(roundTrip(data)).toEqual(data);
    });
  }
});

describe('properties', () => {
  const inputs = [
    encoder.encode('x'),
    encoder.encode('abacabad'),
    encoder.encode('mississippi'),
    pseudoRandomBytes(4096, 1),
    pseudoRandomBytes(777, 2, 17),
  ];

  it('should generate prefix-free code tables', () => {
    for (const data of inputs) {
      const codes = generateCodeTable(buildHuffmanTree(countFrequencies(data)));
      expect(isPrefixFree(codes)).toBe(true);
    }
  });

  it('should pad the body to the next whole byte only', () => {
    for (const data of inputs) {
      const frequencies = countFrequencies(data);
      const bits = encodedBitLength(generateCodeTable(buildHuffmanTree(frequencies)), frequencies);
      const { header, body } = compress(data);

      expect(body.length * 8).toBe(Math.ceil(bits / 8) * 8);
      expect(header.padBits).toBe(body.length * 8 - bits);
    }
  });

  it('should produce identical containers for identical input', () => {
    const data = pseudoRandomBytes(2048, 3);

    expect(serializeContainer(compress(data))).toEqual(serializeContainer(compress(data.slice())));
  });
});

describe('HuffmanCompressor', () => {
  it('should report sizes and ratio', () => {
    const result = new HuffmanCompressor().compress(encoder.encode('abacabad'));

    expect(result.originalSize).toBe(8);
    expect(result.headerSize).toBe(32);
    expect(result.payloadSize).toBe(2);
    expect(result.compressedSize).toBe(34);
    expect(result.alphabetSize).toBe(4);
    expect(result.padBits).toBe(2);
    expect(result.compressionRatio).toBe(34 / 8);
  });

  it('should report a ratio of 1 for empty input', () => {
    const result = new HuffmanCompressor().compress(new Uint8Array(0));

    expect(result.compressedSize).toBe(12);
    expect(result.compressionRatio).toBe(1);
  });

  it('should report progress for each stage', () => {
    const events: ProgressInfo[] = [];
    const compressor = new HuffmanCompressor({
      chunkSize: 4,
      onProgress: (progress) => events.push(progress),
    });

    const { data } = compressor.compress(encoder.encode('abacabad'));
    compressor.decompress(data);

    expect(events).toEqual([
      { stage: 'analyzing', current: 4, total: 8 },
      { stage: 'analyzing', current: 8, total: 8 },
      { stage: 'building', current: 0, total: 1 },
      { stage: 'building', current: 1, total: 1 },
      { stage: 'encoding', current: 4, total: 8 },
      { stage: 'encoding', current: 8, total: 8 },
      { stage: 'decoding', current: 4, total: 8 },
      { stage: 'decoding', current: 8, total: 8 },
    ]);
  });

  it('should reject data that is not a container', () => {
    const compressor = new HuffmanCompressor();

    expect(() => compressor.decompress(encoder.encode('plain text, not compressed'))).toThrow(
      'Invalid file format: magic bytes mismatch'
    );
  });
});

describe('inspectContainer', () => {
  it('should describe the header and codes', () => {
    const { data } = new HuffmanCompressor().compress(encoder.encode('abacabad'));
    const info = inspectContainer(data);

    expect(info.headerSize).toBe(32);
    expect(info.payloadSize).toBe(2);
    expect(info.treeDepth).toBe(3);
    expect(info.codes.get(97)).toEqual([0]);
    expect(info.codes.get(100)).toEqual([1, 1, 1]);
  });

  it('should describe an empty container', () => {
    const { data } = new HuffmanCompressor().compress(new Uint8Array(0));
    const info = inspectContainer(data);

    expect(info.codes.size).toBe(0);
    expect(info.treeDepth).toBe(0);
  });
});
