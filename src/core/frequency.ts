/**
 * Byte frequency analysis.
 *
 * A frequency table is a plain 256-entry array indexed by byte value. Tables
 * from separate chunks of the same input can be summed in any order, so large
 * inputs can be counted window by window with memory bounded by the alphabet.
 */

/**
 * Number of distinct symbols (one per byte value).
 */
export const ALPHABET_SIZE = 256;

/**
 * Default window used when counting in chunks (64 KiB).
 */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export type FrequencyTable = number[];

export interface SymbolEntry {
  symbol: number;
  count: number;
}

/**
 * Create an all-zero frequency table.
 */
export function createFrequencyTable(): FrequencyTable {
  return new Array<number>(ALPHABET_SIZE).fill(0);
}

/**
 * Count byte occurrences in a single pass.
 *
 * @param table - Existing table to accumulate into. A new one is created when omitted.
 */
export function countFrequencies(
  data: Uint8Array,
  table: FrequencyTable = createFrequencyTable()
): FrequencyTable {
  assertFrequencyTable(table);
  for (let i = 0; i < data.length; i++) {
    table[data[i]]++;
  }
  return table;
}

/**
 * Sum several tables element-wise into a new table.
 */
export function mergeFrequencyTables(...tables: FrequencyTable[]): FrequencyTable {
  const merged = createFrequencyTable();
  for (const table of tables) {
    assertFrequencyTable(table);
    for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
      merged[symbol] += table[symbol];
    }
  }
  return merged;
}

/**
 * Count frequencies over fixed-size windows and merge the per-window tables.
 * The result is identical to `countFrequencies(data)`.
 *
 * @param onChunk - Called after each window with the number of bytes counted so far.
 */
export function countFrequenciesChunked(
  data: Uint8Array,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  onChunk?: (bytesProcessed: number, totalBytes: number) => void
): FrequencyTable {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  const chunkTables: FrequencyTable[] = [];
  for (let start = 0; start < data.length; start += chunkSize) {
    const end = Math.min(start + chunkSize, data.length);
    chunkTables.push(countFrequencies(data.subarray(start, end)));
    onChunk?.(end, data.length);
  }

  return mergeFrequencyTables(...chunkTables);
}

/**
 * Incremental frequency counter for streamed input.
 */
export class FrequencyCounter {
  private table: FrequencyTable = createFrequencyTable();
  private count: number = 0;

  update(chunk: Uint8Array): this {
    countFrequencies(chunk, this.table);
    this.count += chunk.length;
    return this;
  }

  merge(other: FrequencyCounter): this {
    this.table = mergeFrequencyTables(this.table, other.table);
    this.count += other.count;
    return this;
  }

  /**
   * Total number of bytes counted.
   */
  get total(): number {
    return this.count;
  }

  /**
   * Snapshot of the accumulated counts.
   */
  toTable(): FrequencyTable {
    return [...this.table];
  }
}

/**
 * Count frequencies from an async byte source such as a Node.js read stream.
 */
export async function countStreamFrequencies(
  source: AsyncIterable<Uint8Array>
): Promise<FrequencyTable> {
  const counter = new FrequencyCounter();
  for await (const chunk of source) {
    counter.update(chunk);
  }
  return counter.toTable();
}

/**
 * Symbols with a nonzero count, in ascending symbol order.
 */
export function symbolEntries(table: FrequencyTable): SymbolEntry[] {
  const entries: SymbolEntry[] = [];
  for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
    if (table[symbol] > 0) {
      entries.push({ symbol, count: table[symbol] });
    }
  }
  return entries;
}

export function totalCount(table: FrequencyTable): number {
  let total = 0;
  for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
    total += table[symbol];
  }
  return total;
}

function assertFrequencyTable(table: FrequencyTable): void {
  if (table.length !== ALPHABET_SIZE) {
    throw new TypeError(
      `Frequency table must have ${ALPHABET_SIZE} entries, got ${table.length}`
    );
  }
  for (let symbol = 0; symbol < ALPHABET_SIZE; symbol++) {
    const count = table[symbol];
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new RangeError(`Invalid count ${count} for symbol ${symbol}`);
    }
  }
}
