/**
 * Formatting helpers for the command-line front end.
 */

import * as path from 'path';

export interface CompressionStats {
  /** compressed / original, header included */
  compressionRatio: number;

  /** Percentage of the original size saved; negative when the output grew */
  spaceSaved: number;
}

export const COMPRESSED_EXTENSION = '.huff';

/**
 * Compute ratio and savings. Both are 0 for an empty original.
 */
export function getCompressionStats(
  originalSize: number,
  compressedSize: number
): CompressionStats {
  if (originalSize === 0) {
    return { compressionRatio: 0, spaceSaved: 0 };
  }

  return {
    compressionRatio: compressedSize / originalSize,
    spaceSaved: (1 - compressedSize / originalSize) * 100,
  };
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(size: number): string {
  let value = size;
  for (const unit of BYTE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}

/**
 * Format a duration given in milliseconds.
 */
export function formatDuration(ms: number): string {
  if (ms < 1) {
    return `${(ms * 1000).toFixed(2)} µs`;
  }
  if (ms < 1000) {
    return `${ms.toFixed(2)} ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)} s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${(seconds % 60).toFixed(2)}s`;
}

/**
 * Default output path for `compress`: the input's stem with `.huff`, beside it.
 * An input that already ends in `.huff` gets a second extension.
 */
export function getCompressedPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  if (parsed.ext === COMPRESSED_EXTENSION) {
    return `${inputPath}${COMPRESSED_EXTENSION}`;
  }
  return path.join(parsed.dir, `${parsed.name}${COMPRESSED_EXTENSION}`);
}

/**
 * Default output path for `decompress`: strip `.huff`, else append `.decompressed`.
 */
export function getDecompressedPath(inputPath: string): string {
  if (path.extname(inputPath) === COMPRESSED_EXTENSION) {
    return inputPath.slice(0, -COMPRESSED_EXTENSION.length);
  }
  return `${inputPath}.decompressed`;
}
