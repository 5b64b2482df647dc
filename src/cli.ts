/**
 * Command-line front end.
 *
 * Usage:
 *   huffzip compress <input> [-o <output>] [-q]
 *   huffzip decompress <input> [-o <output>] [-q]
 *   huffzip info <input>
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { HuffmanCompressor, inspectContainer, type ProgressInfo } from './compressor.js';
import { codeToString } from './core/code-table.js';
import { isHuffmanError, type HuffmanErrorKind } from './errors.js';
import {
  formatBytes,
  formatDuration,
  getCompressedPath,
  getCompressionStats,
  getDecompressedPath,
} from './utils/stats.js';

export type CliCommand =
  | { command: 'compress' | 'decompress'; input: string; output?: string; quiet: boolean }
  | { command: 'info'; input: string }
  | { command: 'help' }
  | { command: 'version' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const ERROR_EXIT_CODES: Record<HuffmanErrorKind, number> = {
  InvalidFormat: 3,
  CorruptedStream: 4,
  UnsupportedAlphabetSize: 5,
};

export const HELP_TEXT = `Usage: huffzip <command> [options]

Commands:
  compress <input>     Compress a file (default output: <name>.huff)
  decompress <input>   Decompress a file (default output: input without .huff)
  info <input>         Show the header and code table of a compressed file

Options:
  -o, --output <path>  Output file path
  -q, --quiet          Suppress progress and statistics
  -h, --help           Show this help
  -v, --version        Show the version`;

const STAGE_LABELS: Record<ProgressInfo['stage'], string> = {
  analyzing: 'Analyzing',
  building: 'Building tree',
  encoding: 'Encoding',
  decoding: 'Decoding',
};

/**
 * Parse command-line arguments (without the node and script entries).
 * @throws UsageError on unknown commands, options or missing operands
 */
export function parseArgs(args: string[]): CliCommand {
  if (args.length === 0 || args.includes('-h') || args.includes('--help')) {
    return { command: 'help' };
  }
  if (args.includes('-v') || args.includes('--version')) {
    return { command: 'version' };
  }

  const [command, ...rest] = args;
  if (command !== 'compress' && command !== 'decompress' && command !== 'info') {
    throw new UsageError(`Unknown command: ${command}`);
  }

  let input: string | undefined;
  let output: string | undefined;
  let quiet = false;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '-o' || arg === '--output') {
      const value = rest[i + 1];
      if (value === undefined) {
        throw new UsageError(`Option ${arg} requires a path`);
      }
      output = value;
      i++;
    } else if (arg === '-q' || arg === '--quiet') {
      quiet = true;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (input === undefined) {
      input = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (input === undefined) {
    throw new UsageError(`Command ${command} requires an input file`);
  }

  if (command === 'info') {
    if (output !== undefined) {
      throw new UsageError('Command info does not take an output path');
    }
    return { command, input };
  }

  return { command, input, output, quiet };
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function runCli(args: string[]): Promise<number> {
  try {
    const parsed = parseArgs(args);

    switch (parsed.command) {
      case 'help':
        console.log(HELP_TEXT);
        return EXIT_SUCCESS;
      case 'version':
        console.log(readVersion());
        return EXIT_SUCCESS;
      case 'compress': {
        const output = parsed.output ?? getCompressedPath(parsed.input);
        assertDistinctPaths(parsed.input, output);
        await compressFile(parsed.input, output, parsed.quiet);
        return EXIT_SUCCESS;
      }
      case 'decompress': {
        const output = parsed.output ?? getDecompressedPath(parsed.input);
        assertDistinctPaths(parsed.input, output);
        await decompressFile(parsed.input, output, parsed.quiet);
        return EXIT_SUCCESS;
      }
      case 'info':
        await showInfo(parsed.input);
        return EXIT_SUCCESS;
    }
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.error("Run 'huffzip --help' for usage.");
      return EXIT_USAGE;
    }
    if (isHuffmanError(error)) {
      console.error(`Error: ${error.message}`);
      return ERROR_EXIT_CODES[error.kind];
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }
}

function assertDistinctPaths(inputPath: string, outputPath: string): void {
  if (path.resolve(inputPath) === path.resolve(outputPath)) {
    throw new UsageError(`Output path ${outputPath} would overwrite the input`);
  }
}

async function compressFile(inputPath: string, outputPath: string, quiet: boolean): Promise<void> {
  const log: (message: string) => void = quiet ? () => {} : (message) => console.log(message);
  log(`Compressing ${inputPath}...`);

  let start = performance.now();
  const data = await fs.promises.readFile(inputPath);
  const readTime = performance.now() - start;

  const progress = createProgressReporter(quiet);
  const compressor = new HuffmanCompressor({ onProgress: progress.report });

  start = performance.now();
  const result = compressor.compress(data);
  const compressTime = performance.now() - start;
  progress.end();

  start = performance.now();
  await fs.promises.writeFile(outputPath, result.data);
  const writeTime = performance.now() - start;

  const stats = getCompressionStats(result.originalSize, result.compressedSize);

  log(`  Reading time:     ${formatDuration(readTime)}`);
  log(`  Compression time: ${formatDuration(compressTime)}`);
  log(`  Writing time:     ${formatDuration(writeTime)}`);
  log('');
  log('Compression completed successfully!');
  log(`  Output file:       ${outputPath}`);
  log(`  Original size:     ${formatBytes(result.originalSize)}`);
  log(`  Compressed size:   ${formatBytes(result.compressedSize)} (header ${result.headerSize} B, body ${result.payloadSize} B)`);
  log(`  Compression ratio: ${stats.compressionRatio.toFixed(3)}`);
  log(`  Space saved:       ${stats.spaceSaved.toFixed(2)}%`);
}

async function decompressFile(inputPath: string, outputPath: string, quiet: boolean): Promise<void> {
  const log: (message: string) => void = quiet ? () => {} : (message) => console.log(message);
  log(`Decompressing ${inputPath}...`);

  const data = await fs.promises.readFile(inputPath);

  const progress = createProgressReporter(quiet);
  const compressor = new HuffmanCompressor({ onProgress: progress.report });

  const start = performance.now();
  const restored = compressor.decompress(data);
  const decompressTime = performance.now() - start;
  progress.end();

  await fs.promises.writeFile(outputPath, restored);

  log(`  Decompression time: ${formatDuration(decompressTime)}`);
  log('');
  log('Decompression completed successfully!');
  log(`  Output file:       ${outputPath}`);
  log(`  Decompressed size: ${formatBytes(restored.length)}`);
}

async function showInfo(inputPath: string): Promise<void> {
  const data = await fs.promises.readFile(inputPath);
  const info = inspectContainer(data);
  const { header } = info;

  console.log(`File: ${inputPath}`);
  console.log(`  Format version: ${header.version}`);
  console.log(`  Original size:  ${header.originalLength} bytes`);
  console.log(`  Header size:    ${info.headerSize} bytes`);
  console.log(`  Body size:      ${info.payloadSize} bytes`);
  console.log(`  Pad bits:       ${header.padBits}`);
  console.log(`  Alphabet size:  ${header.alphabetSize}`);
  console.log(`  Tree depth:     ${info.treeDepth}`);

  if (info.codes.size > 0) {
    console.log('  Codes:');
    for (const [symbol, code] of [...info.codes].sort((a, b) => a[0] - b[0])) {
      console.log(
        `    ${formatSymbol(symbol)}  ${String(header.frequencies[symbol]).padStart(10)}  ${codeToString(code)}`
      );
    }
  }
}

function formatSymbol(symbol: number): string {
  const hex = `0x${symbol.toString(16).padStart(2, '0')}`;
  const printable = symbol >= 0x20 && symbol < 0x7f ? `'${String.fromCharCode(symbol)}'` : '   ';
  return `${hex} ${printable}`;
}

/**
 * Progress line on an interactive stdout, nothing otherwise.
 */
function createProgressReporter(quiet: boolean): {
  report?: (progress: ProgressInfo) => void;
  end: () => void;
} {
  if (quiet || !process.stdout.isTTY) {
    return { end: () => {} };
  }

  let shown = false;
  return {
    report: ({ stage, current, total }) => {
      const percent = total === 0 ? 100 : Math.floor((current / total) * 100);
      process.stdout.write(`\r  ${STAGE_LABELS[stage]}: ${percent}%`.padEnd(32));
      shown = true;
    },
    end: () => {
      if (shown) process.stdout.write('\n');
    },
  };
}

function readVersion(): string {
  const packagePath = fileURLToPath(new URL('../package.json', import.meta.url));
  const manifest: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf8'));
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return '0.0.0';
}
