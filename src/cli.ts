/**
 * Command line front end.
 *
 *   huffpack [-d|--decompress] [--debug <level>] [--verify] [-o <file>] <input>
 */

import * as fs from 'node:fs';
import { HuffmanCompressor } from './compressor.js';
import { HuffError } from './errors.js';
import type { Logger } from './utils/logger.js';

export const COMPRESSED_EXTENSION = '.hf';

export const USAGE =
  'Usage: huffpack [-d|--decompress] [--debug <level>] [--verify] [-o <file>] <input>';

export interface CliOptions {
  decompress: boolean;
  debugLevel: number;
  verify: boolean;
  input: string;
  output: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Default output path: add `.hf` when compressing; when decompressing,
 * strip it, or append `.out` if the input lacks it.
 */
export function defaultOutputPath(input: string, decompress: boolean): string {
  if (!decompress) return input + COMPRESSED_EXTENSION;
  if (input.endsWith(COMPRESSED_EXTENSION) && input.length > COMPRESSED_EXTENSION.length) {
    return input.slice(0, -COMPRESSED_EXTENSION.length);
  }
  return input + '.out';
}

/**
 * Parse arguments (without the node and script entries).
 *
 * @throws UsageError on unknown flags, missing values or a missing input
 */
export function parseArgs(args: string[]): CliOptions {
  let decompress = false;
  let debugLevel = 0;
  let verify = false;
  let input: string | undefined;
  let output: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-d' || arg === '--decompress') {
      decompress = true;
    } else if (arg === '--verify') {
      verify = true;
    } else if (arg === '--debug') {
      const value = args[++i];
      if (value === undefined || !/^\d+$/.test(value)) {
        throw new UsageError('--debug expects a non-negative integer');
      }
      debugLevel = parseInt(value, 10);
    } else if (arg === '-o' || arg === '--output') {
      const value = args[++i];
      if (value === undefined) {
        throw new UsageError(`${arg} expects a file name`);
      }
      output = value;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (input === undefined) {
      input = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (input === undefined) {
    throw new UsageError('Missing input file');
  }

  return {
    decompress,
    debugLevel,
    verify,
    input,
    output: output ?? defaultOutputPath(input, decompress),
  };
}

/**
 * Run the command and return the process exit code.
 * 0 on success, 1 on codec or I/O failure, 2 on bad arguments.
 */
export function runCli(args: string[], logger: Logger = console): number {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    if (err instanceof UsageError) {
      logger.warn(`${err.message}\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  const compressor = new HuffmanCompressor({
    debugLevel: options.debugLevel,
    logger,
  });

  try {
    const data = new Uint8Array(fs.readFileSync(options.input));

    if (options.decompress) {
      const bytes = compressor.decompress(data);
      fs.writeFileSync(options.output, bytes);
      logger.debug(`${options.input}: ${data.length} -> ${bytes.length} bytes`);
      return 0;
    }

    const result = compressor.compress(data);
    if (options.verify && !sameBytes(compressor.decompress(result.data), data)) {
      logger.warn(`${options.input}: verification failed`);
      return 1;
    }
    fs.writeFileSync(options.output, result.data);
    logger.debug(
      `${options.input}: ${result.originalSize} -> ${result.compressedSize} bytes ` +
        `(${result.compressionRatio.toFixed(2)}x)`
    );
    return 0;
  } catch (err) {
    if (err instanceof HuffError || isSystemError(err)) {
      logger.warn(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function isSystemError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
