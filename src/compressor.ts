import { BitOutputStream, BitInputStream } from './core/bit-stream.js';
import { countFrequencies, distinctSymbols } from './core/frequency.js';
import { buildTree } from './core/tree-builder.js';
import { buildCodeTable, encodedBitLength } from './core/code-table.js';
import { encodeBody, decodeBody } from './core/stream-codec.js';
import { BITS_PER_INT, PSEUDO_EOF } from './core/symbols.js';
import { writeMagic, readMagic } from './format/header.js';
import { writeTreeHeader, readTreeHeader, treeHeaderBits } from './format/tree-header.js';
import { DEBUG_HIGH, DEBUG_LOW, type Logger } from './utils/logger.js';

/**
 * Bytes between two progress reports while encoding or decoding.
 */
const PROGRESS_INTERVAL = 1 << 16;

/**
 * Progress information callback payload.
 */
export interface ProgressInfo {
  stage: 'counting' | 'building' | 'encoding' | 'decoding';
  current: number;
  total: number;
}

/**
 * Options for HuffmanCompressor.
 */
export interface CompressorOptions {
  /** Progress callback */
  onProgress?: (progress: ProgressInfo) => void;

  /** 0 (default) for no debug output, DEBUG_LOW or DEBUG_HIGH */
  debugLevel?: number;

  /** Destination for debug lines and warnings (default: console) */
  logger?: Logger;
}

/**
 * Bit accounting for one compression run.
 */
export interface CompressionStats {
  /** Bytes read from the input */
  originalSize: number;

  /** Symbols with a leaf in the tree, end-of-stream included */
  symbolCount: number;

  /** Bits taken by the serialized tree (magic number excluded) */
  headerBits: number;

  /** Bits taken by the encoded body, padding excluded */
  bodyBits: number;

  /** Total bits written, padding excluded */
  bitsWritten: number;
}

/**
 * Bit accounting for one decompression run.
 */
export interface DecompressionStats {
  /** Bytes written to the output */
  decodedSize: number;

  /** Bits consumed, magic number and header included */
  bitsRead: number;

  /** Whole bytes left after the end-of-stream code */
  trailingBytes: number;
}

/**
 * Result of compression operation.
 */
export interface CompressionResult extends CompressionStats {
  /** Compressed data (magic + tree header + body) */
  data: Uint8Array;

  /** Compressed size in bytes */
  compressedSize: number;

  /** Compression ratio (originalSize / compressedSize) */
  compressionRatio: number;
}

/**
 * Lossless compressor built on a per-input Huffman tree.
 *
 * Usage:
 * ```typescript
 * const compressor = new HuffmanCompressor();
 *
 * const result = compressor.compress(new TextEncoder().encode('abracadabra'));
 * const bytes = compressor.decompress(result.data);
 * ```
 *
 * Instances keep no state between calls.
 */
export class HuffmanCompressor {
  private options: CompressorOptions;
  private logger: Logger;

  constructor(options: CompressorOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? console;
  }

  /**
   * Compress everything readable from `input` into `output`.
   * The input is read twice and rewound in between; the output is closed.
   */
  compressStream(input: BitInputStream, output: BitOutputStream): CompressionStats {
    const totalBytes = Math.floor(input.remaining / 8);

    this.reportProgress('counting', 0, totalBytes);
    const counts = countFrequencies(input);
    this.reportProgress('counting', totalBytes, totalBytes);

    this.reportProgress('building', 0, 1);
    const root = buildTree(counts);
    const codes = buildCodeTable(root);
    const symbolCount = distinctSymbols(counts);
    this.reportProgress('building', 1, 1);

    this.debug(DEBUG_LOW, `${symbolCount} distinct symbols, end-of-stream included`);
    if (this.isDebugging(DEBUG_HIGH)) {
      for (const [symbol, code] of codes) {
        const label = symbol === PSEUDO_EOF ? 'EOF' : String(symbol);
        this.logger.debug(`encoding for ${label} is ${code || '(empty)'}`);
      }
    }

    writeMagic(output);
    writeTreeHeader(root, output);
    const headerBits = treeHeaderBits(root);
    this.debug(DEBUG_LOW, `wrote tree header of ${headerBits} bits`);

    input.reset();
    const originalSize = encodeBody(codes, input, output, (count) => {
      if (count % PROGRESS_INTERVAL === 0) {
        this.reportProgress('encoding', count, totalBytes);
      }
    });
    this.reportProgress('encoding', originalSize, totalBytes);

    const bodyBits = encodedBitLength(codes, counts);
    const bitsWritten = BITS_PER_INT + headerBits + bodyBits;
    this.debug(DEBUG_LOW, `read ${originalSize * 8} bits, wrote ${bitsWritten} bits`);

    return { originalSize, symbolCount, headerBits, bodyBits, bitsWritten };
  }

  /**
   * Decompress a stream produced by compressStream into `output`.
   * The output is closed.
   *
   * @throws FormatError if the magic number is missing or wrong
   * @throws CorruptHeaderError if the tree header is truncated or invalid
   * @throws TruncatedStreamError if the body ends before end-of-stream
   */
  decompressStream(input: BitInputStream, output: BitOutputStream): DecompressionStats {
    readMagic(input);
    const root = readTreeHeader(input);
    this.debug(DEBUG_LOW, `read tree header, now at bit ${input.position}`);

    const decodedSize = decodeBody(root, input, output, (count) => {
      if (count % PROGRESS_INTERVAL === 0) {
        this.reportProgress('decoding', count, count);
      }
    });
    this.reportProgress('decoding', decodedSize, decodedSize);

    const bitsRead = input.position;
    const trailingBytes = Math.floor(input.remaining / 8);
    if (trailingBytes > 0) {
      this.logger.warn(
        `Ignoring ${trailingBytes} trailing bytes after the end-of-stream code`
      );
    }
    this.debug(DEBUG_LOW, `read ${bitsRead} bits, wrote ${decodedSize * 8} bits`);

    return { decodedSize, bitsRead, trailingBytes };
  }

  /**
   * Compress a buffer.
   *
   * @param data - The bytes to compress
   * @returns Compression result with data and statistics
   */
  compress(data: Uint8Array): CompressionResult {
    const output = new BitOutputStream();
    const stats = this.compressStream(new BitInputStream(data), output);
    const compressed = output.toUint8Array();

    return {
      ...stats,
      data: compressed,
      compressedSize: compressed.length,
      compressionRatio: stats.originalSize / compressed.length,
    };
  }

  /**
   * Decompress a buffer produced by compress().
   *
   * @param data - The compressed data
   * @returns The original bytes
   */
  decompress(data: Uint8Array): Uint8Array {
    const output = new BitOutputStream();
    this.decompressStream(new BitInputStream(data), output);
    return output.toUint8Array();
  }

  private isDebugging(level: number): boolean {
    return (this.options.debugLevel ?? 0) >= level;
  }

  private debug(level: number, message: string): void {
    if (this.isDebugging(level)) {
      this.logger.debug(message);
    }
  }

  /**
   * Report progress to the callback if provided.
   */
  private reportProgress(
    stage: ProgressInfo['stage'],
    current: number,
    total: number
  ): void {
    this.options.onProgress?.({ stage, current, total });
  }
}
