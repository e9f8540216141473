/**
 * huffpack
 *
 * Lossless compression with a per-input Huffman tree stored in the stream.
 *
 * @example
 * ```typescript
 * import { HuffmanCompressor } from 'huffpack';
 *
 * const compressor = new HuffmanCompressor();
 *
 * // Compress
 * const result = compressor.compress(new TextEncoder().encode('Hello, world!'));
 * console.log(`Compression ratio: ${result.compressionRatio.toFixed(2)}x`);
 *
 * // Decompress
 * const bytes = compressor.decompress(result.data);
 * console.log(new TextDecoder().decode(bytes)); // 'Hello, world!'
 * ```
 */

// Main compressor
export {
  HuffmanCompressor,
  type CompressorOptions,
  type CompressionResult,
  type CompressionStats,
  type DecompressionStats,
  type ProgressInfo,
} from './compressor.js';

// Errors
export {
  HuffError,
  FormatError,
  CorruptHeaderError,
  TruncatedStreamError,
} from './errors.js';

// Core coding (for advanced usage)
export {
  BitOutputStream,
  BitInputStream,
  END_OF_DATA,
  BITS_PER_WORD,
  BITS_PER_INT,
  ALPH_SIZE,
  PSEUDO_EOF,
  SYMBOL_COUNT,
  SYMBOL_BITS,
  type HuffSymbol,
  isLiteral,
  isValidSymbol,
  type FrequencyTable,
  countFrequencies,
  countBytes,
  distinctSymbols,
  type HuffNode,
  type HuffLeaf,
  type HuffInternal,
  leaf,
  internal,
  countLeaves,
  sameShape,
  MinPriorityQueue,
  buildTree,
  type CodeTable,
  buildCodeTable,
  isPrefixFree,
  encodedBitLength,
  type DecodeStep,
  writeCode,
  encodeBody,
  decodeSymbol,
  decodeBody,
} from './core/index.js';

// File format (for advanced usage)
export {
  HUFF_NUMBER,
  HUFF_TREE,
  MAGIC_SIZE,
  writeMagic,
  readMagic,
  isHuffFormat,
  writeTreeHeader,
  readTreeHeader,
  treeHeaderBits,
} from './format/index.js';

// Utilities
export { DEBUG_LOW, DEBUG_HIGH, type Logger, silentLogger } from './utils/index.js';
