/**
 * Compressed stream preamble.
 *
 * Every compressed stream starts with a 32-bit magic number naming the
 * header layout that follows:
 * - HUFF_TREE: a pre-order serialized tree, then the encoded body
 */

import { BitInputStream, BitOutputStream } from '../core/bit-stream.js';
import { BITS_PER_INT } from '../core/symbols.js';
import { FormatError } from '../errors.js';

/**
 * Base magic number shared by the Huffman formats.
 */
export const HUFF_NUMBER = 0xface8200;

/**
 * Magic number for the tree-header format.
 */
export const HUFF_TREE = (HUFF_NUMBER | 1) >>> 0;

/**
 * Preamble size in bytes.
 */
export const MAGIC_SIZE = BITS_PER_INT / 8;

/**
 * Write the magic number.
 */
export function writeMagic(output: BitOutputStream): void {
  output.writeBits(HUFF_TREE, BITS_PER_INT);
}

/**
 * Read and check the magic number. Nothing past the first 32 bits is read.
 *
 * @throws FormatError if the stream is shorter than 32 bits or the value
 *         is not HUFF_TREE
 */
export function readMagic(input: BitInputStream): void {
  const value = input.readBits(BITS_PER_INT);
  if (value !== HUFF_TREE) {
    throw new FormatError(value);
  }
}

/**
 * Check whether a buffer starts with the tree-header magic number.
 */
export function isHuffFormat(data: Uint8Array): boolean {
  if (data.length < MAGIC_SIZE) return false;
  const view = new DataView(data.buffer, data.byteOffset, MAGIC_SIZE);
  return view.getUint32(0) === HUFF_TREE;
}
