/**
 * Pre-order tree serialization.
 *
 * Each node is visited before its children, left subtree first:
 * - internal node: a single 0 bit
 * - leaf: a 1 bit followed by the 9-bit symbol
 */

import { BitInputStream, BitOutputStream, END_OF_DATA } from '../core/bit-stream.js';
import { internal, leaf, type HuffNode } from '../core/huff-node.js';
import { ALPH_SIZE, PSEUDO_EOF, SYMBOL_BITS, isValidSymbol } from '../core/symbols.js';
import { CorruptHeaderError } from '../errors.js';

/**
 * Write the tree in pre-order.
 */
export function writeTreeHeader(root: HuffNode, output: BitOutputStream): void {
  if (root.kind === 'internal') {
    output.writeBit(0);
    writeTreeHeader(root.left, output);
    writeTreeHeader(root.right, output);
    return;
  }

  output.writeBit(1);
  output.writeBits(root.symbol, SYMBOL_BITS);
}

/**
 * Number of bits writeTreeHeader emits for a tree.
 */
export function treeHeaderBits(root: HuffNode): number {
  if (root.kind === 'leaf') return 1 + SYMBOL_BITS;
  return 1 + treeHeaderBits(root.left) + treeHeaderBits(root.right);
}

/**
 * Parse a tree written by writeTreeHeader. Leaves get weight 0.
 *
 * At most SYMBOL_COUNT leaves exist, so no internal node sits deeper than
 * ALPH_SIZE - 1.
 *
 * @throws CorruptHeaderError if the input runs out, the tree is too deep,
 *         a leaf symbol is out of range, or the tree is a single literal leaf
 */
export function readTreeHeader(input: BitInputStream): HuffNode {
  const root = readNode(input, 0);
  if (root.kind === 'leaf' && root.symbol !== PSEUDO_EOF) {
    throw new CorruptHeaderError(
      `single-leaf tree holds symbol ${root.symbol} instead of end-of-stream`
    );
  }
  return root;
}

function readNode(input: BitInputStream, depth: number): HuffNode {
  const bit = input.readBit();
  if (bit === END_OF_DATA) {
    throw new CorruptHeaderError(`stream ends at bit ${input.position}`);
  }

  if (bit === 0) {
    if (depth >= ALPH_SIZE) {
      throw new CorruptHeaderError(`tree deeper than ${ALPH_SIZE} levels`);
    }
    const left = readNode(input, depth + 1);
    const right = readNode(input, depth + 1);
    return internal(left, right);
  }

  const symbol = input.readBits(SYMBOL_BITS);
  if (symbol === END_OF_DATA) {
    throw new CorruptHeaderError(`stream ends inside a leaf at bit ${input.position}`);
  }
  if (!isValidSymbol(symbol)) {
    throw new CorruptHeaderError(`leaf symbol ${symbol} is out of range`);
  }
  return leaf(symbol);
}
