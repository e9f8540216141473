export { BitOutputStream, BitInputStream, END_OF_DATA } from './bit-stream.js';
export {
  BITS_PER_WORD,
  BITS_PER_INT,
  ALPH_SIZE,
  PSEUDO_EOF,
  SYMBOL_COUNT,
  SYMBOL_BITS,
  type HuffSymbol,
  isLiteral,
  isValidSymbol,
} from './symbols.js';
export {
  type FrequencyTable,
  countFrequencies,
  countBytes,
  distinctSymbols,
} from './frequency.js';
export {
  type HuffNode,
  type HuffLeaf,
  type HuffInternal,
  leaf,
  internal,
  countLeaves,
  sameShape,
} from './huff-node.js';
export { MinPriorityQueue } from './priority-queue.js';
export { buildTree } from './tree-builder.js';
export {
  type CodeTable,
  buildCodeTable,
  isPrefixFree,
  encodedBitLength,
} from './code-table.js';
export {
  type DecodeStep,
  writeCode,
  encodeBody,
  decodeSymbol,
  decodeBody,
} from './stream-codec.js';
