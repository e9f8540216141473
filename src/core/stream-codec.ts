import { BitInputStream, BitOutputStream, END_OF_DATA } from './bit-stream.js';
import type { CodeTable } from './code-table.js';
import type { HuffNode } from './huff-node.js';
import { BITS_PER_WORD, PSEUDO_EOF, type HuffSymbol } from './symbols.js';
import { CorruptHeaderError, TruncatedStreamError } from '../errors.js';

/**
 * Outcome of decoding one symbol from the body.
 */
export type DecodeStep =
  | { kind: 'symbol'; value: number }
  | { kind: 'end' }
  | { kind: 'truncated' };

/**
 * Write one code ('0'/'1' string) to the stream.
 */
export function writeCode(code: string, output: BitOutputStream): void {
  for (let i = 0; i < code.length; i++) {
    output.writeBit(code.charCodeAt(i) === 0x31 ? 1 : 0);
  }
}

function lookup(codes: CodeTable, symbol: HuffSymbol): string {
  const code = codes.get(symbol);
  if (code === undefined) {
    throw new Error(`No code for symbol ${symbol}`);
  }
  return code;
}

/**
 * Encode every 8-bit word from the input, then the end-of-stream code, and
 * close the output.
 *
 * The code table must hold every byte value the input contains, which is the
 * case when it was built from this input's own frequency table.
 *
 * @returns number of bytes encoded
 */
export function encodeBody(
  codes: CodeTable,
  input: BitInputStream,
  output: BitOutputStream,
  onByte?: (count: number) => void
): number {
  let count = 0;

  while (true) {
    const value = input.readBits(BITS_PER_WORD);
    if (value === END_OF_DATA) break;
    writeCode(lookup(codes, value), output);
    count++;
    onByte?.(count);
  }

  writeCode(lookup(codes, PSEUDO_EOF), output);
  output.close();
  return count;
}

/**
 * Walk the tree from the root, one bit per edge, until a leaf is reached.
 *
 * A root that is a leaf is reached without reading anything.
 */
export function decodeSymbol(root: HuffNode, input: BitInputStream): DecodeStep {
  let current = root;

  while (current.kind === 'internal') {
    const bit = input.readBit();
    if (bit === END_OF_DATA) {
      return { kind: 'truncated' };
    }
    current = bit === 0 ? current.left : current.right;
  }

  if (current.symbol === PSEUDO_EOF) {
    return { kind: 'end' };
  }
  return { kind: 'symbol', value: current.symbol };
}

/**
 * Decode symbols into 8-bit words until the end-of-stream symbol, then close
 * the output. Padding after the end-of-stream code is never read.
 *
 * @returns number of bytes decoded
 * @throws TruncatedStreamError if the input ends before the end-of-stream code
 * @throws CorruptHeaderError if the tree is a lone literal leaf
 */
export function decodeBody(
  root: HuffNode,
  input: BitInputStream,
  output: BitOutputStream,
  onByte?: (count: number) => void
): number {
  if (root.kind === 'leaf' && root.symbol !== PSEUDO_EOF) {
    throw new CorruptHeaderError('single-leaf tree without the end-of-stream symbol');
  }

  let count = 0;

  while (true) {
    const step = decodeSymbol(root, input);
    switch (step.kind) {
      case 'end':
        output.close();
        return count;
      case 'truncated':
        throw new TruncatedStreamError(count);
      case 'symbol':
        output.writeBits(step.value, BITS_PER_WORD);
        count++;
        onByte?.(count);
        break;
    }
  }
}
