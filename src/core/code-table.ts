import type { HuffNode } from './huff-node.js';
import type { HuffSymbol } from './symbols.js';

/**
 * Symbol -> code, where a code is a string of '0' and '1' characters
 * spelling the path from the root (0 = left, 1 = right).
 */
export type CodeTable = ReadonlyMap<HuffSymbol, string>;

/**
 * Walk the tree depth first, left before right, recording each leaf's path.
 *
 * A root that is itself a leaf gets the empty code.
 */
export function buildCodeTable(root: HuffNode): CodeTable {
  const codes = new Map<HuffSymbol, string>();
  collectCodes(root, '', codes);
  return codes;
}

function collectCodes(
  node: HuffNode,
  path: string,
  codes: Map<HuffSymbol, string>
): void {
  if (node.kind === 'leaf') {
    codes.set(node.symbol, path);
    return;
  }
  collectCodes(node.left, path + '0', codes);
  collectCodes(node.right, path + '1', codes);
}

/**
 * Check that no code is a prefix of another.
 */
export function isPrefixFree(codes: CodeTable): boolean {
  const sorted = [...codes.values()].sort();
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].startsWith(sorted[i - 1])) return false;
  }
  return true;
}

/**
 * Total body length in bits for the given counts (end-of-stream included).
 */
export function encodedBitLength(codes: CodeTable, counts: ArrayLike<number>): number {
  let bits = 0;
  for (const [symbol, code] of codes) {
    bits += code.length * (counts[symbol] ?? 0);
  }
  return bits;
}
