import type { HuffSymbol } from './symbols.js';

/**
 * A leaf carries a symbol. Parsed trees have no weights, so their leaves
 * carry weight 0.
 */
export interface HuffLeaf {
  readonly kind: 'leaf';
  readonly symbol: HuffSymbol;
  readonly weight: number;
}

/**
 * An internal node always owns exactly two children.
 */
export interface HuffInternal {
  readonly kind: 'internal';
  readonly weight: number;
  readonly left: HuffNode;
  readonly right: HuffNode;
}

export type HuffNode = HuffLeaf | HuffInternal;

export function leaf(symbol: HuffSymbol, weight: number = 0): HuffLeaf {
  return { kind: 'leaf', symbol, weight };
}

/**
 * Join two subtrees; the weight is the sum of the children's weights.
 */
export function internal(left: HuffNode, right: HuffNode): HuffInternal {
  return { kind: 'internal', weight: left.weight + right.weight, left, right };
}

/**
 * Number of leaves under (and including) a node.
 */
export function countLeaves(node: HuffNode): number {
  if (node.kind === 'leaf') return 1;
  return countLeaves(node.left) + countLeaves(node.right);
}

/**
 * Compare two trees by shape and leaf symbols, ignoring weights.
 */
export function sameShape(a: HuffNode, b: HuffNode): boolean {
  if (a.kind === 'leaf' || b.kind === 'leaf') {
    return a.kind === 'leaf' && b.kind === 'leaf' && a.symbol === b.symbol;
  }
  return sameShape(a.left, b.left) && sameShape(a.right, b.right);
}
