import { MinPriorityQueue } from './priority-queue.js';
import { internal, leaf, type HuffNode } from './huff-node.js';
import type { FrequencyTable } from './frequency.js';

/**
 * Build a Huffman tree by repeatedly merging the two lightest nodes.
 *
 * Leaves are created for every symbol with a non-zero count, in ascending
 * symbol order. The first node removed becomes the left child, the second
 * the right. With a single non-zero symbol the leaf itself is the root.
 *
 * @throws Error if every count is zero (a frequency table from
 *         countFrequencies always has the end-of-stream slot set)
 */
export function buildTree(counts: FrequencyTable): HuffNode {
  const queue = new MinPriorityQueue<HuffNode>();

  for (let symbol = 0; symbol < counts.length; symbol++) {
    if (counts[symbol] > 0) {
      queue.push(leaf(symbol, counts[symbol]), counts[symbol]);
    }
  }

  while (queue.length > 1) {
    const left = queue.pop();
    const right = queue.pop();
    if (left === undefined || right === undefined) break;

    const parent = internal(left, right);
    queue.push(parent, parent.weight);
  }

  const root = queue.pop();
  if (root === undefined) {
    throw new Error('Cannot build a tree from an empty frequency table');
  }
  return root;
}
