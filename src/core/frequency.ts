import { BitInputStream, END_OF_DATA } from './bit-stream.js';
import { BITS_PER_WORD, PSEUDO_EOF, SYMBOL_COUNT } from './symbols.js';

/**
 * Occurrence count per symbol, indexed by symbol value.
 * Always SYMBOL_COUNT long, with the end-of-stream slot fixed at 1.
 * Counts are exact up to 2^53.
 */
export type FrequencyTable = Float64Array;

/**
 * Read 8-bit words from the current position until the stream is exhausted
 * and count each value.
 *
 * The end-of-stream slot is a sentinel and is set to 1 regardless of input.
 */
export function countFrequencies(input: BitInputStream): FrequencyTable {
  const counts = new Float64Array(SYMBOL_COUNT);

  while (true) {
    const value = input.readBits(BITS_PER_WORD);
    if (value === END_OF_DATA) break;
    counts[value]++;
  }

  counts[PSEUDO_EOF] = 1;
  return counts;
}

/**
 * Count the symbols of an in-memory buffer.
 */
export function countBytes(data: Uint8Array): FrequencyTable {
  return countFrequencies(new BitInputStream(data));
}

/**
 * Number of symbols with a non-zero count (the leaves the tree will have).
 */
export function distinctSymbols(counts: FrequencyTable): number {
  let distinct = 0;
  for (let i = 0; i < counts.length; i++) {
    if (counts[i] > 0) distinct++;
  }
  return distinct;
}
