/**
 * Symbol space shared by the encoder and decoder.
 *
 * Literal bytes occupy 0..255; the end-of-stream marker sits one past the
 * largest literal, so header leaves need 9 bits.
 */

export const BITS_PER_WORD = 8;

export const BITS_PER_INT = 32;

/** Number of literal byte values. */
export const ALPH_SIZE = 1 << BITS_PER_WORD;

/** End-of-stream symbol. */
export const PSEUDO_EOF = ALPH_SIZE;

/** Number of symbol slots in a frequency table (literals + end-of-stream). */
export const SYMBOL_COUNT = ALPH_SIZE + 1;

/** Width of a leaf symbol in the serialized tree header. */
export const SYMBOL_BITS = BITS_PER_WORD + 1;

/** A literal byte value (0-255) or {@link PSEUDO_EOF}. */
export type HuffSymbol = number;

export function isLiteral(symbol: HuffSymbol): boolean {
  return Number.isInteger(symbol) && symbol >= 0 && symbol < ALPH_SIZE;
}

export function isValidSymbol(symbol: HuffSymbol): boolean {
  return isLiteral(symbol) || symbol === PSEUDO_EOF;
}
