/**
 * Base class for errors raised while reading a compressed stream.
 */
export class HuffError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HuffError';
  }
}

/**
 * The stream does not start with the expected magic number.
 * `value` is the raw 32-bit value read, or -1 when the stream ended first.
 */
export class FormatError extends HuffError {
  constructor(readonly value: number) {
    super(
      value === -1
        ? 'Invalid file format: stream ends before the magic number'
        : `Invalid file format: illegal header starts with 0x${value.toString(16).padStart(8, '0')}`
    );
    this.name = 'FormatError';
  }
}

/**
 * The serialized tree is truncated or describes an impossible tree.
 */
export class CorruptHeaderError extends HuffError {
  constructor(message: string) {
    super(`Corrupt tree header: ${message}`);
    this.name = 'CorruptHeaderError';
  }
}

/**
 * The body ran out of bits before the end-of-stream code.
 */
export class TruncatedStreamError extends HuffError {
  constructor(readonly symbolsDecoded: number) {
    super(
      `Truncated stream: no end-of-stream code after ${symbolsDecoded} decoded bytes`
    );
    this.name = 'TruncatedStreamError';
  }
}
