/**
 * Sentinel returned by {@link BitInputStream} reads when the requested bits
 * are not available.
 */
export const END_OF_DATA = -1;

/**
 * Bit-level output stream.
 * Accumulates bits MSB first and outputs bytes when full.
 */
export class BitOutputStream {
  private buffer: number[] = [];
  private currentByte: number = 0;
  private bitPosition: number = 0;
  private closed: boolean = false;

  /**
   * Write a single bit to the stream.
   * @param bit - 0 or 1
   */
  writeBit(bit: number): void {
    if (this.closed) {
      throw new Error('Cannot write to a closed BitOutputStream');
    }

    this.currentByte = (this.currentByte << 1) | (bit & 1);
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Write the low `count` bits of a number (MSB first).
   * @param value - The value containing the bits
   * @param count - Number of bits to write (1-32)
   */
  writeBits(value: number, count: number): void {
    for (let i = count - 1; i >= 0; i--) {
      this.writeBit((value >>> i) & 1);
    }
  }

  /**
   * Flush any remaining bits, padding with zeros.
   */
  flush(): void {
    if (this.bitPosition > 0) {
      this.currentByte <<= 8 - this.bitPosition;
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Flush and refuse further writes. Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.flush();
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Get the current byte count (before flush).
   */
  get byteCount(): number {
    return this.buffer.length;
  }

  /**
   * Get the total bit count written.
   */
  get bitCount(): number {
    return this.buffer.length * 8 + this.bitPosition;
  }

  /**
   * Convert the stream to a Uint8Array.
   * Call flush() or close() first if you want to include partial bytes.
   */
  toUint8Array(): Uint8Array {
    return new Uint8Array(this.buffer);
  }

  /**
   * Extract accumulated bytes and reset buffer.
   */
  extractBytes(): Uint8Array {
    const result = new Uint8Array(this.buffer);
    this.buffer = [];
    return result;
  }
}

/**
 * Bit-level input stream over a Uint8Array.
 * Reads past the end yield {@link END_OF_DATA} instead of padding.
 */
export class BitInputStream {
  private data: Uint8Array;
  private bytePosition: number = 0;
  private bitPosition: number = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  /**
   * Read a single bit from the stream, or END_OF_DATA when exhausted.
   */
  readBit(): number {
    if (this.bytePosition >= this.data.length) {
      return END_OF_DATA;
    }

    const bit = (this.data[this.bytePosition] >>> (7 - this.bitPosition)) & 1;
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.bytePosition++;
      this.bitPosition = 0;
    }

    return bit;
  }

  /**
   * Read multiple bits as an unsigned number (MSB first).
   * Nothing is consumed when fewer than `count` bits remain.
   * @param count - Number of bits to read (1-32)
   */
  readBits(count: number): number {
    if (this.remaining < count) {
      return END_OF_DATA;
    }

    let value = 0;
    for (let i = 0; i < count; i++) {
      value = (value << 1) | this.readBit();
    }
    return value >>> 0;
  }

  /**
   * Rewind to the first bit.
   */
  reset(): void {
    this.bytePosition = 0;
    this.bitPosition = 0;
  }

  /**
   * Check if we've reached the end of the data.
   */
  get isAtEnd(): boolean {
    return this.bytePosition >= this.data.length;
  }

  /**
   * Get current position in bits.
   */
  get position(): number {
    return this.bytePosition * 8 + this.bitPosition;
  }

  /**
   * Get total size in bits.
   */
  get size(): number {
    return this.data.length * 8;
  }

  get remaining(): number {
    return this.size - this.position;
  }
}
