import { describe, it, expect } from 'vitest';
import { BitOutputStream, BitInputStream, END_OF_DATA } from '../src/core/bit-stream.js';

describe('BitOutputStream', () => {
  it('should write and flush single bits correctly', () => {
    const stream = new BitOutputStream();

    // Write 8 bits: 10110100
    for (const bit of [1, 0, 1, 1, 0, 1, 0, 0]) {
      stream.writeBit(bit);
    }

    const result = stream.toUint8Array();
    expect(result.length).toBe(1);
    expect(result[0]).toBe(0b10110100);
  });

  it('should pad partial bytes with zeros on close', () => {
    const stream = new BitOutputStream();

    // Write 5 bits: 10110
    stream.writeBits(0b10110, 5);
    stream.close();

    const result = stream.toUint8Array();
    expect(result.length).toBe(1);
    expect(result[0]).toBe(0b10110000);
  });

  it('should write multiple bits at once', () => {
    const stream = new BitOutputStream();
    stream.writeBits(0b11010, 5);
    stream.writeBits(0b101, 3);

    const result = stream.toUint8Array();
    expect(result.length).toBe(1);
    expect(result[0]).toBe(0b11010101);
  });

  it('should write only the low bits of a value', () => {
    const stream = new BitOutputStream();
    stream.writeBits(0x1ff, 4);
    stream.writeBits(0, 4);

    expect(stream.toUint8Array()).toEqual(new Uint8Array([0xf0]));
  });

  it('should write a full 32-bit value', () => {
    const stream = new BitOutputStream();
    stream.writeBits(0xface8201, 32);

    expect(stream.toUint8Array()).toEqual(new Uint8Array([0xfa, 0xce, 0x82, 0x01]));
  });

  it('should track bit count correctly', () => {
    const stream = new BitOutputStream();
    stream.writeBits(0b101, 3);

    expect(stream.bitCount).toBe(3);
    expect(stream.byteCount).toBe(0);

    stream.writeBits(0, 5);
    expect(stream.bitCount).toBe(8);
    expect(stream.byteCount).toBe(1);
  });

  it('should refuse writes after close', () => {
    const stream = new BitOutputStream();
    stream.writeBit(1);
    stream.close();
    stream.close();

    expect(stream.isClosed).toBe(true);
    expect(stream.toUint8Array()).toEqual(new Uint8Array([0x80]));
    expect(() => stream.writeBit(1)).toThrow('closed');
  });

  it('should extract bytes and reset the buffer', () => {
    const stream = new BitOutputStream();
    stream.writeBits(0xab, 8);

    expect(stream.extractBytes()).toEqual(new Uint8Array([0xab]));
    expect(stream.byteCount).toBe(0);
  });
});

describe('BitInputStream', () => {
  it('should read single bits correctly', () => {
    const stream = new BitInputStream(new Uint8Array([0b10110100]));

    const bits: number[] = [];
    for (let i = 0; i < 8; i++) {
      bits.push(stream.readBit());
    }
    expect(bits).toEqual([1, 0, 1, 1, 0, 1, 0, 0]);
  });

  it('should return END_OF_DATA past the end', () => {
    const stream = new BitInputStream(new Uint8Array([0xff]));

    expect(stream.readBits(8)).toBe(0xff);
    expect(stream.readBit()).toBe(END_OF_DATA);
    expect(stream.readBits(1)).toBe(END_OF_DATA);
    expect(stream.isAtEnd).toBe(true);
  });

  it('should not consume bits when a read cannot be satisfied', () => {
    const stream = new BitInputStream(new Uint8Array([0b11010101]));

    expect(stream.readBits(5)).toBe(0b11010);
    expect(stream.readBits(9)).toBe(END_OF_DATA);
    expect(stream.position).toBe(5);
    expect(stream.readBits(3)).toBe(0b101);
  });

  it('should read a 32-bit value as unsigned', () => {
    const stream = new BitInputStream(new Uint8Array([0xfa, 0xce, 0x82, 0x01]));

    expect(stream.readBits(32)).toBe(0xface8201);
  });

  it('should rewind on reset', () => {
    const stream = new BitInputStream(new Uint8Array([0x41, 0x42]));

    expect(stream.readBits(8)).toBe(0x41);
    expect(stream.readBits(8)).toBe(0x42);
    stream.reset();
    expect(stream.position).toBe(0);
    expect(stream.readBits(8)).toBe(0x41);
  });

  it('should track position correctly', () => {
    const stream = new BitInputStream(new Uint8Array([0xff, 0x00]));

    expect(stream.position).toBe(0);
    expect(stream.size).toBe(16);

    stream.readBit();
    expect(stream.position).toBe(1);
    expect(stream.remaining).toBe(15);

    stream.readBits(7);
    expect(stream.position).toBe(8);
  });

  it('should report END_OF_DATA on an empty buffer', () => {
    const stream = new BitInputStream(new Uint8Array(0));

    expect(stream.readBits(8)).toBe(END_OF_DATA);
    expect(stream.isAtEnd).toBe(true);
  });
});

describe('BitStream roundtrip', () => {
  it('should preserve data through write/read cycle', () => {
    const outStream = new BitOutputStream();
    const testData = [1, 0, 1, 1, 0, 0, 1, 0, 1, 1, 1, 0];

    for (const bit of testData) {
      outStream.writeBit(bit);
    }
    outStream.close();

    const inStream = new BitInputStream(outStream.toUint8Array());
    const result: number[] = [];

    for (let i = 0; i < testData.length; i++) {
      result.push(inStream.readBit());
    }

    expect(result).toEqual(testData);
    // Four padding bits remain
    expect(inStream.remaining).toBe(4);
  });

  it('should mix field widths', () => {
    const outStream = new BitOutputStream();
    outStream.writeBits(1, 1);
    outStream.writeBits(256, 9);
    outStream.writeBits(0x2a, 8);
    outStream.close();

    const inStream = new BitInputStream(outStream.toUint8Array());
    expect(inStream.readBits(1)).toBe(1);
    expect(inStream.readBits(9)).toBe(256);
    expect(inStream.readBits(8)).toBe(0x2a);
  });
});
