import { describe, it, expect } from 'vitest';
import {
  HUFF_NUMBER,
  HUFF_TREE,
  MAGIC_SIZE,
  writeMagic,
  readMagic,
  isHuffFormat,
} from '../src/format/header.js';
import { writeTreeHeader, readTreeHeader, treeHeaderBits } from '../src/format/tree-header.js';
import { BitInputStream, BitOutputStream } from '../src/core/bit-stream.js';
import { internal, leaf, sameShape, type HuffNode } from '../src/core/huff-node.js';
import { buildTree } from '../src/core/tree-builder.js';
import { countBytes } from '../src/core/frequency.js';
import { PSEUDO_EOF } from '../src/core/symbols.js';
import { CorruptHeaderError, FormatError } from '../src/errors.js';

function serialize(root: HuffNode): Uint8Array {
  const out = new BitOutputStream();
  writeTreeHeader(root, out);
  out.close();
  return out.toUint8Array();
}

describe('Magic number', () => {
  it('should be the tree-header variant of the base number', () => {
    expect(HUFF_NUMBER).toBe(0xface8200);
    expect(HUFF_TREE).toBe(0xface8201);
    expect(MAGIC_SIZE).toBe(4);
  });

  it('should write four big-endian bytes', () => {
    const out = new BitOutputStream();
    writeMagic(out);

    expect(out.toUint8Array()).toEqual(new Uint8Array([0xfa, 0xce, 0x82, 0x01]));
  });

  it('should accept its own output', () => {
    const input = new BitInputStream(new Uint8Array([0xfa, 0xce, 0x82, 0x01, 0xff]));

    expect(() => readMagic(input)).not.toThrow();
    expect(input.position).toBe(32);
  });

  it('should throw FormatError carrying the value on mismatch', () => {
    const input = new BitInputStream(new Uint8Array([0xfa, 0xce, 0x82, 0x00, 0xff]));

    let caught: unknown;
    try {
      readMagic(input);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(FormatError);
    expect(caught instanceof FormatError && caught.value).toBe(0xface8200);
    expect(input.position).toBe(32);
  });

  it('should throw FormatError with -1 on a short stream', () => {
    const input = new BitInputStream(new Uint8Array([0xfa, 0xce]));

    expect(() => readMagic(input)).toThrow(FormatError);
    expect(() => readMagic(new BitInputStream(new Uint8Array(0)))).toThrow(
      'stream ends before the magic number'
    );
  });

  it('should detect the format from a buffer', () => {
    expect(isHuffFormat(new Uint8Array([0xfa, 0xce, 0x82, 0x01]))).toBe(true);
    expect(isHuffFormat(new Uint8Array([0xfa, 0xce, 0x82]))).toBe(false);
    expect(isHuffFormat(new Uint8Array([0x1f, 0x8b, 0x08, 0x00]))).toBe(false);
  });
});

describe('Tree header', () => {
  it('should serialize a single leaf as 1 + 9 bits', () => {
    const bytes = serialize(leaf(PSEUDO_EOF));

    // 1 100000000, padded
    expect(bytes).toEqual(new Uint8Array([0xc0, 0x00]));
    expect(treeHeaderBits(leaf(PSEUDO_EOF))).toBe(10);
  });

  it('should serialize in pre-order, left first', () => {
    // ((B, EOF), A)
    const root = internal(internal(leaf(66), leaf(PSEUDO_EOF)), leaf(65));
    const bytes = serialize(root);

    // 0 0 1001000010 1100000000 1001000001
    expect(bytes).toEqual(new Uint8Array([0x24, 0x2c, 0x02, 0x41]));
    expect(treeHeaderBits(root)).toBe(32);
  });

  it('should parse what it serializes', () => {
    const root = internal(leaf(PSEUDO_EOF), internal(leaf(0), leaf(255)));
    const parsed = readTreeHeader(new BitInputStream(serialize(root)));

    expect(sameShape(parsed, root)).toBe(true);
  });

  it('should roundtrip a tree built from real counts', () => {
    const data = new TextEncoder().encode('she sells sea shells by the sea shore');
    const root = buildTree(countBytes(data));
    const parsed = readTreeHeader(new BitInputStream(serialize(root)));

    expect(sameShape(parsed, root)).toBe(true);
  });

  it('should give parsed leaves weight 0', () => {
    const parsed = readTreeHeader(new BitInputStream(serialize(leaf(PSEUDO_EOF, 7))));

    expect(parsed).toEqual({ kind: 'leaf', symbol: PSEUDO_EOF, weight: 0 });
  });

  it('should stop reading at the end of the tree', () => {
    const out = new BitOutputStream();
    writeTreeHeader(internal(leaf(1), leaf(PSEUDO_EOF)), out);
    out.writeBits(0b101, 3);
    out.close();

    const input = new BitInputStream(out.toUint8Array());
    readTreeHeader(input);
    expect(input.position).toBe(21);
    expect(input.readBits(3)).toBe(0b101);
  });

  it('should throw CorruptHeaderError on an empty stream', () => {
    expect(() => readTreeHeader(new BitInputStream(new Uint8Array(0)))).toThrow(
      CorruptHeaderError
    );
  });

  it('should throw CorruptHeaderError when a leaf symbol is cut short', () => {
    // 0 0 1001000010 1100 -> second leaf needs 9 bits, only 3 remain
    const input = new BitInputStream(new Uint8Array([0x24, 0x2c]));

    expect(() => readTreeHeader(input)).toThrow('stream ends inside a leaf');
  });

  it('should throw CorruptHeaderError when subtrees are missing', () => {
    // All-zero bits describe internal nodes forever
    const input = new BitInputStream(new Uint8Array([0x00, 0x00]));

    expect(() => readTreeHeader(input)).toThrow(CorruptHeaderError);
  });

  it('should reject a long run of internal-node bits', () => {
    const input = new BitInputStream(new Uint8Array(200_000));

    expect(() => readTreeHeader(input)).toThrow(CorruptHeaderError);
    expect(() => readTreeHeader(new BitInputStream(new Uint8Array(200_000)))).toThrow(
      'tree deeper than 256 levels'
    );
  });

  it('should parse a chain tree whose deepest leaves sit at depth 256', () => {
    let root: HuffNode = internal(leaf(255), leaf(PSEUDO_EOF));
    for (let symbol = 254; symbol >= 0; symbol--) {
      root = internal(leaf(symbol), root);
    }
    const parsed = readTreeHeader(new BitInputStream(serialize(root)));

    expect(sameShape(parsed, root)).toBe(true);
  });

  it('should reject symbols above end-of-stream', () => {
    const out = new BitOutputStream();
    out.writeBit(0);
    out.writeBit(1);
    out.writeBits(300, 9);
    out.writeBit(1);
    out.writeBits(PSEUDO_EOF, 9);
    out.close();

    expect(() => readTreeHeader(new BitInputStream(out.toUint8Array()))).toThrow(
      'leaf symbol 300 is out of range'
    );
  });

  it('should reject a lone literal leaf', () => {
    expect(() => readTreeHeader(new BitInputStream(serialize(leaf(65))))).toThrow(
      CorruptHeaderError
    );
  });
});
