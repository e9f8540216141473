/**
 * Example: Compress and decompress text with the Huffman compressor.
 *
 * Usage:
 *   npx tsx examples/compress.ts
 *
 *   Or with custom text:
 *      npx tsx examples/compress.ts "Your text here"
 *
 *   Or with a file and code-table output:
 *      npx tsx examples/compress.ts --file ./README.md --debug 4
 */

import * as fs from 'fs';
import { HuffmanCompressor, DEBUG_LOW } from '../src/index.js';

interface Options {
  debugLevel: number;
  data: Uint8Array;
  label: string;
}

function parseArgs(): Options {
  const args = process.argv.slice(2);
  const text = `The quick brown fox jumps over the lazy dog.
This is a test of Huffman coding.
Frequent bytes get short codes, rare bytes get long ones,
and the tree travels in front of the body.`;
  const options: Options = {
    debugLevel: 0,
    data: new TextEncoder().encode(text),
    label: 'built-in text',
  };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--debug' && args[i + 1]) {
      options.debugLevel = parseInt(args[++i], 10);
    } else if (args[i] === '--file' && args[i + 1]) {
      const file = args[++i];
      options.data = new Uint8Array(fs.readFileSync(file));
      options.label = file;
    } else if (!args[i].startsWith('--')) {
      options.data = new TextEncoder().encode(args[i]);
      options.label = 'argument text';
    }
  }

  return options;
}

function main() {
  const options = parseArgs();

  console.log(`📝 Input: ${options.label} (${options.data.length} bytes)`);
  console.log();

  const compressor = new HuffmanCompressor({
    debugLevel: Math.max(options.debugLevel, DEBUG_LOW),
  });

  // Compress
  console.log('🗜️  Compressing...');
  const startCompress = performance.now();
  const result = compressor.compress(options.data);
  const compressTime = performance.now() - startCompress;
  console.log();

  console.log('📊 Compression results:');
  console.log(`  Original size:   ${result.originalSize} bytes`);
  console.log(`  Compressed size: ${result.compressedSize} bytes`);
  console.log(`  Compression ratio: ${result.compressionRatio.toFixed(2)}x`);
  console.log(`  Distinct symbols: ${result.symbolCount}`);
  console.log(`  Tree header: ${result.headerBits} bits`);
  console.log(`  Body: ${result.bodyBits} bits`);
  if (result.originalSize > 0) {
    console.log(`  Bits per byte: ${(result.bodyBits / result.originalSize).toFixed(2)}`);
  }
  console.log(`  Compression time: ${compressTime.toFixed(1)}ms`);
  console.log();

  const base64 = Buffer.from(result.data).toString('base64');
  console.log('🔤 Base64 encoded:');
  console.log('─'.repeat(50));
  console.log(base64.length > 200 ? base64.slice(0, 200) + '...' : base64);
  console.log('─'.repeat(50));
  console.log();

  // Decompress
  console.log('📤 Decompressing...');
  const startDecompress = performance.now();
  const decompressed = compressor.decompress(result.data);
  const decompressTime = performance.now() - startDecompress;
  console.log();

  // Verify
  const matches =
    decompressed.length === options.data.length &&
    decompressed.every((byte, i) => byte === options.data[i]);
  if (matches) {
    console.log('✅ Verification: PASSED (decompressed matches original)');
  } else {
    console.log('❌ Verification: FAILED (decompressed does not match original)');
    console.log('Original length:', options.data.length);
    console.log('Decompressed length:', decompressed.length);
    process.exitCode = 1;
  }

  console.log(`  Decompression time: ${decompressTime.toFixed(1)}ms`);
}

main();
