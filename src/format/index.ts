export {
  HUFF_NUMBER,
  HUFF_TREE,
  MAGIC_SIZE,
  writeMagic,
  readMagic,
  isHuffFormat,
} from './header.js';

export {
  writeTreeHeader,
  readTreeHeader,
  treeHeaderBits,
} from './tree-header.js';
