export {
  type ByteRange,
  type RemapEntry,
  PRINTABLE_RANGES,
  SUBSTITUTE_BASE,
  isPrintableByte,
  buildByteRemapTable,
} from './byte-remap.js';
export {
  type CharsMap,
  type CharsMapEntry,
  type PrecompiledCharsMap,
  buildForwardCharsMap,
  buildInverseCharsMap,
  compileCharsMap,
  encodePrecompiledCharsMap,
  decodePrecompiledCharsMap,
  buildNormalizerSpec,
  buildDenormalizerSpec,
} from './chars-map.js';
export {
  type TrieMatch,
  DoubleArrayBuilder,
  DoubleArrayBuildError,
  buildDoubleArray,
  commonPrefixSearch,
  exactMatchSearch,
} from './double-array.js';
export { applyCharsMap, normalizeText } from './apply.js';
