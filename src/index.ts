/**
 * spm-convert
 *
 * Converts a Hugging Face byte-level BPE tokenizer into a SentencePiece model.
 *
 * @example
 * ```typescript
 * import { convertHfTokenizer } from 'spm-convert';
 *
 * const result = await convertHfTokenizer('./gpt2', './out/gpt2.model');
 * console.log(`Wrote ${result.vocabSize} pieces (${result.byteLength} bytes)`);
 * ```
 */

// Main converter
export {
  TokenizerConverter,
  convertHfTokenizer,
  buildModelFromDocuments,
  type ConverterOptions,
  type ConversionResult,
  type ProgressInfo,
  type ModelBuild,
  type BuildHooks,
} from './converter.js';

// Errors
export {
  ConversionError,
  IOError,
  ParseError,
  SchemaError,
  CompileError,
  isConversionError,
  type ConversionErrorKind,
} from './errors.js';

// Input documents
export {
  type TokenizerDocuments,
  TOKENIZER_CONFIG_FILE,
  TOKENIZER_FILE,
  parseTokenizerConfig,
  parseTokenizer,
  readJsonDocument,
  loadTokenizerDocuments,
} from './config/index.js';

// Normalization tables (for advanced usage)
export {
  type ByteRange,
  type RemapEntry,
  type CharsMap,
  type CharsMapEntry,
  type PrecompiledCharsMap,
  PRINTABLE_RANGES,
  isPrintableByte,
  buildByteRemapTable,
  buildForwardCharsMap,
  buildInverseCharsMap,
  compileCharsMap,
  decodePrecompiledCharsMap,
  buildNormalizerSpec,
  buildDenormalizerSpec,
  applyCharsMap,
  normalizeText,
} from './normalizer/index.js';

// Vocabulary
export {
  type PieceType,
  type VocabPiece,
  type AddedToken,
  type AssembledVocab,
  orderVocab,
  assembleVocab,
} from './vocab/index.js';

// Model format
export {
  type NormalizerSpec,
  type TrainerSpec,
  type ModelDescriptor,
  type ModelParts,
  buildModelDescriptor,
  serializeModel,
  parseModel,
} from './format/index.js';

// File output
export { writeFileAtomic } from './io/write-file.js';

export { verifyModel } from './verify.js';
