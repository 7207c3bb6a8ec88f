/**
 * SentencePiece model descriptor.
 *
 * The descriptor is assembled once from finished parts and frozen; nothing
 * downstream sees a partially populated model.
 */

import type { VocabPiece } from '../vocab/assembler.js';

/**
 * Compiled normalization table plus its text-processing flags.
 */
export interface NormalizerSpec {
  /** Precompiled charsmap blob (trie + normalized strings) */
  precompiledCharsmap: Uint8Array;

  /** Prepend a whitespace before the text */
  addDummyPrefix: boolean;

  /** Collapse and trim whitespace */
  removeExtraWhitespaces: boolean;

  /** Replace whitespace with U+2581 */
  escapeWhitespaces: boolean;
}

export type ModelType = 'UNIGRAM' | 'BPE' | 'WORD' | 'CHAR';

/**
 * Training metadata recorded in the model.
 */
export interface TrainerSpec {
  modelType: ModelType;
  vocabSize: number;
}

/**
 * Complete SentencePiece model.
 */
export interface ModelDescriptor {
  pieces: readonly VocabPiece[];
  trainerSpec: TrainerSpec;
  normalizerSpec: NormalizerSpec;
  denormalizerSpec: NormalizerSpec;
}

/**
 * Parts the converter assembles a model from.
 */
export interface ModelParts {
  normalizerSpec: NormalizerSpec;
  denormalizerSpec: NormalizerSpec;
  pieces: readonly VocabPiece[];
}

/**
 * Build a BPE model descriptor. The vocab size is taken from the final piece
 * list, added tokens included.
 */
export function buildModelDescriptor(parts: ModelParts): ModelDescriptor {
  return Object.freeze({
    pieces: parts.pieces,
    trainerSpec: Object.freeze({
      modelType: 'BPE',
      vocabSize: parts.pieces.length,
    } satisfies TrainerSpec),
    normalizerSpec: parts.normalizerSpec,
    denormalizerSpec: parts.denormalizerSpec,
  });
}
