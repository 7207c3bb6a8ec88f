import { TOKENIZER_FILE } from '../config/documents.js';
import { SchemaError } from '../errors.js';

/**
 * SentencePiece piece types produced by the converter.
 */
export type PieceType = 'NORMAL' | 'UNKNOWN' | 'USER_DEFINED';

/**
 * One entry of the SentencePiece vocabulary.
 */
export interface VocabPiece {
  piece: string;
  type: PieceType;
  score: number;
}

/**
 * Fields of a `tokenizer.json` added token the assembler reads.
 */
export interface AddedToken {
  content: string;
  normalized: boolean;
}

/**
 * Assembled vocabulary and bookkeeping about how it was built.
 */
export interface AssembledVocab {
  pieces: readonly VocabPiece[];

  /** Number of pieces taken from `model.vocab` */
  normalPieceCount: number;

  /** Id of the UNKNOWN piece, or -1 when the unknown token is not in the vocab */
  unknownPieceId: number;

  /** Added tokens left out because they are not normalized */
  skippedAddedTokens: readonly AddedToken[];
}

const VOCAB_CONTEXT = { file: TOKENIZER_FILE, field: 'model.vocab' } as const;

/**
 * Score for the piece at `rank`. Ranks start at 0, which must stay +0.
 */
function scoreForRank(rank: number): number {
  return rank === 0 ? 0 : -rank;
}

/**
 * Lay out vocabulary tokens by id.
 *
 * @throws SchemaError if the ids are not exactly `0..N-1`.
 */
export function orderVocab(vocab: Readonly<Record<string, number>>): string[] {
  const entries = Object.entries(vocab);
  const size = entries.length;
  const ordered: Array<string | undefined> = new Array<string | undefined>(size).fill(undefined);

  for (const [token, id] of entries) {
    if (!Number.isInteger(id) || id < 0 || id >= size) {
      throw new SchemaError(
        `field "model.vocab": id ${id} of token ${JSON.stringify(token)} is outside [0, ${size})`,
        VOCAB_CONTEXT
      );
    }
    const existing = ordered[id];
    if (existing !== undefined) {
      throw new SchemaError(
        `field "model.vocab": id ${id} is assigned to both ${JSON.stringify(existing)} and ${JSON.stringify(token)}`,
        VOCAB_CONTEXT
      );
    }
    ordered[id] = token;
  }

  const tokens: string[] = [];
  for (let id = 0; id < size; id++) {
    const token = ordered[id];
    if (token === undefined) {
      throw new SchemaError(`field "model.vocab": no token has id ${id}`, VOCAB_CONTEXT);
    }
    tokens.push(token);
  }

  return tokens;
}

/**
 * Build the scored piece list from the vocabulary and added tokens.
 *
 * Vocabulary pieces are scored by id. A normalized added token at list index
 * `j` is scored `-(N + j)`; non-normalized added tokens are dropped but still
 * consume their index, so scores follow positions in `added_tokens`.
 * An unknown token missing from the vocabulary leaves no piece marked UNKNOWN.
 */
export function assembleVocab(
  vocab: Readonly<Record<string, number>>,
  unkToken: string,
  addedTokens: readonly AddedToken[] = []
): AssembledVocab {
  const tokens = orderVocab(vocab);
  const pieces: VocabPiece[] = [];
  let unknownPieceId = -1;

  for (let i = 0; i < tokens.length; i++) {
    const isUnknown = tokens[i] === unkToken;
    if (isUnknown) {
      unknownPieceId = i;
    }
    const piece: VocabPiece = {
      piece: tokens[i],
      type: isUnknown ? 'UNKNOWN' : 'NORMAL',
      score: scoreForRank(i),
    };
    pieces.push(Object.freeze(piece));
  }

  const skippedAddedTokens: AddedToken[] = [];
  for (let j = 0; j < addedTokens.length; j++) {
    const token = addedTokens[j];
    if (!token.normalized) {
      skippedAddedTokens.push(token);
      continue;
    }
    const piece: VocabPiece = {
      piece: token.content,
      type: 'USER_DEFINED',
      score: scoreForRank(tokens.length + j),
    };
    pieces.push(Object.freeze(piece));
  }

  return {
    pieces: Object.freeze(pieces),
    normalPieceCount: tokens.length,
    unknownPieceId,
    skippedAddedTokens: Object.freeze(skippedAddedTokens),
  };
}
