export {
  type PieceType,
  type VocabPiece,
  type AddedToken,
  type AssembledVocab,
  orderVocab,
  assembleVocab,
} from './assembler.js';
