import type { ModelDescriptor, NormalizerSpec } from './format/model-descriptor.js';
import { normalizeText } from './normalizer/apply.js';
import { buildByteRemapTable } from './normalizer/byte-remap.js';
import { decodePrecompiledCharsMap } from './normalizer/chars-map.js';

function checkFlags(name: string, spec: NormalizerSpec, problems: string[]): void {
  if (spec.addDummyPrefix || spec.removeExtraWhitespaces || spec.escapeWhitespaces) {
    problems.push(`${name} must not add a dummy prefix or touch whitespace`);
  }
}

/**
 * Check a converted model against the converter's invariants.
 *
 * @returns A list of problems; empty when the model is consistent.
 */
export function verifyModel(model: ModelDescriptor): string[] {
  const problems: string[] = [];

  if (model.trainerSpec.modelType !== 'BPE') {
    problems.push(`model type is ${model.trainerSpec.modelType}, expected BPE`);
  }
  if (model.trainerSpec.vocabSize !== model.pieces.length) {
    problems.push(
      `vocab size ${model.trainerSpec.vocabSize} does not match ${model.pieces.length} pieces`
    );
  }

  for (let i = 1; i < model.pieces.length; i++) {
    if (!(model.pieces[i].score < model.pieces[i - 1].score)) {
      problems.push(`score of piece ${i} is not below the score of piece ${i - 1}`);
      break;
    }
  }

  const unknownCount = model.pieces.filter((p) => p.type === 'UNKNOWN').length;
  if (unknownCount > 1) {
    problems.push(`${unknownCount} pieces are marked UNKNOWN`);
  }

  checkFlags('normalizer', model.normalizerSpec, problems);
  checkFlags('denormalizer', model.denormalizerSpec, problems);

  const forward = decodePrecompiledCharsMap(model.normalizerSpec.precompiledCharsmap);
  const inverse = decodePrecompiledCharsMap(model.denormalizerSpec.precompiledCharsmap);
  for (const { byte, substitute } of buildByteRemapTable()) {
    const raw = String.fromCodePoint(byte);
    const visible = normalizeText(forward, raw);
    if (visible !== String.fromCodePoint(substitute)) {
      problems.push(`byte ${byte} does not normalize to U+${substitute.toString(16)}`);
    } else if (normalizeText(inverse, visible) !== raw) {
      problems.push(`U+${substitute.toString(16)} does not denormalize to byte ${byte}`);
    }
  }

  return problems;
}
