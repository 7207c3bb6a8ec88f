/**
 * CharsMap construction and compilation into SentencePiece's
 * `precompiled_charsmap` blob.
 *
 * Blob layout:
 * [Trie size: 4 bytes, little-endian] (in bytes)
 * [Double-array trie: 4 bytes × unit count, little-endian]
 * [Normalized strings: UTF-8, each NUL-terminated]
 *
 * The trie maps each UTF-8 encoded source string to the byte offset of its
 * target inside the normalized strings region.
 */

import { CompileError } from '../errors.js';
import type { NormalizerSpec } from '../format/model-descriptor.js';
import { buildByteRemapTable, type RemapEntry } from './byte-remap.js';
import {
  buildDoubleArray,
  commonPrefixSearch,
  DoubleArrayBuildError,
} from './double-array.js';

/**
 * One substitution rule: a codepoint sequence and its replacement.
 */
export interface CharsMapEntry {
  source: readonly number[];
  target: readonly number[];
}

export type CharsMap = readonly CharsMapEntry[];

/**
 * A decoded precompiled charsmap.
 */
export interface PrecompiledCharsMap {
  trie: Uint32Array;
  normalized: Uint8Array;
}

const TRIE_SIZE_BYTES = 4;

const utf8 = new TextEncoder();

/**
 * Forward map: raw byte → substitute codepoint.
 */
export function buildForwardCharsMap(table: readonly RemapEntry[]): CharsMap {
  return table.map(({ byte, substitute }) => ({ source: [byte], target: [substitute] }));
}

/**
 * Inverse map: substitute codepoint → raw byte.
 */
export function buildInverseCharsMap(table: readonly RemapEntry[]): CharsMap {
  return table.map(({ byte, substitute }) => ({ source: [substitute], target: [byte] }));
}

function encodeCodepoints(codepoints: readonly number[], role: string): Uint8Array {
  for (const cp of codepoints) {
    if (!Number.isInteger(cp) || cp < 0 || cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) {
      throw new CompileError(`invalid codepoint ${cp} in ${role}`);
    }
    if (cp === 0) {
      throw new CompileError(`U+0000 is not allowed in ${role}`);
    }
  }
  return utf8.encode(String.fromCodePoint(...codepoints));
}

function formatCodepoints(codepoints: readonly number[]): string {
  return codepoints.map((cp) => `U+${cp.toString(16).toUpperCase().padStart(4, '0')}`).join(' ');
}

/**
 * Compare two byte strings the way `std::string` does.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

/**
 * Compile a CharsMap into a precompiled charsmap blob.
 *
 * @throws CompileError if the map is empty, a key is empty or repeated, or
 *   the trie cannot be built.
 */
export function compileCharsMap(charsMap: CharsMap): Uint8Array {
  if (charsMap.length === 0) {
    throw new CompileError('charsmap is empty');
  }

  const sources = new Set<string>();
  const targets = new Map<string, Uint8Array>();
  const pairs: Array<{ key: Uint8Array; target: string }> = [];

  for (const { source, target } of charsMap) {
    if (source.length === 0) {
      throw new CompileError('empty key');
    }
    const key = encodeCodepoints(source, 'key');
    const sourceId = String.fromCodePoint(...source);
    if (sources.has(sourceId)) {
      throw new CompileError(`duplicate key ${formatCodepoints(source)}`);
    }
    sources.add(sourceId);

    const value = encodeCodepoints(target, 'value');
    const targetId = String.fromCodePoint(...target);
    if (!targets.has(targetId)) {
      targets.set(targetId, value);
    }
    pairs.push({ key, target: targetId });
  }

  // Identical targets share one NUL-terminated slot.
  const sortedTargets = [...targets].sort(([, a], [, b]) => compareBytes(a, b));
  const positions = new Map<string, number>();
  let normalizedSize = 0;
  for (const [id, bytes] of sortedTargets) {
    positions.set(id, normalizedSize);
    normalizedSize += bytes.length + 1;
  }

  const normalized = new Uint8Array(normalizedSize);
  for (const [id, bytes] of sortedTargets) {
    normalized.set(bytes, positions.get(id) ?? 0);
  }

  pairs.sort((a, b) => compareBytes(a.key, b.key));
  const keys = pairs.map((p) => p.key);
  const values = pairs.map((p) => positions.get(p.target) ?? 0);

  let trie: Uint32Array;
  try {
    trie = buildDoubleArray(keys, values);
  } catch (error) {
    if (error instanceof DoubleArrayBuildError) {
      throw new CompileError(`cannot build double-array: ${error.message}`, { cause: error });
    }
    throw error;
  }

  for (const key of keys) {
    if (commonPrefixSearch(trie, key).length === 0) {
      throw new CompileError('no entry is found in the trie');
    }
  }

  return encodePrecompiledCharsMap(trie, normalized);
}

/**
 * Pack trie units and normalized strings into the blob layout.
 */
export function encodePrecompiledCharsMap(trie: Uint32Array, normalized: Uint8Array): Uint8Array {
  const trieBytes = trie.length * 4;
  const blob = new Uint8Array(TRIE_SIZE_BYTES + trieBytes + normalized.length);
  const view = new DataView(blob.buffer);

  view.setUint32(0, trieBytes, true);
  for (let i = 0; i < trie.length; i++) {
    view.setUint32(TRIE_SIZE_BYTES + i * 4, trie[i], true);
  }
  blob.set(normalized, TRIE_SIZE_BYTES + trieBytes);

  return blob;
}

/**
 * Split a precompiled charsmap blob back into trie and normalized strings.
 */
export function decodePrecompiledCharsMap(blob: Uint8Array): PrecompiledCharsMap {
  if (blob.length < TRIE_SIZE_BYTES) {
    throw new CompileError(
      `precompiled charsmap too short: expected at least ${TRIE_SIZE_BYTES} bytes, got ${blob.length}`
    );
  }

  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
  const trieBytes = view.getUint32(0, true);
  if (trieBytes % 4 !== 0 || TRIE_SIZE_BYTES + trieBytes > blob.length) {
    throw new CompileError(`invalid trie size ${trieBytes} for blob of ${blob.length} bytes`);
  }

  const trie = new Uint32Array(trieBytes / 4);
  for (let i = 0; i < trie.length; i++) {
    trie[i] = view.getUint32(TRIE_SIZE_BYTES + i * 4, true);
  }

  return {
    trie,
    normalized: blob.slice(TRIE_SIZE_BYTES + trieBytes),
  };
}

/**
 * Flags shared by the normalizer and denormalizer: substitution only, no
 * dummy prefix, no whitespace trimming or escaping.
 */
function byteSubstitutionSpec(charsMap: CharsMap): NormalizerSpec {
  return Object.freeze({
    precompiledCharsmap: compileCharsMap(charsMap),
    addDummyPrefix: false,
    removeExtraWhitespaces: false,
    escapeWhitespaces: false,
  });
}

/**
 * Normalizer spec mapping raw bytes to their visible substitutes.
 */
export function buildNormalizerSpec(): NormalizerSpec {
  return byteSubstitutionSpec(buildForwardCharsMap(buildByteRemapTable()));
}

/**
 * Denormalizer spec mapping visible substitutes back to raw bytes.
 */
export function buildDenormalizerSpec(): NormalizerSpec {
  return byteSubstitutionSpec(buildInverseCharsMap(buildByteRemapTable()));
}
