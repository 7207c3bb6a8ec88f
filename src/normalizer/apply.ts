import { CompileError } from '../errors.js';
import { commonPrefixSearch } from './double-array.js';
import type { PrecompiledCharsMap } from './chars-map.js';

/**
 * Number of bytes in the UTF-8 sequence starting with `lead`.
 * Malformed lead bytes count as a single byte.
 */
function utf8SequenceLength(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead >= 0xc0 && lead < 0xe0) return 2;
  if (lead >= 0xe0 && lead < 0xf0) return 3;
  if (lead >= 0xf0 && lead < 0xf8) return 4;
  return 1;
}

function readNormalized(normalized: Uint8Array, offset: number): Uint8Array {
  if (offset >= normalized.length) {
    throw new CompileError(`normalized string offset ${offset} out of range`);
  }
  let end = offset;
  while (end < normalized.length && normalized[end] !== 0) {
    end++;
  }
  return normalized.subarray(offset, end);
}

/**
 * Apply a precompiled charsmap to UTF-8 input.
 *
 * At each position the longest matching key is replaced by its target;
 * anything unmatched is copied one UTF-8 character at a time.
 */
export function applyCharsMap(charsMap: PrecompiledCharsMap, input: Uint8Array): Uint8Array {
  const output: number[] = [];

  let pos = 0;
  while (pos < input.length) {
    const matches = commonPrefixSearch(charsMap.trie, input, pos);
    if (matches.length > 0) {
      // Matches come shortest first.
      const longest = matches[matches.length - 1];
      output.push(...readNormalized(charsMap.normalized, longest.value));
      pos += longest.length;
    } else {
      const end = Math.min(pos + utf8SequenceLength(input[pos]), input.length);
      for (; pos < end; pos++) {
        output.push(input[pos]);
      }
    }
  }

  return new Uint8Array(output);
}

/**
 * String form of {@link applyCharsMap}.
 */
export function normalizeText(charsMap: PrecompiledCharsMap, text: string): string {
  const bytes = applyCharsMap(charsMap, new TextEncoder().encode(text));
  return new TextDecoder().decode(bytes);
}
