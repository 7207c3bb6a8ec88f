import { describe, it, expect } from 'vitest';
import { CompileError } from '../src/errors.js';
import { buildByteRemapTable } from '../src/normalizer/byte-remap.js';
import {
  buildForwardCharsMap,
  buildInverseCharsMap,
  compileCharsMap,
  decodePrecompiledCharsMap,
  encodePrecompiledCharsMap,
  buildNormalizerSpec,
  buildDenormalizerSpec,
} from '../src/normalizer/chars-map.js';
import { exactMatchSearch } from '../src/normalizer/double-array.js';
import { normalizeText, applyCharsMap } from '../src/normalizer/apply.js';

describe('CharsMap construction', () => {
  it('should build forward and inverse maps from the remap table', () => {
    const table = buildByteRemapTable();
    const forward = buildForwardCharsMap(table);
    const inverse = buildInverseCharsMap(table);

    expect(forward.length).toBe(67);
    expect(forward[0]).toEqual({ source: [1], target: [257] });
    expect(inverse[0]).toEqual({ source: [257], target: [1] });

    forward.forEach((entry, i) => {
      expect(inverse[i].source).toEqual(entry.target);
      expect(inverse[i].target).toEqual(entry.source);
    });
  });
});

describe('compileCharsMap', () => {
  it('should lay out trie size, trie and normalized strings', () => {
    const blob = compileCharsMap([{ source: [0x41], target: [0x42] }]);
    const { trie, normalized } = decodePrecompiledCharsMap(blob);

    const trieBytes = new DataView(blob.buffer, blob.byteOffset).getUint32(0, true);
    expect(trieBytes).toBe(trie.length * 4);
    expect(blob.length).toBe(4 + trieBytes + 2);
    expect(Array.from(normalized)).toEqual([0x42, 0]);
    expect(exactMatchSearch(trie, new Uint8Array([0x41]))).toBe(0);
  });

  it('should store each distinct target once', () => {
    const { normalized } = decodePrecompiledCharsMap(
      compileCharsMap([
        { source: [0x61], target: [0x78] },
        { source: [0x62], target: [0x78] },
      ])
    );
    expect(Array.from(normalized)).toEqual([0x78, 0]);
  });

  it('should sort targets bytewise and point keys at them', () => {
    const { trie, normalized } = decodePrecompiledCharsMap(
      compileCharsMap([
        { source: [0x61], target: [0x7a] },
        { source: [0x62], target: [0x79] },
      ])
    );

    expect(Array.from(normalized)).toEqual([0x79, 0, 0x7a, 0]);
    expect(exactMatchSearch(trie, new Uint8Array([0x61]))).toBe(2);
    expect(exactMatchSearch(trie, new Uint8Array([0x62]))).toBe(0);
  });

  it('should be deterministic', () => {
    const forward = buildForwardCharsMap(buildByteRemapTable());
    expect(compileCharsMap(forward)).toEqual(compileCharsMap(forward));
  });

  it('should reject an empty map', () => {
    expect(() => compileCharsMap([])).toThrow(CompileError);
  });

  it('should reject an empty key', () => {
    expect(() => compileCharsMap([{ source: [], target: [0x41] }])).toThrow('empty key');
  });

  it('should reject duplicate keys', () => {
    expect(() =>
      compileCharsMap([
        { source: [0x41], target: [0x42] },
        { source: [0x41], target: [0x43] },
      ])
    ).toThrow('duplicate key U+0041');
  });

  it('should reject U+0000', () => {
    expect(() => compileCharsMap([{ source: [0], target: [0x41] }])).toThrow(
      'U+0000 is not allowed in key'
    );
  });

  it('should reject invalid codepoints', () => {
    expect(() => compileCharsMap([{ source: [0xd800], target: [0x41] }])).toThrow(
      'invalid codepoint 55296 in key'
    );
    expect(() => compileCharsMap([{ source: [0x41], target: [0x110000] }])).toThrow(
      'invalid codepoint 1114112 in value'
    );
  });

  it('should report compile failures as internal errors', () => {
    let caught: unknown;
    try {
      compileCharsMap([]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CompileError);
    expect(caught).toMatchObject({
      kind: 'compile',
      message: 'Internal error while compiling charsmap: charsmap is empty',
    });
  });
});

describe('decodePrecompiledCharsMap', () => {
  it('should reject truncated blobs', () => {
    expect(() => decodePrecompiledCharsMap(new Uint8Array(2))).toThrow('too short');
    expect(() => decodePrecompiledCharsMap(new Uint8Array([8, 0, 0, 0, 1, 2]))).toThrow(
      'invalid trie size 8'
    );
  });

  it('should invert encodePrecompiledCharsMap', () => {
    const trie = Uint32Array.from([1, 0x80000000, 0xdeadbeef]);
    const normalized = new Uint8Array([0x61, 0]);
    const decoded = decodePrecompiledCharsMap(encodePrecompiledCharsMap(trie, normalized));

    expect(Array.from(decoded.trie)).toEqual([1, 0x80000000, 0xdeadbeef]);
    expect(Array.from(decoded.normalized)).toEqual([0x61, 0]);
  });
});

describe('Normalizer specs', () => {
  it('should disable dummy prefix and whitespace handling', () => {
    for (const spec of [buildNormalizerSpec(), buildDenormalizerSpec()]) {
      expect(spec.addDummyPrefix).toBe(false);
      expect(spec.removeExtraWhitespaces).toBe(false);
      expect(spec.escapeWhitespaces).toBe(false);
      expect(spec.precompiledCharsmap.length).toBeGreaterThan(4);
    }
  });

  it('should round trip every non-printable byte through the compiled tables', () => {
    const forward = decodePrecompiledCharsMap(buildNormalizerSpec().precompiledCharsmap);
    const inverse = decodePrecompiledCharsMap(buildDenormalizerSpec().precompiledCharsmap);

    for (const { byte, substitute } of buildByteRemapTable()) {
      const raw = String.fromCodePoint(byte);
      const visible = normalizeText(forward, raw);
      expect(visible).toBe(String.fromCodePoint(substitute));
      expect(normalizeText(inverse, visible)).toBe(raw);
    }
  });

  it('should rewrite whitespace inside text and restore it', () => {
    const forward = decodePrecompiledCharsMap(buildNormalizerSpec().precompiledCharsmap);
    const inverse = decodePrecompiledCharsMap(buildDenormalizerSpec().precompiledCharsmap);

    const text = 'a\tb\nc d';
    const visible = normalizeText(forward, text);

    expect(visible).toBe('a\u0109b\u010ac\u0120d');
    expect(normalizeText(inverse, visible)).toBe(text);
  });

  it('should leave printable text untouched', () => {
    const forward = decodePrecompiledCharsMap(buildNormalizerSpec().precompiledCharsmap);

    expect(normalizeText(forward, 'Hello!')).toBe('Hello!');
    expect(normalizeText(forward, 'caf\u00e9 \u00a1\u00ff')).toBe('caf\u00e9\u0120\u00a1\u00ff');
    expect(normalizeText(forward, '\u00a0\u00ad')).toBe('\u0142\u0143');
  });

  it('should copy bytes without a rule', () => {
    const forward = decodePrecompiledCharsMap(buildNormalizerSpec().precompiledCharsmap);
    const input = new Uint8Array([0xe4, 0xb8, 0x96, 0x01]);

    expect(Array.from(applyCharsMap(forward, input))).toEqual([0xe4, 0xb8, 0x96, 0xc4, 0x81]);
  });
});
