/**
 * Byte remapping for GPT-2/GPT-NeoX style byte-level BPE vocabularies.
 *
 * Byte-level vocabularies store every byte as a printable character: bytes in
 * the printable ranges stand for themselves and every other byte is shifted
 * to a codepoint above 256. The remap table built here lists the shifted
 * bytes so they can be compiled into SentencePiece normalization tables.
 */

/**
 * Closed interval of byte values that are printable.
 */
export type ByteRange = readonly [lo: number, hi: number];

/**
 * One non-printable byte and the codepoint that replaces it.
 */
export interface RemapEntry {
  byte: number;
  substitute: number;
}

/**
 * Printable byte ranges, left untouched by the remapping.
 */
export const PRINTABLE_RANGES: readonly ByteRange[] = [
  [0x21, 0x7e], // ! to ~
  [0xa1, 0xac], // ¡ to ¬
  [0xae, 0xff], // ® to ÿ
];

/**
 * Base added to the running counter to form a substitute codepoint.
 */
export const SUBSTITUTE_BASE = 256;

/**
 * Check whether a byte falls in one of the printable ranges.
 */
export function isPrintableByte(byte: number): boolean {
  for (const [lo, hi] of PRINTABLE_RANGES) {
    if (byte >= lo && byte <= hi) {
      return true;
    }
  }
  return false;
}

/**
 * Build the non-printable byte → substitute codepoint table.
 *
 * Byte 0 is skipped: SentencePiece cannot compile an empty key, so the
 * counter starts at 1 and the first substitute is 257.
 */
export function buildByteRemapTable(): readonly RemapEntry[] {
  const table: RemapEntry[] = [];

  let n = 1;
  for (let byte = 1; byte < 256; byte++) {
    if (!isPrintableByte(byte)) {
      table.push(Object.freeze({ byte, substitute: SUBSTITUTE_BASE + n }));
      n++;
    }
  }

  return Object.freeze(table);
}
