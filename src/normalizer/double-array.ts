/**
 * Double-array trie in the darts-clone unit layout, which is what the
 * SentencePiece runtime reads out of a precompiled charsmap.
 *
 * Unit layout (32 bits):
 * - bit 31: unit holds a value (bits 0-30)
 * - bit 9: offset is stored pre-shifted by 8
 * - bit 8: node has a leaf (a key ends here)
 * - bits 0-7: label of the edge leading to this node
 * - bits 10-31: offset to the children block
 */

const BLOCK_SIZE = 256;
const NUM_EXTRA_BLOCKS = 16;
const NUM_EXTRAS = BLOCK_SIZE * NUM_EXTRA_BLOCKS;

const UPPER_MASK = 0xff << 21;
const LOWER_MASK = 0xff;

const VALUE_FLAG = 0x80000000;
const LEAF_FLAG = 0x100;
const SHIFTED_OFFSET_FLAG = 0x200;

/**
 * A key/value match returned by {@link commonPrefixSearch}.
 */
export interface TrieMatch {
  /** Value stored for the matched key */
  value: number;
  /** Length of the matched prefix in bytes */
  length: number;
}

/**
 * Thrown by the builder when the keyset cannot be laid out.
 */
export class DoubleArrayBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DoubleArrayBuildError';
  }
}

function unitHasLeaf(unit: number): boolean {
  return ((unit >>> 8) & 1) === 1;
}

function unitValue(unit: number): number {
  return unit & 0x7fffffff;
}

function unitLabel(unit: number): number {
  return (unit & (VALUE_FLAG | 0xff)) >>> 0;
}

function unitOffset(unit: number): number {
  return (unit >>> 10) << ((unit & SHIFTED_OFFSET_FLAG) >>> 6);
}

/**
 * Builds a double array from keys sorted in byte order.
 *
 * Keys are NUL-free byte strings; a key ends where its bytes end. Values must
 * be non-negative 31-bit integers.
 */
export class DoubleArrayBuilder {
  private units: number[] = [];
  private labels: number[] = [];

  private extrasPrev = new Int32Array(NUM_EXTRAS);
  private extrasNext = new Int32Array(NUM_EXTRAS);
  private extrasFixed = new Uint8Array(NUM_EXTRAS);
  private extrasUsed = new Uint8Array(NUM_EXTRAS);
  private extrasHead: number = 0;

  /**
   * Build the trie and return its units.
   */
  build(keys: readonly Uint8Array[], values: readonly number[]): Uint32Array {
    if (keys.length !== values.length) {
      throw new DoubleArrayBuildError(
        `key/value count mismatch: ${keys.length} keys, ${values.length} values`
      );
    }

    this.reset();

    this.reserveId(0);
    this.extrasUsed[0] = 1;
    this.setOffset(0, 1);
    this.setLabel(0, 0);

    if (keys.length > 0) {
      this.buildFromKeyset(keys, values, 0, keys.length, 0, 0);
    }

    this.fixAllBlocks();

    return Uint32Array.from(this.units);
  }

  private reset(): void {
    this.units = [];
    this.labels = [];
    this.extrasPrev.fill(0);
    this.extrasNext.fill(0);
    this.extrasFixed.fill(0);
    this.extrasUsed.fill(0);
    this.extrasHead = 0;
  }

  private keyAt(key: Uint8Array, depth: number): number {
    return depth < key.length ? key[depth] : 0;
  }

  private buildFromKeyset(
    keys: readonly Uint8Array[],
    values: readonly number[],
    begin: number,
    end: number,
    depth: number,
    dicId: number
  ): void {
    const offset = this.arrangeFromKeyset(keys, values, begin, end, depth, dicId);

    while (begin < end) {
      if (this.keyAt(keys[begin], depth) !== 0) break;
      begin++;
    }
    if (begin === end) return;

    let lastBegin = begin;
    let lastLabel = this.keyAt(keys[begin], depth);
    while (++begin < end) {
      const label = this.keyAt(keys[begin], depth);
      if (label !== lastLabel) {
        this.buildFromKeyset(keys, values, lastBegin, begin, depth + 1, offset ^ lastLabel);
        lastBegin = begin;
        lastLabel = label;
      }
    }
    this.buildFromKeyset(keys, values, lastBegin, end, depth + 1, offset ^ lastLabel);
  }

  private arrangeFromKeyset(
    keys: readonly Uint8Array[],
    values: readonly number[],
    begin: number,
    end: number,
    depth: number,
    dicId: number
  ): number {
    this.labels = [];

    let value = -1;
    for (let i = begin; i < end; i++) {
      const label = this.keyAt(keys[i], depth);
      if (label === 0) {
        if (values[i] < 0 || values[i] > 0x7fffffff) {
          throw new DoubleArrayBuildError(`value out of range for key #${i}: ${values[i]}`);
        }
        if (value === -1) {
          value = values[i];
        }
      }

      if (this.labels.length === 0) {
        this.labels.push(label);
      } else {
        const last = this.labels[this.labels.length - 1];
        if (label !== last) {
          if (label < last) {
            throw new DoubleArrayBuildError(`wrong key order at key #${i}`);
          }
          this.labels.push(label);
        }
      }
    }

    const offset = this.findValidOffset(dicId);
    this.setOffset(dicId, dicId ^ offset);

    for (const label of this.labels) {
      const dicChildId = offset ^ label;
      this.reserveId(dicChildId);
      if (label === 0) {
        this.setHasLeaf(dicId, true);
        this.setValue(dicChildId, value);
      } else {
        this.setLabel(dicChildId, label);
      }
    }
    this.extrasUsed[offset % NUM_EXTRAS] = 1;

    return offset;
  }

  private findValidOffset(id: number): number {
    if (this.extrasHead >= this.units.length) {
      return this.units.length | (id & LOWER_MASK);
    }

    let unfixedId = this.extrasHead;
    do {
      const offset = unfixedId ^ this.labels[0];
      if (this.isValidOffset(id, offset)) {
        return offset;
      }
      unfixedId = this.extrasNext[unfixedId % NUM_EXTRAS];
    } while (unfixedId !== this.extrasHead);

    return this.units.length | (id & LOWER_MASK);
  }

  private isValidOffset(id: number, offset: number): boolean {
    if (this.extrasUsed[offset % NUM_EXTRAS]) {
      return false;
    }

    const relOffset = id ^ offset;
    if (relOffset & LOWER_MASK && relOffset & UPPER_MASK) {
      return false;
    }

    for (let i = 1; i < this.labels.length; i++) {
      if (this.extrasFixed[(offset ^ this.labels[i]) % NUM_EXTRAS]) {
        return false;
      }
    }

    return true;
  }

  private reserveId(id: number): void {
    if (id >= this.units.length) {
      this.expandUnits();
    }

    const slot = id % NUM_EXTRAS;
    if (id === this.extrasHead) {
      this.extrasHead = this.extrasNext[slot];
      if (this.extrasHead === id) {
        this.extrasHead = this.units.length;
      }
    }
    this.extrasNext[this.extrasPrev[slot] % NUM_EXTRAS] = this.extrasNext[slot];
    this.extrasPrev[this.extrasNext[slot] % NUM_EXTRAS] = this.extrasPrev[slot];
    this.extrasFixed[slot] = 1;
  }

  private expandUnits(): void {
    const srcNumUnits = this.units.length;
    const srcNumBlocks = this.numBlocks();

    const destNumUnits = srcNumUnits + BLOCK_SIZE;
    const destNumBlocks = srcNumBlocks + 1;

    if (destNumBlocks > NUM_EXTRA_BLOCKS) {
      this.fixBlock(srcNumBlocks - NUM_EXTRA_BLOCKS);
    }

    for (let i = srcNumUnits; i < destNumUnits; i++) {
      this.units.push(0);
    }

    if (destNumBlocks > NUM_EXTRA_BLOCKS) {
      for (let id = srcNumUnits; id < destNumUnits; id++) {
        this.extrasUsed[id % NUM_EXTRAS] = 0;
        this.extrasFixed[id % NUM_EXTRAS] = 0;
      }
    }

    for (let i = srcNumUnits + 1; i < destNumUnits; i++) {
      this.extrasNext[(i - 1) % NUM_EXTRAS] = i;
      this.extrasPrev[i % NUM_EXTRAS] = i - 1;
    }

    const head = this.extrasHead % NUM_EXTRAS;
    const first = srcNumUnits % NUM_EXTRAS;
    const last = (destNumUnits - 1) % NUM_EXTRAS;

    this.extrasPrev[first] = destNumUnits - 1;
    this.extrasNext[last] = srcNumUnits;

    this.extrasPrev[first] = this.extrasPrev[head];
    this.extrasNext[last] = this.extrasHead;

    this.extrasNext[this.extrasPrev[head] % NUM_EXTRAS] = srcNumUnits;
    this.extrasPrev[head] = destNumUnits - 1;
  }

  private fixAllBlocks(): void {
    const end = this.numBlocks();
    const begin = end > NUM_EXTRA_BLOCKS ? end - NUM_EXTRA_BLOCKS : 0;
    for (let blockId = begin; blockId !== end; blockId++) {
      this.fixBlock(blockId);
    }
  }

  private fixBlock(blockId: number): void {
    const begin = blockId * BLOCK_SIZE;
    const end = begin + BLOCK_SIZE;

    let unusedOffset = 0;
    for (let offset = begin; offset !== end; offset++) {
      if (!this.extrasUsed[offset % NUM_EXTRAS]) {
        unusedOffset = offset;
        break;
      }
    }

    for (let id = begin; id !== end; id++) {
      if (!this.extrasFixed[id % NUM_EXTRAS]) {
        this.reserveId(id);
        this.setLabel(id, (id ^ unusedOffset) & 0xff);
      }
    }
  }

  private numBlocks(): number {
    return this.units.length / BLOCK_SIZE;
  }

  private setHasLeaf(id: number, hasLeaf: boolean): void {
    this.units[id] = hasLeaf
      ? (this.units[id] | LEAF_FLAG) >>> 0
      : (this.units[id] & ~LEAF_FLAG) >>> 0;
  }

  private setValue(id: number, value: number): void {
    this.units[id] = (value | VALUE_FLAG) >>> 0;
  }

  private setLabel(id: number, label: number): void {
    this.units[id] = ((this.units[id] & ~0xff) | label) >>> 0;
  }

  private setOffset(id: number, offset: number): void {
    if (offset >= 1 << 29) {
      throw new DoubleArrayBuildError(`offset too large: ${offset}`);
    }

    let unit = this.units[id] & (VALUE_FLAG | LEAF_FLAG | 0xff);
    if (offset < 1 << 21) {
      unit |= offset << 10;
    } else {
      unit |= (offset << 2) | SHIFTED_OFFSET_FLAG;
    }
    this.units[id] = unit >>> 0;
  }
}

/**
 * Build a double array from sorted, NUL-free keys and their values.
 */
export function buildDoubleArray(
  keys: readonly Uint8Array[],
  values: readonly number[]
): Uint32Array {
  return new DoubleArrayBuilder().build(keys, values);
}

/**
 * Find every key that is a prefix of `key` starting at `start`, shortest first.
 */
export function commonPrefixSearch(
  units: Uint32Array,
  key: Uint8Array,
  start: number = 0
): TrieMatch[] {
  const matches: TrieMatch[] = [];
  if (units.length === 0) return matches;

  let nodePos = unitOffset(units[0]);
  for (let i = start; i < key.length; i++) {
    const label = key[i];
    nodePos ^= label;
    if (nodePos >= units.length) break;

    const unit = units[nodePos];
    if (unitLabel(unit) !== label) break;

    nodePos ^= unitOffset(unit);
    if (unitHasLeaf(unit)) {
      if (nodePos >= units.length) break;
      matches.push({ value: unitValue(units[nodePos]), length: i - start + 1 });
    }
  }

  return matches;
}

/**
 * Look up the value of an exact key, or `undefined` when it is not stored.
 */
export function exactMatchSearch(units: Uint32Array, key: Uint8Array): number | undefined {
  if (units.length === 0) return undefined;

  let unit = units[0];
  let nodePos = unitOffset(unit);
  for (const label of key) {
    nodePos ^= label;
    if (nodePos >= units.length) return undefined;

    unit = units[nodePos];
    if (unitLabel(unit) !== label) return undefined;
    nodePos ^= unitOffset(unit);
  }

  // The leaf sits at label 0 under the last node, i.e. at its child offset.
  if (!unitHasLeaf(unit) || nodePos >= units.length) return undefined;
  return unitValue(units[nodePos]);
}
