import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { IOError } from '../src/errors.js';
import { writeFileAtomic } from '../src/io/write-file.js';

describe('writeFileAtomic', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'spm-convert-write-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create missing parent directories', async () => {
    const target = path.join(dir, 'a', 'b', 'model.model');
    await writeFileAtomic(target, new Uint8Array([1, 2, 3]));

    expect(Array.from(await readFile(target))).toEqual([1, 2, 3]);
  });

  it('should replace an existing file wholesale', async () => {
    const target = path.join(dir, 'model.model');
    await writeFile(target, 'a much longer previous content');
    await writeFileAtomic(target, new Uint8Array([7]));

    expect(Array.from(await readFile(target))).toEqual([7]);
  });

  it('should leave no temp file behind', async () => {
    await writeFileAtomic(path.join(dir, 'model.model'), new Uint8Array([1]));
    expect(await readdir(dir)).toEqual(['model.model']);
  });

  it('should raise IOError when the directory cannot be created', async () => {
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'not a directory');

    await expect(
      writeFileAtomic(path.join(blocker, 'model.model'), new Uint8Array([1]))
    ).rejects.toBeInstanceOf(IOError);
  });

  it('should raise IOError when the target is a directory', async () => {
    const target = path.join(dir, 'taken');
    await writeFileAtomic(path.join(target, 'inner'), new Uint8Array([1]));

    await expect(writeFileAtomic(target, new Uint8Array([2]))).rejects.toThrow(
      'Cannot write output file'
    );
    expect(await readdir(dir)).toEqual(['taken']);
  });
});
