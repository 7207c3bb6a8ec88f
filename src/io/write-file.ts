import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { IOError } from '../errors.js';

/**
 * Write `data` to `path`, replacing any existing file.
 *
 * Missing parent directories are created. The bytes go to a sibling temp
 * file that is renamed over the target once fully written, so a failed write
 * leaves the previous file (or no file) in place.
 */
export async function writeFileAtomic(path: string, data: Uint8Array): Promise<void> {
  const directory = dirname(path);
  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    throw new IOError(directory, 'Cannot create output directory', { cause: error });
  }

  const tempPath = join(directory, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new IOError(path, 'Cannot write output file', { cause: error });
  }
}
