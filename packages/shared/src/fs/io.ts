import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

/**
 * Creates the parent directory of `path` if it does not exist yet.
 */
export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Reserves a temporary file name beside `path`, so a later rename stays on
 * the same filesystem.
 */
export async function siblingTempPath(path: string, postfix = '.tmp'): Promise<string> {
  await ensureDir(path);
  return tmpName({ dir: dirname(path), prefix: '.drivesort-', postfix });
}

export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  const tempPath = await siblingTempPath(path);
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}
