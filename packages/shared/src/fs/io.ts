import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir, pathExists } from 'fs-extra';

/** Creates the parent directory of `path`. */
export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes to a temp file beside `path` and renames it into place, so readers
 * see either the old or the new content.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.tmp-' });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/** Reads a UTF-8 file, or `null` when it does not exist. */
export async function readFileIfExists(path: string): Promise<string | null> {
  if (!(await pathExists(path))) return null;
  return fs.readFile(path, 'utf8');
}
