// packages/shared/src/fs/io.ts
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir, pathExists } from 'fs-extra';
import { StorageError } from '../errors';

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes through a temp sibling and a rename, so readers see either the old
 * file or the new one. On failure the temp file is removed and the target is
 * left as it was.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  let tempPath: string | undefined;
  try {
    await ensureDir(path);
    tempPath = await tmpName({ dir: dirname(path), prefix: '.tmp-' });
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    if (tempPath && (await pathExists(tempPath))) {
      await fs.rm(tempPath, { force: true });
    }
    throw new StorageError('write_failed', path, { cause: error });
  }
}

/**
 * Canonical JSON document text: two-space indent and a trailing newline.
 */
export function toJsonDocument(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await atomicWrite(path, toJsonDocument(value));
}

/**
 * Reads a UTF-8 file, returning undefined when it does not exist.
 */
export async function readTextIfExists(path: string): Promise<string | undefined> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw new StorageError('read_failed', path, { cause: error });
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
