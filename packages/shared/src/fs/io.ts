import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { copy, ensureDir, pathExists, remove } from 'fs-extra';
import { IoError } from '../errors';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export async function ensureParentDir(path: string): Promise<void> {
  await ensureDir(dirname(path));
}

export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  try {
    await ensureParentDir(path);
    const tempPath = await tmpName({ dir: dirname(path) });
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (cause) {
    throw new IoError(`Unable to write file ${path}: ${describeCause(cause)}`, {
      cause,
      details: { path },
    });
  }
}

/**
 * Deletes `path` recursively when it exists, then creates it (with parents) as an empty directory.
 * Safe to call repeatedly: the second call leaves the same empty directory behind.
 */
export async function resetDirectory(path: string): Promise<void> {
  if (await pathExists(path)) {
    try {
      await remove(path);
    } catch (cause) {
      throw new IoError(`Unable to remove directory ${path}: ${describeCause(cause)}`, {
        cause,
        details: { path },
      });
    }
  }

  try {
    await ensureDir(path);
  } catch (cause) {
    throw new IoError(`Unable to create directory ${path}: ${describeCause(cause)}`, {
      cause,
      details: { path },
    });
  }

  // ensureDir resolves quietly for some races (another process replacing the path with a file).
  const stat = await fs.stat(path).catch(() => undefined);
  if (!stat?.isDirectory()) {
    throw new IoError(`Unable to create directory ${path}: path is not a directory`, {
      details: { path },
    });
  }
}

/**
 * Copies a regular file byte for byte, creating parent directories of `to`.
 * An existing `to` is overwritten without checking its content.
 */
export async function copyFile(from: string, to: string): Promise<void> {
  try {
    const stat = await fs.stat(from);
    if (!stat.isFile()) {
      throw new Error('source is not a regular file');
    }
    await copy(from, to, { overwrite: true, errorOnExist: false });
  } catch (cause) {
    throw new IoError(`Unable to copy file ${from} to ${to}: ${describeCause(cause)}`, {
      cause,
      details: { from, to },
    });
  }
}

/**
 * Returns true when `path` exists and is a directory.
 */
export async function isDirectory(path: string): Promise<boolean> {
  const stat = await fs.stat(path).catch(() => undefined);
  return stat?.isDirectory() ?? false;
}

/**
 * Returns true when `path` exists and is a regular file.
 */
export async function isFile(path: string): Promise<boolean> {
  const stat = await fs.stat(path).catch(() => undefined);
  return stat?.isFile() ?? false;
}
