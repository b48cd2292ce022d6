import path from 'path';
import fs from 'fs-extra';
import archiver from 'archiver';
import { tmpName } from 'tmp-promise';
import { ArchiveError, ensureParentDir, isDirectory, normalizePath } from '@release-stager/shared';

export interface SiteEntry {
  path: string;
  /** Posix path relative to the site root */
  relativePath: string;
  isDirectory: boolean;
}

function byName(a: fs.Dirent, b: fs.Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Walks everything below `siteRoot` depth-first, yielding each directory before its children.
 * Every call re-reads the filesystem.
 */
export async function* walkSite(siteRoot: string, current = siteRoot): AsyncGenerator<SiteEntry> {
  const dirents = await fs.readdir(current, { withFileTypes: true });
  for (const dirent of dirents.sort(byName)) {
    const entryPath = path.join(current, dirent.name);
    const entry: SiteEntry = {
      path: entryPath,
      relativePath: normalizePath(path.relative(siteRoot, entryPath)),
      isDirectory: dirent.isDirectory(),
    };
    yield entry;
    if (entry.isDirectory) {
      yield* walkSite(siteRoot, entryPath);
    }
  }
}

/**
 * Zips the file entries into `outputFile`, named by their path relative to the site root.
 * Directories are not stored. Returns the number of files written.
 *
 * The archive is written beside `outputFile` under a temporary name and renamed once complete,
 * so a failed run leaves any previous archive untouched and no partial one behind.
 */
export async function archiveSite(
  siteRoot: string,
  outputFile: string,
  entries: AsyncIterable<SiteEntry> | Iterable<SiteEntry>,
): Promise<number> {
  if (!(await isDirectory(siteRoot))) {
    throw new ArchiveError(`Site directory ${siteRoot} does not exist`, { details: { siteRoot } });
  }

  let tempFile: string | undefined;
  try {
    const files: SiteEntry[] = [];
    for await (const entry of entries) {
      if (!entry.isDirectory) {
        files.push(entry);
      }
    }

    await ensureParentDir(outputFile);
    const target = await tmpName({ dir: path.dirname(outputFile), postfix: '.zip' });
    tempFile = target;
    await new Promise<void>((resolve, reject) => {
      const output = fs.createWriteStream(target);
      const archive = archiver('zip', {
        zlib: { level: 9 },
      });
      let failure: { error: unknown } | undefined;
      const fail = (error: unknown) => {
        if (failure) return;
        failure = { error };
        archive.abort();
        output.destroy();
      };

      // Settle only once the file handle is closed, so the temporary file can be removed.
      output.on('close', () => (failure ? reject(failure.error) : resolve()));
      output.on('error', fail);
      archive.on('warning', fail);
      archive.on('error', fail);

      archive.pipe(output);
      for (const file of files) {
        archive.file(file.path, { name: file.relativePath });
      }
      archive.finalize().catch(fail);
    });
    await fs.rename(target, outputFile);
    return files.length;
  } catch (error: unknown) {
    if (tempFile) {
      await fs.remove(tempFile);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ArchiveError(`Failed to create ${outputFile}: ${message}`, {
      cause: error,
      details: { siteRoot, outputFile },
    });
  }
}
