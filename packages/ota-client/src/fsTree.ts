import { copyFile, mkdir, readdir, rename, rm, rmdir, unlink, writeFile } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { InvalidRepositoryPathError } from './errors';

export interface WipeOptions {
  keepFiles?: readonly string[];
  keepDirectories?: readonly string[];
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export async function removeTree(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

export async function resetDirectory(directory: string): Promise<void> {
  await removeTree(directory);
  await mkdir(directory, { recursive: true });
}

export function topLevelName(relativePath: string): string {
  return relativePath.split('/').find((segment) => segment.length > 0) ?? '';
}

/**
 * Maps a repository path into the staging root. `reservedNames` are top-level names the
 * repository may not use, such as the staging directory itself.
 */
export function resolveStagedPath(
  stagingRoot: string,
  relativePath: string,
  reservedNames: readonly string[] = []
): string {
  const root = path.resolve(stagingRoot);
  const normalized = relativePath.split('/').filter((segment) => segment.length > 0);
  if (
    normalized.length === 0 ||
    path.isAbsolute(relativePath) ||
    normalized.some((segment) => segment === '..' || segment === '.')
  ) {
    throw new InvalidRepositoryPathError(relativePath);
  }
  if (reservedNames.includes(normalized[0])) {
    throw new InvalidRepositoryPathError(relativePath, 'uses a reserved top-level name');
  }
  const destination = path.resolve(root, ...normalized);
  if (!destination.startsWith(root + path.sep)) {
    throw new InvalidRepositoryPathError(relativePath);
  }
  return destination;
}

export async function writeStagedFile(
  stagingRoot: string,
  relativePath: string,
  data: Uint8Array,
  reservedNames: readonly string[] = []
): Promise<string> {
  const destination = resolveStagedPath(stagingRoot, relativePath, reservedNames);
  await mkdir(path.dirname(destination), { recursive: true });
  await writeFile(destination, data);
  return destination;
}

/**
 * Deletes every top-level entry of `directory` except the allow-listed file and directory
 * names. A missing directory is left alone.
 */
export async function wipeDirectory(directory: string, options: WipeOptions = {}): Promise<string[]> {
  const keepFiles = new Set(options.keepFiles ?? []);
  const keepDirectories = new Set(options.keepDirectories ?? []);

  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return [];
    }
    throw err;
  }

  const removed: string[] = [];
  for (const entry of entries) {
    const keep = entry.isDirectory() ? keepDirectories.has(entry.name) : keepFiles.has(entry.name);
    if (keep) {
      continue;
    }
    await rm(path.join(directory, entry.name), { recursive: true, force: true });
    removed.push(entry.name);
  }
  return removed;
}

async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EXDEV') {
      await copyFile(source, destination);
      await unlink(source);
      return;
    }
    throw err;
  }
}

/**
 * Moves the contents of `source` into `destination`, overwriting files that already exist,
 * then removes the emptied `source`.
 */
export async function mergeDirectory(source: string, destination: string): Promise<number> {
  await mkdir(destination, { recursive: true });
  let moved = 0;
  for (const entry of await readdir(source, { withFileTypes: true })) {
    const sourcePath = path.join(source, entry.name);
    const destinationPath = path.join(destination, entry.name);
    if (entry.isDirectory()) {
      moved += await mergeDirectory(sourcePath, destinationPath);
    } else {
      await moveFile(sourcePath, destinationPath);
      moved += 1;
    }
  }
  await rmdir(source);
  return moved;
}
