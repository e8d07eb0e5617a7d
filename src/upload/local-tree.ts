/**
 * Read-only snapshot of a local directory tree, taken before traversal.
 *
 * Children are sorted by name so traversal order is reproducible.
 * Only regular files and directories are included; symlinks, sockets,
 * etc. are skipped.
 */

import type { Dirent, Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { TraversalError, errorMessage } from './errors.js';
import type { LocalDirectory, LocalFile } from './types.js';

function byName<T extends { name: string }>(a: T, b: T): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

async function readDirectory(dirPath: string): Promise<LocalDirectory> {
  const dir: LocalDirectory = {
    kind: 'directory',
    path: dirPath,
    name: path.basename(dirPath),
    files: [],
    directories: [],
  };

  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    dir.unreadable = errorMessage(err);
    return dir;
  }

  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      dir.directories.push(await readDirectory(entryPath));
    } else if (entry.isFile()) {
      let sizeBytes = 0;
      try {
        sizeBytes = (await fs.stat(entryPath)).size;
      } catch {
        // Vanished between readdir and stat; the pre-upload existence check reports it
      }
      dir.files.push({ kind: 'file', path: entryPath, name: entry.name, sizeBytes });
    }
  }

  dir.files.sort(byName);
  dir.directories.sort(byName);
  return dir;
}

/**
 * Snapshot the tree rooted at `rootPath`.
 * @throws TraversalError if the root does not exist or is not a directory
 */
export async function snapshotDirectory(rootPath: string): Promise<LocalDirectory> {
  const absRoot = path.resolve(rootPath);

  let stat: Stats;
  try {
    stat = await fs.stat(absRoot);
  } catch (err) {
    throw new TraversalError(absRoot, 'Path does not exist', { cause: err });
  }
  if (!stat.isDirectory()) {
    throw new TraversalError(absRoot, 'Not a directory');
  }

  const root = await readDirectory(absRoot);
  if (root.unreadable) {
    throw new TraversalError(absRoot, `Directory is unreadable (${root.unreadable})`);
  }
  return root;
}

/**
 * Stat a single file for the single-file upload path.
 * @throws TraversalError if the path does not exist or is not a regular file
 */
export async function describeFile(filePath: string): Promise<LocalFile> {
  const absPath = path.resolve(filePath);

  let stat: Stats;
  try {
    stat = await fs.stat(absPath);
  } catch (err) {
    throw new TraversalError(absPath, 'Path does not exist', { cause: err });
  }
  if (!stat.isFile()) {
    throw new TraversalError(absPath, 'Not a regular file');
  }

  return { kind: 'file', path: absPath, name: path.basename(absPath), sizeBytes: stat.size };
}

/** Total number of files in a snapshot */
export function countFiles(dir: LocalDirectory): number {
  let total = dir.files.length;
  for (const child of dir.directories) {
    total += countFiles(child);
  }
  return total;
}

/** Existence check made immediately before each remote operation */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
