/**
 * Filesystem primitives used while replaying events onto the target tree
 */

import { promises as fsp } from 'fs';
import { dirname, isAbsolute, relative, resolve } from 'path';
import { AppError } from './logger.js';

/** ZFS exposes its snapshot control directory at the dataset root */
export const METADATA_ENTRY = '.zfs';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isMissing(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Map a remote-rooted path ("/a/b.txt") into the target tree
 */
export function resolveTargetPath(root: string, remotePath: string): string {
  const absoluteRoot = resolve(root);
  const target = resolve(absoluteRoot, remotePath.replace(/^\/+/, ''));
  const rel = relative(absoluteRoot, target);

  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    throw new AppError(`Path "${remotePath}" does not resolve inside ${absoluteRoot}`, 'INVALID_PATH', {
      path: remotePath,
    });
  }
  return target;
}

/**
 * Ancestors of `path`, nearest first, stopping before `root`
 */
export function ancestorsWithin(path: string, root: string): string[] {
  const absoluteRoot = resolve(root);
  const ancestors: string[] = [];
  let current = dirname(resolve(path));

  while (current !== absoluteRoot && current !== dirname(current)) {
    ancestors.push(current);
    current = dirname(current);
  }
  return ancestors;
}

async function lstatOrNull(path: string) {
  try {
    return await fsp.lstat(path);
  } catch (error) {
    if (isMissing(error)) return null;
    throw error;
  }
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await fsp.stat(path)).isFile();
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  const stats = await lstatOrNull(path);
  return stats !== null && stats.isDirectory();
}

export async function isSymlink(path: string): Promise<boolean> {
  const stats = await lstatOrNull(path);
  return stats !== null && stats.isSymbolicLink();
}

/**
 * Leave an empty regular file at `path`, creating parents as needed
 */
export async function truncate(path: string): Promise<void> {
  await fsp.mkdir(dirname(path), { recursive: true });
  // writing through a link would clobber its target
  if (await isSymlink(path)) {
    await fsp.unlink(path);
  }
  await fsp.writeFile(path, '');
}

export interface SetMtimeOptions {
  updateParents?: boolean;
  root?: string;
}

export async function setMtime(path: string, date: Date, options: SetMtimeOptions = {}): Promise<void> {
  await fsp.utimes(path, date, date);

  if (options.updateParents) {
    if (!options.root) {
      throw new AppError('setMtime with updateParents needs a root', 'INVALID_PATH', { path });
    }
    for (const parent of ancestorsWithin(path, options.root)) {
      await fsp.utimes(parent, date, date);
    }
  }
}

/**
 * True for a missing directory or one holding nothing but the metadata entry
 */
export async function isEmptyDirectory(path: string): Promise<boolean> {
  try {
    const entries = await fsp.readdir(path);
    return entries.every(entry => entry === METADATA_ENTRY);
  } catch (error) {
    if (isMissing(error)) return true;
    throw error;
  }
}

/**
 * Remove a file or symlink; returns false when nothing was there
 */
export async function removeEntry(path: string): Promise<boolean> {
  const stats = await lstatOrNull(path);
  if (stats === null || stats.isDirectory()) {
    return false;
  }
  await fsp.unlink(path);
  return true;
}

/**
 * Returns false when the directory is gone already or has gained an entry
 */
export async function removeEmptyDirectory(path: string): Promise<boolean> {
  try {
    await fsp.rmdir(path);
    return true;
  } catch (error) {
    if (isMissing(error) || (isErrnoException(error) && error.code === 'ENOTEMPTY')) return false;
    throw error;
  }
}

export async function createSymlink(path: string, target: string): Promise<void> {
  await fsp.mkdir(dirname(path), { recursive: true });
  await fsp.symlink(target, path);
}
