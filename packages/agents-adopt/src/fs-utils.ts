/**
 * Filesystem utilities shared across modules.
 *
 * Home expansion, project-relative resolution, existence checks and
 * timestamped backups.
 */

import { existsSync, lstatSync, statSync } from 'node:fs';
import { copyFile, mkdir, readlink, symlink } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';

/** Create directory and all parents if they don't exist. */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/** Expand a leading `~/` (or a bare `~`) against the given home directory. */
export function expandHome(path: string, homeDir: string): string {
  if (path === '~') {
    return homeDir;
  }
  if (path.startsWith('~/')) {
    return join(homeDir, path.slice(2));
  }
  return path;
}

/** Drop one trailing slash, keeping "/" itself. */
export function stripTrailingSlash(path: string): string {
  if (path !== '/' && path.endsWith('/')) {
    return path.slice(0, -1);
  }
  return path;
}

/**
 * Resolve a user-supplied path the way every command does: expand `~/`,
 * keep absolute paths, and anchor relative paths at the project directory.
 */
export function resolveFromProject(path: string, projectDir: string, homeDir: string): string {
  const expanded = expandHome(path, homeDir);
  if (isAbsolute(expanded)) {
    return stripTrailingSlash(resolve(expanded));
  }
  return stripTrailingSlash(resolve(projectDir, expanded));
}

/** Check if a path is a directory (following symlinks). */
export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** Check if a path is a regular file (following symlinks). */
export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** True for existing paths and for dangling symlinks. */
export function pathExistsOrLink(path: string): boolean {
  if (existsSync(path)) {
    return true;
  }
  try {
    lstatSync(path);
    return true;
  } catch {
    return false;
  }
}

/** True when the path itself is a symlink. */
export function isSymlink(path: string): boolean {
  try {
    return lstatSync(path).isSymbolicLink();
  } catch {
    return false;
  }
}

/** Format a Date as YYYYMMDDHHMMSS in local time. */
export function formatBackupTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Copy a file (or re-create a symlink) to `<path>.bak.<timestamp>` before it is
 * overwritten. Returns the backup path, or null when there was nothing to back up.
 *
 * A second backup within the same second gets a `-<n>` suffix instead of
 * replacing the first.
 */
export async function backupIfExists(path: string, now: Date): Promise<string | null> {
  if (!pathExistsOrLink(path)) {
    return null;
  }

  const base = `${path}.bak.${formatBackupTimestamp(now)}`;
  let backupPath = base;
  for (let n = 1; pathExistsOrLink(backupPath); n++) {
    backupPath = `${base}-${n}`;
  }

  if (isSymlink(path)) {
    await symlink(await readlink(path), backupPath);
  } else {
    await copyFile(path, backupPath);
  }
  return backupPath;
}
