// packages/core/src/scanners/fs-walk.ts — Directory traversal helpers for the filesystem scanner

import type { Dirent, Stats } from 'node:fs';
import { lstat, readdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, relative } from 'node:path';
import type { ExcludeFilter } from '../config/ignore.js';
import type { CancellationToken } from '../engine/cancellation.js';
import type { SizedPath } from '../findings/file-group.js';

/** Errors that mean "this entry cannot be read"; the entry is skipped. */
const SKIPPABLE_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'ENOTDIR', 'ELOOP', 'EBUSY']);

export function isSkippableFsError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && SKIPPABLE_CODES.has(err.code);
}

export function expandHome(path: string, homeDir: string = homedir()): string {
  if (path === '~') return homeDir;
  if (path.startsWith('~/')) return join(homeDir, path.slice(2));
  return path;
}

export async function lstatOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await lstat(path);
  } catch (err) {
    if (isSkippableFsError(err)) return undefined;
    throw err;
  }
}

export async function listEntries(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isSkippableFsError(err)) return [];
    throw err;
  }
}

export interface WalkOptions {
  /** Tested against paths relative to the root; directories carry a trailing slash */
  exclude?: ExcludeFilter;
  /** Absolute directories not to descend into */
  skip?: ReadonlySet<string>;
  token?: CancellationToken;
}

/**
 * Every regular file under `root` with its size. A root that is itself a
 * file yields just that file. Symlinks are not followed.
 */
export async function collectFiles(root: string, options: WalkOptions = {}): Promise<SizedPath[]> {
  const rootStats = await lstatOrUndefined(root);
  if (!rootStats) return [];
  if (rootStats.isFile()) return [{ path: root, size: rootStats.size }];
  if (!rootStats.isDirectory()) return [];

  const files: SizedPath[] = [];
  const pending = [root];
  while (pending.length > 0) {
    options.token?.throwIfCancelled();
    const dir = pending.pop();
    if (dir === undefined) break;

    for (const entry of await listEntries(dir)) {
      const path = join(dir, entry.name);
      const rel = relative(root, path);
      if (entry.isDirectory()) {
        if (options.skip?.has(path)) continue;
        if (options.exclude?.(`${rel}/`)) continue;
        pending.push(path);
      } else if (entry.isFile()) {
        if (options.exclude?.(rel)) continue;
        const stats = await lstatOrUndefined(path);
        if (stats) files.push({ path, size: stats.size });
      }
    }
  }
  return files;
}

/** Bytes in a file or directory tree; 0 when unreadable. */
export async function measurePath(path: string, token?: CancellationToken): Promise<number> {
  const stats = await lstatOrUndefined(path);
  if (!stats) return 0;
  if (!stats.isDirectory()) return stats.size;
  const files = await collectFiles(path, { token });
  return files.reduce((sum, file) => sum + file.size, 0);
}
