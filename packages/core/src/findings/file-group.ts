// packages/core/src/findings/file-group.ts

import type { FileGroup } from '../types/scan.js';

export interface SizedPath {
  path: string;
  size: number;
}

/**
 * Build a frozen FileGroup whose size and count are derived from its paths.
 * Duplicate paths are collapsed (first occurrence wins); negative or
 * non-finite sizes count as zero.
 */
export function createFileGroup(
  name: string,
  description: string,
  entries: Iterable<SizedPath> = [],
): FileGroup {
  const sizes = new Map<string, number>();
  for (const entry of entries) {
    if (sizes.has(entry.path)) continue;
    sizes.set(entry.path, Number.isFinite(entry.size) && entry.size > 0 ? entry.size : 0);
  }

  let size = 0;
  for (const bytes of sizes.values()) size += bytes;

  return Object.freeze({
    name,
    description,
    paths: Object.freeze([...sizes.keys()]),
    size,
    count: sizes.size,
  });
}

/** Same name and description, no paths. Used for counterfactual re-scoring. */
export function emptiedFileGroup(group: FileGroup): FileGroup {
  return createFileGroup(group.name, group.description);
}

/** A group with `template`'s name and description holding `entries`. */
export function withEntries(template: FileGroup, entries: Iterable<SizedPath>): FileGroup {
  return createFileGroup(template.name, template.description, entries);
}
