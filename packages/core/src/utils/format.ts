// packages/core/src/utils/format.ts — Human-readable sizes and counts

import { GB, KB, MB } from './constants.js';

/** 1.5 GB, 600 MB, 12 KB. Gigabytes get one decimal, smaller units none. */
export function formatBytes(bytes: number): string {
  const gb = bytes / GB;
  if (gb >= 1) return `${gb.toFixed(1)} GB`;
  const mb = bytes / MB;
  if (mb >= 1) return `${mb.toFixed(0)} MB`;
  return `${(bytes / KB).toFixed(0)} KB`;
}

/** 1.2 K for counts of a thousand or more, the plain number otherwise. */
export function formatCount(count: number): string {
  if (count >= 1000) return `${(count / 1000).toFixed(1)} K`;
  return String(count);
}
