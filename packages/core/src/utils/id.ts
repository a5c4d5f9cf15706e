// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a scan ID with "scan_" prefix. */
export function generateScanId(): string {
  return `scan_${nanoid(21)}`;
}

/** Generate a generic unique ID. */
export function generateId(prefix?: string): string {
  const id = nanoid(16);
  return prefix ? `${prefix}_${id}` : id;
}
