// packages/core/src/scanners/disk-usage.ts

import { statfs } from 'node:fs/promises';
import type { DiskUsageSummary } from '../types/scan.js';
import type { DiskUsageProvider } from '../types/services.js';

export interface VolumeUsage {
  totalSpace: number;
  freeSpace: number;
  usedSpace: number;
}

/** Capacity of the volume holding `path`; free space is what an unprivileged user can claim. */
export async function readVolumeUsage(path: string): Promise<VolumeUsage> {
  const stats = await statfs(path);
  const totalSpace = stats.blocks * stats.bsize;
  const freeSpace = stats.bavail * stats.bsize;
  return { totalSpace, freeSpace, usedSpace: Math.max(0, totalSpace - freeSpace) };
}

/**
 * Disk usage from statfs. Cache, log and temp sizes start at zero and are
 * filled in from the junk findings once the disk stage has run.
 */
export class StatfsDiskUsageProvider implements DiskUsageProvider {
  constructor(private readonly volumePath: string = '/') {}

  async getDiskUsage(): Promise<DiskUsageSummary> {
    const volume = await readVolumeUsage(this.volumePath);
    return {
      ...volume,
      homeDirectorySize: 0,
      cacheSize: 0,
      logSize: 0,
      tempSize: 0,
    };
  }
}
