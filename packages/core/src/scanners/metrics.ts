// packages/core/src/scanners/metrics.ts — One-shot system readings for the live score

import { readFile } from 'node:fs/promises';
import { cpus, freemem, loadavg, totalmem } from 'node:os';
import { z } from 'zod';
import type { MemoryPressure, SystemMetrics } from '../types/metrics.js';
import type { MetricsProvider } from '../types/services.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { readVolumeUsage } from './disk-usage.js';

const percent = z.number().min(0).max(100);

export const systemMetricsSchema = z.object({
  cpuUsagePercent: percent,
  memoryUsedPercent: percent,
  memoryPressure: z.enum(['normal', 'warning', 'critical']).default('normal'),
  diskUsedPercent: percent.optional(),
  cpuTemperatureCelsius: z.number().optional(),
  diskReadMBps: z.number().nonnegative().optional(),
  diskWriteMBps: z.number().nonnegative().optional(),
});

export function parseMetricsSnapshot(value: unknown): SystemMetrics {
  const result = systemMetricsSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid metrics snapshot: ${issues}`, 'metrics');
  }
  return result.data;
}

export async function loadMetricsSnapshot(path: string): Promise<SystemMetrics> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to read metrics snapshot ${path}: ${errorMessage(err)}`, 'metrics');
  }
  return parseMetricsSnapshot(raw);
}

/** Pressure inferred from used memory when the platform reports none. */
export function memoryPressureFor(usedPercent: number): MemoryPressure {
  if (usedPercent >= 95) return 'critical';
  if (usedPercent >= 85) return 'warning';
  return 'normal';
}

/**
 * CPU from the one-minute load average over the core count, memory from
 * free/total, disk from statfs. Temperature and throughput are not
 * available from Node and stay absent.
 */
export class NodeMetricsProvider implements MetricsProvider {
  constructor(private readonly volumePath: string = '/') {}

  async sample(): Promise<SystemMetrics> {
    const cores = Math.max(1, cpus().length);
    const [oneMinute = 0] = loadavg();
    const cpuUsagePercent = Math.min(100, (oneMinute / cores) * 100);
    const total = totalmem();
    const memoryUsedPercent = total > 0 ? ((total - freemem()) / total) * 100 : 0;
    const volume = await readVolumeUsage(this.volumePath);
    const diskUsedPercent = volume.totalSpace > 0 ? (volume.usedSpace / volume.totalSpace) * 100 : undefined;

    return {
      cpuUsagePercent,
      memoryUsedPercent,
      memoryPressure: memoryPressureFor(memoryUsedPercent),
      diskUsedPercent,
    };
  }
}
