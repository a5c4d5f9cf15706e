// packages/core/src/scoring/system-score.ts — Live-metrics score

import type { MemoryPressure, SystemMetrics, SystemScore } from '../types/metrics.js';

/**
 * A metric penalized along a ramp: nothing at or below `normal`, half the
 * weight just above it, full weight at `high`, then overflow proportional
 * to the distance past `high` (measured in normal-to-high spans), capped at
 * half a weight.
 */
export interface LinearMetricRule {
  readonly normal: number;
  readonly high: number;
  readonly weight: number;
}

export const CPU_RULE: LinearMetricRule = { normal: 30, high: 70, weight: 25 };
export const MEMORY_RULE: LinearMetricRule = { normal: 60, high: 85, weight: 25 };
export const DISK_RULE: LinearMetricRule = { normal: 70, high: 90, weight: 20 };
/** Combined read + write throughput, MB/s. */
export const DISK_IO_RULE: LinearMetricRule = { normal: 100, high: 400, weight: 10 };

export const MEMORY_PRESSURE_PENALTIES: Readonly<Record<MemoryPressure, number>> = {
  normal: 0,
  warning: 5,
  critical: 15,
};

/** Highest matching step wins. */
export const THERMAL_STEPS: readonly { readonly atLeast: number; readonly penalty: number }[] = [
  { atLeast: 90, penalty: 10 },
  { atLeast: 80, penalty: 5 },
];

export const HEALTHY_SYSTEM_MESSAGE = 'System resources are within normal ranges';

export function linearPenalty(value: number, rule: LinearMetricRule): number {
  if (!Number.isFinite(value) || value <= rule.normal) return 0;
  const half = rule.weight / 2;
  const span = rule.high - rule.normal;
  if (value <= rule.high) {
    return half + ((value - rule.normal) / span) * half;
  }
  const overflow = Math.min((value - rule.high) / span, 1);
  return rule.weight + overflow * half;
}

export function thermalPenalty(celsius: number | undefined): number {
  if (celsius === undefined) return 0;
  return THERMAL_STEPS.find((step) => celsius >= step.atLeast)?.penalty ?? 0;
}

export function diskThroughput(metrics: SystemMetrics): number | undefined {
  if (metrics.diskReadMBps === undefined && metrics.diskWriteMBps === undefined) return undefined;
  return (metrics.diskReadMBps ?? 0) + (metrics.diskWriteMBps ?? 0);
}

const THERMAL_HIGH = 80;

export function calculateSystemScore(metrics: SystemMetrics): SystemScore {
  let penalty = 0;
  const high: string[] = [];

  penalty += linearPenalty(metrics.cpuUsagePercent, CPU_RULE);
  if (metrics.cpuUsagePercent > CPU_RULE.high) high.push(`CPU ${Math.round(metrics.cpuUsagePercent)}%`);

  penalty += linearPenalty(metrics.memoryUsedPercent, MEMORY_RULE);
  if (metrics.memoryUsedPercent > MEMORY_RULE.high) high.push(`memory ${Math.round(metrics.memoryUsedPercent)}%`);

  penalty += MEMORY_PRESSURE_PENALTIES[metrics.memoryPressure];
  if (metrics.memoryPressure === 'critical') high.push('memory pressure critical');

  if (metrics.diskUsedPercent !== undefined) {
    penalty += linearPenalty(metrics.diskUsedPercent, DISK_RULE);
    if (metrics.diskUsedPercent > DISK_RULE.high) high.push(`disk ${Math.round(metrics.diskUsedPercent)}% full`);
  }

  if (metrics.cpuTemperatureCelsius !== undefined) {
    penalty += thermalPenalty(metrics.cpuTemperatureCelsius);
    if (metrics.cpuTemperatureCelsius >= THERMAL_HIGH) {
      high.push(`CPU temperature ${Math.round(metrics.cpuTemperatureCelsius)}°C`);
    }
  }

  const throughput = diskThroughput(metrics);
  if (throughput !== undefined) {
    penalty += linearPenalty(throughput, DISK_IO_RULE);
    if (throughput > DISK_IO_RULE.high) high.push(`disk I/O ${Math.round(throughput)} MB/s`);
  }

  const score = Math.max(0, Math.min(100, Math.round(100 - penalty)));
  const message = high.length === 0 ? HEALTHY_SYSTEM_MESSAGE : `High ${high.join(', ')}`;
  return { score, message };
}
