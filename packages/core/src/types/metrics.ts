// packages/core/src/types/metrics.ts — Live system readings for the system score

export type MemoryPressure = 'normal' | 'warning' | 'critical';

/**
 * Snapshot of current system readings. Optional fields are readings the
 * provider could not obtain; they contribute no penalty.
 */
export interface SystemMetrics {
  cpuUsagePercent: number;
  memoryUsedPercent: number;
  memoryPressure: MemoryPressure;
  diskUsedPercent?: number;
  cpuTemperatureCelsius?: number;
  diskReadMBps?: number;
  diskWriteMBps?: number;
}

export interface SystemScore {
  score: number;
  message: string;
}
