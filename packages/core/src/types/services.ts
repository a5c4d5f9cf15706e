// packages/core/src/types/services.ts — Collaborators the engine calls through

import type { CancellationToken } from '../engine/cancellation.js';
import type { SystemMetrics } from './metrics.js';
import type {
  AppIssueCategory,
  DiskUsageSummary,
  JunkCategory,
  PerformanceCategory,
  PrivacyCategory,
} from './scan.js';

/** Read-only producer of category snapshots. */
export interface CategoryScanner {
  scanJunkFiles(token?: CancellationToken): Promise<JunkCategory>;
  scanAppIssues(token?: CancellationToken): Promise<AppIssueCategory>;
  scanPerformanceIssues(token?: CancellationToken): Promise<PerformanceCategory>;
  scanPrivacyIssues?(token?: CancellationToken): Promise<PrivacyCategory>;
}

export interface DiskUsageProvider {
  getDiskUsage(): Promise<DiskUsageSummary | undefined>;
}

export interface DeleteResult {
  success: boolean;
  filesProcessed: number;
  errors: string[];
}

export interface FileOperations {
  delete(paths: readonly string[]): Promise<DeleteResult>;
  /** Size in bytes of a file or directory tree. */
  measure(path: string): Promise<number>;
}

export interface MetricsProvider {
  sample(): Promise<SystemMetrics>;
}
