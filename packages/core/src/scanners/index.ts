// packages/core/src/scanners -- Node implementations of the engine's collaborators

export { FileSystemScanner, findDuplicates } from './filesystem-scanner.js';
export type { FileSystemScannerOptions, InstalledApp } from './filesystem-scanner.js';
export { StatfsDiskUsageProvider, readVolumeUsage } from './disk-usage.js';
export type { VolumeUsage } from './disk-usage.js';
export { NodeFileOperations } from './file-operations.js';
export type { NodeFileOperationsOptions } from './file-operations.js';
export {
  loadMetricsSnapshot,
  memoryPressureFor,
  NodeMetricsProvider,
  parseMetricsSnapshot,
  systemMetricsSchema,
} from './metrics.js';
export { collectFiles, expandHome, measurePath } from './fs-walk.js';
