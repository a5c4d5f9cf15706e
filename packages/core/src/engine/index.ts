// packages/core/src/engine -- Scan pipeline, fix execution and their primitives

export { CancellationToken, CancellationError } from './cancellation.js';
export { EventBus } from './event-bus.js';
export { Mutex } from './mutex.js';
export { FixExecutor, describeFixResult } from './fix-executor.js';
export type { FixExecutorOptions } from './fix-executor.js';
export { ScanOrchestrator, cumulativeProgress } from './scan-orchestrator.js';
export type {
  ScanAggregate,
  ScanOrchestratorOptions,
  ScanPhase,
  ScanSnapshot,
  SmartScanOutcome,
} from './scan-orchestrator.js';
