// packages/core/src/types/index.ts -- barrel re-export

export type {
  PresetName,
  ScanTargets,
  ScanDirectories,
  ScanConfig,
  FixConfig,
  HistoryConfig,
  AdvancedConfig,
  DiskcareConfig,
} from './config.js';

export type {
  ScanStartedEvent,
  StageStartedEvent,
  StageCompletedEvent,
  StageDegradedEvent,
  ScanCancelledEvent,
  ScanFinalizedEvent,
  FixStartedEvent,
  FixItemEvent,
  FixCompletedEvent,
  ScanEvent,
  ScanEventInput,
} from './events.js';

export type { MemoryPressure, SystemMetrics, SystemScore } from './metrics.js';

export { SCAN_STAGES, STAGE_LABELS, STAGE_PROGRESS_WEIGHTS } from './scan.js';
export type {
  ScanStage,
  FileGroup,
  DiskUsageSummary,
  JunkCategory,
  PerformanceCategory,
  AppInfo,
  DuplicateAppGroup,
  OrphanType,
  OrphanedFile,
  AppIssueCategory,
  PrivacyCategory,
  PenaltyBreakdown,
  PenaltyCategory,
  HealthRating,
  ScanResult,
  RecommendationType,
  Recommendation,
  SmartScanReport,
  FixResult,
  StageStatus,
  StageOutcome,
} from './scan.js';

export type {
  CategoryScanner,
  DiskUsageProvider,
  DeleteResult,
  FileOperations,
  MetricsProvider,
} from './services.js';
