// @diskcare/core - Scan pipeline, health scoring and cleanup recommendations

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  PresetName,
  ScanTargets,
  ScanDirectories,
  ScanConfig,
  FixConfig,
  HistoryConfig,
  AdvancedConfig,
  DiskcareConfig,
  // Events
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
  // Metrics
  MemoryPressure,
  SystemMetrics,
  SystemScore,
  // Scan
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
  // Collaborators
  CategoryScanner,
  DiskUsageProvider,
  DeleteResult,
  FileOperations,
  MetricsProvider,
} from './types/index.js';

export { SCAN_STAGES, STAGE_LABELS, STAGE_PROGRESS_WEIGHTS } from './types/index.js';

// Utilities
export {
  generateScanId,
  generateId,
  ConfigError,
  ScanStateError,
  DatabaseError,
  errorMessage,
  createLogger,
  silentLogger,
  formatBytes,
  formatCount,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
export { GB, KB, MB } from './utils/constants.js';

// Findings
export {
  createFileGroup,
  emptiedFileGroup,
  withEntries,
  emptyJunkCategory,
  emptyPerformanceCategory,
  emptyAppIssueCategory,
  emptyPrivacyCategory,
  junkTotalSize,
  junkTotalFiles,
  orphanedTotalSize,
  duplicateExtras,
  sumUniqueApps,
  reclaimableBytes,
  flaggedItemCount,
} from './findings/index.js';
export type { SizedPath, ReclaimableInput } from './findings/index.js';

// Scoring
export {
  CATEGORY_WEIGHTS,
  PENALTY_ORDER,
  lookupTier,
  calculateHealthScore,
  calculatePenaltyBreakdown,
  rawPenalties,
  totalPenalty,
  calculateSystemScore,
  scoreToRating,
  systemScoreToRating,
  RATING_DESCRIPTIONS,
  ScoreCalculator,
} from './scoring/index.js';
export type { HealthScore, ScoreInput, Tier, TierTable, LinearMetricRule } from './scoring/index.js';

// Recommendations
export {
  RecommendationGenerator,
  generateRecommendations,
  compareRecommendations,
  sortRecommendations,
  marginalScoreImpact,
  RECOMMENDATION_RULES,
} from './recommendations/index.js';
export type { RecommendationRule, RuleFinding } from './recommendations/index.js';

// Engine
export {
  CancellationToken,
  CancellationError,
  EventBus,
  Mutex,
  FixExecutor,
  describeFixResult,
  ScanOrchestrator,
  cumulativeProgress,
} from './engine/index.js';
export type {
  FixExecutorOptions,
  ScanAggregate,
  ScanOrchestratorOptions,
  ScanPhase,
  ScanSnapshot,
  SmartScanOutcome,
} from './engine/index.js';

// Configuration
export {
  DEFAULT_CONFIG,
  diskcareConfigSchema,
  validateConfig,
  isPresetName,
  loadPreset,
  listPresets,
  CONFIG_FILENAME,
  deepMerge,
  defaultConfigPath,
  loadConfig,
  writeConfig,
  createExcludeFilter,
} from './config/index.js';
export type { DiskcareConfigInput, LoadConfigOptions, ExcludeFilter } from './config/index.js';

// Scanners
export {
  FileSystemScanner,
  findDuplicates,
  StatfsDiskUsageProvider,
  readVolumeUsage,
  NodeFileOperations,
  NodeMetricsProvider,
  loadMetricsSnapshot,
  parseMetricsSnapshot,
  memoryPressureFor,
  systemMetricsSchema,
  collectFiles,
  expandHome,
  measurePath,
} from './scanners/index.js';
export type { FileSystemScannerOptions, InstalledApp, NodeFileOperationsOptions, VolumeUsage } from './scanners/index.js';

// Memory / Database
export { openDatabase, runMigrations, getSchemaVersion, ScanHistoryStore } from './memory/index.js';
export type { ScanHistoryEntry } from './memory/index.js';
