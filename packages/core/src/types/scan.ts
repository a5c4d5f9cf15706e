// packages/core/src/types/scan.ts — Scan findings, results and recommendations

export type ScanStage = 'preparing' | 'scanning-disk' | 'checking-apps' | 'analyzing-system' | 'complete';

/** Stages in execution order. */
export const SCAN_STAGES: readonly ScanStage[] = [
  'preparing',
  'scanning-disk',
  'checking-apps',
  'analyzing-system',
  'complete',
];

/** Share of overall progress each stage contributes. Non-terminal weights sum to 1. */
export const STAGE_PROGRESS_WEIGHTS: Readonly<Record<ScanStage, number>> = {
  preparing: 0.05,
  'scanning-disk': 0.4,
  'checking-apps': 0.3,
  'analyzing-system': 0.25,
  complete: 0,
};

export const STAGE_LABELS: Readonly<Record<ScanStage, string>> = {
  preparing: 'Preparing',
  'scanning-disk': 'Scanning Disk',
  'checking-apps': 'Checking Apps',
  'analyzing-system': 'Analyzing System',
  complete: 'Complete',
};

export interface FileGroup {
  readonly name: string;
  readonly description: string;
  readonly paths: readonly string[];
  /** Total bytes across all paths */
  readonly size: number;
  readonly count: number;
}

export interface DiskUsageSummary {
  totalSpace: number;
  usedSpace: number;
  freeSpace: number;
  homeDirectorySize: number;
  cacheSize: number;
  logSize: number;
  tempSize: number;
}

export interface JunkCategory {
  readonly tempFiles: FileGroup;
  readonly cacheFiles: FileGroup;
  readonly logFiles: FileGroup;
  readonly trashItems: FileGroup;
  readonly languageFiles: FileGroup;
  readonly oldFiles: FileGroup;
}

export interface PerformanceCategory {
  readonly launchAgents: FileGroup;
  readonly loginItems: FileGroup;
  readonly browserCaches: FileGroup;
  readonly memoryIssues: readonly string[];
  readonly diskFragmentation?: number;
}

export interface AppInfo {
  readonly appName: string;
  readonly bundleIdentifier: string;
  readonly path: string;
  readonly version?: string;
  /** Bundle + support + cache bytes */
  readonly totalSize: number;
  /** Epoch milliseconds of last access, when known */
  readonly lastUsed?: number;
}

export interface DuplicateAppGroup {
  readonly appName: string;
  /** First entry is the copy that is kept */
  readonly versions: readonly AppInfo[];
  readonly totalSize: number;
}

export type OrphanType =
  | 'app-support'
  | 'cache'
  | 'preferences'
  | 'container'
  | 'logs'
  | 'launch-agent'
  | 'other';

export interface OrphanedFile {
  readonly path: string;
  readonly size: number;
  readonly type: OrphanType;
  readonly possibleSourceApp?: string;
}

export interface AppIssueCategory {
  readonly unusedApps: readonly AppInfo[];
  readonly largeApps: readonly AppInfo[];
  readonly duplicateApps: readonly DuplicateAppGroup[];
  readonly orphanedFiles: readonly OrphanedFile[];
}

export interface PrivacyCategory {
  readonly browserHistory: FileGroup;
  readonly downloadHistory: FileGroup;
  readonly recentDocuments: FileGroup;
  readonly clipboardData: FileGroup;
}

/** Per-category penalties deducted from the starting score of 100. */
export interface PenaltyBreakdown {
  disk: number;
  cache: number;
  junk: number;
  app: number;
  orphaned: number;
  privacy: number;
}

export type PenaltyCategory = keyof PenaltyBreakdown;

export type HealthRating = 'excellent' | 'good' | 'fair' | 'poor' | 'critical';

export interface ScanResult {
  readonly id: string;
  /** ISO-8601 */
  readonly timestamp: string;
  /** Integer 0-100 */
  readonly healthScore: number;
  readonly rating: HealthRating;
  readonly diskUsage?: DiskUsageSummary;
  readonly junkFiles: JunkCategory;
  readonly performanceIssues: PerformanceCategory;
  readonly appIssues: AppIssueCategory;
  readonly privacyIssues: PrivacyCategory;
  readonly breakdown: PenaltyBreakdown;
  readonly totalReclaimableSpace: number;
}

export type RecommendationType =
  | 'cache'
  | 'logs'
  | 'temp-files'
  | 'trash'
  | 'old-files'
  | 'language-files'
  | 'browser-cache'
  | 'launch-agents'
  | 'unused-apps'
  | 'duplicate-apps'
  | 'large-apps'
  | 'orphaned-files';

export interface Recommendation {
  /** Stable key derived from the finding type */
  readonly id: string;
  readonly type: RecommendationType;
  readonly category: PenaltyCategory;
  readonly title: string;
  readonly description: string;
  readonly actionable: boolean;
  /** Whether the recommendation may be applied without user review */
  readonly safeToFix: boolean;
  readonly spaceToReclaim: number;
  readonly affectedPaths: readonly string[];
  /** Score points recovered by remediating this finding alone */
  readonly scoreImpact: number;
}

export interface SmartScanReport {
  readonly result: ScanResult;
  readonly recommendations: readonly Recommendation[];
  readonly durationMs: number;
}

export interface FixResult {
  itemsFixed: number;
  spaceFreed: number;
  errors: number;
  cancelled: boolean;
}

export type StageStatus = 'completed' | 'cancelled';

export interface StageOutcome {
  stage: ScanStage;
  status: StageStatus;
  /** Cumulative progress in [0, 0.95] */
  progress: number;
}
