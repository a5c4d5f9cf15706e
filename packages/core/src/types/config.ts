// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export type PresetName = 'default' | 'aggressive';

/** Which finding types a scan collects. */
export interface ScanTargets {
  tempFiles: boolean;
  cacheFiles: boolean;
  logFiles: boolean;
  trash: boolean;
  languageFiles: boolean;
  oldFiles: boolean;
  launchAgents: boolean;
  loginItems: boolean;
  browserData: boolean;
  orphanedFiles: boolean;
  apps: boolean;
  privacy: boolean;
}

/** Directory lists; a leading `~` expands to the home directory. */
export interface ScanDirectories {
  temp: string[];
  caches: string[];
  logs: string[];
  trash: string[];
  downloads: string[];
  applications: string[];
  applicationSupport: string[];
  launchAgents: string[];
  loginItems: string[];
  browserCaches: string[];
  browserHistory: string[];
  downloadHistory: string[];
  recentDocuments: string[];
}

export interface ScanConfig {
  targets: ScanTargets;
  directories: ScanDirectories;
  oldFileThresholdDays: number;
  unusedAppThresholdDays: number;
  largeAppBytes: number;
  minOrphanBytes: number;
  /** gitignore-style patterns relative to each scanned directory */
  exclude: string[];
}

export interface FixConfig {
  dryRun: boolean;
}

export interface HistoryConfig {
  enabled: boolean;
  maxEntries: number;
}

export interface AdvancedConfig {
  logLevel: LogLevel;
}

export interface DiskcareConfig {
  configVersion?: number;
  /** Preset layered under the file's own values */
  preset?: PresetName;
  scan: ScanConfig;
  fix: FixConfig;
  history: HistoryConfig;
  advanced: AdvancedConfig;
}
