// packages/core/src/findings/categories.ts — Empty snapshots and category totals

import type {
  AppInfo,
  AppIssueCategory,
  JunkCategory,
  PerformanceCategory,
  PrivacyCategory,
} from '../types/scan.js';
import { createFileGroup } from './file-group.js';

export function emptyJunkCategory(): JunkCategory {
  return Object.freeze({
    tempFiles: createFileGroup('Temporary Files', 'System and application temporary files'),
    cacheFiles: createFileGroup('Cache Files', 'Application cache files'),
    logFiles: createFileGroup('Log Files', 'Application and system logs'),
    trashItems: createFileGroup('Trash', 'Items in Trash'),
    languageFiles: createFileGroup('Language Files', 'Unused localization bundles'),
    oldFiles: createFileGroup('Old Downloads', 'Downloads not modified recently'),
  });
}

export function emptyPerformanceCategory(): PerformanceCategory {
  return Object.freeze({
    launchAgents: createFileGroup('Launch Agents', 'Background launch agents'),
    loginItems: createFileGroup('Login Items', 'Items opened at login'),
    browserCaches: createFileGroup('Browser Caches', 'Web browser caches'),
    memoryIssues: Object.freeze([]),
  });
}

export function emptyAppIssueCategory(): AppIssueCategory {
  return Object.freeze({
    unusedApps: Object.freeze([]),
    largeApps: Object.freeze([]),
    duplicateApps: Object.freeze([]),
    orphanedFiles: Object.freeze([]),
  });
}

export function emptyPrivacyCategory(): PrivacyCategory {
  return Object.freeze({
    browserHistory: createFileGroup('Browser History', 'Browsing history databases'),
    downloadHistory: createFileGroup('Download History', 'Download history records'),
    recentDocuments: createFileGroup('Recent Documents', 'Recently opened document lists'),
    clipboardData: createFileGroup('Clipboard', 'Clipboard contents'),
  });
}

const JUNK_GROUPS = ['tempFiles', 'cacheFiles', 'logFiles', 'trashItems', 'languageFiles', 'oldFiles'] as const;

export function junkTotalSize(junk: JunkCategory): number {
  return JUNK_GROUPS.reduce((sum, key) => sum + junk[key].size, 0);
}

export function junkTotalFiles(junk: JunkCategory): number {
  return JUNK_GROUPS.reduce((sum, key) => sum + junk[key].count, 0);
}

export function orphanedTotalSize(apps: AppIssueCategory): number {
  return apps.orphanedFiles.reduce((sum, file) => sum + file.size, 0);
}

/** Every copy after the first, which is the one kept. */
export function duplicateExtras(apps: AppIssueCategory): AppInfo[] {
  return apps.duplicateApps.flatMap((group) => group.versions.slice(1));
}

/** Sum of app sizes, each bundle path counted once. */
export function sumUniqueApps(apps: Iterable<AppInfo>): number {
  const seen = new Set<string>();
  let total = 0;
  for (const app of apps) {
    if (seen.has(app.path)) continue;
    seen.add(app.path);
    total += Math.max(0, app.totalSize);
  }
  return total;
}

export interface ReclaimableInput {
  junkFiles?: JunkCategory;
  performanceIssues?: PerformanceCategory;
  appIssues?: AppIssueCategory;
}

/**
 * Bytes that acting on every finding would free. Launch agents, login
 * items and large apps are review-only and free nothing by themselves.
 * An app listed as both unused and as a duplicate copy is counted once.
 */
export function reclaimableBytes(input: ReclaimableInput): number {
  let total = 0;
  if (input.junkFiles) total += junkTotalSize(input.junkFiles);
  if (input.performanceIssues) total += input.performanceIssues.browserCaches.size;
  if (input.appIssues) {
    total += sumUniqueApps([...input.appIssues.unusedApps, ...duplicateExtras(input.appIssues)]);
    total += orphanedTotalSize(input.appIssues);
  }
  return total;
}

/** Number of individually flagged items across the populated categories. */
export function flaggedItemCount(input: ReclaimableInput): number {
  let total = 0;
  if (input.junkFiles) total += junkTotalFiles(input.junkFiles);
  if (input.performanceIssues) {
    const perf = input.performanceIssues;
    total += perf.launchAgents.count + perf.loginItems.count + perf.browserCaches.count;
  }
  if (input.appIssues) {
    const apps = input.appIssues;
    total += apps.unusedApps.length + apps.largeApps.length + apps.duplicateApps.length + apps.orphanedFiles.length;
  }
  return total;
}
