// tests/helpers/fixtures.ts — Category and result builders shared by the unit tests

import {
  emptyAppIssueCategory,
  emptyJunkCategory,
  emptyPerformanceCategory,
  emptyPrivacyCategory,
} from '../../src/findings/categories.js';
import { createFileGroup } from '../../src/findings/file-group.js';
import type { ScoreInput } from '../../src/scoring/health-score.js';
import type {
  AppInfo,
  AppIssueCategory,
  DiskUsageSummary,
  FileGroup,
  JunkCategory,
  PerformanceCategory,
  PrivacyCategory,
  Recommendation,
  ScanResult,
} from '../../src/types/scan.js';

/** A group of `sizes.length` files under /data/<slug>/. */
export function sizedGroup(name: string, sizes: readonly number[]): FileGroup {
  const slug = name.toLowerCase().replace(/\s+/g, '-');
  return createFileGroup(
    name,
    `${name} fixture`,
    sizes.map((size, i) => ({ path: `/data/${slug}/${i}`, size })),
  );
}

/** A group of `count` zero-byte files. */
export function countedGroup(name: string, count: number): FileGroup {
  return sizedGroup(name, Array.from({ length: count }, () => 0));
}

export function junk(overrides: Partial<JunkCategory> = {}): JunkCategory {
  return { ...emptyJunkCategory(), ...overrides };
}

export function performance(overrides: Partial<PerformanceCategory> = {}): PerformanceCategory {
  return { ...emptyPerformanceCategory(), ...overrides };
}

export function appIssues(overrides: Partial<AppIssueCategory> = {}): AppIssueCategory {
  return { ...emptyAppIssueCategory(), ...overrides };
}

export function privacy(overrides: Partial<PrivacyCategory> = {}): PrivacyCategory {
  return { ...emptyPrivacyCategory(), ...overrides };
}

export function app(name: string, totalSize: number, path = `/Applications/${name}.app`): AppInfo {
  return { appName: name, bundleIdentifier: `test.${name.toLowerCase()}`, path, totalSize };
}

/** Disk usage at `percent` of a 1000-byte volume. */
export function diskAt(percent: number): DiskUsageSummary {
  const totalSpace = 1000;
  const usedSpace = percent * 10;
  return {
    totalSpace,
    usedSpace,
    freeSpace: totalSpace - usedSpace,
    homeDirectorySize: 0,
    cacheSize: 0,
    logSize: 0,
    tempSize: 0,
  };
}

export function scoreInput(overrides: Partial<ScoreInput> = {}): ScoreInput {
  return {
    diskUsage: diskAt(0),
    junkFiles: junk(),
    performanceIssues: performance(),
    appIssues: appIssues(),
    privacyIssues: privacy(),
    ...overrides,
  };
}

export function scanResult(overrides: Partial<ScanResult> = {}): ScanResult {
  return {
    id: 'scan_test',
    timestamp: '2026-01-01T00:00:00.000Z',
    healthScore: 100,
    rating: 'excellent',
    diskUsage: diskAt(0),
    junkFiles: junk(),
    performanceIssues: performance(),
    appIssues: appIssues(),
    privacyIssues: privacy(),
    breakdown: { disk: 0, cache: 0, junk: 0, app: 0, orphaned: 0, privacy: 0 },
    totalReclaimableSpace: 0,
    ...overrides,
  };
}

export function recommendation(overrides: Partial<Recommendation> = {}): Recommendation {
  return {
    id: 'temp-files',
    type: 'temp-files',
    category: 'junk',
    title: 'Clear Temporary Files',
    description: 'fixture',
    actionable: true,
    safeToFix: true,
    spaceToReclaim: 0,
    affectedPaths: [],
    scoreImpact: 0,
    ...overrides,
  };
}
