// packages/core/src/scoring/health-score.ts — Findings-based health score

import { junkTotalFiles, junkTotalSize, orphanedTotalSize } from '../findings/categories.js';
import type {
  AppIssueCategory,
  DiskUsageSummary,
  JunkCategory,
  PenaltyBreakdown,
  PerformanceCategory,
  PrivacyCategory,
} from '../types/scan.js';
import { UNKNOWN_DISK_PENALTY } from '../utils/constants.js';
import {
  APP_PENALTY_RULES,
  CACHE_SIZE_TIERS,
  CATEGORY_WEIGHTS,
  DISK_USAGE_TIERS,
  JUNK_COUNT_MAX,
  JUNK_FILES_PER_POINT,
  JUNK_SIZE_TIERS,
  lookupTier,
  ORPHAN_COUNT_MAX,
  ORPHANED_SIZE_TIERS,
  ORPHANS_PER_POINT,
  PENALTY_ORDER,
  PRIVACY_RULES,
} from './penalty-tables.js';

export interface ScoreInput {
  diskUsage?: DiskUsageSummary;
  junkFiles: JunkCategory;
  performanceIssues: PerformanceCategory;
  appIssues: AppIssueCategory;
  privacyIssues?: PrivacyCategory;
}

export interface HealthScore {
  /** Integer 0-100 */
  score: number;
  breakdown: PenaltyBreakdown;
}

export function diskUsedPercent(usage: DiskUsageSummary): number {
  if (usage.totalSpace <= 0) return 0;
  return (usage.usedSpace / usage.totalSpace) * 100;
}

export function diskPenalty(usage: DiskUsageSummary | undefined): number {
  if (!usage) return UNKNOWN_DISK_PENALTY;
  return lookupTier(DISK_USAGE_TIERS, diskUsedPercent(usage));
}

export function cachePenalty(performance: PerformanceCategory): number {
  return Math.min(lookupTier(CACHE_SIZE_TIERS, performance.browserCaches.size), CATEGORY_WEIGHTS.cache);
}

export function junkPenalty(junk: JunkCategory): number {
  const sizePart = lookupTier(JUNK_SIZE_TIERS, junkTotalSize(junk));
  const countPart = Math.min(Math.floor(junkTotalFiles(junk) / JUNK_FILES_PER_POINT), JUNK_COUNT_MAX);
  return Math.min(sizePart + countPart, CATEGORY_WEIGHTS.junk);
}

function capped(count: number, rule: { perItem: number; max: number }): number {
  return Math.min(count * rule.perItem, rule.max);
}

export function appPenalty(apps: AppIssueCategory): number {
  const total =
    capped(apps.unusedApps.length, APP_PENALTY_RULES.unused) +
    capped(apps.largeApps.length, APP_PENALTY_RULES.large) +
    capped(apps.duplicateApps.length, APP_PENALTY_RULES.duplicate);
  return Math.min(total, CATEGORY_WEIGHTS.app);
}

export function orphanedPenalty(apps: AppIssueCategory): number {
  const countPart = Math.min(Math.floor(apps.orphanedFiles.length / ORPHANS_PER_POINT), ORPHAN_COUNT_MAX);
  const sizePart = lookupTier(ORPHANED_SIZE_TIERS, orphanedTotalSize(apps));
  return Math.min(countPart + sizePart, CATEGORY_WEIGHTS.orphaned);
}

export function privacyPenalty(privacy: PrivacyCategory | undefined): number {
  if (!privacy) return 0;
  let total = 0;
  if (privacy.browserHistory.size > PRIVACY_RULES.browserHistory.over) total += PRIVACY_RULES.browserHistory.penalty;
  if (privacy.downloadHistory.size > PRIVACY_RULES.downloadHistory.over) total += PRIVACY_RULES.downloadHistory.penalty;
  return Math.min(total, CATEGORY_WEIGHTS.privacy);
}

/** Each category's penalty on its own, before the shared 100-point budget is applied. */
export function rawPenalties(input: ScoreInput): PenaltyBreakdown {
  return {
    disk: diskPenalty(input.diskUsage),
    cache: cachePenalty(input.performanceIssues),
    junk: junkPenalty(input.junkFiles),
    app: appPenalty(input.appIssues),
    orphaned: orphanedPenalty(input.appIssues),
    privacy: privacyPenalty(input.privacyIssues),
  };
}

/**
 * Penalties as deducted. Categories draw from a budget of 100 points in
 * PENALTY_ORDER, so the breakdown always sums to at most 100.
 */
export function calculatePenaltyBreakdown(input: ScoreInput): PenaltyBreakdown {
  const raw = rawPenalties(input);
  const applied: PenaltyBreakdown = { disk: 0, cache: 0, junk: 0, app: 0, orphaned: 0, privacy: 0 };
  let remaining = 100;
  for (const category of PENALTY_ORDER) {
    const penalty = Math.min(raw[category], remaining);
    applied[category] = penalty;
    remaining -= penalty;
  }
  return applied;
}

export function totalPenalty(breakdown: PenaltyBreakdown): number {
  return PENALTY_ORDER.reduce((sum, category) => sum + breakdown[category], 0);
}

export function calculateHealthScore(input: ScoreInput): HealthScore {
  const breakdown = calculatePenaltyBreakdown(input);
  const score = Math.max(0, Math.min(100, 100 - totalPenalty(breakdown)));
  return { score, breakdown };
}
