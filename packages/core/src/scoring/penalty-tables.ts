// packages/core/src/scoring/penalty-tables.ts — Tiered penalty lookup tables

import type { PenaltyBreakdown, PenaltyCategory } from '../types/scan.js';
import { GB, MB } from '../utils/constants.js';

/** Maximum penalty each category can contribute. */
export const CATEGORY_WEIGHTS: Readonly<PenaltyBreakdown> = Object.freeze({
  disk: 30,
  cache: 25,
  junk: 20,
  app: 15,
  orphaned: 10,
  privacy: 5,
});

/** Order in which penalties are deducted from the score. */
export const PENALTY_ORDER: readonly PenaltyCategory[] = ['disk', 'cache', 'junk', 'app', 'orphaned', 'privacy'];

export interface Tier {
  readonly upTo: number;
  readonly penalty: number;
}

/**
 * Sorted breakpoints. The first tier whose bound admits the value wins;
 * values past the last tier get `above`.
 */
export interface TierTable {
  /** 'inclusive': value <= upTo, 'exclusive': value < upTo */
  readonly bound: 'inclusive' | 'exclusive';
  readonly tiers: readonly Tier[];
  readonly above: number;
}

export function lookupTier(table: TierTable, value: number): number {
  const v = Number.isFinite(value) ? value : 0;
  for (const tier of table.tiers) {
    const admitted = table.bound === 'inclusive' ? v <= tier.upTo : v < tier.upTo;
    if (admitted) return tier.penalty;
  }
  return table.above;
}

/** Used-space percentage. */
export const DISK_USAGE_TIERS: TierTable = {
  bound: 'inclusive',
  tiers: [
    { upTo: 50, penalty: 0 },
    { upTo: 70, penalty: 5 },
    { upTo: 80, penalty: 10 },
    { upTo: 90, penalty: 20 },
    { upTo: 95, penalty: 25 },
  ],
  above: 30,
};

/** Browser cache bytes. */
export const CACHE_SIZE_TIERS: TierTable = {
  bound: 'exclusive',
  tiers: [
    { upTo: 1 * GB, penalty: 0 },
    { upTo: 2 * GB, penalty: 5 },
    { upTo: 5 * GB, penalty: 10 },
    { upTo: 10 * GB, penalty: 15 },
  ],
  above: 25,
};

/** Total junk bytes. */
export const JUNK_SIZE_TIERS: TierTable = {
  bound: 'exclusive',
  tiers: [
    { upTo: 500 * MB, penalty: 0 },
    { upTo: 1 * GB, penalty: 3 },
    { upTo: 5 * GB, penalty: 8 },
    { upTo: 10 * GB, penalty: 15 },
  ],
  above: 20,
};

/** Junk files per count point, and the most points the count can add. */
export const JUNK_FILES_PER_POINT = 1000;
export const JUNK_COUNT_MAX = 5;

/** Total orphaned bytes. */
export const ORPHANED_SIZE_TIERS: TierTable = {
  bound: 'exclusive',
  tiers: [
    { upTo: 100 * MB, penalty: 0 },
    { upTo: 500 * MB, penalty: 2 },
    { upTo: 1 * GB, penalty: 4 },
  ],
  above: 5,
};

export const ORPHANS_PER_POINT = 5;
export const ORPHAN_COUNT_MAX = 5;

/** Per-entity multipliers and caps for the app penalty. */
export const APP_PENALTY_RULES = {
  unused: { perItem: 2, max: 5 },
  large: { perItem: 1, max: 5 },
  duplicate: { perItem: 3, max: 5 },
} as const;

export const PRIVACY_RULES = {
  browserHistory: { over: 100 * MB, penalty: 2 },
  downloadHistory: { over: 1 * GB, penalty: 2 },
} as const;
