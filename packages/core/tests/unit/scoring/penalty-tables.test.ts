import { describe, expect, it } from 'vitest';
import {
  CACHE_SIZE_TIERS,
  CATEGORY_WEIGHTS,
  DISK_USAGE_TIERS,
  JUNK_SIZE_TIERS,
  lookupTier,
  ORPHANED_SIZE_TIERS,
  PENALTY_ORDER,
} from '../../../src/scoring/penalty-tables.js';
import { GB, MB } from '../../../src/utils/constants.js';

describe('CATEGORY_WEIGHTS', () => {
  it('sums to 105 across the six categories', () => {
    const total = PENALTY_ORDER.reduce((sum, category) => sum + CATEGORY_WEIGHTS[category], 0);
    expect(total).toBe(105);
  });

  it('deducts in weight order', () => {
    expect(PENALTY_ORDER).toEqual(['disk', 'cache', 'junk', 'app', 'orphaned', 'privacy']);
  });
});

describe('lookupTier', () => {
  it('treats disk percentages as inclusive upper bounds', () => {
    expect(lookupTier(DISK_USAGE_TIERS, 50)).toBe(0);
    expect(lookupTier(DISK_USAGE_TIERS, 50.1)).toBe(5);
    expect(lookupTier(DISK_USAGE_TIERS, 70)).toBe(5);
    expect(lookupTier(DISK_USAGE_TIERS, 80)).toBe(10);
    expect(lookupTier(DISK_USAGE_TIERS, 90)).toBe(20);
    expect(lookupTier(DISK_USAGE_TIERS, 92)).toBe(25);
    expect(lookupTier(DISK_USAGE_TIERS, 95)).toBe(25);
    expect(lookupTier(DISK_USAGE_TIERS, 95.5)).toBe(30);
  });

  it('treats byte tiers as exclusive upper bounds', () => {
    expect(lookupTier(CACHE_SIZE_TIERS, GB - 1)).toBe(0);
    expect(lookupTier(CACHE_SIZE_TIERS, GB)).toBe(5);
    expect(lookupTier(CACHE_SIZE_TIERS, 1.5 * GB)).toBe(5);
    expect(lookupTier(CACHE_SIZE_TIERS, 2 * GB)).toBe(10);
    expect(lookupTier(CACHE_SIZE_TIERS, 10 * GB)).toBe(25);
  });

  it('maps junk and orphaned sizes', () => {
    expect(lookupTier(JUNK_SIZE_TIERS, 499 * MB)).toBe(0);
    expect(lookupTier(JUNK_SIZE_TIERS, 500 * MB)).toBe(3);
    expect(lookupTier(JUNK_SIZE_TIERS, 5 * GB)).toBe(15);
    expect(lookupTier(ORPHANED_SIZE_TIERS, 100 * MB)).toBe(2);
    expect(lookupTier(ORPHANED_SIZE_TIERS, 2 * GB)).toBe(5);
  });

  it('treats non-finite values as zero', () => {
    expect(lookupTier(DISK_USAGE_TIERS, Number.NaN)).toBe(0);
    expect(lookupTier(CACHE_SIZE_TIERS, Number.POSITIVE_INFINITY)).toBe(0);
  });
});
