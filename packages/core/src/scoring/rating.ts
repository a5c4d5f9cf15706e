// packages/core/src/scoring/rating.ts

import type { HealthRating } from '../types/scan.js';

interface RatingBand {
  readonly min: number;
  readonly rating: HealthRating;
}

/** Cut points for the findings-based score. */
export const FINDINGS_RATING_BANDS: readonly RatingBand[] = [
  { min: 90, rating: 'excellent' },
  { min: 75, rating: 'good' },
  { min: 50, rating: 'fair' },
  { min: 25, rating: 'poor' },
];

/**
 * Cut points for the live-metrics score. Fair and poor start higher than
 * in the findings table; keep the two tables separate.
 */
export const SYSTEM_RATING_BANDS: readonly RatingBand[] = [
  { min: 90, rating: 'excellent' },
  { min: 75, rating: 'good' },
  { min: 60, rating: 'fair' },
  { min: 40, rating: 'poor' },
];

function rate(bands: readonly RatingBand[], score: number): HealthRating {
  return bands.find((band) => score >= band.min)?.rating ?? 'critical';
}

export function scoreToRating(score: number): HealthRating {
  return rate(FINDINGS_RATING_BANDS, score);
}

export function systemScoreToRating(score: number): HealthRating {
  return rate(SYSTEM_RATING_BANDS, score);
}

export const RATING_DESCRIPTIONS: Readonly<Record<HealthRating, string>> = {
  excellent: 'Your system is in excellent health',
  good: 'Your system is in good condition',
  fair: 'Your system could use some optimization',
  poor: 'Your system needs attention',
  critical: 'Your system requires immediate attention',
};
