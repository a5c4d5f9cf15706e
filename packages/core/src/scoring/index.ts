// packages/core/src/scoring/index.ts — barrel re-export

export {
  APP_PENALTY_RULES,
  CACHE_SIZE_TIERS,
  CATEGORY_WEIGHTS,
  DISK_USAGE_TIERS,
  JUNK_SIZE_TIERS,
  lookupTier,
  ORPHANED_SIZE_TIERS,
  PENALTY_ORDER,
  PRIVACY_RULES,
} from './penalty-tables.js';
export type { Tier, TierTable } from './penalty-tables.js';
export {
  appPenalty,
  cachePenalty,
  calculateHealthScore,
  calculatePenaltyBreakdown,
  diskPenalty,
  diskUsedPercent,
  junkPenalty,
  orphanedPenalty,
  privacyPenalty,
  rawPenalties,
  totalPenalty,
} from './health-score.js';
export type { HealthScore, ScoreInput } from './health-score.js';
export {
  calculateSystemScore,
  CPU_RULE,
  DISK_IO_RULE,
  DISK_RULE,
  HEALTHY_SYSTEM_MESSAGE,
  linearPenalty,
  MEMORY_PRESSURE_PENALTIES,
  MEMORY_RULE,
  thermalPenalty,
} from './system-score.js';
export type { LinearMetricRule } from './system-score.js';
export {
  FINDINGS_RATING_BANDS,
  RATING_DESCRIPTIONS,
  scoreToRating,
  SYSTEM_RATING_BANDS,
  systemScoreToRating,
} from './rating.js';
export { ScoreCalculator } from './score-calculator.js';
