// packages/core/src/scoring/score-calculator.ts — Injectable facade over the scoring functions

import type { SystemMetrics, SystemScore } from '../types/metrics.js';
import type { HealthRating } from '../types/scan.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { calculateHealthScore, type HealthScore, type ScoreInput } from './health-score.js';
import { scoreToRating, systemScoreToRating } from './rating.js';
import { calculateSystemScore } from './system-score.js';

/** Stateless; every method is a pure function of its arguments. */
export class ScoreCalculator {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? silentLogger;
  }

  score(input: ScoreInput): HealthScore {
    const result = calculateHealthScore(input);
    const b = result.breakdown;
    this.logger.debug(
      `Health score ${result.score}: disk=${b.disk} cache=${b.cache} junk=${b.junk} app=${b.app} orphaned=${b.orphaned} privacy=${b.privacy}`,
    );
    return result;
  }

  rating(score: number): HealthRating {
    return scoreToRating(score);
  }

  systemScore(metrics: SystemMetrics): SystemScore {
    return calculateSystemScore(metrics);
  }

  systemRating(score: number): HealthRating {
    return systemScoreToRating(score);
  }
}
