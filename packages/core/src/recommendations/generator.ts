// packages/core/src/recommendations/generator.ts — Threshold gating, marginal impact and ordering

import { calculatePenaltyBreakdown, type ScoreInput } from '../scoring/health-score.js';
import type { Recommendation, RecommendationType, ScanResult } from '../types/scan.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { RECOMMENDATION_RULES, type RecommendationRule } from './rules.js';

const RULE_RANK: ReadonlyMap<RecommendationType, number> = new Map(
  RECOMMENDATION_RULES.map((rule, index) => [rule.type, index]),
);

function rank(type: RecommendationType): number {
  return RULE_RANK.get(type) ?? RECOMMENDATION_RULES.length;
}

/**
 * Total order: more space first, safe before unsafe, then rule order,
 * then id. Independent of input order.
 */
export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  if (a.spaceToReclaim !== b.spaceToReclaim) return b.spaceToReclaim - a.spaceToReclaim;
  if (a.safeToFix !== b.safeToFix) return a.safeToFix ? -1 : 1;
  const byRule = rank(a.type) - rank(b.type);
  if (byRule !== 0) return byRule;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function sortRecommendations(recommendations: readonly Recommendation[]): Recommendation[] {
  return [...recommendations].sort(compareRecommendations);
}

function scoreInputOf(result: ScanResult): ScoreInput {
  return {
    diskUsage: result.diskUsage,
    junkFiles: result.junkFiles,
    performanceIssues: result.performanceIssues,
    appIssues: result.appIssues,
    privacyIssues: result.privacyIssues,
  };
}

/** Penalty points in the rule's category that remediating its finding alone would recover. */
export function marginalScoreImpact(rule: RecommendationRule, input: ScoreInput): number {
  const base = calculatePenaltyBreakdown(input)[rule.category];
  const counterfactual = calculatePenaltyBreakdown(rule.remediate(input))[rule.category];
  return Math.max(0, base - counterfactual);
}

export function generateRecommendations(result: ScanResult): Recommendation[] {
  const input = scoreInputOf(result);
  const recommendations: Recommendation[] = [];

  for (const rule of RECOMMENDATION_RULES) {
    const finding = rule.inspect(result);
    if (!(finding.magnitude > rule.threshold)) continue;

    recommendations.push(
      Object.freeze({
        id: rule.type,
        type: rule.type,
        category: rule.category,
        title: rule.title,
        description: finding.description,
        actionable: true,
        safeToFix: rule.safeToFix,
        spaceToReclaim: Math.max(0, finding.spaceToReclaim),
        affectedPaths: Object.freeze(finding.affectedPaths),
        scoreImpact: marginalScoreImpact(rule, input),
      }),
    );
  }

  return recommendations.sort(compareRecommendations);
}

export class RecommendationGenerator {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? silentLogger;
  }

  generate(result: ScanResult): Recommendation[] {
    const recommendations = generateRecommendations(result);
    this.logger.debug(`Generated ${recommendations.length} recommendations for scan ${result.id}`);
    return recommendations;
  }
}
