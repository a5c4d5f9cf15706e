// packages/core/src/recommendations/index.ts — barrel re-export

export {
  compareRecommendations,
  generateRecommendations,
  marginalScoreImpact,
  RecommendationGenerator,
  sortRecommendations,
} from './generator.js';
export { RECOMMENDATION_RULES } from './rules.js';
export type { RecommendationRule, RuleFinding } from './rules.js';
