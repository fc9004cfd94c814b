/**
 * Pricing recommendation pipeline
 *
 * @module lib/pricing
 */

export { computeRecommendations, type PipelineOptions } from './pipeline';
export { runRecommendations, type RunDependencies } from './run';
export { RecommendationRecorder, type RecorderOptions } from './recorder';
export { evaluateRules, PRICING_RULES, DEFAULT_OUTCOME, type PricingRule } from './rules';
export { deriveMetrics, readItemFigures, DEFAULT_COST_PRICE_FACTOR } from './metrics';
export { innerJoinOnSku } from './joiner';
export { normalizeTable, normalizeHeader } from './normalizer';
export { parseCurrency, coerceNumber } from './coercion';
export type * from './types';
