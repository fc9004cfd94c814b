// Lambda entry points for the pricing-advisor service.

export { handler as recommend } from './handlers/recommendations-handler';
export type { GatewayResponse, RecommendationsResult } from './handlers/recommendations-handler';
export type { Recommendation, RecommendationRunResult } from './lib/pricing/types';
