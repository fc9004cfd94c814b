import { roundTo, truncate } from './coercion';
import type { DerivedMetrics, ItemFigures, RecommendationDraft, RuleOutcome } from './types';

/**
 * Shape one classified item into the record that is returned and persisted
 */
export function buildRecommendation(
  runId: string,
  figures: ItemFigures,
  metrics: DerivedMetrics,
  outcome: RuleOutcome
): RecommendationDraft {
  return {
    run_id: runId,
    sku: figures.sku,
    product_name: figures.productName,
    available: figures.available,
    units_ordered: truncate(figures.unitsOrdered),
    current_price: roundTo(metrics.pricePerUnit, 2),
    gross_profit_unit: roundTo(metrics.grossProfitPerUnit, 2),
    strategy: outcome.strategy,
    price_action: outcome.priceAction,
    price_change_pct: roundTo(outcome.priceChangePct, 3),
    ad_action: outcome.adAction,
    reason: outcome.reason,
  };
}
