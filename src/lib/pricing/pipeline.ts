/**
 * Recommendation pipeline: normalize → join → compute → classify
 *
 * Pure over its inputs; persistence happens afterwards in the recorder.
 *
 * @module lib/pricing/pipeline
 */

import { truncate } from './coercion';
import { innerJoinOnSku } from './joiner';
import { DEFAULT_COST_PRICE_FACTOR, deriveMetrics, readItemFigures } from './metrics';
import { normalizeTable } from './normalizer';
import { evaluateRules } from './rules';
import { buildRecommendation } from './recommendation';
import type { RecommendationDraft, Table } from './types';

export interface PipelineOptions {
  runId: string;
  costPriceFactor?: number;
}

export function computeRecommendations(
  inventory: Table,
  sales: Table,
  options: PipelineOptions
): RecommendationDraft[] {
  const costPriceFactor = options.costPriceFactor ?? DEFAULT_COST_PRICE_FACTOR;

  const joined = innerJoinOnSku(normalizeTable(inventory), normalizeTable(sales));

  // every row parses before any is classified
  const items = joined.rows.map((row, index) => readItemFigures(row, index));

  return items.map((figures) => {
    const metrics = deriveMetrics(figures.orderedProductSales, figures.unitsOrdered, costPriceFactor);
    const outcome = evaluateRules(
      {
        available: figures.available,
        unitsOrdered: truncate(figures.unitsOrdered),
        grossProfitPerUnit: metrics.grossProfitPerUnit,
      }
    );
    return buildRecommendation(options.runId, figures, metrics, outcome);
  });
}
