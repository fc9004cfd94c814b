/**
 * One recommendation run: load both reports, compute, then record.
 *
 * @module lib/pricing/run
 */

import type { Logger } from '@aws-lambda-powertools/logger';

import type { RecommendationStore } from '../dynamo/recommendation-store';
import { createRunLogger, logTiming } from '../logger';
import type { ReportSource } from '../reports/report-reader';
import type { RecommendationRequest } from '../validation';
import { computeRecommendations } from './pipeline';
import { RecommendationRecorder } from './recorder';
import type { RecommendationRunResult, Strategy } from './types';

export interface RunDependencies {
  reports: ReportSource;
  store: RecommendationStore;
  /** Clock for run ids and write stamps */
  now?: () => Date;
  logger?: Logger;
}

export async function runRecommendations(
  request: RecommendationRequest,
  deps: RunDependencies
): Promise<RecommendationRunResult> {
  const now = deps.now ?? (() => new Date());
  const runId = now().toISOString();
  const log = createRunLogger({ runId }, deps.logger);
  const startTime = Date.now();

  log.info('Recommendation run started', {
    inventoryKey: request.inventory_s3_key,
    salesKey: request.sales_s3_key,
    costPriceFactor: request.cost_price_factor,
  });

  const inventory = await deps.reports.read(request.inventory_s3_key);
  const sales = await deps.reports.read(request.sales_s3_key);

  const drafts = computeRecommendations(inventory, sales, {
    runId,
    costPriceFactor: request.cost_price_factor,
  });

  log.info('Recommendations computed', {
    inventoryRows: inventory.rows.length,
    salesRows: sales.rows.length,
    joinedRows: drafts.length,
    strategies: countStrategies(drafts.map((draft) => draft.strategy)),
  });

  const recorder = new RecommendationRecorder({ store: deps.store, now, logger: log });
  const recommendations = await recorder.record(drafts);

  logTiming(log, 'recommendation-run', Date.now() - startTime, {
    skuCount: recommendations.length,
  });

  return {
    run_id: runId,
    sku_count: recommendations.length,
    recommendations,
  };
}

function countStrategies(strategies: Strategy[]): Partial<Record<Strategy, number>> {
  const counts: Partial<Record<Strategy, number>> = {};
  for (const strategy of strategies) {
    counts[strategy] = (counts[strategy] ?? 0) + 1;
  }
  return counts;
}
