import type { Logger } from '@aws-lambda-powertools/logger';

import type { RecommendationStore } from '../dynamo/recommendation-store';
import { logger as defaultLogger } from '../logger';
import type { Recommendation, RecommendationDraft } from './types';

export interface RecorderOptions {
  store: RecommendationStore;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Writes recommendations one at a time, in order, stamping each with its
 * write time. The first failed write stops the run; records already written
 * stay in the store.
 */
export class RecommendationRecorder {
  private store: RecommendationStore;
  private now: () => Date;
  private logger: Logger;

  constructor(options: RecorderOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  async record(drafts: readonly RecommendationDraft[]): Promise<Recommendation[]> {
    const written: Recommendation[] = [];

    for (const draft of drafts) {
      const recommendation: Recommendation = {
        ...draft,
        created_at: this.now().toISOString(),
      };

      try {
        await this.store.put(recommendation);
      } catch (error) {
        this.logger.error('Recommendation write failed; aborting run', {
          sku: draft.sku,
          written: written.length,
          remaining: drafts.length - written.length,
          error,
        });
        throw error;
      }

      written.push(recommendation);
    }

    return written;
  }
}
