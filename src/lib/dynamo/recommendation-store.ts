/**
 * DynamoDB-backed Recommendation Store
 *
 * Writes one item per recommendation. The table's key schema is expected to
 * be (sku, run_id); items are put as-is with floats in fixed-point form.
 *
 * @module lib/dynamo/recommendation-store
 */

import { DynamoDBClient, PutItemCommand } from '@aws-sdk/client-dynamodb';
import { marshall } from '@aws-sdk/util-dynamodb';
import type { Logger } from '@aws-lambda-powertools/logger';

import { logger as defaultLogger, logServiceCall } from '../logger';
import type { Recommendation } from '../pricing/types';
import { toFixedPointItem } from './fixed-point';

/**
 * Durable sink for recommendations
 */
export interface RecommendationStore {
  put(record: Recommendation): Promise<void>;
}

export interface DynamoRecommendationStoreConfig {
  /** DynamoDB table name */
  tableName: string;
  region?: string;
  /** Preconfigured client (optional) */
  client?: DynamoDBClient;
  logger?: Logger;
}

export class DynamoRecommendationStore implements RecommendationStore {
  private client: DynamoDBClient;
  private tableName: string;
  private logger: Logger;

  constructor(config: DynamoRecommendationStoreConfig) {
    this.tableName = config.tableName;
    this.logger = config.logger ?? defaultLogger;
    this.client = config.client ?? new DynamoDBClient({
      region: config.region ?? 'eu-west-1',
    });
  }

  /**
   * Store a single recommendation
   *
   * @throws the underlying SDK error if the write fails
   */
  async put(record: Recommendation): Promise<void> {
    const startTime = Date.now();

    try {
      await this.client.send(new PutItemCommand({
        TableName: this.tableName,
        Item: marshall(toFixedPointItem(record)),
      }));

      logServiceCall(this.logger, 'DynamoDB', 'PutItem', true, Date.now() - startTime, {
        tableName: this.tableName,
        sku: record.sku,
        runId: record.run_id,
      });
    } catch (error) {
      logServiceCall(this.logger, 'DynamoDB', 'PutItem', false, Date.now() - startTime, {
        tableName: this.tableName,
        sku: record.sku,
        runId: record.run_id,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
