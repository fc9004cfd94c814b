/**
 * Report Reader
 *
 * Loads inventory and sales CSV reports from S3 and parses them into tables.
 *
 * @module lib/reports/report-reader
 */

import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import type { Logger } from '@aws-lambda-powertools/logger';

import { Errors } from '../errors';
import { logger as defaultLogger, logServiceCall } from '../logger';
import type { Table } from '../pricing/types';
import { parseCsvTable } from './csv-table';

/**
 * Source of raw tabular reports
 */
export interface ReportSource {
  read(key: string): Promise<Table>;
}

export interface S3ReportReaderConfig {
  /** S3 bucket holding the reports */
  bucket: string;
  region?: string;
  /** Preconfigured client (optional) */
  client?: S3Client;
  logger?: Logger;
}

export class S3ReportReader implements ReportSource {
  private client: S3Client;
  private bucket: string;
  private logger: Logger;

  constructor(config: S3ReportReaderConfig) {
    this.bucket = config.bucket;
    this.logger = config.logger ?? defaultLogger;
    this.client = config.client ?? new S3Client({
      region: config.region ?? 'eu-west-1',
    });
  }

  /**
   * Fetch `key` from the reports bucket and parse it as CSV
   */
  async read(key: string): Promise<Table> {
    const startTime = Date.now();

    let text: string;
    try {
      const response = await this.client.send(new GetObjectCommand({
        Bucket: this.bucket,
        Key: key,
      }));

      if (!response.Body) {
        throw Errors.dependency('S3', `Empty response body for s3://${this.bucket}/${key}`);
      }

      text = await response.Body.transformToString('utf-8');
    } catch (error) {
      logServiceCall(this.logger, 'S3', 'GetObject', false, Date.now() - startTime, {
        bucket: this.bucket,
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    logServiceCall(this.logger, 'S3', 'GetObject', true, Date.now() - startTime, {
      bucket: this.bucket,
      key,
      bytes: Buffer.byteLength(text, 'utf-8'),
    });

    const table = parseCsvTable(text, `s3://${this.bucket}/${key}`);

    this.logger.info('Report loaded', {
      key,
      columns: table.columns.length,
      rows: table.rows.length,
    });

    return table;
  }
}
