/**
 * Recommendations Handler - pricing and advertising recommendations per SKU
 *
 * Joins an inventory report and a sales report from S3, classifies every
 * matched SKU, writes the recommendations to DynamoDB and returns them.
 *
 * Invocation:
 * - API Gateway (REST or HTTP API): JSON body
 *   { inventory_s3_key, sales_s3_key, cost_price_factor? }
 *   → 200 { run_id, sku_count, recommendations } or 500 { error }
 * - Direct invoke: the event is the payload; the result is returned as-is
 *   and failures are rethrown to the caller.
 *
 * @module handlers/recommendations-handler
 */

import type { Context } from 'aws-lambda';
import type { Logger } from '@aws-lambda-powertools/logger';

import { loadConfig } from '../lib/config/loader';
import { DynamoRecommendationStore } from '../lib/dynamo/recommendation-store';
import { Errors, toErrorMessage } from '../lib/errors';
import { logger as defaultLogger } from '../lib/logger';
import {
  runRecommendations,
  type RecommendationRunResult,
  type RunDependencies,
} from '../lib/pricing';
import { S3ReportReader } from '../lib/reports/report-reader';
import { parseRecommendationRequest } from '../lib/validation';

/**
 * Lambda proxy response
 */
export interface GatewayResponse {
  statusCode: number;
  headers?: Record<string, string>;
  body: string;
}

export type RecommendationsResult = RecommendationRunResult | GatewayResponse;

interface GatewayEvent {
  body?: unknown;
  isBase64Encoded?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Gateway events carry an HTTP method: `httpMethod` (REST API, even when null)
 * or `requestContext.http.method` (HTTP API)
 */
export function isGatewayEvent(event: unknown): event is GatewayEvent {
  if (!isRecord(event)) return false;
  if ('httpMethod' in event) return true;
  return isRecord(event.requestContext) && isRecord(event.requestContext.http);
}

/**
 * Extract the run request payload from either invocation shape
 */
export function extractPayload(event: unknown): unknown {
  if (!isGatewayEvent(event)) {
    return event;
  }

  const { body } = event;
  if (body === undefined || body === null) {
    return {};
  }
  if (typeof body !== 'string') {
    return body;
  }

  const text = event.isBase64Encoded ? Buffer.from(body, 'base64').toString('utf-8') : body;
  if (text.trim() === '') {
    return {};
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw Errors.validation(`Invalid JSON in request body: ${toErrorMessage(error)}`);
  }
}

function buildSuccessResponse(result: RecommendationRunResult): GatewayResponse {
  return {
    statusCode: 200,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(result),
  };
}

function buildErrorResponse(error: unknown): GatewayResponse {
  return {
    statusCode: 500,
    body: JSON.stringify({ error: toErrorMessage(error) }),
  };
}

type DependencyProvider = () => RunDependencies;

/**
 * Build a handler over explicit collaborators. Pass a provider to defer
 * construction to the first invocation.
 */
export function createRecommendationsHandler(
  dependencies: RunDependencies | DependencyProvider
) {
  const resolve: DependencyProvider =
    typeof dependencies === 'function' ? dependencies : () => dependencies;

  return async function recommendations(
    event: unknown,
    context?: Pick<Context, 'awsRequestId'>
  ): Promise<RecommendationsResult> {
    const gateway = isGatewayEvent(event);
    let log: Logger = defaultLogger;

    try {
      const deps = resolve();
      log = (deps.logger ?? defaultLogger).createChild();
      log.appendKeys({
        requestId: context?.awsRequestId,
        invocation: gateway ? 'gateway' : 'direct',
      });

      const request = parseRecommendationRequest(extractPayload(event));
      const result = await runRecommendations(request, { ...deps, logger: log });

      return gateway ? buildSuccessResponse(result) : result;
    } catch (error) {
      log.error('Recommendation run failed', {
        error: toErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });

      if (gateway) {
        return buildErrorResponse(error);
      }
      throw error;
    }
  };
}

// Collaborators persist across warm invocations
let defaultDependencies: RunDependencies | null = null;

export function getDefaultDependencies(): RunDependencies {
  if (!defaultDependencies) {
    const config = loadConfig();
    defaultDependencies = {
      reports: new S3ReportReader({ bucket: config.reportsBucket, region: config.region }),
      store: new DynamoRecommendationStore({
        tableName: config.recommendationsTable,
        region: config.region,
      }),
    };
  }
  return defaultDependencies;
}

/**
 * Clear cached collaborators
 */
export function resetDefaultDependencies(): void {
  defaultDependencies = null;
}

/**
 * Lambda handler wired to S3 and DynamoDB from environment configuration
 */
export const handler = createRecommendationsHandler(getDefaultDependencies);
