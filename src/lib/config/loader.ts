/**
 * Environment-backed Configuration Loader for the pricing-advisor service
 *
 * Resolves where reports are read from and where recommendations are written:
 *   REPORTS_BUCKET - S3 bucket holding inventory and sales CSV reports
 *   RECO_TABLE     - DynamoDB table receiving recommendations
 *   AWS_REGION     - region for both clients
 *   STAGE          - deployment stage
 *
 * @module config/loader
 */

import { z } from 'zod';
import { Errors } from '../errors';
import { logger } from '../logger';

// ============================================================================
// Types
// ============================================================================

const EnvSchema = z.object({
  REPORTS_BUCKET: z.string().trim().min(1).default('pricing-reports'),
  RECO_TABLE: z.string().trim().min(1).default('pricing-recommendations'),
  AWS_REGION: z.string().trim().min(1).default('eu-west-1'),
  STAGE: z.string().trim().min(1).default('dev'),
});

export interface AdvisorConfig {
  /** S3 bucket holding the raw reports */
  reportsBucket: string;
  /** DynamoDB table for recommendations */
  recommendationsTable: string;
  region: string;
  stage: string;
}

// ============================================================================
// Cache
// ============================================================================

let cachedConfig: AdvisorConfig | null = null;

// ============================================================================
// Public API
// ============================================================================

/**
 * Load service configuration from environment variables
 *
 * The first successful load is cached for the lifetime of the container.
 *
 * @throws AppError (CONFIG_ERROR) if a variable is present but blank
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AdvisorConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = EnvSchema.safeParse({
    REPORTS_BUCKET: env.REPORTS_BUCKET,
    RECO_TABLE: env.RECO_TABLE,
    AWS_REGION: env.AWS_REGION,
    STAGE: env.STAGE,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw Errors.config(`Invalid configuration: ${issues}`, parsed.error.issues);
  }

  cachedConfig = {
    reportsBucket: parsed.data.REPORTS_BUCKET,
    recommendationsTable: parsed.data.RECO_TABLE,
    region: parsed.data.AWS_REGION,
    stage: parsed.data.STAGE,
  };

  logger.info('Configuration loaded', { ...cachedConfig });

  return cachedConfig;
}

/**
 * Clear the configuration cache
 */
export function resetConfigCache(): void {
  cachedConfig = null;
}
