/**
 * Structured Logging for the pricing-advisor service
 *
 * Wraps the Lambda Powertools logger so every module logs CloudWatch Insights
 * compatible JSON with the same service attributes. Level is taken from
 * POWERTOOLS_LOG_LEVEL.
 *
 * @module lib/logger
 */

import { Logger } from '@aws-lambda-powertools/logger';

export const logger = new Logger({
  serviceName: 'pricing-advisor',
  persistentLogAttributes: {
    environment: process.env.STAGE || 'dev',
  },
});

/**
 * Request context for structured logging
 */
export interface LogContext {
  runId?: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * Create a child logger carrying run-specific context.
 * Use this at the start of each invocation.
 */
export function createRunLogger(context: LogContext, parent: Logger = logger): Logger {
  const child = parent.createChild();
  child.appendKeys({ ...context });
  return child;
}

/**
 * Log timing metrics for performance analysis
 */
export function logTiming(
  log: Logger,
  operation: string,
  durationMs: number,
  attributes?: Record<string, unknown>
): void {
  log.info(`Timing: ${operation}`, {
    operation,
    durationMs,
    ...attributes,
  });
}

/**
 * Log external service calls
 */
export function logServiceCall(
  log: Logger,
  service: string,
  operation: string,
  success: boolean,
  durationMs?: number,
  attributes?: Record<string, unknown>
): void {
  const data = {
    service,
    operation,
    success,
    durationMs,
    ...attributes,
  };

  if (success) {
    log.debug(`Service call: ${service}.${operation}`, data);
  } else {
    log.warn(`Service call: ${service}.${operation}`, data);
  }
}
