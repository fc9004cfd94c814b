// src/lib/validation.ts
import { z } from 'zod';
import { Errors } from './errors';
import { DEFAULT_COST_PRICE_FACTOR } from './pricing/metrics';

const COST_FACTOR_MESSAGE = 'cost_price_factor must be a number';

/**
 * Recommendation run request
 */
export const RecommendationRequestSchema = z.object({
  inventory_s3_key: z
    .string({ required_error: 'inventory_s3_key is required' })
    .min(1, 'inventory_s3_key is required')
    .describe('Key of the inventory CSV report in the reports bucket'),
  sales_s3_key: z
    .string({ required_error: 'sales_s3_key is required' })
    .min(1, 'sales_s3_key is required')
    .describe('Key of the sales CSV report in the reports bucket'),
  cost_price_factor: z
    .union(
      [
        z.number({ invalid_type_error: COST_FACTOR_MESSAGE }),
        z
          .string()
          .trim()
          .min(1, COST_FACTOR_MESSAGE)
          .pipe(z.coerce.number({ invalid_type_error: COST_FACTOR_MESSAGE })),
      ],
      { errorMap: () => ({ message: COST_FACTOR_MESSAGE }) }
    )
    .pipe(z.number().finite(COST_FACTOR_MESSAGE))
    .default(DEFAULT_COST_PRICE_FACTOR)
    .describe('Estimated cost as a fraction of unit price'),
});

export type RecommendationRequest = z.infer<typeof RecommendationRequestSchema>;

/**
 * Validate a run request payload
 *
 * @throws AppError (VALIDATION_ERROR) listing every failing field
 */
export function parseRecommendationRequest(payload: unknown): RecommendationRequest {
  const result = RecommendationRequestSchema.safeParse(payload);

  if (!result.success) {
    const errorMessages = result.error.issues
      .map((issue) => issue.message)
      .join('; ');
    throw Errors.validation(`Validation error: ${errorMessages}`, result.error.issues);
  }

  return result.data;
}
