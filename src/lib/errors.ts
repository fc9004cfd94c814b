/**
 * Standardized Error Handling for the pricing-advisor service
 *
 * Every fatal condition in a run is raised as an AppError and propagates,
 * unrecovered, to the handler boundary. The boundary reduces it to a single
 * flat message.
 *
 * @module lib/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Caller errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Run errors
  PARSE_ERROR = 'PARSE_ERROR',
  JOIN_ERROR = 'JOIN_ERROR',
  STORAGE_ERROR = 'STORAGE_ERROR',
  DEPENDENCY_ERROR = 'DEPENDENCY_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Application error with code and details
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
  }
}

// ============================================================================
// Convenience Error Creators
// ============================================================================

export const Errors = {
  validation: (message: string, details?: unknown) =>
    new AppError(ErrorCode.VALIDATION_ERROR, message, details),

  parse: (field: string, value: string, row?: number) =>
    new AppError(
      ErrorCode.PARSE_ERROR,
      `Could not parse '${field}' value '${value}' as a number`,
      { field, value, row }
    ),

  malformedReport: (source: string, message: string) =>
    new AppError(ErrorCode.PARSE_ERROR, `Could not read ${source} as CSV: ${message}`, { source }),

  missingColumn: (column: string, table: string) =>
    new AppError(
      ErrorCode.JOIN_ERROR,
      `Column '${column}' not found in ${table} report`,
      { column, table }
    ),

  storage: (message: string, details?: unknown) =>
    new AppError(ErrorCode.STORAGE_ERROR, message, details),

  dependency: (service: string, message: string) =>
    new AppError(
      ErrorCode.DEPENDENCY_ERROR,
      `${service} service error: ${message}`,
      { service }
    ),

  config: (message: string, details?: unknown) =>
    new AppError(ErrorCode.CONFIG_ERROR, message, details),
};

/**
 * Reduce any thrown value to the flat message shown to callers
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
