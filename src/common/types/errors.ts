/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Infrastructure errors (database, redis, timeouts)
 */
export interface InfraError extends AppError {
  readonly retryable: boolean;
}

/**
 * Extracts a log-friendly message from an unknown thrown value.
 */
export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
