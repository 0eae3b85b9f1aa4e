import { ErrorCode } from './codes';
import { ErrorContext, ApiErrorResponse } from './types';

/**
 * Base error class for all conversion service errors
 *
 * Provides structured error handling with:
 * - Error codes for programmatic handling
 * - HTTP status codes for API responses
 * - Retryable flag for callers
 * - Context for debugging and logging
 */
export abstract class ConverterError extends Error {
  /** Structured error code for programmatic handling */
  abstract readonly code: ErrorCode;

  /** HTTP status code to return */
  abstract readonly statusCode: number;

  /** Whether the caller may retry the same request */
  abstract readonly retryable: boolean;

  /** Additional context for debugging and logging */
  readonly context: ErrorContext;

  /** ISO 8601 timestamp when error occurred */
  readonly timestamp: string;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for API response
   *
   * Stack traces stay in the logs: they carry host paths.
   *
   * @param correlationId - Request correlation ID for tracing
   */
  toApiResponse(correlationId: string): ApiErrorResponse {
    const context = { ...this.context };
    delete context.correlationId;

    return {
      error: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      correlationId,
      timestamp: this.timestamp,
      context: Object.keys(context).length > 0 ? context : undefined,
    };
  }
}
