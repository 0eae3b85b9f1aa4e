import { ErrorCode } from './codes';
import { ErrorContext } from './types';
import { ConverterError } from './base';

// =============================================================================
// Request Errors (4xx - Client errors, non-retryable)
// =============================================================================

/**
 * Request validation failed
 */
export class ValidationError extends ConverterError {
  readonly code = ErrorCode.VALIDATION_ERROR;
  readonly statusCode = 400;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Input document is empty or unreadable; no stage was started
 */
export class InvalidInputError extends ConverterError {
  readonly code = ErrorCode.INVALID_INPUT;
  readonly statusCode = 400;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Invalid input: ${message}`, context);
  }
}

/**
 * Upload exceeds the configured size limit
 */
export class PayloadTooLargeError extends ConverterError {
  readonly code = ErrorCode.PAYLOAD_TOO_LARGE;
  readonly statusCode = 413;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Payload too large: ${message}`, context);
  }
}

/**
 * No plan exists for the requested (input, output) pair
 */
export class UnsupportedConversionError extends ConverterError {
  readonly code = ErrorCode.UNSUPPORTED_CONVERSION;
  readonly statusCode = 422;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Unsupported conversion: ${message}`, context);
  }
}

// =============================================================================
// Engine Errors (5xx - external process failed)
// =============================================================================

/**
 * An engine process exited non-zero or produced no output
 */
export class EngineFailureError extends ConverterError {
  readonly code = ErrorCode.ENGINE_FAILURE;
  readonly statusCode = 502;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Conversion failed: ${message}`, context);
  }
}

/**
 * An engine process exceeded its stage timeout and was killed
 */
export class EngineTimeoutError extends ConverterError {
  readonly code = ErrorCode.ENGINE_TIMEOUT;
  readonly statusCode = 504;
  readonly retryable = true;

  constructor(engine: string, timeoutMs: number, context: ErrorContext = {}) {
    super(`${engine} timed out after ${timeoutMs}ms`, { ...context, engine, timeoutMs });
  }
}

/**
 * The request was cancelled (client disconnect) while a stage was running
 */
export class ConversionCancelledError extends ConverterError {
  readonly code = ErrorCode.CONVERSION_CANCELLED;
  readonly statusCode = 499;
  readonly retryable = false;

  constructor(context: ErrorContext = {}) {
    super('Conversion cancelled', context);
  }
}

// =============================================================================
// Resource Errors (503 - fatal for the request, not for the service)
// =============================================================================

/**
 * Scoped storage could not be acquired or a process could not be spawned
 */
export class ResourceError extends ConverterError {
  readonly code = ErrorCode.RESOURCE_ERROR;
  readonly statusCode = 503;
  readonly retryable = true;

  /** The message without its prefix, for re-wrapping */
  readonly reason: string;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Resource error: ${message}`, context);
    this.reason = message;
  }
}

// =============================================================================
// Configuration / Internal Errors (500 - non-retryable)
// =============================================================================

/**
 * Configuration error
 */
export class ConfigurationError extends ConverterError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;
  readonly statusCode = 500;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Configuration error: ${message}`, context);
  }
}

/**
 * Internal server error (fallback)
 */
export class InternalError extends ConverterError {
  readonly code = ErrorCode.INTERNAL_ERROR;
  readonly statusCode = 500;
  readonly retryable = false;

  constructor(message: string, context: ErrorContext = {}) {
    super(`Internal error: ${message}`, context);
  }
}
