/**
 * Structured error codes for programmatic error handling
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR
 *
 * Categories:
 * - CONVERSION_* / ENGINE_* : pipeline and external engine errors
 * - INVALID_* / VALIDATION_* : request and input errors
 * - RESOURCE_* : scoped storage and process spawning
 * - INTERNAL_* : internal server errors
 */
export enum ErrorCode {
  // Request errors (4xx - client errors, non-retryable)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  UNSUPPORTED_CONVERSION = 'UNSUPPORTED_CONVERSION',

  // Engine errors (5xx - bad gateway / gateway timeout)
  ENGINE_FAILURE = 'ENGINE_FAILURE',
  ENGINE_TIMEOUT = 'ENGINE_TIMEOUT',

  // Request lifecycle
  CONVERSION_CANCELLED = 'CONVERSION_CANCELLED',

  // Resource errors (503 - fatal for the request, not the service)
  RESOURCE_ERROR = 'RESOURCE_ERROR',

  // Configuration errors (500 - non-retryable)
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // Internal errors (500 - non-retryable)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
