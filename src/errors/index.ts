/**
 * Error handling module
 *
 * ```typescript
 * import { EngineTimeoutError, failureToError, wrapError } from './errors';
 *
 * // Throw a typed error
 * throw new EngineTimeoutError('soffice', 120000, { correlationId, stage: 0 });
 *
 * // Report a pipeline failure value
 * if (!result.ok) throw failureToError(result.failure, { correlationId });
 * ```
 */

export { ErrorCode } from './codes';

export type { ErrorContext, ApiErrorResponse } from './types';

export { ConverterError } from './base';

export {
  // Request errors
  ValidationError,
  InvalidInputError,
  PayloadTooLargeError,
  UnsupportedConversionError,
  // Engine errors
  EngineFailureError,
  EngineTimeoutError,
  ConversionCancelledError,
  // Resource errors
  ResourceError,
  // Configuration / internal errors
  ConfigurationError,
  InternalError,
} from './classes';

export { wrapError, failureToError, createErrorHandler } from './handler';
