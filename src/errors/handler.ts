import { FastifyInstance, FastifyRequest, FastifyReply, FastifyError } from 'fastify';
import { ConverterError } from './base';
import { ErrorContext } from './types';
import {
  ValidationError,
  InvalidInputError,
  PayloadTooLargeError,
  UnsupportedConversionError,
  EngineFailureError,
  EngineTimeoutError,
  ConversionCancelledError,
  ResourceError,
  InternalError,
} from './classes';
import type { ConversionFailure } from '../types';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';

/**
 * Read the HTTP status Fastify attaches to its own errors
 * (schema validation, JSON parsing, body limit, content-type parsing)
 */
function fastifyStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('validation' in error) return 400;
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Wrap a plain Error in the appropriate ConverterError class
 *
 * @param error - The error to wrap
 * @param context - Additional context to attach
 * @returns A ConverterError subclass instance
 */
export function wrapError(error: Error, context: ErrorContext = {}): ConverterError {
  if (error instanceof ConverterError) {
    return error;
  }

  const statusCode = fastifyStatusCode(error);
  if (statusCode === 413) {
    return new PayloadTooLargeError(error.message, context);
  }
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return new ValidationError(error.message, context);
  }

  return new InternalError(error.message, context);
}

/**
 * Turn a pipeline failure value into the error the HTTP layer reports
 */
export function failureToError(failure: ConversionFailure, context: ErrorContext = {}): ConverterError {
  const stageContext: ErrorContext = {
    ...context,
    stage: failure.stage,
    engine: failure.engine,
  };

  switch (failure.kind) {
    case 'UnsupportedConversion':
      return new UnsupportedConversionError(failure.message, context);
    case 'InvalidInput':
      return new InvalidInputError(failure.message, context);
    case 'EngineTimeout':
      return new EngineTimeoutError(failure.engine ?? 'engine', failure.timeoutMs ?? 0, stageContext);
    case 'EngineFailure':
      return new EngineFailureError(failure.message, {
        ...stageContext,
        exitCode: failure.exitCode,
        diagnostic: failure.diagnostic,
      });
    case 'Cancelled':
      return new ConversionCancelledError(stageContext);
    case 'ResourceError':
      return new ResourceError(failure.message, stageContext);
  }
}

/**
 * Create a Fastify error handler that uses ConverterError
 *
 * This handler:
 * 1. Extracts correlation ID from request
 * 2. Wraps plain errors in ConverterError
 * 3. Logs with full context
 * 4. Returns structured API response
 *
 * @param app - Fastify instance for logging
 */
export function createErrorHandler(app: FastifyInstance) {
  return (error: FastifyError | ConverterError | Error, request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const converterError = wrapError(error, { correlationId });

    app.log.error(
      {
        correlationId,
        code: converterError.code,
        message: converterError.message,
        statusCode: converterError.statusCode,
        retryable: converterError.retryable,
        context: converterError.context,
        stack: converterError.stack,
      },
      'Request error'
    );

    return reply.status(converterError.statusCode).send(converterError.toApiResponse(correlationId));
  };
}
