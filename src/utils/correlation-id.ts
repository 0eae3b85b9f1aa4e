import { v4 as uuidv4 } from 'uuid';
import { FastifyRequest, FastifyReply } from 'fastify';

export const CORRELATION_HEADER = 'x-correlation-id';

// Correlation IDs end up in logs and response headers
const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

// One ID per request, whether the route or the error handler asks first
const assigned = new WeakMap<FastifyRequest, string>();

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Extract the caller's correlation ID, or generate one when absent or malformed
 */
export function getCorrelationId(request: FastifyRequest): string {
  const existing = assigned.get(request);
  if (existing) {
    return existing;
  }

  const headerValue = request.headers[CORRELATION_HEADER];
  const candidate = Array.isArray(headerValue) ? headerValue[0] : headerValue;
  const correlationId =
    candidate !== undefined && CORRELATION_ID_PATTERN.test(candidate)
      ? candidate
      : generateCorrelationId();

  assigned.set(request, correlationId);
  return correlationId;
}

/**
 * Add correlation ID to response headers
 */
export function setCorrelationId(reply: FastifyReply, correlationId: string): void {
  reply.header(CORRELATION_HEADER, correlationId);
}
