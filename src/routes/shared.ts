import { FastifyRequest, FastifyReply } from 'fastify';
import type { ConversionOptions, ConvertedDocument } from '../types';
import { PayloadTooLargeError, ValidationError } from '../errors';
import { planLabel } from '../convert';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export const errorResponseSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    code: { type: 'string' },
    message: { type: 'string' },
    statusCode: { type: 'number' },
    correlationId: { type: 'string' },
    timestamp: { type: 'string' },
    context: { type: 'object', additionalProperties: true },
  },
};

/** Error statuses every conversion route can answer with */
export const conversionErrorResponses = {
  400: errorResponseSchema,
  413: errorResponseSchema,
  422: errorResponseSchema,
  499: errorResponseSchema,
  500: errorResponseSchema,
  502: errorResponseSchema,
  503: errorResponseSchema,
  504: errorResponseSchema,
};

/**
 * Decode a base64 upload, enforcing `maxUploadBytes` on the decoded bytes
 *
 * @param field - Body location named in validation errors
 */
export function decodeContent(content: string, maxUploadBytes: number, field = 'body/content'): Buffer {
  const compact = content.replace(/\s+/g, '');
  if (compact.length % 4 === 1 || !BASE64.test(compact)) {
    throw new ValidationError(`${field} must be base64-encoded`);
  }

  const bytes = Buffer.from(compact, 'base64');
  if (bytes.length > maxUploadBytes) {
    throw new PayloadTooLargeError(`upload is ${bytes.length} bytes, limit is ${maxUploadBytes}`, {
      fileSize: bytes.length,
    });
  }
  return bytes;
}

export function checkPageRange(options: ConversionOptions, location = 'body/options'): void {
  if (options.firstPage !== undefined && options.lastPage !== undefined && options.firstPage > options.lastPage) {
    throw new ValidationError(`${location}/firstPage must not be greater than lastPage`);
  }
}

/**
 * Run `fn` with a signal that aborts when the client disconnects before the
 * response has been written
 */
export async function withDisconnectSignal<T>(
  request: FastifyRequest,
  reply: FastifyReply,
  correlationId: string,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const onClose = (): void => {
    if (!reply.raw.writableFinished) {
      request.log.warn({ correlationId }, 'Client disconnected, cancelling conversion');
      controller.abort();
    }
  };
  reply.raw.once('close', onClose);

  try {
    return await fn(controller.signal);
  } finally {
    reply.raw.removeListener('close', onClose);
  }
}

/**
 * Send a converted document as a download
 */
export function sendDocument(reply: FastifyReply, document: ConvertedDocument): FastifyReply {
  reply
    .code(200)
    .header('content-type', document.mediaType)
    .header('content-disposition', `attachment; filename="${document.fileName}"`)
    .header('x-conversion-plan', planLabel(document.plan));
  if (document.sequence) {
    reply.header('x-page-count', String(document.pageCount));
  }
  return reply.send(document.body);
}
