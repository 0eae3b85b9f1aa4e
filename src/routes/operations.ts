import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import type { MergeRequestBody, PageSelection, SplitRequestBody } from '../types';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import { PayloadTooLargeError, ValidationError } from '../errors';
import { checkPageRange, conversionErrorResponses, decodeContent, sendDocument, withDisconnectSignal } from './shared';

const MAX_MERGE_FILES = 50;

const fileNameSchema = {
  type: 'string',
  minLength: 1,
  maxLength: 255,
  description: 'Original file name; its extension must match the operation format',
};

/**
 * Fastify JSON Schema for POST /split request validation
 */
const splitRequestSchema = {
  type: 'object',
  required: ['fileName', 'content'],
  properties: {
    fileName: fileNameSchema,
    content: { type: 'string', description: 'Base64-encoded PDF' },
    pages: {
      type: 'string',
      pattern: '^[1-9][0-9]*(-[1-9][0-9]*)?(,[1-9][0-9]*(-[1-9][0-9]*)?)*$',
      maxLength: 1024,
      description: 'Pages to keep, e.g. "1-3,5"',
    },
    firstPage: { type: 'integer', minimum: 1 },
    lastPage: { type: 'integer', minimum: 1 },
  },
  additionalProperties: false,
};

/**
 * Fastify JSON Schema for POST /merge request validation
 */
const mergeRequestSchema = {
  type: 'object',
  required: ['files'],
  properties: {
    files: {
      type: 'array',
      minItems: 2,
      maxItems: MAX_MERGE_FILES,
      items: {
        type: 'object',
        required: ['fileName', 'content'],
        properties: {
          fileName: fileNameSchema,
          content: { type: 'string', description: 'Base64-encoded PDF' },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
};

/**
 * A split needs exactly one way of choosing pages, and ranges that run forwards
 */
function checkPageSelection(selection: PageSelection): void {
  const { pages, firstPage, lastPage } = selection;
  if (pages === undefined && firstPage === undefined && lastPage === undefined) {
    throw new ValidationError('body must have pages, firstPage or lastPage');
  }
  if (pages !== undefined && (firstPage !== undefined || lastPage !== undefined)) {
    throw new ValidationError('body/pages cannot be combined with firstPage or lastPage');
  }
  checkPageRange(selection, 'body');

  for (const range of pages?.split(',') ?? []) {
    const [start, end] = range.split('-').map(Number);
    if (end !== undefined && start > end) {
      throw new ValidationError(`body/pages range ${range} runs backwards`);
    }
  }
}

/**
 * Register split and merge routes
 */
export const operationRoutes: FastifyPluginAsync = async (fastify) => {
  const { config, resolver, service } = fastify.converter;

  /**
   * POST /split - keep the selected pages of a PDF
   */
  fastify.post<{ Body: SplitRequestBody }>(
    '/split',
    {
      schema: {
        body: splitRequestSchema,
        response: conversionErrorResponses,
      },
    },
    async (request: FastifyRequest<{ Body: SplitRequestBody }>, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);

      const { fileName, pages, firstPage, lastPage } = request.body;
      const options: PageSelection = { pages, firstPage, lastPage };
      checkPageSelection(options);

      const content = decodeContent(request.body.content, config.maxUploadBytes);
      const inputFormat = resolver.formatForFileName(fileName) ?? '';

      request.log.info({ correlationId, fileName, pages, firstPage, lastPage, size: content.length }, 'Received split request');

      const document = await withDisconnectSignal(request, reply, correlationId, (signal) =>
        service.split({ fileName, content, inputFormat, options }, { correlationId, signal })
      );
      return sendDocument(reply, document);
    }
  );

  /**
   * POST /merge - join PDFs in the order given
   */
  fastify.post<{ Body: MergeRequestBody }>(
    '/merge',
    {
      schema: {
        body: mergeRequestSchema,
        response: conversionErrorResponses,
      },
    },
    async (request: FastifyRequest<{ Body: MergeRequestBody }>, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);

      const files = request.body.files.map((file, index) => ({
        fileName: file.fileName,
        content: decodeContent(file.content, config.maxUploadBytes, `body/files/${index}/content`),
        inputFormat: resolver.formatForFileName(file.fileName) ?? '',
      }));

      const total = files.reduce((sum, file) => sum + file.content.length, 0);
      if (total > config.maxUploadBytes) {
        throw new PayloadTooLargeError(`uploads total ${total} bytes, limit is ${config.maxUploadBytes}`, {
          fileSize: total,
        });
      }

      request.log.info({ correlationId, files: files.length, size: total }, 'Received merge request');

      const document = await withDisconnectSignal(request, reply, correlationId, (signal) =>
        service.merge({ files }, { correlationId, signal })
      );
      return sendDocument(reply, document);
    }
  );
};
