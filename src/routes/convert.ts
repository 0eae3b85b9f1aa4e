import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import type { ConversionOptions, ConvertRequestBody, FormatsResponse } from '../types';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import { UnsupportedConversionError } from '../errors';
import { checkPageRange, conversionErrorResponses, decodeContent, sendDocument, withDisconnectSignal } from './shared';

/**
 * Fastify JSON Schema for POST /convert request validation
 */
const convertRequestSchema = {
  type: 'object',
  required: ['fileName', 'content', 'outputFormat'],
  properties: {
    fileName: {
      type: 'string',
      minLength: 1,
      maxLength: 255,
      description: 'Original file name; its extension gives the input format when inputFormat is absent',
    },
    content: {
      type: 'string',
      description: 'Base64-encoded document',
    },
    outputFormat: {
      type: 'string',
      minLength: 1,
      description: 'Target format tag, extension or alias (pdf, png, jpeg, ...)',
    },
    inputFormat: {
      type: 'string',
      minLength: 1,
      description: 'Input format tag; overrides the file name extension',
    },
    options: {
      type: 'object',
      properties: {
        dpi: { type: 'integer', minimum: 1, maximum: 1200 },
        quality: { type: 'integer', minimum: 1, maximum: 100 },
        pageSize: { type: 'string', enum: ['A3', 'A4', 'A5', 'Letter', 'Legal'] },
        firstPage: { type: 'integer', minimum: 1 },
        lastPage: { type: 'integer', minimum: 1 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

/**
 * Register conversion routes
 */
export const convertRoutes: FastifyPluginAsync = async (fastify) => {
  const { config, resolver, service } = fastify.converter;

  /**
   * POST /convert - convert one document
   *
   * Responds with the converted bytes. Page sequences come back as a zip.
   */
  fastify.post<{ Body: ConvertRequestBody }>(
    '/convert',
    {
      schema: {
        body: convertRequestSchema,
        response: conversionErrorResponses,
      },
    },
    async (request: FastifyRequest<{ Body: ConvertRequestBody }>, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);

      const { fileName, outputFormat } = request.body;
      const options: ConversionOptions = request.body.options ?? {};
      checkPageRange(options);

      const inputFormat = request.body.inputFormat ?? resolver.formatForFileName(fileName);
      if (inputFormat === undefined) {
        throw new UnsupportedConversionError(`cannot determine the input format of "${fileName}"`, {
          correlationId,
        });
      }

      const content = decodeContent(request.body.content, config.maxUploadBytes);

      request.log.info(
        { correlationId, inputFormat, outputFormat, size: content.length },
        'Received conversion request'
      );

      // A client that goes away mid-conversion kills the running engine
      const document = await withDisconnectSignal(request, reply, correlationId, (signal) =>
        service.convert({ fileName, content, inputFormat, outputFormat, options }, { correlationId, signal })
      );
      return sendDocument(reply, document);
    }
  );

  /**
   * GET /formats - supported formats, conversion pairs and document operations
   */
  fastify.get<{ Reply: FormatsResponse }>('/formats', async (request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const response: FormatsResponse = {
      formats: resolver.listFormats().map((format) => ({
        tag: format.tag,
        extension: format.extension,
        mediaType: format.mediaType,
        family: format.family,
      })),
      conversions: resolver.listConversions(),
      operations: resolver.listOperations(),
    };

    return reply.code(200).send(response);
  });
};
