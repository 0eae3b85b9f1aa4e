import path from 'path';
import JSZip from 'jszip';
import type {
  ConversionOptions,
  ConversionPlan,
  ConversionPoolStats,
  ConversionRequest,
  ConvertedDocument,
  FormatDefinition,
  FormatTag,
  MergeRequest,
  SplitRequest,
} from '../types';
import { ArtifactStore } from '../artifacts/store';
import { FormatResolver } from '../formats';
import {
  ConversionCancelledError,
  ConverterError,
  InvalidInputError,
  UnsupportedConversionError,
  failureToError,
} from '../errors';
import { trackGauge, trackMetric } from '../obs';
import { createLogger } from '../utils/logger';
import { errorText } from '../utils/errno';
import { ConversionPipeline, planLabel } from './pipeline';

const logger = createLogger('convert:service');

const DEFAULT_MAX_CONCURRENT = 8;
const ZIP_MEDIA_TYPE = 'application/zip';

export interface ConvertContext {
  correlationId: string;
  /** Aborted when the client disconnects */
  signal?: AbortSignal;
}

export interface ConversionServiceOptions {
  store: ArtifactStore;
  resolver: FormatResolver;
  pipeline: ConversionPipeline;
  maxConcurrent?: number;
}

interface QueuedJob {
  grant: () => void;
  correlationId: string;
}

/**
 * File name stem safe for content-disposition and zip entries
 */
export function safeStem(fileName: string): string {
  const stem = path.basename(fileName, path.extname(fileName)).replace(/[^\w.-]+/g, '_');
  return stem.replace(/^[._]+/, '') || 'document';
}

/**
 * Conversion pool
 *
 * Runs conversion plans with bounded concurrency. Requests beyond
 * `maxConcurrent` wait in a FIFO queue; a request whose client goes away while
 * it is queued leaves the queue without ever starting an engine.
 *
 * Each request gets its own artifact scope holding the upload and the
 * terminal artifact. The scope is closed on every exit path.
 *
 * @example
 * ```typescript
 * const service = new ConversionService({ store, resolver, pipeline, maxConcurrent: 8 });
 * const document = await service.convert(request, { correlationId: 'request-123' });
 * reply.type(document.mediaType).send(document.body);
 * ```
 */
export class ConversionService {
  private readonly store: ArtifactStore;
  private readonly resolver: FormatResolver;
  private readonly pipeline: ConversionPipeline;
  private readonly maxConcurrent: number;
  private activeJobs = 0;
  private queue: QueuedJob[] = [];
  private stats: ConversionPoolStats = {
    activeJobs: 0,
    queuedJobs: 0,
    completedJobs: 0,
    failedJobs: 0,
    totalConversions: 0,
  };

  constructor(options: ConversionServiceOptions) {
    this.store = options.store;
    this.resolver = options.resolver;
    this.pipeline = options.pipeline;
    this.maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;

    logger.info({ maxConcurrent: this.maxConcurrent }, 'ConversionService initialized');
  }

  /**
   * Convert one uploaded document
   *
   * @throws UnsupportedConversionError before any slot is taken when no plan exists
   * @throws The ConverterError matching the pipeline failure otherwise
   */
  async convert(request: ConversionRequest, context: ConvertContext): Promise<ConvertedDocument> {
    const accepted = Object.freeze({ ...request, options: Object.freeze({ ...request.options }) });
    const plan = this.resolver.resolve(accepted.inputFormat, accepted.outputFormat);

    return this.run(plan, [accepted.content], safeStem(accepted.fileName), accepted.options, context);
  }

  /**
   * Keep selected pages of a document
   *
   * @throws UnsupportedConversionError when splitting is unavailable or the input is not the split format
   */
  async split(request: SplitRequest, context: ConvertContext): Promise<ConvertedDocument> {
    const plan = this.resolver.resolveOperation('split');
    this.assertOperationInput(plan, request.fileName, request.inputFormat, context.correlationId);

    const options = Object.freeze({ ...request.options });
    return this.run(plan, [request.content], `${safeStem(request.fileName)}-pages`, options, context);
  }

  /**
   * Join documents in the given order
   *
   * @throws UnsupportedConversionError when merging is unavailable or a file is not the merge format
   */
  async merge(request: MergeRequest, context: ConvertContext): Promise<ConvertedDocument> {
    const plan = this.resolver.resolveOperation('merge');
    for (const file of request.files) {
      this.assertOperationInput(plan, file.fileName, file.inputFormat, context.correlationId);
    }
    if (request.files.length < 2) {
      throw new InvalidInputError('merge takes at least two documents', { correlationId: context.correlationId });
    }

    return this.run(
      plan,
      request.files.map((file) => file.content),
      'merged',
      {},
      context
    );
  }

  private assertOperationInput(
    plan: ConversionPlan,
    fileName: string,
    inputFormat: FormatTag,
    correlationId: string
  ): void {
    const tag = this.resolver.normalize(inputFormat);
    if (tag !== plan.input) {
      throw new UnsupportedConversionError(`${plan.operation ?? 'operation'} takes ${plan.input} documents, got ${fileName}`, {
        correlationId,
        inputFormat,
      });
    }
  }

  /**
   * Run a plan over uploaded bytes inside a pool slot and a request scope
   *
   * @param contents - One entry per upload; several only for multi-input plans
   * @param stem - Download file name without extension
   */
  private async run(
    plan: ConversionPlan,
    contents: readonly Buffer[],
    stem: string,
    options: ConversionOptions,
    context: ConvertContext
  ): Promise<ConvertedDocument> {
    const { correlationId, signal } = context;
    const inputFormat = this.resolver.getFormat(plan.input);
    const outputFormat = this.resolver.getFormat(plan.output);
    const errorContext = { correlationId, inputFormat: plan.input, outputFormat: plan.output };
    const size = contents.reduce((total, content) => total + content.length, 0);

    logger.debug({ correlationId, plan: planLabel(plan), size, files: contents.length }, 'Conversion requested');

    await this.acquireSlot(correlationId, signal);
    const startTime = Date.now();
    this.stats.totalConversions++;

    try {
      const document = await this.store.withScope('request', async (scope) => {
        const upload = await scope.putParts(contents, {
          format: plan.input,
          extension: inputFormat.extension,
          name: stem,
        });

        const result = await this.pipeline.execute(plan, upload, options, {
          resultScope: scope,
          signal,
          correlationId,
        });
        if (!result.ok) {
          throw failureToError(result.failure, errorContext);
        }

        const parts = await scope.read(result.artifact);
        return this.packageResult(stem, plan, outputFormat, parts);
      });

      const durationMs = Date.now() - startTime;
      this.stats.completedJobs++;
      trackMetric('conversion_duration_ms', durationMs, {
        input: plan.input,
        output: plan.output,
        stages: plan.stages.length,
        operation: plan.operation ?? 'convert',
      });
      logger.info(
        { correlationId, plan: planLabel(plan), bytes: document.body.length, durationMs, stats: this.stats },
        'Conversion completed successfully'
      );

      return { ...document, durationMs };
    } catch (error) {
      this.stats.failedJobs++;
      const code = error instanceof ConverterError ? error.code : 'UNKNOWN';
      trackMetric('conversion_failures_total', 1, { input: plan.input, output: plan.output, code });
      logger.error(
        {
          correlationId,
          plan: planLabel(plan),
          code,
          error: errorText(error),
          stats: this.stats,
        },
        'Conversion failed'
      );
      throw error;
    } finally {
      this.releaseSlot(correlationId);
    }
  }

  /**
   * Get current pool statistics
   */
  getStats(): ConversionPoolStats {
    return { ...this.stats };
  }

  /**
   * Turn the terminal artifact's bytes into the response body. Page
   * sequences become a zip archive with `{stem}-{n}.{ext}` entries.
   */
  private async packageResult(
    stem: string,
    plan: ConversionPlan,
    output: FormatDefinition,
    parts: Buffer[]
  ): Promise<Omit<ConvertedDocument, 'durationMs'>> {
    const lastStage = plan.stages[plan.stages.length - 1];
    const sequence = lastStage !== undefined && lastStage.outputSpec.kind === 'sequence';

    if (!sequence) {
      return {
        fileName: `${stem}.${output.extension}`,
        mediaType: output.mediaType,
        body: parts[0],
        plan,
        sequence,
        pageCount: parts.length,
      };
    }

    const zip = new JSZip();
    parts.forEach((part, index) => {
      zip.file(`${stem}-${index + 1}.${output.extension}`, part);
    });
    const body = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });

    return {
      fileName: `${stem}.zip`,
      mediaType: ZIP_MEDIA_TYPE,
      body,
      plan,
      sequence,
      pageCount: parts.length,
    };
  }

  /**
   * Acquire a slot in the conversion pool
   * If pool is full, the promise will wait in queue until a slot is available
   */
  private async acquireSlot(correlationId: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new ConversionCancelledError({ correlationId });
    }

    if (this.activeJobs < this.maxConcurrent) {
      this.activeJobs++;
      this.stats.activeJobs = this.activeJobs;
      trackGauge('conversion_pool_active', this.activeJobs);
      logger.debug(
        { correlationId, activeJobs: this.activeJobs, maxConcurrent: this.maxConcurrent },
        'Slot acquired immediately'
      );
      return;
    }

    // Pool is full, queue and wait
    this.stats.queuedJobs++;
    trackGauge('conversion_pool_queued', this.stats.queuedJobs);
    logger.debug({ correlationId, queuedJobs: this.stats.queuedJobs }, 'Pool full, waiting in queue');

    await new Promise<void>((resolve, reject) => {
      const job: QueuedJob = {
        correlationId,
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };
      const onAbort = (): void => {
        this.queue = this.queue.filter((queued) => queued !== job);
        this.stats.queuedJobs--;
        trackGauge('conversion_pool_queued', this.stats.queuedJobs);
        logger.info({ correlationId }, 'Queued conversion cancelled');
        reject(new ConversionCancelledError({ correlationId }));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(job);
    });

    this.stats.queuedJobs--;
    trackGauge('conversion_pool_queued', this.stats.queuedJobs);
    logger.debug({ correlationId, activeJobs: this.activeJobs }, 'Slot acquired from queue');
  }

  /**
   * Release a slot in the conversion pool
   * If queue has waiting jobs, immediately grant slot to next in queue
   */
  private releaseSlot(correlationId: string): void {
    this.activeJobs--;

    logger.debug(
      { correlationId, activeJobs: this.activeJobs, queueLength: this.queue.length },
      'Slot released'
    );

    // Grant slot to next queued job
    const next = this.queue.shift();
    if (next) {
      this.activeJobs++;
      next.grant();
    }

    this.stats.activeJobs = this.activeJobs;
    trackGauge('conversion_pool_active', this.activeJobs);
  }
}
