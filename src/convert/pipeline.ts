import { promises as fs, Dirent } from 'fs';
import path from 'path';
import type {
  Artifact,
  ConversionFailure,
  ConversionOptions,
  ConversionPlan,
  ConversionResult,
  OutputSpec,
  Stage,
  StageReport,
} from '../types';
import { ArtifactScope, ArtifactStore } from '../artifacts/store';
import { FormatResolver, renderStageCommand } from '../formats';
import { ResourceError } from '../errors';
import { trackDependency } from '../obs';
import { createLogger } from '../utils/logger';
import { errnoCode, errorText } from '../utils/errno';
import { runProcess, ProcessOutcome } from './runner';

const logger = createLogger('convert:pipeline');

const DIAGNOSTIC_LINES = 20;
const DEFAULT_MAX_DIAGNOSTIC_BYTES = 4096;
// Absolute paths left over after the known directories have been replaced
const ABSOLUTE_PATH = /(?<![\w.])\/(?:[\w.@+-]+\/)+[\w.@+-]*/g;

export interface PipelineOptions {
  /** Cap on the diagnostic text attached to engine failures */
  maxDiagnosticBytes?: number;
}

export interface ExecuteContext {
  /** Scope that receives the terminal artifact */
  resultScope: ArtifactScope;
  signal?: AbortSignal;
  correlationId?: string;
}

/**
 * Build the diagnostic text for a failed stage: the last lines of stderr (or
 * stdout when stderr is empty) with host paths replaced, capped to `maxBytes`
 *
 * @param replacements - Known directories and their placeholders, most specific first
 */
export function buildDiagnostic(
  outcome: Pick<ProcessOutcome, 'stdout' | 'stderr'>,
  replacements: ReadonlyArray<readonly [string, string]>,
  maxBytes: number
): string {
  const source = outcome.stderr.trim() ? outcome.stderr : outcome.stdout;
  let text = source
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '')
    .slice(-DIAGNOSTIC_LINES)
    .join('\n');

  for (const [from, placeholder] of replacements) {
    if (from) text = text.split(from).join(placeholder);
  }
  text = scrubPaths(text);

  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length <= maxBytes) {
    return text;
  }
  // Keep the tail; the last lines carry the engine's final complaint
  return bytes.subarray(bytes.length - maxBytes).toString('utf8');
}

/**
 * Replace every absolute path in `text` with `<path>`
 */
export function scrubPaths(text: string): string {
  return text.replace(ABSOLUTE_PATH, '<path>');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Files a stage wrote, in page order
 *
 * A `file` stage writes exactly `outputName`. A `sequence` stage writes
 * `<prefix>-<n>.<ext>`; page numbers may be zero-padded by the engine.
 */
async function collectOutputs(output: OutputSpec, outDir: string, outputName: string): Promise<string[]> {
  if (output.kind === 'file') {
    const filePath = path.join(outDir, outputName);
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile() ? [filePath] : [];
    } catch {
      return [];
    }
  }

  const pattern = new RegExp(`^${escapeRegExp(outputName)}-?(\\d+)\\.[A-Za-z0-9]+$`);
  let entries: Dirent[];
  try {
    entries = await fs.readdir(outDir, { withFileTypes: true });
  } catch (error) {
    throw stageDirFailure('cannot list stage output', error);
  }

  const pages: Array<{ page: number; file: string }> = [];
  for (const entry of entries) {
    const match = entry.isFile() ? pattern.exec(entry.name) : null;
    if (match) {
      pages.push({ page: Number(match[1]), file: path.join(outDir, entry.name) });
    }
  }
  pages.sort((a, b) => a.page - b.page);
  return pages.map((page) => page.file);
}

function stageDirFailure(action: string, error: unknown): ResourceError {
  logger.error({ error: errorText(error) }, `Stage directory failure: ${action}`);
  const code = errnoCode(error);
  return new ResourceError(code ? `${action} (${code})` : action);
}

class StageFailed extends Error {
  constructor(readonly failure: ConversionFailure) {
    super(failure.message);
  }
}

/**
 * Executes a ConversionPlan stage by stage
 *
 * Each plan runs in its own work scope: `stage-N/in`, `stage-N/out` and a
 * private engine profile directory per stage. The previous intermediate is
 * released once the next stage has consumed it, and the terminal artifact is
 * promoted into the caller's result scope before the work scope closes.
 *
 * `execute` never throws; every failure comes back as a ConversionResult.
 */
export class ConversionPipeline {
  private readonly maxDiagnosticBytes: number;

  constructor(
    private readonly store: ArtifactStore,
    private readonly resolver: FormatResolver,
    options: PipelineOptions = {}
  ) {
    this.maxDiagnosticBytes = options.maxDiagnosticBytes ?? DEFAULT_MAX_DIAGNOSTIC_BYTES;
  }

  async execute(
    plan: ConversionPlan,
    input: Artifact,
    options: ConversionOptions,
    context: ExecuteContext
  ): Promise<ConversionResult> {
    const startTime = Date.now();
    const stages: StageReport[] = [];
    const failed = (failure: ConversionFailure): ConversionResult => {
      logger.warn({ correlationId: context.correlationId, failure }, 'Conversion plan failed');
      return { ok: false, failure, stages, durationMs: Date.now() - startTime };
    };

    if (input.size === 0 || input.parts.some((part) => part.size === 0)) {
      return failed({ kind: 'InvalidInput', message: 'input document is empty' });
    }
    if (input.format !== plan.input) {
      return failed({
        kind: 'InvalidInput',
        message: `input is ${input.format} but the plan expects ${plan.input}`,
      });
    }
    if (context.signal?.aborted) {
      return failed({ kind: 'Cancelled', message: 'conversion cancelled before it started' });
    }

    try {
      let artifact: Artifact;
      if (plan.stages.length === 0) {
        artifact = await this.store.copy(input, context.resultScope);
      } else {
        artifact = await this.store.withScope('work', (work) => this.runStages(plan, input, options, context, work, stages));
      }

      logger.debug(
        { correlationId: context.correlationId, plan: planLabel(plan), parts: artifact.parts.length },
        'Conversion plan completed'
      );
      return { ok: true, artifact, plan, stages, durationMs: Date.now() - startTime };
    } catch (error) {
      if (error instanceof StageFailed) {
        return failed(error.failure);
      }
      if (error instanceof ResourceError) {
        return failed({ kind: 'ResourceError', message: scrubPaths(error.reason) });
      }
      logger.error({ correlationId: context.correlationId, error: errorText(error) }, 'Unexpected pipeline error');
      return failed({ kind: 'ResourceError', message: 'unexpected pipeline error' });
    }
  }

  private async runStages(
    plan: ConversionPlan,
    input: Artifact,
    options: ConversionOptions,
    context: ExecuteContext,
    work: ArtifactScope,
    reports: StageReport[]
  ): Promise<Artifact> {
    let current = input;

    for (const [index, stage] of plan.stages.entries()) {
      const produced = await this.runStage(index, stage, current, options, context, work);
      reports.push({
        index,
        engine: stage.engine,
        input: stage.input,
        output: stage.output,
        durationMs: produced.durationMs,
        outputParts: produced.artifact.parts.length,
      });

      if (current !== input) {
        await work.release(current);
      }
      current = produced.artifact;
    }

    return work.promote(current, context.resultScope);
  }

  private async runStage(
    index: number,
    stage: Stage,
    current: Artifact,
    options: ConversionOptions,
    context: ExecuteContext,
    work: ArtifactScope
  ): Promise<{ artifact: Artifact; durationMs: number }> {
    const { correlationId, signal } = context;
    const failure = (fields: Omit<ConversionFailure, 'stage' | 'engine'>): StageFailed =>
      new StageFailed({ ...fields, stage: index, engine: stage.engine });

    if (signal?.aborted) {
      throw failure({ kind: 'Cancelled', message: `cancelled before stage ${index}` });
    }

    const stageDir = await work.createDir(`stage-${index}`);
    const inDir = await work.createDir(`stage-${index}/in`);
    const outDir = await work.createDir(`stage-${index}/out`);
    const profileDir = await work.createDir(`stage-${index}/profile`);

    const inputs = await this.store.materialize(current, inDir);
    if (!stage.multiInput && inputs.length !== 1) {
      throw failure({
        kind: 'InvalidInput',
        message: `${stage.engine} takes a single input file, got ${inputs.length}`,
      });
    }

    const rendered = renderStageCommand(
      stage,
      this.resolver.getFormat(stage.output),
      { inputPath: inputs[0], inputPaths: inputs, outdir: outDir, profileDir },
      options
    );

    logger.info(
      { correlationId, stage: index, engine: stage.engine, from: stage.input, to: stage.output, inputs: inputs.length },
      'Running conversion stage'
    );

    let outcome: ProcessOutcome;
    try {
      outcome = await runProcess(
        { command: rendered.command, args: rendered.args },
        { cwd: stageDir, timeoutMs: stage.timeoutMs, signal, correlationId }
      );
    } catch (error) {
      if (error instanceof ResourceError) {
        throw failure({ kind: 'ResourceError', message: scrubPaths(error.reason) });
      }
      throw error;
    }

    const dependency = {
      type: stage.suite,
      name: `${stage.engine} ${stage.input}>${stage.output}`,
      duration: outcome.durationMs,
      correlationId: correlationId ?? '',
    };
    const diagnostic = (): string =>
      buildDiagnostic(
        outcome,
        [
          ...inputs.map((inputPath): [string, string] => [inputPath, '<input>']),
          [inDir, '<indir>'],
          [outDir, '<outdir>'],
          [profileDir, '<profile>'],
          [stageDir, '<stage>'],
          [work.dir, '<workdir>'],
          [this.store.rootDir, '<tmp>'],
        ],
        this.maxDiagnosticBytes
      );

    if (outcome.aborted) {
      trackDependency({ ...dependency, success: false, error: 'cancelled' });
      throw failure({ kind: 'Cancelled', message: `cancelled during stage ${index}` });
    }
    if (outcome.timedOut) {
      trackDependency({ ...dependency, success: false, error: 'timeout' });
      throw failure({
        kind: 'EngineTimeout',
        message: `${stage.engine} timed out after ${stage.timeoutMs}ms`,
        timeoutMs: stage.timeoutMs,
      });
    }
    if (outcome.exitCode !== 0) {
      const message =
        outcome.exitCode === null
          ? `${stage.engine} was killed by ${outcome.signal ?? 'a signal'}`
          : `${stage.engine} exited with code ${outcome.exitCode}`;
      trackDependency({ ...dependency, success: false, error: message });
      throw failure({ kind: 'EngineFailure', message, exitCode: outcome.exitCode, diagnostic: diagnostic() });
    }

    const files = await collectOutputs(stage.outputSpec, outDir, rendered.outputName);
    if (files.length === 0) {
      trackDependency({ ...dependency, success: false, error: 'no output' });
      throw failure({
        kind: 'EngineFailure',
        message: 'engine produced no output',
        exitCode: 0,
        diagnostic: diagnostic(),
      });
    }

    trackDependency({ ...dependency, success: true });
    try {
      await fs.rm(inDir, { recursive: true, force: true });
    } catch (error) {
      throw stageDirFailure('cannot remove stage input', error);
    }

    const artifact = await work.adopt(files, stage.output, `${current.name}>${stage.output}`);
    return { artifact, durationMs: outcome.durationMs };
  }
}

/**
 * `docx>pdf>png` for a two-stage plan, `pdf` for an identity plan,
 * `split(pdf)` for an operation
 */
export function planLabel(plan: ConversionPlan): string {
  if (plan.operation) {
    return `${plan.operation}(${plan.input})`;
  }
  return [plan.input, ...plan.stages.map((stage) => stage.output)].join('>');
}
