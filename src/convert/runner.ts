import { spawn, ChildProcess } from 'child_process';
import path from 'path';
import { ResourceError } from '../errors';
import { createLogger } from '../utils/logger';
import { errnoCode, errorText } from '../utils/errno';

const logger = createLogger('convert:runner');

const DEFAULT_MAX_CAPTURE_BYTES = 64 * 1024;
// After the child exits, stdio is given this long to drain before it is destroyed
const STDIO_DRAIN_MS = 1000;
/** Largest delay `setTimeout` honours; anything above fires after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface CommandLine {
  command: string;
  args: string[];
}

export interface RunOptions {
  /** Working directory of the child; a scoped directory per stage */
  cwd: string;
  /** Hard wall-clock limit in milliseconds, at most MAX_TIMEOUT_MS */
  timeoutMs: number;
  /** Aborting kills the process group (client disconnect, shutdown) */
  signal?: AbortSignal;
  /** Keep only the last N bytes of each stream */
  maxCaptureBytes?: number;
  env?: NodeJS.ProcessEnv;
  /** Correlation ID for logging */
  correlationId?: string;
}

export interface ProcessOutcome {
  /** Exit code, or null when the process was killed by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  durationMs: number;
  pid?: number;
}

/**
 * Keeps the tail of a stream, at most `limit` bytes
 */
export class TailBuffer {
  private chunks: Buffer[] = [];
  private length = 0;
  private dropped = false;

  constructor(private readonly limit: number) {}

  append(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.length += chunk.length;

    while (this.length > this.limit && this.chunks.length > 0) {
      const excess = this.length - this.limit;
      const head = this.chunks[0];
      this.dropped = true;
      if (head.length <= excess) {
        this.chunks.shift();
        this.length -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.length -= excess;
      }
    }
  }

  get truncated(): boolean {
    return this.dropped;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Kill the child's whole process group
 *
 * The child is spawned detached, so it leads its own group; engines such as
 * soffice fork helpers that would otherwise outlive it.
 */
function killProcessGroup(child: ChildProcess, correlationId?: string): void {
  if (child.pid === undefined) return;

  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch (error) {
    if (errnoCode(error) === 'ESRCH') return; // group already gone

    logger.warn(
      { correlationId, pid: child.pid, error: errorText(error) },
      'Process group kill failed, killing child only'
    );
    child.kill('SIGKILL');
  }
}

/**
 * Run one external engine process
 *
 * A non-zero exit code is a normal outcome, not an error. The promise settles
 * only after the child has been reaped and its process group killed, so no
 * process started by this call survives it.
 *
 * @throws ResourceError when the process cannot be spawned (binary missing, fork failure)
 *
 * @example
 * ```typescript
 * const outcome = await runProcess(
 *   { command: 'pdftoppm', args: ['-png', 'input.pdf', 'page'] },
 *   { cwd: stageDir, timeoutMs: 60000 }
 * );
 * if (outcome.timedOut) { ... }
 * ```
 */
export function runProcess(commandLine: CommandLine, options: RunOptions): Promise<ProcessOutcome> {
  const { cwd, timeoutMs, signal, correlationId } = options;
  const maxCaptureBytes = options.maxCaptureBytes ?? DEFAULT_MAX_CAPTURE_BYTES;
  const startTime = Date.now();

  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    return Promise.reject(new ResourceError(`invalid engine timeout ${timeoutMs}ms`));
  }
  if (signal?.aborted) {
    return Promise.resolve({
      exitCode: null,
      signal: null,
      stdout: '',
      stderr: '',
      timedOut: false,
      aborted: true,
      durationMs: 0,
    });
  }

  return new Promise<ProcessOutcome>((resolve, reject) => {
    const stdout = new TailBuffer(maxCaptureBytes);
    const stderr = new TailBuffer(maxCaptureBytes);
    let timedOut = false;
    let aborted = false;
    let settled = false;
    let drainTimer: NodeJS.Timeout | undefined;

    logger.debug(
      { correlationId, command: commandLine.command, args: commandLine.args, cwd, timeoutMs },
      'Spawning engine process'
    );

    const child = spawn(commandLine.command, commandLine.args, {
      cwd,
      env: options.env ?? process.env,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const onAbort = (): void => {
      aborted = true;
      logger.info({ correlationId, pid: child.pid }, 'Engine process aborted');
      killProcessGroup(child, correlationId);
    };

    const timer = setTimeout(() => {
      timedOut = true;
      logger.warn({ correlationId, pid: child.pid, timeoutMs }, 'Engine process timed out, killing process group');
      killProcessGroup(child, correlationId);
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = (): void => {
      clearTimeout(timer);
      if (drainTimer) clearTimeout(drainTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    child.stdout?.on('data', (chunk: Buffer) => stdout.append(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.append(chunk));

    child.once('error', (error: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      cleanup();
      killProcessGroup(child, correlationId);

      const binary = path.basename(commandLine.command);
      const reason =
        error.code === 'ENOENT' ? `engine binary not found: ${binary}` : `cannot spawn ${binary} (${error.code ?? 'unknown'})`;
      logger.error({ correlationId, command: commandLine.command, code: error.code }, 'Failed to spawn engine process');
      reject(new ResourceError(reason));
    });

    child.once('exit', () => {
      // Reap anything the engine forked into its group
      killProcessGroup(child, correlationId);
      if (settled) return;
      drainTimer = setTimeout(() => {
        child.stdout?.destroy();
        child.stderr?.destroy();
      }, STDIO_DRAIN_MS);
      drainTimer.unref();
    });

    child.once('close', (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      cleanup();

      const outcome: ProcessOutcome = {
        exitCode,
        signal: exitSignal,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        timedOut,
        aborted,
        durationMs: Date.now() - startTime,
        pid: child.pid,
      };

      logger.debug(
        {
          correlationId,
          pid: child.pid,
          exitCode,
          signal: exitSignal,
          timedOut,
          aborted,
          durationMs: outcome.durationMs,
          stdoutTruncated: stdout.truncated,
          stderrTruncated: stderr.truncated,
        },
        'Engine process finished'
      );

      resolve(outcome);
    });
  });
}
