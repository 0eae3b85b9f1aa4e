import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { Artifact, ArtifactPart, FormatTag } from '../types';
import { ResourceError } from '../errors';
import { createLogger } from '../utils/logger';
import { errnoCode, errorText } from '../utils/errno';

const logger = createLogger('artifacts:store');

const ARTIFACTS_DIR = 'artifacts';

/**
 * A ResourceError that names the failed action and the errno code only
 *
 * fs messages carry host paths, so the full error goes to the log.
 */
function fsFailure(action: string, error: unknown, context: Record<string, unknown> = {}): ResourceError {
  logger.error({ ...context, error: errorText(error) }, `Artifact store failed: ${action}`);
  const code = errnoCode(error);
  return new ResourceError(code ? `${action} (${code})` : action);
}

function isInside(dir: string, candidate: string): boolean {
  const relative = path.relative(dir, candidate);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

export interface PutOptions {
  format: FormatTag;
  /** File extension used on disk */
  extension: string;
  /** Display name; never used to build paths */
  name: string;
}

/**
 * A lifetime boundary for temporary files
 *
 * Every artifact created in a scope lives under the scope directory and is
 * deleted when the scope closes. Artifacts are invalid once their scope has
 * closed; `promote` is the only way to carry one across scopes.
 */
export class ArtifactScope {
  readonly id: string = uuidv4();
  private readonly artifacts = new Map<string, Artifact>();
  private closed = false;

  constructor(
    readonly label: string,
    readonly dir: string,
    private readonly onClose: (scope: ArtifactScope) => void
  ) {}

  get isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Create a directory inside the scope
   */
  async createDir(name: string): Promise<string> {
    this.assertOpen();
    const dir = path.join(this.dir, name);
    if (!isInside(this.dir, dir)) {
      throw new ResourceError(`directory name escapes scope: ${name}`);
    }
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw fsFailure('cannot create scoped directory', error, { scope: this.label });
    }
    return dir;
  }

  /**
   * Store bytes as a new single-file artifact
   */
  async put(bytes: Buffer, options: PutOptions): Promise<Artifact> {
    return this.putParts([bytes], options);
  }

  /**
   * Store several documents of one format as a single multi-part artifact
   *
   * @param parts - Part contents in order (merge inputs, for instance)
   */
  async putParts(parts: readonly Buffer[], options: PutOptions): Promise<Artifact> {
    if (parts.length === 0) {
      throw new ResourceError('an artifact needs at least one part');
    }
    const dir = await this.createDir(ARTIFACTS_DIR);
    const stored: ArtifactPart[] = [];

    try {
      for (const bytes of parts) {
        const filePath = path.join(dir, `${uuidv4()}.${options.extension}`);
        await fs.writeFile(filePath, bytes);
        stored.push({ name: path.basename(filePath), path: filePath, size: bytes.length });
      }
    } catch (error) {
      throw fsFailure('cannot write artifact', error, { scope: this.label });
    }

    return this.register(options.format, options.name, stored);
  }

  /**
   * Register files an engine wrote inside the scope as one artifact
   *
   * @param filePaths - Files in page order; all must live under the scope directory
   */
  async adopt(filePaths: readonly string[], format: FormatTag, name: string): Promise<Artifact> {
    this.assertOpen();
    const parts: ArtifactPart[] = [];

    for (const filePath of filePaths) {
      if (!isInside(this.dir, filePath)) {
        throw new ResourceError('cannot adopt a file outside the scope');
      }
      try {
        const stat = await fs.stat(filePath);
        parts.push({ name: path.basename(filePath), path: filePath, size: stat.size });
      } catch (error) {
        throw fsFailure('cannot adopt file', error, { scope: this.label });
      }
    }

    return this.register(format, name, parts);
  }

  /**
   * Copy an artifact's files into `dir` as `<baseName>.<ext>`, or
   * `<baseName>-<n>.<ext>` for sequences
   *
   * @returns The materialized paths, in part order
   */
  async materialize(artifact: Artifact, dir: string, baseName = 'input'): Promise<string[]> {
    const owned = this.get(artifact);
    const single = owned.parts.length === 1;
    const paths: string[] = [];

    try {
      await fs.mkdir(dir, { recursive: true });
      for (const [index, part] of owned.parts.entries()) {
        const extension = path.extname(part.path);
        const target = path.join(dir, single ? `${baseName}${extension}` : `${baseName}-${index + 1}${extension}`);
        await fs.copyFile(part.path, target);
        paths.push(target);
      }
    } catch (error) {
      throw fsFailure('cannot materialize artifact', error, { scope: this.label });
    }

    return paths;
  }

  /**
   * Read every part of an artifact, in order
   */
  async read(artifact: Artifact): Promise<Buffer[]> {
    const owned = this.get(artifact);
    try {
      return await Promise.all(owned.parts.map((part) => fs.readFile(part.path)));
    } catch (error) {
      throw fsFailure('cannot read artifact', error, { scope: this.label });
    }
  }

  /**
   * Delete an artifact before the scope closes
   */
  async release(artifact: Artifact): Promise<void> {
    const owned = this.get(artifact);
    this.artifacts.delete(owned.id);
    await Promise.all(owned.parts.map((part) => fs.rm(part.path, { force: true })));
  }

  /**
   * Move an artifact into another open scope
   *
   * The artifact is no longer valid in this scope afterwards.
   */
  async promote(artifact: Artifact, target: ArtifactScope): Promise<Artifact> {
    const owned = this.get(artifact);
    const dir = await target.createDir(ARTIFACTS_DIR);
    const parts: ArtifactPart[] = [];

    try {
      for (const part of owned.parts) {
        const destination = path.join(dir, `${uuidv4()}${path.extname(part.path)}`);
        await moveFile(part.path, destination);
        parts.push({ name: part.name, path: destination, size: part.size });
      }
    } catch (error) {
      throw fsFailure('cannot promote artifact', error, { scope: this.label });
    }

    this.artifacts.delete(owned.id);
    return target.register(owned.format, owned.name, parts);
  }

  /**
   * Copy an artifact into another open scope, leaving the original in place
   */
  async copyTo(artifact: Artifact, target: ArtifactScope): Promise<Artifact> {
    const owned = this.get(artifact);
    const dir = await target.createDir(ARTIFACTS_DIR);
    const parts: ArtifactPart[] = [];

    try {
      for (const part of owned.parts) {
        const destination = path.join(dir, `${uuidv4()}${path.extname(part.path)}`);
        await fs.copyFile(part.path, destination);
        parts.push({ name: part.name, path: destination, size: part.size });
      }
    } catch (error) {
      throw fsFailure('cannot copy artifact', error, { scope: this.label });
    }

    return target.register(owned.format, owned.name, parts);
  }

  owns(artifact: Artifact): boolean {
    return this.isOpen && this.artifacts.get(artifact.id) === artifact;
  }

  /**
   * Delete the scope directory and invalidate every artifact in it
   *
   * Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.artifacts.clear();
    this.onClose(this);

    try {
      await fs.rm(this.dir, { recursive: true, force: true });
      logger.debug({ scope: this.label, scopeId: this.id }, 'Closed artifact scope');
    } catch (error) {
      logger.warn(
        { scope: this.label, scopeId: this.id, error: errorText(error) },
        'Failed to remove scope directory'
      );
    }
  }

  private register(format: FormatTag, name: string, parts: ArtifactPart[]): Artifact {
    this.assertOpen();
    const artifact: Artifact = Object.freeze({
      id: uuidv4(),
      scopeId: this.id,
      name,
      format,
      parts: Object.freeze(parts),
      size: parts.reduce((total, part) => total + part.size, 0),
    });
    this.artifacts.set(artifact.id, artifact);
    return artifact;
  }

  private get(artifact: Artifact): Artifact {
    this.assertOpen();
    const owned = this.artifacts.get(artifact.id);
    if (!owned) {
      throw new ResourceError(`artifact ${artifact.id} is not owned by scope ${this.label}`);
    }
    return owned;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ResourceError(`scope ${this.label} is closed`);
    }
  }
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (errnoCode(error) === 'EXDEV') {
      await fs.copyFile(from, to);
      await fs.rm(from, { force: true });
      return;
    }
    throw error;
  }
}

/**
 * Hands out scopes under one root directory and tracks which are still open
 *
 * @example
 * ```typescript
 * const store = new ArtifactStore('/tmp/conversions');
 * await store.withScope('request', async (scope) => {
 *   const upload = await scope.put(bytes, { format: 'docx', extension: 'docx', name: 'report.docx' });
 *   // ...
 * });
 * ```
 */
export class ArtifactStore {
  private readonly scopes = new Map<string, ArtifactScope>();

  constructor(readonly rootDir: string) {}

  /**
   * Open a fresh scope backed by a new private directory
   *
   * @param label - Internal label used in the directory name and logs
   */
  async openScope(label: string): Promise<ArtifactScope> {
    let dir: string;
    try {
      await fs.mkdir(this.rootDir, { recursive: true });
      dir = await fs.mkdtemp(path.join(this.rootDir, `${label}-`));
    } catch (error) {
      throw fsFailure('cannot create scope directory', error, { scope: label });
    }

    const scope = new ArtifactScope(label, dir, (closed) => this.scopes.delete(closed.id));
    this.scopes.set(scope.id, scope);
    logger.debug({ scope: label, scopeId: scope.id }, 'Opened artifact scope');
    return scope;
  }

  /**
   * Run `fn` inside a scope that is closed on every exit path
   */
  async withScope<T>(label: string, fn: (scope: ArtifactScope) => Promise<T>): Promise<T> {
    const scope = await this.openScope(label);
    try {
      return await fn(scope);
    } finally {
      await scope.close();
    }
  }

  /**
   * The open scope owning `artifact`
   *
   * @throws ResourceError when the owning scope has closed
   */
  scopeOf(artifact: Artifact): ArtifactScope {
    const scope = this.scopes.get(artifact.scopeId);
    if (!scope) {
      throw new ResourceError(`artifact ${artifact.id} belongs to a closed scope`);
    }
    return scope;
  }

  materialize(artifact: Artifact, dir: string, baseName?: string): Promise<string[]> {
    return this.scopeOf(artifact).materialize(artifact, dir, baseName);
  }

  read(artifact: Artifact): Promise<Buffer[]> {
    return this.scopeOf(artifact).read(artifact);
  }

  release(artifact: Artifact): Promise<void> {
    return this.scopeOf(artifact).release(artifact);
  }

  promote(artifact: Artifact, newScope: ArtifactScope): Promise<Artifact> {
    return this.scopeOf(artifact).promote(artifact, newScope);
  }

  copy(artifact: Artifact, newScope: ArtifactScope): Promise<Artifact> {
    return this.scopeOf(artifact).copyTo(artifact, newScope);
  }

  get openScopes(): number {
    return this.scopes.size;
  }

  /**
   * Close every open scope (server shutdown)
   */
  async closeAll(): Promise<void> {
    await Promise.all([...this.scopes.values()].map((scope) => scope.close()));
  }
}
