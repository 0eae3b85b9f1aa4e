import { readFileSync } from 'fs';
import { resolve } from 'path';
import type {
  AppConfig,
  ConditionalArgs,
  ConversionEdge,
  DocumentOperation,
  EngineDefinition,
  EngineSuite,
  FormatDefinition,
  FormatFamily,
  FormatTable,
  OperationDefinition,
  OutputSpec,
  TemplateArg,
} from '../types';
import { ConfigurationError } from '../errors';
import { MAX_TIMEOUT_MS } from '../convert/runner';
import { errorText } from '../utils/errno';
import { TEMPLATE_TOKENS, isTemplateToken } from './template';
import defaultTable from './default-table.json';

const FAMILIES: readonly FormatFamily[] = ['text', 'spreadsheet', 'presentation', 'pdf', 'image'];
const SUITES: readonly EngineSuite[] = ['office', 'poppler', 'ghostscript', 'imagemagick', 'ebook'];
const OPERATIONS: readonly DocumentOperation[] = ['split', 'merge'];

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && allowed.some((candidate) => candidate === value);
}

function fail(path: string, expected: string): never {
  throw new ConfigurationError(`format table: ${path} must be ${expected}`);
}

function readString(obj: Json, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.length === 0) {
    fail(`${path}.${key}`, 'a non-empty string');
  }
  return value;
}

function readOptionalString(obj: Json, key: string, path: string): string | undefined {
  return obj[key] === undefined ? undefined : readString(obj, key, path);
}

function readStringList(obj: Json, key: string, path: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    fail(`${path}.${key}`, 'a list of strings');
  }
  return value;
}

function readArray(obj: Json, key: string, path: string): unknown[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    fail(`${path}.${key}`, 'a list');
  }
  return value;
}

function parseFormat(raw: unknown, path: string): FormatDefinition {
  if (!isRecord(raw)) fail(path, 'an object');

  const family = raw.family;
  if (!oneOf(FAMILIES, family)) fail(`${path}.family`, `one of ${FAMILIES.join(', ')}`);
  const nativeSuite = raw.nativeSuite;
  if (!oneOf(SUITES, nativeSuite)) fail(`${path}.nativeSuite`, `one of ${SUITES.join(', ')}`);

  return {
    tag: readString(raw, 'tag', path).toLowerCase(),
    extension: readString(raw, 'extension', path),
    mediaType: readString(raw, 'mediaType', path),
    family,
    nativeSuite,
    officeFilter: readOptionalString(raw, 'officeFilter', path),
    rasterDevice: readOptionalString(raw, 'rasterDevice', path),
    aliases: raw.aliases === undefined ? undefined : readStringList(raw, 'aliases', path).map((a) => a.toLowerCase()),
  };
}

function parseTemplateArg(raw: unknown, path: string): TemplateArg {
  if (typeof raw === 'string') return raw;
  if (!isRecord(raw)) fail(path, 'a string or a conditional group');

  const group: ConditionalArgs = { args: readStringList(raw, 'args', path) };
  if (raw.when !== undefined) {
    const when = raw.when;
    if (!isTemplateToken(when)) fail(`${path}.when`, `one of ${TEMPLATE_TOKENS.join(', ')}`);
    group.when = when;
  }
  if (raw.formats !== undefined) {
    group.formats = readStringList(raw, 'formats', path).map((tag) => tag.toLowerCase());
  }
  if (raw.inputs !== undefined) {
    group.inputs = readStringList(raw, 'inputs', path).map((tag) => tag.toLowerCase());
  }
  if (!group.when && !group.formats && !group.inputs) {
    fail(path, 'a group with when, formats or inputs');
  }
  return group;
}

function parseOutputSpec(raw: unknown, path: string): OutputSpec {
  if (!isRecord(raw)) fail(path, 'an object');
  if (raw.kind === 'file') {
    return { kind: 'file', name: readString(raw, 'name', path) };
  }
  if (raw.kind === 'sequence') {
    return { kind: 'sequence', prefix: readString(raw, 'prefix', path) };
  }
  return fail(`${path}.kind`, '"file" or "sequence"');
}

function parseEngine(raw: unknown, path: string): EngineDefinition {
  if (!isRecord(raw)) fail(path, 'an object');

  const suite = raw.suite;
  if (!oneOf(SUITES, suite)) fail(`${path}.suite`, `one of ${SUITES.join(', ')}`);
  const timeoutMs = raw.timeoutMs;
  if (typeof timeoutMs !== 'number' || !Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    fail(`${path}.timeoutMs`, `a positive integer no greater than ${MAX_TIMEOUT_MS}`);
  }

  const engine: EngineDefinition = {
    id: readString(raw, 'id', path),
    suite,
    command: readString(raw, 'command', path),
    args: readArray(raw, 'args', path).map((arg, i) => parseTemplateArg(arg, `${path}.args[${i}]`)),
    output: parseOutputSpec(raw.output, `${path}.output`),
    timeoutMs,
  };
  if (raw.multiInput !== undefined) {
    if (typeof raw.multiInput !== 'boolean') fail(`${path}.multiInput`, 'a boolean');
    engine.multiInput = raw.multiInput;
  }
  return engine;
}

function parseOperation(raw: unknown, path: string): OperationDefinition {
  if (!isRecord(raw)) fail(path, 'an object');
  const id = raw.id;
  if (!oneOf(OPERATIONS, id)) fail(`${path}.id`, `one of ${OPERATIONS.join(', ')}`);
  return {
    id,
    engine: readString(raw, 'engine', path),
    format: readString(raw, 'format', path).toLowerCase(),
  };
}

function parseEdge(raw: unknown, path: string): ConversionEdge {
  if (!isRecord(raw)) fail(path, 'an object');
  return {
    engine: readString(raw, 'engine', path),
    from: readStringList(raw, 'from', path).map((tag) => tag.toLowerCase()),
    to: readStringList(raw, 'to', path).map((tag) => tag.toLowerCase()),
  };
}

/**
 * Validate a format table read from JSON
 *
 * Every edge and operation must name a declared engine and declared formats.
 *
 * @throws ConfigurationError describing the first offending entry
 */
export function parseFormatTable(raw: unknown): FormatTable {
  if (!isRecord(raw)) fail('root', 'an object');

  const formats = readArray(raw, 'formats', 'root').map((f, i) => parseFormat(f, `formats[${i}]`));
  const engines = readArray(raw, 'engines', 'root').map((e, i) => parseEngine(e, `engines[${i}]`));
  const edges = readArray(raw, 'edges', 'root').map((e, i) => parseEdge(e, `edges[${i}]`));
  const operations =
    raw.operations === undefined
      ? []
      : readArray(raw, 'operations', 'root').map((o, i) => parseOperation(o, `operations[${i}]`));

  const formatTags = new Set<string>();
  for (const format of formats) {
    for (const name of [format.tag, ...(format.aliases ?? [])]) {
      if (formatTags.has(name)) {
        throw new ConfigurationError(`format table: format "${name}" is declared twice`);
      }
      formatTags.add(name);
    }
  }

  const engineIds = new Set<string>();
  for (const engine of engines) {
    if (engineIds.has(engine.id)) {
      throw new ConfigurationError(`format table: engine "${engine.id}" is declared twice`);
    }
    engineIds.add(engine.id);
  }

  const primaryTags = new Set(formats.map((f) => f.tag));
  edges.forEach((edge, i) => {
    if (!engineIds.has(edge.engine)) {
      throw new ConfigurationError(`format table: edges[${i}] uses unknown engine "${edge.engine}"`);
    }
    for (const tag of [...edge.from, ...edge.to]) {
      if (!primaryTags.has(tag)) {
        throw new ConfigurationError(`format table: edges[${i}] uses unknown format "${tag}"`);
      }
    }
  });

  const operationIds = new Set<DocumentOperation>();
  operations.forEach((operation, i) => {
    if (operationIds.has(operation.id)) {
      throw new ConfigurationError(`format table: operation "${operation.id}" is declared twice`);
    }
    operationIds.add(operation.id);
    const engine = engines.find((candidate) => candidate.id === operation.engine);
    if (!engine) {
      throw new ConfigurationError(`format table: operations[${i}] uses unknown engine "${operation.engine}"`);
    }
    if (!primaryTags.has(operation.format)) {
      throw new ConfigurationError(`format table: operations[${i}] uses unknown format "${operation.format}"`);
    }
    if (operation.id === 'merge' && !engine.multiInput) {
      throw new ConfigurationError(`format table: operations[${i}] merges with "${engine.id}", which takes one input`);
    }
  });

  return { formats, engines, edges, operations };
}

/**
 * Apply per-engine binary and timeout overrides from configuration
 */
export function applyEngineOverrides(
  table: FormatTable,
  config: Pick<AppConfig, 'enginePaths' | 'engineTimeouts'>
): FormatTable {
  return {
    ...table,
    engines: table.engines.map((engine) => ({
      ...engine,
      command: config.enginePaths[engine.id] ?? engine.command,
      timeoutMs: config.engineTimeouts[engine.id] ?? engine.timeoutMs,
    })),
  };
}

/**
 * Load the format table: the file at FORMAT_TABLE_PATH when configured,
 * otherwise the bundled default table
 */
export function loadFormatTable(
  config: Pick<AppConfig, 'formatTablePath' | 'enginePaths' | 'engineTimeouts'>
): FormatTable {
  let raw: unknown = defaultTable;

  if (config.formatTablePath) {
    const tablePath = resolve(process.cwd(), config.formatTablePath);
    try {
      raw = JSON.parse(readFileSync(tablePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(
        `cannot read format table ${config.formatTablePath}: ${errorText(error)}`
      );
    }
  }

  return applyEngineOverrides(parseFormatTable(raw), config);
}
