import { tmpdir } from 'os';
import { AppConfig } from '../types';
import { ConfigurationError } from '../errors';
import defaultTable from '../formats/default-table.json';
import { MAX_TIMEOUT_MS } from '../convert/runner';

export const DEFAULT_ENABLED_ENGINES = ['soffice', 'pdftoppm', 'ghostscript', 'imagemagick', 'pdfwrite', 'pdfunite'];

/** Engine ids of the bundled format table */
const BUNDLED_ENGINES = defaultTable.engines.map((engine) => engine.id);

function parseInteger(value: string | undefined, fallback: number): number {
  return value === undefined || value.trim() === '' ? fallback : Number(value);
}

function parseList(value: string | undefined): string[] | undefined {
  const items = value
    ?.split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return items && items.length > 0 ? items : undefined;
}

/**
 * `<ENGINE>_TIMEOUT_MS` and `<ENGINE>_PATH` for every engine we know of
 */
function loadEngineOverrides(
  env: NodeJS.ProcessEnv,
  engineIds: readonly string[]
): Pick<AppConfig, 'engineTimeouts' | 'enginePaths'> {
  const engineTimeouts: Record<string, number> = {};
  const enginePaths: Record<string, string> = {};

  for (const id of new Set(engineIds)) {
    const prefix = id.toUpperCase().replace(/[^A-Z0-9]/g, '_');
    const timeout = env[`${prefix}_TIMEOUT_MS`];
    if (timeout !== undefined && timeout.trim() !== '') {
      engineTimeouts[id] = Number(timeout);
    }
    const binary = env[`${prefix}_PATH`];
    if (binary !== undefined && binary.trim() !== '') {
      enginePaths[id] = binary.trim();
    }
  }

  return { engineTimeouts, enginePaths };
}

/**
 * Load configuration from environment variables
 *
 * dotenv has already populated `process.env` by the time this runs (see
 * server.ts). Values are parsed here and checked by `validateConfig`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const enabledEngines = parseList(env.ENABLED_ENGINES) ?? DEFAULT_ENABLED_ENGINES;

  return {
    port: parseInteger(env.PORT, 8080),
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    // Conversion pipeline settings
    conversionWorkdir: env.CONVERSION_WORKDIR || tmpdir(),
    conversionMaxConcurrent: parseInteger(env.CONVERSION_MAX_CONCURRENT, 8),
    maxUploadBytes: parseInteger(env.MAX_UPLOAD_BYTES, 200 * 1024 * 1024),
    maxDiagnosticBytes: parseInteger(env.MAX_DIAGNOSTIC_BYTES, 4096),
    enabledEngines,
    formatTablePath: env.FORMAT_TABLE_PATH || undefined,
    ...loadEngineOverrides(env, [...BUNDLED_ENGINES, ...enabledEngines]),
    // Azure Application Insights settings
    azureMonitorConnectionString: env.AZURE_MONITOR_CONNECTION_STRING,
    enableTelemetry: env.ENABLE_TELEMETRY !== 'false', // Enabled by default, can be explicitly disabled
  };
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Reject configuration the service cannot run with
 *
 * @param engineIds - Engines declared by the loaded format table
 * @throws ConfigurationError naming the first offending setting
 */
export function validateConfig(config: AppConfig, engineIds: readonly string[] = BUNDLED_ENGINES): void {
  assertPositiveInteger('PORT', config.port);
  assertPositiveInteger('CONVERSION_MAX_CONCURRENT', config.conversionMaxConcurrent);
  assertPositiveInteger('MAX_UPLOAD_BYTES', config.maxUploadBytes);
  assertPositiveInteger('MAX_DIAGNOSTIC_BYTES', config.maxDiagnosticBytes);

  const known = new Set(engineIds);
  const unknown = config.enabledEngines.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new ConfigurationError(`ENABLED_ENGINES names unknown engines: ${unknown.join(', ')}`);
  }

  for (const [id, timeoutMs] of Object.entries(config.engineTimeouts)) {
    const name = `${id.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_TIMEOUT_MS`;
    assertPositiveInteger(name, timeoutMs);
    if (timeoutMs > MAX_TIMEOUT_MS) {
      throw new ConfigurationError(`${name} must be at most ${MAX_TIMEOUT_MS}, got ${timeoutMs}`);
    }
  }
}
