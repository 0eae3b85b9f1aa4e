import pino from 'pino';

function isLevel(value: string): value is pino.LevelWithSilent {
  return value === 'silent' || value in pino.levels.values;
}

/**
 * Get the log level from environment variables
 * Priority: LOG_LEVEL > NODE_ENV=test (silent) > default (info)
 */
function getLogLevel(): pino.LevelWithSilent {
  const configured = process.env.LOG_LEVEL;
  if (configured && isLevel(configured)) {
    return configured;
  }

  // In test and CI environments, default to silent to reduce noise
  if (process.env.NODE_ENV === 'test' || process.env.CI === 'true') {
    return 'silent';
  }

  return 'info';
}

/**
 * Create a named logger with environment-aware log level
 * @param name - Logger name (used for filtering and debugging)
 */
export function createLogger(name: string): pino.Logger {
  return pino({
    name,
    level: getLogLevel(),
  });
}
