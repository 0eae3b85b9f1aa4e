import dotenv from 'dotenv';
import Fastify, { FastifyInstance } from 'fastify';
import { healthRoutes } from './routes/health';
import { convertRoutes } from './routes/convert';
import { operationRoutes } from './routes/operations';
import converterPlugin from './plugins/converter';
import { loadConfig, validateConfig } from './config';
import { loadFormatTable } from './formats';
import { createErrorHandler, ValidationError } from './errors';
import { initializeAppInsights } from './obs';
import type { AppConfig, FormatTable } from './types';

// Load environment variables from .env file
dotenv.config();

// Base64 inflates the upload by 4/3; the rest of the JSON body gets some slack
const BODY_OVERHEAD_BYTES = 64 * 1024;

export interface BuildOptions {
  /** Overrides applied on top of the environment configuration */
  config?: Partial<AppConfig>;
  /** Use this table instead of loading one from config */
  formatTable?: FormatTable;
}

/**
 * Build and configure the Fastify application
 * @returns Configured Fastify instance
 */
export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const config: AppConfig = { ...loadConfig(), ...options.config };
  const table = options.formatTable ?? loadFormatTable(config);
  validateConfig(
    config,
    table.engines.map((engine) => engine.id)
  );

  initializeAppInsights(config);

  // Create Fastify instance with JSON logger and custom schema error formatter
  const app = Fastify({
    logger: config.nodeEnv === 'test' ? false : { level: config.logLevel },
    bodyLimit: Math.ceil((config.maxUploadBytes * 4) / 3) + BODY_OVERHEAD_BYTES,
    // Format validation errors consistently
    schemaErrorFormatter: (errors, dataVar) => {
      const first = errors[0];
      const location = first?.instancePath ? `${dataVar}${first.instancePath}` : dataVar;
      return new ValidationError(`${location} ${first?.message ?? 'is invalid'}`);
    },
  });

  // Register error handler for all errors (including validation errors)
  app.setErrorHandler(createErrorHandler(app));

  await app.register(converterPlugin, { config, table });

  // Register routes
  await app.register(healthRoutes);
  await app.register(convertRoutes);
  await app.register(operationRoutes);

  return app;
}

/**
 * Start the server if this file is run directly
 */
if (require.main === module) {
  build()
    .then(async (app) => {
      const { port, nodeEnv } = app.converter.config;
      try {
        await app.listen({
          port,
          host: '0.0.0.0', // Required for container deployments
        });

        app.log.info(`Server listening on port ${port}`);
        app.log.info(`Environment: ${nodeEnv}`);
      } catch (err) {
        app.log.error(err);
        process.exit(1);
      }

      // Graceful shutdown: onClose removes every scope directory still open
      const shutdown = async (signal: string): Promise<void> => {
        app.log.info(`Received ${signal}, shutting down gracefully...`);
        await app.close();
        process.exit(0);
      };

      process.on('SIGTERM', () => void shutdown('SIGTERM'));
      process.on('SIGINT', () => void shutdown('SIGINT'));
    })
    .catch((err) => {
      console.error('Failed to build application:', err);
      process.exit(1);
    });
}
