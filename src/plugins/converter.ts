import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import type { AppConfig, FormatTable } from '../types';
import { ArtifactStore } from '../artifacts/store';
import { FormatResolver } from '../formats';
import { ConversionPipeline, ConversionService } from '../convert';

/**
 * Fastify plugin wiring the conversion components onto the instance
 */

export interface Converter {
  config: AppConfig;
  table: FormatTable;
  store: ArtifactStore;
  resolver: FormatResolver;
  pipeline: ConversionPipeline;
  service: ConversionService;
}

declare module 'fastify' {
  interface FastifyInstance {
    converter: Converter;
  }
}

interface ConverterPluginOptions {
  config: AppConfig;
  table: FormatTable;
}

async function converterPlugin(app: FastifyInstance, options: ConverterPluginOptions): Promise<void> {
  const { config, table } = options;

  const store = new ArtifactStore(config.conversionWorkdir);
  const resolver = new FormatResolver(table, { enabledEngines: config.enabledEngines });
  const pipeline = new ConversionPipeline(store, resolver, { maxDiagnosticBytes: config.maxDiagnosticBytes });
  const service = new ConversionService({
    store,
    resolver,
    pipeline,
    maxConcurrent: config.conversionMaxConcurrent,
  });

  app.decorate('converter', { config, table, store, resolver, pipeline, service });

  // Scopes still open at shutdown belong to requests that never finished
  app.addHook('onClose', async () => {
    await store.closeAll();
  });

  app.log.info(
    { enabledEngines: config.enabledEngines, maxConcurrent: config.conversionMaxConcurrent },
    'Converter plugin registered'
  );
}

export default fp(converterPlugin, {
  name: 'converter',
  fastify: '4.x',
});
