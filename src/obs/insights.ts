/**
 * Azure Application Insights observability wrapper using OpenTelemetry
 *
 * Provides:
 * - Conversion metrics (duration histogram, failure counter)
 * - Pool gauges (active and queued conversions)
 * - Dependency spans, one per engine invocation
 * - A no-op mode when telemetry is disabled or unavailable
 */

import { useAzureMonitor } from '@azure/monitor-opentelemetry';
import { metrics, trace, context, SpanStatusCode } from '@opentelemetry/api';
import type { Counter, Histogram, Meter } from '@opentelemetry/api';
import type { AppConfig } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('obs:insights');

// Service metadata
const SERVICE_NAME = 'office-conversion-service';
const SERVICE_VERSION = '1.0.0';

// Telemetry state
let isInitialized = false;
let telemetryEnabled = false;
let meter: Meter | null = null;

// Metric instruments
let conversionDurationHistogram: Histogram | null = null;
let conversionFailuresCounter: Counter | null = null;
let conversionPoolActiveHistogram: Histogram | null = null;
let conversionPoolQueuedHistogram: Histogram | null = null;

export type TelemetryConfig = Pick<AppConfig, 'nodeEnv' | 'enableTelemetry' | 'azureMonitorConnectionString'>;

/**
 * Initialize Azure Application Insights with OpenTelemetry
 *
 * Stays disabled under test, when ENABLE_TELEMETRY=false, or without
 * AZURE_MONITOR_CONNECTION_STRING.
 */
export function initializeAppInsights(config: TelemetryConfig): void {
  if (isInitialized) {
    return;
  }

  if (config.nodeEnv === 'test') {
    logger.info('App Insights disabled in test environment');
    telemetryEnabled = false;
    isInitialized = true;
    return;
  }

  if (!config.enableTelemetry) {
    logger.info('Telemetry disabled by ENABLE_TELEMETRY=false');
    telemetryEnabled = false;
    isInitialized = true;
    return;
  }

  if (!config.azureMonitorConnectionString) {
    logger.warn('AZURE_MONITOR_CONNECTION_STRING not set. App Insights telemetry disabled.');
    telemetryEnabled = false;
    isInitialized = true;
    return;
  }

  try {
    useAzureMonitor({
      azureMonitorExporterOptions: {
        connectionString: config.azureMonitorConnectionString,
      },
    });

    meter = metrics.getMeter(SERVICE_NAME, SERVICE_VERSION);
    createMetricInstruments();

    telemetryEnabled = true;
    isInitialized = true;

    logger.info({ service: SERVICE_NAME, version: SERVICE_VERSION }, 'App Insights initialized successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize App Insights');
    telemetryEnabled = false;
    isInitialized = true;
  }
}

/**
 * Create all metric instruments
 */
function createMetricInstruments(): void {
  if (!meter) {
    return;
  }

  conversionDurationHistogram = meter.createHistogram('conversion_duration_ms', {
    description: 'End-to-end conversion duration in milliseconds',
    unit: 'ms',
  });

  conversionFailuresCounter = meter.createCounter('conversion_failures_total', {
    description: 'Total number of failed conversions',
  });

  // Histograms record the gauge-like pool values
  conversionPoolActiveHistogram = meter.createHistogram('conversion_pool_active', {
    description: 'Number of active conversion jobs',
  });

  conversionPoolQueuedHistogram = meter.createHistogram('conversion_pool_queued', {
    description: 'Number of queued conversion jobs',
  });

  logger.debug('Metric instruments created');
}

/**
 * Track a metric (counter or histogram)
 *
 * @param name - Metric name
 * @param value - Metric value
 * @param dimensions - Metric dimensions/attributes
 */
export function trackMetric(name: string, value: number, dimensions: Record<string, string | number> = {}): void {
  if (!telemetryEnabled || !isInitialized) {
    return;
  }

  try {
    switch (name) {
      case 'conversion_duration_ms':
        conversionDurationHistogram?.record(value, dimensions);
        break;
      case 'conversion_failures_total':
        conversionFailuresCounter?.add(value, dimensions);
        break;
      default:
        logger.warn({ name }, 'Unknown metric name');
    }
  } catch (error) {
    logger.error({ error, name }, 'Failed to track metric');
  }
}

/**
 * Track a gauge metric (point-in-time measurement)
 */
export function trackGauge(name: string, value: number, dimensions: Record<string, string | number> = {}): void {
  if (!telemetryEnabled || !isInitialized) {
    return;
  }

  try {
    switch (name) {
      case 'conversion_pool_active':
        conversionPoolActiveHistogram?.record(value, dimensions);
        break;
      case 'conversion_pool_queued':
        conversionPoolQueuedHistogram?.record(value, dimensions);
        break;
      default:
        logger.warn({ name }, 'Unknown gauge name');
    }
  } catch (error) {
    logger.error({ error, name }, 'Failed to track gauge');
  }
}

/**
 * Dependency tracking options
 */
export interface DependencyOptions {
  /** Dependency type: the engine suite ("office", "poppler", ...) */
  type: string;
  /** Dependency name, e.g. "soffice docx>pdf" */
  name: string;
  /** Duration in milliseconds */
  duration: number;
  success: boolean;
  /** Correlation ID for distributed tracing */
  correlationId: string;
  /** Optional error message for failed dependencies */
  error?: string;
}

/**
 * Track one engine invocation as an OpenTelemetry span
 */
export function trackDependency(options: DependencyOptions): void {
  if (!telemetryEnabled || !isInitialized) {
    return;
  }

  try {
    const tracer = trace.getTracer(SERVICE_NAME, SERVICE_VERSION);
    const span = tracer.startSpan(options.name, { startTime: Date.now() - options.duration }, context.active());

    span.setAttribute('dependency.type', options.type);
    span.setAttribute('dependency.name', options.name);
    span.setAttribute('dependency.duration', options.duration);
    span.setAttribute('correlationId', options.correlationId);

    if (options.success) {
      span.setStatus({ code: SpanStatusCode.OK });
    } else {
      span.setStatus({ code: SpanStatusCode.ERROR });
      if (options.error) {
        span.recordException(options.error);
      }
    }

    span.end();
  } catch (error) {
    logger.error({ error, options }, 'Failed to track dependency');
  }
}

/**
 * Check if telemetry is enabled
 */
export function isTelemetryEnabled(): boolean {
  return telemetryEnabled;
}

/**
 * Check if App Insights is initialized
 */
export function isAppInsightsInitialized(): boolean {
  return isInitialized;
}
