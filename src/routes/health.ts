import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { HealthStatus, ReadinessStatus } from '../types';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import { findExecutable } from '../utils/executable';

/**
 * Health check routes
 */
export async function healthRoutes(app: FastifyInstance): Promise<void> {
  /**
   * GET /healthz - Liveness check
   * Always returns 200 if the service is running
   */
  app.get<{ Reply: HealthStatus }>('/healthz', async (request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);
    return reply.code(200).send({ status: 'ok' });
  });

  /**
   * GET /readyz - Readiness check
   * Returns 200 when every enabled engine's binary can be found, 503 otherwise
   */
  app.get<{ Reply: ReadinessStatus }>('/readyz', async (request: FastifyRequest, reply: FastifyReply) => {
    const correlationId = getCorrelationId(request);
    setCorrelationId(reply, correlationId);

    const { config, table } = app.converter;
    const enabled = new Set(config.enabledEngines);
    const engines: Record<string, boolean> = {};

    await Promise.all(
      table.engines
        .filter((engine) => enabled.has(engine.id))
        .map(async (engine) => {
          engines[engine.id] = (await findExecutable(engine.command)) !== undefined;
        })
    );

    const missing = Object.keys(engines).filter((id) => !engines[id]);
    if (missing.length > 0) {
      request.log.warn({ correlationId, missing }, 'Engine binaries not found');
    }

    const status: ReadinessStatus = {
      ready: missing.length === 0,
      checks: { engines },
    };

    return reply.code(status.ready ? 200 : 503).send(status);
  });
}
