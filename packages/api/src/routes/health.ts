import type { FastifyPluginAsync } from 'fastify';
import type { HealthAggregator } from '../services/health';

export interface HealthRouteOptions {
  health: HealthAggregator;
  version: string;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, { health, version }) => {
  /**
   * GET /health
   * Process liveness only; never touches a provider.
   */
  fastify.get('/', async () => {
    const liveness = health.getLiveness();
    return {
      status: liveness.status,
      timestamp: new Date().toISOString(),
      service: 'statute-rag-api',
      version,
      uptimeSeconds: liveness.uptimeSeconds,
    };
  });

  /**
   * GET /health/ready
   * Last aggregated snapshot; 503 while the RAG subsystem is down.
   */
  fastify.get('/ready', async (request, reply) => {
    const report = health.getHealth();
    return reply.code(report.overall === 'down' ? 503 : 200).send(report);
  });
};
