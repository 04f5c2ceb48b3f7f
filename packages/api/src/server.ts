import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { healthRoutes } from './routes/health';
import { queryRoutes } from './routes/query';
import type { HealthAggregator } from './services/health';
import type { RagOrchestrator } from './services/orchestrator';

export interface ServerDeps {
  orchestrator: RagOrchestrator;
  health: HealthAggregator;
  corsOrigins: string[];
  logger?: FastifyServerOptions['logger'];
  version?: string;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: deps.logger ?? true,
    requestIdLogLabel: 'reqId',
    disableRequestLogging: false,
    requestIdHeader: 'x-request-id',
  });

  // Register plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: deps.corsOrigins,
    credentials: true,
  });

  // Register routes
  await fastify.register(healthRoutes, { prefix: '/health', health: deps.health, version: deps.version ?? '0.1.0' });
  await fastify.register(queryRoutes, { prefix: '/api/v1/query', orchestrator: deps.orchestrator });

  return fastify;
}
