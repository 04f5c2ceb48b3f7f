import type { FastifyInstance } from 'fastify';
import { config } from './config';
import { createRuntime, type Runtime } from './runtime';
import { buildServer } from './server';
import { logger } from './utils/logger';

let runtime: Runtime | undefined;
let server: FastifyInstance | undefined;

async function start() {
  try {
    runtime = createRuntime(config);
    await runtime.health.start();

    server = await buildServer({
      orchestrator: runtime.orchestrator,
      health: runtime.health,
      corsOrigins: config.corsOrigins,
      logger: { level: config.logLevel },
    });

    // Start server
    await server.listen({
      port: config.port,
      host: config.host,
    });

    logger.info(
      { overall: runtime.health.getHealth().overall },
      `API server running at http://${config.host}:${config.port}`
    );
  } catch (err) {
    logger.error(err, 'Failed to start server');
    await runtime?.close();
    process.exit(1);
  }
}

// Graceful shutdown
const shutdown = async (signal: string) => {
  logger.info(`${signal} received, shutting down gracefully...`);
  try {
    await server?.close();
    await runtime?.close();
    process.exit(0);
  } catch (err) {
    logger.error(err, 'Shutdown failed');
    process.exit(1);
  }
};

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

void start();
