/**
 * Detection Orchestrator Service - Main entry point
 */

import { config, loadModelCatalog } from './config';
import { DetectionOrchestrator } from './orchestrator/detection-orchestrator';
import { buildApp } from './app';
import logger from './utils/logger';

async function start() {
  const catalog = loadModelCatalog(config.modelsConfigPath);
  const orchestrator = new DetectionOrchestrator({
    settings: config.orchestrator,
    catalog
  });

  const fastify = await buildApp(orchestrator, { corsOrigins: config.server.corsOrigins });

  // Graceful shutdown
  const gracefulShutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down gracefully...');

    try {
      orchestrator.stop();
      await fastify.close();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  await fastify.listen({ port: config.server.port, host: config.server.host });
  orchestrator.start();

  logger.info({
    port: config.server.port,
    host: config.server.host,
    environment: config.environment,
    strategy: config.orchestrator.strategy,
    models: catalog.models.length,
    abTests: catalog.abTests.length
  }, 'Detection orchestrator service started');
}

start().catch((err) => {
  logger.fatal({ err }, 'Failed to start service');
  process.exit(1);
});
