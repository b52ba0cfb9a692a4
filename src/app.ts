import Fastify, { FastifyError } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import { ZodError } from 'zod';
import { AppError } from './errors';
import { DetectionOrchestrator } from './orchestrator/detection-orchestrator';
import { orchestratorRoutes } from './routes/orchestrator';
import { httpLogger } from './utils/logger';

declare module 'fastify' {
  interface FastifyInstance {
    orchestrator: DetectionOrchestrator;
  }
}

export interface BuildAppOptions {
  corsOrigins?: string[];
  logRequests?: boolean;
}

/**
 * Fastify app exposing one orchestrator instance
 */
export async function buildApp(orchestrator: DetectionOrchestrator, options: BuildAppOptions = {}) {
  const fastify = Fastify({
    logger: httpLogger,
    requestIdLogLabel: 'requestId',
    disableRequestLogging: !(options.logRequests ?? true),
    requestIdHeader: 'x-request-id',
    trustProxy: true
  });

  await fastify.register(cors, {
    origin: options.corsOrigins ?? ['http://localhost:3000'],
    credentials: true
  });
  await fastify.register(helmet, {
    contentSecurityPolicy: false // Disable for API
  });
  await fastify.register(sensible);

  fastify.decorate('orchestrator', orchestrator);

  await fastify.register(orchestratorRoutes, { prefix: '/api/v1/orchestrator' });

  // Metrics endpoint for Prometheus
  fastify.get('/metrics', async (_request, reply) => {
    reply.header('Content-Type', orchestrator.prometheusContentType);
    return orchestrator.prometheusMetrics();
  });

  fastify.get('/', async () => {
    return {
      service: 'Detection Orchestrator',
      version: '1.0.0',
      status: 'running',
      timestamp: new Date()
    };
  });

  fastify.setErrorHandler((error: FastifyError | AppError | ZodError, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({
        success: false,
        error: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: error.errors.map(err => ({
          field: err.path.join('.'),
          message: err.message,
          code: err.code
        }))
      });
    }

    if (error instanceof AppError) {
      if (!error.isOperational || error.statusCode >= 500) {
        request.log.error({ err: error }, 'Request error');
      }
      return reply.status(error.statusCode).send({
        success: false,
        error: error.errorCode ?? error.name,
        message: error.message
      });
    }

    const statusCode = error.statusCode ?? 500;
    request.log.error({
      err: error,
      request: {
        method: request.method,
        url: request.url
      }
    }, 'Request error');

    return reply.status(statusCode).send({
      success: false,
      error: statusCode >= 500 ? 'INTERNAL_ERROR' : 'HTTP_ERROR',
      message: statusCode >= 500 ? 'Internal server error' : error.message
    });
  });

  return fastify;
}
