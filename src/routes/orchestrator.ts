/**
 * Orchestrator API Routes
 */

import { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ABTestSchema, ModelVersionSchema } from '../config';
import { Capability, RequestPriority } from '../types';

// Request validation schemas
const detectRequestSchema = z.object({
  photoId: z.string().min(1),
  photoUrl: z.string().url(),
  capabilities: z.array(z.nativeEnum(Capability)).min(1),
  priority: z.nativeEnum(RequestPriority).default(RequestPriority.NORMAL),
  metadata: z.record(z.unknown()).default({}),
  deadlineMs: z.number().int().positive().optional()
});

const requestIdParamsSchema = z.object({
  requestId: z.string().min(1)
});

const modelParamsSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1)
});

const modelPatchSchema = z.object({
  enabled: z.boolean()
});

const experimentParamsSchema = z.object({
  experimentId: z.string().min(1)
});

function correlationIdOf(request: FastifyRequest): string | undefined {
  const header = request.headers['x-correlation-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.length > 0 ? value : undefined;
}

export async function orchestratorRoutes(fastify: FastifyInstance) {
  const { orchestrator } = fastify;

  /**
   * Submit a photo for detection across the requested capabilities
   */
  fastify.post('/detect', async (request) => {
    const { deadlineMs, ...body } = detectRequestSchema.parse(request.body);
    const correlationId = correlationIdOf(request);

    return orchestrator.submit(body, { correlationId, deadlineMs });
  });

  fastify.get('/status/:requestId', async (request) => {
    const { requestId } = requestIdParamsSchema.parse(request.params);
    return orchestrator.getStatus(requestId);
  });

  /**
   * Engine health with an overall summary
   */
  fastify.get('/health', async () => {
    const summary = orchestrator.getHealthSummary();
    return {
      ...summary,
      engines: orchestrator.getHealth(),
      timestamp: new Date()
    };
  });

  fastify.get('/metrics', async () => {
    return orchestrator.getMetrics();
  });

  fastify.get('/models', async () => {
    return {
      models: orchestrator.listModels()
    };
  });

  fastify.post('/models', async (request, reply) => {
    const model = orchestrator.registerModel(ModelVersionSchema.parse(request.body));
    return reply.code(201).send(model);
  });

  fastify.patch('/models/:name/:version', async (request) => {
    const { name, version } = modelParamsSchema.parse(request.params);
    const { enabled } = modelPatchSchema.parse(request.body);
    return orchestrator.setModelEnabled(name, version, enabled);
  });

  fastify.get('/ab-tests', async () => {
    return {
      abTests: orchestrator.listAbTests()
    };
  });

  fastify.post('/ab-tests', async (request, reply) => {
    const test = orchestrator.createAbTest(ABTestSchema.parse(request.body));
    return reply.code(201).send(test);
  });

  fastify.delete('/ab-tests/:experimentId', async (request, reply) => {
    const { experimentId } = experimentParamsSchema.parse(request.params);
    orchestrator.removeAbTest(experimentId);
    return reply.code(204).send();
  });

  fastify.get('/circuit-breakers', async () => {
    return {
      circuitBreakers: orchestrator.getCircuitBreakers()
    };
  });
}
