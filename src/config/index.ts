import { readFileSync } from 'fs';
import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigurationError } from '../errors';
import { ABTestConfig, BalancingStrategy, Capability, ModelVersion } from '../types';

dotenv.config();

const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'staging', 'production']),
  server: z.object({
    host: z.string(),
    port: z.number().int().positive(),
    corsOrigins: z.array(z.string())
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    pretty: z.boolean()
  }),
  orchestrator: z.object({
    strategy: z.nativeEnum(BalancingStrategy),
    healthCheckIntervalSeconds: z.number().int().positive(),
    healthCheckTimeoutMs: z.number().int().positive(),
    circuitBreakerThreshold: z.number().int().min(1),
    circuitBreakerTimeoutSeconds: z.number().int().positive(),
    engineTimeoutMs: z.record(z.nativeEnum(Capability), z.number().int().positive()),
    requestTimeoutMs: z.number().int().positive(),
    metricsWindowSize: z.number().int().positive(),
    historyCapacity: z.number().int().positive(),
    historyTtlSeconds: z.number().int().nonnegative() // 0 disables expiry
  }),
  modelsConfigPath: z.string()
});

export type Config = z.infer<typeof ConfigSchema>;
export type OrchestratorSettings = Config['orchestrator'];

const ModelVersionSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  capability: z.nativeEnum(Capability),
  endpoint: z.string().url(),
  confidenceThreshold: z.number().min(0).max(1).default(0.75),
  enabled: z.boolean().default(true)
});

const ABTestSchema = z.object({
  experimentId: z.string().min(1),
  modelA: ModelVersionSchema,
  modelB: ModelVersionSchema,
  trafficSplit: z.number().min(0).max(1).default(0.5),
  enabled: z.boolean().default(true)
});

const ModelCatalogSchema = z.object({
  models: z.array(ModelVersionSchema),
  abTests: z.array(ABTestSchema).default([])
});

export interface ModelCatalog {
  models: ModelVersion[];
  abTests: ABTestConfig[];
}

export { ModelVersionSchema, ABTestSchema };

function int(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  return Number(value);
}

/**
 * Build and validate the service configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const engineTimeoutMs = int(env.ENGINE_TIMEOUT_MS, 5000);

  const raw = {
    environment: env.NODE_ENV || 'development',
    server: {
      host: env.HOST || '0.0.0.0',
      port: int(env.PORT, 8010),
      corsOrigins: env.CORS_ORIGIN?.split(',') || ['http://localhost:3000']
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      pretty: env.LOG_PRETTY !== 'false'
    },
    orchestrator: {
      strategy: env.LB_STRATEGY || BalancingStrategy.ROUND_ROBIN,
      healthCheckIntervalSeconds: int(env.HEALTH_CHECK_INTERVAL_SECONDS, 30),
      healthCheckTimeoutMs: int(env.HEALTH_CHECK_TIMEOUT_MS, 2000),
      circuitBreakerThreshold: int(env.CIRCUIT_BREAKER_THRESHOLD, 5),
      circuitBreakerTimeoutSeconds: int(env.CIRCUIT_BREAKER_TIMEOUT_SECONDS, 60),
      engineTimeoutMs: {
        [Capability.DAMAGE]: int(env.DAMAGE_ENGINE_TIMEOUT_MS, engineTimeoutMs),
        [Capability.MATERIAL]: int(env.MATERIAL_ENGINE_TIMEOUT_MS, engineTimeoutMs),
        [Capability.VOLUME]: int(env.VOLUME_ENGINE_TIMEOUT_MS, engineTimeoutMs)
      },
      requestTimeoutMs: int(env.REQUEST_TIMEOUT_MS, 30000),
      metricsWindowSize: int(env.METRICS_WINDOW_SIZE, 1000),
      historyCapacity: int(env.HISTORY_CAPACITY, 1000),
      historyTtlSeconds: int(env.HISTORY_TTL_SECONDS, 0)
    },
    modelsConfigPath: env.MODELS_CONFIG_PATH || 'config/models.json'
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.errors
      .map(err => `${err.path.join('.')}: ${err.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  return parsed.data;
}

/**
 * Parse a model catalog document (registered versions plus A/B experiments)
 */
export function parseModelCatalog(document: unknown): ModelCatalog {
  const parsed = ModelCatalogSchema.safeParse(document);
  if (!parsed.success) {
    const details = parsed.error.errors
      .map(err => `${err.path.join('.')}: ${err.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid model catalog: ${details}`);
  }
  return parsed.data;
}

export function loadModelCatalog(path: string): ModelCatalog {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Unable to read model catalog at ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseModelCatalog(document);
}

export const config = loadConfig();
