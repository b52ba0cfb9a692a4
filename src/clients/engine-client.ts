/**
 * Inference engine client
 * Handles communication with the detection engines over HTTP
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { EngineCallError, EngineTimeoutError } from '../errors';
import { engineLogger as logger } from '../utils/logger';
import { Capability, DetectionRequest, ModelVersion } from '../types';

export interface EnginePredictInput {
  capability: Capability;
  model: ModelVersion;
  request: DetectionRequest;
  parameters: Record<string, unknown>;
  signal: AbortSignal;
}

export interface EnginePrediction {
  results: Record<string, unknown>;
  confidence: number;
  modelVersion: string;
}

export interface HealthProbeOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Contract the orchestrator consumes; tests substitute in-process fakes
 */
export interface EngineClient {
  predict(input: EnginePredictInput): Promise<EnginePrediction>;
  checkHealth(endpoint: string, options: HealthProbeOptions): Promise<void>;
}

// Engines answer in snake_case
const PredictionResponseSchema = z.object({
  results: z.record(z.unknown()).default({}),
  confidence: z.number().min(0).max(1),
  model_version: z.string().optional()
});

export class HttpEngineClient implements EngineClient {
  private client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client = client ?? axios.create({
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'DetectionOrchestrator/1.0.0'
      }
    });
  }

  async predict(input: EnginePredictInput): Promise<EnginePrediction> {
    const { model, request } = input;
    const url = `${model.endpoint}/predict`;

    let data: unknown;
    try {
      const response = await this.client.post(url, {
        photo_id: request.photoId,
        photo_url: request.photoUrl,
        metadata: request.metadata,
        model_version: model.version,
        priority: request.priority,
        parameters: input.parameters
      }, { signal: input.signal });
      data = response.data;
    } catch (error) {
      throw this.toEngineError(model.endpoint, error);
    }

    const parsed = PredictionResponseSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({
        endpoint: model.endpoint,
        capability: input.capability,
        issues: parsed.error.errors.map(err => `${err.path.join('.')}: ${err.message}`)
      }, 'Malformed engine payload');
      throw new EngineCallError(model.endpoint, 'malformed response payload');
    }

    return {
      results: parsed.data.results,
      confidence: parsed.data.confidence,
      modelVersion: parsed.data.model_version ?? model.version
    };
  }

  async checkHealth(endpoint: string, options: HealthProbeOptions): Promise<void> {
    try {
      await this.client.get(`${endpoint}/health`, {
        timeout: options.timeoutMs,
        signal: options.signal
      });
    } catch (error) {
      throw this.toEngineError(endpoint, error, options.timeoutMs);
    }
  }

  private toEngineError(endpoint: string, error: unknown, timeoutMs?: number): Error {
    if (axios.isAxiosError(error)) {
      if (timeoutMs !== undefined && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
        return new EngineTimeoutError(endpoint, timeoutMs, 'health probe');
      }
      if (error.response) {
        return new EngineCallError(endpoint, `HTTP ${error.response.status}`, error.response.status);
      }
      return new EngineCallError(endpoint, error.code ?? error.message);
    }
    return new EngineCallError(endpoint, error instanceof Error ? error.message : String(error));
  }
}
