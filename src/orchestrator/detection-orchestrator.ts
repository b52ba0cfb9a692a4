/**
 * Detection Orchestrator - owns the registry, breakers, health monitor,
 * balancer, dispatcher, metrics and history of one service instance
 */

import { ModelRegistry } from '../registry/model-registry';
import { CircuitBreakerRegistry } from '../breaker/circuit-breaker-registry';
import type { StateChangeEvent } from '../breaker/circuit-breaker';
import { HealthMonitor } from '../health/health-monitor';
import { LoadBalancer } from '../balancer/load-balancer';
import { RequestDispatcher } from '../dispatcher/request-dispatcher';
import { MetricsCollector } from '../metrics/metrics-collector';
import { RequestHistory } from '../history/request-history';
import { EngineClient, HttpEngineClient } from '../clients/engine-client';
import type { ModelCatalog, OrchestratorSettings } from '../config';
import { ExperimentNotFoundError, ModelNotFoundError } from '../errors';
import logger from '../utils/logger';
import {
  ABTestConfig,
  BalancingStrategy,
  CapabilityMap,
  CircuitBreakerSnapshot,
  DetectionRequest,
  DetectionResponse,
  EngineHealth,
  HealthSummary,
  ModelVersion,
  OrchestratorMetrics,
  SubmitOptions
} from '../types';

export interface DetectionOrchestratorOptions {
  settings?: Partial<OrchestratorSettings>;
  catalog?: ModelCatalog;
  client?: EngineClient;
  random?: () => number;
}

export class DetectionOrchestrator {
  public readonly registry: ModelRegistry;
  public readonly breakers: CircuitBreakerRegistry;
  public readonly healthMonitor: HealthMonitor;
  public readonly balancer: LoadBalancer;
  public readonly metrics: MetricsCollector;
  public readonly history: RequestHistory;
  private readonly dispatcher: RequestDispatcher;

  constructor(options: DetectionOrchestratorOptions = {}) {
    const settings = options.settings ?? {};
    const client = options.client ?? new HttpEngineClient();

    this.registry = new ModelRegistry(options.catalog?.models, options.catalog?.abTests);
    this.metrics = new MetricsCollector(settings.metricsWindowSize ?? 1000);
    this.history = new RequestHistory({
      capacity: settings.historyCapacity ?? 1000,
      ttlMs: (settings.historyTtlSeconds ?? 0) * 1000
    });

    this.breakers = new CircuitBreakerRegistry({
      threshold: settings.circuitBreakerThreshold ?? 5,
      resetTimeoutMs: (settings.circuitBreakerTimeoutSeconds ?? 60) * 1000
    });
    this.breakers.on('stateChange', (event: StateChangeEvent) => {
      this.metrics.recordCircuitState(event.endpoint, event.to);
    });

    this.healthMonitor = new HealthMonitor(
      this.registry,
      this.breakers,
      client,
      {
        intervalSeconds: settings.healthCheckIntervalSeconds ?? 30,
        timeoutMs: settings.healthCheckTimeoutMs ?? 2000
      },
      this.metrics
    );

    this.balancer = new LoadBalancer(this.registry, this.breakers, {
      strategy: settings.strategy ?? BalancingStrategy.ROUND_ROBIN,
      latencies: this.healthMonitor,
      random: options.random
    });

    this.dispatcher = new RequestDispatcher(
      this.balancer,
      this.breakers,
      client,
      this.metrics,
      this.history,
      {
        engineTimeoutMs: settings.engineTimeoutMs,
        requestTimeoutMs: settings.requestTimeoutMs
      }
    );
  }

  start(): void {
    this.healthMonitor.start();
    logger.info({ models: this.registry.getEnabledEndpoints().length }, 'Detection orchestrator started');
  }

  stop(): void {
    this.healthMonitor.stop();
    logger.info('Detection orchestrator stopped');
  }

  submit(request: DetectionRequest, options: SubmitOptions = {}): Promise<DetectionResponse> {
    return this.dispatcher.process(request, options);
  }

  getStatus(requestId: string): DetectionResponse {
    return this.history.get(requestId);
  }

  getHealth(): CapabilityMap<EngineHealth[]> {
    return this.healthMonitor.getHealth();
  }

  getHealthSummary(): HealthSummary {
    return this.healthMonitor.summary();
  }

  getMetrics(): OrchestratorMetrics {
    return this.metrics.snapshot();
  }

  listModels(): CapabilityMap<ModelVersion[]> {
    return this.registry.snapshot();
  }

  registerModel(model: ModelVersion): ModelVersion {
    return this.registry.register(model);
  }

  setModelEnabled(name: string, version: string, enabled: boolean): ModelVersion {
    const updated = this.registry.setEnabled(name, version, enabled);
    if (!updated) {
      throw new ModelNotFoundError(name, version);
    }
    return updated;
  }

  createAbTest(config: ABTestConfig): ABTestConfig {
    return this.registry.createAbTest(config);
  }

  removeAbTest(experimentId: string): void {
    if (!this.registry.removeAbTest(experimentId)) {
      throw new ExperimentNotFoundError(experimentId);
    }
  }

  listAbTests(): ABTestConfig[] {
    return this.registry.listAbTests();
  }

  getCircuitBreakers(): CircuitBreakerSnapshot[] {
    return this.breakers.snapshot();
  }

  /**
   * Prometheus exposition text for this instance's registry
   */
  prometheusMetrics(): Promise<string> {
    return this.metrics.prometheus.register.metrics();
  }

  get prometheusContentType(): string {
    return this.metrics.prometheus.register.contentType;
  }
}
