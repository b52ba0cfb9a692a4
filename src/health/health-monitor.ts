/**
 * Health Monitor - periodic liveness probing of every enabled engine endpoint
 */

import pTimeout from 'p-timeout';
import type { EngineClient } from '../clients/engine-client';
import { CircuitBreakerRegistry } from '../breaker/circuit-breaker-registry';
import { ModelRegistry } from '../registry/model-registry';
import { MetricsCollector } from '../metrics/metrics-collector';
import { EngineTimeoutError, errorMessage } from '../errors';
import { healthLogger as logger } from '../utils/logger';
import { Capability, CapabilityMap, EngineHealth, HealthSummary } from '../types';

export interface HealthMonitorOptions {
  intervalSeconds?: number;
  timeoutMs?: number;
}

function healthKey(capability: Capability, endpoint: string): string {
  return `${capability}|${endpoint}`;
}

export class HealthMonitor {
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private health = new Map<string, EngineHealth>();
  private timer?: NodeJS.Timeout;
  private controller?: AbortController;
  private running = false;

  constructor(
    private readonly registry: ModelRegistry,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly client: EngineClient,
    options: HealthMonitorOptions = {},
    private readonly metrics?: MetricsCollector
  ) {
    this.intervalMs = (options.intervalSeconds ?? 30) * 1000;
    this.timeoutMs = options.timeoutMs ?? 2000;

    this.syncEntries();
    for (const event of ['model:registered', 'model:removed', 'abtest:created', 'abtest:removed', 'abtest:updated']) {
      this.registry.on(event, () => this.syncEntries());
    }
  }

  /**
   * Probe once now, then on every interval until stopped
   */
  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.runChecks();
    }, this.intervalMs);
    void this.runChecks();

    logger.info({ intervalMs: this.intervalMs, timeoutMs: this.timeoutMs }, 'Started health check monitoring');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.controller?.abort();
    this.controller = undefined;
    this.running = false;
    logger.info('Stopped health check monitoring');
  }

  /**
   * Probe every enabled endpoint concurrently. A run that starts while the
   * previous one is still in flight is skipped.
   */
  async runChecks(): Promise<void> {
    if (this.running) {
      logger.debug('Previous health check run still in flight, skipping');
      return;
    }

    this.running = true;
    const controller = new AbortController();
    this.controller = controller;

    try {
      const targets = this.registry.getEnabledEndpoints();
      await Promise.allSettled(
        targets.map(({ capability, endpoint }) => this.probe(capability, endpoint, controller.signal))
      );
    } finally {
      if (this.controller === controller) {
        this.controller = undefined;
        this.running = false;
      }
    }
  }

  /**
   * Copies of every tracked entry, grouped by capability
   */
  getHealth(): CapabilityMap<EngineHealth[]> {
    const out: CapabilityMap<EngineHealth[]> = {};
    for (const entry of this.health.values()) {
      const list = out[entry.capability] ?? [];
      list.push({ ...entry });
      out[entry.capability] = list;
    }
    return out;
  }

  getEngineHealth(capability: Capability, endpoint: string): EngineHealth | undefined {
    const entry = this.health.get(healthKey(capability, endpoint));
    return entry ? { ...entry } : undefined;
  }

  summary(): HealthSummary {
    const entries = Array.from(this.health.values());
    const healthyEngines = entries.filter(e => e.healthy).length;

    let status: HealthSummary['status'] = 'healthy';
    if (entries.length > 0 && healthyEngines === 0) {
      status = 'unhealthy';
    } else if (healthyEngines < entries.length) {
      status = 'degraded';
    }

    return { status, totalEngines: entries.length, healthyEngines };
  }

  private async probe(capability: Capability, endpoint: string, signal: AbortSignal): Promise<void> {
    const entry = this.entryFor(capability, endpoint);
    const startTime = Date.now();

    try {
      await pTimeout(this.client.checkHealth(endpoint, { timeoutMs: this.timeoutMs, signal }), {
        milliseconds: this.timeoutMs,
        message: new EngineTimeoutError(endpoint, this.timeoutMs, 'health probe')
      });
      if (signal.aborted) return;

      const elapsed = Date.now() - startTime;
      entry.healthy = true;
      entry.consecutiveFailures = 0;
      entry.lastCheckTime = new Date();
      entry.lastResponseTimeMs = elapsed;
      this.breakers.get(endpoint).recordSuccess();
      this.metrics?.recordHealthCheck(capability, endpoint, true, elapsed);
    } catch (error) {
      if (signal.aborted) return;

      const elapsed = Date.now() - startTime;
      entry.healthy = false;
      entry.errorCount++;
      entry.consecutiveFailures++;
      entry.lastCheckTime = new Date();
      this.breakers.get(endpoint).recordFailure();
      this.metrics?.recordHealthCheck(capability, endpoint, false, elapsed);

      logger.warn({
        capability,
        endpoint,
        consecutiveFailures: entry.consecutiveFailures,
        error: errorMessage(error)
      }, 'Engine health check failed');
    }
  }

  /**
   * Track exactly the enabled (capability, endpoint) pairs; new ones start healthy
   */
  private syncEntries(): void {
    const keys = new Set<string>();
    for (const { capability, endpoint } of this.registry.getEnabledEndpoints()) {
      keys.add(healthKey(capability, endpoint));
      this.entryFor(capability, endpoint);
    }
    for (const key of this.health.keys()) {
      if (!keys.has(key)) {
        this.health.delete(key);
      }
    }
  }

  private entryFor(capability: Capability, endpoint: string): EngineHealth {
    const key = healthKey(capability, endpoint);
    let entry = this.health.get(key);
    if (!entry) {
      entry = {
        capability,
        endpoint,
        healthy: true,
        lastCheckTime: null,
        lastResponseTimeMs: null,
        errorCount: 0,
        consecutiveFailures: 0
      };
      this.health.set(key, entry);
    }
    return entry;
  }
}
