/**
 * Metrics Collector - rolling sample windows and derived statistics
 */

import { RingBuffer } from '../utils/ring-buffer';
import { metricsLogger as logger } from '../utils/logger';
import { createPrometheusMetrics, PrometheusMetrics } from './prometheus';
import {
  CallOutcome,
  Capability,
  CAPABILITIES,
  CapabilityMap,
  CircuitState,
  DetectionStatus,
  EngineMetrics,
  OrchestratorMetrics,
  RequestPriority
} from '../types';

interface EngineSample {
  outcome: CallOutcome;
  latencyMs: number;
  confidence?: number;
}

interface RequestSample {
  status: DetectionStatus;
  latencyMs: number;
}

export interface EngineSampleDetails {
  endpoint?: string;
  modelVersion?: string;
  confidence?: number;
}

export interface RequestSampleDetails {
  capabilities: Capability[];
  priority: RequestPriority;
}

const CIRCUIT_STATE_VALUES: Record<CircuitState, number> = {
  [CircuitState.CLOSED]: 0,
  [CircuitState.OPEN]: 1,
  [CircuitState.HALF_OPEN]: 2
};

/**
 * Percentile over an ascending array, interpolating between the two closest ranks
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const k = (sorted.length - 1) * p;
  const floor = Math.floor(k);
  const ceil = Math.min(floor + 1, sorted.length - 1);
  return sorted[floor] + (k - floor) * (sorted[ceil] - sorted[floor]);
}

function average(values: number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

export class MetricsCollector {
  private readonly windowSize: number;
  private requestWindow: RingBuffer<RequestSample>;
  private engineWindows: Map<Capability, RingBuffer<EngineSample>>;
  public readonly prometheus: PrometheusMetrics;

  constructor(windowSize: number = 1000, prometheus: PrometheusMetrics = createPrometheusMetrics()) {
    this.windowSize = windowSize;
    this.requestWindow = new RingBuffer(windowSize);
    this.engineWindows = new Map();
    this.prometheus = prometheus;
  }

  /**
   * Record the outcome of one capability call
   */
  record(
    capability: Capability,
    outcome: CallOutcome,
    latencyMs: number,
    details: EngineSampleDetails = {}
  ): void {
    this.windowFor(capability).push({ outcome, latencyMs, confidence: details.confidence });

    this.prometheus.engineRequestsTotal.inc({ capability, outcome });
    if (outcome === 'rejected') {
      this.prometheus.circuitBreakerRejections.inc({ capability });
      return;
    }

    this.prometheus.engineRequestDuration.observe({ capability }, latencyMs / 1000);
    if (details.endpoint) {
      this.prometheus.endpointRequestsTotal.inc({ capability, endpoint: details.endpoint, outcome });
    }
    if (details.modelVersion) {
      this.prometheus.modelVersionRequestsTotal.inc({ capability, model_version: details.modelVersion });
    }
    if (outcome === 'success' && details.confidence !== undefined) {
      this.prometheus.engineConfidence.observe({ capability }, details.confidence);
    }
  }

  /**
   * Record a completed detection request
   */
  recordRequest(status: DetectionStatus, latencyMs: number, details?: RequestSampleDetails): void {
    this.requestWindow.push({ status, latencyMs });

    this.prometheus.requestDuration.observe({ status }, latencyMs / 1000);
    for (const capability of details?.capabilities ?? []) {
      this.prometheus.requestsTotal.inc({
        capability,
        priority: details?.priority ?? RequestPriority.NORMAL,
        status
      });
    }
  }

  recordCircuitState(endpoint: string, state: CircuitState): void {
    this.prometheus.circuitBreakerState.set({ endpoint }, CIRCUIT_STATE_VALUES[state]);
  }

  recordHealthCheck(capability: Capability, endpoint: string, healthy: boolean, latencyMs: number): void {
    this.prometheus.healthCheckStatus.set({ capability, endpoint }, healthy ? 1 : 0);
    this.prometheus.healthCheckDuration.observe({ capability }, latencyMs / 1000);
  }

  /**
   * Derive statistics from the current windows
   */
  snapshot(): OrchestratorMetrics {
    const requests = this.requestWindow.toArray();
    const latencies = requests.map(r => r.latencyMs).sort((a, b) => a - b);
    const total = requests.length;
    const failed = requests.filter(r => r.status === DetectionStatus.FAILED).length;

    const engineMetrics: CapabilityMap<EngineMetrics> = {};
    for (const capability of CAPABILITIES) {
      const window = this.engineWindows.get(capability);
      if (window && window.size > 0) {
        engineMetrics[capability] = this.engineSnapshot(window.toArray());
      }
    }

    return {
      totalRequests: total,
      successfulRequests: requests.filter(r => r.status === DetectionStatus.COMPLETED).length,
      partialRequests: requests.filter(r => r.status === DetectionStatus.PARTIAL).length,
      failedRequests: failed,
      avgLatencyMs: average(latencies),
      p50LatencyMs: percentile(latencies, 0.5),
      p90LatencyMs: percentile(latencies, 0.9),
      p95LatencyMs: percentile(latencies, 0.95),
      errorRate: total > 0 ? failed / total : 0,
      engineMetrics
    };
  }

  reset(): void {
    this.requestWindow.clear();
    this.engineWindows.clear();
    this.prometheus.register.resetMetrics();
    logger.info('Metrics windows reset');
  }

  private engineSnapshot(samples: EngineSample[]): EngineMetrics {
    const latencies = samples
      .filter(s => s.outcome !== 'rejected')
      .map(s => s.latencyMs)
      .sort((a, b) => a - b);
    const successes = samples.filter(s => s.outcome === 'success');
    const confidences = successes
      .map(s => s.confidence)
      .filter((c): c is number => c !== undefined);

    return {
      totalRequests: samples.length,
      successfulRequests: successes.length,
      failedRequests: samples.length - successes.length,
      timeouts: samples.filter(s => s.outcome === 'timeout').length,
      rejections: samples.filter(s => s.outcome === 'rejected').length,
      avgLatencyMs: average(latencies),
      p50LatencyMs: percentile(latencies, 0.5),
      p90LatencyMs: percentile(latencies, 0.9),
      p95LatencyMs: percentile(latencies, 0.95),
      errorRate: (samples.length - successes.length) / samples.length,
      avgConfidence: average(confidences)
    };
  }

  private windowFor(capability: Capability): RingBuffer<EngineSample> {
    let window = this.engineWindows.get(capability);
    if (!window) {
      window = new RingBuffer(this.windowSize);
      this.engineWindows.set(capability, window);
    }
    return window;
  }
}
