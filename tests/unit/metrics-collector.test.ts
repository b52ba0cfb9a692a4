import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsCollector, percentile } from '../../src/metrics/metrics-collector';
import { RingBuffer } from '../../src/utils/ring-buffer';
import { Capability, CircuitState, DetectionStatus, RequestPriority } from '../../src/types';

describe('RingBuffer', () => {
  it('should evict the oldest item when full', () => {
    const buffer = new RingBuffer<number>(3);
    [1, 2, 3, 4, 5].forEach(n => buffer.push(n));

    expect(buffer.size).toBe(3);
    expect(buffer.toArray()).toEqual([3, 4, 5]);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
  });

  it('should empty on clear', () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    buffer.clear();

    expect(buffer.size).toBe(0);
    expect(buffer.toArray()).toEqual([]);
  });
});

describe('percentile', () => {
  it('should interpolate between ranks', () => {
    expect(percentile([10, 20, 30, 40], 0.5)).toBe(25);
    expect(percentile([10, 20, 30, 40], 0.9)).toBeCloseTo(37, 10);
  });

  it('should return zero for an empty window', () => {
    expect(percentile([], 0.95)).toBe(0);
  });
});

describe('MetricsCollector', () => {
  let collector: MetricsCollector;

  beforeEach(() => {
    collector = new MetricsCollector(1000);
  });

  it('should report an empty snapshot before any samples', () => {
    expect(collector.snapshot()).toEqual({
      totalRequests: 0,
      successfulRequests: 0,
      partialRequests: 0,
      failedRequests: 0,
      avgLatencyMs: 0,
      p50LatencyMs: 0,
      p90LatencyMs: 0,
      p95LatencyMs: 0,
      errorRate: 0,
      engineMetrics: {}
    });
  });

  it('should compute request latency percentiles over the window', () => {
    for (let latency = 10; latency <= 1000; latency += 10) {
      collector.recordRequest(DetectionStatus.COMPLETED, latency);
    }

    const snapshot = collector.snapshot();
    expect(snapshot.totalRequests).toBe(100);
    expect(snapshot.avgLatencyMs).toBe(505);
    expect(snapshot.p50LatencyMs).toBeCloseTo(505, 6);
    expect(snapshot.p90LatencyMs).toBeCloseTo(901, 6);
    expect(snapshot.p95LatencyMs).toBeCloseTo(950.5, 6);
  });

  it('should count statuses and derive the error rate', () => {
    collector.recordRequest(DetectionStatus.COMPLETED, 100);
    collector.recordRequest(DetectionStatus.PARTIAL, 200);
    collector.recordRequest(DetectionStatus.FAILED, 300);
    collector.recordRequest(DetectionStatus.FAILED, 400);

    const snapshot = collector.snapshot();
    expect(snapshot.successfulRequests).toBe(1);
    expect(snapshot.partialRequests).toBe(1);
    expect(snapshot.failedRequests).toBe(2);
    expect(snapshot.errorRate).toBe(0.5);
  });

  it('should drop samples beyond the window size', () => {
    const small = new MetricsCollector(2);
    small.recordRequest(DetectionStatus.FAILED, 1000);
    small.recordRequest(DetectionStatus.COMPLETED, 10);
    small.recordRequest(DetectionStatus.COMPLETED, 30);

    const snapshot = small.snapshot();
    expect(snapshot.totalRequests).toBe(2);
    expect(snapshot.failedRequests).toBe(0);
    expect(snapshot.avgLatencyMs).toBe(20);
  });

  it('should keep per-capability engine statistics', () => {
    collector.record(Capability.DAMAGE, 'success', 100, { endpoint: 'http://damage:8001', modelVersion: '1.2.0', confidence: 0.8 });
    collector.record(Capability.DAMAGE, 'success', 300, { endpoint: 'http://damage:8001', modelVersion: '1.2.0', confidence: 0.6 });
    collector.record(Capability.DAMAGE, 'timeout', 500, { endpoint: 'http://damage:8001' });
    collector.record(Capability.DAMAGE, 'rejected', 0);

    const damage = collector.snapshot().engineMetrics[Capability.DAMAGE];
    expect(damage).toBeDefined();
    expect(damage?.totalRequests).toBe(4);
    expect(damage?.successfulRequests).toBe(2);
    expect(damage?.failedRequests).toBe(2);
    expect(damage?.timeouts).toBe(1);
    expect(damage?.rejections).toBe(1);
    expect(damage?.avgLatencyMs).toBe(300);
    expect(damage?.p50LatencyMs).toBe(300);
    expect(damage?.errorRate).toBe(0.5);
    expect(damage?.avgConfidence).toBeCloseTo(0.7, 10);
    expect(collector.snapshot().engineMetrics[Capability.MATERIAL]).toBeUndefined();
  });

  it('should mirror samples into its Prometheus registry', async () => {
    collector.record(Capability.MATERIAL, 'failure', 250, { endpoint: 'http://material:8002' });
    collector.recordRequest(DetectionStatus.FAILED, 250, {
      capabilities: [Capability.MATERIAL],
      priority: RequestPriority.HIGH
    });
    collector.recordCircuitState('http://material:8002', CircuitState.OPEN);

    const text = await collector.prometheus.register.metrics();
    expect(text).toContain(
      'detection_orchestrator_engine_requests_total{capability="material",outcome="failure"} 1'
    );
    expect(text).toContain(
      'detection_orchestrator_requests_total{capability="material",priority="high",status="FAILED"} 1'
    );
    expect(text).toContain(
      'detection_orchestrator_circuit_breaker_state{endpoint="http://material:8002"} 1'
    );
  });
});
