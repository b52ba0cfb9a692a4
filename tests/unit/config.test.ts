import { describe, it, expect } from 'vitest';
import { loadConfig, loadModelCatalog, parseModelCatalog } from '../../src/config';
import { ConfigurationError } from '../../src/errors';
import { BalancingStrategy, Capability } from '../../src/types';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.environment).toBe('development');
    expect(config.server.port).toBe(8010);
    expect(config.orchestrator).toEqual({
      strategy: BalancingStrategy.ROUND_ROBIN,
      healthCheckIntervalSeconds: 30,
      healthCheckTimeoutMs: 2000,
      circuitBreakerThreshold: 5,
      circuitBreakerTimeoutSeconds: 60,
      engineTimeoutMs: {
        [Capability.DAMAGE]: 5000,
        [Capability.MATERIAL]: 5000,
        [Capability.VOLUME]: 5000
      },
      requestTimeoutMs: 30000,
      metricsWindowSize: 1000,
      historyCapacity: 1000,
      historyTtlSeconds: 0
    });
    expect(config.modelsConfigPath).toBe('config/models.json');
  });

  it('should read per-capability engine timeouts', () => {
    const config = loadConfig({ ENGINE_TIMEOUT_MS: '8000', VOLUME_ENGINE_TIMEOUT_MS: '12000' });

    expect(config.orchestrator.engineTimeoutMs).toEqual({
      [Capability.DAMAGE]: 8000,
      [Capability.MATERIAL]: 8000,
      [Capability.VOLUME]: 12000
    });
  });

  it('should accept a balancing strategy', () => {
    expect(loadConfig({ LB_STRATEGY: 'least_latency' }).orchestrator.strategy)
      .toBe(BalancingStrategy.LEAST_LATENCY);
  });

  it('should accept short intervals and breaker timeouts', () => {
    const config = loadConfig({ HEALTH_CHECK_INTERVAL_SECONDS: '2', CIRCUIT_BREAKER_TIMEOUT_SECONDS: '5' });

    expect(config.orchestrator.healthCheckIntervalSeconds).toBe(2);
    expect(config.orchestrator.circuitBreakerTimeoutSeconds).toBe(5);
  });

  it('should reject a zero health check interval', () => {
    expect(() => loadConfig({ HEALTH_CHECK_INTERVAL_SECONDS: '0' })).toThrow(ConfigurationError);
  });

  it('should reject a non-numeric breaker threshold', () => {
    expect(() => loadConfig({ CIRCUIT_BREAKER_THRESHOLD: 'many' }))
      .toThrow(/orchestrator\.circuitBreakerThreshold/);
  });
});

describe('model catalog', () => {
  it('should apply defaults to catalog entries', () => {
    const catalog = parseModelCatalog({
      models: [{ name: 'damage-detector', version: '1.2.0', capability: 'damage', endpoint: 'http://damage:8001' }]
    });

    expect(catalog).toEqual({
      models: [{
        name: 'damage-detector',
        version: '1.2.0',
        capability: Capability.DAMAGE,
        endpoint: 'http://damage:8001',
        confidenceThreshold: 0.75,
        enabled: true
      }],
      abTests: []
    });
  });

  it('should reject an unknown capability', () => {
    expect(() => parseModelCatalog({
      models: [{ name: 'x', version: '1', capability: 'thermal', endpoint: 'http://x:1' }]
    })).toThrow(ConfigurationError);
  });

  it('should load the bundled catalog', () => {
    const catalog = loadModelCatalog('config/models.json');

    expect(catalog.models.map(m => `${m.name}@${m.version}`)).toEqual([
      'damage-detector@v1.2.0',
      'material-detector@v1.1.0',
      'volume-estimator@v1.0.0'
    ]);
    expect(catalog.models[2].confidenceThreshold).toBe(0.7);
  });

  it('should raise a configuration error for a missing file', () => {
    expect(() => loadModelCatalog('config/does-not-exist.json')).toThrow(ConfigurationError);
  });
});
