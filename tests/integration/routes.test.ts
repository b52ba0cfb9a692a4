import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildApp } from '../../src/app';
import { DetectionOrchestrator } from '../../src/orchestrator/detection-orchestrator';
import { Capability, RequestPriority } from '../../src/types';
import { FakeEngineClient, model } from '../helpers/fake-engine-client';

const DAMAGE = 'http://damage:8001';
const MATERIAL = 'http://material:8002';
const PREFIX = '/api/v1/orchestrator';

describe('orchestrator routes', () => {
  let client: FakeEngineClient;
  let orchestrator: DetectionOrchestrator;
  let app: Awaited<ReturnType<typeof buildApp>>;

  beforeEach(async () => {
    client = new FakeEngineClient();
    orchestrator = new DetectionOrchestrator({
      client,
      catalog: {
        models: [
          model(Capability.DAMAGE, 'damage-detector', '1.2.0', DAMAGE),
          model(Capability.MATERIAL, 'material-detector', '1.1.0', MATERIAL)
        ],
        abTests: []
      }
    });
    app = await buildApp(orchestrator, { logRequests: false });
  });

  afterEach(async () => {
    orchestrator.stop();
    await app.close();
  });

  describe('POST /detect', () => {
    it('should run a detection and honour the correlation header', async () => {
      client.setBehavior(DAMAGE, { kind: 'success', confidence: 0.81, results: { damaged: false } });

      const response = await app.inject({
        method: 'POST',
        url: `${PREFIX}/detect`,
        headers: { 'x-correlation-id': 'trace-abc' },
        payload: {
          photoId: 'photo-42',
          photoUrl: 'http://photos.test/photo-42.jpg',
          capabilities: ['damage']
        }
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('COMPLETED');
      expect(body.correlationId).toBe('trace-abc');
      expect(body.photoId).toBe('photo-42');
      expect(body.results.damage.confidence).toBe(0.81);
      expect(client.predictCalls[0].request.priority).toBe('normal');
    });

    it('should reject an invalid body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `${PREFIX}/detect`,
        payload: { photoId: 'photo-42', photoUrl: 'not-a-url', capabilities: ['thermal'] }
      });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error).toBe('VALIDATION_ERROR');
      expect(body.details.map((d: { field: string }) => d.field)).toEqual(['photoUrl', 'capabilities.0']);
    });
  });

  describe('GET /status/:requestId', () => {
    it('should return a stored response', async () => {
      const submitted = await orchestrator.submit({
        photoId: 'photo-7',
        photoUrl: 'http://photos.test/photo-7.jpg',
        capabilities: [Capability.MATERIAL],
        priority: RequestPriority.HIGH,
        metadata: {}
      });

      const response = await app.inject({ method: 'GET', url: `${PREFIX}/status/${submitted.requestId}` });

      expect(response.statusCode).toBe(200);
      expect(response.json().detectionId).toBe(submitted.detectionId);
    });

    it('should answer 404 for an unknown request', async () => {
      const response = await app.inject({ method: 'GET', url: `${PREFIX}/status/unknown-id` });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        success: false,
        error: 'REQUEST_NOT_FOUND',
        message: 'Detection request unknown-id not found'
      });
    });
  });

  it('should list registered engines before any probe has run', async () => {
    const response = await app.inject({ method: 'GET', url: `${PREFIX}/health` });

    const body = response.json();
    expect(body.status).toBe('healthy');
    expect(body.totalEngines).toBe(2);
    expect(body.engines.damage[0].lastCheckTime).toBeNull();
  });

  it('should report engine health with a summary', async () => {
    client.setHealthy(MATERIAL, false);
    await orchestrator.healthMonitor.runChecks();

    const response = await app.inject({ method: 'GET', url: `${PREFIX}/health` });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('degraded');
    expect(body.totalEngines).toBe(2);
    expect(body.healthyEngines).toBe(1);
    expect(body.engines.material[0].consecutiveFailures).toBe(1);
  });

  it('should list models by capability', async () => {
    const response = await app.inject({ method: 'GET', url: `${PREFIX}/models` });

    expect(response.statusCode).toBe(200);
    expect(response.json().models.damage[0].version).toBe('1.2.0');
  });

  it('should register and toggle a model version', async () => {
    const created = await app.inject({
      method: 'POST',
      url: `${PREFIX}/models`,
      payload: { name: 'volume-estimator', version: '1.0.0', capability: 'volume', endpoint: 'http://volume:8003' }
    });
    expect(created.statusCode).toBe(201);
    expect(created.json().confidenceThreshold).toBe(0.75);

    const toggled = await app.inject({
      method: 'PATCH',
      url: `${PREFIX}/models/volume-estimator/1.0.0`,
      payload: { enabled: false }
    });
    expect(toggled.statusCode).toBe(200);
    expect(toggled.json().enabled).toBe(false);

    const missing = await app.inject({
      method: 'PATCH',
      url: `${PREFIX}/models/volume-estimator/9.9.9`,
      payload: { enabled: false }
    });
    expect(missing.statusCode).toBe(404);
    expect(missing.json().error).toBe('MODEL_NOT_FOUND');
  });

  it('should create, list and remove A/B tests', async () => {
    const created = await app.inject({
      method: 'POST',
      url: `${PREFIX}/ab-tests`,
      payload: {
        experimentId: 'damage-v2',
        modelA: { name: 'damage-detector', version: '1.2.0', capability: 'damage', endpoint: DAMAGE },
        modelB: { name: 'damage-detector', version: '2.0.0', capability: 'damage', endpoint: 'http://damage-next:8001' },
        trafficSplit: 0.3
      }
    });
    expect(created.statusCode).toBe(201);

    const listed = await app.inject({ method: 'GET', url: `${PREFIX}/ab-tests` });
    expect(listed.json().abTests.map((t: { experimentId: string }) => t.experimentId)).toEqual(['damage-v2']);

    const removed = await app.inject({ method: 'DELETE', url: `${PREFIX}/ab-tests/damage-v2` });
    expect(removed.statusCode).toBe(204);

    const again = await app.inject({ method: 'DELETE', url: `${PREFIX}/ab-tests/damage-v2` });
    expect(again.statusCode).toBe(404);
  });

  it('should reject an A/B test across capabilities', async () => {
    const response = await app.inject({
      method: 'POST',
      url: `${PREFIX}/ab-tests`,
      payload: {
        experimentId: 'mixed',
        modelA: { name: 'damage-detector', version: '1.2.0', capability: 'damage', endpoint: DAMAGE },
        modelB: { name: 'material-detector', version: '1.1.0', capability: 'material', endpoint: MATERIAL }
      }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('VALIDATION_ERROR');
  });

  it('should expose circuit breaker snapshots', async () => {
    orchestrator.breakers.get(DAMAGE);

    const response = await app.inject({ method: 'GET', url: `${PREFIX}/circuit-breakers` });

    expect(response.statusCode).toBe(200);
    expect(response.json().circuitBreakers).toEqual([{
      endpoint: DAMAGE,
      state: 'CLOSED',
      failureCount: 0,
      openedAt: null,
      successCountInHalfOpen: 0,
      probeInFlight: false
    }]);
  });

  it('should serve orchestrator metrics as JSON and Prometheus text', async () => {
    const json = await app.inject({ method: 'GET', url: `${PREFIX}/metrics` });
    expect(json.statusCode).toBe(200);
    expect(json.json().totalRequests).toBe(0);

    const text = await app.inject({ method: 'GET', url: '/metrics' });
    expect(text.statusCode).toBe(200);
    expect(text.headers['content-type']).toContain('text/plain');
    expect(text.body).toContain('# HELP detection_orchestrator_requests_total');
  });
});
