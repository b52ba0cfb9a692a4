import promClient from 'prom-client';

const PREFIX = 'detection_orchestrator_';

/**
 * Prometheus metrics bound to one registry, so several orchestrators can
 * live in the same process
 */
export function createPrometheusMetrics(register: promClient.Registry = new promClient.Registry()) {
  return {
    register,

    requestsTotal: new promClient.Counter({
      name: `${PREFIX}requests_total`,
      help: 'Total number of detection requests',
      labelNames: ['capability', 'priority', 'status'],
      registers: [register],
    }),

    requestDuration: new promClient.Histogram({
      name: `${PREFIX}request_duration_seconds`,
      help: 'Time spent processing detection requests',
      labelNames: ['status'],
      buckets: [0.1, 0.5, 1.0, 2.5, 5.0, 10.0, 30.0, 60.0],
      registers: [register],
    }),

    engineRequestsTotal: new promClient.Counter({
      name: `${PREFIX}engine_requests_total`,
      help: 'Total number of engine requests',
      labelNames: ['capability', 'outcome'],
      registers: [register],
    }),

    engineRequestDuration: new promClient.Histogram({
      name: `${PREFIX}engine_request_duration_seconds`,
      help: 'Time spent on engine requests',
      labelNames: ['capability'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1.0, 2.5, 5.0, 10.0],
      registers: [register],
    }),

    engineConfidence: new promClient.Histogram({
      name: `${PREFIX}engine_confidence_score`,
      help: 'Distribution of engine confidence scores',
      labelNames: ['capability'],
      buckets: [0.0, 0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1.0],
      registers: [register],
    }),

    endpointRequestsTotal: new promClient.Counter({
      name: `${PREFIX}endpoint_requests_total`,
      help: 'Total requests per endpoint',
      labelNames: ['capability', 'endpoint', 'outcome'],
      registers: [register],
    }),

    modelVersionRequestsTotal: new promClient.Counter({
      name: `${PREFIX}model_version_requests_total`,
      help: 'Requests per model version',
      labelNames: ['capability', 'model_version'],
      registers: [register],
    }),

    circuitBreakerState: new promClient.Gauge({
      name: `${PREFIX}circuit_breaker_state`,
      help: 'Circuit breaker state (0=closed, 1=open, 2=half_open)',
      labelNames: ['endpoint'],
      registers: [register],
    }),

    circuitBreakerRejections: new promClient.Counter({
      name: `${PREFIX}circuit_breaker_rejections_total`,
      help: 'Selections rejected because no engine was available',
      labelNames: ['capability'],
      registers: [register],
    }),

    healthCheckStatus: new promClient.Gauge({
      name: `${PREFIX}health_check_status`,
      help: 'Health check status (1=healthy, 0=unhealthy)',
      labelNames: ['capability', 'endpoint'],
      registers: [register],
    }),

    healthCheckDuration: new promClient.Histogram({
      name: `${PREFIX}health_check_duration_seconds`,
      help: 'Duration of engine health probes',
      labelNames: ['capability'],
      buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1.0, 2.0],
      registers: [register],
    }),
  };
}

export type PrometheusMetrics = ReturnType<typeof createPrometheusMetrics>;
