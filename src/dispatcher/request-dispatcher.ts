/**
 * Request Dispatcher - concurrent fan-out to the engines and aggregation of
 * their answers into one detection response
 */

import pTimeout from 'p-timeout';
import { v4 as uuidv4 } from 'uuid';
import { LoadBalancer } from '../balancer/load-balancer';
import { CircuitBreakerRegistry } from '../breaker/circuit-breaker-registry';
import type { EngineClient } from '../clients/engine-client';
import { MetricsCollector } from '../metrics/metrics-collector';
import { RequestHistory } from '../history/request-history';
import { capabilityHandlers } from './capability-handlers';
import { EngineTimeoutError, errorCodeOf, errorMessage } from '../errors';
import { dispatcherLogger } from '../utils/logger';
import {
  CallOutcome,
  Capability,
  CapabilityMap,
  DetectionRequest,
  DetectionResponse,
  DetectionStatus,
  EngineResult,
  Selection,
  SubmitOptions
} from '../types';

export interface RequestDispatcherOptions {
  engineTimeoutMs?: CapabilityMap<number>;
  defaultEngineTimeoutMs?: number;
  requestTimeoutMs?: number;
}

type Logger = typeof dispatcherLogger;

export const NO_CAPABILITIES_ERROR = 'No capabilities requested';
export const ALL_ENGINES_FAILED_ERROR = 'All detection engines failed';

export class RequestDispatcher {
  private readonly engineTimeoutMs: CapabilityMap<number>;
  private readonly defaultEngineTimeoutMs: number;
  private readonly requestTimeoutMs: number;

  constructor(
    private readonly balancer: LoadBalancer,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly client: EngineClient,
    private readonly metrics: MetricsCollector,
    private readonly history: RequestHistory,
    options: RequestDispatcherOptions = {}
  ) {
    this.engineTimeoutMs = options.engineTimeoutMs ?? {};
    this.defaultEngineTimeoutMs = options.defaultEngineTimeoutMs ?? 5000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30000;
  }

  /**
   * Run every requested capability concurrently and aggregate the outcome.
   * Engine-side failures land in the per-capability results; this never
   * rejects because of them.
   */
  async process(request: DetectionRequest, options: SubmitOptions = {}): Promise<DetectionResponse> {
    const startTime = Date.now();
    const deadlineAt = startTime + (options.deadlineMs ?? this.requestTimeoutMs);
    const requestId = uuidv4();
    const correlationId = options.correlationId ?? `orch-${requestId}`;
    const capabilities = Array.from(new Set(request.capabilities));
    const log = dispatcherLogger.child({ requestId, correlationId });

    const response: DetectionResponse = {
      requestId,
      detectionId: uuidv4(),
      photoId: request.photoId,
      status: DetectionStatus.PROCESSING,
      results: {},
      totalProcessingTimeMs: 0,
      modelVersions: {},
      correlationId,
      timestamp: new Date()
    };
    this.history.put(response);

    log.info({
      photoId: request.photoId,
      capabilities,
      priority: request.priority
    }, 'Processing detection request');

    const results = await Promise.all(
      capabilities.map(capability => this.runCapability(capability, request, deadlineAt, log))
    );

    let succeeded = 0;
    for (const result of results) {
      response.results[result.capability] = result;
      if (result.endpoint !== null) {
        response.modelVersions[result.capability] = result.modelVersion;
      }
      if (result.error === undefined) {
        succeeded++;
      }
    }

    if (capabilities.length === 0) {
      response.status = DetectionStatus.FAILED;
      response.error = NO_CAPABILITIES_ERROR;
    } else if (succeeded === capabilities.length) {
      response.status = DetectionStatus.COMPLETED;
    } else if (succeeded > 0) {
      response.status = DetectionStatus.PARTIAL;
    } else {
      response.status = DetectionStatus.FAILED;
      response.error = ALL_ENGINES_FAILED_ERROR;
    }

    response.totalProcessingTimeMs = Date.now() - startTime;
    response.timestamp = new Date();
    this.history.put(response);
    this.metrics.recordRequest(response.status, response.totalProcessingTimeMs, {
      capabilities,
      priority: request.priority
    });

    log.info({
      status: response.status,
      totalProcessingTimeMs: response.totalProcessingTimeMs
    }, 'Completed detection request');

    return response;
  }

  /**
   * One capability call; resolves with an error result instead of rejecting
   */
  private async runCapability(
    capability: Capability,
    request: DetectionRequest,
    deadlineAt: number,
    log: Logger
  ): Promise<EngineResult> {
    const startTime = Date.now();

    let selection: Selection;
    try {
      selection = this.balancer.select(capability, request);
    } catch (error) {
      this.metrics.record(capability, 'rejected', 0);
      log.warn({ capability, error: errorMessage(error) }, 'No engine selected');
      return {
        capability,
        modelVersion: 'unavailable',
        endpoint: null,
        confidence: 0,
        meetsThreshold: false,
        resultPayload: {},
        processingTimeMs: 0,
        error: errorMessage(error),
        errorCode: errorCodeOf(error)
      };
    }

    const { model, endpoint } = selection;
    const breaker = this.breakers.get(endpoint);
    const engineTimeout = this.engineTimeoutMs[capability] ?? this.defaultEngineTimeoutMs;
    const remaining = deadlineAt - startTime;
    const timeoutMs = Math.max(1, Math.min(engineTimeout, remaining));
    const requestBound = remaining < engineTimeout;
    const deadlineError = new EngineTimeoutError(
      endpoint,
      timeoutMs,
      requestBound ? 'request deadline exceeded' : 'engine deadline exceeded'
    );
    const controller = new AbortController();

    try {
      const prediction = await pTimeout(
        this.client.predict({
          capability,
          model,
          request,
          parameters: capabilityHandlers[capability].buildParameters(model, request),
          signal: controller.signal
        }),
        {
          milliseconds: timeoutMs,
          message: deadlineError
        }
      );

      const processingTimeMs = Date.now() - startTime;
      breaker.recordSuccess();
      this.metrics.record(capability, 'success', processingTimeMs, {
        endpoint,
        modelVersion: prediction.modelVersion,
        confidence: prediction.confidence
      });
      this.metrics.recordCircuitState(endpoint, breaker.getState());

      return {
        capability,
        modelVersion: prediction.modelVersion,
        endpoint,
        confidence: prediction.confidence,
        meetsThreshold: prediction.confidence >= model.confidenceThreshold,
        resultPayload: prediction.results,
        processingTimeMs
      };
    } catch (error) {
      const processingTimeMs = Date.now() - startTime;
      const outcome: CallOutcome = error instanceof EngineTimeoutError ? 'timeout' : 'failure';
      if (outcome === 'timeout') {
        controller.abort();
      }

      // The caller's own deadline says nothing about the engine
      const abandoned = requestBound && error === deadlineError;
      if (abandoned) {
        breaker.releaseProbe();
      } else {
        breaker.recordFailure();
      }
      this.metrics.record(capability, outcome, processingTimeMs, {
        endpoint,
        modelVersion: model.version
      });
      this.metrics.recordCircuitState(endpoint, breaker.getState());

      if (abandoned) {
        log.warn({ capability, endpoint, timeoutMs }, 'Engine call abandoned at request deadline');
      } else {
        log.error({
          capability,
          endpoint,
          outcome,
          err: error
        }, 'Engine prediction failed');
      }

      return {
        capability,
        modelVersion: model.version,
        endpoint,
        confidence: 0,
        meetsThreshold: false,
        resultPayload: {},
        processingTimeMs,
        error: errorMessage(error),
        errorCode: errorCodeOf(error)
      };
    }
  }
}
