/**
 * Load Balancer - picks the model version and endpoint that answers a capability
 */

import { ModelRegistry } from '../registry/model-registry';
import { CircuitBreakerRegistry } from '../breaker/circuit-breaker-registry';
import { NoHealthyEngineError } from '../errors';
import { balancerLogger as logger } from '../utils/logger';
import {
  BalancingStrategy,
  Capability,
  DetectionRequest,
  EngineHealth,
  ModelVersion,
  Selection
} from '../types';

/**
 * Source of observed probe latencies; the health monitor in production
 */
export interface LatencySource {
  getEngineHealth(capability: Capability, endpoint: string): EngineHealth | undefined;
}

export interface LoadBalancerOptions {
  strategy?: BalancingStrategy;
  latencies?: LatencySource;
  random?: () => number;
}

export class LoadBalancer {
  private readonly strategy: BalancingStrategy;
  private readonly latencies?: LatencySource;
  private readonly random: () => number;
  private cursors = new Map<Capability, number>();

  constructor(
    private readonly registry: ModelRegistry,
    private readonly breakers: CircuitBreakerRegistry,
    options: LoadBalancerOptions = {}
  ) {
    this.strategy = options.strategy ?? BalancingStrategy.ROUND_ROBIN;
    this.latencies = options.latencies;
    this.random = options.random ?? Math.random;
  }

  /**
   * Choose one endpoint for the capability. Breakers are asked in preference
   * order and asking stops at the first grant, so a half-open probe slot is
   * only taken by the endpoint that will be called.
   */
  select(capability: Capability, request: DetectionRequest): Selection {
    const experiment = this.registry.getAbTest(capability);
    if (experiment) {
      const model = this.random() < experiment.trafficSplit ? experiment.modelA : experiment.modelB;
      if (!this.breakers.get(model.endpoint).allowRequest()) {
        throw new NoHealthyEngineError(
          capability,
          `A/B arm ${model.name}@${model.version} is circuit-open`
        );
      }

      logger.debug({
        photoId: request.photoId,
        capability,
        experimentId: experiment.experimentId,
        model: `${model.name}@${model.version}`
      }, 'A/B test arm selected');

      return {
        capability,
        model,
        endpoint: model.endpoint,
        reason: 'ab_test',
        experimentId: experiment.experimentId
      };
    }

    const candidates = this.registry.list(capability);
    if (candidates.length === 0) {
      throw new NoHealthyEngineError(capability, 'no enabled model versions');
    }

    const ordered = this.order(capability, candidates);
    for (const [index, model] of ordered) {
      if (this.breakers.get(model.endpoint).allowRequest()) {
        if (this.strategy === BalancingStrategy.ROUND_ROBIN) {
          this.cursors.set(capability, (index + 1) % candidates.length);
        }

        logger.debug({
          photoId: request.photoId,
          capability,
          strategy: this.strategy,
          endpoint: model.endpoint
        }, 'Endpoint selected');

        return { capability, model, endpoint: model.endpoint, reason: this.strategy };
      }
    }

    logger.warn({ capability, candidates: candidates.length }, 'Every candidate endpoint is circuit-open');
    throw new NoHealthyEngineError(capability, 'all candidate endpoints are circuit-open');
  }

  /**
   * Candidates paired with their registry index, most preferred first
   */
  private order(capability: Capability, candidates: ModelVersion[]): Array<[number, ModelVersion]> {
    const indexed = candidates.map((model, index): [number, ModelVersion] => [index, model]);

    switch (this.strategy) {
      case BalancingStrategy.ROUND_ROBIN: {
        const start = (this.cursors.get(capability) ?? 0) % candidates.length;
        return [...indexed.slice(start), ...indexed.slice(0, start)];
      }

      case BalancingStrategy.LEAST_LATENCY:
        return indexed.sort(([, a], [, b]) => {
          const latencyA = this.latencyOf(capability, a);
          const latencyB = this.latencyOf(capability, b);
          if (latencyA === null) return latencyB === null ? 0 : 1;
          if (latencyB === null) return -1;
          return latencyA - latencyB;
        });

      case BalancingStrategy.WEIGHTED:
        return this.weightedOrder(capability, indexed);
    }
  }

  /**
   * Weighted sampling without replacement, weight = 1 / latency. Endpoints
   * with no observed latency get the mean weight of the others.
   */
  private weightedOrder(
    capability: Capability,
    indexed: Array<[number, ModelVersion]>
  ): Array<[number, ModelVersion]> {
    const known = indexed
      .map(([, model]) => this.latencyOf(capability, model))
      .filter((latency): latency is number => latency !== null)
      .map(latency => 1 / Math.max(latency, 1));
    const fallback = known.length > 0 ? known.reduce((sum, w) => sum + w, 0) / known.length : 1;

    const pool = indexed.map(entry => {
      const latency = this.latencyOf(capability, entry[1]);
      return { entry, weight: latency === null ? fallback : 1 / Math.max(latency, 1) };
    });

    const ordered: Array<[number, ModelVersion]> = [];
    while (pool.length > 0) {
      const total = pool.reduce((sum, item) => sum + item.weight, 0);
      let draw = this.random() * total;
      let pick = pool.length - 1;
      for (let i = 0; i < pool.length; i++) {
        draw -= pool[i].weight;
        if (draw < 0) {
          pick = i;
          break;
        }
      }
      ordered.push(pool[pick].entry);
      pool.splice(pick, 1);
    }
    return ordered;
  }

  private latencyOf(capability: Capability, model: ModelVersion): number | null {
    return this.latencies?.getEngineHealth(capability, model.endpoint)?.lastResponseTimeMs ?? null;
  }
}
