/**
 * Model Registry - Catalog of model versions per detection capability
 */

import { EventEmitter } from 'events';
import { UnknownCapabilityError, ValidationError } from '../errors';
import { registryLogger as logger } from '../utils/logger';
import {
  ABTestConfig,
  Capability,
  CAPABILITIES,
  CapabilityMap,
  ModelVersion
} from '../types';

function modelKey(name: string, version: string): string {
  return `${name}@${version}`;
}

export class ModelRegistry extends EventEmitter {
  private models: Map<Capability, ModelVersion[]>;
  private abTests: Map<string, ABTestConfig>;

  constructor(models: ModelVersion[] = [], abTests: ABTestConfig[] = []) {
    super();
    this.models = new Map();
    this.abTests = new Map();

    models.forEach(model => this.register(model));
    abTests.forEach(test => this.createAbTest(test));
  }

  /**
   * Register a new model version or replace an existing one with the same name and version
   */
  public register(model: ModelVersion): ModelVersion {
    this.validateModel(model);

    const frozen: ModelVersion = Object.freeze({ ...model });
    const key = modelKey(model.name, model.version);
    const current = this.findEntry(model.name, model.version);

    if (current && current.capability === model.capability) {
      const list = this.listFor(current.capability);
      list[list.findIndex(m => modelKey(m.name, m.version) === key)] = frozen;
    } else {
      if (current) {
        this.removeEntry(current);
      }
      this.listFor(model.capability).push(frozen);
    }

    this.emit('model:registered', frozen);
    logger.info({
      model: key,
      capability: model.capability,
      endpoint: model.endpoint,
      enabled: model.enabled,
      replaced: Boolean(current)
    }, 'Model version registered');

    return frozen;
  }

  public unregister(name: string, version: string): boolean {
    const current = this.findEntry(name, version);
    if (!current) {
      return false;
    }

    this.removeEntry(current);
    this.emit('model:removed', current);
    logger.info({ model: modelKey(name, version) }, 'Model version removed');
    return true;
  }

  /**
   * Toggle a version; the stored entry is replaced since versions are immutable
   */
  public setEnabled(name: string, version: string, enabled: boolean): ModelVersion | undefined {
    const current = this.findEntry(name, version);
    if (!current) {
      return undefined;
    }
    return this.register({ ...current, enabled });
  }

  /**
   * Enabled versions for a capability, in registration order
   */
  public list(capability: Capability): ModelVersion[] {
    return this.listAll(capability).filter(m => m.enabled);
  }

  public listAll(capability: Capability): ModelVersion[] {
    const list = this.models.get(capability);
    if (!list || list.length === 0) {
      throw new UnknownCapabilityError(capability);
    }
    return [...list];
  }

  /**
   * Get a named model (latest registered version) or the default active model
   */
  public get(capability: Capability, name?: string): ModelVersion | undefined {
    const all = this.listAll(capability);

    if (name === undefined) {
      const enabled = all.filter(m => m.enabled);
      return enabled[enabled.length - 1];
    }

    const named = all.filter(m => m.name === name);
    return named[named.length - 1];
  }

  public has(capability: Capability): boolean {
    return (this.models.get(capability)?.length ?? 0) > 0;
  }

  public snapshot(): CapabilityMap<ModelVersion[]> {
    const out: CapabilityMap<ModelVersion[]> = {};
    for (const capability of CAPABILITIES) {
      const list = this.models.get(capability);
      if (list && list.length > 0) {
        out[capability] = [...list];
      }
    }
    return out;
  }

  /**
   * Distinct (capability, endpoint) pairs of enabled versions
   */
  public getEnabledEndpoints(): Array<{ capability: Capability; endpoint: string }> {
    const pairs: Array<{ capability: Capability; endpoint: string }> = [];
    const seen = new Set<string>();

    for (const [capability, list] of this.models) {
      for (const model of list) {
        const key = `${capability}|${model.endpoint}`;
        if (model.enabled && !seen.has(key)) {
          seen.add(key);
          pairs.push({ capability, endpoint: model.endpoint });
        }
      }
    }

    for (const test of this.abTests.values()) {
      if (!test.enabled) continue;
      for (const model of [test.modelA, test.modelB]) {
        const key = `${model.capability}|${model.endpoint}`;
        if (!seen.has(key)) {
          seen.add(key);
          pairs.push({ capability: model.capability, endpoint: model.endpoint });
        }
      }
    }

    return pairs;
  }

  public createAbTest(config: ABTestConfig): ABTestConfig {
    if (config.modelA.capability !== config.modelB.capability) {
      throw new ValidationError(
        `A/B test ${config.experimentId} compares models of different capabilities`
      );
    }
    if (config.trafficSplit < 0 || config.trafficSplit > 1) {
      throw new ValidationError(`A/B test ${config.experimentId} traffic split must be within [0, 1]`);
    }
    this.validateModel(config.modelA);
    this.validateModel(config.modelB);

    const stored: ABTestConfig = Object.freeze({
      ...config,
      modelA: Object.freeze({ ...config.modelA }),
      modelB: Object.freeze({ ...config.modelB })
    });
    this.abTests.set(config.experimentId, stored);
    this.emit('abtest:created', stored);

    logger.info({
      experimentId: config.experimentId,
      capability: config.modelA.capability,
      modelA: modelKey(config.modelA.name, config.modelA.version),
      modelB: modelKey(config.modelB.name, config.modelB.version),
      trafficSplit: config.trafficSplit
    }, 'A/B test created');

    return stored;
  }

  public removeAbTest(experimentId: string): boolean {
    const test = this.abTests.get(experimentId);
    if (!test) {
      return false;
    }
    this.abTests.delete(experimentId);
    this.emit('abtest:removed', test);
    logger.info({ experimentId }, 'A/B test removed');
    return true;
  }

  public setAbTestEnabled(experimentId: string, enabled: boolean): ABTestConfig | undefined {
    const test = this.abTests.get(experimentId);
    if (!test) {
      return undefined;
    }
    const updated: ABTestConfig = Object.freeze({ ...test, enabled });
    this.abTests.set(experimentId, updated);
    this.emit('abtest:updated', updated);
    return updated;
  }

  /**
   * First enabled experiment for a capability, in creation order
   */
  public getAbTest(capability: Capability): ABTestConfig | undefined {
    for (const test of this.abTests.values()) {
      if (test.enabled && test.modelA.capability === capability) {
        return test;
      }
    }
    return undefined;
  }

  public listAbTests(): ABTestConfig[] {
    return Array.from(this.abTests.values());
  }

  private listFor(capability: Capability): ModelVersion[] {
    let list = this.models.get(capability);
    if (!list) {
      list = [];
      this.models.set(capability, list);
    }
    return list;
  }

  private findEntry(name: string, version: string): ModelVersion | undefined {
    for (const list of this.models.values()) {
      const found = list.find(m => m.name === name && m.version === version);
      if (found) return found;
    }
    return undefined;
  }

  private removeEntry(model: ModelVersion): void {
    const list = this.listFor(model.capability);
    const index = list.findIndex(m => m.name === model.name && m.version === model.version);
    if (index >= 0) {
      list.splice(index, 1);
    }
  }

  private validateModel(model: ModelVersion): void {
    if (!model.name || !model.version) {
      throw new ValidationError('Model name and version are required');
    }
    if (!CAPABILITIES.includes(model.capability)) {
      throw new ValidationError(`Unknown capability ${String(model.capability)}`);
    }
    if (!model.endpoint) {
      throw new ValidationError(`Model ${modelKey(model.name, model.version)} has no endpoint`);
    }
    if (model.confidenceThreshold < 0 || model.confidenceThreshold > 1) {
      throw new ValidationError(
        `Model ${modelKey(model.name, model.version)} confidence threshold must be within [0, 1]`
      );
    }
  }
}
