import { EventEmitter } from 'events';
import { CircuitBreaker, CircuitBreakerOptions, StateChangeEvent } from './circuit-breaker';
import { CircuitBreakerSnapshot } from '../types';

/**
 * One breaker per engine endpoint, created on first use
 */
export class CircuitBreakerRegistry extends EventEmitter {
  private breakers = new Map<string, CircuitBreaker>();
  private readonly options: CircuitBreakerOptions;

  constructor(options: CircuitBreakerOptions = {}) {
    super();
    this.options = options;
  }

  get(endpoint: string): CircuitBreaker {
    let breaker = this.breakers.get(endpoint);
    if (!breaker) {
      breaker = new CircuitBreaker(endpoint, this.options);
      breaker.on('stateChange', (event: StateChangeEvent) => this.emit('stateChange', event));
      this.breakers.set(endpoint, breaker);
    }
    return breaker;
  }

  has(endpoint: string): boolean {
    return this.breakers.has(endpoint);
  }

  snapshot(): CircuitBreakerSnapshot[] {
    return Array.from(this.breakers.values()).map(breaker => breaker.snapshot());
  }

  reset(endpoint: string): boolean {
    const breaker = this.breakers.get(endpoint);
    if (!breaker) return false;
    breaker.reset();
    return true;
  }

  clear(): void {
    for (const breaker of this.breakers.values()) {
      breaker.removeAllListeners();
    }
    this.breakers.clear();
  }
}
