/**
 * Circuit Breaker - per-endpoint failure isolation
 *
 * CLOSED counts failures until the threshold opens the circuit. OPEN rejects
 * every call until the reset timeout has elapsed; the next caller then moves
 * the breaker to HALF_OPEN and becomes the only probe allowed through. The
 * probe's outcome either closes the circuit or re-opens it with a fresh
 * timestamp.
 */

import { EventEmitter } from 'events';
import { breakerLogger as logger } from '../utils/logger';
import { CircuitBreakerSnapshot, CircuitState } from '../types';

export interface CircuitBreakerOptions {
  threshold?: number;
  resetTimeoutMs?: number;
  halfOpenSuccessThreshold?: number;
}

export interface StateChangeEvent {
  endpoint: string;
  from: CircuitState;
  to: CircuitState;
  failureCount: number;
  timestamp: Date;
}

export class CircuitBreaker extends EventEmitter {
  public readonly endpoint: string;
  private readonly threshold: number;
  private readonly resetTimeoutMs: number;
  private readonly halfOpenSuccessThreshold: number;

  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private openedAt: number | null = null;
  private successCountInHalfOpen = 0;
  private probeInFlight = false;

  constructor(endpoint: string, options: CircuitBreakerOptions = {}) {
    super();
    this.endpoint = endpoint;
    this.threshold = options.threshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 60000; // 1 minute
    this.halfOpenSuccessThreshold = options.halfOpenSuccessThreshold ?? 1;
  }

  /**
   * Whether the caller may issue a remote call now. A true answer in
   * HALF_OPEN reserves the single probe slot until an outcome is recorded.
   */
  allowRequest(): boolean {
    switch (this.state) {
      case CircuitState.CLOSED:
        return true;

      case CircuitState.OPEN:
        if (!this.resetTimeoutElapsed()) {
          return false;
        }
        this.transition(CircuitState.HALF_OPEN);
        this.probeInFlight = true;
        return true;

      case CircuitState.HALF_OPEN:
        if (this.probeInFlight) {
          return false;
        }
        this.probeInFlight = true;
        return true;
    }
  }

  recordSuccess(): void {
    switch (this.state) {
      case CircuitState.CLOSED:
        return;

      case CircuitState.OPEN:
        // A success after the timeout is as good as a granted probe
        if (this.resetTimeoutElapsed()) {
          this.transition(CircuitState.CLOSED);
        }
        return;

      case CircuitState.HALF_OPEN:
        this.probeInFlight = false;
        this.successCountInHalfOpen++;
        if (this.successCountInHalfOpen >= this.halfOpenSuccessThreshold) {
          this.transition(CircuitState.CLOSED);
        }
        return;
    }
  }

  recordFailure(): void {
    this.failureCount++;

    switch (this.state) {
      case CircuitState.CLOSED:
        if (this.failureCount >= this.threshold) {
          logger.warn({
            endpoint: this.endpoint,
            failureCount: this.failureCount,
            threshold: this.threshold
          }, 'Circuit breaker threshold reached, opening circuit');
          this.transition(CircuitState.OPEN);
        }
        return;

      case CircuitState.OPEN:
        if (this.resetTimeoutElapsed()) {
          this.openedAt = Date.now();
        }
        return;

      case CircuitState.HALF_OPEN:
        logger.warn({ endpoint: this.endpoint }, 'Half-open probe failed, reopening circuit');
        this.transition(CircuitState.OPEN);
        return;
    }
  }

  /**
   * Hand back a reserved half-open slot when the call ended without an
   * outcome that says anything about the endpoint
   */
  releaseProbe(): void {
    this.probeInFlight = false;
  }

  /**
   * Manual reset to CLOSED
   */
  reset(): void {
    if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
      return;
    }
    this.transition(CircuitState.CLOSED);
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      endpoint: this.endpoint,
      state: this.state,
      failureCount: this.failureCount,
      openedAt: this.openedAt === null ? null : new Date(this.openedAt),
      successCountInHalfOpen: this.successCountInHalfOpen,
      probeInFlight: this.probeInFlight
    };
  }

  private resetTimeoutElapsed(): boolean {
    return this.openedAt !== null && Date.now() - this.openedAt >= this.resetTimeoutMs;
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    this.state = to;
    this.probeInFlight = false;
    this.successCountInHalfOpen = 0;

    if (to === CircuitState.OPEN) {
      this.openedAt = Date.now();
      this.emit('open');
    } else if (to === CircuitState.HALF_OPEN) {
      this.emit('halfOpen');
    } else {
      this.failureCount = 0;
      this.openedAt = null;
      this.emit('close');
    }

    const event: StateChangeEvent = {
      endpoint: this.endpoint,
      from,
      to,
      failureCount: this.failureCount,
      timestamp: new Date()
    };
    this.emit('stateChange', event);

    logger.info({ endpoint: this.endpoint, from, to }, 'Circuit breaker state changed');
  }
}
