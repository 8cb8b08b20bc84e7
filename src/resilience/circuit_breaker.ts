/**
 * @fileoverview Circuit breaker
 *
 * Per-dependency failure isolation. One breaker guards one dependency for the
 * lifetime of the process:
 *
 *   closed ──(failureThreshold failures within failureWindowMs)──▶ open
 *   open ──(first call after recoveryTimeoutMs)──▶ half-open
 *   half-open ──(trial succeeds)──▶ closed
 *   half-open ──(trial fails)──▶ open (recovery timer restarts)
 *
 * Permission checks and bookkeeping are synchronous sections; the guarded call
 * runs between them with no breaker state held (see core/snapshot.ts).
 *
 * @packageDocumentation
 */

import { CircuitOpenError, ValidationError } from '../core/errors.js';
import { CIRCUIT_STATE_GAUGE, METRIC_NAMES, noopMetrics, type MetricsSink } from '../metrics/recorder.js';
import { defaultLogger, type Logger } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { classifyFailure, countsAgainstDependency } from './failure_classifier.js';

// ============================================================================
// TYPES
// ============================================================================

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerConfig {
  /** Failures within the window that open the circuit */
  failureThreshold: number;
  /** Sliding window for counting failures (ms) */
  failureWindowMs: number;
  /** Time the circuit stays open before admitting a trial call (ms) */
  recoveryTimeoutMs: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  failureWindowMs: 60_000,
  recoveryTimeoutMs: 30_000,
};

export interface CircuitBreakerOptions extends Partial<CircuitBreakerConfig> {
  name: string;
  now?: () => number;
  logger?: Logger;
  metrics?: MetricsSink;
}

export interface CircuitBreakerStatus {
  name: string;
  state: CircuitState;
  /** Failures inside the current window */
  failureCount: number;
  /** Timestamp of the oldest failure inside the window */
  windowStart: number | null;
  openedAt: number | null;
  /** A half-open trial call is running */
  trialInFlight: boolean;
  /** Remaining open time before a trial call is admitted (ms), 0 unless open */
  retryAfterMs: number;
  totalRejected: number;
  totalOpened: number;
  totalClosed: number;
  totalFailures: number;
  totalSuccesses: number;
  stateChanges: number;
}

export interface CircuitCallOptions {
  /** The caller's signal; failures after it aborted are not held against the dependency */
  signal?: AbortSignal;
}

type Permit = 'normal' | 'trial';

// ============================================================================
// CIRCUIT BREAKER
// ============================================================================

export class CircuitBreaker {
  readonly name: string;
  private readonly config: CircuitBreakerConfig;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly metrics: MetricsSink;

  private state: CircuitState = 'closed';
  private failures: number[] = [];
  private openedAt: number | null = null;
  private trialInFlight = false;
  private totalRejected = 0;
  private totalOpened = 0;
  private totalClosed = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private stateChanges = 0;

  constructor(options: CircuitBreakerOptions) {
    const { name, now, logger, metrics, ...overrides } = options;
    this.name = name;
    this.config = {
      failureThreshold: overrides.failureThreshold ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.failureThreshold,
      failureWindowMs: overrides.failureWindowMs ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.failureWindowMs,
      recoveryTimeoutMs: overrides.recoveryTimeoutMs ?? DEFAULT_CIRCUIT_BREAKER_CONFIG.recoveryTimeoutMs,
    };
    if (!Number.isInteger(this.config.failureThreshold) || this.config.failureThreshold < 1) {
      throw new ValidationError('failureThreshold', 'integer >= 1', String(this.config.failureThreshold));
    }
    this.now = now ?? Date.now;
    this.logger = logger ?? defaultLogger;
    this.metrics = metrics ?? noopMetrics;
    this.publishState();
  }

  /**
   * Run `fn` if the circuit admits it.
   *
   * @throws CircuitOpenError without calling `fn` when the circuit is open, or
   * half-open with its single trial call already running
   */
  async call<T>(fn: () => Promise<T>, options: CircuitCallOptions = {}): Promise<T> {
    const permit = this.acquire();
    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure(permit, error, options.signal);
      throw error;
    }
    this.recordSuccess(permit);
    return result;
  }

  getState(): CircuitState {
    this.updateState();
    return this.state;
  }

  getStatus(): CircuitBreakerStatus {
    this.updateState();
    const now = this.now();
    this.pruneFailures(now);
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failures.length,
      windowStart: this.failures[0] ?? null,
      openedAt: this.openedAt,
      trialInFlight: this.trialInFlight,
      retryAfterMs: this.retryAfterMs(now),
      totalRejected: this.totalRejected,
      totalOpened: this.totalOpened,
      totalClosed: this.totalClosed,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      stateChanges: this.stateChanges,
    };
  }

  /**
   * Force the circuit closed and clear all counters.
   */
  reset(): void {
    this.state = 'closed';
    this.failures = [];
    this.openedAt = null;
    this.trialInFlight = false;
    this.totalRejected = 0;
    this.totalOpened = 0;
    this.totalClosed = 0;
    this.totalFailures = 0;
    this.totalSuccesses = 0;
    this.stateChanges = 0;
    this.publishState();
  }

  // --------------------------------------------------------------------------
  // Synchronous sections
  // --------------------------------------------------------------------------

  private acquire(): Permit {
    this.updateState();
    switch (this.state) {
      case 'closed':
        return 'normal';
      case 'half-open':
        if (!this.trialInFlight) {
          this.trialInFlight = true;
          return 'trial';
        }
        return this.reject();
      case 'open':
        return this.reject();
    }
  }

  private reject(): never {
    this.totalRejected++;
    this.metrics.incrementCounter(METRIC_NAMES.circuitBreakerRejected, { name: this.name });
    throw new CircuitOpenError(this.name, this.retryAfterMs(this.now()));
  }

  private recordSuccess(permit: Permit): void {
    this.totalSuccesses++;
    if (permit === 'trial') {
      this.trialInFlight = false;
      if (this.state === 'half-open') {
        this.transitionTo('closed');
      }
    }
  }

  private recordFailure(permit: Permit, error: unknown, signal?: AbortSignal): void {
    const kind = classifyFailure(error);
    const counts = !signal?.aborted && countsAgainstDependency(kind);

    if (permit === 'trial') {
      this.trialInFlight = false;
    }
    if (!counts) {
      return;
    }

    this.totalFailures++;
    const now = this.now();

    if (permit === 'trial') {
      if (this.state === 'half-open') {
        this.logger.warn(`[retrieval] Circuit ${this.name} trial call failed; reopening`, {
          kind,
          error: getErrorMessage(error),
        });
        this.transitionTo('open');
      }
      return;
    }

    // A call admitted while closed may finish after the circuit opened; it
    // still counts as a failure but cannot drive a second transition.
    if (this.state !== 'closed') {
      return;
    }

    this.failures.push(now);
    this.pruneFailures(now);
    if (this.failures.length >= this.config.failureThreshold) {
      this.logger.warn(`[retrieval] Circuit ${this.name} opened after ${this.failures.length} failures`, {
        windowMs: this.config.failureWindowMs,
        lastError: getErrorMessage(error),
      });
      this.transitionTo('open');
    }
  }

  private updateState(): void {
    if (this.state === 'open' && this.openedAt !== null) {
      if (this.now() - this.openedAt >= this.config.recoveryTimeoutMs) {
        this.transitionTo('half-open');
      }
    }
  }

  private pruneFailures(now: number): void {
    const windowStart = now - this.config.failureWindowMs;
    this.failures = this.failures.filter((timestamp) => timestamp > windowStart);
  }

  private retryAfterMs(now: number): number {
    if (this.state !== 'open' || this.openedAt === null) return 0;
    return Math.max(0, this.openedAt + this.config.recoveryTimeoutMs - now);
  }

  private transitionTo(next: CircuitState): void {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;
    this.stateChanges++;

    if (next === 'open') {
      this.openedAt = this.now();
      this.totalOpened++;
    }
    if (next === 'half-open') {
      this.trialInFlight = false;
    }
    if (next === 'closed') {
      this.failures = [];
      this.openedAt = null;
      this.totalClosed++;
    }

    if (next !== 'open') {
      this.logger.info(`[retrieval] Circuit ${this.name} ${previous} -> ${next}`);
    }
    this.publishState();
  }

  private publishState(): void {
    this.metrics.setGauge(METRIC_NAMES.circuitBreakerState, CIRCUIT_STATE_GAUGE[this.state], { name: this.name });
  }
}

// ============================================================================
// REGISTRY
// ============================================================================

/**
 * Named breakers sharing one configuration, clock and sinks.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly defaults: Omit<CircuitBreakerOptions, 'name'> = {}) {}

  get(name: string): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker({ ...this.defaults, name });
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  states(): Record<string, CircuitState> {
    const states: Record<string, CircuitState> = {};
    for (const [name, breaker] of this.breakers) {
      states[name] = breaker.getState();
    }
    return states;
  }

  statuses(): CircuitBreakerStatus[] {
    return [...this.breakers.values()].map((breaker) => breaker.getStatus());
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }
}

export function createCircuitBreaker(options: CircuitBreakerOptions): CircuitBreaker {
  return new CircuitBreaker(options);
}
