/**
 * @fileoverview Retry executor
 *
 * Bounded exponential-backoff retry for a single dependency call. Only
 * failures classified into the policy's retryable kinds are repeated;
 * validation and programming errors propagate on the first attempt, unwrapped.
 *
 * Call sites compose it inside a circuit breaker:
 *
 * ```typescript
 * await breaker.call(() => retry.execute((attempt) => backend.query(...)), { signal });
 * ```
 *
 * so transient blips are absorbed inside one breaker-admitted call and only an
 * exhausted retry counts as a dependency failure. A CircuitOpenError is never
 * retried.
 *
 * @packageDocumentation
 */

import { RetryExhaustedError, type FailureKind } from '../core/errors.js';
import { METRIC_NAMES, noopMetrics, type MetricsSink } from '../metrics/recorder.js';
import { defaultLogger, type Logger } from '../telemetry/logger.js';
import { sleep as abortableSleep, throwIfAborted } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { classifyFailure } from './failure_classifier.js';

// ============================================================================
// POLICY
// ============================================================================

export interface RetryPolicy {
  /** Total attempts including the first call */
  maxAttempts: number;
  initialWaitMs: number;
  maxWaitMs: number;
  multiplier: number;
  /** Jitter spread; the wait is scaled by a factor in [1 - j, 1 + j] */
  jitterFactor: number;
  retryableErrorKinds: readonly FailureKind[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialWaitMs: 1_000,
  maxWaitMs: 10_000,
  multiplier: 2,
  jitterFactor: 0.2,
  retryableErrorKinds: ['timeout', 'connection', 'io'],
};

/**
 * Wait before attempt `attempt + 1`:
 * `min(initialWait * multiplier^(attempt-1) * jitter, maxWait)`.
 */
export function computeRetryDelayMs(
  attempt: number,
  policy: Pick<RetryPolicy, 'initialWaitMs' | 'maxWaitMs' | 'multiplier' | 'jitterFactor'>,
  randomFn: () => number = Math.random
): number {
  const base = policy.initialWaitMs * Math.pow(policy.multiplier, Math.max(0, attempt - 1));
  const jitter = 1 + policy.jitterFactor * (2 * randomFn() - 1);
  return Math.max(0, Math.min(base * jitter, policy.maxWaitMs));
}

// ============================================================================
// EXECUTOR
// ============================================================================

export interface RetryStats {
  totalAttempts: number;
  totalRetries: number;
  totalSuccesses: number;
  totalFailures: number;
  /** Failed attempts per failure kind */
  byKind: Partial<Record<FailureKind, number>>;
}

export interface RetryExecutorOptions {
  policy?: Partial<RetryPolicy>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  logger?: Logger;
  metrics?: MetricsSink;
}

export interface RetryExecuteOptions {
  /** Name used in logs, errors and the retries counter */
  operation?: string;
  /** Per-call overrides of the executor's policy */
  policy?: Partial<RetryPolicy>;
  /** Aborting stops further attempts and the current backoff wait */
  signal?: AbortSignal;
}

export class RetryExecutor {
  private readonly policy: RetryPolicy;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly metrics: MetricsSink;
  private stats: RetryStats = emptyStats();

  constructor(options: RetryExecutorOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? noopMetrics;
  }

  /**
   * Run `fn` until it succeeds, fails permanently, or attempts run out.
   *
   * @throws the original error when it is not retryable
   * @throws RetryExhaustedError with the attempt count and last error as `cause`
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, options: RetryExecuteOptions = {}): Promise<T> {
    const policy: RetryPolicy = { ...this.policy, ...options.policy };
    const operation = options.operation ?? 'operation';
    const { signal } = options;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(signal, operation);
      this.stats.totalAttempts++;
      try {
        const result = await fn(attempt);
        this.stats.totalSuccesses++;
        return result;
      } catch (error) {
        const kind = classifyFailure(error);
        this.stats.byKind[kind] = (this.stats.byKind[kind] ?? 0) + 1;

        const retryable =
          kind !== 'circuit_open' &&
          kind !== 'cancelled' &&
          !signal?.aborted &&
          policy.retryableErrorKinds.includes(kind);
        if (!retryable) {
          this.stats.totalFailures++;
          throw error;
        }
        if (attempt >= policy.maxAttempts) {
          this.stats.totalFailures++;
          throw new RetryExhaustedError(operation, attempt, kind, error);
        }

        const delayMs = computeRetryDelayMs(attempt, policy, this.random);
        this.stats.totalRetries++;
        this.metrics.incrementCounter(METRIC_NAMES.retries, { operation });
        this.logger.warn(
          `[retrieval] ${operation} failed (attempt ${attempt}/${policy.maxAttempts}), ` +
            `retrying in ${Math.round(delayMs)}ms: ${getErrorMessage(error)}`,
          { kind }
        );
        await this.sleep(delayMs, signal);
      }
    }
  }

  getStats(): RetryStats {
    return { ...this.stats, byKind: { ...this.stats.byKind } };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }
}

function emptyStats(): RetryStats {
  return { totalAttempts: 0, totalRetries: 0, totalSuccesses: 0, totalFailures: 0, byKind: {} };
}

export function createRetryExecutor(options: RetryExecutorOptions = {}): RetryExecutor {
  return new RetryExecutor(options);
}
