/**
 * @fileoverview Tests for the retry executor
 */

import { describe, it, expect, vi } from 'vitest';
import {
  BackendError,
  CircuitOpenError,
  RetryExhaustedError,
  ValidationError,
} from '../../core/errors.js';
import { InMemoryMetrics, METRIC_NAMES } from '../../metrics/recorder.js';
import { silentLogger } from '../../telemetry/logger.js';
import { computeRetryDelayMs, DEFAULT_RETRY_POLICY, RetryExecutor } from '../retry.js';

function createExecutor(metrics = new InMemoryMetrics()) {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const executor = new RetryExecutor({ sleep, random: () => 0.5, logger: silentLogger, metrics });
  return { executor, sleep, metrics };
}

const transient = () => new BackendError('vector', 'timeout', 'slow');

describe('computeRetryDelayMs', () => {
  it('should grow exponentially without jitter at the midpoint', () => {
    const mid = () => 0.5;
    expect(computeRetryDelayMs(1, DEFAULT_RETRY_POLICY, mid)).toBe(1000);
    expect(computeRetryDelayMs(2, DEFAULT_RETRY_POLICY, mid)).toBe(2000);
    expect(computeRetryDelayMs(3, DEFAULT_RETRY_POLICY, mid)).toBe(4000);
  });

  it('should cap at maxWaitMs', () => {
    expect(computeRetryDelayMs(10, DEFAULT_RETRY_POLICY, () => 0.5)).toBe(10_000);
  });

  it('should spread by the jitter factor', () => {
    expect(computeRetryDelayMs(1, DEFAULT_RETRY_POLICY, () => 0)).toBeCloseTo(800, 10);
    expect(computeRetryDelayMs(1, DEFAULT_RETRY_POLICY, () => 1)).toBeCloseTo(1200, 10);
  });
});

describe('RetryExecutor', () => {
  it('should return the first successful result', async () => {
    const { executor, sleep } = createExecutor();
    const fn = vi.fn(async () => 'ok');

    await expect(executor.execute(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry a transient failure and succeed', async () => {
    const { executor, sleep } = createExecutor();
    const fn = vi.fn(async (attempt: number) => {
      if (attempt === 1) throw transient();
      return attempt;
    });

    await expect(executor.execute(fn)).resolves.toBe(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls[0]?.[0]).toBe(1000);
  });

  it('should stop after maxAttempts with RetryExhaustedError', async () => {
    const { executor, sleep, metrics } = createExecutor();
    const fn = vi.fn(async () => {
      throw transient();
    });

    const error = await executor.execute(fn, { operation: 'vector-backend' }).catch((caught: unknown) => caught);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ operation: 'vector-backend', attempts: 3, kind: 'timeout' });
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([1000, 2000]);
    expect(metrics.getCounter(METRIC_NAMES.retries, { operation: 'vector-backend' })).toBe(2);
    expect(executor.getStats()).toEqual({
      totalAttempts: 3,
      totalRetries: 2,
      totalSuccesses: 0,
      totalFailures: 1,
      byKind: { timeout: 3 },
    });
  });

  it('should rethrow validation errors on the first attempt', async () => {
    const { executor } = createExecutor();
    const failure = new ValidationError('query', 'non-empty', '');
    const fn = vi.fn(async () => {
      throw failure;
    });

    await expect(executor.execute(fn)).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should never retry an open circuit', async () => {
    const { executor } = createExecutor();
    const fn = vi.fn(async () => {
      throw new CircuitOpenError('vector-backend', 100);
    });

    await expect(executor.execute(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should honor per-call policy overrides', async () => {
    const { executor } = createExecutor();
    const fn = vi.fn(async () => {
      throw new Error('connection refused');
    });

    await expect(executor.execute(fn, { policy: { maxAttempts: 5 } })).rejects.toMatchObject({ attempts: 5 });
    expect(fn).toHaveBeenCalledTimes(5);
  });

  it('should not start when the signal is already aborted', async () => {
    const { executor } = createExecutor();
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'ok');

    await expect(executor.execute(fn, { signal: controller.signal })).rejects.toMatchObject({ kind: 'cancelled' });
    expect(fn).not.toHaveBeenCalled();
  });

  it('should clear stats on reset', async () => {
    const { executor } = createExecutor();
    await executor.execute(async () => 1);
    executor.resetStats();
    expect(executor.getStats().totalAttempts).toBe(0);
  });
});
