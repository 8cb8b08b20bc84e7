/**
 * @fileoverview Async Utilities
 *
 * Timeout and cancellation helpers shared by every backend call site.
 *
 * @packageDocumentation
 */

import { CancelledError, TimeoutError } from '../core/errors.js';

export { TimeoutError };

/**
 * Options for runWithTimeout.
 */
export interface RunWithTimeoutOptions {
  /** Caller's signal; aborting it cancels the operation with a CancelledError */
  signal?: AbortSignal;
  /** Context string for error messages */
  context?: string;
}

/**
 * Run an abortable operation under a deadline.
 *
 * The operation receives a signal that fires when either the timeout elapses
 * (reason: TimeoutError) or the caller's signal aborts (reason: CancelledError),
 * so well-behaved backends stop work instead of finishing in the background.
 *
 * @param operation - Receives the signal to pass on to I/O
 * @param timeoutMs - Deadline in milliseconds (if <= 0 or undefined, no deadline)
 * @throws TimeoutError if the deadline passes first
 * @throws CancelledError if the caller aborts first
 *
 * @example
 * ```typescript
 * const hits = await runWithTimeout(
 *   (signal) => backend.query(embedding, 20, {}, { signal }),
 *   5000,
 *   { context: 'vector backend query', signal: request.signal },
 * );
 * ```
 */
export async function runWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs?: number,
  options: RunWithTimeoutOptions = {}
): Promise<T> {
  const { signal, context = 'operation' } = options;
  if (signal?.aborted) {
    throw new CancelledError(context, signal.reason);
  }

  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    if (timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        const error = new TimeoutError(timeoutMs, context);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    }
    if (signal) {
      const abortListener = () => {
        const error = new CancelledError(context, signal.reason);
        controller.abort(error);
        reject(error);
      };
      onAbort = abortListener;
      signal.addEventListener('abort', abortListener, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), guard]);
  } finally {
    clearTimeout(timeoutId);
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Resolve after `ms`, or reject with CancelledError when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('sleep', signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('sleep', signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Throw a CancelledError if the signal has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancelledError(operation, signal.reason);
  }
}
