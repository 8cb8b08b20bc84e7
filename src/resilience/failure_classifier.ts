/**
 * @fileoverview Failure classification
 *
 * Maps any thrown value to a {@link FailureKind}. Typed retrieval errors carry
 * their own kind; everything else is classified from Node system error codes,
 * built-in error classes, and finally message text.
 */

import { isRetrievalError, PERMANENT_FAILURE_KINDS, type FailureKind } from '../core/errors.js';
import { getErrorCode } from '../utils/errors.js';

const SYSTEM_CODE_KINDS: Readonly<Record<string, FailureKind>> = {
  ECONNREFUSED: 'connection',
  ECONNRESET: 'connection',
  ECONNABORTED: 'connection',
  EPIPE: 'connection',
  EHOSTUNREACH: 'connection',
  ENETUNREACH: 'connection',
  EAI_AGAIN: 'connection',
  ETIMEDOUT: 'timeout',
  ESOCKETTIMEDOUT: 'timeout',
  EIO: 'io',
  EBUSY: 'io',
  EMFILE: 'io',
  ENFILE: 'io',
  EAGAIN: 'io',
  ENOENT: 'not_found',
  ABORT_ERR: 'cancelled',
};

export function classifyFailure(error: unknown): FailureKind {
  if (isRetrievalError(error)) {
    return error.kind;
  }

  const code = getErrorCode(error);
  if (code) {
    const kind = SYSTEM_CODE_KINDS[code];
    if (kind) return kind;
  }

  if (!(error instanceof Error)) {
    return 'unknown';
  }
  if (error.name === 'AbortError') return 'cancelled';
  if (error.name === 'TimeoutError') return 'timeout';
  if (error instanceof TypeError) return 'type_mismatch';
  if (error instanceof RangeError || error instanceof SyntaxError) return 'invalid_input';

  const message = error.message.toLowerCase();
  if (message.includes('timeout') || message.includes('timed out')) return 'timeout';
  if (message.includes('rate limit') || message.includes('429')) return 'rate_limit';
  if (
    message.includes('socket hang up') ||
    message.includes('connection') ||
    message.includes('network') ||
    message.includes('503')
  ) {
    return 'connection';
  }
  return 'unknown';
}

/**
 * Whether a failure says something about the dependency's health. Failures
 * caused by the request (bad input, cancellation) do not.
 */
export function countsAgainstDependency(kind: FailureKind): boolean {
  return kind !== 'cancelled' && !PERMANENT_FAILURE_KINDS.includes(kind);
}
