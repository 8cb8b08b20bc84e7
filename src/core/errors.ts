/**
 * @fileoverview Retrieval error hierarchy
 *
 * Every failure the engine reasons about is a typed error carrying a
 * {@link FailureKind}. The retry executor, circuit breaker and fallback chain
 * branch on the kind, never on message text.
 */

// ============================================================================
// FAILURE KINDS
// ============================================================================

export type FailureKind =
  | 'timeout'
  | 'connection'
  | 'io'
  | 'rate_limit'
  | 'invalid_input'
  | 'type_mismatch'
  | 'not_found'
  | 'circuit_open'
  | 'cancelled'
  | 'unavailable'
  | 'unknown';

/** Kinds a dependency may recover from on its own. */
export const TRANSIENT_FAILURE_KINDS: readonly FailureKind[] = ['timeout', 'connection', 'io', 'rate_limit'];

/** Kinds caused by the request itself; these never count against a dependency. */
export const PERMANENT_FAILURE_KINDS: readonly FailureKind[] = ['invalid_input', 'type_mismatch', 'not_found'];

export function isTransientKind(kind: FailureKind): boolean {
  return TRANSIENT_FAILURE_KINDS.includes(kind);
}

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  kind: FailureKind;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class RetrievalError extends Error {
  abstract readonly code: string;
  abstract readonly kind: FailureKind;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends RetrievalError {
  readonly code = 'VALIDATION_ERROR';
  readonly kind = 'invalid_input' as const;
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// BACKEND ERRORS
// ============================================================================

/**
 * Raised by vector, keyword and embedding backends. `kind` tells the retry
 * executor whether the call is worth repeating.
 */
export class BackendError extends RetrievalError {
  readonly code = 'BACKEND_ERROR';
  readonly retryable: boolean;

  constructor(
    readonly backend: string,
    readonly kind: FailureKind,
    message: string,
    readonly cause?: unknown,
  ) {
    super(`Backend ${backend} ${kind}: ${message}`);
    this.name = 'BackendError';
    this.retryable = isTransientKind(kind);
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        backend: this.backend,
        cause: describeCause(this.cause),
      },
    };
  }
}

// ============================================================================
// TIMEOUT / CANCELLATION
// ============================================================================

export class TimeoutError extends RetrievalError {
  readonly code = 'TIMEOUT';
  readonly kind = 'timeout' as const;
  readonly retryable = true;

  constructor(
    readonly timeoutMs: number,
    readonly context?: string,
  ) {
    super(context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        timeoutMs: this.timeoutMs,
        context: this.context,
      },
    };
  }
}

/** The caller withdrew the request (abort signal or request deadline). */
export class CancelledError extends RetrievalError {
  readonly code = 'CANCELLED';
  readonly kind = 'cancelled' as const;
  readonly retryable = false;

  constructor(
    readonly operation: string,
    readonly reason?: unknown,
  ) {
    const detail = describeCause(reason);
    super(detail ? `${operation} cancelled: ${detail}` : `${operation} cancelled`);
    this.name = 'CancelledError';
  }
}

// ============================================================================
// RESILIENCE ERRORS
// ============================================================================

export class CircuitOpenError extends RetrievalError {
  readonly code = 'CIRCUIT_OPEN';
  readonly kind = 'circuit_open' as const;
  readonly retryable = false;

  constructor(
    readonly breakerName: string,
    readonly retryAfterMs: number,
  ) {
    super(`Circuit breaker ${breakerName} is OPEN; retry after ${retryAfterMs}ms`);
    this.name = 'CircuitOpenError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        breakerName: this.breakerName,
        retryAfterMs: this.retryAfterMs,
      },
    };
  }
}

export class RetryExhaustedError extends RetrievalError {
  readonly code = 'RETRY_EXHAUSTED';
  readonly retryable = false;

  constructor(
    readonly operation: string,
    readonly attempts: number,
    readonly kind: FailureKind,
    readonly cause: unknown,
  ) {
    super(`${operation} failed after ${attempts} attempt(s): ${describeCause(cause) ?? 'unknown error'}`);
    this.name = 'RetryExhaustedError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        attempts: this.attempts,
        cause: describeCause(this.cause),
      },
    };
  }
}

// ============================================================================
// RANKING / CACHE ERRORS
// ============================================================================

export type RerankStage = 'cross_encoder' | 'diversity';

export class RerankError extends RetrievalError {
  readonly code = 'RERANK_ERROR';
  readonly kind = 'unknown' as const;
  readonly retryable = false;

  constructor(
    readonly stage: RerankStage,
    message: string,
    readonly cause?: unknown,
  ) {
    super(`Rerank ${stage} failed: ${message}`);
    this.name = 'RerankError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        stage: this.stage,
        cause: describeCause(this.cause),
      },
    };
  }
}

export type CacheTier = 'exact' | 'semantic' | 'embedding';
export type CacheOperation = 'get' | 'put' | 'snapshot';

export class CacheError extends RetrievalError {
  readonly code = 'CACHE_ERROR';
  readonly kind = 'unknown' as const;
  readonly retryable = false;

  constructor(
    readonly tier: CacheTier,
    readonly operation: CacheOperation,
    message: string,
    readonly cause?: unknown,
  ) {
    super(`Cache ${tier} ${operation} failed: ${message}`);
    this.name = 'CacheError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        tier: this.tier,
        operation: this.operation,
        cause: describeCause(this.cause),
      },
    };
  }
}

// ============================================================================
// ENGINE ERRORS
// ============================================================================

/** Every step of the fallback chain failed. `causes` maps step to reason. */
export class SearchUnavailableError extends RetrievalError {
  readonly code = 'SEARCH_UNAVAILABLE';
  readonly kind = 'unavailable' as const;
  readonly retryable = true;

  constructor(readonly causes: Readonly<Record<string, string>>) {
    const summary = Object.entries(causes)
      .map(([step, reason]) => `${step}: ${reason}`)
      .join('; ');
    super(`No retrieval path available (${summary || 'no paths attempted'})`);
    this.name = 'SearchUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { causes: { ...this.causes } },
    };
  }
}

export class ConfigurationError extends RetrievalError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly kind = 'invalid_input' as const;
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isCircuitOpenError(error: unknown): error is CircuitOpenError {
  return error instanceof CircuitOpenError;
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

export function isSearchUnavailableError(error: unknown): error is SearchUnavailableError {
  return error instanceof SearchUnavailableError;
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  validation: (field: string, expected: string, received: string) =>
    new ValidationError(field, expected, received),

  backend: (backend: string, kind: FailureKind, message: string, cause?: unknown) =>
    new BackendError(backend, kind, message, cause),

  timeout: (timeoutMs: number, context?: string) =>
    new TimeoutError(timeoutMs, context),

  cancelled: (operation: string, reason?: unknown) =>
    new CancelledError(operation, reason),

  circuitOpen: (breakerName: string, retryAfterMs: number) =>
    new CircuitOpenError(breakerName, retryAfterMs),

  retryExhausted: (operation: string, attempts: number, kind: FailureKind, cause: unknown) =>
    new RetryExhaustedError(operation, attempts, kind, cause),

  rerank: (stage: RerankStage, message: string, cause?: unknown) =>
    new RerankError(stage, message, cause),

  cache: (tier: CacheTier, operation: CacheOperation, message: string, cause?: unknown) =>
    new CacheError(tier, operation, message, cause),

  unavailable: (causes: Record<string, string>) =>
    new SearchUnavailableError(causes),

  config: (key: string, message: string) =>
    new ConfigurationError(key, message),
};
