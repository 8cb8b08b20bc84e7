/**
 * @fileoverview Tests for the retrieval error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  BackendError,
  CacheError,
  CancelledError,
  CircuitOpenError,
  ConfigurationError,
  Errors,
  RetrievalError,
  RetryExhaustedError,
  SearchUnavailableError,
  TimeoutError,
  ValidationError,
  isCancelledError,
  isCircuitOpenError,
  isRetrievalError,
  isSearchUnavailableError,
  isTransientKind,
  isValidationError,
} from '../errors.js';
import { deepFreeze, snapshot } from '../snapshot.js';

describe('RetrievalError subclasses', () => {
  it('should describe validation failures with field, expectation and value', () => {
    const error = new ValidationError('resultLimit', 'integer <= 100', '500');

    expect(error.message).toBe('Validation failed for resultLimit: expected integer <= 100, got 500');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.kind).toBe('invalid_input');
    expect(error.retryable).toBe(false);
    expect(error.toJSON().details).toEqual({ field: 'resultLimit', expected: 'integer <= 100', received: '500' });
  });

  it('should mark backend errors retryable only for transient kinds', () => {
    const transient = new BackendError('vector-index', 'connection', 'socket closed');
    const permanent = new BackendError('vector-index', 'invalid_input', 'unknown filter');

    expect(transient.message).toBe('Backend vector-index connection: socket closed');
    expect(transient.retryable).toBe(true);
    expect(permanent.retryable).toBe(false);
  });

  it('should format circuit open errors with the retry delay', () => {
    const error = new CircuitOpenError('vector-backend', 1500);

    expect(error.message).toBe('Circuit breaker vector-backend is OPEN; retry after 1500ms');
    expect(error.toString()).toBe('[CIRCUIT_OPEN] Circuit breaker vector-backend is OPEN; retry after 1500ms');
  });

  it('should carry the last failure in retry exhaustion errors', () => {
    const cause = new TimeoutError(50, 'vector backend query');
    const error = new RetryExhaustedError('vector-backend', 3, 'timeout', cause);

    expect(error.message).toBe('vector-backend failed after 3 attempt(s): Timeout after 50ms: vector backend query');
    expect(error.kind).toBe('timeout');
    expect(error.cause).toBe(cause);
  });

  it('should summarise every fallback step in SearchUnavailableError', () => {
    const error = new SearchUnavailableError({ vector: 'down', keyword: 'locked' });

    expect(error.message).toBe('No retrieval path available (vector: down; keyword: locked)');
    expect(error.kind).toBe('unavailable');
    expect(error.toJSON().details).toEqual({ causes: { vector: 'down', keyword: 'locked' } });
  });

  it('should include the cancellation reason when one is given', () => {
    expect(new CancelledError('search').message).toBe('search cancelled');
    expect(new CancelledError('search', new Error('client gone')).message).toBe('search cancelled: client gone');
  });

  it('should build every error through the factory', () => {
    expect(Errors.validation('query', 'non-empty string', 'empty string')).toBeInstanceOf(ValidationError);
    expect(Errors.cache('exact', 'get', 'boom')).toBeInstanceOf(CacheError);
    expect(Errors.config('cache.capacity', 'too small')).toBeInstanceOf(ConfigurationError);
    expect(Errors.unavailable({})).toBeInstanceOf(SearchUnavailableError);
  });
});

describe('type guards', () => {
  it('should narrow by class', () => {
    const errors: unknown[] = [
      new ValidationError('q', 'x', 'y'),
      new CircuitOpenError('b', 0),
      new CancelledError('op'),
      new SearchUnavailableError({}),
      new Error('plain'),
    ];

    expect(errors.map(isRetrievalError)).toEqual([true, true, true, true, false]);
    expect(errors.map(isValidationError)).toEqual([true, false, false, false, false]);
    expect(errors.map(isCircuitOpenError)).toEqual([false, true, false, false, false]);
    expect(errors.map(isCancelledError)).toEqual([false, false, true, false, false]);
    expect(errors.map(isSearchUnavailableError)).toEqual([false, false, false, true, false]);
  });

  it('should treat only timeout, connection, io and rate_limit as transient', () => {
    expect(isTransientKind('timeout')).toBe(true);
    expect(isTransientKind('rate_limit')).toBe(true);
    expect(isTransientKind('not_found')).toBe(false);
    expect(isTransientKind('circuit_open')).toBe(false);
  });

  it('should keep errors as Error instances', () => {
    const error: RetrievalError = new TimeoutError(10);
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('Operation timed out after 10ms');
  });
});

describe('snapshot', () => {
  it('should return a deep copy', () => {
    const original = { results: [{ docId: 'doc1' }] };
    const copy = snapshot(original, 'exact', 'get');

    copy.results.push({ docId: 'doc2' });
    expect(original.results).toHaveLength(1);
  });

  it('should wrap uncloneable values in CacheError', () => {
    expect(() => snapshot({ fn: () => 1 }, 'semantic', 'put')).toThrow(CacheError);
  });

  it('should freeze nested objects but leave typed arrays writable', () => {
    const value = deepFreeze({ nested: { score: 1 }, embedding: new Float32Array([1, 2]) });

    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.nested)).toBe(true);
    value.embedding[0] = 5;
    expect(value.embedding[0]).toBe(5);
  });
});
