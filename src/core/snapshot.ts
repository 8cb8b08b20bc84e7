/**
 * @fileoverview Shared-state access rule
 *
 * The caches, the embedding cache and every circuit breaker are the only state
 * shared between concurrent requests. They all follow one rule:
 *
 *   Read or mutate shared state only inside a synchronous section (no `await`
 *   between the first read and the last write). Anything that must outlive the
 *   section, or be handed to another component, is copied out first; the
 *   caller then works on the copy.
 *
 * On a single event loop a synchronous section cannot interleave with another
 * request, so it plays the role of a short-held lock. The copy guarantees a
 * caller never mutates internal state through a returned reference and never
 * sees a structure that changes underneath it after an `await`.
 *
 * Components never call into another component or perform I/O while inside a
 * section.
 */

import { CacheError, type CacheOperation, type CacheTier } from './errors.js';

/**
 * Deep-copy a value leaving a shared component.
 *
 * @throws CacheError when the value cannot be structurally cloned
 * (functions, class instances with private slots, and similar)
 */
export function snapshot<T>(value: T, tier: CacheTier, operation: CacheOperation): T {
  try {
    return structuredClone(value);
  } catch (error) {
    throw new CacheError(tier, operation, 'value is not cloneable', error);
  }
}

/**
 * Deep-freeze a plain object tree so it can be shared read-only.
 * Typed arrays cannot be frozen and are left as is.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || ArrayBuffer.isView(value) || Object.isFrozen(value)) {
    return value;
  }
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  Object.freeze(value);
  return value;
}
