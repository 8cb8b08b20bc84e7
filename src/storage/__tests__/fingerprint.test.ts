import { describe, it, expect } from 'vitest';
import { computeQueryFingerprint, computeScopeKey, stableStringify, type FingerprintParams } from '../fingerprint.js';

const PARAMS: FingerprintParams = { rerankTopK: 20, diversityLambda: null, resultLimit: 10, filters: {} };

describe('stableStringify', () => {
  it('should sort object keys at every level', () => {
    expect(stableStringify({ b: 1, a: { d: [2, { f: 1, e: 0 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"e":0,"f":1}]},"b":1}'
    );
  });

  it('should drop undefined properties', () => {
    expect(stableStringify({ a: undefined, b: 'x' })).toBe('{"b":"x"}');
  });
});

describe('computeQueryFingerprint', () => {
  it('should ignore case and whitespace differences in the query', () => {
    expect(computeQueryFingerprint('Machine  Learning ', PARAMS)).toBe(
      computeQueryFingerprint('machine learning', PARAMS)
    );
  });

  it('should change with any answer-affecting parameter', () => {
    const base = computeQueryFingerprint('q', PARAMS);
    expect(computeQueryFingerprint('q', { ...PARAMS, resultLimit: 5 })).not.toBe(base);
    expect(computeQueryFingerprint('q', { ...PARAMS, diversityLambda: 0.5 })).not.toBe(base);
    expect(computeQueryFingerprint('q', { ...PARAMS, filters: { lang: 'en' } })).not.toBe(base);
  });

  it('should not depend on filter key order', () => {
    expect(computeQueryFingerprint('q', { ...PARAMS, filters: { a: 1, b: true } })).toBe(
      computeQueryFingerprint('q', { ...PARAMS, filters: { b: true, a: 1 } })
    );
  });

  it('should be a sha256 hex digest', () => {
    expect(computeQueryFingerprint('q', PARAMS)).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('computeScopeKey', () => {
  it('should depend on parameters but not on the query', () => {
    expect(computeScopeKey(PARAMS)).toBe(computeScopeKey({ ...PARAMS }));
    expect(computeScopeKey(PARAMS)).not.toBe(computeScopeKey({ ...PARAMS, rerankTopK: 0 }));
  });
});
