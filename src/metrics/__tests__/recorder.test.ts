/**
 * @fileoverview Tests for the in-memory metrics sink and Prometheus export
 */

import { describe, it, expect } from 'vitest';
import { InMemoryMetrics, METRIC_NAMES, exportPrometheusMetrics } from '../recorder.js';

describe('InMemoryMetrics', () => {
  it('should accumulate counters per label set', () => {
    const metrics = new InMemoryMetrics();
    metrics.incrementCounter(METRIC_NAMES.cacheLookups, { tier: 'exact', result: 'hit' });
    metrics.incrementCounter(METRIC_NAMES.cacheLookups, { result: 'hit', tier: 'exact' });
    metrics.incrementCounter(METRIC_NAMES.cacheLookups, { tier: 'exact', result: 'miss' }, 3);

    expect(metrics.getCounter(METRIC_NAMES.cacheLookups, { tier: 'exact', result: 'hit' })).toBe(2);
    expect(metrics.getCounter(METRIC_NAMES.cacheLookups, { tier: 'exact', result: 'miss' })).toBe(3);
    expect(metrics.getCounter(METRIC_NAMES.cacheLookups, { tier: 'semantic', result: 'hit' })).toBe(0);
  });

  it('should keep the last gauge value', () => {
    const metrics = new InMemoryMetrics();
    metrics.setGauge(METRIC_NAMES.circuitBreakerState, 1, { breaker: 'vector-backend' });
    metrics.setGauge(METRIC_NAMES.circuitBreakerState, 2, { breaker: 'vector-backend' });

    expect(metrics.getGauge(METRIC_NAMES.circuitBreakerState, { breaker: 'vector-backend' })).toBe(2);
    expect(metrics.getGauge(METRIC_NAMES.circuitBreakerState, { breaker: 'other' })).toBeUndefined();
  });

  it('should bucket durations', () => {
    const metrics = new InMemoryMetrics([10, 100]);
    metrics.observeDuration(METRIC_NAMES.queryDuration, 4, { outcome: 'success' });
    metrics.observeDuration(METRIC_NAMES.queryDuration, 50, { outcome: 'success' });
    metrics.observeDuration(METRIC_NAMES.queryDuration, 500, { outcome: 'success' });

    const histogram = metrics.getHistogram(METRIC_NAMES.queryDuration, { outcome: 'success' });
    expect(histogram?.count).toBe(3);
    expect(histogram?.sum).toBe(554);
    expect(histogram?.bucketCounts).toEqual([1, 1]);
  });

  it('should return copies from snapshot', () => {
    const metrics = new InMemoryMetrics();
    metrics.incrementCounter('retries_total');
    const snap = metrics.snapshot();
    const [first] = snap.counters;
    if (first) first.value = 100;

    expect(metrics.getCounter('retries_total')).toBe(1);
  });

  it('should clear everything on reset', () => {
    const metrics = new InMemoryMetrics();
    metrics.incrementCounter('retries_total');
    metrics.reset();
    expect(metrics.snapshot()).toEqual({ histograms: [], counters: [], gauges: [] });
  });
});

describe('exportPrometheusMetrics', () => {
  it('should render counters, gauges and cumulative histogram buckets', () => {
    const metrics = new InMemoryMetrics([10, 100]);
    metrics.incrementCounter(METRIC_NAMES.retries, { operation: 'vector-backend' }, 2);
    metrics.setGauge(METRIC_NAMES.circuitBreakerState, 1, { breaker: 'vector-backend' });
    metrics.observeDuration(METRIC_NAMES.rerankDuration, 5, { outcome: 'success' });
    metrics.observeDuration(METRIC_NAMES.rerankDuration, 50, { outcome: 'success' });

    expect(metrics.toPrometheus()).toBe(
      [
        '# TYPE hybrid_retrieval_retries_total counter',
        'hybrid_retrieval_retries_total{operation="vector-backend"} 2',
        '# TYPE hybrid_retrieval_circuit_breaker_state gauge',
        'hybrid_retrieval_circuit_breaker_state{breaker="vector-backend"} 1',
        '# TYPE hybrid_retrieval_rerank_duration_ms histogram',
        'hybrid_retrieval_rerank_duration_ms_bucket{le="10",outcome="success"} 1',
        'hybrid_retrieval_rerank_duration_ms_bucket{le="100",outcome="success"} 2',
        'hybrid_retrieval_rerank_duration_ms_bucket{le="+Inf",outcome="success"} 2',
        'hybrid_retrieval_rerank_duration_ms_sum{outcome="success"} 55',
        'hybrid_retrieval_rerank_duration_ms_count{outcome="success"} 2',
        '',
      ].join('\n')
    );
  });

  it('should escape quotes and newlines in label values', () => {
    const text = exportPrometheusMetrics(
      {
        histograms: [],
        counters: [{ name: 'errors_total', labels: { reason: 'said "no"\nagain' }, value: 1 }],
        gauges: [],
      },
      [],
      'app'
    );
    expect(text).toBe('# TYPE app_errors_total counter\napp_errors_total{reason="said \\"no\\"\\nagain"} 1\n');
  });
});
