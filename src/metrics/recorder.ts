/**
 * @fileoverview Retrieval Metrics
 *
 * The engine reports through a {@link MetricsSink}; wiring the sink to a real
 * metrics backend is the host's job. {@link InMemoryMetrics} is the bundled
 * sink: it aggregates in process and renders Prometheus text exposition for
 * hosts that scrape it directly.
 *
 * @packageDocumentation
 */

// ============================================================================
// CONTRACT
// ============================================================================

export type MetricLabels = Readonly<Record<string, string>>;

export type Outcome = 'success' | 'error' | 'degraded';

/** Metric names emitted by the engine and its components. */
export const METRIC_NAMES = {
  queryDuration: 'query_duration_ms',
  vectorBackendDuration: 'vector_backend_duration_ms',
  rerankDuration: 'rerank_duration_ms',
  cacheLookups: 'cache_lookups_total',
  circuitBreakerState: 'circuit_breaker_state',
  circuitBreakerRejected: 'circuit_breaker_rejected_total',
  retries: 'retries_total',
} as const;

/** Gauge encoding of breaker state. */
export const CIRCUIT_STATE_GAUGE = {
  closed: 0,
  open: 1,
  'half-open': 2,
} as const;

export interface MetricsSink {
  observeDuration(name: string, valueMs: number, labels?: MetricLabels): void;
  incrementCounter(name: string, labels?: MetricLabels, by?: number): void;
  setGauge(name: string, value: number, labels?: MetricLabels): void;
}

export const noopMetrics: MetricsSink = {
  observeDuration: () => {},
  incrementCounter: () => {},
  setGauge: () => {},
};

// ============================================================================
// IN-MEMORY SINK
// ============================================================================

/** Upper bounds (ms) of the duration histogram buckets. */
export const DEFAULT_DURATION_BUCKETS_MS: readonly number[] = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

export interface HistogramSnapshot {
  name: string;
  labels: MetricLabels;
  count: number;
  sum: number;
  /** Non-cumulative count per bucket, aligned with the bucket bounds. */
  bucketCounts: number[];
}

export interface SeriesSnapshot {
  name: string;
  labels: MetricLabels;
  value: number;
}

export interface MetricsSnapshot {
  histograms: HistogramSnapshot[];
  counters: SeriesSnapshot[];
  gauges: SeriesSnapshot[];
}

function seriesKey(name: string, labels: MetricLabels): string {
  const parts = Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`);
  return `${name}{${parts.join(',')}}`;
}

export class InMemoryMetrics implements MetricsSink {
  private readonly histograms = new Map<string, HistogramSnapshot>();
  private readonly counters = new Map<string, SeriesSnapshot>();
  private readonly gauges = new Map<string, SeriesSnapshot>();

  constructor(private readonly buckets: readonly number[] = DEFAULT_DURATION_BUCKETS_MS) {}

  observeDuration(name: string, valueMs: number, labels: MetricLabels = {}): void {
    const key = seriesKey(name, labels);
    let histogram = this.histograms.get(key);
    if (!histogram) {
      histogram = { name, labels: { ...labels }, count: 0, sum: 0, bucketCounts: this.buckets.map(() => 0) };
      this.histograms.set(key, histogram);
    }
    histogram.count++;
    histogram.sum += valueMs;
    const bucketIndex = this.buckets.findIndex((bound) => valueMs <= bound);
    if (bucketIndex >= 0) {
      histogram.bucketCounts[bucketIndex] = (histogram.bucketCounts[bucketIndex] ?? 0) + 1;
    }
  }

  incrementCounter(name: string, labels: MetricLabels = {}, by = 1): void {
    const key = seriesKey(name, labels);
    const existing = this.counters.get(key);
    if (existing) {
      existing.value += by;
      return;
    }
    this.counters.set(key, { name, labels: { ...labels }, value: by });
  }

  setGauge(name: string, value: number, labels: MetricLabels = {}): void {
    this.gauges.set(seriesKey(name, labels), { name, labels: { ...labels }, value });
  }

  getCounter(name: string, labels: MetricLabels = {}): number {
    return this.counters.get(seriesKey(name, labels))?.value ?? 0;
  }

  getGauge(name: string, labels: MetricLabels = {}): number | undefined {
    return this.gauges.get(seriesKey(name, labels))?.value;
  }

  getHistogram(name: string, labels: MetricLabels = {}): HistogramSnapshot | undefined {
    const histogram = this.histograms.get(seriesKey(name, labels));
    return histogram ? structuredClone(histogram) : undefined;
  }

  snapshot(): MetricsSnapshot {
    return structuredClone({
      histograms: [...this.histograms.values()],
      counters: [...this.counters.values()],
      gauges: [...this.gauges.values()],
    });
  }

  reset(): void {
    this.histograms.clear();
    this.counters.clear();
    this.gauges.clear();
  }

  /**
   * Render all series in Prometheus text exposition format.
   */
  toPrometheus(prefix = 'hybrid_retrieval'): string {
    return exportPrometheusMetrics(this.snapshot(), this.buckets, prefix);
  }
}

// ============================================================================
// PROMETHEUS EXPORT
// ============================================================================

function formatLabels(labels: MetricLabels, extra?: Record<string, string>): string {
  const merged: Record<string, string> = { ...labels, ...extra };
  const keys = Object.keys(merged).sort();
  if (keys.length === 0) return '';
  const body = keys.map((key) => `${key}="${(merged[key] ?? '').replace(/["\\\n]/g, (ch) => (ch === '\n' ? '\\n' : `\\${ch}`))}"`);
  return `{${body.join(',')}}`;
}

function groupByName<T extends { name: string }>(series: T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const entry of series) {
    const group = groups.get(entry.name) ?? [];
    group.push(entry);
    groups.set(entry.name, group);
  }
  return groups;
}

/**
 * Export a metrics snapshot in Prometheus format.
 */
export function exportPrometheusMetrics(
  snapshot: MetricsSnapshot,
  buckets: readonly number[] = DEFAULT_DURATION_BUCKETS_MS,
  prefix = 'hybrid_retrieval'
): string {
  const lines: string[] = [];

  for (const [name, series] of groupByName(snapshot.counters)) {
    lines.push(`# TYPE ${prefix}_${name} counter`);
    for (const entry of series) {
      lines.push(`${prefix}_${name}${formatLabels(entry.labels)} ${entry.value}`);
    }
  }

  for (const [name, series] of groupByName(snapshot.gauges)) {
    lines.push(`# TYPE ${prefix}_${name} gauge`);
    for (const entry of series) {
      lines.push(`${prefix}_${name}${formatLabels(entry.labels)} ${entry.value}`);
    }
  }

  for (const [name, series] of groupByName(snapshot.histograms)) {
    lines.push(`# TYPE ${prefix}_${name} histogram`);
    for (const entry of series) {
      let cumulative = 0;
      buckets.forEach((bound, index) => {
        cumulative += entry.bucketCounts[index] ?? 0;
        lines.push(`${prefix}_${name}_bucket${formatLabels(entry.labels, { le: String(bound) })} ${cumulative}`);
      });
      lines.push(`${prefix}_${name}_bucket${formatLabels(entry.labels, { le: '+Inf' })} ${entry.count}`);
      lines.push(`${prefix}_${name}_sum${formatLabels(entry.labels)} ${entry.sum}`);
      lines.push(`${prefix}_${name}_count${formatLabels(entry.labels)} ${entry.count}`);
    }
  }

  return lines.join('\n') + '\n';
}
