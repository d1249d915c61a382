/**
 * Metrics: in-process counters and histograms for token handling.
 */

// ── Metric Names ──

/**
 * Counter. Accepted tokens are tagged `{ outcome, version, purpose }`,
 * rejected ones `{ outcome, code }`.
 */
export const PARSE_COUNTER = 'token.parse';
/** Histogram of wall-clock parse time in milliseconds */
export const PARSE_DURATION = 'token.parse.duration_ms';

// ── Types ──

export type Tags = Record<string, string>;

export interface MetricsSnapshot {
  counters: Record<string, { value: number; tags?: Tags }[]>;
  histograms: Record<string, { values: number[]; tags?: Tags }[]>;
  collectedAt: string;
}

/** Adapter interface for external metrics systems (Prometheus, StatsD, etc.) */
export interface MetricsAdapter {
  onCounter(name: string, value: number, tags?: Tags): void;
  onHistogram(name: string, value: number, tags?: Tags): void;
}

interface CounterEntry {
  value: number;
  tags?: Tags;
}

interface HistogramEntry {
  values: number[];
  tags?: Tags;
}

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

function bucket<E>(store: Map<string, Map<string, E>>, name: string): Map<string, E> {
  let byTags = store.get(name);
  if (!byTags) {
    byTags = new Map();
    store.set(name, byTags);
  }
  return byTags;
}

// ── Metrics Collector ──

/** Values kept per histogram tag set; older values are dropped first. */
export const DEFAULT_HISTOGRAM_LIMIT = 1000;

export interface MetricsCollectorOptions {
  histogramLimit?: number;
}

export class MetricsCollector {
  private readonly histogramLimit: number;
  private counters = new Map<string, Map<string, CounterEntry>>();
  private histograms = new Map<string, Map<string, HistogramEntry>>();
  private adapters: MetricsAdapter[] = [];

  constructor(options: MetricsCollectorOptions = {}) {
    this.histogramLimit = Math.max(1, options.histogramLimit ?? DEFAULT_HISTOGRAM_LIMIT);
  }

  registerAdapter(adapter: MetricsAdapter): void {
    this.adapters.push(adapter);
  }

  /** Increment a counter by 1 (or by `amount`). */
  counter(name: string, tags?: Tags, amount = 1): void {
    const byTags = bucket(this.counters, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.value += amount;
    } else {
      byTags.set(key, { value: amount, tags });
    }
    for (const a of this.adapters) a.onCounter(name, amount, tags);
  }

  histogram(name: string, value: number, tags?: Tags): void {
    const byTags = bucket(this.histograms, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.values.push(value);
      if (existing.values.length > this.histogramLimit) {
        existing.values.splice(0, existing.values.length - this.histogramLimit);
      }
    } else {
      byTags.set(key, { values: [value], tags });
    }
    for (const a of this.adapters) a.onHistogram(name, value, tags);
  }

  getSnapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, byTags] of this.counters) {
      counters[name] = Array.from(byTags.values());
    }
    const histograms: MetricsSnapshot['histograms'] = {};
    for (const [name, byTags] of this.histograms) {
      histograms[name] = Array.from(byTags.values());
    }
    return { counters, histograms, collectedAt: new Date().toISOString() };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  /** Counter value for exact tags, or the sum across all tag sets. */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) {
      return byTags.get(tagsKey(tags))?.value ?? 0;
    }
    let total = 0;
    for (const entry of byTags.values()) total += entry.value;
    return total;
  }

  getHistogramValues(name: string, tags?: Tags): number[] {
    const byTags = this.histograms.get(name);
    if (!byTags) return [];
    if (tags) {
      return byTags.get(tagsKey(tags))?.values ?? [];
    }
    const all: number[] = [];
    for (const entry of byTags.values()) all.push(...entry.values);
    return all;
  }
}

/** Shared collector used by parsers that are not given their own. */
export const globalMetrics = new MetricsCollector();
