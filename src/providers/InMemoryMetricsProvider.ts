/**
 * In-memory metrics provider.
 * Keeps counters, histogram observations and gauges in maps so tests (and
 * local runs) can inspect what was recorded. Each histogram series keeps only
 * its most recent `maxSamples` observations plus a running summary.
 */

import type { IMetricsProvider, MetricTags } from './IMetricsProvider.js';

export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
}

export interface InMemoryMetricsOptions {
  /** Observations retained per histogram series. Default 1000. */
  maxSamples?: number;
}

interface HistogramSeries {
  samples: number[];
  summary: HistogramSummary;
}

export class InMemoryMetricsProvider implements IMetricsProvider {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, HistogramSeries>();
  private readonly gauges = new Map<string, number>();
  private readonly maxSamples: number;

  constructor(options: InMemoryMetricsOptions = {}) {
    this.maxSamples = Math.max(1, options.maxSamples ?? 1000);
  }

  incrementCounter(name: string, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);
  }

  recordHistogram(name: string, value: number, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    let series = this.histograms.get(key);
    if (!series) {
      series = { samples: [], summary: { count: 0, sum: 0, min: value, max: value } };
      this.histograms.set(key, series);
    }
    series.samples.push(value);
    if (series.samples.length > this.maxSamples) series.samples.shift();

    const summary = series.summary;
    summary.count += 1;
    summary.sum += value;
    summary.min = Math.min(summary.min, value);
    summary.max = Math.max(summary.max, value);
  }

  startOperation(operation: string): void {
    this.gauges.set(operation, (this.gauges.get(operation) ?? 0) + 1);
  }

  endOperation(operation: string): void {
    this.gauges.set(operation, (this.gauges.get(operation) ?? 0) - 1);
  }

  // ── Inspection ──

  counter(name: string, tags?: MetricTags): number {
    return this.counters.get(seriesKey(name, tags)) ?? 0;
  }

  /** The most recent observations, oldest first. */
  histogram(name: string, tags?: MetricTags): number[] {
    return [...(this.histograms.get(seriesKey(name, tags))?.samples ?? [])];
  }

  histogramSummary(name: string, tags?: MetricTags): HistogramSummary | undefined {
    const series = this.histograms.get(seriesKey(name, tags));
    return series ? { ...series.summary } : undefined;
  }

  inProgress(operation: string): number {
    return this.gauges.get(operation) ?? 0;
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
  }
}

/** `name{a=1,b=2}` with tags sorted so key order never matters. */
export function seriesKey(name: string, tags?: MetricTags): string {
  if (!tags || Object.keys(tags).length === 0) return name;
  const labels = Object.keys(tags)
    .sort()
    .map((k) => `${k}=${tags[k]}`)
    .join(',');
  return `${name}{${labels}}`;
}
