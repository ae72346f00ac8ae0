/**
 * Prometheus metrics provider.
 * Creates prom-client collectors lazily, one per metric name, on a private
 * Registry. Label names are fixed by the first call for a name: later tags
 * outside that set are ignored and missing ones are recorded as ''.
 */

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { IMetricsExposition, IMetricsProvider, MetricTags } from './IMetricsProvider.js';

export interface PrometheusMetricsProviderOptions {
  /** Prepended to every metric name, e.g. `dispatch_`. */
  prefix?: string;
  /** Also collect Node.js process metrics. Default: false. */
  collectDefaults?: boolean;
  /** Bring your own registry (shared with other collectors). */
  registry?: Registry;
}

interface Labelled<T> {
  metric: T;
  labelNames: string[];
}

export class PrometheusMetricsProvider implements IMetricsProvider, IMetricsExposition {
  readonly registry: Registry;
  private readonly prefix: string;
  private readonly counters = new Map<string, Labelled<Counter<string>>>();
  private readonly histograms = new Map<string, Labelled<Histogram<string>>>();
  private readonly gauge: Gauge<string>;

  constructor(options?: PrometheusMetricsProviderOptions) {
    this.registry = options?.registry ?? new Registry();
    this.prefix = options?.prefix ?? '';

    if (options?.collectDefaults) {
      collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
    }

    this.gauge = new Gauge({
      name: `${this.prefix}operations_in_progress`,
      help: 'Operations currently in progress',
      labelNames: ['operation'],
      registers: [this.registry],
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }

  incrementCounter(name: string, tags?: MetricTags): void {
    const entry = this.counterFor(name, tags);
    entry.metric.inc(pickLabels(entry.labelNames, tags));
  }

  recordHistogram(name: string, value: number, tags?: MetricTags): void {
    const entry = this.histogramFor(name, tags);
    entry.metric.observe(pickLabels(entry.labelNames, tags), value);
  }

  startOperation(operation: string): void {
    this.gauge.inc({ operation });
  }

  endOperation(operation: string): void {
    this.gauge.dec({ operation });
  }

  private counterFor(name: string, tags?: MetricTags): Labelled<Counter<string>> {
    let entry = this.counters.get(name);
    if (!entry) {
      const labelNames = labelNamesOf(tags);
      entry = {
        labelNames,
        metric: new Counter({
          name: this.metricName(name),
          help: `Count of ${name}`,
          labelNames,
          registers: [this.registry],
        }),
      };
      this.counters.set(name, entry);
    }
    return entry;
  }

  private histogramFor(name: string, tags?: MetricTags): Labelled<Histogram<string>> {
    let entry = this.histograms.get(name);
    if (!entry) {
      const labelNames = labelNamesOf(tags);
      entry = {
        labelNames,
        metric: new Histogram({
          name: this.metricName(name),
          help: `Distribution of ${name}`,
          labelNames,
          registers: [this.registry],
        }),
      };
      this.histograms.set(name, entry);
    }
    return entry;
  }

  private metricName(name: string): string {
    return sanitizeMetricName(`${this.prefix}${name}`);
  }
}

/** Prometheus names match [a-zA-Z_:][a-zA-Z0-9_:]*. */
export function sanitizeMetricName(name: string): string {
  const cleaned = name.replace(/[^a-zA-Z0-9_:]/g, '_');
  return /^[a-zA-Z_:]/.test(cleaned) ? cleaned : `_${cleaned}`;
}

function labelNamesOf(tags?: MetricTags): string[] {
  return Object.keys(tags ?? {})
    .map((k) => k.replace(/[^a-zA-Z0-9_]/g, '_'))
    .sort();
}

function pickLabels(labelNames: string[], tags?: MetricTags): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [k, v] of Object.entries(tags ?? {})) {
    normalized[k.replace(/[^a-zA-Z0-9_]/g, '_')] = v;
  }

  const labels: Record<string, string> = {};
  for (const name of labelNames) {
    labels[name] = normalized[name] ?? '';
  }
  return labels;
}
