/**
 * Metrics provider interface.
 * Wraps metric sinks (Prometheus, in-memory for tests).
 */

export type MetricTags = Record<string, string>;

export interface IMetricsProvider {
  /** Add one to a counter. */
  incrementCounter(name: string, tags?: MetricTags): void;

  /** Observe one value in a histogram. */
  recordHistogram(name: string, value: number, tags?: MetricTags): void;

  /** Raise the in-progress gauge for an operation. Pair with endOperation. */
  startOperation(operation: string): void;

  /** Lower the in-progress gauge for an operation. */
  endOperation(operation: string): void;
}

/** A sink that can render a text exposition (served on /metrics). */
export interface IMetricsExposition {
  readonly contentType: string;
  metrics(): Promise<string>;
}

export function isMetricsExposition(value: unknown): value is IMetricsExposition {
  return (
    typeof value === 'object' &&
    value !== null &&
    'metrics' in value &&
    typeof value.metrics === 'function' &&
    'contentType' in value &&
    typeof value.contentType === 'string'
  );
}
