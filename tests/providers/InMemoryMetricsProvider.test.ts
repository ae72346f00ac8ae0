import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryMetricsProvider, seriesKey } from '../../src/providers/InMemoryMetricsProvider.js';

describe('InMemoryMetricsProvider', () => {
  let metrics: InMemoryMetricsProvider;

  beforeEach(() => {
    metrics = new InMemoryMetricsProvider();
  });

  it('counts per name and tag set', () => {
    metrics.incrementCounter('requests_total', { type: 'a', source: 'http' });
    metrics.incrementCounter('requests_total', { source: 'http', type: 'a' });
    metrics.incrementCounter('requests_total', { type: 'b', source: 'http' });

    expect(metrics.counter('requests_total', { type: 'a', source: 'http' })).toBe(2);
    expect(metrics.counter('requests_total', { type: 'b', source: 'http' })).toBe(1);
    expect(metrics.counter('requests_total')).toBe(0);
  });

  it('keeps histogram observations in order', () => {
    metrics.recordHistogram('batch_size', 3);
    metrics.recordHistogram('batch_size', 1);

    expect(metrics.histogram('batch_size')).toEqual([3, 1]);
  });

  it('retains only the most recent histogram observations', () => {
    const bounded = new InMemoryMetricsProvider({ maxSamples: 3 });
    for (let i = 1; i <= 10_000; i++) {
      bounded.recordHistogram('request_duration_seconds', i, { worker: 'echo' });
    }

    expect(bounded.histogram('request_duration_seconds', { worker: 'echo' })).toEqual([9998, 9999, 10000]);
    expect(bounded.histogramSummary('request_duration_seconds', { worker: 'echo' })).toEqual({
      count: 10_000,
      sum: 50_005_000,
      min: 1,
      max: 10_000,
    });
  });

  it('has no summary for a series never observed', () => {
    expect(metrics.histogramSummary('missing')).toBeUndefined();
  });

  it('tracks operations in progress', () => {
    metrics.startOperation('worker');
    metrics.startOperation('worker');
    metrics.endOperation('worker');

    expect(metrics.inProgress('worker')).toBe(1);
  });

  it('reset() forgets everything', () => {
    metrics.incrementCounter('c');
    metrics.recordHistogram('h', 1);
    metrics.startOperation('op');
    metrics.reset();

    expect(metrics.counter('c')).toBe(0);
    expect(metrics.histogram('h')).toEqual([]);
    expect(metrics.inProgress('op')).toBe(0);
  });

  it('builds series keys with sorted tags', () => {
    expect(seriesKey('m')).toBe('m');
    expect(seriesKey('m', {})).toBe('m');
    expect(seriesKey('m', { b: '2', a: '1' })).toBe('m{a=1,b=2}');
  });
});
