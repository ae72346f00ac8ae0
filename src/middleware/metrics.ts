/**
 * Metrics middleware.
 * Counts requests by type/source, times them, and counts the outcome.
 * Everything is recorded in `finally`, so a throw that Recovery catches
 * further out still shows up here as an `exception` error.
 */

import type { IMetricsProvider } from '../providers/IMetricsProvider.js';
import type { HandlerResult } from '../types/models.js';
import type { HandlerFunc, Middleware } from './pipeline.js';

export const METRIC_NAMES = {
  requests: 'requests_total',
  duration: 'request_duration_seconds',
  success: 'requests_success_total',
  error: 'requests_error_total',
} as const;

export function createMetricsMiddleware(metricsProvider: IMetricsProvider): Middleware {
  return (next: HandlerFunc): HandlerFunc => {
    return async (ctx, req) => {
      const worker = ctx.workerName || 'unknown';

      metricsProvider.incrementCounter(METRIC_NAMES.requests, { type: req.type, source: req.source });
      metricsProvider.startOperation(worker);

      const start = performance.now();
      let result: HandlerResult | undefined;

      try {
        result = await next(ctx, req);
        return result;
      } finally {
        metricsProvider.recordHistogram(METRIC_NAMES.duration, (performance.now() - start) / 1000, {
          worker,
        });

        if (!result) {
          metricsProvider.incrementCounter(METRIC_NAMES.error, { worker, error_code: 'exception' });
        } else if (result.error) {
          metricsProvider.incrementCounter(METRIC_NAMES.error, { worker, error_code: 'processing_error' });
        } else if (!result.response.success) {
          metricsProvider.incrementCounter(METRIC_NAMES.error, {
            worker,
            error_code: result.response.error?.code ?? 'unknown_error',
          });
        } else {
          metricsProvider.incrementCounter(METRIC_NAMES.success, { worker });
        }

        metricsProvider.endOperation(worker);
      }
    };
  };
}
