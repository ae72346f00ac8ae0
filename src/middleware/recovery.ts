/**
 * Recovery middleware.
 * Converts anything thrown below it into an INTERNAL_ERROR response plus a
 * PanicError, so adapters can tell a hard failure from a graceful one.
 * Belongs outermost in the chain.
 */

import { ERROR_CODES, PanicError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IMetricsProvider } from '../providers/IMetricsProvider.js';
import { errorResponse } from '../types/models.js';
import type { HandlerFunc, Middleware } from './pipeline.js';

export function createRecoveryMiddleware(
  logProvider: ILogProvider,
  metricsProvider: IMetricsProvider
): Middleware {
  return (next: HandlerFunc): HandlerFunc => {
    return async (ctx, req) => {
      try {
        return await next(ctx, req);
      } catch (thrown) {
        const error = new PanicError(thrown);

        logProvider.error('Panic recovered', {
          requestId: req.id,
          worker: ctx.workerName,
          error: error.message,
          stack: thrown instanceof Error ? thrown.stack : error.stack,
        });
        metricsProvider.incrementCounter('panics_total', {
          worker: ctx.workerName ?? 'unknown',
        });

        // Don't expose panic details to the caller
        return {
          response: errorResponse(req.id, ERROR_CODES.INTERNAL_ERROR, 'An internal error occurred', undefined, false),
          error,
        };
      }
    };
  };
}
