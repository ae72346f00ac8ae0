/**
 * Request logging middleware.
 * Logs the start of every request and its outcome, with duration, to the
 * configured ILogProvider (Axiom, console, etc).
 *
 * Level mapping:
 *   success             → info
 *   unsuccessful result → warn
 *   returned error      → error
 *   thrown exception    → error (re-thrown)
 */

import type { DispatchLogEvent, ILogProvider } from '../providers/ILogProvider.js';
import type { HandlerFunc, Middleware } from './pipeline.js';

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: HandlerFunc): HandlerFunc => {
    return async (ctx, req) => {
      const base = {
        requestId: req.id,
        type: req.type,
        source: req.source,
        fields: {
          ...(ctx.workerName && { worker: ctx.workerName }),
          ...(ctx.platform && { platform: ctx.platform }),
          ...(ctx.traceId && { traceId: ctx.traceId }),
        },
      };

      const started: DispatchLogEvent = {
        ...base,
        level: 'info',
        message: 'Processing request',
        fields: { ...base.fields, payloadSize: Buffer.byteLength(req.payload) },
      };
      logProvider.log(started);

      const start = performance.now();

      try {
        const result = await next(ctx, req);
        const durationMs = Math.round(performance.now() - start);
        const { response, error } = result;

        let event: DispatchLogEvent;
        if (error) {
          event = {
            ...base,
            level: 'error',
            message: 'Request failed with error',
            durationMs,
            ...(response.error && { errorCode: response.error.code }),
            fields: { ...base.fields, error: error.message },
          };
        } else if (!response.success) {
          event = {
            ...base,
            level: 'warn',
            message: 'Request completed with failure',
            durationMs,
            ...(response.error && { errorCode: response.error.code }),
            fields: { ...base.fields, errorMessage: response.error?.message },
          };
        } else {
          event = { ...base, level: 'info', message: 'Request completed successfully', durationMs };
        }

        logProvider.log(event);
        return { ...result, response: { ...response, durationMs } };
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);

        const event: DispatchLogEvent = {
          ...base,
          level: 'error',
          message: 'Request threw',
          durationMs,
          fields: {
            ...base.fields,
            error: err instanceof Error ? err.message : String(err),
          },
        };

        logProvider.log(event);
        throw err;
      }
    };
  };
}
