/**
 * Timeout middleware.
 * Races the downstream chain against a deadline. The downstream call is not
 * killed when it loses: it keeps running with an aborted signal, and a late
 * rejection is logged instead of surfacing as an unhandled rejection.
 */

import { onAbort, toContextError, withTimeout } from '../context.js';
import { CancelledError, ERROR_CODES } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { errorResponse, type HandlerResult } from '../types/models.js';
import type { HandlerFunc, Middleware } from './pipeline.js';

export function createTimeoutMiddleware(timeoutMs: number, logProvider?: ILogProvider): Middleware {
  return (next: HandlerFunc): HandlerFunc => {
    return async (ctx, req) => {
      const { ctx: timeoutCtx, cancel } = withTimeout(ctx, timeoutMs);
      const aborted = onAbort(timeoutCtx.signal);

      let settled = false;
      const downstream = next(timeoutCtx, req).finally(() => {
        settled = true;
      });

      try {
        const winner = await Promise.race([
          downstream.then((result) => ({ kind: 'result' as const, result })),
          aborted.promise.then(() => ({ kind: 'aborted' as const })),
        ]);

        if (winner.kind === 'result') {
          return winner.result;
        }

        if (!settled) {
          downstream.catch((err: unknown) => {
            logProvider?.warn('Abandoned request failed after timeout', {
              requestId: req.id,
              error: err instanceof Error ? err.message : String(err),
            });
          });
        }

        const reason = toContextError(timeoutCtx.signal.reason);
        const result: HandlerResult =
          reason instanceof CancelledError
            ? {
                response: errorResponse(req.id, ERROR_CODES.CANCELLED, 'Request cancelled', reason.message, false),
                error: reason,
              }
            : {
                response: errorResponse(
                  req.id,
                  ERROR_CODES.TIMEOUT,
                  'Request processing timed out',
                  `Exceeded timeout of ${timeoutMs}ms`,
                  true
                ),
                error: reason,
              };
        return result;
      } finally {
        aborted.dispose();
        cancel();
      }
    };
  };
}
