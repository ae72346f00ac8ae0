/**
 * Retry middleware.
 * Re-invokes the downstream chain on transient failures with exponential
 * backoff. Attempt 0 is the first try, so `next` runs at most
 * maxAttempts + 1 times. The backoff wait ends early when the context aborts.
 */

import { contextError, withFields } from '../context.js';
import { ERROR_CODES, RetriesExhaustedError, isContextError, isRetryableCode } from '../errors.js';
import { errorResponse, type DispatchResponse, type HandlerResult } from '../types/models.js';
import { sleep } from '../utils/time.js';
import type { HandlerFunc, Middleware } from './pipeline.js';

export interface RetryConfig {
  /** Retries after the first try. 0 disables retrying. */
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialBackoffMs: 100,
  maxBackoffMs: 10_000,
  backoffMultiplier: 2,
};

/** Wait before retry number `attempt + 1`: min(initial · multiplier^attempt, max). */
export function calculateBackoff(attempt: number, config: RetryConfig): number {
  const backoff = config.initialBackoffMs * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(backoff, config.maxBackoffMs);
}

/**
 * Whether a failed result may be re-attempted.
 * An explicit `retryable` flag wins, then the transient-code set; an error
 * without any response error counts as retryable.
 */
export function isRetryable(response: DispatchResponse, error?: Error): boolean {
  if (error && isContextError(error)) {
    return false;
  }

  if (response.error) {
    if (response.error.retryable) return true;
    return isRetryableCode(response.error.code);
  }

  return error !== undefined;
}

export function createRetryMiddleware(config: RetryConfig): Middleware {
  return (next: HandlerFunc): HandlerFunc => {
    const maxAttempts = Math.max(0, Math.floor(config.maxAttempts));

    return async (ctx, req) => {
      let last: HandlerResult | null = null;

      for (let attempt = 0; attempt <= maxAttempts; attempt++) {
        const result = await next(withFields(ctx, { retryAttempt: attempt }), req);

        if (!result.error && result.response.success) {
          return result;
        }

        if (!isRetryable(result.response, result.error)) {
          return result;
        }

        last = result;

        // Don't sleep after the last attempt
        if (attempt < maxAttempts) {
          const completed = await sleep(calculateBackoff(attempt, config), ctx.signal);
          if (!completed) {
            const reason = contextError(ctx);
            return {
              response: errorResponse(
                req.id,
                ERROR_CODES.CANCELLED,
                'Request cancelled during retry',
                undefined,
                false
              ),
              ...(reason && { error: reason }),
            };
          }
        }
      }

      // The loop runs at least once, and every path that leaves it early returns.
      if (!last) {
        throw new Error('retry loop finished without a result');
      }

      if (last.error) {
        return {
          response: last.response,
          error: new RetriesExhaustedError(maxAttempts, last.error),
        };
      }

      const response: DispatchResponse = last.response.error
        ? {
            ...last.response,
            error: { ...last.response.error, details: `Failed after ${maxAttempts} retries` },
          }
        : last.response;

      return { response };
    };
  };
}
