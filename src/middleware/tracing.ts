/**
 * Tracing middleware.
 * Gives every request a trace id (propagated from metadata when a caller
 * sent one) and a fresh span id, on the context, the request metadata and
 * the response metadata.
 */

import { randomUUID } from 'node:crypto';
import { withFields } from '../context.js';
import type { DispatchRequest } from '../types/models.js';
import type { HandlerFunc, Middleware } from './pipeline.js';

/** Checked in order; the first non-empty value is the trace id. */
export const TRACE_ID_KEYS = ['trace_id', 'x-trace-id', 'x-b3-traceid', 'x-request-id', 'correlation-id'] as const;

export function extractTraceId(req: DispatchRequest): string | undefined {
  for (const key of TRACE_ID_KEYS) {
    const value = req.metadata?.[key];
    if (value) return value;
  }
  return undefined;
}

export function createTracingMiddleware(): Middleware {
  return (next: HandlerFunc): HandlerFunc => {
    return async (ctx, req) => {
      const traceId = extractTraceId(req) ?? randomUUID();
      const spanId = randomUUID();
      const parentSpanId = req.metadata?.parent_span_id || undefined;

      const tracedCtx = withFields(ctx, {
        traceId,
        spanId,
        ...(parentSpanId && { parentSpanId }),
      });

      const tracedReq: DispatchRequest = {
        ...req,
        metadata: { ...req.metadata, trace_id: traceId, span_id: spanId },
      };

      const result = await next(tracedCtx, tracedReq);

      return {
        ...result,
        response: {
          ...result.response,
          metadata: { ...result.response.metadata, trace_id: traceId, span_id: spanId },
        },
      };
    };
  };
}
