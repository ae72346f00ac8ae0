import { describe, it, expect } from 'vitest';
import { backgroundContext, type RequestContext } from '../../src/context.js';
import type { HandlerFunc } from '../../src/middleware/pipeline.js';
import { createTracingMiddleware, extractTraceId } from '../../src/middleware/tracing.js';
import { successResponse, type DispatchRequest } from '../../src/types/models.js';

function makeRequest(metadata: Record<string, string> = {}): DispatchRequest {
  return { id: 'req-1', source: 'test', type: 'echo', payload: '{}', metadata };
}

describe('extractTraceId', () => {
  it('takes the first key present, in priority order', () => {
    expect(extractTraceId(makeRequest({ 'x-request-id': 'r', 'x-trace-id': 't' }))).toBe('t');
    expect(extractTraceId(makeRequest({ 'correlation-id': 'c' }))).toBe('c');
  });

  it('returns undefined without trace metadata', () => {
    expect(extractTraceId(makeRequest())).toBeUndefined();
  });
});

describe('tracing middleware', () => {
  function capture() {
    const seen: { ctx?: RequestContext; req?: DispatchRequest } = {};
    const next: HandlerFunc = async (ctx, req) => {
      seen.ctx = ctx;
      seen.req = req;
      return { response: successResponse(req.id) };
    };
    return { seen, handler: createTracingMiddleware()(next) };
  }

  it('propagates an incoming trace id', async () => {
    const { seen, handler } = capture();

    const result = await handler(backgroundContext(), makeRequest({ trace_id: 'trace-abc', parent_span_id: 'span-0' }));

    expect(seen.ctx?.traceId).toBe('trace-abc');
    expect(seen.ctx?.parentSpanId).toBe('span-0');
    expect(seen.req?.metadata?.trace_id).toBe('trace-abc');
    expect(result.response.metadata.trace_id).toBe('trace-abc');
    expect(result.response.metadata.span_id).toBe(seen.ctx?.spanId);
  });

  it('starts a new trace when none is supplied', async () => {
    const { seen, handler } = capture();

    const result = await handler(backgroundContext(), makeRequest());

    expect(seen.ctx?.traceId).toMatch(/^[0-9a-f-]{36}$/);
    expect(seen.ctx?.parentSpanId).toBeUndefined();
    expect(result.response.metadata.trace_id).toBe(seen.ctx?.traceId);
  });

  it('gives every request its own span id', async () => {
    const { seen, handler } = capture();

    await handler(backgroundContext(), makeRequest({ trace_id: 'same' }));
    const first = seen.ctx?.spanId;
    await handler(backgroundContext(), makeRequest({ trace_id: 'same' }));

    expect(seen.ctx?.spanId).not.toBe(first);
  });
});
