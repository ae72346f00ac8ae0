import { describe, it, expect, beforeEach } from 'vitest';
import { PanicError } from '../../src/errors.js';
import { createHandler } from '../../src/handler/factory.js';
import { DEFAULT_HANDLER_CONFIG } from '../../src/handler/Handler.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { InMemoryMetricsProvider } from '../../src/providers/InMemoryMetricsProvider.js';
import { errorResponse, successResponse, type DispatchRequest } from '../../src/types/models.js';
import { MockUseCase } from '../mocks/MockUseCase.js';

const fastRetry = { maxAttempts: 2, initialBackoffMs: 1, maxBackoffMs: 2, backoffMultiplier: 2 };

function makeRequest(overrides: Partial<DispatchRequest> = {}): DispatchRequest {
  return { id: 'req-1', source: 'http', type: 'echo', payload: '{"x":1}', ...overrides };
}

describe('createHandler', () => {
  let logProvider: ConsoleLogProvider;
  let metrics: InMemoryMetricsProvider;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    metrics = new InMemoryMetricsProvider();
  });

  it('recovers from a throwing use case', async () => {
    const useCase = new MockUseCase('worker-a').respondWith(() => {
      throw new Error('boom');
    });
    const handler = createHandler(useCase, { logProvider, metricsProvider: metrics, retry: fastRetry });

    const result = await handler.handle(makeRequest());

    expect(result.response.error?.code).toBe('INTERNAL_ERROR');
    expect(result.error).toBeInstanceOf(PanicError);
    expect(metrics.counter('panics_total', { worker: 'worker-a' })).toBe(1);
    expect(metrics.counter('requests_error_total', { worker: 'worker-a', error_code: 'exception' })).toBe(1);
  });

  it('rejects invalid requests before the use case or retry', async () => {
    const useCase = new MockUseCase();
    const handler = createHandler(useCase, { logProvider, metricsProvider: metrics, retry: fastRetry });

    const result = await handler.handle(makeRequest({ payload: '' }));

    expect(result.response.error?.code).toBe('VALIDATION_ERROR');
    expect(useCase.calls).toHaveLength(0);
  });

  it('retries only the use case', async () => {
    const useCase = new MockUseCase().respondWith(async (_ctx, req) => ({
      response: errorResponse(req.id, 'SERVICE_UNAVAILABLE', 'warming up'),
    }));
    const handler = createHandler(useCase, { logProvider, metricsProvider: metrics, retry: fastRetry });

    const result = await handler.handle(makeRequest());

    expect(result.response.success).toBe(true);
    expect(useCase.calls).toHaveLength(2);
    expect(logProvider.find('Processing request')).toHaveLength(1);
  });

  it('adds trace metadata to the response', async () => {
    const handler = createHandler(new MockUseCase(), { logProvider, metricsProvider: metrics });

    const result = await handler.handle(makeRequest({ metadata: { trace_id: 'trace-9' } }));

    expect(result.response.metadata.trace_id).toBe('trace-9');
    expect(result.response.metadata.span_id).toBeDefined();
  });

  it('answers TIMEOUT when the use case overruns', async () => {
    const useCase = new MockUseCase().respondWith(
      (_ctx, req) => new Promise((resolve) => setTimeout(() => resolve({ response: successResponse(req.id) }), 300))
    );
    const handler = createHandler(useCase, {
      logProvider,
      metricsProvider: metrics,
      config: { ...DEFAULT_HANDLER_CONFIG, timeoutMs: 20 },
      retry: { ...fastRetry, maxAttempts: 0 },
    });

    const result = await handler.handle(makeRequest());

    expect(result.response.error?.code).toBe('TIMEOUT');
    expect(result.response.error?.retryable).toBe(true);
  });

  it('skips tracing and metrics when disabled', async () => {
    const handler = createHandler(new MockUseCase(), {
      logProvider,
      metricsProvider: metrics,
      config: { ...DEFAULT_HANDLER_CONFIG, enableMetrics: false, enableTracing: false },
    });

    const result = await handler.handle(makeRequest());

    expect(result.response.metadata.trace_id).toBeUndefined();
    expect(metrics.counter('requests_total', { type: 'echo', source: 'http' })).toBe(0);
  });
});
