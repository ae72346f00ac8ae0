import { describe, it, expect } from 'vitest';
import { backgroundContext, withCancel, type RequestContext } from '../../src/context.js';
import { CancelledError, DeadlineExceededError } from '../../src/errors.js';
import type { HandlerFunc } from '../../src/middleware/pipeline.js';
import { createTimeoutMiddleware } from '../../src/middleware/timeout.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { createRequest, successResponse, type HandlerResult } from '../../src/types/models.js';
import { sleep } from '../../src/utils/time.js';

const req = createRequest('work', { n: 1 });

function slowHandler(ms: number): HandlerFunc {
  return async (_ctx, r) => {
    await sleep(ms);
    return { response: successResponse(r.id) };
  };
}

describe('timeout middleware', () => {
  it('returns the downstream result when it finishes in time', async () => {
    const expected: HandlerResult = { response: successResponse(req.id, { ok: true }) };
    const next: HandlerFunc = async () => expected;

    const result = await createTimeoutMiddleware(1_000)(next)(backgroundContext(), req);

    expect(result).toBe(expected);
  });

  it('answers TIMEOUT when the deadline passes first', async () => {
    const result = await createTimeoutMiddleware(20)(slowHandler(500))(backgroundContext(), req);

    expect(result.response.success).toBe(false);
    expect(result.response.id).toBe(req.id);
    expect(result.response.error).toEqual({
      code: 'TIMEOUT',
      message: 'Request processing timed out',
      details: 'Exceeded timeout of 20ms',
      retryable: true,
    });
    expect(result.error).toBeInstanceOf(DeadlineExceededError);
  });

  it('aborts the signal the downstream call was given', async () => {
    const seen: { ctx?: RequestContext } = {};
    const next: HandlerFunc = async (ctx, r) => {
      seen.ctx = ctx;
      await sleep(500, ctx.signal);
      return { response: successResponse(r.id) };
    };

    await createTimeoutMiddleware(20)(next)(backgroundContext(), req);

    expect(seen.ctx?.signal.aborted).toBe(true);
  });

  it('answers CANCELLED when the caller cancels first', async () => {
    const { ctx, cancel } = withCancel(backgroundContext());
    setTimeout(cancel, 10);

    const result = await createTimeoutMiddleware(1_000)(slowHandler(500))(ctx, req);

    expect(result.response.error).toEqual({
      code: 'CANCELLED',
      message: 'Request cancelled',
      details: 'context canceled',
      retryable: false,
    });
    expect(result.error).toBeInstanceOf(CancelledError);
  });

  it('logs a late rejection from the abandoned call', async () => {
    const logProvider = new ConsoleLogProvider();
    const next: HandlerFunc = async () => {
      await sleep(40);
      throw new Error('late failure');
    };

    const result = await createTimeoutMiddleware(10, logProvider)(next)(backgroundContext(), req);
    expect(result.response.error?.code).toBe('TIMEOUT');

    await sleep(80);
    const events = logProvider.find('Abandoned request failed after timeout');
    expect(events).toHaveLength(1);
    expect(events[0].fields).toEqual({ requestId: req.id, error: 'late failure' });
  });
});
