import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiomLogProvider } from '../../src/providers/AxiomLogProvider.js';

// We mock global fetch for all tests.
const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

/** The events sent by the nth fetch call. */
function sentBatch(call = 0): Array<Record<string, unknown>> {
  const body = mockFetch.mock.calls[call]?.[1]?.body;
  if (typeof body !== 'string') throw new Error(`fetch call ${call} had no string body`);
  return JSON.parse(body);
}

describe('AxiomLogProvider', () => {
  let provider: AxiomLogProvider;
  let flushErrors: Error[];

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockResolvedValue(new Response(null, { status: 200 }));
    flushErrors = [];
    provider = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      // Low thresholds for testing
      flushIntervalMs: 60_000,
      flushThreshold: 5,
      onFlushError: (err) => flushErrors.push(err),
    });
  });

  afterEach(async () => {
    await provider.dispose();
    vi.unstubAllGlobals();
  });

  // --- buffering ---

  it('should buffer events without sending until flush', () => {
    provider.info('hello');
    provider.warn('world');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  // --- flush() ---

  it('should send buffered events to Axiom on flush', async () => {
    provider.info('one');
    provider.warn('two', { key: 'val' });
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.axiom.co/v1/datasets/test-dataset/ingest');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });

    const body = sentBatch();
    expect(body).toHaveLength(2);
    expect(body[0]).toMatchObject({ level: 'info', message: 'one' });
    // Fields are lifted to the top level for indexing
    expect(body[1]).toMatchObject({ level: 'warn', message: 'two', key: 'val' });
    expect(typeof body[0]._time).toBe('string');
    expect(body[0]).not.toHaveProperty('fields');
  });

  it('should not call fetch when buffer is empty', async () => {
    await provider.flush();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should clear buffer after successful flush', async () => {
    provider.info('event');
    await provider.flush();
    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should share one request between concurrent flushes', async () => {
    provider.info('event');
    await Promise.all([provider.flush(), provider.flush()]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should merge base fields into every event', async () => {
    const tagged = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      baseFields: { service: 'dispatch-service' },
    });
    tagged.info('hello', { requestId: 'req-1' });
    await tagged.dispose();

    expect(sentBatch()[0]).toMatchObject({ service: 'dispatch-service', requestId: 'req-1' });
  });

  // --- auto-flush on threshold ---

  it('should auto-flush when buffer reaches threshold', async () => {
    provider.info('1');
    provider.info('2');
    provider.info('3');
    provider.info('4');
    expect(mockFetch).not.toHaveBeenCalled();

    provider.info('5'); // hits threshold
    await vi.waitFor(() => expect(mockFetch).toHaveBeenCalledTimes(1));
    expect(sentBatch()).toHaveLength(5);
  });

  it('should drop the oldest events beyond the buffer limit', async () => {
    const small = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushIntervalMs: 0,
      flushThreshold: 100,
      maxBufferSize: 2,
    });
    small.info('a');
    small.info('b');
    small.info('c');
    await small.dispose();

    expect(sentBatch().map((e) => e.message)).toEqual(['b', 'c']);
  });

  // --- error resilience ---

  it('should report a non-2xx response without throwing', async () => {
    mockFetch.mockResolvedValueOnce(new Response('Server Error', { status: 500 }));
    provider.error('bad');
    await expect(provider.flush()).resolves.toBeUndefined();
    expect(flushErrors.map((e) => e.message)).toEqual(['Axiom ingest returned 500']);
  });

  it('should retain events when flush fails so they can be retried', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Network down'));
    provider.info('important');
    await provider.flush();
    expect(flushErrors.map((e) => e.message)).toEqual(['Network down']);

    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(sentBatch(1).map((e) => e.message)).toEqual(['important']);
  });

  // --- log() with full event ---

  it('should keep a provided timestamp', async () => {
    const ts = '2026-01-20T00:00:00.000Z';
    provider.log({ level: 'warn', message: 'custom', timestamp: ts, fields: { x: 1 } });
    await provider.flush();

    expect(sentBatch()[0]).toEqual({ _time: ts, x: 1, level: 'warn', message: 'custom' });
  });

  // --- dispose ---

  it('dispose() should flush remaining events', async () => {
    provider.info('final');
    await provider.dispose();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  // --- disabled mode (no token) ---

  it('should silently no-op when apiToken is empty', async () => {
    const disabled = new AxiomLogProvider({ apiToken: '', dataset: 'x' });
    disabled.info('ignored');
    await disabled.dispose();
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
