import { describe, it, expect } from 'vitest';
import { parseDuration, sleep } from '../../src/utils/time.js';

describe('parseDuration', () => {
  it.each([
    ['500ms', 500],
    ['30s', 30_000],
    ['2m', 120_000],
    ['1h', 3_600_000],
    ['1m30s', 90_000],
    ['1.5s', 1_500],
    ['250', 250],
    [' 10s ', 10_000],
  ])('parses %j', (text, ms) => {
    expect(parseDuration(text)).toBe(ms);
  });

  it.each(['', 'soon', '10x', 's10', '10s later', '-5s'])('rejects %j', (text) => {
    expect(parseDuration(text)).toBeNull();
  });
});

describe('sleep', () => {
  it('resolves true after the full wait', async () => {
    await expect(sleep(5)).resolves.toBe(true);
  });

  it('resolves false as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBe(false);
  });

  it('resolves false at once for an aborted signal', async () => {
    await expect(sleep(10_000, AbortSignal.abort())).resolves.toBe(false);
  });
});
