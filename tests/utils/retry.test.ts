import { describe, expect, it } from 'vitest';
import { GenerationError, SynthesisError } from '../../src/errors.js';
import { parseRetryAfter, sleep, withRetry } from '../../src/utils/retry.js';

function recorder() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => { delays.push(ms); } };
}

describe('withRetry', () => {
  it('retries retryable errors with exponential backoff until success', async () => {
    const clock = recorder();
    let calls = 0;
    const value = await withRetry(async (attempt) => {
      calls += 1;
      if (attempt < 3) throw new SynthesisError('TransientNetworkError', 'reset');
      return 'done';
    }, { maxAttempts: 3, baseDelayMs: 500, backoffFactor: 2, sleep: clock.sleep });

    expect(value).toBe('done');
    expect(calls).toBe(3);
    expect(clock.delays).toEqual([500, 1000]);
  });

  it('throws a non-retryable error on the first attempt', async () => {
    const clock = recorder();
    let calls = 0;
    await expect(withRetry(async () => {
      calls += 1;
      throw new SynthesisError('AuthFailure', 'bad key');
    }, { maxAttempts: 5, sleep: clock.sleep })).rejects.toMatchObject({ kind: 'AuthFailure' });
    expect(calls).toBe(1);
    expect(clock.delays).toEqual([]);
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    const clock = recorder();
    let calls = 0;
    await expect(withRetry(async () => {
      calls += 1;
      throw new GenerationError('TransientFailure', `outage ${calls}`);
    }, { maxAttempts: 3, baseDelayMs: 10, sleep: clock.sleep })).rejects.toThrow('outage 3');
    expect(calls).toBe(3);
    expect(clock.delays).toEqual([10, 20]);
  });

  it('waits at least as long as the error asks', async () => {
    const clock = recorder();
    let calls = 0;
    await withRetry(async () => {
      calls += 1;
      if (calls === 1) throw new SynthesisError('RateLimited', 'slow down', { retryAfterMs: 2000 });
      return calls;
    }, { maxAttempts: 2, baseDelayMs: 500, sleep: clock.sleep });
    expect(clock.delays).toEqual([2000]);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;
    await expect(withRetry(async () => { calls += 1; }, { maxAttempts: 3, signal: controller.signal }))
      .rejects.toMatchObject({ name: 'AbortError' });
    expect(calls).toBe(0);
  });
});

describe('sleep', () => {
  it('rejects when aborted mid-wait', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
    expect(parseRetryAfter('1.5')).toBe(1500);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:05 GMT', now)).toBe(5000);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
