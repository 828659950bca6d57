import { describe, it, expect, vi, afterEach } from 'vitest';

vi.mock('../logging/logger', () => ({
  getLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { RetryError, RetryExecutor, computeBackoffDelay, retryWithBackoff, sleep } from '../resilience/retry';

function recordingSleep() {
  const delays: number[] = [];
  const fn = (ms: number) => {
    delays.push(ms);
    return Promise.resolve();
  };
  return { delays, fn };
}

describe('computeBackoffDelay', () => {
  it('grows exponentially from the base delay', () => {
    const options = { baseDelayMs: 1000, multiplier: 2, maxDelayMs: 60000, jitter: false };
    expect([1, 2, 3, 4].map(attempt => computeBackoffDelay(attempt, options))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('caps the delay at maxDelayMs', () => {
    expect(computeBackoffDelay(3, { baseDelayMs: 1000, multiplier: 10, maxDelayMs: 5000, jitter: false })).toBe(5000);
  });

  it('scales by a jitter factor between 0.5 and 1.0', () => {
    const options = { baseDelayMs: 1000, multiplier: 2, maxDelayMs: 60000, jitter: true };
    expect(computeBackoffDelay(2, options, () => 0)).toBe(1000);
    expect(computeBackoffDelay(2, options, () => 0.5)).toBe(1500);
  });
});

describe('retryWithBackoff', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('throws RetryError after exhausting attempts', async () => {
    const { delays, fn } = recordingSleep();
    const lastError = new Error('still failing');
    const operation = vi.fn().mockRejectedValueOnce(new Error('first')).mockRejectedValue(lastError);

    const result = retryWithBackoff(operation, {
      maxAttempts: 3,
      baseDelayMs: 1000,
      multiplier: 2,
      jitter: false,
      sleep: fn,
    });

    await expect(result).rejects.toBeInstanceOf(RetryError);
    await expect(result).rejects.toMatchObject({
      attempts: 3,
      lastError,
      message: 'Failed after 3 attempts: still failing',
    });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('returns as soon as an attempt succeeds', async () => {
    const { delays, fn } = recordingSleep();
    const operation = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue('ok');

    await expect(retryWithBackoff(operation, { jitter: false, sleep: fn })).resolves.toBe('ok');
    expect(operation).toHaveBeenNthCalledWith(2, 2);
    expect(delays).toEqual([1000]);
  });

  it('propagates non-retryable errors without retrying', async () => {
    const { delays, fn } = recordingSleep();
    const fatal = new TypeError('bad input');
    const operation = vi.fn().mockRejectedValue(fatal);

    await expect(
      retryWithBackoff(operation, { isRetryable: error => !(error instanceof TypeError), sleep: fn })
    ).rejects.toBe(fatal);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('stops when the signal is already aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled');
    controller.abort(reason);
    const operation = vi.fn().mockResolvedValue('never');

    await expect(retryWithBackoff(operation, { signal: controller.signal })).rejects.toBe(reason);
    expect(operation).not.toHaveBeenCalled();
  });

  it('waits with timers between attempts', async () => {
    vi.useFakeTimers();
    const operation = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue('done');

    const result = retryWithBackoff(operation, { baseDelayMs: 200, jitter: false });
    await vi.advanceTimersByTimeAsync(199);
    expect(operation).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    await expect(result).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(2);
  });
});

describe('RetryExecutor', () => {
  it('merges per-call options over its defaults', async () => {
    const { delays, fn } = recordingSleep();
    const executor = new RetryExecutor({ maxAttempts: 5, baseDelayMs: 10, jitter: false, sleep: fn });
    const operation = vi.fn().mockRejectedValue(new Error('down'));

    await expect(executor.run(operation, { maxAttempts: 2 })).rejects.toMatchObject({ attempts: 2 });
    expect(delays).toEqual([10]);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('rejects with the abort reason when aborted mid-wait', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const waiting = sleep(10000, controller.signal);
    const reason = new Error('stop');

    controller.abort(reason);

    await expect(waiting).rejects.toBe(reason);
  });
});
