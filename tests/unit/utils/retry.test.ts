import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  backoffDelay,
  delay,
  withTimeout,
  OperationTimeoutError,
  RetryAbortedError,
} from '../../../src/utils/retry.js';

describe('backoffDelay', () => {
  const config = { initialDelayMs: 100, maxDelayMs: 1_000, backoffMultiplier: 2 };

  it('waits initialDelayMs before the first retry', () => {
    expect(backoffDelay(1, config)).toBe(100);
  });

  it('multiplies the delay for each following retry', () => {
    expect([2, 3, 4].map((retry) => backoffDelay(retry, config))).toEqual([200, 400, 800]);
  });

  it('caps the delay at maxDelayMs', () => {
    expect(backoffDelay(5, config)).toBe(1_000);
    expect(backoffDelay(5_000, config)).toBe(1_000);
  });

  it('keeps a constant delay with a multiplier of 1', () => {
    expect(backoffDelay(7, { ...config, backoffMultiplier: 1 })).toBe(100);
  });

  it('returns 0 for retry 0 or a zero initial delay', () => {
    expect(backoffDelay(0, config)).toBe(0);
    expect(backoffDelay(3, { ...config, initialDelayMs: 0 })).toBe(0);
  });
});

describe('delay', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the given time', async () => {
    vi.useFakeTimers();
    const settled = vi.fn();

    const promise = delay(50).then(settled);
    await vi.advanceTimersByTimeAsync(49);
    expect(settled).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await promise;
    expect(settled).toHaveBeenCalledTimes(1);
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(delay(0, controller.signal)).rejects.toBeInstanceOf(RetryAbortedError);
  });

  it('rejects when the signal aborts mid-wait', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();

    const promise = delay(10_000, controller.signal);
    controller.abort();

    await expect(promise).rejects.toThrow('Retry aborted');
  });
});

describe('withTimeout', () => {
  it('passes the value through when the promise wins', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1_000)).resolves.toBe('ok');
  });

  it('rejects with OperationTimeoutError when the deadline passes first', async () => {
    const never = new Promise<string>(() => undefined);

    const result = withTimeout(never, 10, 'Probe');

    await expect(result).rejects.toBeInstanceOf(OperationTimeoutError);
    await expect(result).rejects.toThrow('Probe timed out after 10ms');
  });

  it('does not impose a deadline for a non-positive timeout', async () => {
    const slow = new Promise<number>((resolve) => setTimeout(() => resolve(7), 15));

    await expect(withTimeout(slow, 0)).resolves.toBe(7);
  });
});
