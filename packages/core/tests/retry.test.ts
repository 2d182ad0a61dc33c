import { describe, expect, it, vi } from 'vitest';
import {
  computeBackoffDelayMs,
  sleep,
  withRetries,
} from '../src/utils/retry.js';
import { RetryExhaustedError, VerificationError } from '../src/errors/index.js';

function fakeSleep() {
  return vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
}

describe('withRetries', () => {
  it('returns the first successful result without waiting', async () => {
    const wait = fakeSleep();
    const fn = vi.fn(async () => 'ok');

    await expect(withRetries(fn, { operationName: 'count', sleep: wait })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it('retries transient failures with linearly growing delays', async () => {
    const wait = fakeSleep();
    let calls = 0;
    const fn = vi.fn(async () => {
      calls++;
      if (calls < 3) throw new Error(`transient ${calls}`);
      return 'recovered';
    });

    const result = await withRetries(fn, {
      operationName: 'count',
      attempts: 3,
      baseDelayMs: 100,
      sleep: wait,
    });

    expect(result).toBe('recovered');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('passes the attempt number to the operation', async () => {
    const seen: number[] = [];
    await expect(
      withRetries(
        async ({ attempt }) => {
          seen.push(attempt);
          throw new Error('down');
        },
        { operationName: 'lookup', attempts: 2, baseDelayMs: 1, sleep: fakeSleep() }
      )
    ).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(seen).toEqual([1, 2]);
  });

  it('raises RetryExhaustedError carrying the last cause', async () => {
    const wait = fakeSleep();
    const fn = vi.fn(async () => {
      throw new Error('boom');
    });

    const error = await withRetries(fn, {
      operationName: 'partition year=2025',
      attempts: 3,
      baseDelayMs: 50,
      sleep: wait,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (!(error instanceof RetryExhaustedError)) return;
    expect(error.code).toBe('RETRY_EXHAUSTED');
    expect(error.attempts).toBe(3);
    expect(error.operationName).toBe('partition year=2025');
    expect(error.message).toBe("Operation 'partition year=2025' failed after 3 attempts: boom");
    expect(error.cause).toBeInstanceOf(Error);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([50, 100]);
  });

  it('does not retry configuration errors', async () => {
    const failure = new VerificationError({ code: 'CONFIGURATION_ERROR', message: 'no columns' });
    const fn = vi.fn(async () => {
      throw failure;
    });

    await expect(
      withRetries(fn, { operationName: 'analyze', sleep: fakeSleep() })
    ).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('refuses to start once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'never');

    await expect(
      withRetries(fn, { operationName: 'late', signal: controller.signal, sleep: fakeSleep() })
    ).rejects.toMatchObject({ code: 'CANCELLED', message: 'late was cancelled' });
    expect(fn).not.toHaveBeenCalled();
  });

  it('treats at least one attempt as mandatory', async () => {
    const fn = vi.fn(async () => {
      throw new Error('nope');
    });
    await expect(
      withRetries(fn, { operationName: 'once', attempts: 0, sleep: fakeSleep() })
    ).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('computeBackoffDelayMs', () => {
  it('multiplies the base delay by the attempt number', () => {
    expect(computeBackoffDelayMs(1000, 1)).toBe(1000);
    expect(computeBackoffDelayMs(1000, 3)).toBe(3000);
    expect(computeBackoffDelayMs(0, 5)).toBe(0);
  });
});

describe('sleep', () => {
  it('rejects with CANCELLED when aborted mid-wait', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'CANCELLED' });
  });

  it('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});
