import { VerificationError, isVerificationError } from '../errors/index.js';

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  makeTimeoutError: () => Error = () =>
    new VerificationError({ code: 'TIMEOUT', message: 'Operation timed out' })
): Promise<T> {
  if (!timeoutMs) return promise;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<T>((_resolve, reject) => {
    timer = setTimeout(() => reject(makeTimeoutError()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wait for `promise` for at most `timeoutMs`.
 * Resolves true if it settled in time, false on expiry.
 */
export async function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  try {
    await withTimeout(promise, timeoutMs);
    return true;
  } catch (err) {
    if (isVerificationError(err, 'TIMEOUT')) return false;
    throw err;
  }
}
