import type { Logger } from '../logging/logger.js';
import {
  RetryExhaustedError,
  VerificationError,
  cancelledError,
  errorMessage,
  type ErrorCode,
} from '../errors/index.js';

export type RetryConfig = {
  /** Total attempts including the first (default: 3). */
  attempts?: number;
  /** Linear backoff unit; the wait after failed attempt n is n * baseDelayMs (default: 1000ms). */
  baseDelayMs?: number;
};

export type RetryContext = {
  attempt: number;
  attempts: number;
};

/** Abortable delay; rejects with a CANCELLED error when the signal fires */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryOptions = RetryConfig & {
  /** Logical name used in logs and in the exhaustion error */
  operationName: string;
  signal?: AbortSignal;
  sleep?: SleepFn;
  logger?: Logger;
  isRetryable?: (err: unknown) => boolean;
};

const NON_RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'CONFIGURATION_ERROR',
  'INVALID_IDENTIFIER',
  'INVALID_PARTITION',
  'CANCELLED',
]);

export function isRetryableError(err: unknown): boolean {
  return !(err instanceof VerificationError && NON_RETRYABLE_CODES.has(err.code));
}

export function computeBackoffDelayMs(baseDelayMs: number, attempt: number): number {
  return Math.max(0, attempt * baseDelayMs);
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw cancelledError('Backoff wait');
  }

  await new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError('Backoff wait'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` up to `attempts` times with linear backoff between attempts.
 * Non-retryable errors are rethrown unchanged; exhaustion raises
 * RetryExhaustedError carrying the last cause.
 */
export async function withRetries<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts ?? 3));
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const wait = options.sleep ?? sleep;
  const isRetryable = options.isRetryable ?? isRetryableError;
  const name = options.operationName;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (options.signal?.aborted) {
      throw cancelledError(name);
    }

    try {
      options.logger?.debug(`Executing ${name} (attempt ${attempt}/${attempts})`);
      return await fn({ attempt, attempts });
    } catch (err) {
      lastError = err;
      if (!isRetryable(err)) {
        throw err;
      }

      options.logger?.warn(`Attempt ${attempt}/${attempts} failed for ${name}`, {
        error: errorMessage(err),
      });

      if (attempt < attempts) {
        const delayMs = computeBackoffDelayMs(baseDelayMs, attempt);
        options.logger?.info(`Retrying ${name} in ${delayMs}ms`);
        await wait(delayMs, options.signal);
      }
    }
  }

  options.logger?.error(`All ${attempts} attempts failed for ${name}`);
  throw new RetryExhaustedError(name, attempts, lastError);
}
