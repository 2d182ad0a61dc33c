import { VerificationError, cancelledError } from '../errors/index.js';

type Waiter = (release: () => void) => void;

/**
 * Counting semaphore bounding how many partition tasks run at once.
 * Waiters are served in FIFO order; a waiter whose signal aborts leaves the
 * queue without taking a permit.
 */
export class Semaphore {
  private inFlightCount = 0;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new VerificationError({
        code: 'CONFIGURATION_ERROR',
        message: `Semaphore maxConcurrency must be >= 1 (got ${maxConcurrency})`,
      });
    }
  }

  get capacity(): number {
    return this.maxConcurrency;
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  get queueDepth(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      throw cancelledError('Permit wait');
    }

    if (this.inFlightCount < this.maxConcurrency) {
      this.inFlightCount++;
      return this.createRelease();
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(cancelledError('Permit wait'));
      };
      const waiter: Waiter = (release) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(release);
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Run `fn` while holding a permit
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      this.inFlightCount--;
      const next = this.waiters.shift();
      if (next) {
        this.inFlightCount++;
        next(this.createRelease());
      }
    };
  }
}
