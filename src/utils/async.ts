import { OperationTimeoutError } from "../errors";

/**
 * Sleep that wakes early (without throwing) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Wait for a promise to settle (either way) for at most `ms`.
 * Resolves true if it settled in time.
 */
export function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    promise.then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      () => {
        clearTimeout(timer);
        resolve(true);
      },
    );
  });
}

/**
 * Settle with `promise`, or reject with OperationTimeoutError after `ms`.
 * The underlying work is not cancelled; a late rejection is absorbed.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, operation: string): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(new OperationTimeoutError(operation, ms)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/**
 * FIFO async mutex. Callers queue behind the previous holder; a failing
 * critical section does not poison the queue.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(fn).finally(() => {
      this.pending--;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}
