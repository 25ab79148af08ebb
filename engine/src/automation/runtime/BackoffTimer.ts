/**
 * Backoff Timer
 *
 * Abortable waits between retry attempts and before delayed stages.
 *
 * @module automation/runtime
 */

/**
 * Raised when a wait is interrupted by its abort signal
 */
export class SleepCancelledError extends Error {
  constructor() {
    super('Wait cancelled');
    this.name = 'SleepCancelledError';
  }
}

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

export class BackoffTimer {
  /**
   * Sleep for `ms`, rejecting with SleepCancelledError when `signal` aborts
   */
  static sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new SleepCancelledError());
    }
    if (ms <= 0) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timeout);
        reject(new SleepCancelledError());
      };
      const timeout = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
