/**
 * Retry Executor
 *
 * Runs one side-effecting call under a retry schedule. The call's body is
 * opaque: the caller says which results and errors deserve another attempt.
 *
 * @module automation/runtime
 */

import { BackoffTimer, SleepCancelledError, type SleepFunction } from './BackoffTimer.js';

/**
 * What the executor needs from a policy
 */
export interface RetrySchedule {
  readonly maxRetries: number;
  delayFor(attempt: number): number;
}

export interface RetryContext {
  /** Current attempt number (1-indexed) */
  attempt: number;

  maxRetries: number;

  isFinalAttempt: boolean;
}

export interface RetryResult<T> {
  /** Last value returned by the operation; set for success and for exhausted results */
  result?: T;

  /**
   * - success: a value that needs no retry
   * - exhausted: the retry budget ran out on a retryable value or error
   * - failed: a non-retryable error
   * - aborted: the signal fired before a new attempt or during a wait
   */
  status: 'success' | 'exhausted' | 'failed' | 'aborted';

  attempts: number;

  /** attempts - 1, never negative */
  retries: number;

  /** Final error, when the last attempt threw */
  error?: Error;

  allErrors: Error[];
}

export interface RetryListeners<T> {
  /** Called before waiting for the next attempt */
  onRetry?: (reason: { result?: T; error?: Error }, delayMs: number, context: RetryContext) => void | Promise<void>;
}

export interface RetryOptions<T> {
  /** True when a returned value should be retried */
  shouldRetryResult?: (result: T) => boolean;

  /** True when a thrown error should be retried; defaults to every error */
  shouldRetryError?: (error: Error) => boolean;

  signal?: AbortSignal;

  listeners?: RetryListeners<T>;

  sleep?: SleepFunction;
}

export class RetryExecutor {
  /**
   * Execute `operation` until it succeeds, fails permanently, runs out of
   * retries or is aborted
   *
   * @param operation - Receives the 1-indexed attempt number
   */
  static async execute<T>(
    operation: (attempt: number) => Promise<T>,
    schedule: RetrySchedule,
    options: RetryOptions<T> = {},
  ): Promise<RetryResult<T>> {
    const { signal, listeners } = options;
    const sleep = options.sleep ?? ((ms: number, s?: AbortSignal) => BackoffTimer.sleep(ms, s));
    const allErrors: Error[] = [];
    const maxRetries = Math.max(0, schedule.maxRetries);

    const finish = (status: RetryResult<T>['status'], attempts: number, extra: { result?: T; error?: Error } = {}): RetryResult<T> => ({
      ...extra,
      status,
      attempts,
      retries: Math.max(0, attempts - 1),
      allErrors,
    });

    for (let attempt = 1; ; attempt++) {
      const context: RetryContext = {
        attempt,
        maxRetries,
        isFinalAttempt: attempt > maxRetries,
      };

      if (signal?.aborted) {
        return finish('aborted', attempt - 1);
      }

      let outcome: { ok: true; result: T } | { ok: false; error: Error };
      try {
        outcome = { ok: true, result: await operation(attempt) };
      } catch (caught) {
        outcome = { ok: false, error: caught instanceof Error ? caught : new Error(String(caught)) };
      }

      if (!outcome.ok) {
        const { error } = outcome;
        allErrors.push(error);
        if (signal?.aborted) {
          return finish('aborted', attempt, { error });
        }
        if (!(options.shouldRetryError?.(error) ?? true)) {
          return finish('failed', attempt, { error });
        }
      } else if (!(options.shouldRetryResult?.(outcome.result) ?? false)) {
        return finish('success', attempt, { result: outcome.result });
      }

      const reason = outcome.ok ? { result: outcome.result } : { error: outcome.error };

      if (context.isFinalAttempt) {
        return finish('exhausted', attempt, reason);
      }

      const delayMs = schedule.delayFor(attempt);
      await listeners?.onRetry?.(reason, delayMs, context);

      try {
        await sleep(delayMs, signal);
      } catch (error) {
        if (error instanceof SleepCancelledError || signal?.aborted) {
          return finish('aborted', attempt, reason);
        }
        throw error;
      }
    }
  }
}
