/**
 * Retry Policy
 *
 * Effective retry settings for one endpoint stage: the stage's inline
 * fields merged field by field over its referenced named policy.
 *
 * @module automation
 */

import { BackoffStrategy, type BackoffType } from './BackoffStrategy.js';
import type { StageRetryDefinition, WorkflowDefinition } from '../types/definitions.js';

export interface RetryPolicyConfig {
  maxRetries: number;
  delayMs: number;
  /** Response statuses that trigger another attempt */
  httpStatus: readonly number[];
  backoff?: BackoffType;
  /** Template emitted when a transport error exhausts the retries */
  onExceptionMessage?: string;
}

export class RetryPolicy {
  readonly maxRetries: number;
  readonly delayMs: number;
  readonly retryStatuses: ReadonlySet<number>;
  readonly onExceptionMessage?: string;
  private readonly backoff: BackoffStrategy;

  constructor(config: RetryPolicyConfig) {
    this.maxRetries = config.maxRetries;
    this.delayMs = config.delayMs;
    this.retryStatuses = new Set(config.httpStatus);
    this.onExceptionMessage = config.onExceptionMessage;
    this.backoff = new BackoffStrategy(config.backoff ?? 'fixed', config.delayMs);
  }

  /**
   * Build the effective policy for a stage
   *
   * maxRetries and delayMs come from the inline block, falling back to the
   * named policy; httpStatus is inline only. Returns null unless all three
   * are present.
   */
  static resolve(
    retry: StageRetryDefinition | undefined,
    definition: WorkflowDefinition,
    backoff: BackoffType = 'fixed',
  ): RetryPolicy | null {
    if (!retry) {
      return null;
    }

    const named = retry.ref ? definition.resilience?.retries?.[retry.ref] : undefined;
    const maxRetries = retry.maxRetries ?? named?.maxRetries;
    const delayMs = retry.delayMs ?? named?.delayMs;
    const httpStatus = retry.httpStatus ?? [];

    if (maxRetries === undefined || delayMs === undefined || httpStatus.length === 0) {
      return null;
    }

    return new RetryPolicy({
      maxRetries,
      delayMs,
      httpStatus,
      backoff,
      onExceptionMessage: retry.messages?.onException,
    });
  }

  isRetryableStatus(status: number): boolean {
    return this.retryStatuses.has(status);
  }

  /**
   * Delay before the retry following failed attempt `attempt` (1-indexed)
   */
  delayFor(attempt: number): number {
    return this.backoff.calculateDelay(attempt);
  }
}
