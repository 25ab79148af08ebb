/**
 * Backoff Strategy
 *
 * Delay between retry attempts. Workflows carry a flat `delayMs`, so the
 * default is fixed; exponential doubling is an engine-level opt-in.
 *
 * @module automation
 */

export type BackoffType = 'fixed' | 'exponential';

export class BackoffStrategy {
  constructor(
    readonly type: BackoffType,
    readonly baseDelayMs: number,
  ) {}

  /**
   * Delay before the retry that follows failed attempt `attempt` (1-indexed)
   */
  calculateDelay(attempt: number): number {
    if (this.baseDelayMs <= 0) {
      return 0;
    }
    return this.type === 'exponential' ? this.baseDelayMs * 2 ** Math.max(0, attempt - 1) : this.baseDelayMs;
  }
}
