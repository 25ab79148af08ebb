/**
 * Circuit Breaker
 *
 * Closed → Open after `failureThreshold` consecutive failures. Open blocks
 * every call until `breakMs` has passed, then the next call is admitted as
 * a HalfOpen trial. `closeOnSuccessAttempts` consecutive trial successes
 * close it; any trial failure reopens it with a fresh timestamp.
 *
 * @module automation/runtime
 */

import type { CircuitBreakerPolicy } from '../CircuitBreakerPolicy.js';
import type { SystemClock } from '../../utils/SystemClock.js';

export enum CircuitState {
  CLOSED = 'Closed',
  OPEN = 'Open',
  HALF_OPEN = 'HalfOpen',
}

export interface CircuitBreakerSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  openedAt?: number;
}

export type CircuitDecision =
  | { allowed: true; trial: boolean }
  | { allowed: false; retryAfterMs: number };

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private consecutiveFailures = 0;
  private consecutiveSuccesses = 0;
  private openedAt?: number;

  constructor(
    private policy: CircuitBreakerPolicy,
    private readonly clock: SystemClock,
  ) {}

  get name(): string {
    return this.policy.name;
  }

  get currentState(): CircuitState {
    return this.state;
  }

  /**
   * Stages sharing a breaker may carry different inline overrides; the
   * calling stage's policy applies to its own call.
   */
  usePolicy(policy: CircuitBreakerPolicy): void {
    this.policy = policy;
  }

  /**
   * Decide whether a call may go through. An Open breaker whose window
   * has elapsed moves to HalfOpen here.
   */
  tryAcquire(): CircuitDecision {
    if (this.state === CircuitState.OPEN) {
      const openUntil = (this.openedAt ?? 0) + this.policy.breakMs;
      const now = this.clock.now();
      if (now < openUntil) {
        return { allowed: false, retryAfterMs: openUntil - now };
      }
      this.state = CircuitState.HALF_OPEN;
      this.consecutiveFailures = 0;
      this.consecutiveSuccesses = 0;
    }
    return { allowed: true, trial: this.state === CircuitState.HALF_OPEN };
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state !== CircuitState.HALF_OPEN) {
      this.consecutiveSuccesses = 0;
      return;
    }

    this.consecutiveSuccesses++;
    if (this.consecutiveSuccesses >= this.policy.closeOnSuccessAttempts) {
      this.state = CircuitState.CLOSED;
      this.consecutiveSuccesses = 0;
      this.openedAt = undefined;
    }
  }

  /**
   * @returns True when this failure opened (or reopened) the breaker
   */
  recordFailure(): boolean {
    this.consecutiveSuccesses = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.open();
      return true;
    }

    this.consecutiveFailures++;
    if (this.consecutiveFailures >= this.policy.failureThreshold) {
      this.open();
      return true;
    }
    return false;
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      consecutiveSuccesses: this.consecutiveSuccesses,
      openedAt: this.openedAt,
    };
  }

  /**
   * Roll back to a snapshot, used when a trial is cancelled mid-flight
   */
  restore(snapshot: CircuitBreakerSnapshot): void {
    this.state = snapshot.state;
    this.consecutiveFailures = snapshot.consecutiveFailures;
    this.consecutiveSuccesses = snapshot.consecutiveSuccesses;
    this.openedAt = snapshot.openedAt;
  }

  private open(): void {
    this.state = CircuitState.OPEN;
    this.openedAt = this.clock.now();
    this.consecutiveFailures = 0;
  }
}
