/**
 * Automation Runtime Components
 *
 * @module automation/runtime
 */

export { BackoffTimer, SleepCancelledError, type SleepFunction } from './BackoffTimer.js';
export {
  RetryExecutor,
  type RetrySchedule,
  type RetryContext,
  type RetryResult,
  type RetryListeners,
  type RetryOptions,
} from './RetryExecutor.js';
export {
  CircuitBreaker,
  CircuitState,
  type CircuitBreakerSnapshot,
  type CircuitDecision,
} from './CircuitBreaker.js';
