/**
 * Resilience policies and their runtime executors
 *
 * @module automation
 */

export { BackoffStrategy, type BackoffType } from './BackoffStrategy.js';
export { RetryPolicy, type RetryPolicyConfig } from './RetryPolicy.js';
export {
  CircuitBreakerPolicy,
  DEFAULT_CLOSE_ON_SUCCESS_ATTEMPTS,
  type CircuitBreakerPolicyConfig,
} from './CircuitBreakerPolicy.js';
export * from './runtime/index.js';
