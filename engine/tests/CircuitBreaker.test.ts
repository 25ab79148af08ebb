import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitBreaker, CircuitState } from '../src/automation/runtime/CircuitBreaker.js';
import { CircuitBreakerPolicy } from '../src/automation/CircuitBreakerPolicy.js';
import { ManualClock } from '../src/utils/SystemClock.js';
import type { WorkflowDefinition } from '../src/types/definitions.js';

describe('CircuitBreaker', () => {
  let clock: ManualClock;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = new ManualClock(1000);
    breaker = new CircuitBreaker(new CircuitBreakerPolicy({ name: 'accounts', failureThreshold: 2, breakMs: 50 }), clock);
  });

  it('opens after consecutive failures', () => {
    expect(breaker.recordFailure()).toBe(false);
    expect(breaker.currentState).toBe(CircuitState.CLOSED);
    expect(breaker.recordFailure()).toBe(true);
    expect(breaker.currentState).toBe(CircuitState.OPEN);
  });

  it('resets the failure count on success', () => {
    breaker.recordFailure();
    breaker.recordSuccess();
    expect(breaker.recordFailure()).toBe(false);
    expect(breaker.currentState).toBe(CircuitState.CLOSED);
  });

  it('blocks calls while the break lasts', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    clock.advance(20);

    expect(breaker.tryAcquire()).toEqual({ allowed: false, retryAfterMs: 30 });
  });

  it('admits a trial once the break has passed and closes on success', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    clock.advance(50);

    expect(breaker.tryAcquire()).toEqual({ allowed: true, trial: true });
    expect(breaker.currentState).toBe(CircuitState.HALF_OPEN);

    breaker.recordSuccess();
    expect(breaker.currentState).toBe(CircuitState.CLOSED);
    expect(breaker.tryAcquire()).toEqual({ allowed: true, trial: false });
  });

  it('reopens with a fresh timestamp when the trial fails', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    clock.advance(60);
    breaker.tryAcquire();

    expect(breaker.recordFailure()).toBe(true);
    expect(breaker.snapshot()).toEqual({
      state: CircuitState.OPEN,
      consecutiveFailures: 0,
      consecutiveSuccesses: 0,
      openedAt: 1060,
    });
    clock.advance(10);
    expect(breaker.tryAcquire()).toEqual({ allowed: false, retryAfterMs: 40 });
  });

  it('needs the configured number of trial successes to close', () => {
    breaker.usePolicy(new CircuitBreakerPolicy({ name: 'accounts', failureThreshold: 2, breakMs: 50, closeOnSuccessAttempts: 2 }));
    breaker.recordFailure();
    breaker.recordFailure();
    clock.advance(50);
    breaker.tryAcquire();

    breaker.recordSuccess();
    expect(breaker.currentState).toBe(CircuitState.HALF_OPEN);
    breaker.recordSuccess();
    expect(breaker.currentState).toBe(CircuitState.CLOSED);
  });

  it('restores a snapshot', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    clock.advance(50);
    const before = breaker.snapshot();
    breaker.tryAcquire();

    breaker.restore(before);
    expect(breaker.currentState).toBe(CircuitState.OPEN);
    expect(breaker.snapshot()).toEqual(before);
  });
});

describe('CircuitBreakerPolicy.resolve', () => {
  const definition: WorkflowDefinition = {
    version: '1',
    id: 'wf',
    name: 'wf',
    resilience: { circuitBreakers: { shared: { failureThreshold: 5, breakMs: 1000 } } },
    stages: [{ name: 'a', kind: 'Workflow' }],
  };

  it('names shared breakers after their policy', () => {
    const policy = CircuitBreakerPolicy.resolve({ ref: 'shared', breakMs: 200 }, 'login', definition);
    expect(policy?.name).toBe('shared');
    expect(policy?.failureThreshold).toBe(5);
    expect(policy?.breakMs).toBe(200);
    expect(policy?.closeOnSuccessAttempts).toBe(1);
  });

  it('names inline breakers after their stage', () => {
    const policy = CircuitBreakerPolicy.resolve({ failureThreshold: 1, breakMs: 10, messages: { onOpen: 'open' } }, 'login', definition);
    expect(policy?.name).toBe('login');
    expect(policy?.onOpenMessage).toBe('open');
  });

  it('returns null when a required value is missing', () => {
    expect(CircuitBreakerPolicy.resolve({ failureThreshold: 1 }, 'login', definition)).toBeNull();
  });
});
