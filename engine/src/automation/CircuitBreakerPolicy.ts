/**
 * Circuit Breaker Policy
 *
 * @module automation
 */

import type { StageCircuitBreakerDefinition, WorkflowDefinition } from '../types/definitions.js';

export const DEFAULT_CLOSE_ON_SUCCESS_ATTEMPTS = 1;

export interface CircuitBreakerPolicyConfig {
  /** Breaker identity; stages sharing a ref share one breaker */
  name: string;
  failureThreshold: number;
  breakMs: number;
  closeOnSuccessAttempts?: number;
  onOpenMessage?: string;
  onBlockedMessage?: string;
}

export class CircuitBreakerPolicy {
  readonly name: string;
  readonly failureThreshold: number;
  readonly breakMs: number;
  readonly closeOnSuccessAttempts: number;
  readonly onOpenMessage?: string;
  readonly onBlockedMessage?: string;

  constructor(config: CircuitBreakerPolicyConfig) {
    this.name = config.name;
    this.failureThreshold = config.failureThreshold;
    this.breakMs = config.breakMs;
    this.closeOnSuccessAttempts = config.closeOnSuccessAttempts ?? DEFAULT_CLOSE_ON_SUCCESS_ATTEMPTS;
    this.onOpenMessage = config.onOpenMessage;
    this.onBlockedMessage = config.onBlockedMessage;
  }

  /**
   * Merge the stage's inline fields over its named policy
   *
   * Returns null when the stage has no breaker or a required value is missing.
   */
  static resolve(
    breaker: StageCircuitBreakerDefinition | undefined,
    stageName: string,
    definition: WorkflowDefinition,
  ): CircuitBreakerPolicy | null {
    if (!breaker) {
      return null;
    }

    const named = breaker.ref ? definition.resilience?.circuitBreakers?.[breaker.ref] : undefined;
    const failureThreshold = breaker.failureThreshold ?? named?.failureThreshold;
    const breakMs = breaker.breakMs ?? named?.breakMs;

    if (failureThreshold === undefined || breakMs === undefined) {
      return null;
    }

    return new CircuitBreakerPolicy({
      name: breaker.ref ?? stageName,
      failureThreshold,
      breakMs,
      closeOnSuccessAttempts: breaker.closeOnSuccessAttempts ?? named?.closeOnSuccessAttempts,
      onOpenMessage: breaker.messages?.onOpen,
      onBlockedMessage: breaker.messages?.onBlocked,
    });
  }
}
