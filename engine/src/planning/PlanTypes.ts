/**
 * Plan Types
 *
 * What a run would do, built without executing anything.
 *
 * @module planning
 */

import type { WorkflowInputDefinition } from '../types/definitions.js';

/**
 * Effective retry settings after merging the named policy
 */
export interface PlannedRetry {
  maxRetries: number;
  delayMs: number;
  httpStatus: number[];
}

export interface PlannedCircuitBreaker {
  name: string;
  failureThreshold: number;
  breakMs: number;
  closeOnSuccessAttempts: number;
}

export interface StagePlan {
  name: string;
  kind: string;
  runIf?: string;
  delaySeconds?: number;

  // Endpoint kinds
  apiRef?: string;
  httpVerb?: string;
  endpoint?: string;
  expectedStatus?: number;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  body?: string;
  jumpOnStatus?: Record<string, string>;
  retry?: PlannedRetry;
  circuitBreaker?: PlannedCircuitBreaker;

  // Workflow kinds
  workflowRef?: string;
  inputs?: Record<string, string>;
  allowVersion?: string;

  mocked: boolean;
  output: Record<string, string>;
  set?: Record<string, string>;
  context?: Record<string, string>;

  /** Referenced workflow's plan, verbose plans only */
  nested?: WorkflowPlan;
}

export interface WorkflowPlan {
  name: string;
  id: string;
  version: string;
  filePath: string;
  description?: string;
  inputs: WorkflowInputDefinition[];
  stages: StagePlan[];
  output: Record<string, string>;
  outputEnabled: boolean;
  initContext?: Record<string, string>;
  endContext?: Record<string, string>;

  /** Set when the workflow already appears higher in the tree */
  alreadyIncluded?: boolean;
}
