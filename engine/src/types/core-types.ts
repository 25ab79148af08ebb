import type { WorkflowResultStatus } from '../context/ExecutionContext.js';

/**
 * Workflow run options
 * Per-run settings layered over the engine configuration
 */
export interface WorkflowRunOptions {
  /**
   * Workflow input values, keyed by declared input name
   */
  inputs?: Record<string, string>;

  /**
   * Environment map overrides; win over the workflow's environment file
   */
  env?: Record<string, string>;

  /**
   * Environment file used instead of `references.environmentFile`
   */
  envFile?: string;

  /**
   * Initial context map for the root run
   */
  context?: Record<string, string>;

  /**
   * Overrides EngineConfig.mocked for this run
   */
  mocked?: boolean;

  /**
   * Overrides EngineConfig.varsOverrideActive for this run
   */
  varsOverrideActive?: boolean;

  /**
   * Cooperative cancellation for every sleep and network call
   */
  signal?: AbortSignal;
}

/**
 * Workflow load options
 */
export interface WorkflowLoadOptions {
  /**
   * Environment map overrides; win over file values
   */
  envOverrides?: Record<string, string>;

  /**
   * Environment file used instead of `references.environmentFile`
   */
  envFile?: string;
}

export type StageRunStatus = 'completed' | 'skipped' | 'failed' | 'jumped';

/**
 * What happened to one stage visit. A stage revisited through a jump
 * appears once per visit.
 */
export interface StageRunRecord {
  name: string;
  kind: string;
  status: StageRunStatus;
  /** Response status for endpoint kinds */
  httpStatus?: number;
  /** Retries used, excluding the first attempt */
  retries?: number;
  jumpTo?: string;
  /** Skip reason or failure message */
  message?: string;
  durationMs: number;
}

/**
 * Outcome of one workflow run, root or nested
 */
export interface WorkflowRunResult {
  workflowName: string;
  workflowId: string;
  status: WorkflowResultStatus;

  /** Resolved `endStage.result.message`, or the failure message */
  message: string;

  /** Resolved `endStage.output`; empty when the run failed */
  output: Record<string, string>;

  /** Context map as the run left it */
  context: Record<string, string>;

  /** Set when an output file was written */
  outputFilePath?: string;

  stages: StageRunRecord[];
  durationMs: number;
  error?: Error;
}
