/**
 * Execution Context
 *
 * Per-invocation state container. One instance per workflow run (root or
 * nested), owned by the WorkflowExecutor that created it and passed by
 * reference to every stage plugin. A nested run gets its own instance;
 * only the child's end-stage outputs and status travel back to the parent.
 * Every name lookup ignores case.
 *
 * @module context
 */

import { CaseInsensitiveMap } from '../utils/caseInsensitive.js';
import type { CircuitBreaker } from '../automation/runtime/CircuitBreaker.js';

export type WorkflowResultStatus = 'Ok' | 'Error';

/**
 * Terminal status of a nested workflow stage, readable through
 * `{{stage:<name>.workflow.result.status}}` and `.message`
 */
export interface WorkflowStageResult {
  status: WorkflowResultStatus;
  message: string;
}

/**
 * Read-only view the TemplateResolver needs
 */
export interface TemplateScope {
  readonly inputs: Readonly<Record<string, string>>;
  readonly globals: ReadonlyMap<string, string>;
  readonly context: ReadonlyMap<string, string>;
  readonly environment: Readonly<Record<string, string>>;
  readonly endpointOutputs: ReadonlyMap<string, Readonly<Record<string, string>>>;
  readonly workflowOutputs: ReadonlyMap<string, Readonly<Record<string, string>>>;
  readonly workflowResults: ReadonlyMap<string, WorkflowStageResult>;
}

export interface ExecutionContextOptions {
  inputs?: Record<string, string>;
  environment?: Record<string, string>;
  /** Initial context map; copied, never shared */
  context?: ReadonlyMap<string, string>;
  indentLevel?: number;
}

export class ExecutionContext implements TemplateScope {
  readonly inputs: Readonly<Record<string, string>>;
  readonly environment: Readonly<Record<string, string>>;
  readonly globals = new CaseInsensitiveMap<string>();
  readonly context: Map<string, string>;
  readonly endpointOutputs = new CaseInsensitiveMap<Record<string, string>>();
  readonly workflowOutputs = new CaseInsensitiveMap<Record<string, string>>();
  readonly workflowResults = new CaseInsensitiveMap<WorkflowStageResult>();
  readonly circuitBreakers = new Map<string, CircuitBreaker>();
  readonly indentLevel: number;

  /** Set once the workflow output file has been written */
  outputFilePath?: string;

  constructor(options: ExecutionContextOptions = {}) {
    this.inputs = Object.freeze({ ...(options.inputs ?? {}) });
    this.environment = Object.freeze({ ...(options.environment ?? {}) });
    this.context = new CaseInsensitiveMap(options.context ?? []);
    this.indentLevel = options.indentLevel ?? 0;
  }

  /**
   * Fresh context for a nested workflow run, seeded with a copy of this
   * run's context map
   */
  createChild(inputs: Record<string, string>, environment: Record<string, string>): ExecutionContext {
    return new ExecutionContext({
      inputs,
      environment,
      context: this.context,
      indentLevel: this.indentLevel + 1,
    });
  }

  /**
   * Captured outputs for a stage, endpoint outputs first
   */
  getStageOutput(stageName: string): Readonly<Record<string, string>> | undefined {
    return this.endpointOutputs.get(stageName) ?? this.workflowOutputs.get(stageName);
  }

  /**
   * Plain-object copy of the context map
   */
  contextSnapshot(): Record<string, string> {
    return Object.fromEntries(this.context);
  }
}
