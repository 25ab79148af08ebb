/**
 * Base Formatter Interface
 *
 * Formatters are the ONLY place where console output is allowed in the CLI.
 * Engine log lines go through the engine logger; formatters add what the
 * log does not carry: headers, plans, validation reports and the result.
 *
 * Flow:
 * 1. Engine emits events during workflow execution
 * 2. The run command forwards every event to formatter.onEvent()
 * 3. The command hands the final result, plan or report to the formatter
 */

import type { EngineEvent, ValidationResult, WorkflowPlan, WorkflowRunResult } from '@stageflow/engine';

export interface FormatterOptions {
  /** Show nested plans, request maps and per-stage details */
  verbose?: boolean;

  /** Disable colors (for CI/CD or terminals without color support) */
  noColor?: boolean;

  /** Where lines go; defaults to the console */
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export interface Formatter {
  /**
   * Handle an engine event
   */
  onEvent(event: EngineEvent): void;

  /**
   * Display the final workflow result
   */
  showResult(result: WorkflowRunResult): void;

  /**
   * Display a dry-run plan
   */
  showPlan(plan: WorkflowPlan): void;

  /**
   * Display a validation report
   */
  showValidation(workflowPath: string, result: ValidationResult): void;

  /**
   * Display a CLI-level error (file not found, invalid workflow, ...)
   */
  showError(error: Error): void;

  showWarning(message: string): void;

  showInfo(message: string): void;
}
