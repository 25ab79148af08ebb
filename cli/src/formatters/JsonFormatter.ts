/**
 * JSON Formatter
 *
 * Outputs structured JSON for:
 * - Machine parsing
 * - CI/CD integration
 *
 * Each event is a separate JSON line (JSONL/NDJSON format).
 * The final result, plan or report is also one JSON line.
 */

import type { EngineEvent, ValidationResult, WorkflowPlan, WorkflowRunResult } from '@stageflow/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';

export class JsonFormatter implements Formatter {
  private readonly out: (line: string) => void;
  private readonly err: (line: string) => void;

  constructor(options: FormatterOptions = {}) {
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  onEvent(event: EngineEvent): void {
    this.out(
      JSON.stringify({
        type: event.type,
        timestamp: new Date(event.timestamp).toISOString(),
        workflowName: event.workflowName,
        stageName: event.stageName,
        depth: event.depth,
        ...serializePayload(event.payload),
      }),
    );
  }

  showResult(result: WorkflowRunResult): void {
    const { error, ...rest } = result;
    this.out(
      JSON.stringify({
        type: 'workflow.result',
        ...rest,
        error: error ? serializeError(error) : undefined,
      }),
    );
  }

  showPlan(plan: WorkflowPlan): void {
    this.out(JSON.stringify({ type: 'workflow.plan', plan }));
  }

  showValidation(workflowPath: string, result: ValidationResult): void {
    this.out(JSON.stringify({ type: 'workflow.validation', path: workflowPath, ...result }));
  }

  showError(error: Error): void {
    this.err(JSON.stringify({ type: 'error', timestamp: new Date().toISOString(), error: serializeError(error) }));
  }

  showWarning(message: string): void {
    this.out(JSON.stringify({ type: 'warning', timestamp: new Date().toISOString(), message }));
  }

  showInfo(message: string): void {
    this.out(JSON.stringify({ type: 'info', timestamp: new Date().toISOString(), message }));
  }
}

function serializeError(error: Error): Record<string, unknown> {
  const serialized: Record<string, unknown> = { name: error.name, message: error.message };
  if ('code' in error && typeof error.code === 'string') {
    serialized.code = error.code;
  }
  return serialized;
}

function serializePayload(payload: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(payload).map(([key, value]) => [key, value instanceof Error ? serializeError(value) : value]),
  );
}
