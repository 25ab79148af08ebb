/**
 * Human-Readable Formatter
 *
 * Symbols:
 * - ▶ Workflow started
 * - ✔ Success
 * - ✖ Failure
 * - ⊘ Skipped
 * - ↪ Jumped
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { EngineEventType, PlanRenderer, isEventOf } from '@stageflow/engine';
import type { EngineEvent, StageRunRecord, ValidationResult, WorkflowPlan, WorkflowRunResult } from '@stageflow/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';

const STATUS_SYMBOLS: Record<StageRunRecord['status'], string> = {
  completed: '✔',
  failed: '✖',
  skipped: '⊘',
  jumped: '↪',
};

export class HumanFormatter implements Formatter {
  private readonly palette: ChalkInstance;
  private readonly out: (line: string) => void;
  private readonly err: (line: string) => void;

  constructor(private readonly options: FormatterOptions = {}) {
    this.palette = new Chalk(options.noColor ? { level: 0 } : {});
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  onEvent(event: EngineEvent): void {
    // Stage progress is on the engine log
    if (isEventOf(event, EngineEventType.WORKFLOW_STARTED) && event.depth === 0) {
      const { totalStages, mocked } = event.payload;
      this.out('');
      this.out(this.palette.cyan('━'.repeat(60)));
      this.out(this.palette.bold(`▶ ${event.workflowName}`) + (mocked ? this.palette.yellow(' (mocked)') : ''));
      this.out(this.palette.dim(`   ${totalStages} stage${totalStages === 1 ? '' : 's'} to execute`));
      this.out(this.palette.cyan('━'.repeat(60)));
      this.out('');
    }
  }

  showResult(result: WorkflowRunResult): void {
    const ok = result.status === 'Ok';
    this.out('');
    this.out(this.palette.cyan('═'.repeat(60)));
    this.out(
      ok
        ? this.palette.green.bold(`✔ Workflow ${result.workflowName} completed`)
        : this.palette.red.bold(`✖ Workflow ${result.workflowName} failed`),
    );
    this.out(this.palette.cyan('═'.repeat(60)));

    if (result.message) {
      this.out(ok ? result.message : this.palette.red(result.message));
    }

    const count = (status: StageRunRecord['status']) => result.stages.filter((stage) => stage.status === status).length;
    this.out('');
    this.out(this.palette.bold('Summary:'));
    this.out(`  Stage runs: ${result.stages.length}`);
    this.out(this.palette.green(`  Completed:  ${count('completed') + count('jumped')}`));
    if (count('failed') > 0) {
      this.out(this.palette.red(`  Failed:     ${count('failed')}`));
    }
    if (count('skipped') > 0) {
      this.out(this.palette.dim(`  Skipped:    ${count('skipped')}`));
    }
    this.out(`  Duration:   ${formatDuration(result.durationMs)}`);

    const outputs = Object.entries(result.output);
    if (outputs.length > 0) {
      this.out('');
      this.out(this.palette.bold('Output:'));
      for (const [key, value] of outputs) {
        this.out(`  ${key}: ${value}`);
      }
    }
    if (result.outputFilePath) {
      this.out(this.palette.dim(`  written to ${result.outputFilePath}`));
    }

    if (this.options.verbose && result.stages.length > 0) {
      this.out('');
      this.out(this.palette.bold('Stage Details:'));
      for (const stage of result.stages) {
        this.out(`  ${this.formatStage(stage)}`);
      }
    }
    this.out('');
  }

  showPlan(plan: WorkflowPlan): void {
    for (const line of PlanRenderer.render(plan, { verbose: this.options.verbose })) {
      this.out(line);
    }
  }

  showValidation(workflowPath: string, result: ValidationResult): void {
    if (result.valid) {
      this.out(this.palette.green(`✔ ${workflowPath} is valid`));
      return;
    }
    this.err(this.palette.red.bold(`✖ ${workflowPath} has ${result.errors.length} error${result.errors.length === 1 ? '' : 's'}:`));
    for (const error of result.errors) {
      this.err(this.palette.red(`  - ${error}`));
    }
  }

  showError(error: Error): void {
    this.err('');
    this.err(`${this.palette.red.bold('✖ Error:')} ${error.message}`);

    if (this.options.verbose && error.stack) {
      this.err('');
      this.err(this.palette.gray('Stack trace:'));
      this.err(this.palette.gray(error.stack));
    }

    if ('hint' in error && typeof error.hint === 'string') {
      this.err('');
      this.err(`${this.palette.yellow('💡 Hint:')} ${error.hint}`);
    }
  }

  showWarning(message: string): void {
    this.out(`${this.palette.yellow('⚠')} ${message}`);
  }

  showInfo(message: string): void {
    this.out(`${this.palette.blue('ℹ')} ${message}`);
  }

  private formatStage(stage: StageRunRecord): string {
    const symbol = STATUS_SYMBOLS[stage.status];
    const parts = [`${symbol} ${stage.name} [${stage.kind}]`];
    if (stage.httpStatus !== undefined) {
      parts.push(`status ${stage.httpStatus}`);
    }
    if (stage.retries) {
      parts.push(`${stage.retries} retr${stage.retries === 1 ? 'y' : 'ies'}`);
    }
    if (stage.jumpTo) {
      parts.push(`→ ${stage.jumpTo}`);
    }
    parts.push(formatDuration(stage.durationMs));
    const line = parts.join('  ');
    const colored = stage.status === 'failed' ? this.palette.red(line) : stage.status === 'skipped' ? this.palette.dim(line) : line;
    return stage.message ? `${colored}\n      ${this.palette.dim(stage.message)}` : colored;
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
