/**
 * Plan Command
 *
 * Shows what a run would do without calling anything: stage order, calls,
 * jumps, retry and circuit breaker settings. --verbose expands nested
 * workflows and shows request maps and bindings.
 *
 * Usage:
 *   stageflow plan create-account.workflow
 *   stageflow plan create-account.workflow --verbose
 *   stageflow plan create-account.workflow --format json
 *
 * Exit codes:
 *   0 - Plan printed
 *   1 - Validation or load errors
 */

import type { Command } from 'commander';
import { ExitCode, WorkflowEngine, WorkflowLoader } from '@stageflow/engine';
import { exitCodeFor, selectFormatter, toError } from '../utils/commandSupport.js';
import type { CliPlanOptions } from '../types/CliPlanOptions.js';
import type { CommandContext } from './run.js';

export function registerPlanCommand(program: Command): void {
  program
    .command('plan <workflow>')
    .description('Show the execution plan without running the workflow')
    .option('--verbose', 'Expand nested workflows and show request details')
    .option('--env-file <path>', 'Environment file used instead of references.environmentFile')
    .option('-f, --format <format>', 'Output format (human|json|null)', 'human')
    .option('--no-color', 'Disable colored output')
    .action(async (workflowPath: string, options: CliPlanOptions) => {
      process.exitCode = await executePlan(workflowPath, options);
    });
}

export async function executePlan(workflowPath: string, options: CliPlanOptions, context: CommandContext = {}): Promise<ExitCode> {
  const selection = selectFormatter(options.format, { verbose: options.verbose, color: options.color }, context.formatter);
  const formatter = selection.formatter;
  if ('error' in selection) {
    formatter.showError(selection.error);
    return exitCodeFor(selection.error);
  }

  try {
    const loader = context.dependencies?.documentLoader ?? new WorkflowLoader();
    const document = await loader.load(workflowPath, undefined, options.envFile);
    const engine = new WorkflowEngine(
      { logLevel: selection.format === 'human' ? 'warn' : 'silent' },
      { ...context.dependencies, documentLoader: loader },
    );

    const validation = await engine.validate(document);
    if (!validation.valid) {
      formatter.showValidation(document.filePath, validation);
      return ExitCode.INVALID_WORKFLOW;
    }

    formatter.showPlan(await engine.plan(document, options.verbose ?? false));
    return ExitCode.SUCCESS;
  } catch (error) {
    formatter.showError(toError(error));
    return exitCodeFor(error);
  }
}
