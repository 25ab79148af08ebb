/**
 * Validate Command
 *
 * Static checks only; nothing is called.
 *
 * Usage:
 *   stageflow validate create-account.workflow
 *   stageflow validate create-account.workflow --format json
 *
 * Exit codes:
 *   0 - Workflow is valid
 *   1 - Validation or load errors
 */

import type { Command } from 'commander';
import { ExitCode, WorkflowEngine, WorkflowLoader } from '@stageflow/engine';
import { exitCodeFor, selectFormatter, toError } from '../utils/commandSupport.js';
import type { CliValidateOptions } from '../types/CliValidateOptions.js';
import type { CommandContext } from './run.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <workflow>')
    .description('Validate a workflow and everything it references')
    .option('--env-file <path>', 'Environment file used instead of references.environmentFile')
    .option('-f, --format <format>', 'Output format (human|json|null)', 'human')
    .option('--no-color', 'Disable colored output')
    .action(async (workflowPath: string, options: CliValidateOptions) => {
      process.exitCode = await executeValidate(workflowPath, options);
    });
}

export async function executeValidate(
  workflowPath: string,
  options: CliValidateOptions,
  context: CommandContext = {},
): Promise<ExitCode> {
  const selection = selectFormatter(options.format, { color: options.color }, context.formatter);
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

    const result = await engine.validate(document);
    formatter.showValidation(document.filePath, result);
    return result.valid ? ExitCode.SUCCESS : ExitCode.INVALID_WORKFLOW;
  } catch (error) {
    formatter.showError(toError(error));
    return exitCodeFor(error);
  }
}
