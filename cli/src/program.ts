/**
 * Command tree for the stageflow CLI
 */

import { Command } from 'commander';
import { registerPlanCommand } from './commands/plan.js';
import { registerRunCommand } from './commands/run.js';
import { registerValidateCommand } from './commands/validate.js';

export const CLI_VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stageflow')
    .description('Declarative API workflow runner')
    .version(CLI_VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  registerRunCommand(program);
  registerValidateCommand(program);
  registerPlanCommand(program);

  return program;
}
