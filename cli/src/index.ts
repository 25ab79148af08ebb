/**
 * stageflow CLI as a library: command handlers and formatters
 */

export { createProgram, CLI_VERSION } from './program.js';
export { executeRun, registerRunCommand, type CommandContext } from './commands/run.js';
export { executeValidate, registerValidateCommand } from './commands/validate.js';
export { executePlan, registerPlanCommand } from './commands/plan.js';
export type { Formatter, FormatterOptions } from './formatters/Formatter.js';
export { HumanFormatter, formatDuration } from './formatters/HumanFormatter.js';
export { JsonFormatter } from './formatters/JsonFormatter.js';
export { NullFormatter } from './formatters/NullFormatter.js';
export { createFormatter } from './formatters/createFormatter.js';
export * from './types/CliRunOptions.js';
export type { CliValidateOptions } from './types/CliValidateOptions.js';
export type { CliPlanOptions } from './types/CliPlanOptions.js';
