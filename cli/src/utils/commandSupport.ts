/**
 * Helpers shared by the command handlers
 */

import { ExitCode, StageflowError, type EngineLogLevel } from '@stageflow/engine';
import { createFormatter } from '../formatters/createFormatter.js';
import { HumanFormatter } from '../formatters/HumanFormatter.js';
import { parseOutputFormat, type OutputFormat } from '../types/CliRunOptions.js';
import type { Formatter } from '../formatters/Formatter.js';

export interface FormatterSelection {
  formatter: Formatter;
  format: OutputFormat;
}

/**
 * Formatter for `--format`; an unknown format still gets a human formatter
 * so the error can be shown
 */
export function selectFormatter(
  format: string,
  options: { verbose?: boolean; color: boolean },
  override?: Formatter,
): FormatterSelection | { formatter: Formatter; error: Error } {
  const formatterOptions = { verbose: options.verbose, noColor: !options.color };
  try {
    const parsed = parseOutputFormat(format);
    return { formatter: override ?? createFormatter(parsed, formatterOptions), format: parsed };
  } catch (error) {
    return { formatter: override ?? new HumanFormatter(formatterOptions), error: toError(error) };
  }
}

/**
 * Engine log level for an output format; machine formats keep stdout clean
 */
export function engineLogLevel(format: OutputFormat, verbose = false): EngineLogLevel {
  if (format !== 'human') {
    return 'silent';
  }
  return verbose ? 'debug' : 'info';
}

export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof StageflowError ? error.exitCode : ExitCode.INTERNAL_ERROR;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
