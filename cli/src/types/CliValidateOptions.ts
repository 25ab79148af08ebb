/**
 * CLI Validate Command Options
 *
 * Command-line options for the `stageflow validate` command.
 */

export interface CliValidateOptions {
  envFile?: string;
  format: string;
  color: boolean;
}
