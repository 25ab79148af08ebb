/**
 * CLI Plan Command Options
 *
 * Command-line options for the `stageflow plan` command.
 */

export interface CliPlanOptions {
  /**
   * Expand nested workflows and show request maps and bindings
   */
  verbose?: boolean;
  envFile?: string;
  format: string;
  color: boolean;
}
