/**
 * CLI Run Command Options
 *
 * Command-line options for the `stageflow run` command.
 */

import { ConfigurationError } from '@stageflow/engine';

export type OutputFormat = 'human' | 'json' | 'null';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'null'];

/**
 * CLI run command options
 */
export interface CliRunOptions {
  /**
   * Environment name; selects catalog base URLs and `.wfvars` sections
   */
  env: string;

  /**
   * Path to the API catalog (JSON or YAML)
   */
  catalog?: string;

  /**
   * Catalog version to use; defaults to the workflow's version
   */
  catalogVersion?: string;

  /**
   * Environment file used instead of `references.environmentFile`
   */
  envFile?: string;

  /**
   * Path to a `.wfvars` file; defaults to the workflow's sidecar
   */
  varsFile?: string;

  /**
   * Workflow inputs in key=value form, applied over the vars file
   */
  var?: string[];

  mocked?: boolean;

  /**
   * Validate and print the plan without executing
   */
  dryRun?: boolean;

  verbose?: boolean;

  /**
   * Log stage `debug` maps
   */
  debug?: boolean;

  format: string;

  /**
   * False when `--no-color` is given
   */
  color: boolean;
}

/**
 * Parse key=value pairs into object
 *
 * @throws {ConfigurationError} On a pair without `=` or with an empty key
 */
export function parseKeyValuePairs(pairs: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index === -1) {
      throw ConfigurationError.invalidOption('--var', `Invalid key=value format: ${pair}`);
    }

    const key = pair.slice(0, index).trim();
    if (!key) {
      throw ConfigurationError.invalidOption('--var', `Empty key in: ${pair}`);
    }

    result[key] = pair.slice(index + 1).trim();
  }

  return result;
}

/**
 * Narrow a `--format` value
 *
 * @throws {ConfigurationError} For an unknown format
 */
export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((item) => item === value.toLowerCase());
  if (!format) {
    throw ConfigurationError.invalidOption('--format', `Unknown format '${value}'. Valid formats: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}
