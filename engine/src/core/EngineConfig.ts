/**
 * Engine Configuration
 *
 * User-facing configuration for WorkflowEngine.
 * Every option is optional; applyConfigDefaults() fills in the rest.
 *
 * @module core
 */

import { ConfigurationError } from '../errors/index.js';
import type { BackoffType } from '../automation/BackoffStrategy.js';
import type { StagePluginFactory } from '../plugins/StagePlugin.js';

/**
 * Logging level for engine output
 */
export type EngineLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * What a runIf template failure does to its stage
 * - 'skip': log a warning and skip the stage
 * - 'fail': fail the stage with the resolution error
 */
export type RunIfErrorPolicy = 'skip' | 'fail';

/**
 * Engine configuration options
 *
 * @example
 * ```ts
 * const engine = new WorkflowEngine({
 *   plugins: ['workflow', 'http', 'queue'],
 *   pluginFactories: { queue: () => new QueueStagePlugin() },
 *   environment: 'staging',
 *   logLevel: 'info',
 * });
 * ```
 */
export interface EngineConfig {
  // === Plugins ===

  /**
   * Plugin ids to register, in order. `workflow` is always added.
   * @default ['workflow', 'http']
   */
  plugins?: string[];

  /**
   * Factories for plugins that are not built in, keyed by plugin id
   */
  pluginFactories?: Record<string, StagePluginFactory>;

  // === Execution ===

  /**
   * Environment name used for base URLs and `.wfvars` sections
   * @default 'local'
   */
  environment?: string;

  /**
   * Replace endpoint calls and nested workflows with their `mock` blocks
   * @default false
   */
  mocked?: boolean;

  /**
   * Set when inputs were given explicitly (a vars file or `--var`);
   * nested workflow stages then skip their `.wfvars` sidecar
   * @default false
   */
  varsOverrideActive?: boolean;

  /**
   * @default 'skip'
   */
  runIfErrorPolicy?: RunIfErrorPolicy;

  /**
   * Upper bound on stage transitions per workflow run; stops jump loops
   * @default 1000
   */
  maxStageTransitions?: number;

  /**
   * Per-request transport timeout (milliseconds)
   * @default 30000
   */
  requestTimeoutMs?: number;

  /**
   * Delay growth between retries
   * @default 'fixed'
   */
  retryBackoff?: BackoffType;

  /**
   * Write `.workflow.output` files for workflows with `output: true`
   * @default true
   */
  writeOutputFiles?: boolean;

  // === Logging ===

  /**
   * @default 'info'
   */
  logLevel?: EngineLogLevel;

  /**
   * Verbose output (equivalent to logLevel='debug' with pretty lines)
   * @default false
   */
  verbose?: boolean;

  /**
   * Log stage `debug` maps and resolved requests
   * @default false
   */
  debug?: boolean;
}

export type ResolvedEngineConfig = Required<Omit<EngineConfig, 'pluginFactories'>> &
  Pick<EngineConfig, 'pluginFactories'>;

export const DEFAULT_PLUGINS: readonly string[] = ['workflow', 'http'];

const LOG_LEVELS: readonly EngineLogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const RUN_IF_POLICIES: readonly RunIfErrorPolicy[] = ['skip', 'fail'];
const BACKOFF_TYPES: readonly BackoffType[] = ['fixed', 'exponential'];

/**
 * Apply default values to engine configuration
 */
export function applyConfigDefaults(config: EngineConfig = {}): ResolvedEngineConfig {
  const verbose = config.verbose ?? false;
  return {
    plugins: config.plugins ?? [...DEFAULT_PLUGINS],
    pluginFactories: config.pluginFactories,
    environment: config.environment ?? 'local',
    mocked: config.mocked ?? false,
    varsOverrideActive: config.varsOverrideActive ?? false,
    runIfErrorPolicy: config.runIfErrorPolicy ?? 'skip',
    maxStageTransitions: config.maxStageTransitions ?? 1000,
    requestTimeoutMs: config.requestTimeoutMs ?? 30000,
    retryBackoff: config.retryBackoff ?? 'fixed',
    writeOutputFiles: config.writeOutputFiles ?? true,
    logLevel: verbose ? 'debug' : (config.logLevel ?? 'info'),
    verbose,
    debug: config.debug ?? false,
  };
}

/**
 * Validate engine configuration
 *
 * @throws {ConfigurationError} On the first invalid option
 */
export function validateConfig(config: EngineConfig): void {
  if (config.maxStageTransitions !== undefined && !(Number.isInteger(config.maxStageTransitions) && config.maxStageTransitions >= 1)) {
    throw ConfigurationError.invalidOption('maxStageTransitions', 'must be a positive integer');
  }

  if (config.requestTimeoutMs !== undefined && !(config.requestTimeoutMs > 0)) {
    throw ConfigurationError.invalidOption('requestTimeoutMs', 'must be positive');
  }

  if (config.logLevel !== undefined && !LOG_LEVELS.includes(config.logLevel)) {
    throw ConfigurationError.invalidOption('logLevel', `'${config.logLevel}' is not one of ${LOG_LEVELS.join(', ')}`);
  }

  if (config.runIfErrorPolicy !== undefined && !RUN_IF_POLICIES.includes(config.runIfErrorPolicy)) {
    throw ConfigurationError.invalidOption('runIfErrorPolicy', `'${config.runIfErrorPolicy}' must be 'skip' or 'fail'`);
  }

  if (config.retryBackoff !== undefined && !BACKOFF_TYPES.includes(config.retryBackoff)) {
    throw ConfigurationError.invalidOption('retryBackoff', `'${config.retryBackoff}' must be 'fixed' or 'exponential'`);
  }

  if (config.environment !== undefined && !config.environment.trim()) {
    throw ConfigurationError.invalidOption('environment', 'must not be empty');
  }
}
