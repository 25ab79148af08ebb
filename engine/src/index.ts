/**
 * Stageflow Engine - Declarative API Workflows
 *
 * @example
 * ```ts
 * import { WorkflowEngine } from '@stageflow/engine';
 *
 * const engine = new WorkflowEngine({ environment: 'staging' });
 * const result = await engine.run('./create-account.workflow');
 * ```
 */

// ============================================================================
// PRIMARY EXPORT - Start here!
// ============================================================================

export { WorkflowEngine, type EngineDependencies } from './core/WorkflowEngine.js';

// ============================================================================
// TYPES - Essential types for working with the engine
// ============================================================================

export type {
  WorkflowRunOptions,
  WorkflowLoadOptions,
  WorkflowRunResult,
  StageRunRecord,
  StageRunStatus,
} from './types/core-types.js';

export {
  DEFAULT_PLUGINS,
  applyConfigDefaults,
  validateConfig,
  type EngineConfig,
  type EngineLogLevel,
  type ResolvedEngineConfig,
  type RunIfErrorPolicy,
} from './core/EngineConfig.js';

export * from './types/definitions.js';

// ============================================================================
// ADVANCED - For tooling and plugin authors
// ============================================================================

// Stage plugins
export * from './plugins/index.js';

// Events
export * from './events/index.js';

// Execution internals
export * from './execution/index.js';

// Loading and parsing
export * from './loader/index.js';
export { WorkflowParser, type DocumentFormat } from './parser/WorkflowParser.js';
export { SchemaValidator, formatPath } from './parser/SchemaValidator.js';

// Static checks and dry-run plans
export * from './validation/index.js';
export * from './planning/index.js';

// Context utilities
export * from './context/index.js';

// Resilience policies
export * from './automation/index.js';

// HTTP transport and API catalogs
export * from './http/index.js';
export * from './services/index.js';

// Logging
export { EngineLogger, createEngineLogger } from './logging/EngineLogger.js';
export { LoggerManager } from './logging/LoggerManager.js';
export { ExecutionLogFormatter, type StageTransition } from './logging/ExecutionLogFormatter.js';
export * from './types/log-types.js';

// Clock
export { systemClock, ManualClock, type SystemClock } from './utils/SystemClock.js';

// Errors
export * from './errors/index.js';

// Testing
export * from './testing/index.js';
