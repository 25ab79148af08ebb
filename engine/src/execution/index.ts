/**
 * Execution Layer
 *
 * - WorkflowExecutor: stage loop for one workflow invocation
 * - EndpointStageExecutor: breaker, retry and capture for HTTP stages
 * - RunIfEvaluator: conditional stage grammar
 * - DynamicValueGenerator: initStage variable values
 * - WorkflowOutputWriter: end-stage output files
 */

export * from './WorkflowExecutor.js';
export * from './EndpointStageExecutor.js';
export * from './RunIfEvaluator.js';
export * from './DynamicValueGenerator.js';
export * from './WorkflowOutputWriter.js';
export * from './StageBindings.js';
export * from './StageMessageEmitter.js';
