/**
 * Context Module
 *
 * Per-run state and template resolution.
 *
 * @module context
 */

export * from './ExecutionContext.js';
export * from './TemplateResolver.js';
