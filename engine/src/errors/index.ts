/**
 * Engine Error Infrastructure
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './StageflowError.js';
export * from './ConfigurationError.js';
export * from './TemplateResolutionError.js';
export * from './StageError.js';
