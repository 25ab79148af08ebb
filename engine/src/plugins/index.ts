/**
 * Stage plugins
 *
 * @module plugins
 */

export * from './StagePlugin.js';
export * from './StagePluginRegistry.js';
export * from './StagePluginRegistryBuilder.js';
export * from './builtins/index.js';
