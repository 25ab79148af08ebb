/**
 * Built-in stage plugins
 *
 * @module plugins/builtins
 */

import { EndpointStagePlugin } from './EndpointStagePlugin.js';
import { WorkflowStagePlugin } from './WorkflowStagePlugin.js';
import type { StagePluginFactory } from '../StagePlugin.js';

export { EndpointStagePlugin, WorkflowStagePlugin };

export const BUILT_IN_PLUGINS: Readonly<Record<string, StagePluginFactory>> = {
  workflow: () => new WorkflowStagePlugin(),
  http: () => new EndpointStagePlugin(),
};

/** Registered whatever the configured plugin list says */
export const REQUIRED_PLUGIN_IDS: readonly string[] = ['workflow'];
