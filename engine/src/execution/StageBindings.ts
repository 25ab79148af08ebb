/**
 * `set` and `context` bindings shared by every stage kind
 *
 * @module execution
 */

import type { ExecutionContext } from '../context/ExecutionContext.js';
import type { TemplateResolver, TemplateResponse } from '../context/TemplateResolver.js';
import type { WorkflowStageDefinition } from '../types/definitions.js';

/**
 * `set` writes globals, then `context` writes the context map; `context`
 * templates see the globals `set` just wrote
 */
export function applyStageBindings(
  stage: Pick<WorkflowStageDefinition, 'set' | 'context'>,
  execution: ExecutionContext,
  resolver: TemplateResolver,
  response?: TemplateResponse,
): void {
  for (const [key, value] of Object.entries(resolver.resolveMap(stage.set, execution, response))) {
    execution.globals.set(key, value);
  }
  for (const [key, value] of Object.entries(resolver.resolveMap(stage.context, execution, response))) {
    execution.context.set(key, value);
  }
}
