/**
 * Stage list checks: names, delays, kinds, resilience definitions, jump
 * targets, then each plugin's own `validate`
 *
 * @module validation
 */

import { END_STAGE_TARGETS } from '../types/definitions.js';
import type { StageValidationContext } from '../plugins/StagePlugin.js';
import type { ValidationStep, WorkflowValidationContext } from './ValidationStep.js';
import type { WorkflowDefinition, WorkflowStageDefinition } from '../types/definitions.js';

export const MAX_DELAY_SECONDS = 60;

export class StageValidationStep implements ValidationStep {
  readonly name = 'stages';

  async validate(context: WorkflowValidationContext, errors: string[]): Promise<void> {
    const definition = context.document.definition;
    validateResilience(definition, errors);

    const stageNames = new Set<string>();
    const pluginContext: StageValidationContext = {
      document: context.document,
      documentLoader: context.documentLoader,
      mockPayloadService: context.mockPayloadService,
      apiReferences: context.apiReferences,
      workflowReferences: context.workflowReferences,
    };

    for (const stage of definition.stages) {
      const key = stage.name.toLowerCase();
      if (stageNames.has(key)) {
        errors.push(`Duplicate stage name '${stage.name}'.`);
      }
      stageNames.add(key);

      if (stage.delaySeconds !== undefined && (stage.delaySeconds < 0 || stage.delaySeconds > MAX_DELAY_SECONDS)) {
        errors.push(`Stage '${stage.name}' delaySeconds must be between 0 and ${MAX_DELAY_SECONDS}.`);
      }

      const plugin = context.registry.find(stage.kind);
      if (!plugin) {
        errors.push(`Stage '${stage.name}' kind '${stage.kind}' is not handled by any plugin.`);
        continue;
      }

      if (stage.jumpOnStatus && Object.keys(stage.jumpOnStatus).length > 0 && !plugin.capabilities.supportsJumpOnStatus) {
        errors.push(`Stage '${stage.name}' jumpOnStatus is not supported for kind '${stage.kind}'.`);
      }

      errors.push(...(await plugin.validate(stage, pluginContext)));
    }

    for (const stage of definition.stages) {
      errors.push(...validateJumpTargets(stage, stageNames));
    }
  }
}

function validateJumpTargets(stage: WorkflowStageDefinition, stageNames: ReadonlySet<string>): string[] {
  const errors: string[] = [];
  for (const target of Object.values(stage.jumpOnStatus ?? {})) {
    const normalized = target.trim().toLowerCase();
    if (!normalized) {
      errors.push(`Stage '${stage.name}' has an empty jump target.`);
      continue;
    }
    if (!END_STAGE_TARGETS.some((end) => end === normalized) && !stageNames.has(normalized)) {
      errors.push(`Stage '${stage.name}' jump target '${target}' does not exist.`);
    }
  }
  return errors;
}

function validateResilience(definition: WorkflowDefinition, errors: string[]): void {
  for (const [name, policy] of Object.entries(definition.resilience?.retries ?? {})) {
    if (policy.maxRetries === undefined || policy.maxRetries <= 0) {
      errors.push(`Retry policy '${name}' maxRetries must be a positive integer.`);
    }
    if (policy.delayMs === undefined || policy.delayMs <= 0) {
      errors.push(`Retry policy '${name}' delayMs must be a positive integer.`);
    }
  }

  for (const [name, policy] of Object.entries(definition.resilience?.circuitBreakers ?? {})) {
    if (policy.failureThreshold === undefined || policy.failureThreshold <= 0) {
      errors.push(`Circuit breaker '${name}' failureThreshold must be a positive integer.`);
    }
    if (policy.breakMs === undefined || policy.breakMs <= 0) {
      errors.push(`Circuit breaker '${name}' breakMs must be a positive integer.`);
    }
    if (policy.closeOnSuccessAttempts !== undefined && policy.closeOnSuccessAttempts <= 0) {
      errors.push(`Circuit breaker '${name}' closeOnSuccessAttempts must be a positive integer.`);
    }
  }
}
