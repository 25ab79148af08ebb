import type { z } from 'zod';
import type {
  ApiCatalogVersionSchema,
  ApiDefinitionSchema,
  CircuitBreakerPolicySchema,
  DynamicValueTypeSchema,
  RetryPolicySchema,
  StageCircuitBreakerSchema,
  StageMockSchema,
  StageRetrySchema,
  WorkflowDefinitionSchema,
  WorkflowEndStageSchema,
  WorkflowInputSchema,
  WorkflowReferencesSchema,
  WorkflowStageSchema,
  WorkflowVariableSchema,
} from '../parser/WorkflowSchema.js';

export type DynamicValueType = z.infer<typeof DynamicValueTypeSchema>;
export type WorkflowVariableDefinition = z.infer<typeof WorkflowVariableSchema>;
export type WorkflowInputDefinition = z.infer<typeof WorkflowInputSchema>;
export type RetryPolicyDefinition = z.infer<typeof RetryPolicySchema>;
export type CircuitBreakerPolicyDefinition = z.infer<typeof CircuitBreakerPolicySchema>;
export type StageRetryDefinition = z.infer<typeof StageRetrySchema>;
export type StageCircuitBreakerDefinition = z.infer<typeof StageCircuitBreakerSchema>;
export type StageMockDefinition = z.infer<typeof StageMockSchema>;
export type WorkflowStageDefinition = z.infer<typeof WorkflowStageSchema>;
export type WorkflowReferences = z.infer<typeof WorkflowReferencesSchema>;
export type WorkflowEndStage = z.infer<typeof WorkflowEndStageSchema>;
export type WorkflowDefinition = z.infer<typeof WorkflowDefinitionSchema>;
export type ApiDefinition = z.infer<typeof ApiDefinitionSchema>;
export type ApiCatalogVersion = z.infer<typeof ApiCatalogVersionSchema>;

/**
 * A parsed workflow together with where it came from
 */
export interface WorkflowDocument {
  definition: WorkflowDefinition;

  /** Absolute path of the workflow file */
  filePath: string;

  /** Environment file values merged with parent overrides */
  environmentVariables: Record<string, string>;
}

/** Jump target that ends the stage loop */
export const END_STAGE_TARGETS = ['endstage', 'end'] as const;

export function isEndStageTarget(target: string): boolean {
  const normalized = target.trim().toLowerCase();
  return END_STAGE_TARGETS.some((t) => t === normalized);
}
