/**
 * Workflow Document Schema
 *
 * Zod schemas for workflow documents and API catalog files. Structural
 * checks only; cross-field rules (references, positive policy values,
 * template scopes) live in the validation steps so that every problem is
 * reported at once.
 *
 * @module parser
 */

import { z } from 'zod';

/** YAML scalars used as template strings: numbers and booleans become text */
const scalarText = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

/** Inline JSON payloads may be written as YAML objects */
const jsonText = z
  .union([z.string(), z.record(z.unknown()), z.array(z.unknown())])
  .transform((value) => (typeof value === 'string' ? value : JSON.stringify(value)));

const templateMap = z.record(z.string(), scalarText);

const int = z.number().int();

export const DYNAMIC_VALUE_TYPES = [
  'Fixed',
  'Number',
  'Text',
  'Guid',
  'Ulid',
  'DateTime',
  'Date',
  'Time',
  'Sequence',
] as const;

export const DynamicValueTypeSchema = z.enum(DYNAMIC_VALUE_TYPES);

export const WorkflowVariableSchema = z
  .object({
    name: z.string().min(1),
    type: DynamicValueTypeSchema,
    value: scalarText.optional(),
    min: int.optional(),
    max: int.optional(),
    padding: int.optional(),
    length: int.optional(),
    fromDateTime: z.string().optional(),
    toDateTime: z.string().optional(),
    fromDate: z.string().optional(),
    toDate: z.string().optional(),
    fromTime: z.string().optional(),
    toTime: z.string().optional(),
    format: z.string().optional(),
    start: int.optional(),
    step: int.optional(),
  })
  .strict();

export const WorkflowInputSchema = z
  .object({
    name: z.string().min(1),
    type: DynamicValueTypeSchema.optional(),
    required: z.boolean().optional(),
    description: z.string().optional(),
  })
  .strict();

export const RetryPolicySchema = z
  .object({
    maxRetries: int.optional(),
    delayMs: int.optional(),
  })
  .strict();

export const CircuitBreakerPolicySchema = z
  .object({
    failureThreshold: int.optional(),
    breakMs: int.optional(),
    closeOnSuccessAttempts: int.optional(),
  })
  .strict();

export const StageRetrySchema = RetryPolicySchema.extend({
  ref: z.string().optional(),
  httpStatus: z.array(int).optional(),
  messages: z
    .object({
      onException: z.string().optional(),
    })
    .strict()
    .optional(),
}).strict();

export const StageCircuitBreakerSchema = CircuitBreakerPolicySchema.extend({
  ref: z.string().optional(),
  messages: z
    .object({
      onOpen: z.string().optional(),
      onBlocked: z.string().optional(),
    })
    .strict()
    .optional(),
}).strict();

export const StageMockSchema = z
  .object({
    status: int.optional(),
    payload: jsonText.optional(),
    payloadFile: z.string().optional(),
    output: templateMap.optional(),
  })
  .strict();

export const WorkflowStageSchema = z
  .object({
    name: z.string().min(1),
    kind: z.string().min(1),
    runIf: z.string().optional(),
    delaySeconds: int.optional(),
    debug: templateMap.optional(),
    message: z.string().optional(),

    // Endpoint kinds
    apiRef: z.string().optional(),
    endpoint: z.string().optional(),
    httpVerb: z.string().optional(),
    expectedStatus: int.optional(),
    headers: templateMap.optional(),
    query: templateMap.optional(),
    body: jsonText.optional(),
    jumpOnStatus: z.record(z.string().regex(/^-?\d+$/, 'jumpOnStatus keys must be status codes'), z.string()).optional(),
    retry: StageRetrySchema.optional(),
    circuitBreaker: StageCircuitBreakerSchema.optional(),

    // Workflow kinds
    workflowRef: z.string().optional(),
    inputs: templateMap.optional(),
    allowVersion: scalarText.optional(),

    mock: StageMockSchema.optional(),
    output: templateMap.optional(),
    set: templateMap.optional(),
    context: templateMap.optional(),
  })
  .strict();

export const WorkflowReferencesSchema = z
  .object({
    apis: z
      .array(z.object({ name: z.string().min(1), definition: z.string().min(1) }).strict())
      .optional(),
    workflows: z
      .array(z.object({ name: z.string().min(1), path: z.string().min(1) }).strict())
      .optional(),
    environmentFile: z.string().optional(),
  })
  .strict();

export const WorkflowEndStageSchema = z
  .object({
    output: templateMap.optional(),
    outputJson: z.boolean().optional(),
    context: templateMap.optional(),
    result: z.object({ message: z.string().optional() }).strict().optional(),
    runOnFailure: z.boolean().optional(),
  })
  .strict();

export const WorkflowDefinitionSchema = z
  .object({
    version: scalarText,
    id: scalarText,
    name: z.string().min(1),
    description: z.string().optional(),
    output: z.boolean().optional(),
    references: WorkflowReferencesSchema.optional(),
    input: z.array(WorkflowInputSchema).optional(),
    initStage: z
      .object({
        variables: z.array(WorkflowVariableSchema).optional(),
        context: templateMap.optional(),
      })
      .strict()
      .optional(),
    resilience: z
      .object({
        retries: z.record(z.string(), RetryPolicySchema).optional(),
        circuitBreakers: z.record(z.string(), CircuitBreakerPolicySchema).optional(),
      })
      .strict()
      .optional(),
    stages: z.array(WorkflowStageSchema).min(1, 'Workflow must contain at least one stage'),
    endStage: WorkflowEndStageSchema.optional(),
  })
  .strict();

// ============================================================================
// API catalog
// ============================================================================

export const ApiDefinitionSchema = z.object({
  name: z.string().min(1),
  swaggerUrl: z.string().optional(),
  baseUrl: z.record(z.string(), z.string()).optional(),
  basePath: z.string().optional(),
});

export const ApiCatalogVersionSchema = z.object({
  version: scalarText,
  baseUrl: z.record(z.string(), z.string()).default({}),
  definitions: z.array(ApiDefinitionSchema).default([]),
});

export const ApiCatalogSchema = z.array(ApiCatalogVersionSchema).min(1, 'Catalog file is empty.');
