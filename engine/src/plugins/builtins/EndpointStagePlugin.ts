/**
 * HTTP stage plugin (`Endpoint`, `Http`)
 *
 * @module plugins/builtins
 */

import { EndpointStageExecutor } from '../../execution/EndpointStageExecutor.js';
import { MockPayloadService } from '../../services/MockPayloadService.js';
import type {
  StageExecutionContext,
  StageOutcome,
  StagePlugin,
  StagePluginCapabilities,
  StageValidationContext,
} from '../StagePlugin.js';
import type { WorkflowDefinition, WorkflowStageDefinition } from '../../types/definitions.js';

export class EndpointStagePlugin implements StagePlugin {
  readonly id = 'http';
  readonly stageKinds = ['Endpoint', 'Http'] as const;
  readonly capabilities: StagePluginCapabilities = {
    outputKind: 'endpoint',
    mockKind: 'endpoint',
    allowsResponseTokens: true,
    supportsJumpOnStatus: true,
    continueOnError: false,
  };

  private readonly executor = new EndpointStageExecutor();

  execute(stage: WorkflowStageDefinition, ctx: StageExecutionContext): Promise<StageOutcome> {
    return this.executor.execute(stage, ctx);
  }

  validate(stage: WorkflowStageDefinition, ctx: StageValidationContext): string[] {
    const errors: string[] = [];
    const name = stage.name;

    if (!stage.apiRef?.trim()) {
      errors.push(`Stage '${name}' apiRef is required for http stages.`);
    } else if (!ctx.apiReferences.has(stage.apiRef.toLowerCase())) {
      errors.push(`Stage '${name}' apiRef '${stage.apiRef}' is not declared in references.apis.`);
    }
    if (!stage.endpoint?.trim()) {
      errors.push(`Stage '${name}' endpoint is required for http stages.`);
    }
    if (!stage.httpVerb?.trim()) {
      errors.push(`Stage '${name}' httpVerb is required for http stages.`);
    }
    if (stage.expectedStatus === undefined || stage.expectedStatus <= 0) {
      errors.push(`Stage '${name}' expectedStatus must be a positive integer.`);
    }
    for (const status of Object.keys(stage.jumpOnStatus ?? {})) {
      if (Number(status) <= 0) {
        errors.push(`Stage '${name}' jump status must be a positive integer.`);
      }
    }
    if (stage.circuitBreaker && !stage.retry) {
      errors.push(`Stage '${name}' circuitBreaker requires retry.`);
    }

    errors.push(...validateRetry(stage, ctx.document.definition));
    errors.push(...validateCircuitBreaker(stage, ctx.document.definition));
    errors.push(...validateMock(stage, ctx));
    return errors;
  }
}

function validateRetry(stage: WorkflowStageDefinition, definition: WorkflowDefinition): string[] {
  const retry = stage.retry;
  if (!retry) {
    return [];
  }
  const errors: string[] = [];
  const name = stage.name;

  if (!retry.httpStatus || retry.httpStatus.length === 0) {
    errors.push(`Stage '${name}' retry httpStatus is required.`);
  } else if (retry.httpStatus.some((status) => status <= 0)) {
    errors.push(`Stage '${name}' retry httpStatus must contain positive integers.`);
  }

  const named = retry.ref ? definition.resilience?.retries?.[retry.ref] : undefined;
  if (retry.ref && !named) {
    errors.push(`Stage '${name}' retry ref '${retry.ref}' was not found in resilience.retries.`);
  }

  const maxRetries = retry.maxRetries ?? named?.maxRetries;
  const delayMs = retry.delayMs ?? named?.delayMs;
  if (maxRetries === undefined || maxRetries <= 0) {
    errors.push(`Stage '${name}' retry maxRetries must be a positive integer.`);
  }
  if (delayMs === undefined || delayMs <= 0) {
    errors.push(`Stage '${name}' retry delayMs must be a positive integer.`);
  }
  return errors;
}

function validateCircuitBreaker(stage: WorkflowStageDefinition, definition: WorkflowDefinition): string[] {
  const breaker = stage.circuitBreaker;
  if (!breaker) {
    return [];
  }
  const errors: string[] = [];
  const name = stage.name;

  const named = breaker.ref ? definition.resilience?.circuitBreakers?.[breaker.ref] : undefined;
  if (breaker.ref && !named) {
    errors.push(`Stage '${name}' circuitBreaker ref '${breaker.ref}' was not found in resilience.circuitBreakers.`);
  }

  const failureThreshold = breaker.failureThreshold ?? named?.failureThreshold;
  const breakMs = breaker.breakMs ?? named?.breakMs;
  const closeOnSuccessAttempts = breaker.closeOnSuccessAttempts ?? named?.closeOnSuccessAttempts;
  if (failureThreshold === undefined || failureThreshold <= 0) {
    errors.push(`Stage '${name}' circuitBreaker failureThreshold must be a positive integer.`);
  }
  if (breakMs === undefined || breakMs <= 0) {
    errors.push(`Stage '${name}' circuitBreaker breakMs must be a positive integer.`);
  }
  if (closeOnSuccessAttempts !== undefined && closeOnSuccessAttempts <= 0) {
    errors.push(`Stage '${name}' circuitBreaker closeOnSuccessAttempts must be a positive integer.`);
  }
  return errors;
}

function validateMock(stage: WorkflowStageDefinition, ctx: StageValidationContext): string[] {
  const mock = stage.mock;
  if (!mock) {
    return [];
  }
  const name = stage.name;

  if (mock.output) {
    return [`Stage '${name}' mock output is only supported for workflow stages.`];
  }
  if (mock.status !== undefined && mock.status <= 0) {
    return [`Stage '${name}' mock status must be a positive integer.`];
  }

  let payload: string;
  try {
    payload = ctx.mockPayloadService.resolvePayload(mock, ctx.document.filePath, name);
  } catch (error) {
    return [error instanceof Error ? error.message : String(error)];
  }

  const jsonError = MockPayloadService.jsonError(MockPayloadService.sanitizeForValidation(payload));
  return jsonError === undefined ? [] : [`Stage '${name}' mock payload is not valid JSON: ${jsonError}`];
}
