/**
 * Template scope checks
 *
 * Every token in every template field must name something the workflow
 * declares: an input, an init variable, an output key of a stage (endpoint
 * outputs plus `http_status`, or the end-stage outputs of a referenced
 * workflow), an environment value, or a known system value. `response.*`
 * is only allowed where the stage's plugin says so.
 *
 * @module validation
 */

import { TemplateResolver } from '../context/TemplateResolver.js';
import { RunIfEvaluator } from '../execution/RunIfEvaluator.js';
import type { StagePlugin } from '../plugins/StagePlugin.js';
import type { ValidationStep, WorkflowValidationContext } from './ValidationStep.js';
import type { WorkflowStageDefinition } from '../types/definitions.js';

export type OutputKeys = Map<string, Set<string>>;

export interface TemplateScopeSummary {
  inputs: ReadonlySet<string>;
  globals: ReadonlySet<string>;
  environment: Readonly<Record<string, string>>;
  processEnv: Readonly<Record<string, string | undefined>>;
  endpointOutputs: OutputKeys;
  workflowOutputs: OutputKeys;
}

const SYSTEM_VALUES = new Set(['datetime', 'date', 'time', 'timestamp', 'uuid', 'guid', 'ulid']);
const SYSTEM_MOMENTS = new Set(['now', 'utcnow']);
const PROJECTION = /^(?:stages?\s*[.:]\s*json\(\s*([^)]*?)\s*\)|json\(\s*stages?\s*[.:]\s*([^)]*?)\s*\))/i;
const LITERAL = /^(?:(["']).*\1|-?\d+(?:\.\d+)?)$/s;

export class TemplateValidationStep implements ValidationStep {
  readonly name = 'templates';

  async validate(context: WorkflowValidationContext, errors: string[]): Promise<void> {
    const definition = context.document.definition;
    const scope: TemplateScopeSummary = {
      inputs: lowerSet((definition.input ?? []).map((input) => input.name)),
      globals: lowerSet((definition.initStage?.variables ?? []).map((variable) => variable.name)),
      environment: context.document.environmentVariables,
      processEnv: context.processEnv,
      endpointOutputs: new Map(),
      workflowOutputs: new Map(),
    };
    await this.collectOutputs(context, scope, errors);

    const check = (template: string | undefined, location: string, allowResponse = false): void => {
      errors.push(...validateTemplate(template, scope, location, allowResponse));
    };
    const checkMap = (map: Readonly<Record<string, string>> | undefined, location: string, allowResponse = false): void => {
      for (const value of Object.values(map ?? {})) {
        check(value, location, allowResponse);
      }
    };

    for (const variable of definition.initStage?.variables ?? []) {
      check(variable.value, 'init-stage variable');
    }
    checkMap(definition.initStage?.context, 'init-stage context');

    for (const stage of definition.stages) {
      const plugin = context.registry.find(stage.kind);
      const allowResponse = plugin?.capabilities.allowsResponseTokens ?? false;
      const where = `stage '${stage.name}'`;

      checkMap(stage.headers, `${where} header`);
      checkMap(stage.query, `${where} query`);
      check(stage.endpoint, `${where} endpoint`);
      check(stage.body, `${where} body`);
      checkMap(stage.inputs, `${where} input`);
      checkMap(stage.debug, `${where} debug`);
      check(stage.message, `${where} message`, allowResponse);
      checkMap(stage.output, `${where} output`, allowResponse);
      checkMap(stage.set, `${where} set`, allowResponse);
      checkMap(stage.context, `${where} context`, allowResponse);
      check(stage.retry?.messages?.onException, `${where} retry message`);
      check(stage.circuitBreaker?.messages?.onOpen, `${where} circuit breaker message`);
      check(stage.circuitBreaker?.messages?.onBlocked, `${where} circuit breaker message`);

      if (stage.runIf?.trim()) {
        const condition = RunIfEvaluator.parse(stage.runIf);
        if (!condition) {
          errors.push(`Invalid runIf expression '${stage.runIf}' in ${where} runIf.`);
        } else {
          check(`{{${condition.token}}}`, `${where} runIf`);
        }
      }

      if (stage.mock) {
        errors.push(...this.validateMock(stage, plugin, context, scope));
      }
    }

    checkMap(definition.endStage?.output, 'end-stage output');
    checkMap(definition.endStage?.context, 'end-stage context');
    check(definition.endStage?.result?.message, 'end-stage result message');
  }

  private async collectOutputs(context: WorkflowValidationContext, scope: TemplateScopeSummary, errors: string[]): Promise<void> {
    for (const stage of context.document.definition.stages) {
      const plugin = context.registry.find(stage.kind);
      const key = stage.name.toLowerCase();

      if (plugin?.capabilities.outputKind === 'endpoint') {
        scope.endpointOutputs.set(key, lowerSet(['http_status', ...Object.keys(stage.output ?? {})]));
        continue;
      }

      const workflowRef = stage.workflowRef?.trim();
      const referencePath = workflowRef ? context.workflowReferences.get(workflowRef.toLowerCase()) : undefined;
      if (plugin?.capabilities.outputKind !== 'workflow' || referencePath === undefined) {
        continue;
      }
      try {
        const nested = await context.documentLoader.load(referencePath, context.document.environmentVariables);
        scope.workflowOutputs.set(key, lowerSet(Object.keys(nested.definition.endStage?.output ?? {})));
      } catch (error) {
        errors.push(`Failed to inspect workflow '${workflowRef}': ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  /**
   * Payload shape and JSON checks belong to the plugin; only the tokens are
   * checked here
   */
  private validateMock(
    stage: WorkflowStageDefinition,
    plugin: StagePlugin | undefined,
    context: WorkflowValidationContext,
    scope: TemplateScopeSummary,
  ): string[] {
    const where = `stage '${stage.name}'`;
    if (!plugin) {
      return [`Stage '${stage.name}' mock is defined but no plugin was loaded for kind '${stage.kind}'.`];
    }

    switch (plugin.capabilities.mockKind) {
      case 'none':
        return [`Stage '${stage.name}' mock is not supported for kind '${stage.kind}'.`];
      case 'workflow':
        return Object.values(stage.mock?.output ?? {}).flatMap((value) => validateTemplate(value, scope, `${where} mock output`, false));
      case 'endpoint': {
        const payload = readPayload(stage, context);
        return payload === undefined ? [] : validateTemplate(payload, scope, `${where} mock payload`, false);
      }
    }
  }
}

function readPayload(stage: WorkflowStageDefinition, context: WorkflowValidationContext): string | undefined {
  if (!stage.mock) {
    return undefined;
  }
  try {
    return context.mockPayloadService.resolvePayload(stage.mock, context.document.filePath, stage.name);
  } catch {
    // The plugin's validate already reported why the payload is unavailable
    return undefined;
  }
}

/**
 * @returns One message per unknown or malformed token
 */
export function validateTemplate(
  template: string | undefined,
  scope: TemplateScopeSummary,
  location: string,
  allowResponse: boolean,
): string[] {
  if (template === undefined || !template.trim()) {
    return [];
  }

  const errors: string[] = [];
  for (const token of TemplateResolver.extractTokens(template)) {
    for (const alternative of token.split('||').map((part) => part.trim())) {
      if (LITERAL.test(alternative)) {
        continue;
      }
      const error = validateToken(alternative, scope, allowResponse);
      if (error) {
        errors.push(`${error} in ${location}.`);
      }
    }
  }
  return errors;
}

function validateToken(token: string, scope: TemplateScopeSummary, allowResponse: boolean): string | undefined {
  const projection = PROJECTION.exec(token);
  if (projection) {
    const inner = TemplateResolver.splitToken(projection[1] ?? projection[2] ?? '');
    const [stageName = '', section, key] = inner;
    if (section !== 'output' || key === undefined) {
      return `Invalid stage json token '${token}'. Expected 'stage:json(<stage>.output.<key>)'`;
    }
    return hasOutput(scope.endpointOutputs, stageName, key) || hasOutput(scope.workflowOutputs, stageName, key)
      ? undefined
      : `Stage outputs were not found for '${token}'`;
  }

  const segments = TemplateResolver.splitToken(token);
  const [rawRoot, first, ...rest] = segments;
  if (rawRoot === undefined) {
    return 'Invalid token';
  }

  switch (rawRoot.toLowerCase()) {
    case 'input':
      return first !== undefined && scope.inputs.has(first.toLowerCase()) ? undefined : `Unknown input '${token}'`;
    case 'global':
      return first !== undefined && scope.globals.has(first.toLowerCase()) ? undefined : `Unknown global '${token}'`;
    case 'context':
      return first === undefined ? `Invalid context token '${token}'` : undefined;
    case 'env':
      if (first === undefined) {
        return `Invalid env token '${token}'`;
      }
      return Object.hasOwn(scope.environment, first) || scope.processEnv[first] !== undefined
        ? undefined
        : `Environment variable '${first}' was not defined for token '${token}'`;
    case 'response':
      return allowResponse ? undefined : `Response token '${token}' is not allowed`;
    case 'system': {
      const moment = rest[0] ?? 'now';
      return first !== undefined && SYSTEM_VALUES.has(first.toLowerCase()) && SYSTEM_MOMENTS.has(moment.toLowerCase())
        ? undefined
        : `Invalid token '${token}'`;
    }
    case 'endpoint':
      return validateStageOutput(token, 'endpoint', first, rest, scope.endpointOutputs);
    case 'workflow':
      return validateStageOutput(token, 'workflow', first, rest, scope.workflowOutputs);
    case 'stage':
    case 'stages':
      return validateStageToken(token, first, rest, scope);
    default:
      return `Unknown token '${token}'`;
  }
}

function validateStageToken(token: string, stageName: string | undefined, rest: string[], scope: TemplateScopeSummary): string | undefined {
  const [section, kind, key] = rest;
  if (stageName !== undefined && section === 'workflow') {
    if (!scope.workflowOutputs.has(stageName.toLowerCase())) {
      return `stage '${stageName}' outputs were not found`;
    }
    if (kind === 'result') {
      return key === 'status' || key === 'message' ? undefined : `stage '${stageName}' workflow result '${key ?? ''}' was not found`;
    }
    if (kind === 'output' && key !== undefined) {
      return hasOutput(scope.workflowOutputs, stageName, key) ? undefined : `stage '${stageName}' output '${key}' was not found`;
    }
    return `Invalid stage token '${token}'. Expected 'stage:<name>.workflow.output.<key>'.`;
  }

  const endpointError = validateStageOutput(token, 'stage', stageName, rest, scope.endpointOutputs);
  if (endpointError === undefined) {
    return undefined;
  }
  return validateStageOutput(token, 'stage', stageName, rest, scope.workflowOutputs) === undefined ? undefined : endpointError;
}

function validateStageOutput(
  token: string,
  kind: string,
  stageName: string | undefined,
  rest: string[],
  outputs: OutputKeys,
): string | undefined {
  const [section, key] = rest;
  if (stageName === undefined || section !== 'output' || key === undefined) {
    return `Invalid ${kind} token '${token}'. Expected '${kind}:<name>.output.<key>'`;
  }
  const keys = outputs.get(stageName.toLowerCase());
  if (!keys) {
    return `${kind} '${stageName}' outputs were not found`;
  }
  return keys.has(key.toLowerCase()) ? undefined : `${kind} '${stageName}' output '${key}' was not found`;
}

function hasOutput(outputs: OutputKeys, stageName: string, key: string): boolean {
  return outputs.get(stageName.toLowerCase())?.has(key.toLowerCase()) ?? false;
}

function lowerSet(values: readonly string[]): Set<string> {
  return new Set(values.map((value) => value.toLowerCase()));
}
