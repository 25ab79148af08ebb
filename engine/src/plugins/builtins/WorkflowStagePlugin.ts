/**
 * Nested workflow stage plugin (`Workflow`)
 *
 * Loads the referenced child beside its parent, runs it on a fresh
 * execution context one level deeper, and copies back only its end-stage
 * outputs and result. A failing child is recorded on the stage, never
 * thrown; cancellation and configuration errors always propagate.
 *
 * @module plugins/builtins
 */

import { existsSync } from 'fs';
import { ConfigurationError, StageflowError, StageflowErrorCode, WorkflowCancelledError } from '../../errors/index.js';
import { ExecutionLogFormatter } from '../../logging/ExecutionLogFormatter.js';
import { LoggerManager } from '../../logging/LoggerManager.js';
import { LogCategory } from '../../types/log-types.js';
import { VarsFileLoader, type VarsFileResolution, type VarsFileSource } from '../../loader/VarsFileLoader.js';
import { WorkflowLoader } from '../../loader/WorkflowLoader.js';
import { applyStageBindings } from '../../execution/StageBindings.js';
import type {
  StageExecutionContext,
  StageOutcome,
  StagePlugin,
  StagePluginCapabilities,
  StageValidationContext,
} from '../StagePlugin.js';
import type { WorkflowDefinition, WorkflowDocument, WorkflowStageDefinition } from '../../types/definitions.js';

export class WorkflowStagePlugin implements StagePlugin {
  readonly id = 'workflow';
  readonly stageKinds = ['Workflow'] as const;
  readonly capabilities: StagePluginCapabilities = {
    outputKind: 'workflow',
    mockKind: 'workflow',
    allowsResponseTokens: false,
    supportsJumpOnStatus: false,
    continueOnError: true,
  };

  async execute(stage: WorkflowStageDefinition, ctx: StageExecutionContext): Promise<StageOutcome> {
    const { execution, services } = ctx;
    const target = { workflowName: ctx.document.definition.name, stageName: stage.name, execution };

    try {
      if (ctx.options.mocked && stage.mock) {
        this.applyMock(stage, ctx);
      } else {
        await this.runChild(stage, ctx);
      }
    } catch (error) {
      if (error instanceof WorkflowCancelledError || error instanceof ConfigurationError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      LoggerManager.getLogger().error(
        ExecutionLogFormatter.transition(execution.indentLevel, target.workflowName, stage.name, 'fail', message),
        error instanceof Error ? error : undefined,
        undefined,
        LogCategory.RUNTIME,
      );
      execution.workflowResults.set(stage.name, { status: 'Error', message });
    }

    applyStageBindings(stage, execution, services.templateResolver);
    await services.messages.emit(stage.message, target);

    const result = execution.workflowResults.get(stage.name);
    return result?.status === 'Error' ? { failed: true, message: result.message } : {};
  }

  validate(stage: WorkflowStageDefinition, ctx: StageValidationContext): Promise<string[]> | string[] {
    const errors: string[] = [];
    const name = stage.name;

    if (stage.retry) {
      errors.push(`Stage '${name}' retry is only supported for endpoint stages.`);
    }
    if (stage.circuitBreaker) {
      errors.push(`Stage '${name}' circuitBreaker is only supported for endpoint stages.`);
    }
    if (stage.mock && (stage.mock.payload !== undefined || stage.mock.payloadFile !== undefined || stage.mock.status !== undefined)) {
      errors.push(`Stage '${name}' mock only supports output for workflow stages.`);
    }
    if (stage.mock && (!stage.mock.output || Object.keys(stage.mock.output).length === 0)) {
      errors.push(`Stage '${name}' mock output is required for workflow stages.`);
    }

    const workflowRef = stage.workflowRef?.trim();
    if (!workflowRef) {
      errors.push(`Stage '${name}' workflowRef is required for workflow stages.`);
      return errors;
    }

    const referencePath = ctx.workflowReferences.get(workflowRef.toLowerCase());
    if (referencePath === undefined) {
      errors.push(`Stage '${name}' workflowRef '${workflowRef}' is not declared in references.`);
      return errors;
    }
    return this.validateReferenced(stage, workflowRef, referencePath, ctx, errors);
  }

  private async validateReferenced(
    stage: WorkflowStageDefinition,
    workflowRef: string,
    referencePath: string,
    ctx: StageValidationContext,
    errors: string[],
  ): Promise<string[]> {
    let child: WorkflowDocument;
    try {
      child = await ctx.documentLoader.load(referencePath, ctx.document.environmentVariables);
    } catch (error) {
      if (error instanceof StageflowError && error.code === StageflowErrorCode.RUNTIME_FILE_NOT_FOUND) {
        errors.push(`Referenced workflow '${workflowRef}' was not found at '${referencePath}'.`);
        return errors;
      }
      errors.push(`Referenced workflow '${workflowRef}' failed to load: ${error instanceof Error ? error.message : String(error)}`);
      return errors;
    }

    errors.push(...validateInputs(stage, child.definition));
    const versionError = validateVersion(stage, ctx.document.definition.version, child.definition.version);
    if (versionError) {
      errors.push(versionError);
    }
    return errors;
  }

  private applyMock(stage: WorkflowStageDefinition, ctx: StageExecutionContext): void {
    const output = stage.mock?.output;
    if (!output || Object.keys(output).length === 0) {
      throw ConfigurationError.invalidMock(stage.name, 'mock output is required for workflow stages.');
    }

    const { execution, services } = ctx;
    execution.workflowOutputs.set(stage.name, services.templateResolver.resolveMap(output, execution));
    execution.workflowResults.set(stage.name, { status: 'Ok', message: '' });
  }

  private async runChild(stage: WorkflowStageDefinition, ctx: StageExecutionContext): Promise<void> {
    const { document, execution, services, options } = ctx;
    const logger = LoggerManager.getLogger();
    const parentName = document.definition.name;

    const workflowRef = stage.workflowRef?.trim();
    if (!workflowRef) {
      throw ConfigurationError.unresolvedReference('Workflow stage field', 'workflowRef', `stages.${stage.name}`);
    }
    const reference = document.definition.references?.workflows?.find(
      (item) => item.name.toLowerCase() === workflowRef.toLowerCase(),
    );
    if (!reference) {
      throw ConfigurationError.unresolvedReference('Workflow reference', workflowRef, 'references.workflows');
    }

    const childPath = WorkflowLoader.resolveReferencePath(document.filePath, reference.path);
    const child = await services.documentLoader.load(childPath, execution.environment);
    const childName = child.definition.name;

    if (options.verbose) {
      logger.info(
        ExecutionLogFormatter.stageLine(execution.indentLevel, parentName, stage.name, `resolved workflow '${childName}' at '${child.filePath}'.`),
        undefined,
        LogCategory.RUNTIME,
      );
    }
    logger.info(
      `${ExecutionLogFormatter.indent(execution.indentLevel)}Calling nested workflow ${ExecutionLogFormatter.workflowTag(childName)} from stage ${ExecutionLogFormatter.stageTag(parentName, stage.name)}.`,
      undefined,
      LogCategory.RUNTIME,
    );

    const inputs = await this.resolveInputs(stage, child, ctx);
    const childExecution = execution.createChild(inputs, child.environmentVariables);
    const result = await ctx.executeNested(child, childExecution);

    execution.workflowOutputs.set(stage.name, { ...(childExecution.workflowOutputs.get(childName) ?? {}) });
    execution.workflowResults.set(stage.name, { status: result.status, message: result.message });
  }

  /**
   * Stage inputs win; without them the child's `.wfvars` sidecar supplies
   * the inputs unless the root run already overrides vars
   */
  private async resolveInputs(
    stage: WorkflowStageDefinition,
    child: WorkflowDocument,
    ctx: StageExecutionContext,
  ): Promise<Record<string, string>> {
    const { execution, services, options } = ctx;
    const logger = LoggerManager.getLogger();
    const childIndent = ExecutionLogFormatter.indent(execution.indentLevel + 1);

    const hasStageInputs = stage.inputs !== undefined && Object.keys(stage.inputs).length > 0;
    const inputs = services.templateResolver.resolveMap(stage.inputs, execution);

    const varsPath = VarsFileLoader.sidecarPath(child.filePath);
    if (!existsSync(varsPath)) {
      return inputs;
    }
    if (options.varsOverrideActive) {
      logger.info(`${childIndent}Vars file: overridden by the root workflow`, undefined, LogCategory.RUNTIME);
      return inputs;
    }
    if (hasStageInputs) {
      return inputs;
    }

    let resolution: VarsFileResolution;
    try {
      resolution = await services.varsFileLoader.load(varsPath, options.environment, child.definition.version);
    } catch (error) {
      throw ConfigurationError.invalidFile(
        varsPath,
        `Failed to load vars file for workflow '${child.definition.name}': ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    logger.info(`${childIndent}Vars file: ${varsPath} (auto)`, undefined, LogCategory.RUNTIME);
    if (options.verbose) {
      logVarsSources(resolution, execution.indentLevel + 2);
    }
    return { ...resolution.values };
  }
}

function validateInputs(stage: WorkflowStageDefinition, child: WorkflowDefinition): string[] {
  const errors: string[] = [];
  const declared = new Set((child.input ?? []).map((input) => input.name.toLowerCase()));
  const provided = Object.keys(stage.inputs ?? {});
  const providedLower = new Set(provided.map((key) => key.toLowerCase()));

  for (const input of child.input ?? []) {
    if ((input.required ?? true) && !providedLower.has(input.name.toLowerCase())) {
      errors.push(`Stage '${stage.name}' is missing required input '${input.name}' for workflow '${child.name}'.`);
    }
  }
  for (const key of provided) {
    if (!declared.has(key.toLowerCase())) {
      errors.push(`Stage '${stage.name}' provides unknown input '${key}' for workflow '${child.name}'.`);
    }
  }
  return errors;
}

function validateVersion(stage: WorkflowStageDefinition, parentVersion: string, childVersion: string): string | undefined {
  if (!parentVersion.trim() || !childVersion.trim()) {
    return undefined;
  }
  if (parentVersion.toLowerCase() === childVersion.toLowerCase()) {
    return undefined;
  }
  if (stage.allowVersion && stage.allowVersion.toLowerCase() === childVersion.toLowerCase()) {
    return undefined;
  }
  return `Stage '${stage.name}' references workflow version '${childVersion}' which differs from parent version '${parentVersion}'.`;
}

function logVarsSources(resolution: VarsFileResolution, indentLevel: number): void {
  const logger = LoggerManager.getLogger();
  const indent = ExecutionLogFormatter.indent(indentLevel);
  const keys = Object.keys(resolution.sources).sort((a, b) => a.localeCompare(b, undefined, { sensitivity: 'base' }));

  if (keys.length === 0) {
    logger.info(`${indent}Vars file variable sources: (none)`, undefined, LogCategory.RUNTIME);
    return;
  }
  logger.info(`${indent}Vars file variable sources:`, undefined, LogCategory.RUNTIME);
  for (const key of keys) {
    const source = resolution.sources[key];
    if (source) {
      logger.info(`${indent}  ${key}: ${describeSource(source)}`, undefined, LogCategory.RUNTIME);
    }
  }
}

function describeSource(source: VarsFileSource): string {
  switch (source.scope) {
    case 'global':
      return 'global';
    case 'environment':
      return `environment ${source.environment}`;
    case 'version':
      return `environment ${source.environment} / version ${source.version}`;
  }
}
