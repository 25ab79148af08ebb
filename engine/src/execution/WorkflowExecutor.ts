/**
 * Workflow Executor
 *
 * Drives one workflow invocation, root or nested:
 * - Checks required inputs and evaluates initStage into globals and context
 * - Walks the stage list in order, honouring runIf skips and status jumps
 * - Dispatches every stage to the plugin registered for its kind
 * - Evaluates endStage and writes the output file
 *
 * Nested workflow stages come back here through `executeNested` with a
 * fresh ExecutionContext one level deeper.
 *
 * @module execution
 */

import { SleepCancelledError } from '../automation/runtime/BackoffTimer.js';
import { createEvent, EngineEventType, type EventOrigin } from '../events/EngineEvents.js';
import {
  ConfigurationError,
  MockedSelfJumpError,
  TemplateResolutionError,
  TransitionLimitError,
  WorkflowCancelledError,
} from '../errors/index.js';
import { ExecutionLogFormatter, type StageTransition } from '../logging/ExecutionLogFormatter.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogCategory } from '../types/log-types.js';
import { isEndStageTarget } from '../types/definitions.js';
import { DynamicValueGenerator } from './DynamicValueGenerator.js';
import { RunIfEvaluator } from './RunIfEvaluator.js';
import { applyStageBindings } from './StageBindings.js';
import { hasIgnoreCase } from '../utils/caseInsensitive.js';
import { WorkflowOutputWriter, type OutputWriter } from './WorkflowOutputWriter.js';
import type { ExecutionContext } from '../context/ExecutionContext.js';
import type { RunIfErrorPolicy } from '../core/EngineConfig.js';
import type { StagePluginRegistry } from '../plugins/StagePluginRegistry.js';
import type { StageOutcome, StageRunOptions, StageServices } from '../plugins/StagePlugin.js';
import type { StageRunRecord, WorkflowRunResult } from '../types/core-types.js';
import type { WorkflowDefinition, WorkflowDocument, WorkflowStageDefinition } from '../types/definitions.js';

export interface WorkflowExecutorOptions {
  registry: StagePluginRegistry;
  services: StageServices;
  runOptions: StageRunOptions;
  runIfErrorPolicy: RunIfErrorPolicy;
  maxStageTransitions: number;
  writeOutputFiles: boolean;
  outputWriter?: OutputWriter;
  dynamicValues?: DynamicValueGenerator;
  signal?: AbortSignal;
}

type StageStep = { kind: 'next' } | { kind: 'jump'; index: number } | { kind: 'end' };

export class WorkflowExecutor {
  private readonly runIf: RunIfEvaluator;
  private readonly outputWriter: OutputWriter;
  private readonly dynamicValues: DynamicValueGenerator;

  constructor(private readonly options: WorkflowExecutorOptions) {
    this.runIf = new RunIfEvaluator(options.services.templateResolver);
    this.outputWriter = options.outputWriter ?? new WorkflowOutputWriter();
    this.dynamicValues = options.dynamicValues ?? new DynamicValueGenerator({ clock: options.services.clock });
  }

  /**
   * Run a workflow to completion
   *
   * Failures come back as an `Error` result; only cancellation throws.
   *
   * @throws {WorkflowCancelledError}
   */
  async execute(document: WorkflowDocument, execution: ExecutionContext): Promise<WorkflowRunResult> {
    const definition = document.definition;
    const origin: EventOrigin = { workflowName: definition.name, depth: execution.indentLevel };
    const startTime = Date.now();
    const stages: StageRunRecord[] = [];
    const logger = LoggerManager.getLogger();

    await this.options.services.events.emit(
      createEvent(
        EngineEventType.WORKFLOW_STARTED,
        {
          workflowId: definition.id,
          version: definition.version,
          totalStages: definition.stages.length,
          mocked: this.options.runOptions.mocked,
        },
        origin,
      ),
    );

    try {
      if (!this.options.runOptions.mocked) {
        this.validateInputs(definition, execution);
      }
      this.initialize(definition, execution);
      logger.info(
        ExecutionLogFormatter.stageLine(execution.indentLevel, definition.name, 'initStage', 'processed.'),
        undefined,
        LogCategory.RUNTIME,
      );

      await this.runStages(document, execution, stages);

      const output = this.options.services.templateResolver.resolveMap(definition.endStage?.output, execution);
      execution.workflowOutputs.set(definition.name, output);
      this.applyEndStageContext(definition, execution);
      logger.info(
        ExecutionLogFormatter.stageLine(execution.indentLevel, definition.name, 'endStage', 'processed.'),
        undefined,
        LogCategory.RUNTIME,
      );

      if (definition.output && this.options.writeOutputFiles) {
        execution.outputFilePath = await this.outputWriter.write(document, output);
        logger.info(
          ExecutionLogFormatter.workflowLine(execution.indentLevel, definition.name, `output written to ${execution.outputFilePath}`),
          undefined,
          LogCategory.RUNTIME,
        );
      }

      const message = this.options.services.templateResolver.resolve(definition.endStage?.result?.message ?? '', execution);
      execution.workflowResults.set(definition.name, { status: 'Ok', message });

      const durationMs = Date.now() - startTime;
      logger.info(
        `${ExecutionLogFormatter.indent(execution.indentLevel)}Workflow ${ExecutionLogFormatter.workflowTag(definition.name)} completed in ${durationMs} ms.`,
        undefined,
        LogCategory.RUNTIME,
      );
      await this.options.services.events.emit(
        createEvent(
          EngineEventType.WORKFLOW_COMPLETED,
          { status: 'Ok', message, durationMs, ...countStages(stages) },
          origin,
        ),
      );

      return {
        workflowName: definition.name,
        workflowId: definition.id,
        status: 'Ok',
        message,
        output,
        context: execution.contextSnapshot(),
        outputFilePath: execution.outputFilePath,
        stages,
        durationMs,
      };
    } catch (caught) {
      const error = this.asCancellation(caught, definition.name) ?? (caught instanceof Error ? caught : new Error(String(caught)));
      const durationMs = Date.now() - startTime;

      logger.error(
        ExecutionLogFormatter.workflowLine(execution.indentLevel, definition.name, `failed: ${error.message}`),
        error,
        undefined,
        LogCategory.RUNTIME,
      );
      await this.options.services.events.emit(createEvent(EngineEventType.WORKFLOW_FAILED, { error, durationMs }, origin));

      if (error instanceof WorkflowCancelledError) {
        throw error;
      }

      if (definition.endStage?.runOnFailure) {
        this.applyEndStageContextAfterFailure(definition, execution);
      }
      execution.workflowResults.set(definition.name, { status: 'Error', message: error.message });

      return {
        workflowName: definition.name,
        workflowId: definition.id,
        status: 'Error',
        message: error.message,
        output: {},
        context: execution.contextSnapshot(),
        stages,
        durationMs,
        error,
      };
    }
  }

  private async runStages(document: WorkflowDocument, execution: ExecutionContext, records: StageRunRecord[]): Promise<void> {
    const stages = document.definition.stages;
    let transitions = 0;
    let index = 0;

    while (index < stages.length) {
      const stage = stages[index];
      if (!stage) {
        break;
      }

      transitions++;
      if (transitions > this.options.maxStageTransitions) {
        throw new TransitionLimitError(document.definition.name, this.options.maxStageTransitions);
      }

      const step = await this.runStage(document, execution, stage, index, records);
      if (step.kind === 'end') {
        break;
      }
      index = step.kind === 'jump' ? step.index : index + 1;
    }
  }

  private async runStage(
    document: WorkflowDocument,
    execution: ExecutionContext,
    stage: WorkflowStageDefinition,
    index: number,
    records: StageRunRecord[],
  ): Promise<StageStep> {
    const { services, runOptions, registry } = this.options;
    const workflowName = document.definition.name;
    const origin: EventOrigin = { workflowName, stageName: stage.name, depth: execution.indentLevel };
    const logger = LoggerManager.getLogger();
    const line = (transition: StageTransition, detail?: string): string =>
      ExecutionLogFormatter.transition(execution.indentLevel, workflowName, stage.name, transition, detail);
    const startTime = Date.now();

    const skipReason = this.evaluateRunIf(stage, execution, workflowName);
    if (skipReason !== undefined) {
      logger.info(line('skip', skipReason), undefined, LogCategory.RUNTIME);
      records.push({ name: stage.name, kind: stage.kind, status: 'skipped', message: skipReason, durationMs: 0 });
      await services.events.emit(createEvent(EngineEventType.STAGE_SKIPPED, { reason: skipReason }, origin));
      return { kind: 'next' };
    }

    const plugin = registry.resolve(stage.kind, stage.name);

    await this.applyDelay(stage, execution, workflowName);
    if (runOptions.debug) {
      this.logDebugMap(stage, execution, workflowName);
    }

    logger.info(line('invoke', `[${stage.kind}]`), undefined, LogCategory.RUNTIME);
    await services.events.emit(createEvent(EngineEventType.STAGE_STARTED, { kind: stage.kind, index }, origin));

    let outcome: StageOutcome;
    try {
      outcome = await plugin.execute(stage, {
        document,
        execution,
        services,
        options: runOptions,
        signal: this.options.signal,
        executeNested: (child, childExecution) => this.execute(child, childExecution),
      });
    } catch (caught) {
      const error = this.asCancellation(caught, workflowName, stage.name) ?? (caught instanceof Error ? caught : new Error(String(caught)));
      const durationMs = Date.now() - startTime;
      const fatal =
        error instanceof WorkflowCancelledError || error instanceof ConfigurationError || !plugin.capabilities.continueOnError;

      logger.error(line('fail', `after ${durationMs} ms: ${error.message}`), undefined, undefined, LogCategory.RUNTIME);
      records.push({ name: stage.name, kind: stage.kind, status: 'failed', message: error.message, durationMs });
      await services.events.emit(createEvent(EngineEventType.STAGE_FAILED, { kind: stage.kind, error, fatal, durationMs }, origin));

      if (fatal) {
        throw error;
      }
      if (plugin.capabilities.outputKind === 'workflow') {
        execution.workflowResults.set(stage.name, { status: 'Error', message: error.message });
      }
      applyStageBindings(stage, execution, services.templateResolver);
      return { kind: 'next' };
    }

    const durationMs = Date.now() - startTime;
    const jumpTo = plugin.capabilities.supportsJumpOnStatus ? outcome.jumpTo?.trim() : undefined;

    if (outcome.failed) {
      records.push({ name: stage.name, kind: stage.kind, status: 'failed', message: outcome.message, durationMs });
      await services.events.emit(
        createEvent(
          EngineEventType.STAGE_FAILED,
          { kind: stage.kind, error: new Error(outcome.message ?? 'stage failed'), fatal: false, durationMs },
          origin,
        ),
      );
    } else {
      records.push({
        name: stage.name,
        kind: stage.kind,
        status: jumpTo ? 'jumped' : 'completed',
        httpStatus: outcome.status,
        retries: outcome.retries,
        jumpTo,
        durationMs,
      });
      await services.events.emit(
        createEvent(
          EngineEventType.STAGE_COMPLETED,
          { kind: stage.kind, durationMs, status: outcome.status, retries: outcome.retries, jumpTo },
          origin,
        ),
      );
    }
    logger.info(line('complete', `in ${durationMs} ms`), undefined, LogCategory.RUNTIME);

    if (!jumpTo) {
      return { kind: 'next' };
    }
    return this.resolveJump(document.definition, stage, jumpTo, outcome, execution, origin);
  }

  private async resolveJump(
    definition: WorkflowDefinition,
    stage: WorkflowStageDefinition,
    jumpTo: string,
    outcome: StageOutcome,
    execution: ExecutionContext,
    origin: EventOrigin,
  ): Promise<StageStep> {
    LoggerManager.getLogger().info(
      ExecutionLogFormatter.transition(execution.indentLevel, definition.name, stage.name, 'jump', `${jumpTo} on status ${outcome.status ?? 'n/a'}`),
      undefined,
      LogCategory.RUNTIME,
    );
    await this.options.services.events.emit(createEvent(EngineEventType.STAGE_JUMPED, { to: jumpTo, status: outcome.status }, origin));

    if (isEndStageTarget(jumpTo)) {
      return { kind: 'end' };
    }

    if (jumpTo.toLowerCase() === stage.name.toLowerCase() && this.options.runOptions.mocked) {
      throw new MockedSelfJumpError(stage.name, outcome.status ?? 0);
    }

    const target = definition.stages.findIndex((candidate) => candidate.name.toLowerCase() === jumpTo.toLowerCase());
    if (target < 0) {
      throw ConfigurationError.unresolvedReference('Jump target', jumpTo, `stages.${stage.name}.jumpOnStatus`);
    }
    return { kind: 'jump', index: target };
  }

  /**
   * @returns The skip reason, or undefined when the stage runs
   */
  private evaluateRunIf(stage: WorkflowStageDefinition, execution: ExecutionContext, workflowName: string): string | undefined {
    if (!stage.runIf) {
      return undefined;
    }
    try {
      return this.runIf.shouldRun(stage.runIf, execution, stage.name) ? undefined : `runIf '${stage.runIf}' is false`;
    } catch (error) {
      if (error instanceof TemplateResolutionError && this.options.runIfErrorPolicy === 'skip') {
        LoggerManager.getLogger().warn(
          ExecutionLogFormatter.stageLine(execution.indentLevel, workflowName, stage.name, `runIf could not be resolved: ${error.message}`),
          undefined,
          LogCategory.RUNTIME,
        );
        return `runIf could not be resolved: ${error.message}`;
      }
      throw error;
    }
  }

  private async applyDelay(stage: WorkflowStageDefinition, execution: ExecutionContext, workflowName: string): Promise<void> {
    const delaySeconds = stage.delaySeconds ?? 0;
    if (delaySeconds <= 0) {
      return;
    }
    if (this.options.runOptions.verbose) {
      LoggerManager.getLogger().info(
        ExecutionLogFormatter.stageLine(execution.indentLevel, workflowName, stage.name, `delay: ${delaySeconds}s.`),
        undefined,
        LogCategory.RUNTIME,
      );
    }
    await this.options.services.sleep(delaySeconds * 1000, this.options.signal);
  }

  private logDebugMap(stage: WorkflowStageDefinition, execution: ExecutionContext, workflowName: string): void {
    if (!stage.debug || Object.keys(stage.debug).length === 0) {
      return;
    }
    const logger = LoggerManager.getLogger();
    const indent = ExecutionLogFormatter.indent(execution.indentLevel);
    logger.info(ExecutionLogFormatter.stageLine(execution.indentLevel, workflowName, stage.name, 'debug:'), undefined, LogCategory.RUNTIME);
    for (const [key, value] of Object.entries(this.options.services.templateResolver.resolveMap(stage.debug, execution))) {
      logger.info(`${indent} ${key}: ${value}`, undefined, LogCategory.RUNTIME);
    }
  }

  private validateInputs(definition: WorkflowDefinition, execution: ExecutionContext): void {
    for (const input of definition.input ?? []) {
      if ((input.required ?? true) && !hasIgnoreCase(execution.inputs, input.name)) {
        throw ConfigurationError.missingInput(definition.name, input.name);
      }
    }
  }

  /**
   * Globals in declaration order, each able to reference the ones before
   * it; then context seeds for keys the caller did not already set
   */
  private initialize(definition: WorkflowDefinition, execution: ExecutionContext): void {
    const resolver = this.options.services.templateResolver;

    for (const variable of definition.initStage?.variables ?? []) {
      const value = resolver.resolveOptional(variable.value, execution);
      execution.globals.set(variable.name, this.dynamicValues.generate({ ...variable, value }, 1));
    }

    for (const [key, template] of Object.entries(definition.initStage?.context ?? {})) {
      if (!execution.context.has(key)) {
        execution.context.set(key, resolver.resolve(template, execution));
      }
    }
  }

  private applyEndStageContext(definition: WorkflowDefinition, execution: ExecutionContext): void {
    const resolved = this.options.services.templateResolver.resolveMap(definition.endStage?.context, execution);
    for (const [key, value] of Object.entries(resolved)) {
      execution.context.set(key, value);
    }
  }

  private applyEndStageContextAfterFailure(definition: WorkflowDefinition, execution: ExecutionContext): void {
    try {
      this.applyEndStageContext(definition, execution);
    } catch (error) {
      LoggerManager.getLogger().error(
        ExecutionLogFormatter.stageLine(execution.indentLevel, definition.name, 'endStage', 'context could not be applied after failure'),
        error instanceof Error ? error : undefined,
        undefined,
        LogCategory.RUNTIME,
      );
    }
  }

  /**
   * Sleeps cancelled by the run's signal surface as SleepCancelledError
   */
  private asCancellation(error: unknown, workflowName: string, stageName?: string): WorkflowCancelledError | undefined {
    if (error instanceof WorkflowCancelledError) {
      return error;
    }
    if (error instanceof SleepCancelledError || this.options.signal?.aborted) {
      return new WorkflowCancelledError(workflowName, stageName);
    }
    return undefined;
  }
}

function countStages(records: readonly StageRunRecord[]): {
  completedStages: number;
  skippedStages: number;
  failedStages: number;
} {
  return {
    completedStages: records.filter((r) => r.status === 'completed' || r.status === 'jumped').length,
    skippedStages: records.filter((r) => r.status === 'skipped').length,
    failedStages: records.filter((r) => r.status === 'failed').length,
  };
}
