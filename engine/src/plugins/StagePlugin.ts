/**
 * Stage Plugin Contract
 *
 * A stage plugin handles one or more stage kinds. The executor looks the
 * plugin up by `kind`, calls `execute`, and uses the declared capabilities
 * to decide how to treat failures, mocks and jumps.
 *
 * @example
 * ```ts
 * class QueueStagePlugin implements StagePlugin {
 *   readonly id = 'queue';
 *   readonly stageKinds = ['Queue'];
 *   readonly capabilities = {
 *     outputKind: 'endpoint',
 *     mockKind: 'none',
 *     allowsResponseTokens: false,
 *     supportsJumpOnStatus: false,
 *     continueOnError: false,
 *   } as const;
 *
 *   async execute(stage, ctx) {
 *     ctx.execution.endpointOutputs.set(stage.name, { queued: 'true' });
 *     return {};
 *   }
 *
 *   validate() {
 *     return [];
 *   }
 * }
 * ```
 *
 * @module plugins
 */

import type { ApiBaseUrlResolver } from '../services/ApiBaseUrlResolver.js';
import type { BackoffType } from '../automation/BackoffStrategy.js';
import type { DocumentLoader } from '../loader/WorkflowLoader.js';
import type { EndpointInvoker } from '../http/EndpointInvoker.js';
import type { EventBus } from '../events/EventBus.js';
import type { ExecutionContext } from '../context/ExecutionContext.js';
import type { MockPayloadService } from '../services/MockPayloadService.js';
import type { SleepFunction } from '../automation/runtime/BackoffTimer.js';
import type { StageMessageEmitter } from '../execution/StageMessageEmitter.js';
import type { SystemClock } from '../utils/SystemClock.js';
import type { TemplateResolver } from '../context/TemplateResolver.js';
import type { VarsFileLoader } from '../loader/VarsFileLoader.js';
import type { WorkflowDocument, WorkflowStageDefinition } from '../types/definitions.js';
import type { WorkflowRunResult } from '../types/core-types.js';

/** Which output map a plugin writes to */
export type StageOutputKind = 'endpoint' | 'workflow' | 'none';

/** Which mock block shape a plugin accepts */
export type StageMockKind = 'endpoint' | 'workflow' | 'none';

export interface StagePluginCapabilities {
  outputKind: StageOutputKind;
  mockKind: StageMockKind;
  /** `response.*` tokens may appear in output/set/context/message */
  allowsResponseTokens: boolean;
  supportsJumpOnStatus: boolean;
  /** Failures are recorded and the workflow continues */
  continueOnError: boolean;
}

/**
 * What a stage did, for the executor's jump decision and run records
 */
export interface StageOutcome {
  /** Stage name, or `endStage` / `end` */
  jumpTo?: string;
  /** Final response status, for endpoint-like kinds */
  status?: number;
  /** Retries used, excluding the first attempt */
  retries?: number;
  /** Set when a continue-on-error plugin recorded a failure */
  failed?: boolean;
  message?: string;
}

/**
 * Collaborators shared by every stage of a run
 */
export interface StageServices {
  templateResolver: TemplateResolver;
  endpointInvoker: EndpointInvoker;
  documentLoader: DocumentLoader;
  varsFileLoader: VarsFileLoader;
  mockPayloadService: MockPayloadService;
  baseUrlResolver: ApiBaseUrlResolver;
  messages: StageMessageEmitter;
  events: EventBus;
  clock: SystemClock;
  sleep: SleepFunction;
}

export interface StageRunOptions {
  environment: string;
  mocked: boolean;
  verbose: boolean;
  debug: boolean;
  varsOverrideActive: boolean;
  retryBackoff: BackoffType;
}

export type NestedWorkflowRunner = (document: WorkflowDocument, execution: ExecutionContext) => Promise<WorkflowRunResult>;

export interface StageExecutionContext {
  document: WorkflowDocument;
  execution: ExecutionContext;
  services: StageServices;
  options: StageRunOptions;
  signal?: AbortSignal;
  /** Run a nested workflow on a fresh context with the same services */
  executeNested: NestedWorkflowRunner;
}

export interface StageValidationContext {
  document: WorkflowDocument;
  documentLoader: DocumentLoader;
  mockPayloadService: MockPayloadService;
  /** Declared api reference names, lower-case */
  apiReferences: ReadonlySet<string>;
  /** Declared workflow reference name (lower-case) → absolute path */
  workflowReferences: ReadonlyMap<string, string>;
}

export interface StagePlugin {
  readonly id: string;
  readonly stageKinds: readonly string[];
  readonly capabilities: StagePluginCapabilities;

  /**
   * Run one stage
   *
   * @throws Any StageflowError; the executor decides whether it is fatal
   *         from `capabilities.continueOnError`
   */
  execute(stage: WorkflowStageDefinition, ctx: StageExecutionContext): Promise<StageOutcome>;

  /**
   * Static checks for stages of this plugin's kinds
   *
   * @returns Error messages; empty when the stage is valid
   */
  validate(stage: WorkflowStageDefinition, ctx: StageValidationContext): string[] | Promise<string[]>;
}

export type StagePluginFactory = () => StagePlugin;
