/**
 * Workflow Engine - Main Public API
 *
 * Wires the plugin registry, loaders, HTTP invoker, template resolver and
 * executor together behind a small API: load, validate, plan, run.
 *
 * @module core
 */

import { BackoffTimer, type SleepFunction } from '../automation/runtime/BackoffTimer.js';
import { ExecutionContext } from '../context/ExecutionContext.js';
import { TemplateResolver } from '../context/TemplateResolver.js';
import { EventBus } from '../events/EventBus.js';
import { StageMessageEmitter } from '../execution/StageMessageEmitter.js';
import { WorkflowExecutor } from '../execution/WorkflowExecutor.js';
import { HttpEndpointInvoker } from '../http/HttpEndpointInvoker.js';
import { EngineLogger, createEngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { VarsFileLoader } from '../loader/VarsFileLoader.js';
import { WorkflowLoader, type DocumentLoader } from '../loader/WorkflowLoader.js';
import { WorkflowPlanner } from '../planning/WorkflowPlanner.js';
import { BUILT_IN_PLUGINS, REQUIRED_PLUGIN_IDS } from '../plugins/builtins/index.js';
import { StagePluginRegistryBuilder } from '../plugins/StagePluginRegistryBuilder.js';
import { MockPayloadService } from '../services/MockPayloadService.js';
import { StaticBaseUrlResolver, type ApiBaseUrlResolver } from '../services/ApiBaseUrlResolver.js';
import { LogCategory, LogLevel, type LogSink } from '../types/log-types.js';
import { systemClock, type SystemClock } from '../utils/SystemClock.js';
import { WorkflowValidator, type ValidationResult } from '../validation/WorkflowValidator.js';
import { applyConfigDefaults, validateConfig, type EngineConfig, type ResolvedEngineConfig } from './EngineConfig.js';
import type { DynamicValueGenerator } from '../execution/DynamicValueGenerator.js';
import type { EndpointInvoker } from '../http/EndpointInvoker.js';
import type { OutputWriter } from '../execution/WorkflowOutputWriter.js';
import type { StagePluginRegistry } from '../plugins/StagePluginRegistry.js';
import type { StageServices } from '../plugins/StagePlugin.js';
import type { WorkflowDocument } from '../types/definitions.js';
import type { WorkflowLoadOptions, WorkflowRunOptions, WorkflowRunResult } from '../types/core-types.js';
import type { WorkflowPlan } from '../planning/PlanTypes.js';

/**
 * Collaborators a host can replace; everything has a default
 */
export interface EngineDependencies {
  documentLoader?: DocumentLoader;
  endpointInvoker?: EndpointInvoker;
  /** Defaults to a resolver that knows no APIs, enough for mocked runs */
  baseUrlResolver?: ApiBaseUrlResolver;
  mockPayloadService?: MockPayloadService;
  varsFileLoader?: VarsFileLoader;
  outputWriter?: OutputWriter;
  dynamicValues?: DynamicValueGenerator;
  templateResolver?: TemplateResolver;
  eventBus?: EventBus;
  clock?: SystemClock;
  sleep?: SleepFunction;
  /** Receives every formatted log line */
  logSink?: LogSink;
}

/**
 * WorkflowEngine - Main public API
 *
 * @example
 * ```ts
 * const catalog = await ApiCatalogLoader.load('./catalog.json');
 * const engine = new WorkflowEngine(
 *   { environment: 'staging' },
 *   { baseUrlResolver: new CatalogBaseUrlResolver(selectCatalogVersion(catalog, '3.11'), 'staging') },
 * );
 *
 * const result = await engine.run('./workflows/create-account.workflow', {
 *   inputs: { username: 'demo' },
 * });
 * console.log(result.status, result.output);
 * ```
 */
export class WorkflowEngine {
  private readonly config: ResolvedEngineConfig;
  private readonly registry: StagePluginRegistry;
  private readonly eventBus: EventBus;
  private readonly documentLoader: DocumentLoader;
  private readonly mockPayloadService: MockPayloadService;
  private readonly services: StageServices;
  private readonly dependencies: EngineDependencies;

  constructor(config: EngineConfig = {}, dependencies: EngineDependencies = {}) {
    validateConfig(config);
    this.config = applyConfigDefaults(config);
    this.dependencies = dependencies;
    LoggerManager.use(createEngineLogger(this.config.logLevel, this.config.verbose, dependencies.logSink) ?? silentLogger());

    this.registry = new StagePluginRegistryBuilder({
      builtIns: BUILT_IN_PLUGINS,
      requiredIds: REQUIRED_PLUGIN_IDS,
    }).build(this.config.plugins, this.config.pluginFactories);

    this.eventBus = dependencies.eventBus ?? new EventBus();
    this.documentLoader = dependencies.documentLoader ?? new WorkflowLoader();
    this.mockPayloadService = dependencies.mockPayloadService ?? new MockPayloadService();

    const clock = dependencies.clock ?? systemClock;
    const templateResolver = dependencies.templateResolver ?? new TemplateResolver({ clock });
    this.services = {
      templateResolver,
      endpointInvoker: dependencies.endpointInvoker ?? new HttpEndpointInvoker({ timeoutMs: this.config.requestTimeoutMs }),
      documentLoader: this.documentLoader,
      varsFileLoader: dependencies.varsFileLoader ?? new VarsFileLoader(),
      mockPayloadService: this.mockPayloadService,
      baseUrlResolver: dependencies.baseUrlResolver ?? new StaticBaseUrlResolver({}),
      messages: new StageMessageEmitter(templateResolver, this.eventBus),
      events: this.eventBus,
      clock,
      sleep: dependencies.sleep ?? ((ms, signal) => BackoffTimer.sleep(ms, signal)),
    };

    LoggerManager.getLogger().debug(
      'Workflow engine ready',
      { plugins: this.registry.getIds(), environment: this.config.environment, mocked: this.config.mocked },
      LogCategory.SYSTEM,
    );
  }

  /**
   * Load, parse and schema-check a workflow file
   */
  load(workflowPath: string, options: WorkflowLoadOptions = {}): Promise<WorkflowDocument> {
    return this.documentLoader.load(workflowPath, options.envOverrides, options.envFile);
  }

  /**
   * Static checks; every problem is reported, nothing runs
   */
  async validate(workflow: string | WorkflowDocument, options: WorkflowLoadOptions = {}): Promise<ValidationResult> {
    const document = typeof workflow === 'string' ? await this.load(workflow, options) : workflow;
    return this.createValidator().validate(document);
  }

  /**
   * Build the dry-run plan. Verbose plans expand nested workflows.
   */
  async plan(workflow: string | WorkflowDocument, verbose = this.config.verbose): Promise<WorkflowPlan> {
    const document = typeof workflow === 'string' ? await this.load(workflow) : workflow;
    return new WorkflowPlanner(this.documentLoader).buildPlan(document, verbose);
  }

  /**
   * Validate and run a workflow
   *
   * Stage failures come back as an `Error` result.
   *
   * @throws {ConfigurationError} When the workflow fails validation
   * @throws {WorkflowCancelledError} When `options.signal` aborts the run
   */
  async run(workflow: string | WorkflowDocument, options: WorkflowRunOptions = {}): Promise<WorkflowRunResult> {
    const document =
      typeof workflow === 'string' ? await this.load(workflow, { envOverrides: options.env, envFile: options.envFile }) : workflow;
    await this.createValidator().assertValid(document);

    const mocked = options.mocked ?? this.config.mocked;
    const executor = new WorkflowExecutor({
      registry: this.registry,
      services: this.services,
      runOptions: {
        environment: this.config.environment,
        mocked,
        verbose: this.config.verbose,
        debug: this.config.debug,
        varsOverrideActive: options.varsOverrideActive ?? this.config.varsOverrideActive,
        retryBackoff: this.config.retryBackoff,
      },
      runIfErrorPolicy: this.config.runIfErrorPolicy,
      maxStageTransitions: this.config.maxStageTransitions,
      writeOutputFiles: this.config.writeOutputFiles,
      outputWriter: this.dependencies.outputWriter,
      dynamicValues: this.dependencies.dynamicValues,
      signal: options.signal,
    });

    const execution = new ExecutionContext({
      inputs: options.inputs,
      environment: { ...document.environmentVariables, ...(options.env ?? {}) },
      context: new Map(Object.entries(options.context ?? {})),
    });

    LoggerManager.getLogger().info(
      `Running workflow '${document.definition.name}'${mocked ? ' (mocked)' : ''} in environment '${this.config.environment}'`,
      { path: document.filePath },
      LogCategory.RUNTIME,
    );
    return executor.execute(document, execution);
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  getRegistry(): StagePluginRegistry {
    return this.registry;
  }

  getConfig(): Readonly<ResolvedEngineConfig> {
    return { ...this.config };
  }

  private createValidator(): WorkflowValidator {
    return new WorkflowValidator({
      registry: this.registry,
      documentLoader: this.documentLoader,
      mockPayloadService: this.mockPayloadService,
    });
  }
}

function silentLogger(): EngineLogger {
  return new EngineLogger({ level: LogLevel.FATAL, sink: () => undefined, maxEntries: 0 });
}
