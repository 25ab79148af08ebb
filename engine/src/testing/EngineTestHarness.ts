/**
 * Engine Test Harness
 *
 * A WorkflowEngine wired to in-memory collaborators: scripted HTTP
 * responses, workflows registered by path, a manual clock, instant sleeps
 * and captured log lines. Nothing touches the network or the disk unless a
 * test opts in.
 *
 * @example
 * ```ts
 * const harness = new EngineTestHarness({ baseUrls: { Accounts: 'https://accounts.test' } });
 * harness.invoker.on('POST https://accounts.test/users', { status: 201, body: { id: 'u-1' } });
 * harness.loader.add('/wf/create.workflow', definition);
 * const result = await harness.run('/wf/create.workflow');
 * ```
 *
 * @module testing
 */

import { WorkflowEngine } from '../core/WorkflowEngine.js';
import { EngineEventType, type EngineEvent } from '../events/EngineEvents.js';
import { StaticBaseUrlResolver } from '../services/ApiBaseUrlResolver.js';
import { ManualClock } from '../utils/SystemClock.js';
import { InMemoryDocumentLoader } from './InMemoryDocumentLoader.js';
import { MockEndpointInvoker } from './MockEndpointInvoker.js';
import type { EngineConfig } from '../core/EngineConfig.js';
import type { EngineDependencies } from '../core/WorkflowEngine.js';
import type { WorkflowRunOptions, WorkflowRunResult } from '../types/core-types.js';

export interface TestHarnessConfig {
  /** Engine options; logging defaults to debug so every line is captured */
  engine?: EngineConfig;

  /** API reference name → base URL */
  baseUrls?: Record<string, string>;

  /** Start time of the manual clock */
  now?: number;

  /** Replace any other collaborator */
  dependencies?: EngineDependencies;
}

export class EngineTestHarness {
  readonly invoker = new MockEndpointInvoker();
  readonly loader = new InMemoryDocumentLoader();
  readonly clock: ManualClock;
  readonly engine: WorkflowEngine;

  /** Requested sleeps, in order; sleeps advance the clock instead of waiting */
  readonly sleeps: number[] = [];

  private logs: string[] = [];
  private events: EngineEvent[] = [];

  constructor(config: TestHarnessConfig = {}) {
    this.clock = new ManualClock(config.now ?? 0);
    this.engine = new WorkflowEngine(
      { logLevel: 'debug', writeOutputFiles: false, ...config.engine },
      {
        endpointInvoker: this.invoker,
        documentLoader: this.loader,
        baseUrlResolver: new StaticBaseUrlResolver(config.baseUrls ?? {}),
        clock: this.clock,
        sleep: async (ms) => {
          this.sleeps.push(ms);
          this.clock.advance(ms);
        },
        logSink: (line) => {
          this.logs.push(line);
        },
        ...config.dependencies,
      },
    );
    this.engine.getEventBus().onAny((event) => {
      this.events.push(event);
    });
  }

  run(workflowPath: string, options: WorkflowRunOptions = {}): Promise<WorkflowRunResult> {
    return this.engine.run(workflowPath, options);
  }

  /**
   * Run and throw unless the workflow ends with status Ok
   */
  async assertSuccess(workflowPath: string, options?: WorkflowRunOptions): Promise<WorkflowRunResult> {
    const result = await this.run(workflowPath, options);
    if (result.status !== 'Ok') {
      throw new Error(`Workflow execution failed: ${result.message}`);
    }
    return result;
  }

  /**
   * Run and throw unless the workflow ends with status Error
   */
  async assertFailure(workflowPath: string, options?: WorkflowRunOptions): Promise<WorkflowRunResult> {
    const result = await this.run(workflowPath, options);
    if (result.status === 'Ok') {
      throw new Error('Expected workflow to fail, but it succeeded');
    }
    return result;
  }

  getLogs(): string[] {
    return [...this.logs];
  }

  getEvents(type?: EngineEventType): EngineEvent[] {
    return type === undefined ? [...this.events] : this.events.filter((event) => event.type === type);
  }

  clear(): void {
    this.logs = [];
    this.events = [];
    this.sleeps.length = 0;
    this.invoker.reset();
  }
}
