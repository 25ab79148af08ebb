import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitState } from '../src/automation/runtime/CircuitBreaker.js';
import { ExecutionContext } from '../src/context/ExecutionContext.js';
import { TemplateResolver } from '../src/context/TemplateResolver.js';
import { RetryExhaustedError, TemplateResolutionError } from '../src/errors/index.js';
import { EventBus } from '../src/events/EventBus.js';
import { EndpointStageExecutor } from '../src/execution/EndpointStageExecutor.js';
import { StageMessageEmitter } from '../src/execution/StageMessageEmitter.js';
import { VarsFileLoader } from '../src/loader/VarsFileLoader.js';
import { SchemaValidator } from '../src/parser/SchemaValidator.js';
import { StaticBaseUrlResolver } from '../src/services/ApiBaseUrlResolver.js';
import { MockPayloadService } from '../src/services/MockPayloadService.js';
import { InMemoryDocumentLoader } from '../src/testing/InMemoryDocumentLoader.js';
import { MockEndpointInvoker } from '../src/testing/MockEndpointInvoker.js';
import { ManualClock } from '../src/utils/SystemClock.js';
import type { StageExecutionContext } from '../src/plugins/StagePlugin.js';
import type { WorkflowDocument, WorkflowStageDefinition } from '../src/types/definitions.js';

const DOCUMENT: WorkflowDocument = {
  filePath: '/flows/breaker.workflow',
  environmentVariables: {},
  definition: SchemaValidator.validate({
    version: '1',
    id: 'wf-breaker',
    name: 'breaker',
    references: { apis: [{ name: 'shop', definition: 'Shop' }] },
    resilience: {
      retries: { quick: { maxRetries: 1, delayMs: 100 } },
      circuitBreakers: { shopBreaker: { failureThreshold: 1, breakMs: 1000 } },
    },
    stages: [
      {
        name: 'first',
        kind: 'Endpoint',
        apiRef: 'shop',
        endpoint: '/first',
        httpVerb: 'GET',
        expectedStatus: 200,
        retry: { ref: 'quick', httpStatus: [503] },
        circuitBreaker: { ref: 'shopBreaker' },
      },
      {
        name: 'lookup',
        kind: 'Endpoint',
        apiRef: 'shop',
        endpoint: '/items/{{global.sku}}',
        httpVerb: 'GET',
        expectedStatus: 200,
        retry: { ref: 'quick', httpStatus: [503] },
        circuitBreaker: { ref: 'shopBreaker' },
      },
    ],
  }),
};

function stageNamed(name: string): WorkflowStageDefinition {
  const stage = DOCUMENT.definition.stages.find((candidate) => candidate.name === name);
  if (!stage) {
    throw new Error(`No stage '${name}'`);
  }
  return stage;
}

describe('EndpointStageExecutor', () => {
  let clock: ManualClock;
  let invoker: MockEndpointInvoker;
  let execution: ExecutionContext;
  let ctx: StageExecutionContext;
  const executor = new EndpointStageExecutor();

  beforeEach(() => {
    clock = new ManualClock(0);
    invoker = new MockEndpointInvoker();
    execution = new ExecutionContext();
    const templateResolver = new TemplateResolver({ clock });
    const events = new EventBus();
    ctx = {
      document: DOCUMENT,
      execution,
      services: {
        templateResolver,
        endpointInvoker: invoker,
        documentLoader: new InMemoryDocumentLoader(),
        varsFileLoader: new VarsFileLoader(),
        mockPayloadService: new MockPayloadService(),
        baseUrlResolver: new StaticBaseUrlResolver({ shop: 'https://shop.test' }),
        messages: new StageMessageEmitter(templateResolver, events),
        events,
        clock,
        sleep: async (ms) => {
          clock.advance(ms);
        },
      },
      options: {
        environment: 'local',
        mocked: false,
        verbose: false,
        debug: false,
        varsOverrideActive: false,
        retryBackoff: 'fixed',
      },
      executeNested: async () => {
        throw new Error('nested workflows are not used here');
      },
    };
  });

  it('leaves an open breaker open when the trial request cannot be built', async () => {
    invoker.on('GET https://shop.test/first', { status: 503 });
    await expect(executor.execute(stageNamed('first'), ctx)).rejects.toBeInstanceOf(RetryExhaustedError);

    const breaker = execution.circuitBreakers.get('shopBreaker');
    expect(breaker?.snapshot()).toEqual({ state: CircuitState.OPEN, consecutiveFailures: 0, consecutiveSuccesses: 0, openedAt: 100 });

    clock.advance(1000);
    await expect(executor.execute(stageNamed('lookup'), ctx)).rejects.toBeInstanceOf(TemplateResolutionError);

    expect(breaker?.snapshot()).toEqual({ state: CircuitState.OPEN, consecutiveFailures: 0, consecutiveSuccesses: 0, openedAt: 100 });
    expect(invoker.getCallCount()).toBe(2);
  });
});
