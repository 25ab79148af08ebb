/**
 * Endpoint Stage Executor
 *
 * Runs one HTTP stage: circuit breaker around retry around the raw call
 * (or the mock), then output capture, `set` and `context` bindings, the
 * stage message and the jump / expected-status decision.
 *
 * @module execution
 */

import { CircuitBreaker } from '../automation/runtime/CircuitBreaker.js';
import { CircuitBreakerPolicy } from '../automation/CircuitBreakerPolicy.js';
import { RetryExecutor, type RetrySchedule } from '../automation/runtime/RetryExecutor.js';
import { RetryPolicy } from '../automation/RetryPolicy.js';
import { createEvent, EngineEventType } from '../events/EngineEvents.js';
import {
  CircuitOpenError,
  ConfigurationError,
  RetryExhaustedError,
  StageFailureError,
  TransportError,
  WorkflowCancelledError,
} from '../errors/index.js';
import { ExecutionLogFormatter } from '../logging/ExecutionLogFormatter.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { HttpRequestBuilder } from '../http/HttpRequestBuilder.js';
import { HttpResponseParser } from '../http/HttpResponseParser.js';
import { MockPayloadService } from '../services/MockPayloadService.js';
import { applyStageBindings } from './StageBindings.js';
import { LogCategory, LogLevel } from '../types/log-types.js';
import type { EndpointRequest, EndpointResponse } from '../http/EndpointInvoker.js';
import type { StageExecutionContext, StageOutcome } from '../plugins/StagePlugin.js';
import type { WorkflowStageDefinition } from '../types/definitions.js';

const NO_RETRIES: RetrySchedule = { maxRetries: 0, delayFor: () => 0 };

export class EndpointStageExecutor {
  async execute(stage: WorkflowStageDefinition, ctx: StageExecutionContext): Promise<StageOutcome> {
    const { document, execution, services, options, signal } = ctx;
    const definition = document.definition;
    const workflowName = definition.name;
    const origin = { workflowName, stageName: stage.name, depth: execution.indentLevel };
    const target = { workflowName, stageName: stage.name, execution };
    const logger = LoggerManager.getLogger();

    const retryPolicy = RetryPolicy.resolve(stage.retry, definition, options.retryBackoff);
    // A breaker counts failures by the retry status set, so it needs a retry policy
    const breakerPolicy = retryPolicy ? CircuitBreakerPolicy.resolve(stage.circuitBreaker, stage.name, definition) : null;
    const breaker = breakerPolicy ? this.breakerFor(breakerPolicy, ctx) : undefined;
    // Taken before admission so a trial that never reaches the wire can be undone
    const breakerSnapshot = breaker?.snapshot();

    if (breaker && breakerPolicy) {
      const decision = breaker.tryAcquire();
      if (!decision.allowed) {
        const message = await services.messages.emit(breakerPolicy.onBlockedMessage, target);
        logger.warn(
          ExecutionLogFormatter.transition(execution.indentLevel, workflowName, stage.name, 'circuit-blocked', `retry after ${decision.retryAfterMs}ms`),
          undefined,
          LogCategory.RUNTIME,
        );
        await services.events.emit(
          createEvent(
            EngineEventType.CIRCUIT_BLOCKED,
            { breakerName: breaker.name, retryAfterMs: decision.retryAfterMs, message },
            origin,
          ),
        );
        throw new CircuitOpenError({
          workflowName,
          stageName: stage.name,
          breakerName: breaker.name,
          retryAfterMs: decision.retryAfterMs,
        });
      }
    }

    const useMock = options.mocked && stage.mock !== undefined;
    let request: EndpointRequest | undefined;
    try {
      request = useMock ? undefined : this.buildRequest(stage, ctx);
    } catch (error) {
      if (breaker && breakerSnapshot) {
        breaker.restore(breakerSnapshot);
      }
      throw error;
    }

    if (request && options.verbose) {
      logger.info(
        ExecutionLogFormatter.stageLine(execution.indentLevel, workflowName, stage.name, `request: ${request.method} ${request.url}`),
        undefined,
        LogCategory.RUNTIME,
      );
    }

    const outcome = await RetryExecutor.execute<EndpointResponse>(
      async () => (request ? services.endpointInvoker.invoke(request, signal) : this.mockResponse(stage, ctx)),
      retryPolicy ?? NO_RETRIES,
      {
        signal,
        sleep: services.sleep,
        shouldRetryResult: (response) => retryPolicy?.isRetryableStatus(response.status) ?? false,
        shouldRetryError: (error) => error instanceof TransportError,
        listeners: {
          onRetry: async (reason, delayMs, retryContext) => {
            const cause = reason.error ? `after error: ${reason.error.message}` : `after status ${reason.result?.status}`;
            logger.info(
              ExecutionLogFormatter.transition(
                execution.indentLevel,
                workflowName,
                stage.name,
                'retry',
                `in ${delayMs}ms ${cause} (retry ${retryContext.attempt}/${retryContext.maxRetries})`,
              ),
              undefined,
              LogCategory.RUNTIME,
            );
            await services.events.emit(
              createEvent(
                EngineEventType.STAGE_RETRYING,
                {
                  attempt: retryContext.attempt,
                  maxRetries: retryContext.maxRetries,
                  delayMs,
                  status: reason.result?.status,
                  error: reason.error,
                },
                origin,
              ),
            );
          },
        },
      },
    );

    if (outcome.status === 'aborted' || signal?.aborted) {
      // An interrupted trial must not move the breaker
      if (breaker && breakerSnapshot) {
        breaker.restore(breakerSnapshot);
      }
      throw new WorkflowCancelledError(workflowName, stage.name);
    }

    if (outcome.status === 'failed' && outcome.error && !(outcome.error instanceof TransportError)) {
      if (breaker && breakerSnapshot) {
        breaker.restore(breakerSnapshot);
      }
      throw outcome.error;
    }

    const response = outcome.result;
    if (!response) {
      if (breaker && breakerPolicy) {
        await this.recordFailure(breaker, breakerPolicy, ctx, stage.name);
      }
      await services.messages.emit(retryPolicy?.onExceptionMessage, target, LogLevel.ERROR);

      const error = outcome.error ?? new Error('no response');
      if (outcome.retries > 0) {
        throw new RetryExhaustedError({ workflowName, stageName: stage.name, attempts: outcome.attempts, cause: error });
      }
      throw error instanceof TransportError
        ? error.withStage(workflowName, stage.name)
        : new StageFailureError({ workflowName, stageName: stage.name, message: error.message, cause: error });
    }

    if (breaker && breakerPolicy) {
      if (retryPolicy?.isRetryableStatus(response.status)) {
        await this.recordFailure(breaker, breakerPolicy, ctx, stage.name);
      } else {
        breaker.recordSuccess();
      }
    }

    if (request) {
      this.logProblemResponse(request, response, ctx, stage.name);
    }

    this.captureOutputs(stage, ctx, response);
    await services.messages.emit(stage.message, { ...target, response });

    const jumpTo = stage.jumpOnStatus?.[String(response.status)];
    if (jumpTo !== undefined) {
      return { jumpTo, status: response.status, retries: outcome.retries };
    }

    if (stage.expectedStatus !== undefined && response.status !== stage.expectedStatus) {
      const details = {
        workflowName,
        stageName: stage.name,
        status: response.status,
        expectedStatus: stage.expectedStatus,
      };
      if (outcome.status === 'exhausted' && outcome.retries > 0) {
        throw new RetryExhaustedError({ ...details, attempts: outcome.attempts });
      }
      throw new StageFailureError({
        ...details,
        message: `Stage '${stage.name}' returned ${response.status} but expected ${stage.expectedStatus}.`,
      });
    }

    return { status: response.status, retries: outcome.retries };
  }

  /**
   * Breakers live in the execution context, keyed by policy name
   */
  private breakerFor(policy: CircuitBreakerPolicy, ctx: StageExecutionContext): CircuitBreaker {
    const breakers = ctx.execution.circuitBreakers;
    const existing = breakers.get(policy.name);
    if (existing) {
      existing.usePolicy(policy);
      return existing;
    }
    const breaker = new CircuitBreaker(policy, ctx.services.clock);
    breakers.set(policy.name, breaker);
    return breaker;
  }

  private async recordFailure(
    breaker: CircuitBreaker,
    policy: CircuitBreakerPolicy,
    ctx: StageExecutionContext,
    stageName: string,
  ): Promise<void> {
    if (!breaker.recordFailure()) {
      return;
    }

    const { execution, services } = ctx;
    const workflowName = ctx.document.definition.name;
    const message = await services.messages.emit(policy.onOpenMessage, { workflowName, stageName, execution });
    const breakMs = policy.breakMs;

    LoggerManager.getLogger().warn(
      ExecutionLogFormatter.transition(execution.indentLevel, workflowName, stageName, 'circuit-open', `${breaker.name} for ${breakMs}ms`),
      undefined,
      LogCategory.RUNTIME,
    );
    await services.events.emit(
      createEvent(
        EngineEventType.CIRCUIT_OPENED,
        { breakerName: breaker.name, breakMs, message },
        { workflowName, stageName, depth: execution.indentLevel },
      ),
    );
  }

  private buildRequest(stage: WorkflowStageDefinition, ctx: StageExecutionContext): EndpointRequest {
    const { execution, services, document } = ctx;
    const resolver = services.templateResolver;

    if (!stage.apiRef || !stage.endpoint || !stage.httpVerb) {
      throw ConfigurationError.unresolvedReference(
        'Endpoint stage field',
        !stage.apiRef ? 'apiRef' : !stage.endpoint ? 'endpoint' : 'httpVerb',
        `stages.${stage.name}`,
      );
    }

    const baseUrl = services.baseUrlResolver.resolve(stage.apiRef, document);
    return HttpRequestBuilder.for(stage.httpVerb, baseUrl, resolver.resolve(stage.endpoint, execution))
      .query(resolver.resolveMap(stage.query, execution))
      .headers(resolver.resolveMap(stage.headers, execution))
      .body(resolver.resolveOptional(stage.body, execution))
      .build();
  }

  private async mockResponse(stage: WorkflowStageDefinition, ctx: StageExecutionContext): Promise<EndpointResponse> {
    const { services, execution, document } = ctx;
    const mock = stage.mock ?? {};

    const raw = services.mockPayloadService.resolvePayload(mock, document.filePath, stage.name);
    const payload = services.templateResolver.resolve(raw, execution);
    const jsonError = MockPayloadService.jsonError(payload);
    if (jsonError !== undefined) {
      throw ConfigurationError.invalidMock(stage.name, `mock payload is not valid JSON: ${jsonError}`);
    }

    return {
      status: mock.status ?? stage.expectedStatus ?? 200,
      body: payload,
      headers: {},
      json: HttpResponseParser.tryParseJson(payload),
    };
  }

  /**
   * `output` sees the response; `set` and `context` also see the fresh output
   */
  private captureOutputs(stage: WorkflowStageDefinition, ctx: StageExecutionContext, response: EndpointResponse): void {
    const { execution, services } = ctx;
    const resolver = services.templateResolver;

    const output = resolver.resolveMap(stage.output, execution, response);
    if (!Object.hasOwn(output, 'http_status')) {
      output.http_status = String(response.status);
    }
    execution.endpointOutputs.set(stage.name, output);
    applyStageBindings(stage, execution, resolver, response);
  }

  private logProblemResponse(request: EndpointRequest, response: EndpointResponse, ctx: StageExecutionContext, stageName: string): void {
    const { execution, options } = ctx;
    const workflowName = ctx.document.definition.name;
    const logger = LoggerManager.getLogger();
    const line = (text: string): string => ExecutionLogFormatter.stageLine(execution.indentLevel, workflowName, stageName, text);

    if (options.verbose) {
      logger.info(line(`response status: ${response.status}.`), undefined, LogCategory.RUNTIME);
    }
    if (response.status === 400) {
      logger.error(line(`returned 400. Response body: ${response.body.trim() ? response.body : '<empty>'}`), undefined, undefined, LogCategory.RUNTIME);
      if (options.verbose) {
        logger.error(line(`request body: ${request.body ?? '<empty>'}`), undefined, undefined, LogCategory.RUNTIME);
      }
    }
    if (response.status === 404) {
      logger.error(line(`returned 404 for url: ${request.url}`), undefined, undefined, LogCategory.RUNTIME);
    }
  }
}
