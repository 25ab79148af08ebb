/**
 * Stage Execution Errors
 *
 * StageFailureError is raised when a stage ends in a state the workflow does
 * not accept. RetryExhaustedError, CircuitOpenError and TransportError
 * specialize it with the metadata the CLI and event listeners need.
 *
 * @module errors
 */

import { StageflowError } from './StageflowError.js';
import { StageflowErrorCode, ErrorSeverity } from './ErrorCodes.js';

export interface StageFailureDetails {
  workflowName: string;
  stageName: string;
  /** Final response status, when a response exists */
  status?: number;
  expectedStatus?: number;
  message?: string;
  cause?: unknown;
}

export class StageFailureError extends StageflowError {
  public readonly workflowName: string;
  public readonly stageName: string;
  public readonly status?: number;

  constructor(details: StageFailureDetails, code: StageflowErrorCode = StageflowErrorCode.EXECUTION_STAGE_FAILED) {
    super({
      code,
      message:
        details.message ??
        `Stage '${details.stageName}' returned status ${details.status ?? 'none'} (expected ${details.expectedStatus ?? 'n/a'}).`,
      path: `stages.${details.stageName}`,
      severity: ErrorSeverity.ERROR,
      context: {
        workflow: details.workflowName,
        stage: details.stageName,
        status: details.status,
        expectedStatus: details.expectedStatus,
      },
      cause: details.cause,
    });
    this.workflowName = details.workflowName;
    this.stageName = details.stageName;
    this.status = details.status;
  }
}

export class RetryExhaustedError extends StageFailureError {
  /** Calls made, including the first */
  public readonly attempts: number;
  public readonly retries: number;

  constructor(details: StageFailureDetails & { attempts: number }) {
    super(
      {
        ...details,
        message:
          details.message ??
          `Stage '${details.stageName}' failed after ${details.attempts} attempt(s); last status ${details.status ?? 'none'}.`,
      },
      StageflowErrorCode.EXECUTION_RETRY_EXHAUSTED,
    );
    this.attempts = details.attempts;
    this.retries = Math.max(0, details.attempts - 1);
  }
}

export class CircuitOpenError extends StageFailureError {
  public readonly breakerName: string;
  /** Milliseconds until the breaker admits a trial call */
  public readonly retryAfterMs: number;

  constructor(details: StageFailureDetails & { breakerName: string; retryAfterMs: number }) {
    super(
      {
        ...details,
        message:
          details.message ??
          `Circuit breaker '${details.breakerName}' is open; stage '${details.stageName}' was blocked for another ${details.retryAfterMs}ms.`,
      },
      StageflowErrorCode.EXECUTION_CIRCUIT_OPEN,
    );
    this.breakerName = details.breakerName;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/**
 * Network failure or transport timeout. The invoker raises it without a
 * stage; the endpoint executor rethrows it with stage details attached.
 */
export class TransportError extends StageFailureError {
  public readonly method: string;
  public readonly url: string;

  constructor(details: { method: string; url: string; cause?: unknown; workflowName?: string; stageName?: string }) {
    const reason = details.cause instanceof Error ? details.cause.message : String(details.cause ?? 'unknown error');
    super(
      {
        workflowName: details.workflowName ?? '',
        stageName: details.stageName ?? '',
        message: `HTTP ${details.method} ${details.url} failed: ${reason}`,
        cause: details.cause,
      },
      StageflowErrorCode.EXECUTION_TRANSPORT,
    );
    this.method = details.method;
    this.url = details.url;
  }

  withStage(workflowName: string, stageName: string): TransportError {
    return new TransportError({ method: this.method, url: this.url, cause: this.cause, workflowName, stageName });
  }
}

export class WorkflowCancelledError extends StageflowError {
  constructor(workflowName: string, stageName?: string) {
    super({
      code: StageflowErrorCode.EXECUTION_CANCELLED,
      message: stageName
        ? `Workflow '${workflowName}' was cancelled during stage '${stageName}'.`
        : `Workflow '${workflowName}' was cancelled.`,
      severity: ErrorSeverity.FATAL,
      context: { workflow: workflowName, stage: stageName },
    });
  }
}

export class TransitionLimitError extends StageflowError {
  constructor(workflowName: string, limit: number) {
    super({
      code: StageflowErrorCode.EXECUTION_TRANSITION_LIMIT,
      message: `Workflow '${workflowName}' exceeded ${limit} stage transitions; check jumpOnStatus for loops.`,
      severity: ErrorSeverity.ERROR,
      context: { workflow: workflowName, limit },
    });
  }
}
