/**
 * Event Types and Interfaces
 *
 * Events are emitted at each workflow and stage lifecycle moment. The CLI
 * formatters, tests and host applications consume them through the EventBus.
 */

/**
 * Engine-wide event types
 */
export enum EngineEventType {
  // Workflow-level events
  WORKFLOW_STARTED = 'workflow.started',
  WORKFLOW_COMPLETED = 'workflow.completed',
  WORKFLOW_FAILED = 'workflow.failed',

  // Stage-level events
  STAGE_STARTED = 'stage.started',
  STAGE_COMPLETED = 'stage.completed',
  STAGE_SKIPPED = 'stage.skipped',
  STAGE_FAILED = 'stage.failed',
  STAGE_JUMPED = 'stage.jumped',
  STAGE_RETRYING = 'stage.retrying',
  STAGE_MESSAGE = 'stage.message',

  // Circuit breaker events
  CIRCUIT_OPENED = 'circuit.opened',
  CIRCUIT_BLOCKED = 'circuit.blocked',
}

export interface WorkflowStartedPayload {
  workflowId: string;
  version: string;
  totalStages: number;
  mocked: boolean;
}

export interface WorkflowCompletedPayload {
  status: 'Ok' | 'Error';
  message?: string;
  durationMs: number;
  completedStages: number;
  skippedStages: number;
  failedStages: number;
}

export interface WorkflowFailedPayload {
  error: Error;
  durationMs: number;
}

export interface StageStartedPayload {
  kind: string;
  index: number;
}

export interface StageCompletedPayload {
  kind: string;
  durationMs: number;
  /** HTTP status for endpoint stages */
  status?: number;
  retries?: number;
  jumpTo?: string;
}

export interface StageSkippedPayload {
  reason: string;
}

export interface StageFailedPayload {
  kind: string;
  error: Error;
  /** False when the stage kind records failures without aborting */
  fatal: boolean;
  durationMs: number;
}

export interface StageJumpedPayload {
  to: string;
  status?: number;
}

export interface StageRetryingPayload {
  /** Attempt that just failed, 1-based */
  attempt: number;
  maxRetries: number;
  delayMs: number;
  status?: number;
  error?: Error;
}

export interface StageMessagePayload {
  message: string;
}

export interface CircuitOpenedPayload {
  breakerName: string;
  breakMs: number;
  message?: string;
}

export interface CircuitBlockedPayload {
  breakerName: string;
  retryAfterMs: number;
  message?: string;
}

export interface EngineEventPayloads {
  [EngineEventType.WORKFLOW_STARTED]: WorkflowStartedPayload;
  [EngineEventType.WORKFLOW_COMPLETED]: WorkflowCompletedPayload;
  [EngineEventType.WORKFLOW_FAILED]: WorkflowFailedPayload;
  [EngineEventType.STAGE_STARTED]: StageStartedPayload;
  [EngineEventType.STAGE_COMPLETED]: StageCompletedPayload;
  [EngineEventType.STAGE_SKIPPED]: StageSkippedPayload;
  [EngineEventType.STAGE_FAILED]: StageFailedPayload;
  [EngineEventType.STAGE_JUMPED]: StageJumpedPayload;
  [EngineEventType.STAGE_RETRYING]: StageRetryingPayload;
  [EngineEventType.STAGE_MESSAGE]: StageMessagePayload;
  [EngineEventType.CIRCUIT_OPENED]: CircuitOpenedPayload;
  [EngineEventType.CIRCUIT_BLOCKED]: CircuitBlockedPayload;
}

/**
 * Event of one specific type
 */
export interface EngineEventOf<K extends EngineEventType> {
  type: K;

  /** Unix timestamp in milliseconds */
  timestamp: number;

  workflowName: string;

  stageName?: string;

  /** Nesting depth, 0 for the root workflow */
  depth: number;

  payload: EngineEventPayloads[K];
}

/**
 * Any engine event, discriminated on `type`
 */
export type EngineEvent = { [K in EngineEventType]: EngineEventOf<K> }[EngineEventType];

export interface EventOrigin {
  workflowName: string;
  stageName?: string;
  depth?: number;
}

export function createEvent<K extends EngineEventType>(
  type: K,
  payload: EngineEventPayloads[K],
  origin: EventOrigin,
): EngineEventOf<K> {
  return {
    type,
    timestamp: Date.now(),
    workflowName: origin.workflowName,
    stageName: origin.stageName,
    depth: origin.depth ?? 0,
    payload,
  };
}

export function isEventOf<K extends EngineEventType>(
  event: { type: EngineEventType },
  type: K,
): event is EngineEventOf<K> {
  return event.type === type;
}
