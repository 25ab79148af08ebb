/**
 * Workflow Planner
 *
 * Builds the plan tree shown by `--dry-run` and the `plan` command. Verbose
 * plans load referenced workflows and nest their plans; a workflow that is
 * already part of the tree is marked "Already included" instead of being
 * expanded again.
 *
 * @module planning
 */

import { CircuitBreakerPolicy } from '../automation/CircuitBreakerPolicy.js';
import { RetryPolicy } from '../automation/RetryPolicy.js';
import { WorkflowLoader, type DocumentLoader } from '../loader/WorkflowLoader.js';
import type { StagePlan, WorkflowPlan } from './PlanTypes.js';
import type { WorkflowDefinition, WorkflowDocument, WorkflowStageDefinition } from '../types/definitions.js';

export const ALREADY_INCLUDED = 'Already included';

export class WorkflowPlanner {
  constructor(private readonly documentLoader: DocumentLoader) {}

  buildPlan(document: WorkflowDocument, verbose: boolean): Promise<WorkflowPlan> {
    return this.plan(document, verbose, new Set());
  }

  private async plan(document: WorkflowDocument, verbose: boolean, visited: Set<string>): Promise<WorkflowPlan> {
    visited.add(document.filePath.toLowerCase());
    const definition = document.definition;
    const stages: StagePlan[] = [];

    for (const stage of definition.stages) {
      const nested = verbose ? await this.planReference(document, stage, visited) : undefined;
      stages.push(planStage(stage, definition, nested));
    }

    return {
      name: definition.name,
      id: definition.id,
      version: definition.version,
      filePath: document.filePath,
      description: definition.description,
      inputs: definition.input ?? [],
      stages,
      output: { ...(definition.endStage?.output ?? {}) },
      outputEnabled: definition.output ?? false,
      initContext: definition.initStage?.context,
      endContext: definition.endStage?.context,
    };
  }

  private async planReference(
    document: WorkflowDocument,
    stage: WorkflowStageDefinition,
    visited: Set<string>,
  ): Promise<WorkflowPlan | undefined> {
    const workflowRef = stage.workflowRef?.trim();
    if (!workflowRef) {
      return undefined;
    }
    const reference = document.definition.references?.workflows?.find(
      (item) => item.name.toLowerCase() === workflowRef.toLowerCase(),
    );
    if (!reference) {
      return undefined;
    }

    const referencePath = WorkflowLoader.resolveReferencePath(document.filePath, reference.path);
    if (visited.has(referencePath.toLowerCase())) {
      return {
        name: ALREADY_INCLUDED,
        id: '',
        version: '',
        filePath: referencePath,
        inputs: [],
        stages: [],
        output: {},
        outputEnabled: false,
        alreadyIncluded: true,
      };
    }

    const child = await this.documentLoader.load(referencePath, document.environmentVariables);
    return this.plan(child, true, visited);
  }
}

function planStage(stage: WorkflowStageDefinition, definition: WorkflowDefinition, nested: WorkflowPlan | undefined): StagePlan {
  const retry = RetryPolicy.resolve(stage.retry, definition);
  const breaker = CircuitBreakerPolicy.resolve(stage.circuitBreaker, stage.name, definition);

  return {
    name: stage.name,
    kind: stage.kind,
    runIf: stage.runIf,
    delaySeconds: stage.delaySeconds,
    apiRef: stage.apiRef,
    httpVerb: stage.httpVerb?.toUpperCase(),
    endpoint: stage.endpoint,
    expectedStatus: stage.expectedStatus,
    headers: stage.headers,
    query: stage.query,
    body: stage.body,
    jumpOnStatus: stage.jumpOnStatus,
    retry: retry
      ? { maxRetries: retry.maxRetries, delayMs: retry.delayMs, httpStatus: Array.from(retry.retryStatuses) }
      : undefined,
    circuitBreaker: breaker
      ? {
          name: breaker.name,
          failureThreshold: breaker.failureThreshold,
          breakMs: breaker.breakMs,
          closeOnSuccessAttempts: breaker.closeOnSuccessAttempts,
        }
      : undefined,
    workflowRef: stage.workflowRef,
    inputs: stage.inputs,
    allowVersion: stage.allowVersion,
    mocked: stage.mock !== undefined,
    output: { ...(stage.output ?? {}) },
    set: stage.set,
    context: stage.context,
    nested,
  };
}
