/**
 * Plan Renderer
 *
 * Turns a WorkflowPlan into plain text lines. Nested plans are indented
 * under the stage that calls them. Colouring is left to the caller.
 *
 * @module planning
 */

import type { StagePlan, WorkflowPlan } from './PlanTypes.js';

const RULE = '━'.repeat(52);

export interface PlanRenderOptions {
  /** Show headers, query, body, inputs and bindings */
  verbose?: boolean;
}

export class PlanRenderer {
  static render(plan: WorkflowPlan, options: PlanRenderOptions = {}): string[] {
    return [RULE, '📋 WORKFLOW PLAN', RULE, '', ...this.renderWorkflow(plan, 0, options.verbose ?? false)];
  }

  private static renderWorkflow(plan: WorkflowPlan, depth: number, verbose: boolean): string[] {
    const pad = '   '.repeat(depth);
    if (plan.alreadyIncluded) {
      return [`${pad}↺ ${plan.name}: ${plan.filePath}`];
    }

    const lines = [`${pad}Workflow: ${plan.name} (id ${plan.id}, version ${plan.version})`, `${pad}File: ${plan.filePath}`];
    if (plan.description) {
      lines.push(`${pad}Description: ${plan.description}`);
    }

    if (plan.inputs.length > 0) {
      lines.push(`${pad}Inputs:`);
      for (const input of plan.inputs) {
        lines.push(`${pad}   • ${input.name}${(input.required ?? true) ? ' (required)' : ''}`);
      }
    }
    if (verbose) {
      lines.push(...renderMap(pad, 'Init context', plan.initContext));
    }

    lines.push(`${pad}Stages:`);
    plan.stages.forEach((stage, index) => {
      lines.push(...this.renderStage(stage, index + 1, depth, verbose));
    });

    if (plan.outputEnabled || Object.keys(plan.output).length > 0) {
      lines.push(...renderMap(pad, plan.outputEnabled ? 'Output (written to file)' : 'Output', plan.output));
    }
    if (verbose) {
      lines.push(...renderMap(pad, 'End context', plan.endContext));
    }
    return lines;
  }

  private static renderStage(stage: StagePlan, position: number, depth: number, verbose: boolean): string[] {
    const pad = '   '.repeat(depth + 1);
    const detail = `${pad}   `;
    const lines = [`${pad}${position}. ${stage.name} [${stage.kind}]${stage.mocked ? ' (mock available)' : ''}`];

    if (stage.runIf) {
      lines.push(`${detail}runIf: ${stage.runIf}`);
    }
    if (stage.delaySeconds) {
      lines.push(`${detail}delay: ${stage.delaySeconds}s`);
    }
    if (stage.endpoint !== undefined) {
      lines.push(`${detail}${stage.httpVerb ?? '?'} ${stage.apiRef ?? '?'}:${stage.endpoint} → expects ${stage.expectedStatus ?? '?'}`);
    }
    if (stage.workflowRef !== undefined) {
      lines.push(`${detail}calls: ${stage.workflowRef}${stage.allowVersion ? ` (allows version ${stage.allowVersion})` : ''}`);
    }
    for (const [status, target] of Object.entries(stage.jumpOnStatus ?? {})) {
      lines.push(`${detail}on ${status} → ${target}`);
    }
    if (stage.retry) {
      lines.push(
        `${detail}retry: ${stage.retry.maxRetries}x every ${stage.retry.delayMs}ms on ${stage.retry.httpStatus.join(', ')}`,
      );
    }
    if (stage.circuitBreaker) {
      const breaker = stage.circuitBreaker;
      lines.push(
        `${detail}circuit breaker '${breaker.name}': opens after ${breaker.failureThreshold} failures for ${breaker.breakMs}ms`,
      );
    }

    if (verbose) {
      lines.push(...renderMap(detail, 'headers', stage.headers));
      lines.push(...renderMap(detail, 'query', stage.query));
      if (stage.body) {
        lines.push(`${detail}body: ${stage.body}`);
      }
      lines.push(...renderMap(detail, 'inputs', stage.inputs));
      lines.push(...renderMap(detail, 'output', stage.output));
      lines.push(...renderMap(detail, 'set', stage.set));
      lines.push(...renderMap(detail, 'context', stage.context));
    }

    if (stage.nested) {
      lines.push(...this.renderWorkflow(stage.nested, depth + 2, verbose));
    }
    return lines;
  }
}

function renderMap(pad: string, title: string, map: Readonly<Record<string, string>> | undefined): string[] {
  const entries = Object.entries(map ?? {});
  if (entries.length === 0) {
    return [];
  }
  return [`${pad}${title}:`, ...entries.map(([key, value]) => `${pad}   • ${key}: ${value}`)];
}
