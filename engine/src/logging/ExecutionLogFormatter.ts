/**
 * Stage transition log lines
 *
 * Every line is tagged `[workflow]#stage` and indented two spaces per
 * nesting level so nested workflow output reads as a tree.
 *
 * @module logging
 */

export type StageTransition = 'invoke' | 'skip' | 'jump' | 'retry' | 'circuit-open' | 'circuit-blocked' | 'complete' | 'fail';

export class ExecutionLogFormatter {
  static indent(level: number): string {
    return level > 0 ? '  '.repeat(level) : '';
  }

  static workflowTag(workflowName: string): string {
    return `[${workflowName}]`;
  }

  static stageTag(workflowName: string, stageName: string): string {
    return `[${workflowName}]#${stageName}`;
  }

  static workflowLine(level: number, workflowName: string, text: string): string {
    return `${this.indent(level)}${this.workflowTag(workflowName)} ${text}`;
  }

  static stageLine(level: number, workflowName: string, stageName: string, text: string): string {
    return `${this.indent(level)}${this.stageTag(workflowName, stageName)} ${text}`;
  }

  static transition(
    level: number,
    workflowName: string,
    stageName: string,
    transition: StageTransition,
    detail?: string,
  ): string {
    return this.stageLine(level, workflowName, stageName, detail ? `${transition}: ${detail}` : transition);
  }
}
