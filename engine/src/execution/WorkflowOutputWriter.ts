/**
 * Workflow Output Writer
 *
 * Writes a workflow's end-stage output to
 * `<workflow dir>/output/<name>.<id>.<ulid>.workflow.output` as indented
 * JSON. With `outputJson` (the default) values holding a JSON object or
 * array are written as structures instead of strings.
 *
 * @module execution
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { ulid } from '../utils/ulid.js';
import type { WorkflowDocument } from '../types/definitions.js';

export interface OutputWriter {
  /**
   * @returns The written file path
   */
  write(document: WorkflowDocument, output: Readonly<Record<string, string>>): Promise<string>;
}

export class WorkflowOutputWriter implements OutputWriter {
  async write(document: WorkflowDocument, output: Readonly<Record<string, string>>): Promise<string> {
    const { definition } = document;
    const outputDirectory = join(dirname(document.filePath), 'output');
    await mkdir(outputDirectory, { recursive: true });

    const fileName = `${definition.name.replace(/ /g, '-')}.${definition.id}.${ulid()}.workflow.output`;
    const filePath = join(outputDirectory, fileName);
    const payload = WorkflowOutputWriter.buildPayload(output, definition.endStage?.outputJson ?? true);
    await writeFile(filePath, JSON.stringify(payload, null, 2), 'utf-8');
    return filePath;
  }

  static buildPayload(output: Readonly<Record<string, string>>, expandJson: boolean): Record<string, unknown> {
    const payload: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(output)) {
      payload[key] = expandJson ? parseStructure(value) ?? value : value;
    }
    return payload;
  }
}

function parseStructure(value: string): unknown {
  const trimmed = value.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return undefined;
  }
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}
