/**
 * In-Memory Document Loader
 *
 * Serves workflow definitions registered by path, schema-checked the same
 * way files are. Paths are resolved like WorkflowLoader resolves them.
 *
 * @module testing
 */

import { resolve } from 'path';
import { ConfigurationError } from '../errors/index.js';
import { SchemaValidator } from '../parser/SchemaValidator.js';
import type { DocumentLoader } from '../loader/WorkflowLoader.js';
import type { WorkflowDocument } from '../types/definitions.js';

interface StoredWorkflow {
  raw: unknown;
  environmentVariables: Record<string, string>;
}

export class InMemoryDocumentLoader implements DocumentLoader {
  private readonly workflows = new Map<string, StoredWorkflow>();
  private loadCount = 0;

  /**
   * @param raw - Workflow data as a parser would produce it
   */
  add(workflowPath: string, raw: unknown, environmentVariables: Record<string, string> = {}): this {
    this.workflows.set(resolve(workflowPath), { raw, environmentVariables });
    return this;
  }

  remove(workflowPath: string): boolean {
    return this.workflows.delete(resolve(workflowPath));
  }

  async load(workflowPath: string, envOverrides?: Readonly<Record<string, string>>): Promise<WorkflowDocument> {
    const filePath = resolve(workflowPath);
    const stored = this.workflows.get(filePath);
    if (!stored) {
      throw ConfigurationError.fileNotFound('Workflow file', filePath);
    }
    this.loadCount++;
    return {
      definition: SchemaValidator.validate(stored.raw),
      filePath,
      environmentVariables: { ...stored.environmentVariables, ...(envOverrides ?? {}) },
    };
  }

  getLoadCount(): number {
    return this.loadCount;
  }
}
