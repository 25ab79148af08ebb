/**
 * Workflow Loader
 *
 * ARCHITECTURAL ROLE:
 * ===================
 * I/O layer between workflow files and the engine.
 *
 * Responsibilities:
 * - Reading workflow files from disk
 * - YAML/JSON parsing and schema validation (through WorkflowParser)
 * - Loading the workflow's environment file and merging overrides
 *
 * Does NOT:
 * - Execute workflows (that's WorkflowExecutor)
 * - Check references or templates (that's WorkflowValidator)
 *
 * Example:
 * ```ts
 * const loader = new WorkflowLoader();
 * const document = await loader.load('./flows/orders.workflow', { TENANT: 'acme' });
 * ```
 *
 * @module loader
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import { WorkflowParser } from '../parser/WorkflowParser.js';
import { ConfigurationError, ErrorSeverity, StageflowError, StageflowErrorCode } from '../errors/index.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogCategory } from '../types/log-types.js';
import { KeyValueFileLoader } from './KeyValueFileLoader.js';
import type { WorkflowDefinition, WorkflowDocument } from '../types/definitions.js';

/**
 * Source of workflow documents for the engine and for nested workflow stages
 */
export interface DocumentLoader {
  /**
   * @param workflowPath - Absolute, or relative to the current directory
   * @param envOverrides - Values that win over the environment file
   * @param envFile - Environment file used instead of `references.environmentFile`,
   *                  relative to the current directory
   */
  load(workflowPath: string, envOverrides?: Readonly<Record<string, string>>, envFile?: string): Promise<WorkflowDocument>;
}

export class WorkflowLoader implements DocumentLoader {
  /**
   * Load, parse and validate a workflow file
   *
   * PIPELINE:
   * 1. Validate file exists
   * 2. Read and parse (format from the extension, YAML by default)
   * 3. Load the environment file, then apply overrides
   */
  async load(
    workflowPath: string,
    envOverrides?: Readonly<Record<string, string>>,
    envFile?: string,
  ): Promise<WorkflowDocument> {
    const filePath = resolve(workflowPath);
    if (!existsSync(filePath)) {
      throw ConfigurationError.fileNotFound('Workflow file', filePath);
    }

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new StageflowError({
        code: StageflowErrorCode.RUNTIME_IO_ERROR,
        message: `Failed to read workflow file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        severity: ErrorSeverity.ERROR,
        cause: error,
      });
    }

    const definition = WorkflowParser.parse(content, filePath, WorkflowParser.detectFormat(filePath));
    const environmentVariables = await this.resolveEnvironment(definition, filePath, envOverrides, envFile);

    LoggerManager.getLogger().debug(
      `Loaded workflow '${definition.name}'`,
      { path: filePath, stages: definition.stages.length },
      LogCategory.ANALYSIS,
    );

    return { definition, filePath, environmentVariables };
  }

  /**
   * Resolve a workflow reference path against the workflow that declares it
   */
  static resolveReferencePath(parentFilePath: string, referencePath: string): string {
    return isAbsolute(referencePath) ? referencePath : resolve(dirname(parentFilePath), referencePath);
  }

  private async resolveEnvironment(
    definition: WorkflowDefinition,
    filePath: string,
    envOverrides: Readonly<Record<string, string>> | undefined,
    envFileOverride: string | undefined,
  ): Promise<Record<string, string>> {
    const envFile = envFileOverride ?? definition.references?.environmentFile;
    const variables: Record<string, string> = {};

    if (envFile && envFile.trim()) {
      const baseDirectory = envFileOverride === undefined ? dirname(filePath) : process.cwd();
      const envPath = isAbsolute(envFile) ? envFile : resolve(baseDirectory, envFile);
      Object.assign(variables, await KeyValueFileLoader.load(envPath));
    }

    return { ...variables, ...(envOverrides ?? {}) };
  }
}
