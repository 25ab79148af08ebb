/**
 * Mock Payload Service
 *
 * Supplies the raw payload text of an endpoint stage's `mock` block, from
 * `payload` inline or `payloadFile` beside the workflow.
 *
 * @module services
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import type { StageMockDefinition } from '../types/definitions.js';

export class MockPayloadService {
  /**
   * Raw (unresolved) payload text
   *
   * @param workflowPath - Absolute path of the workflow declaring the mock
   * @throws {ConfigurationError} When both or neither source is set, or the file is missing
   */
  resolvePayload(mock: StageMockDefinition, workflowPath: string, stageName = '<stage>'): string {
    const hasPayload = Boolean(mock.payload && mock.payload.trim());
    const hasFile = Boolean(mock.payloadFile && mock.payloadFile.trim());

    if (hasPayload && hasFile) {
      throw ConfigurationError.invalidMock(stageName, 'mock cannot define both payload and payloadFile.');
    }
    if (hasFile && mock.payloadFile) {
      return this.loadFromFile(mock.payloadFile, workflowPath);
    }
    if (hasPayload && mock.payload) {
      return mock.payload;
    }
    throw ConfigurationError.invalidMock(stageName, 'mock payload is required.');
  }

  /**
   * Absolute location of a payload file relative to its workflow
   */
  resolvePayloadPath(payloadFile: string, workflowPath: string): string {
    return isAbsolute(payloadFile) ? payloadFile : resolve(dirname(workflowPath), payloadFile);
  }

  loadFromFile(payloadFile: string, workflowPath: string): string {
    const resolvedPath = this.resolvePayloadPath(payloadFile, workflowPath);
    if (!existsSync(resolvedPath)) {
      throw ConfigurationError.fileNotFound('Mock payload file', resolvedPath);
    }
    return readFileSync(resolvedPath, 'utf-8');
  }

  /**
   * Make a templated payload parseable: quoted tokens become a string,
   * bare tokens become 0
   */
  static sanitizeForValidation(json: string): string {
    return json.replace(/"\s*\{\{.+?\}\}\s*"/g, '"__token__"').replace(/\{\{.+?\}\}/g, '0');
  }

  /**
   * @returns The parse error message, or undefined when the text is valid JSON
   */
  static jsonError(json: string): string | undefined {
    try {
      JSON.parse(json);
      return undefined;
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }
  }
}
