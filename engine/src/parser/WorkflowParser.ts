/**
 * Workflow Parser
 *
 * Turns YAML or JSON text into a validated WorkflowDefinition.
 *
 * @module parser
 */

import YAML from 'yaml';
import { SchemaValidator } from './SchemaValidator.js';
import { SchemaError } from '../errors/index.js';
import type { ApiCatalogVersion, WorkflowDefinition } from '../types/definitions.js';

export type DocumentFormat = 'yaml' | 'json';

export class WorkflowParser {
  /**
   * Parse workflow text
   *
   * @param content - File contents
   * @param source - File path or label used in error messages
   */
  static parse(content: string, source: string = '<inline>', format: DocumentFormat = 'yaml'): WorkflowDefinition {
    return SchemaValidator.validate(this.parseRaw(content, source, format));
  }

  /**
   * Validate an already-parsed object
   */
  static fromObject(raw: unknown): WorkflowDefinition {
    return SchemaValidator.validate(raw);
  }

  static parseCatalog(content: string, source: string, format: DocumentFormat = 'json'): ApiCatalogVersion[] {
    return SchemaValidator.validateCatalog(this.parseRaw(content, source, format));
  }

  static detectFormat(filePath: string): DocumentFormat {
    return filePath.toLowerCase().endsWith('.json') ? 'json' : 'yaml';
  }

  private static parseRaw(content: string, source: string, format: DocumentFormat): unknown {
    if (!content.trim()) {
      throw SchemaError.parseError(source, 'file is empty');
    }
    try {
      return format === 'json' ? JSON.parse(content) : YAML.parse(content);
    } catch (error) {
      throw SchemaError.parseError(source, error instanceof Error ? error.message : String(error));
    }
  }
}
