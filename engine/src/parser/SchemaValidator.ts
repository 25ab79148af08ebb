/**
 * Schema Validator
 *
 * Validates raw workflow and catalog data against the zod schemas and turns
 * zod issues into SchemaErrors with document paths.
 *
 * @module parser
 */

import { z } from 'zod';
import { SchemaError, StageflowError } from '../errors/index.js';
import { ApiCatalogSchema, WorkflowDefinitionSchema } from './WorkflowSchema.js';
import type { ApiCatalogVersion, WorkflowDefinition } from '../types/definitions.js';

export class SchemaValidator {
  /**
   * Validate raw workflow data
   *
   * @param rawWorkflow - Object produced by the YAML/JSON parser
   * @throws {SchemaError} With the first issue's path; all issues are in context
   */
  static validate(rawWorkflow: unknown): WorkflowDefinition {
    return this.parseWith(WorkflowDefinitionSchema, rawWorkflow);
  }

  static validateCatalog(rawCatalog: unknown): ApiCatalogVersion[] {
    return this.parseWith(ApiCatalogSchema, rawCatalog);
  }

  /**
   * Validate without throwing
   */
  static safeParse(rawWorkflow: unknown): { success: true; data: WorkflowDefinition } | { success: false; error: StageflowError } {
    try {
      return { success: true, data: this.validate(rawWorkflow) };
    } catch (error) {
      if (error instanceof StageflowError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  private static parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw this.transformZodError(result.error);
    }
    return result.data;
  }

  /**
   * Transform a ZodError into a SchemaError
   */
  static transformZodError(error: z.ZodError): SchemaError {
    const [firstIssue] = error.issues;
    if (!firstIssue) {
      return SchemaError.invalidFormat('Invalid document', '');
    }

    const path = formatPath(firstIssue.path);
    const field = String(firstIssue.path[firstIssue.path.length - 1] ?? 'document');
    let schemaError: SchemaError;

    switch (firstIssue.code) {
      case z.ZodIssueCode.invalid_type:
        schemaError =
          firstIssue.received === 'undefined'
            ? SchemaError.missingField(field, path)
            : SchemaError.invalidType(field, firstIssue.expected, firstIssue.received, path);
        break;
      case z.ZodIssueCode.unrecognized_keys:
        schemaError = SchemaError.unknownField(firstIssue.keys.join(', '), path);
        break;
      default:
        schemaError = SchemaError.invalidFormat(firstIssue.message, path);
        break;
    }

    if (error.issues.length > 1) {
      schemaError.diagnostic.context = {
        ...schemaError.diagnostic.context,
        issues: error.issues.map((issue) => `${formatPath(issue.path)}: ${issue.message}`),
      };
    }
    return schemaError;
  }
}

/**
 * stages.0.retry → stages[0].retry
 */
export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}
