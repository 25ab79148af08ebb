/**
 * Configuration and Schema Errors
 *
 * Raised before any stage runs: bad plugin setup, unresolved references,
 * invalid resilience combinations, documents that fail parsing or
 * validation. Use the factory methods instead of building diagnostics inline.
 *
 * @module errors
 */

import { StageflowError, type StageflowErrorDiagnostic } from './StageflowError.js';
import { StageflowErrorCode, ErrorSeverity } from './ErrorCodes.js';

type DiagnosticInput = Omit<StageflowErrorDiagnostic, 'severity'> & { severity?: ErrorSeverity };

export class ConfigurationError extends StageflowError {
  constructor(diagnostic: DiagnosticInput) {
    super({ ...diagnostic, severity: diagnostic.severity ?? ErrorSeverity.FATAL });
  }

  /**
   * Plugin registry could not be built; carries every collected problem
   */
  static pluginRegistry(errors: string[]): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.CONFIG_PLUGIN_REGISTRY,
      message: `Stage plugin registry could not be built:\n${errors.map((e) => ` - ${e}`).join('\n')}`,
      context: { errors },
    });
  }

  static unresolvedReference(kind: string, name: string, path?: string): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.CONFIG_UNRESOLVED_REFERENCE,
      message: `${kind} '${name}' was not found.`,
      path,
      context: { kind, name },
    });
  }

  static invalidResilience(message: string, path?: string): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.CONFIG_INVALID_RESILIENCE,
      message,
      path,
    });
  }

  static invalidOption(option: string, message: string): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.CONFIG_INVALID_OPTION,
      message: `Invalid engine option '${option}': ${message}`,
      context: { option },
    });
  }

  static invalidWorkflow(workflowPath: string, errors: string[]): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.CONFIG_INVALID_WORKFLOW,
      message: `Workflow validation failed for ${workflowPath}:\n${errors.map((e) => ` - ${e}`).join('\n')}`,
      context: { workflowPath, errors },
    });
  }

  static invalidMock(stageName: string, message: string): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.CONFIG_INVALID_MOCK,
      message: `Stage '${stageName}' ${message}`,
      path: `stages.${stageName}.mock`,
    });
  }

  static missingInput(workflowName: string, inputName: string): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.CONFIG_MISSING_INPUT,
      message: `Workflow '${workflowName}' requires input '${inputName}'.`,
      path: `input.${inputName}`,
      context: { workflowName, inputName },
    });
  }

  static invalidVariable(variableName: string, message: string): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.CONFIG_INVALID_WORKFLOW,
      message: `Variable '${variableName}': ${message}`,
      path: `initStage.variables.${variableName}`,
      context: { variableName },
    });
  }

  static invalidCondition(expression: string, stageName?: string): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.CONFIG_INVALID_CONDITION,
      message: `Invalid runIf expression '${expression}'.`,
      path: stageName ? `stages.${stageName}.runIf` : undefined,
      context: { expression },
    });
  }

  /**
   * API catalog has no usable entry for a referenced definition or environment
   */
  static catalogLookup(message: string, context: Record<string, unknown> = {}): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.CONFIG_UNRESOLVED_REFERENCE,
      message,
      hint: 'Check the catalog file, the catalog version and the environment name.',
      context,
    });
  }

  /**
   * Malformed env or vars file
   */
  static invalidFile(filePath: string, message: string): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.SCHEMA_INVALID_FORMAT,
      message: `${message} (${filePath})`,
      context: { filePath },
    });
  }

  static fileNotFound(description: string, filePath: string): ConfigurationError {
    return new ConfigurationError({
      code: StageflowErrorCode.RUNTIME_FILE_NOT_FOUND,
      message: `${description} was not found: ${filePath}`,
      context: { filePath },
    });
  }
}

/**
 * Document shape problems reported while parsing a workflow or catalog file
 */
export class SchemaError extends ConfigurationError {
  constructor(diagnostic: DiagnosticInput) {
    super({ ...diagnostic, severity: ErrorSeverity.ERROR });
  }

  static parseError(filePath: string, detail: string): SchemaError {
    return new SchemaError({
      code: StageflowErrorCode.SCHEMA_PARSE_ERROR,
      message: `Failed to parse ${filePath}: ${detail}`,
      context: { filePath },
    });
  }

  static missingField(field: string, path: string): SchemaError {
    return new SchemaError({
      code: StageflowErrorCode.SCHEMA_MISSING_FIELD,
      message: `Missing required field "${field}"`,
      path,
    });
  }

  static invalidType(field: string, expected: string, actual: string, path: string): SchemaError {
    return new SchemaError({
      code: StageflowErrorCode.SCHEMA_INVALID_TYPE,
      message: `Field "${field}" must be ${expected}, got ${actual}`,
      path,
      context: { expected, actual },
    });
  }

  static unknownField(field: string, path: string): SchemaError {
    return new SchemaError({
      code: StageflowErrorCode.SCHEMA_UNKNOWN_FIELD,
      message: `Unknown field "${field}"`,
      path,
    });
  }

  static invalidFormat(message: string, path: string): SchemaError {
    return new SchemaError({
      code: StageflowErrorCode.SCHEMA_INVALID_FORMAT,
      message,
      path,
    });
  }
}

/**
 * A mocked stage maps its own status to a jump onto itself
 */
export class MockedSelfJumpError extends ConfigurationError {
  public readonly stageName: string;

  constructor(stageName: string, status: number) {
    super({
      code: StageflowErrorCode.CONFIG_MOCKED_SELF_JUMP,
      message: `Mocked stage '${stageName}' jumps to itself on status ${status}.`,
      path: `stages.${stageName}.jumpOnStatus`,
      hint: 'Change the mock status or the jump target.',
      context: { stageName, status },
    });
    this.stageName = stageName;
  }
}
