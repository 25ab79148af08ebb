/**
 * Error Codes
 *
 * Structured diagnostic codes for the workflow engine, separate from the
 * process exit codes the CLI reports.
 *
 * Format: SF-[Category]-[Number]
 *
 * Categories:
 * - C: Configuration errors (plugins, references, resilience combinations)
 * - S: Schema errors (document shape, YAML/JSON syntax)
 * - T: Template errors (unknown scope, missing key, bad projection)
 * - E: Execution errors (stage failures, retries, circuit breaker)
 * - R: Runtime errors (files, internal faults)
 *
 * ADDING NEW ERRORS:
 * 1. Add the enum value below
 * 2. Add a description in getErrorDescription()
 * 3. Add a suggested action in getSuggestedAction() when there is one
 *
 * @module errors
 */

/**
 * Process exit codes used by the CLI.
 */
export enum ExitCode {
  SUCCESS = 0,
  INVALID_WORKFLOW = 1,
  WORKFLOW_FAILED = 2,
  CANCELLED = 3,
  INTERNAL_ERROR = 4,
}

export enum StageflowErrorCode {
  // ============================================================================
  // CONFIGURATION ERRORS (C)
  // ============================================================================

  /** Plugin registry could not be assembled */
  CONFIG_PLUGIN_REGISTRY = 'SF-C-001',

  /** Stage references an unknown api, workflow, policy or stage */
  CONFIG_UNRESOLVED_REFERENCE = 'SF-C-002',

  /** Retry / circuit breaker definition is invalid */
  CONFIG_INVALID_RESILIENCE = 'SF-C-003',

  /** Engine option has an invalid value */
  CONFIG_INVALID_OPTION = 'SF-C-004',

  /** Workflow failed static validation */
  CONFIG_INVALID_WORKFLOW = 'SF-C-005',

  /** Mock definition is missing or invalid */
  CONFIG_INVALID_MOCK = 'SF-C-006',

  /** Stage jumps to itself while mocked */
  CONFIG_MOCKED_SELF_JUMP = 'SF-C-007',

  /** Required workflow input was not supplied */
  CONFIG_MISSING_INPUT = 'SF-C-008',

  /** runIf expression cannot be parsed */
  CONFIG_INVALID_CONDITION = 'SF-C-009',

  // ============================================================================
  // SCHEMA ERRORS (S)
  // ============================================================================

  /** Malformed YAML/JSON syntax */
  SCHEMA_PARSE_ERROR = 'SF-S-001',

  /** Missing required field */
  SCHEMA_MISSING_FIELD = 'SF-S-002',

  /** Invalid field type */
  SCHEMA_INVALID_TYPE = 'SF-S-003',

  /** Unknown field */
  SCHEMA_UNKNOWN_FIELD = 'SF-S-004',

  /** Field value does not match the expected format */
  SCHEMA_INVALID_FORMAT = 'SF-S-005',

  // ============================================================================
  // TEMPLATE ERRORS (T)
  // ============================================================================

  /** Token prefix is not a known scope */
  TEMPLATE_UNKNOWN_SCOPE = 'SF-T-001',

  /** Token key has no value in its scope */
  TEMPLATE_MISSING_KEY = 'SF-T-002',

  /** json(...) projection is malformed or its value is not JSON */
  TEMPLATE_INVALID_PROJECTION = 'SF-T-003',

  /** response.* used where no response exists */
  TEMPLATE_RESPONSE_UNAVAILABLE = 'SF-T-004',

  // ============================================================================
  // EXECUTION ERRORS (E)
  // ============================================================================

  /** Stage finished with an unexpected status */
  EXECUTION_STAGE_FAILED = 'SF-E-001',

  /** Retry budget spent without success */
  EXECUTION_RETRY_EXHAUSTED = 'SF-E-002',

  /** Circuit breaker is open and blocked the call */
  EXECUTION_CIRCUIT_OPEN = 'SF-E-003',

  /** Network failure or transport timeout */
  EXECUTION_TRANSPORT = 'SF-E-004',

  /** Execution was cancelled */
  EXECUTION_CANCELLED = 'SF-E-005',

  /** Stage transition limit reached */
  EXECUTION_TRANSITION_LIMIT = 'SF-E-006',

  // ============================================================================
  // RUNTIME ERRORS (R)
  // ============================================================================

  /** File does not exist */
  RUNTIME_FILE_NOT_FOUND = 'SF-R-001',

  /** File could not be read or written */
  RUNTIME_IO_ERROR = 'SF-R-002',

  /** Internal engine error */
  RUNTIME_INTERNAL_ERROR = 'SF-R-003',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Stops the whole workflow tree */
  FATAL = 'fatal',

  /** Stops the current workflow */
  ERROR = 'error',

  /** Recorded, execution continues */
  WARNING = 'warning',

  /** Informational */
  INFO = 'info',
}

/**
 * Get error category from code prefix
 */
export function getErrorCategory(code: StageflowErrorCode): string {
  if (code.startsWith('SF-C-')) return 'ConfigurationError';
  if (code.startsWith('SF-S-')) return 'SchemaError';
  if (code.startsWith('SF-T-')) return 'TemplateResolutionError';
  if (code.startsWith('SF-E-')) return 'ExecutionError';
  if (code.startsWith('SF-R-')) return 'RuntimeError';
  return 'UnknownError';
}

/**
 * Get detailed description for an error code
 */
export function getErrorDescription(code: StageflowErrorCode): string {
  const descriptions: Record<StageflowErrorCode, string> = {
    [StageflowErrorCode.CONFIG_PLUGIN_REGISTRY]: 'The stage plugin registry could not be built from the configured plugin list.',
    [StageflowErrorCode.CONFIG_UNRESOLVED_REFERENCE]: 'A stage references an api, workflow, policy or stage that is not declared.',
    [StageflowErrorCode.CONFIG_INVALID_RESILIENCE]: 'A retry or circuit breaker definition is incomplete or inconsistent.',
    [StageflowErrorCode.CONFIG_INVALID_OPTION]: 'An engine option has a value outside its allowed range.',
    [StageflowErrorCode.CONFIG_INVALID_WORKFLOW]: 'The workflow failed static validation.',
    [StageflowErrorCode.CONFIG_INVALID_MOCK]: 'A stage mock is missing a required part or points at a missing file.',
    [StageflowErrorCode.CONFIG_MOCKED_SELF_JUMP]: 'A mocked stage jumps to itself, which would never terminate.',
    [StageflowErrorCode.CONFIG_MISSING_INPUT]: 'A required workflow input was not supplied.',
    [StageflowErrorCode.CONFIG_INVALID_CONDITION]: 'A runIf expression does not follow the supported comparison syntax.',

    [StageflowErrorCode.SCHEMA_PARSE_ERROR]: 'The workflow file is not valid YAML or JSON.',
    [StageflowErrorCode.SCHEMA_MISSING_FIELD]: 'A required field is missing from the workflow document.',
    [StageflowErrorCode.SCHEMA_INVALID_TYPE]: 'A field has the wrong type.',
    [StageflowErrorCode.SCHEMA_UNKNOWN_FIELD]: 'The workflow document contains an unknown field.',
    [StageflowErrorCode.SCHEMA_INVALID_FORMAT]: 'A field value does not match its expected format.',

    [StageflowErrorCode.TEMPLATE_UNKNOWN_SCOPE]: 'A template token uses a scope prefix the engine does not know.',
    [StageflowErrorCode.TEMPLATE_MISSING_KEY]: 'A template token refers to a key with no value in its scope.',
    [StageflowErrorCode.TEMPLATE_INVALID_PROJECTION]: 'A json(...) projection is malformed or the projected value is not JSON.',
    [StageflowErrorCode.TEMPLATE_RESPONSE_UNAVAILABLE]: 'A response token was used where no response is available.',

    [StageflowErrorCode.EXECUTION_STAGE_FAILED]: 'The stage returned a status that is neither expected nor mapped to a jump.',
    [StageflowErrorCode.EXECUTION_RETRY_EXHAUSTED]: 'All retry attempts failed.',
    [StageflowErrorCode.EXECUTION_CIRCUIT_OPEN]: 'The circuit breaker is open and the call was not attempted.',
    [StageflowErrorCode.EXECUTION_TRANSPORT]: 'The HTTP call failed at the network level or timed out.',
    [StageflowErrorCode.EXECUTION_CANCELLED]: 'Execution was cancelled.',
    [StageflowErrorCode.EXECUTION_TRANSITION_LIMIT]: 'The workflow exceeded the allowed number of stage transitions.',

    [StageflowErrorCode.RUNTIME_FILE_NOT_FOUND]: 'A referenced file does not exist.',
    [StageflowErrorCode.RUNTIME_IO_ERROR]: 'A file could not be read or written.',
    [StageflowErrorCode.RUNTIME_INTERNAL_ERROR]: 'Internal engine error.',
  };

  return descriptions[code] ?? 'Unknown error occurred';
}

/**
 * Map an error code to the CLI process exit code
 */
export function getExitCodeForError(code: StageflowErrorCode): ExitCode {
  if (code === StageflowErrorCode.EXECUTION_CANCELLED) {
    return ExitCode.CANCELLED;
  }
  if (code === StageflowErrorCode.RUNTIME_INTERNAL_ERROR) {
    return ExitCode.INTERNAL_ERROR;
  }
  if (code.startsWith('SF-E-') || code.startsWith('SF-T-')) {
    return ExitCode.WORKFLOW_FAILED;
  }
  return ExitCode.INVALID_WORKFLOW;
}

/**
 * Check whether the user can fix the error by editing the workflow or its inputs
 */
export function isUserError(code: StageflowErrorCode): boolean {
  return code.startsWith('SF-C-') || code.startsWith('SF-S-') || code.startsWith('SF-T-');
}

/**
 * Check whether repeating the operation might succeed
 */
export function isRetryable(code: StageflowErrorCode): boolean {
  return (
    code === StageflowErrorCode.EXECUTION_TRANSPORT ||
    code === StageflowErrorCode.EXECUTION_CIRCUIT_OPEN ||
    code === StageflowErrorCode.EXECUTION_RETRY_EXHAUSTED
  );
}

/**
 * Suggested fix shown as a hint when the thrower gives none
 */
export function getSuggestedAction(code: StageflowErrorCode): string | undefined {
  switch (code) {
    case StageflowErrorCode.CONFIG_PLUGIN_REGISTRY:
      return 'Check the configured plugin ids and the stage kinds each plugin claims.';
    case StageflowErrorCode.CONFIG_UNRESOLVED_REFERENCE:
      return 'Declare the reference under "references" or "resilience", or fix its name.';
    case StageflowErrorCode.CONFIG_INVALID_RESILIENCE:
      return 'A circuitBreaker needs a retry block, and every policy value must be positive.';
    case StageflowErrorCode.CONFIG_MISSING_INPUT:
      return 'Pass the input with --var name=value or a .wfvars file.';
    case StageflowErrorCode.CONFIG_INVALID_CONDITION:
      return 'Use the form "{{scope.key}} == value", "!=", "in [..]" or "not in [..]".';
    case StageflowErrorCode.SCHEMA_PARSE_ERROR:
      return 'Check indentation, colons and brackets.';
    case StageflowErrorCode.TEMPLATE_UNKNOWN_SCOPE:
      return 'Valid scopes: input, global, context, env, stage, response, system.';
    case StageflowErrorCode.TEMPLATE_RESPONSE_UNAVAILABLE:
      return 'Response tokens are only valid in an endpoint stage output, set, context or message.';
    case StageflowErrorCode.EXECUTION_CIRCUIT_OPEN:
      return 'Wait for the break window to pass or fix the failing dependency.';
    case StageflowErrorCode.RUNTIME_FILE_NOT_FOUND:
      return 'Paths are resolved relative to the workflow file.';
    default:
      return undefined;
  }
}
