/**
 * Base Engine Error Class
 *
 * Foundation for all engine errors with diagnostic capabilities.
 * Carries a structured code, severity, location and hint so the CLI can
 * render it and map it to a process exit code.
 *
 * @module errors
 */

import {
  StageflowErrorCode,
  ErrorSeverity,
  ExitCode,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
  getSuggestedAction,
  isUserError,
  isRetryable,
} from './ErrorCodes.js';

/**
 * Diagnostic error information
 */
export interface StageflowErrorDiagnostic {
  /** Structured error code (e.g., SF-C-001) */
  code: StageflowErrorCode;

  /** Human-readable error message */
  message: string;

  /** Process exit code; derived from the code when omitted */
  exitCode?: ExitCode;

  /** Location of the problem (e.g., "stages[2].retry") */
  path?: string;

  /** Suggestion for fixing the error */
  hint?: string;

  severity: ErrorSeverity;

  /** Additional context data for debugging */
  context?: Record<string, unknown>;

  /** Underlying error */
  cause?: unknown;
}

/**
 * Base error class for all engine errors
 *
 * @example
 * ```typescript
 * throw new StageflowError({
 *   code: StageflowErrorCode.CONFIG_UNRESOLVED_REFERENCE,
 *   message: "Stage 'login' references unknown api 'accounts'.",
 *   path: 'stages[0].apiRef',
 *   severity: ErrorSeverity.ERROR,
 * });
 * ```
 */
export class StageflowError extends Error {
  public readonly diagnostic: StageflowErrorDiagnostic;

  public readonly timestamp: Date;

  constructor(diagnostic: StageflowErrorDiagnostic) {
    super(diagnostic.message, diagnostic.cause === undefined ? undefined : { cause: diagnostic.cause });
    this.name = getErrorCategory(diagnostic.code);
    this.diagnostic = {
      ...diagnostic,
      exitCode: diagnostic.exitCode ?? getExitCodeForError(diagnostic.code),
      hint: diagnostic.hint ?? getSuggestedAction(diagnostic.code),
    };
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get code(): StageflowErrorCode {
    return this.diagnostic.code;
  }

  get exitCode(): ExitCode {
    return this.diagnostic.exitCode ?? getExitCodeForError(this.diagnostic.code);
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string | undefined {
    return this.diagnostic.hint;
  }

  get severity(): ErrorSeverity {
    return this.diagnostic.severity;
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  /**
   * True if the user can fix it by changing the workflow or its inputs
   */
  get isUserError(): boolean {
    return isUserError(this.code);
  }

  get isRetryable(): boolean {
    return isRetryable(this.code);
  }

  get category(): string {
    return getErrorCategory(this.code);
  }

  /**
   * Format error for logging/display
   */
  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `\n\n${this.message}`;

    if (this.hint) {
      msg += `\n\nHint: ${this.hint}`;
    }

    if (this.diagnostic.context && Object.keys(this.diagnostic.context).length > 0) {
      msg += `\n\nContext: ${JSON.stringify(this.diagnostic.context, null, 2)}`;
    }

    return msg;
  }

  /**
   * Format error with the full diagnostic block, used by verbose output
   */
  toDetailedString(): string {
    const rule = '-'.repeat(70);
    const lines = [
      rule,
      this.name,
      rule,
      '',
      `Error Code:    ${this.code}`,
      `Exit Code:     ${this.exitCode}`,
      `Severity:      ${this.severity.toUpperCase()}`,
      `Timestamp:     ${this.timestamp.toISOString()}`,
      `User Fixable:  ${this.isUserError ? 'Yes' : 'No'}`,
      `Retryable:     ${this.isRetryable ? 'Yes' : 'No'}`,
    ];

    if (this.path) {
      lines.push(`Location:      ${this.path}`);
    }

    lines.push('', 'Message:', `   ${this.message}`, '', 'Description:', `   ${this.description}`);

    if (this.hint) {
      lines.push('', 'Hint:', `   ${this.hint}`);
    }

    if (this.diagnostic.context && Object.keys(this.diagnostic.context).length > 0) {
      lines.push('', 'Context:');
      for (const [key, value] of Object.entries(this.diagnostic.context)) {
        lines.push(`   ${key}: ${JSON.stringify(value)}`);
      }
    }

    lines.push('', rule);
    return lines.join('\n');
  }

  /**
   * Convert to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      path: this.path,
      hint: this.hint,
      severity: this.severity,
      context: this.diagnostic.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}
