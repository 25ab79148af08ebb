/**
 * Template resolution errors
 *
 * @module errors
 */

import { StageflowError } from './StageflowError.js';
import { StageflowErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class TemplateResolutionError extends StageflowError {
  /** The token text between the braces */
  public readonly token: string;

  constructor(code: StageflowErrorCode, token: string, message: string, hint?: string) {
    super({
      code,
      message,
      hint,
      severity: ErrorSeverity.ERROR,
      context: { token },
    });
    this.token = token;
  }

  static unknownScope(token: string, scope: string): TemplateResolutionError {
    return new TemplateResolutionError(
      StageflowErrorCode.TEMPLATE_UNKNOWN_SCOPE,
      token,
      `Unknown template scope '${scope}' in token '${token}'.`,
    );
  }

  static missingKey(token: string, scope: string, key: string): TemplateResolutionError {
    return new TemplateResolutionError(
      StageflowErrorCode.TEMPLATE_MISSING_KEY,
      token,
      `${scope} '${key}' was not found.`,
    );
  }

  static invalidProjection(token: string, reason: string): TemplateResolutionError {
    return new TemplateResolutionError(
      StageflowErrorCode.TEMPLATE_INVALID_PROJECTION,
      token,
      `Invalid json projection '${token}': ${reason}`,
      'Use json(stage:<stage>.output.<key>).<path> or stage:json(<stage>.output.<key>).<path>.',
    );
  }

  static responseUnavailable(token: string, reason = 'response tokens are not available here.'): TemplateResolutionError {
    return new TemplateResolutionError(
      StageflowErrorCode.TEMPLATE_RESPONSE_UNAVAILABLE,
      token,
      `Token '${token}': ${reason}`,
    );
  }
}
