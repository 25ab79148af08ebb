/**
 * Null Formatter
 *
 * Produces no output. Useful for:
 * - Scripting (only care about exit code)
 * - CI/CD pipelines where logs are captured elsewhere
 */

import type { Formatter } from './Formatter.js';

export class NullFormatter implements Formatter {
  onEvent(): void {
    // no output
  }

  showResult(): void {
    // no output
  }

  showPlan(): void {
    // no output
  }

  showValidation(): void {
    // no output
  }

  showError(): void {
    // no output
  }

  showWarning(): void {
    // no output
  }

  showInfo(): void {
    // no output
  }
}
