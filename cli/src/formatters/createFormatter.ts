/**
 * Formatter Factory
 *
 * The single point where formatters are instantiated.
 */

import { HumanFormatter } from './HumanFormatter.js';
import { JsonFormatter } from './JsonFormatter.js';
import { NullFormatter } from './NullFormatter.js';
import type { Formatter, FormatterOptions } from './Formatter.js';
import type { OutputFormat } from '../types/CliRunOptions.js';

/**
 * @example
 * ```ts
 * const formatter = createFormatter('human', { noColor: true });
 * const jsonFormatter = createFormatter('json');
 * ```
 */
export function createFormatter(type: OutputFormat = 'human', options: FormatterOptions = {}): Formatter {
  switch (type) {
    case 'human':
      return new HumanFormatter(options);
    case 'json':
      return new JsonFormatter(options);
    case 'null':
      return new NullFormatter();
    default: {
      const exhaustiveCheck: never = type;
      throw new Error(`Unhandled formatter type: ${String(exhaustiveCheck)}`);
    }
  }
}
