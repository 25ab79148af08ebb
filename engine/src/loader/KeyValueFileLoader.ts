/**
 * Key/value file loading
 *
 * Line-oriented `KEY=value` files (`.env`) and the shared line parser.
 * Blank lines and `#` comments are skipped, the first separator splits key
 * from value, and one pair of matching quotes around a value is removed.
 *
 * @module loader
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { ConfigurationError } from '../errors/index.js';

export interface KeyValueParseOptions {
  separator: string;
  /** Accept `export KEY=value` */
  allowExportPrefix: boolean;
  /** Error text; `{line}` is replaced with the 1-based line number */
  invalidEntryMessage: string;
}

export const ENV_FILE_OPTIONS: KeyValueParseOptions = {
  separator: '=',
  allowExportPrefix: true,
  invalidEntryMessage: 'Invalid env file entry at line {line}.',
};

export class KeyValueFileLoader {
  /**
   * @throws {ConfigurationError} On a line without a key or separator
   */
  static parse(content: string, options: KeyValueParseOptions, source: string): Record<string, string> {
    const values: Record<string, string> = {};
    const lines = content.split(/\r?\n/);

    lines.forEach((rawLine, index) => {
      let line = rawLine.trim();
      if (!line || line.startsWith('#')) {
        return;
      }
      if (options.allowExportPrefix && line.toLowerCase().startsWith('export ')) {
        line = line.slice('export '.length).trimStart();
      }

      const separatorIndex = line.indexOf(options.separator);
      const key = separatorIndex > 0 ? line.slice(0, separatorIndex).trim() : '';
      if (!key) {
        throw ConfigurationError.invalidFile(source, options.invalidEntryMessage.replace('{line}', String(index + 1)));
      }

      values[key] = unquote(line.slice(separatorIndex + options.separator.length).trim());
    });

    return values;
  }

  static async load(filePath: string, options: KeyValueParseOptions = ENV_FILE_OPTIONS): Promise<Record<string, string>> {
    if (!existsSync(filePath)) {
      throw ConfigurationError.fileNotFound('Environment file', filePath);
    }
    const content = await readFile(filePath, 'utf-8');
    return this.parse(content, options, filePath);
  }
}

/**
 * Strip one pair of matching single or double quotes
 */
export function unquote(value: string): string {
  if (value.length < 2) {
    return value;
  }
  const first = value[0];
  if ((first === '"' || first === "'") && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
}
