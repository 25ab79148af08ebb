/**
 * API Catalog Loader
 *
 * Reads an API catalog (JSON or YAML list of versions with per-environment
 * base URLs and API definitions).
 *
 * @module loader
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { ConfigurationError } from '../errors/index.js';
import { WorkflowParser } from '../parser/WorkflowParser.js';
import type { ApiCatalogVersion } from '../types/definitions.js';

export class ApiCatalogLoader {
  static async load(catalogPath: string): Promise<ApiCatalogVersion[]> {
    const filePath = resolve(catalogPath);
    if (!existsSync(filePath)) {
      throw ConfigurationError.fileNotFound('Catalog file', filePath);
    }
    const content = await readFile(filePath, 'utf-8');
    return WorkflowParser.parseCatalog(content, filePath, WorkflowParser.detectFormat(filePath));
  }
}
