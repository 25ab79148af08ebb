/**
 * API base URL resolution
 *
 * Maps a stage's `apiRef` to the base URL its requests go to.
 *
 * @module services
 */

import { ConfigurationError } from '../errors/index.js';
import { equalsIgnoreCase, lookupIgnoreCase } from '../utils/caseInsensitive.js';
import type { ApiCatalogVersion, ApiDefinition, WorkflowDocument } from '../types/definitions.js';

export interface ApiBaseUrlResolver {
  /**
   * @throws {ConfigurationError} When the reference or its base URL is unknown
   */
  resolve(apiRef: string, document: WorkflowDocument): string;
}

/**
 * Resolves through `references.apis` and an API catalog version for one
 * environment. Definition and environment names compare case-insensitively.
 */
export class CatalogBaseUrlResolver implements ApiBaseUrlResolver {
  constructor(
    private readonly catalogVersion: ApiCatalogVersion,
    private readonly environment: string,
  ) {}

  resolve(apiRef: string, document: WorkflowDocument): string {
    const reference = document.definition.references?.apis?.find((api) => equalsIgnoreCase(api.name, apiRef));
    if (!reference) {
      throw ConfigurationError.unresolvedReference('API reference', apiRef, 'references.apis');
    }
    return this.resolveDefinition(reference.definition);
  }

  /**
   * Base URL for every API the workflow references, keyed by reference name
   */
  resolveAll(document: WorkflowDocument): Record<string, string> {
    const lookup: Record<string, string> = {};
    for (const reference of document.definition.references?.apis ?? []) {
      lookup[reference.name] = this.resolveDefinition(reference.definition);
    }
    return lookup;
  }

  /**
   * The catalog version's own base URL for the environment, if any
   */
  defaultBaseUrl(): string | undefined {
    return lookupIgnoreCase(this.catalogVersion.baseUrl, this.environment);
  }

  private resolveDefinition(definitionName: string): string {
    const version = this.catalogVersion.version;
    const definition = this.catalogVersion.definitions.find((def) => equalsIgnoreCase(def.name, definitionName));
    if (!definition) {
      throw ConfigurationError.catalogLookup(
        `API definition '${definitionName}' was not found in catalog version '${version}'.`,
        { definition: definitionName, version },
      );
    }

    const baseUrl = this.baseUrlFor(definition);
    if (baseUrl === undefined) {
      throw ConfigurationError.catalogLookup(
        `Environment '${this.environment}' was not found for API definition '${definition.name}' in catalog version '${version}'.`,
        { definition: definition.name, version, environment: this.environment },
      );
    }
    return combineBasePath(baseUrl, definition.basePath);
  }

  private baseUrlFor(definition: ApiDefinition): string | undefined {
    return (
      (definition.baseUrl ? lookupIgnoreCase(definition.baseUrl, this.environment) : undefined) ??
      lookupIgnoreCase(this.catalogVersion.baseUrl, this.environment)
    );
  }
}

/**
 * Fixed reference name → base URL map
 */
export class StaticBaseUrlResolver implements ApiBaseUrlResolver {
  constructor(private readonly baseUrls: Readonly<Record<string, string>>) {}

  resolve(apiRef: string): string {
    const baseUrl = lookupIgnoreCase(this.baseUrls, apiRef);
    if (baseUrl === undefined) {
      throw ConfigurationError.unresolvedReference('API reference', apiRef, 'references.apis');
    }
    return baseUrl;
  }
}

/**
 * Pick the catalog entry matching a version label (case-insensitive)
 *
 * @throws {ConfigurationError} Listing the available versions
 */
export function selectCatalogVersion(catalog: readonly ApiCatalogVersion[], version: string): ApiCatalogVersion {
  const selected = catalog.find((entry) => equalsIgnoreCase(entry.version, version));
  if (!selected) {
    const available = catalog.map((entry) => entry.version).join(', ');
    throw ConfigurationError.catalogLookup(`Catalog version '${version}' was not found. Available versions: ${available}`, {
      version,
    });
  }
  return selected;
}

export function combineBasePath(baseUrl: string, basePath?: string): string {
  if (!basePath || !basePath.trim()) {
    return baseUrl;
  }
  return `${baseUrl.replace(/\/+$/, '')}/${basePath.replace(/^\/+|\/+$/g, '')}`;
}
