/**
 * Vars File Loader
 *
 * Reads `.wfvars` files: `key: value` lines grouped into a `global:`
 * section, per-environment sections and `version:` subsections inside an
 * environment.
 *
 * ```
 * global:
 *   tenant: acme
 * staging:
 *   tenant: acme-staging
 *   version: 2
 *     tenant: acme-v2
 * ```
 *
 * Precedence is global < environment < environment/version. Indentation is
 * not significant; a `key:` line with no value opens a section.
 *
 * @module loader
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { ConfigurationError } from '../errors/index.js';
import { unquote } from './KeyValueFileLoader.js';

export type VarsFileSource =
  | { scope: 'global' }
  | { scope: 'environment'; environment: string }
  | { scope: 'version'; environment: string; version: string };

export interface VarsFileResolution {
  values: Record<string, string>;
  /** Section each value came from */
  sources: Record<string, VarsFileSource>;
}

const GLOBAL_SECTION = 'global';

/**
 * Parsed sections; environment and version names are stored lower-case
 */
class VarsFileContent {
  readonly global = new Map<string, string>();
  readonly environments = new Map<string, Map<string, string>>();
  readonly versions = new Map<string, Map<string, Map<string, string>>>();
  private readonly environmentNames = new Map<string, string>();

  registerEnvironment(environment: string): void {
    const key = environment.toLowerCase();
    if (!this.environmentNames.has(key)) {
      this.environmentNames.set(key, environment);
    }
  }

  hasEnvironment(environment: string): boolean {
    return this.environmentNames.has(environment.toLowerCase());
  }

  get environmentCount(): number {
    return this.environmentNames.size;
  }

  target(environment: string | undefined, version: string | undefined): Map<string, string> {
    if (!environment) {
      return this.global;
    }
    this.registerEnvironment(environment);
    const envKey = environment.toLowerCase();

    if (version) {
      const byVersion = this.versions.get(envKey) ?? new Map<string, Map<string, string>>();
      this.versions.set(envKey, byVersion);
      const values = byVersion.get(version.toLowerCase()) ?? new Map<string, string>();
      byVersion.set(version.toLowerCase(), values);
      return values;
    }

    const values = this.environments.get(envKey) ?? new Map<string, string>();
    this.environments.set(envKey, values);
    return values;
  }
}

export class VarsFileLoader {
  /**
   * Values for an environment and workflow version
   *
   * @throws {ConfigurationError} When the file is missing or malformed, or
   *         the environment is not defined and there are no globals to fall back on
   */
  async load(varsFilePath: string, environment?: string, version?: string): Promise<VarsFileResolution> {
    if (!existsSync(varsFilePath)) {
      throw ConfigurationError.fileNotFound('Vars file', varsFilePath);
    }
    const content = await readFile(varsFilePath, 'utf-8');
    return VarsFileLoader.resolve(VarsFileLoader.parse(content, varsFilePath), varsFilePath, environment, version);
  }

  /**
   * Sidecar location for a workflow: `orders.workflow` → `orders.wfvars`
   */
  static sidecarPath(workflowPath: string): string {
    const slash = Math.max(workflowPath.lastIndexOf('/'), workflowPath.lastIndexOf('\\'));
    const dot = workflowPath.lastIndexOf('.');
    const stem = dot > slash ? workflowPath.slice(0, dot) : workflowPath;
    return `${stem}.wfvars`;
  }

  private static parse(text: string, source: string): VarsFileContent {
    const content = new VarsFileContent();
    let environment: string | undefined;
    let version: string | undefined;

    text.split(/\r?\n/).forEach((rawLine, index) => {
      const line = rawLine.trim();
      if (!line || line.startsWith('#')) {
        return;
      }

      const separatorIndex = line.indexOf(':');
      const key = separatorIndex > 0 ? line.slice(0, separatorIndex).trim() : '';
      if (!key) {
        throw ConfigurationError.invalidFile(source, `Invalid vars file entry at line ${index + 1}.`);
      }
      const value = line.slice(separatorIndex + 1).trim();
      const isVersionKey = environment !== undefined && key.toLowerCase() === 'version';

      if (!value) {
        if (isVersionKey) {
          version = undefined;
        } else if (key.toLowerCase() === GLOBAL_SECTION) {
          environment = undefined;
          version = undefined;
        } else {
          environment = key;
          version = undefined;
          content.registerEnvironment(key);
        }
        return;
      }

      if (isVersionKey && environment !== undefined) {
        version = unquote(value);
        content.registerEnvironment(environment);
        return;
      }

      content.target(environment, version).set(key, unquote(value));
    });

    return content;
  }

  private static resolve(
    content: VarsFileContent,
    source: string,
    environment: string | undefined,
    version: string | undefined,
  ): VarsFileResolution {
    const resolution: VarsFileResolution = { values: {}, sources: {} };
    const apply = (values: Map<string, string> | undefined, from: VarsFileSource) => {
      for (const [key, value] of values ?? []) {
        resolution.values[key] = value;
        resolution.sources[key] = from;
      }
    };

    apply(content.global, { scope: 'global' });
    if (!environment) {
      return resolution;
    }

    if (!content.hasEnvironment(environment)) {
      if (content.environmentCount > 0 && content.global.size === 0) {
        throw ConfigurationError.invalidFile(
          source,
          `Vars file does not define environment '${environment}' and has no global variables.`,
        );
      }
      return resolution;
    }

    const envKey = environment.toLowerCase();
    apply(content.environments.get(envKey), { scope: 'environment', environment });
    if (version) {
      apply(content.versions.get(envKey)?.get(version.toLowerCase()), { scope: 'version', environment, version });
    }
    return resolution;
  }
}
