/**
 * Stage Plugin Registry Builder
 *
 * Builds the registry from an ordered list of plugin ids. Built-in ids map
 * to built-in factories; any other id must have an entry in the external
 * factory table. Every problem is collected before failing, so one error
 * lists everything wrong with the configuration.
 *
 * @module plugins
 */

import { ConfigurationError } from '../errors/index.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogCategory } from '../types/log-types.js';
import { StagePluginRegistry } from './StagePluginRegistry.js';
import type { StagePlugin, StagePluginFactory } from './StagePlugin.js';

export interface StagePluginRegistryBuilderOptions {
  builtIns: Readonly<Record<string, StagePluginFactory>>;
  /** Ids registered whatever the configuration says */
  requiredIds?: readonly string[];
}

export type RegistryBuildResult =
  | { success: true; registry: StagePluginRegistry }
  | { success: false; errors: string[] };

export class StagePluginRegistryBuilder {
  private readonly builtIns: ReadonlyMap<string, StagePluginFactory>;
  private readonly requiredIds: readonly string[];

  constructor(options: StagePluginRegistryBuilderOptions) {
    this.builtIns = new Map(Object.entries(options.builtIns).map(([id, factory]) => [id.toLowerCase(), factory]));
    this.requiredIds = options.requiredIds ?? [];
  }

  /**
   * @throws {ConfigurationError} Listing every problem found
   */
  build(pluginIds: readonly string[], external: Readonly<Record<string, StagePluginFactory>> = {}): StagePluginRegistry {
    const result = this.tryBuild(pluginIds, external);
    if (!result.success) {
      throw ConfigurationError.pluginRegistry(result.errors);
    }
    return result.registry;
  }

  tryBuild(pluginIds: readonly string[], external: Readonly<Record<string, StagePluginFactory>> = {}): RegistryBuildResult {
    const errors: string[] = [];
    const byId = new Map<string, StagePlugin>();
    const byKind = new Map<string, StagePlugin>();
    const required = new Set(this.requiredIds.map((id) => id.toLowerCase()));
    const externalFactories = new Map(Object.entries(external).map(([id, factory]) => [id.toLowerCase(), factory]));

    for (const requiredId of this.requiredIds) {
      const factory = this.builtIns.get(requiredId.toLowerCase());
      const plugin = factory ? this.instantiate(requiredId, factory, errors) : undefined;
      if (!factory) {
        errors.push(`Required plugin '${requiredId}' is not available.`);
      }
      if (plugin) {
        this.add(requiredId, plugin, byId, byKind, errors);
      }
    }

    if (pluginIds.length === 0) {
      errors.push('No plugins were configured.');
    }

    for (const pluginId of pluginIds) {
      if (!pluginId.trim()) {
        errors.push('Plugin id cannot be empty.');
        continue;
      }

      const key = pluginId.toLowerCase();
      if (required.has(key)) {
        continue;
      }
      if (byId.has(key)) {
        errors.push(`Plugin '${pluginId}' is already registered.`);
        continue;
      }

      const factory = this.builtIns.get(key) ?? externalFactories.get(key);
      if (!factory) {
        errors.push(`Plugin '${pluginId}' was not found; register a factory for it.`);
        continue;
      }

      const plugin = this.instantiate(pluginId, factory, errors);
      if (plugin) {
        this.add(pluginId, plugin, byId, byKind, errors);
      }
    }

    if (errors.length > 0) {
      return { success: false, errors };
    }

    LoggerManager.getLogger().debug(
      'Stage plugins registered',
      { plugins: Array.from(byId.values(), (plugin) => plugin.id) },
      LogCategory.SYSTEM,
    );
    return { success: true, registry: new StagePluginRegistry(byKind, byId) };
  }

  private instantiate(pluginId: string, factory: StagePluginFactory, errors: string[]): StagePlugin | undefined {
    try {
      return factory();
    } catch (error) {
      errors.push(`Plugin '${pluginId}' failed to load: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }

  private add(
    requestedId: string,
    plugin: StagePlugin,
    byId: Map<string, StagePlugin>,
    byKind: Map<string, StagePlugin>,
    errors: string[],
  ): void {
    if (!plugin.id || !plugin.id.trim()) {
      errors.push(`Plugin '${requestedId}' does not declare an id.`);
      return;
    }
    if (plugin.id.toLowerCase() !== requestedId.toLowerCase()) {
      errors.push(`Plugin '${requestedId}' declares a different id '${plugin.id}'.`);
      return;
    }

    const idKey = plugin.id.toLowerCase();
    if (byId.has(idKey)) {
      errors.push(`Plugin '${plugin.id}' is already registered.`);
      return;
    }
    byId.set(idKey, plugin);

    for (const kind of plugin.stageKinds) {
      if (!kind.trim()) {
        errors.push(`Plugin '${plugin.id}' defines an empty stage kind.`);
        continue;
      }
      const kindKey = kind.toLowerCase();
      const existing = byKind.get(kindKey);
      if (existing) {
        errors.push(`Stage kind '${kind}' is already handled by plugin '${existing.id}'.`);
        continue;
      }
      byKind.set(kindKey, plugin);
    }
  }
}
