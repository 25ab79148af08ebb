/**
 * Stage Plugin Registry
 *
 * Immutable kind → plugin lookup produced by StagePluginRegistryBuilder.
 * Kinds and ids compare case-insensitively.
 *
 * @module plugins
 */

import { StageflowError, StageflowErrorCode, ErrorSeverity } from '../errors/index.js';
import type { StagePlugin } from './StagePlugin.js';

/**
 * A stage names a kind no registered plugin handles
 */
export class UnknownStageKindError extends StageflowError {
  constructor(kind: string, stageName: string, availableKinds: string[]) {
    super({
      code: StageflowErrorCode.CONFIG_UNRESOLVED_REFERENCE,
      message: `Stage '${stageName}' kind '${kind}' is not handled by any plugin.`,
      path: `stages.${stageName}.kind`,
      severity: ErrorSeverity.FATAL,
      hint: `Available kinds: ${availableKinds.join(', ')}. Register the plugin that provides '${kind}'.`,
      context: { kind, stageName, availableKinds },
    });
  }
}

export class StagePluginRegistry {
  private readonly byKind: ReadonlyMap<string, StagePlugin>;
  private readonly byId: ReadonlyMap<string, StagePlugin>;

  constructor(byKind: ReadonlyMap<string, StagePlugin>, byId: ReadonlyMap<string, StagePlugin>) {
    this.byKind = new Map(Array.from(byKind, ([kind, plugin]) => [kind.toLowerCase(), plugin]));
    this.byId = new Map(Array.from(byId, ([id, plugin]) => [id.toLowerCase(), plugin]));
  }

  find(kind: string): StagePlugin | undefined {
    return this.byKind.get(kind.toLowerCase());
  }

  /**
   * @throws {UnknownStageKindError}
   */
  resolve(kind: string, stageName: string): StagePlugin {
    const plugin = this.find(kind);
    if (!plugin) {
      throw new UnknownStageKindError(kind, stageName, this.getKinds());
    }
    return plugin;
  }

  supports(kind: string): boolean {
    return this.byKind.has(kind.toLowerCase());
  }

  get(id: string): StagePlugin | undefined {
    return this.byId.get(id.toLowerCase());
  }

  getAll(): StagePlugin[] {
    return Array.from(this.byId.values());
  }

  getIds(): string[] {
    return this.getAll().map((plugin) => plugin.id);
  }

  getKinds(): string[] {
    return this.getAll().flatMap((plugin) => [...plugin.stageKinds]);
  }
}
