import { describe, it, expect } from 'vitest';
import { WorkflowEngine } from '../src/core/WorkflowEngine.js';
import { ConfigurationError } from '../src/errors/index.js';
import { BUILT_IN_PLUGINS, EndpointStagePlugin, REQUIRED_PLUGIN_IDS, WorkflowStagePlugin } from '../src/plugins/builtins/index.js';
import { UnknownStageKindError } from '../src/plugins/StagePluginRegistry.js';
import { StagePluginRegistryBuilder } from '../src/plugins/StagePluginRegistryBuilder.js';
import type { StageOutcome, StagePlugin, StagePluginCapabilities } from '../src/plugins/StagePlugin.js';

class QueueStagePlugin implements StagePlugin {
  readonly capabilities: StagePluginCapabilities = {
    outputKind: 'endpoint',
    mockKind: 'none',
    allowsResponseTokens: false,
    supportsJumpOnStatus: false,
    continueOnError: false,
  };

  constructor(
    readonly id: string = 'queue',
    readonly stageKinds: readonly string[] = ['Queue'],
  ) {}

  async execute(): Promise<StageOutcome> {
    return {};
  }

  validate(): string[] {
    return [];
  }
}

function createBuilder(): StagePluginRegistryBuilder {
  return new StagePluginRegistryBuilder({ builtIns: BUILT_IN_PLUGINS, requiredIds: REQUIRED_PLUGIN_IDS });
}

describe('StagePluginRegistryBuilder', () => {
  it('registers the built-in plugins', () => {
    const registry = createBuilder().build(['workflow', 'http']);

    expect(registry.getIds()).toEqual(['workflow', 'http']);
    expect(registry.getKinds()).toEqual(['Workflow', 'Endpoint', 'Http']);
  });

  it('always registers the workflow plugin', () => {
    const registry = createBuilder().build(['http']);
    expect(registry.resolve('Workflow', 'child')).toBeInstanceOf(WorkflowStagePlugin);
  });

  it('resolves kinds and ids case-insensitively', () => {
    const registry = createBuilder().build(['HTTP']);

    expect(registry.resolve('endpoint', 'login')).toBeInstanceOf(EndpointStagePlugin);
    expect(registry.get('Http')).toBeInstanceOf(EndpointStagePlugin);
    expect(registry.supports('HTTP')).toBe(true);
  });

  it('rejects kinds no plugin handles', () => {
    const registry = createBuilder().build(['http']);

    expect(() => registry.resolve('Queue', 'publish')).toThrow(UnknownStageKindError);
    expect(() => registry.resolve('Queue', 'publish')).toThrow("Stage 'publish' kind 'Queue' is not handled by any plugin.");
  });

  it('adds external plugins through their factories', () => {
    const registry = createBuilder().build(['http', 'queue'], { queue: () => new QueueStagePlugin() });

    expect(registry.getIds()).toEqual(['workflow', 'http', 'queue']);
    expect(registry.resolve('queue', 'publish')).toBeInstanceOf(QueueStagePlugin);
  });

  it('collects every configuration problem', () => {
    const result = createBuilder().tryBuild(['http', 'http', 'queue', ' ']);

    expect(result).toEqual({
      success: false,
      errors: [
        "Plugin 'http' is already registered.",
        "Plugin 'queue' was not found; register a factory for it.",
        'Plugin id cannot be empty.',
      ],
    });
  });

  it('rejects kind conflicts between plugins', () => {
    const result = createBuilder().tryBuild(['http', 'queue'], { queue: () => new QueueStagePlugin('queue', ['Http']) });

    expect(result).toEqual({ success: false, errors: ["Stage kind 'Http' is already handled by plugin 'http'."] });
  });

  it('rejects plugins whose id differs from the configured one', () => {
    const result = createBuilder().tryBuild(['queue'], { queue: () => new QueueStagePlugin('broker') });

    expect(result).toEqual({ success: false, errors: ["Plugin 'queue' declares a different id 'broker'."] });
  });

  it('reports factories that throw', () => {
    const result = createBuilder().tryBuild(['queue'], {
      queue: () => {
        throw new Error('boom');
      },
    });

    expect(result).toEqual({ success: false, errors: ["Plugin 'queue' failed to load: boom"] });
  });

  it('fails to build without configured plugins', () => {
    expect(() => createBuilder().build([])).toThrow(ConfigurationError);
    expect(() => createBuilder().build([])).toThrow('Stage plugin registry could not be built:\n - No plugins were configured.');
  });
});

describe('WorkflowEngine plugin configuration', () => {
  it('builds its registry from the engine options', () => {
    const engine = new WorkflowEngine({
      logLevel: 'silent',
      plugins: ['http', 'queue'],
      pluginFactories: { queue: () => new QueueStagePlugin() },
    });

    expect(engine.getRegistry().supports('Queue')).toBe(true);
  });

  it('refuses unknown plugins', () => {
    expect(() => new WorkflowEngine({ logLevel: 'silent', plugins: ['ftp'] })).toThrow(
      "Stage plugin registry could not be built:\n - Plugin 'ftp' was not found; register a factory for it.",
    );
  });
});
