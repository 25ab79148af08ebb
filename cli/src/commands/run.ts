/**
 * Run Command
 *
 * Loads a workflow, resolves its inputs and API base URLs, validates it and
 * runs it (or prints its plan with --dry-run).
 *
 * Usage:
 *   stageflow run create-account.workflow --env staging --catalog catalog.json
 *   stageflow run create-account.workflow --var username=demo --mocked
 *   stageflow run create-account.workflow --dry-run --verbose
 *   stageflow run create-account.workflow --format json
 *
 * Exit codes:
 *   0 - Workflow completed
 *   1 - Invalid workflow, inputs or catalog
 *   2 - Workflow failed
 *   3 - Cancelled
 *   4 - Internal error
 */

import { existsSync } from 'fs';
import type { Command } from 'commander';
import {
  ApiCatalogLoader,
  CatalogBaseUrlResolver,
  ExitCode,
  VarsFileLoader,
  WorkflowEngine,
  WorkflowLoader,
  selectCatalogVersion,
  type ApiBaseUrlResolver,
  type EngineDependencies,
  type WorkflowDocument,
} from '@stageflow/engine';
import { engineLogLevel, exitCodeFor, selectFormatter, toError } from '../utils/commandSupport.js';
import { parseKeyValuePairs, type CliRunOptions } from '../types/CliRunOptions.js';
import type { Formatter } from '../formatters/Formatter.js';

/**
 * Collaborators a caller (or a test) can supply
 */
export interface CommandContext {
  formatter?: Formatter;
  dependencies?: EngineDependencies;
  /** Replaces the SIGINT-driven cancellation */
  signal?: AbortSignal;
}

interface ResolvedInputs {
  inputs: Record<string, string>;
  varsOverrideActive: boolean;
}

/**
 * Register the run command
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run <workflow>')
    .description('Run a workflow')
    .option('-e, --env <name>', 'Environment name', 'local')
    .option('--catalog <path>', 'API catalog (JSON or YAML)')
    .option('--catalog-version <version>', 'Catalog version (defaults to the workflow version)')
    .option('--env-file <path>', 'Environment file used instead of references.environmentFile')
    .option('--vars-file <path>', 'Inputs file (.wfvars); defaults to the workflow sidecar')
    .option('--var <key=value...>', 'Set a workflow input (repeatable)')
    .option('--mocked', 'Use mock blocks instead of calling endpoints')
    .option('--dry-run', 'Validate and print the plan without executing')
    .option('--verbose', 'Show detailed output')
    .option('--debug', 'Log stage debug maps')
    .option('-f, --format <format>', 'Output format (human|json|null)', 'human')
    .option('--no-color', 'Disable colored output')
    .action(async (workflowPath: string, options: CliRunOptions) => {
      process.exitCode = await executeRun(workflowPath, options);
    });
}

/**
 * Run command handler
 *
 * @returns Process exit code
 */
export async function executeRun(workflowPath: string, options: CliRunOptions, context: CommandContext = {}): Promise<ExitCode> {
  const selection = selectFormatter(options.format, { verbose: options.verbose, color: options.color }, context.formatter);
  const formatter = selection.formatter;
  if ('error' in selection) {
    formatter.showError(selection.error);
    return exitCodeFor(selection.error);
  }

  try {
    if (options.dryRun) {
      formatter.showInfo('Starting dry-run...');
    } else if (options.mocked) {
      formatter.showInfo('Using mocked payloads/outputs when defined...');
    }

    const loader = context.dependencies?.documentLoader ?? new WorkflowLoader();
    const document = await loader.load(workflowPath, undefined, options.envFile);
    formatter.showInfo(`Workflow [${document.definition.name}] loaded successfully.`);

    const { inputs, varsOverrideActive } = await resolveInputs(document, options, formatter);
    const baseUrlResolver = await resolveBaseUrls(document, options, formatter);

    const engine = new WorkflowEngine(
      {
        environment: options.env,
        mocked: options.mocked ?? false,
        varsOverrideActive,
        verbose: options.verbose ?? false,
        debug: options.debug ?? false,
        logLevel: engineLogLevel(selection.format, options.verbose),
      },
      {
        ...context.dependencies,
        documentLoader: loader,
        baseUrlResolver: baseUrlResolver ?? context.dependencies?.baseUrlResolver,
      },
    );

    const validation = await engine.validate(document);
    if (!validation.valid) {
      formatter.showValidation(document.filePath, validation);
      return ExitCode.INVALID_WORKFLOW;
    }

    if (options.dryRun) {
      formatter.showPlan(await engine.plan(document, options.verbose ?? false));
      return ExitCode.SUCCESS;
    }

    const unsubscribe = engine.getEventBus().onAny((event) => formatter.onEvent(event));
    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once('SIGINT', onInterrupt);
    try {
      const result = await engine.run(document, {
        inputs,
        varsOverrideActive,
        signal: context.signal ?? controller.signal,
      });
      formatter.showResult(result);
      return result.status === 'Ok' ? ExitCode.SUCCESS : ExitCode.WORKFLOW_FAILED;
    } finally {
      process.off('SIGINT', onInterrupt);
      unsubscribe();
    }
  } catch (error) {
    formatter.showError(toError(error));
    return exitCodeFor(error);
  }
}

/**
 * Vars file values (explicit path, else the sidecar when present), then --var
 */
async function resolveInputs(document: WorkflowDocument, options: CliRunOptions, formatter: Formatter): Promise<ResolvedInputs> {
  const inputs: Record<string, string> = {};
  const sidecar = VarsFileLoader.sidecarPath(document.filePath);
  const varsFile = options.varsFile ?? (existsSync(sidecar) ? sidecar : undefined);

  if (varsFile) {
    formatter.showInfo(`Vars file: ${varsFile}`);
    const resolution = await new VarsFileLoader().load(varsFile, options.env, document.definition.version);
    Object.assign(inputs, resolution.values);
    if (options.verbose) {
      for (const [key, source] of Object.entries(resolution.sources)) {
        const section =
          source.scope === 'global'
            ? 'global'
            : source.scope === 'environment'
              ? source.environment
              : `${source.environment} version ${source.version}`;
        formatter.showInfo(`  ${key} ← ${section}`);
      }
    }
  }

  const overrides = options.var ?? [];
  Object.assign(inputs, parseKeyValuePairs(overrides));
  return { inputs, varsOverrideActive: varsFile !== undefined || overrides.length > 0 };
}

/**
 * Catalog resolver for the selected environment; checks every referenced
 * API up front so a bad environment fails before anything runs
 */
async function resolveBaseUrls(
  document: WorkflowDocument,
  options: CliRunOptions,
  formatter: Formatter,
): Promise<ApiBaseUrlResolver | undefined> {
  if (!options.catalog) {
    return undefined;
  }
  formatter.showInfo(`Catalog: ${options.catalog}`);
  formatter.showInfo(`Environment: ${options.env}`);

  const catalog = await ApiCatalogLoader.load(options.catalog);
  const version = selectCatalogVersion(catalog, options.catalogVersion ?? document.definition.version);
  const resolver = new CatalogBaseUrlResolver(version, options.env);
  for (const [name, baseUrl] of Object.entries(resolver.resolveAll(document))) {
    formatter.showInfo(`  ${name} → ${baseUrl}`);
  }
  return resolver;
}
