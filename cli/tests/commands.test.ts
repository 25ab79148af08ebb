import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ExitCode,
  InMemoryDocumentLoader,
  MockEndpointInvoker,
  StaticBaseUrlResolver,
  type EngineDependencies,
} from '@stageflow/engine';
import { executePlan } from '../src/commands/plan.js';
import { executeRun, type CommandContext } from '../src/commands/run.js';
import { executeValidate } from '../src/commands/validate.js';
import { HumanFormatter } from '../src/formatters/HumanFormatter.js';
import { JsonFormatter } from '../src/formatters/JsonFormatter.js';
import { createProgram, CLI_VERSION } from '../src/program.js';
import type { CliRunOptions } from '../src/types/CliRunOptions.js';

const PRICE = {
  version: '1',
  id: 'wf-price',
  name: 'price',
  references: { apis: [{ name: 'shop', definition: 'Shop' }] },
  input: [{ name: 'sku' }],
  stages: [
    {
      name: 'lookup',
      kind: 'Endpoint',
      apiRef: 'shop',
      endpoint: '/items/{{input.sku}}',
      httpVerb: 'GET',
      expectedStatus: 200,
      output: { price: '{{response.price}}' },
      mock: { payload: '{"price":"1.00"}' },
    },
  ],
  endStage: { output: { price: '{{stage:lookup.output.price}}' } },
};

const BROKEN = { ...PRICE, name: 'broken', stages: [{ name: 'w', kind: 'Workflow', workflowRef: 'ghost' }] };

function runOptions(overrides: Partial<CliRunOptions> = {}): CliRunOptions {
  return { env: 'local', format: 'json', color: false, ...overrides };
}

function parseLines(lines: string[]): Array<Record<string, unknown>> {
  return lines.map((line): Record<string, unknown> => JSON.parse(line));
}

describe('commands', () => {
  let out: string[];
  let err: string[];
  let logs: string[];
  let loader: InMemoryDocumentLoader;
  let invoker: MockEndpointInvoker;
  let dependencies: EngineDependencies;

  beforeEach(() => {
    out = [];
    err = [];
    logs = [];
    loader = new InMemoryDocumentLoader().add('/flows/price.workflow', PRICE).add('/flows/broken.workflow', BROKEN);
    invoker = new MockEndpointInvoker();
    dependencies = {
      documentLoader: loader,
      endpointInvoker: invoker,
      baseUrlResolver: new StaticBaseUrlResolver({ shop: 'https://shop.test' }),
      logSink: (line) => logs.push(line),
    };
  });

  function json(): CommandContext {
    return { formatter: new JsonFormatter({ out: (line) => out.push(line), err: (line) => err.push(line) }), dependencies };
  }

  function human(verbose = false): CommandContext {
    return {
      formatter: new HumanFormatter({ verbose, noColor: true, out: (line) => out.push(line), err: (line) => err.push(line) }),
      dependencies,
    };
  }

  describe('executeRun', () => {
    it('runs a workflow with --var inputs and prints the result', async () => {
      invoker.on('GET https://shop.test/items/A1', { status: 200, body: { price: '5.00' } });

      const code = await executeRun('/flows/price.workflow', runOptions({ var: ['sku=A1'] }), json());

      expect(code).toBe(ExitCode.SUCCESS);
      const lines = parseLines(out);
      expect(lines[0]).toMatchObject({ type: 'info', message: 'Workflow [price] loaded successfully.' });
      expect(lines.map((line) => line.type)).toContain('workflow.started');
      expect(lines[lines.length - 1]).toMatchObject({ type: 'workflow.result', status: 'Ok', output: { price: '5.00' } });
      expect(invoker.getCallCount()).toBe(1);
      expect(logs).toEqual([]);
    });

    it('returns the failure code when the workflow fails', async () => {
      invoker.on('GET https://shop.test/items/A1', { status: 500 });

      const code = await executeRun('/flows/price.workflow', runOptions({ var: ['sku=A1'] }), json());

      expect(code).toBe(ExitCode.WORKFLOW_FAILED);
      expect(parseLines(out).pop()).toMatchObject({
        type: 'workflow.result',
        status: 'Error',
        message: "Stage 'lookup' returned 500 but expected 200.",
      });
    });

    it('uses mock payloads instead of calling endpoints', async () => {
      const code = await executeRun('/flows/price.workflow', runOptions({ format: 'human', mocked: true, var: ['sku=A1'] }), human());

      expect(code).toBe(ExitCode.SUCCESS);
      expect(out.slice(0, 2)).toEqual(['ℹ Using mocked payloads/outputs when defined...', 'ℹ Workflow [price] loaded successfully.']);
      expect(out).toContain('✔ Workflow price completed');
      expect(out).toContain('  price: 1.00');
      expect(invoker.getCallCount()).toBe(0);
      expect(logs).toContain('[INFO] [price]#lookup invoke: [Endpoint]');
    });

    it('prints the plan on a dry run', async () => {
      const code = await executeRun('/flows/price.workflow', runOptions({ dryRun: true }), json());

      expect(code).toBe(ExitCode.SUCCESS);
      const lines = parseLines(out);
      expect(lines.map((line) => line.message ?? line.type)).toEqual([
        'Starting dry-run...',
        'Workflow [price] loaded successfully.',
        'workflow.plan',
      ]);
      expect(lines[2]).toMatchObject({ plan: { name: 'price', stages: [{ name: 'lookup', endpoint: '/items/{{input.sku}}' }] } });
      expect(invoker.getCallCount()).toBe(0);
    });

    it('reports validation errors before running', async () => {
      const code = await executeRun('/flows/broken.workflow', runOptions(), json());

      expect(code).toBe(ExitCode.INVALID_WORKFLOW);
      expect(parseLines(out).pop()).toEqual({
        type: 'workflow.validation',
        path: '/flows/broken.workflow',
        valid: false,
        errors: ["Stage 'w' workflowRef 'ghost' is not declared in references."],
      });
    });

    it('rejects malformed --var pairs', async () => {
      const code = await executeRun('/flows/price.workflow', runOptions({ var: ['sku'] }), json());

      expect(code).toBe(ExitCode.INVALID_WORKFLOW);
      expect(parseLines(err)[0]).toMatchObject({
        type: 'error',
        error: { message: "Invalid engine option '--var': Invalid key=value format: sku", code: 'SF-C-004' },
      });
    });

    it('reports cancellation with its own exit code', async () => {
      const controller = new AbortController();
      controller.abort();

      const code = await executeRun('/flows/price.workflow', runOptions({ var: ['sku=A1'] }), {
        ...json(),
        signal: controller.signal,
      });

      expect(code).toBe(ExitCode.CANCELLED);
      expect(parseLines(err)[0]).toMatchObject({
        type: 'error',
        error: { message: "Workflow 'price' was cancelled during stage 'lookup'." },
      });
      expect(invoker.getCallCount()).toBe(0);
    });

    it('rejects an unknown output format', async () => {
      const code = await executeRun('/flows/price.workflow', runOptions({ format: 'xml' }), human());

      expect(code).toBe(ExitCode.INVALID_WORKFLOW);
      expect(err[1]).toBe("✖ Error: Invalid engine option '--format': Unknown format 'xml'. Valid formats: human, json, null");
    });

    describe('with files on disk', () => {
      let directory: string;

      beforeEach(async () => {
        directory = await mkdtemp(join(tmpdir(), 'stageflow-cli-'));
      });

      afterEach(async () => {
        await rm(directory, { recursive: true, force: true });
      });

      it('takes inputs from a vars file and base URLs from a catalog', async () => {
        const varsPath = join(directory, 'price.wfvars');
        const catalogPath = join(directory, 'catalog.json');
        await writeFile(varsPath, 'global:\n  sku: B2\n');
        await writeFile(
          catalogPath,
          JSON.stringify([{ version: '1', baseUrl: { qa: 'https://qa.test' }, definitions: [{ name: 'Shop' }] }]),
        );
        invoker.on('GET https://qa.test/items/B2', { status: 200, body: { price: '7.50' } });

        const code = await executeRun(
          '/flows/price.workflow',
          runOptions({ env: 'qa', format: 'human', varsFile: varsPath, catalog: catalogPath }),
          human(),
        );

        expect(code).toBe(ExitCode.SUCCESS);
        expect(out.slice(0, 5)).toEqual([
          'ℹ Workflow [price] loaded successfully.',
          `ℹ Vars file: ${varsPath}`,
          `ℹ Catalog: ${catalogPath}`,
          'ℹ Environment: qa',
          'ℹ   shop → https://qa.test',
        ]);
        expect(out).toContain('  price: 7.50');
        expect(invoker.getLastCall()?.url).toBe('https://qa.test/items/B2');
      });
    });
  });

  describe('executeValidate', () => {
    it('reports a valid workflow', async () => {
      const code = await executeValidate('/flows/price.workflow', { format: 'human', color: false }, human());

      expect(code).toBe(ExitCode.SUCCESS);
      expect(out).toEqual(['✔ /flows/price.workflow is valid']);
    });

    it('lists validation errors', async () => {
      const code = await executeValidate('/flows/broken.workflow', { format: 'human', color: false }, human());

      expect(code).toBe(ExitCode.INVALID_WORKFLOW);
      expect(err).toEqual([
        '✖ /flows/broken.workflow has 1 error:',
        "  - Stage 'w' workflowRef 'ghost' is not declared in references.",
      ]);
    });

    it('reports missing workflow files', async () => {
      const code = await executeValidate('/flows/none.workflow', { format: 'json', color: false }, json());

      expect(code).toBe(ExitCode.INVALID_WORKFLOW);
      expect(parseLines(err)[0]).toMatchObject({
        error: { message: 'Workflow file was not found: /flows/none.workflow', code: 'SF-R-001' },
      });
    });
  });

  describe('executePlan', () => {
    it('prints the plan for a valid workflow', async () => {
      const code = await executePlan('/flows/price.workflow', { format: 'json', color: false }, json());

      expect(code).toBe(ExitCode.SUCCESS);
      expect(parseLines(out)).toEqual([expect.objectContaining({ type: 'workflow.plan' })]);
    });

    it('refuses to plan an invalid workflow', async () => {
      const code = await executePlan('/flows/broken.workflow', { format: 'json', color: false }, json());

      expect(code).toBe(ExitCode.INVALID_WORKFLOW);
      expect(parseLines(out)[0]).toMatchObject({ type: 'workflow.validation', valid: false });
    });
  });

  describe('createProgram', () => {
    it('registers the commands', () => {
      const program = createProgram();

      expect(program.name()).toBe('stageflow');
      expect(program.version()).toBe(CLI_VERSION);
      expect(program.commands.map((command) => command.name())).toEqual(['run', 'validate', 'plan']);
    });
  });
});
