import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { WorkflowOutputWriter, type OutputWriter } from '../src/execution/WorkflowOutputWriter.js';
import { EngineTestHarness } from '../src/testing/EngineTestHarness.js';
import type { WorkflowDocument } from '../src/types/definitions.js';

describe('WorkflowOutputWriter', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'stageflow-output-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  function documentFor(outputJson?: boolean): WorkflowDocument {
    return {
      definition: {
        version: '1',
        id: 'wf-1',
        name: 'my orders',
        stages: [{ name: 'a', kind: 'Workflow' }],
        endStage: outputJson === undefined ? undefined : { outputJson },
      },
      filePath: join(directory, 'orders.workflow'),
      environmentVariables: {},
    };
  }

  it('writes the output beside the workflow with JSON values expanded', async () => {
    const filePath = await new WorkflowOutputWriter().write(documentFor(), {
      id: 'o-1',
      items: '[1,2]',
      meta: '{"a":1}',
      broken: '{oops',
    });

    expect(filePath.startsWith(join(directory, 'output'))).toBe(true);
    expect(basename(filePath)).toMatch(/^my-orders\.wf-1\.[0-9A-HJKMNP-TV-Z]{26}\.workflow\.output$/);
    expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual({
      id: 'o-1',
      items: [1, 2],
      meta: { a: 1 },
      broken: '{oops',
    });
    expect(await readdir(join(directory, 'output'))).toHaveLength(1);
  });

  it('keeps every value a string when outputJson is off', async () => {
    const filePath = await new WorkflowOutputWriter().write(documentFor(false), { items: '[1,2]' });

    expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual({ items: '[1,2]' });
  });
});

describe('output files during a run', () => {
  it('writes the output of workflows that enable it', async () => {
    const written: Array<Record<string, string>> = [];
    const writer: OutputWriter = {
      async write(_document, output) {
        written.push({ ...output });
        return '/out/written.workflow.output';
      },
    };
    const harness = new EngineTestHarness({ engine: { writeOutputFiles: true }, dependencies: { outputWriter: writer } });
    harness.loader.add('/flows/written.workflow', {
      version: '1',
      id: 'wf-w',
      name: 'written',
      output: true,
      references: { apis: [{ name: 'shop', definition: 'Shop' }] },
      initStage: { variables: [{ name: 'code', type: 'Fixed', value: 'X-1' }] },
      stages: [
        { name: 'ping', kind: 'Endpoint', apiRef: 'shop', endpoint: '/ping', httpVerb: 'GET', expectedStatus: 200, mock: { payload: '{}' } },
      ],
      endStage: { output: { code: '{{global.code}}' } },
    });

    const result = await harness.assertSuccess('/flows/written.workflow', { mocked: true });

    expect(written).toEqual([{ code: 'X-1' }]);
    expect(result.outputFilePath).toBe('/out/written.workflow.output');
    expect(harness.getLogs()).toContain('[INFO] [written] output written to /out/written.workflow.output');
  });
});
