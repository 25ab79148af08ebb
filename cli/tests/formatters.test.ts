import { describe, it, expect, beforeEach } from 'vitest';
import type { WorkflowRunResult } from '@stageflow/engine';
import { createFormatter } from '../src/formatters/createFormatter.js';
import { HumanFormatter, formatDuration } from '../src/formatters/HumanFormatter.js';
import { JsonFormatter } from '../src/formatters/JsonFormatter.js';
import { NullFormatter } from '../src/formatters/NullFormatter.js';
import { parseKeyValuePairs, parseOutputFormat } from '../src/types/CliRunOptions.js';

const RESULT: WorkflowRunResult = {
  workflowName: 'orders',
  workflowId: 'wf-orders',
  status: 'Ok',
  message: 'Order o-1 is paid',
  output: { id: 'o-1' },
  context: {},
  stages: [
    { name: 'create', kind: 'Endpoint', status: 'completed', httpStatus: 201, retries: 1, durationMs: 1500 },
    { name: 'notify', kind: 'Endpoint', status: 'skipped', message: "runIf 'x' is false", durationMs: 0 },
  ],
  durationMs: 1520,
};

describe('option parsing', () => {
  it('parses key=value pairs', () => {
    expect(parseKeyValuePairs(['sku=A1', ' region = eu ', 'query=a=b', 'empty='])).toEqual({
      sku: 'A1',
      region: 'eu',
      query: 'a=b',
      empty: '',
    });
  });

  it('rejects pairs without a key or separator', () => {
    expect(() => parseKeyValuePairs(['sku'])).toThrow("Invalid engine option '--var': Invalid key=value format: sku");
    expect(() => parseKeyValuePairs(['=1'])).toThrow("Invalid engine option '--var': Empty key in: =1");
  });

  it('narrows output formats case-insensitively', () => {
    expect(parseOutputFormat('JSON')).toBe('json');
    expect(() => parseOutputFormat('xml')).toThrow("Unknown format 'xml'. Valid formats: human, json, null");
  });
});

describe('HumanFormatter', () => {
  let out: string[];
  let err: string[];

  beforeEach(() => {
    out = [];
    err = [];
  });

  function formatter(verbose = false): HumanFormatter {
    return new HumanFormatter({ verbose, noColor: true, out: (line) => out.push(line), err: (line) => err.push(line) });
  }

  it('prints the result summary with stage details when verbose', () => {
    formatter(true).showResult(RESULT);

    expect(out).toEqual([
      '',
      '═'.repeat(60),
      '✔ Workflow orders completed',
      '═'.repeat(60),
      'Order o-1 is paid',
      '',
      'Summary:',
      '  Stage runs: 2',
      '  Completed:  1',
      '  Skipped:    1',
      '  Duration:   1.52s',
      '',
      'Output:',
      '  id: o-1',
      '',
      'Stage Details:',
      '  ✔ create [Endpoint]  status 201  1 retry  1.50s',
      "  ⊘ notify [Endpoint]  0ms\n      runIf 'x' is false",
      '',
    ]);
  });

  it('reports failures without stage details by default', () => {
    formatter().showResult({
      ...RESULT,
      status: 'Error',
      message: "Stage 'create' returned 500 but expected 201.",
      output: {},
      stages: [{ name: 'create', kind: 'Endpoint', status: 'failed', httpStatus: 500, durationMs: 12 }],
      durationMs: 12,
    });

    expect(out).toEqual([
      '',
      '═'.repeat(60),
      '✖ Workflow orders failed',
      '═'.repeat(60),
      "Stage 'create' returned 500 but expected 201.",
      '',
      'Summary:',
      '  Stage runs: 1',
      '  Completed:  0',
      '  Failed:     1',
      '  Duration:   12ms',
      '',
    ]);
  });

  it('prints validation reports', () => {
    const human = formatter();
    human.showValidation('/flows/a.workflow', { valid: true, errors: [] });
    human.showValidation('/flows/b.workflow', { valid: false, errors: ['first', 'second'] });

    expect(out).toEqual(['✔ /flows/a.workflow is valid']);
    expect(err).toEqual(['✖ /flows/b.workflow has 2 errors:', '  - first', '  - second']);
  });

  it('prints errors, warnings and info lines', () => {
    const human = formatter();
    human.showError(new Error('boom'));
    human.showWarning('careful');
    human.showInfo('hello');

    expect(err).toEqual(['', '✖ Error: boom']);
    expect(out).toEqual(['⚠ careful', 'ℹ hello']);
  });

  it('formats durations', () => {
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(61000)).toBe('61.00s');
  });
});

describe('JsonFormatter', () => {
  let out: string[];
  let err: string[];
  let json: JsonFormatter;

  beforeEach(() => {
    out = [];
    err = [];
    json = new JsonFormatter({ out: (line) => out.push(line), err: (line) => err.push(line) });
  });

  it('prints one line per report', () => {
    json.showValidation('/flows/a.workflow', { valid: false, errors: ['x'] });

    expect(out).toEqual(['{"type":"workflow.validation","path":"/flows/a.workflow","valid":false,"errors":["x"]}']);
  });

  it('serializes the result error', () => {
    json.showResult({ ...RESULT, status: 'Error', error: new Error('boom') });

    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0] ?? '')).toEqual({
      type: 'workflow.result',
      workflowName: 'orders',
      workflowId: 'wf-orders',
      status: 'Error',
      message: 'Order o-1 is paid',
      output: { id: 'o-1' },
      context: {},
      stages: [
        { name: 'create', kind: 'Endpoint', status: 'completed', httpStatus: 201, retries: 1, durationMs: 1500 },
        { name: 'notify', kind: 'Endpoint', status: 'skipped', message: "runIf 'x' is false", durationMs: 0 },
      ],
      durationMs: 1520,
      error: { name: 'Error', message: 'boom' },
    });
  });

  it('writes errors to the error stream', () => {
    json.showError(new Error('boom'));

    expect(out).toEqual([]);
    expect(JSON.parse(err[0] ?? '')).toMatchObject({ type: 'error', error: { name: 'Error', message: 'boom' } });
  });
});

describe('createFormatter', () => {
  it('picks the formatter for each format', () => {
    expect(createFormatter('human')).toBeInstanceOf(HumanFormatter);
    expect(createFormatter('json')).toBeInstanceOf(JsonFormatter);
    expect(createFormatter('null')).toBeInstanceOf(NullFormatter);
  });
});
