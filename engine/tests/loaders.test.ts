import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationError, SchemaError } from '../src/errors/index.js';
import { ENV_FILE_OPTIONS, KeyValueFileLoader } from '../src/loader/KeyValueFileLoader.js';
import { VarsFileLoader } from '../src/loader/VarsFileLoader.js';
import { WorkflowLoader } from '../src/loader/WorkflowLoader.js';

const WORKFLOW_YAML = `
version: 1
id: wf-1
name: create-account
references:
  environmentFile: dev.env
stages:
  - name: child
    kind: Workflow
`;

const ENV_FILE = `
# shared settings
export API_KEY="test-secret"
REGION=eu
CALLBACK=https://hooks.test/cb?a=b
EMPTY=
`;

const VARS_FILE = `
global:
  tenant: acme
  region: eu
staging:
  tenant: acme-staging
  version: 2
    tenant: 'acme-v2'
qa:
  tenant: acme-qa
`;

describe('loaders', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'stageflow-loader-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe('WorkflowLoader', () => {
    it('loads a YAML workflow with its environment file', async () => {
      const workflowPath = join(directory, 'create.workflow');
      await writeFile(workflowPath, WORKFLOW_YAML);
      await writeFile(join(directory, 'dev.env'), ENV_FILE);

      const document = await new WorkflowLoader().load(workflowPath, { REGION: 'us' });

      expect(document.filePath).toBe(workflowPath);
      expect(document.definition.name).toBe('create-account');
      expect(document.definition.version).toBe('1');
      expect(document.environmentVariables).toEqual({
        API_KEY: 'test-secret',
        REGION: 'us',
        CALLBACK: 'https://hooks.test/cb?a=b',
        EMPTY: '',
      });
    });

    it('uses an explicit environment file instead of the declared one', async () => {
      const workflowPath = join(directory, 'create.workflow');
      const overridePath = join(directory, 'ci.env');
      await writeFile(workflowPath, WORKFLOW_YAML);
      await writeFile(overridePath, 'REGION=ci\n');

      const document = await new WorkflowLoader().load(workflowPath, undefined, overridePath);

      expect(document.environmentVariables).toEqual({ REGION: 'ci' });
    });

    it('parses JSON workflows by extension', async () => {
      const workflowPath = join(directory, 'create.json');
      await writeFile(
        workflowPath,
        JSON.stringify({ version: '2', id: 'wf-2', name: 'json-flow', stages: [{ name: 'a', kind: 'Workflow' }] }),
      );

      const document = await new WorkflowLoader().load(workflowPath);

      expect(document.definition.name).toBe('json-flow');
      expect(document.environmentVariables).toEqual({});
    });

    it('reports missing files', async () => {
      const workflowPath = join(directory, 'missing.workflow');

      await expect(new WorkflowLoader().load(workflowPath)).rejects.toThrow(`Workflow file was not found: ${workflowPath}`);
    });

    it('reports missing environment files', async () => {
      const workflowPath = join(directory, 'create.workflow');
      await writeFile(workflowPath, WORKFLOW_YAML);

      await expect(new WorkflowLoader().load(workflowPath)).rejects.toThrow(
        `Environment file was not found: ${join(directory, 'dev.env')}`,
      );
    });

    it('reports schema problems', async () => {
      const missingName = join(directory, 'nameless.workflow');
      await writeFile(missingName, 'version: 1\nid: x\nstages:\n  - name: a\n    kind: Workflow\n');
      const unknownField = join(directory, 'colour.workflow');
      await writeFile(unknownField, 'version: 1\nid: x\nname: x\ncolour: red\nstages:\n  - name: a\n    kind: Workflow\n');

      await expect(new WorkflowLoader().load(missingName)).rejects.toThrow('Missing required field "name"');
      await expect(new WorkflowLoader().load(unknownField)).rejects.toThrow('Unknown field "colour"');
    });

    it('reports unparseable files', async () => {
      const workflowPath = join(directory, 'broken.workflow');
      await writeFile(workflowPath, 'name: [unclosed\n');

      const load = new WorkflowLoader().load(workflowPath);
      await expect(load).rejects.toBeInstanceOf(SchemaError);
      await expect(load).rejects.toThrow(`Failed to parse ${workflowPath}:`);
    });

    it('resolves references beside the parent workflow', () => {
      expect(WorkflowLoader.resolveReferencePath('/flows/parent.workflow', 'children/child.workflow')).toBe(
        '/flows/children/child.workflow',
      );
      expect(WorkflowLoader.resolveReferencePath('/flows/parent.workflow', '/shared/child.workflow')).toBe('/shared/child.workflow');
    });
  });

  describe('KeyValueFileLoader', () => {
    it('rejects lines without a key', () => {
      expect(() => KeyValueFileLoader.parse('A=1\n=2\n', ENV_FILE_OPTIONS, 'app.env')).toThrow(
        'Invalid env file entry at line 2. (app.env)',
      );
      expect(() => KeyValueFileLoader.parse('NOSEPARATOR', ENV_FILE_OPTIONS, 'app.env')).toThrow(ConfigurationError);
    });

    it('strips one pair of matching quotes', () => {
      expect(KeyValueFileLoader.parse(`A='x'\nB="y'\nC=""`, ENV_FILE_OPTIONS, 'app.env')).toEqual({ A: 'x', B: `"y'`, C: '' });
    });
  });

  describe('VarsFileLoader', () => {
    let varsPath: string;

    beforeEach(async () => {
      varsPath = join(directory, 'create.wfvars');
      await writeFile(varsPath, VARS_FILE);
    });

    it('layers global, environment and version values', async () => {
      const resolution = await new VarsFileLoader().load(varsPath, 'staging', '2');

      expect(resolution.values).toEqual({ tenant: 'acme-v2', region: 'eu' });
      expect(resolution.sources).toEqual({
        tenant: { scope: 'version', environment: 'staging', version: '2' },
        region: { scope: 'global' },
      });
    });

    it('matches environments case-insensitively', async () => {
      const resolution = await new VarsFileLoader().load(varsPath, 'STAGING', '1');

      expect(resolution.values).toEqual({ tenant: 'acme-staging', region: 'eu' });
      expect(resolution.sources.tenant).toEqual({ scope: 'environment', environment: 'STAGING' });
    });

    it('falls back to globals for unknown environments', async () => {
      const resolution = await new VarsFileLoader().load(varsPath, 'prod');

      expect(resolution.values).toEqual({ tenant: 'acme', region: 'eu' });
    });

    it('rejects unknown environments when there are no globals', async () => {
      await writeFile(varsPath, 'qa:\n  tenant: acme-qa\n');

      await expect(new VarsFileLoader().load(varsPath, 'prod')).rejects.toThrow(
        `Vars file does not define environment 'prod' and has no global variables. (${varsPath})`,
      );
    });

    it('rejects malformed lines', async () => {
      await writeFile(varsPath, 'global:\n  just text\n');

      await expect(new VarsFileLoader().load(varsPath)).rejects.toThrow(`Invalid vars file entry at line 2. (${varsPath})`);
    });

    it('derives the sidecar path from the workflow path', () => {
      expect(VarsFileLoader.sidecarPath('/flows/orders.workflow')).toBe('/flows/orders.wfvars');
      expect(VarsFileLoader.sidecarPath('/flows.d/orders')).toBe('/flows.d/orders.wfvars');
    });
  });
});
