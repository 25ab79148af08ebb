import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ApiCatalogLoader } from '../src/loader/ApiCatalogLoader.js';
import {
  CatalogBaseUrlResolver,
  StaticBaseUrlResolver,
  combineBasePath,
  selectCatalogVersion,
} from '../src/services/ApiBaseUrlResolver.js';
import type { ApiCatalogVersion, WorkflowDocument } from '../src/types/definitions.js';

const CATALOG = [
  {
    version: '3.11',
    baseUrl: { staging: 'https://staging.test' },
    definitions: [
      { name: 'Accounts', basePath: '/accounts/' },
      { name: 'Billing', baseUrl: { Staging: 'https://billing.test' } },
    ],
  },
  {
    version: '3.12',
    baseUrl: { staging: 'https://next.test' },
    definitions: [{ name: 'Accounts' }],
  },
];

const document: WorkflowDocument = {
  definition: {
    version: '3.11',
    id: 'wf',
    name: 'wf',
    references: {
      apis: [
        { name: 'acc', definition: 'accounts' },
        { name: 'bill', definition: 'Billing' },
      ],
    },
    stages: [{ name: 'a', kind: 'Workflow' }],
  },
  filePath: '/flows/wf.workflow',
  environmentVariables: {},
};

describe('API base URLs', () => {
  let directory: string;
  let catalog: ApiCatalogVersion[];

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'stageflow-catalog-'));
    const catalogPath = join(directory, 'catalog.json');
    await writeFile(catalogPath, JSON.stringify(CATALOG));
    catalog = await ApiCatalogLoader.load(catalogPath);
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('loads every catalog version', () => {
    expect(catalog.map((entry) => entry.version)).toEqual(['3.11', '3.12']);
  });

  it('selects versions case-insensitively and lists the alternatives', () => {
    expect(selectCatalogVersion(catalog, '3.12').baseUrl).toEqual({ staging: 'https://next.test' });
    expect(() => selectCatalogVersion(catalog, '9')).toThrow("Catalog version '9' was not found. Available versions: 3.11, 3.12");
  });

  it('resolves references through definitions and environments', () => {
    const resolver = new CatalogBaseUrlResolver(selectCatalogVersion(catalog, '3.11'), 'staging');

    expect(resolver.resolve('ACC', document)).toBe('https://staging.test/accounts');
    expect(resolver.resolveAll(document)).toEqual({
      acc: 'https://staging.test/accounts',
      bill: 'https://billing.test',
    });
    expect(resolver.defaultBaseUrl()).toBe('https://staging.test');
  });

  it('reports undeclared references', () => {
    const resolver = new CatalogBaseUrlResolver(selectCatalogVersion(catalog, '3.11'), 'staging');

    expect(() => resolver.resolve('orders', document)).toThrow("API reference 'orders' was not found.");
  });

  it('reports environments the catalog does not know', () => {
    const resolver = new CatalogBaseUrlResolver(selectCatalogVersion(catalog, '3.11'), 'prod');

    expect(() => resolver.resolve('acc', document)).toThrow(
      "Environment 'prod' was not found for API definition 'Accounts' in catalog version '3.11'.",
    );
  });

  it('reports definitions missing from the version', () => {
    const resolver = new CatalogBaseUrlResolver(selectCatalogVersion(catalog, '3.12'), 'staging');

    expect(() => resolver.resolve('bill', document)).toThrow("API definition 'Billing' was not found in catalog version '3.12'.");
  });

  it('rejects empty catalogs', async () => {
    const emptyPath = join(directory, 'empty.json');
    await writeFile(emptyPath, '[]');

    await expect(ApiCatalogLoader.load(emptyPath)).rejects.toThrow('Catalog file is empty.');
  });

  it('resolves fixed maps case-insensitively', () => {
    const resolver = new StaticBaseUrlResolver({ Accounts: 'https://accounts.test' });

    expect(resolver.resolve('accounts')).toBe('https://accounts.test');
    expect(() => resolver.resolve('billing')).toThrow("API reference 'billing' was not found.");
  });

  it('joins base paths with one slash', () => {
    expect(combineBasePath('https://a.test/', '/v1/')).toBe('https://a.test/v1');
    expect(combineBasePath('https://a.test', ' ')).toBe('https://a.test');
  });
});
