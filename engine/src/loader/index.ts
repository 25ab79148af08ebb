/**
 * Loader Module
 *
 * File I/O for workflows, environment files, vars files and API catalogs.
 *
 * @module loader
 */

export { WorkflowLoader, type DocumentLoader } from './WorkflowLoader.js';
export { KeyValueFileLoader, ENV_FILE_OPTIONS, unquote, type KeyValueParseOptions } from './KeyValueFileLoader.js';
export { VarsFileLoader, type VarsFileResolution, type VarsFileSource } from './VarsFileLoader.js';
export { ApiCatalogLoader } from './ApiCatalogLoader.js';
