export {
  CatalogBaseUrlResolver,
  StaticBaseUrlResolver,
  selectCatalogVersion,
  combineBasePath,
  type ApiBaseUrlResolver,
} from './ApiBaseUrlResolver.js';
export { MockPayloadService } from './MockPayloadService.js';
