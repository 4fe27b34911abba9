export {
  catalogPackSchema,
  parseCatalogPack,
  validateCatalogPack,
  type CatalogPackInput,
  type CatalogPackValidationResult,
  type NormalizedCatalogPack,
} from './pack.js';

export { CatalogReferenceError, CatalogSchemaError } from './errors.js';

export { loadDefaultCatalogPack } from './default-pack.js';

export {
  checkCatalogCompatibility,
  type CatalogCompatibility,
} from './runtime-compat.js';

export * from './base/ids.js';
export * from './base/numbers.js';

export * from './modules/metadata.js';
export * from './modules/search-tiers.js';
export * from './modules/quality-tiers.js';
export * from './modules/inspection-tiers.js';
export * from './modules/credit-fees.js';
export * from './modules/discovery.js';
