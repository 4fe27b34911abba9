import { readFileSync } from 'node:fs';

import { parseCatalogPack, type NormalizedCatalogPack } from './pack.js';

const DEFAULT_CATALOG_URL = new URL('../data/default-catalog.json', import.meta.url);

let cachedDefaultPack: NormalizedCatalogPack | undefined;

/**
 * Reads and validates the catalog bundled with this package. The parsed pack
 * is cached for the lifetime of the process.
 */
export function loadDefaultCatalogPack(): NormalizedCatalogPack {
  if (cachedDefaultPack === undefined) {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_CATALOG_URL, 'utf8'));
    cachedDefaultPack = parseCatalogPack(raw);
  }
  return cachedDefaultPack;
}
