import { z } from 'zod';

import { CatalogSchemaError } from './errors.js';
import { catalogMetadataSchema, type CatalogMetadata } from './modules/metadata.js';
import {
  creditFeeScheduleSchema,
  type NormalizedCreditFeeSchedule,
} from './modules/credit-fees.js';
import {
  discoveryGateDefinitionSchema,
  type NormalizedDiscoveryGate,
} from './modules/discovery.js';
import {
  inspectionTierCollectionSchema,
  type NormalizedInspectionTier,
} from './modules/inspection-tiers.js';
import {
  qualityTierCollectionSchema,
  type NormalizedQualityTier,
} from './modules/quality-tiers.js';
import {
  searchTierCollectionSchema,
  type NormalizedSearchTier,
} from './modules/search-tiers.js';

export const catalogPackSchema = z
  .object({
    metadata: catalogMetadataSchema,
    searchTiers: searchTierCollectionSchema,
    qualityTiers: qualityTierCollectionSchema,
    inspectionTiers: inspectionTierCollectionSchema,
    creditFees: creditFeeScheduleSchema,
    discovery: discoveryGateDefinitionSchema,
  })
  .strict();

export type CatalogPackInput = z.input<typeof catalogPackSchema>;

export interface NormalizedCatalogPack {
  readonly metadata: CatalogMetadata;
  readonly searchTiers: readonly NormalizedSearchTier[];
  readonly qualityTiers: readonly NormalizedQualityTier[];
  readonly inspectionTiers: readonly NormalizedInspectionTier[];
  readonly creditFees: NormalizedCreditFeeSchedule;
  readonly discovery: NormalizedDiscoveryGate;
}

export type CatalogPackValidationResult =
  | { readonly success: true; readonly pack: NormalizedCatalogPack }
  | { readonly success: false; readonly error: CatalogSchemaError };

const formatIssues = (issues: readonly z.ZodIssue[]): string =>
  issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');

const deepFreeze = <T>(value: T): T => {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
  return value;
};

export const validateCatalogPack = (input: unknown): CatalogPackValidationResult => {
  const result = catalogPackSchema.safeParse(input);
  if (!result.success) {
    return {
      success: false,
      error: new CatalogSchemaError(
        `Catalog pack validation failed: ${formatIssues(result.error.issues)}`,
        result.error.issues,
      ),
    };
  }

  return { success: true, pack: deepFreeze(result.data) };
};

/**
 * Parses and normalizes a catalog pack, throwing {@link CatalogSchemaError}
 * with the collected zod issues when the input is invalid.
 */
export const parseCatalogPack = (input: unknown): NormalizedCatalogPack => {
  const result = validateCatalogPack(input);
  if (!result.success) {
    throw result.error;
  }
  return result.pack;
};
