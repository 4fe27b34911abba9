import {
  checkCatalogCompatibility,
  loadDefaultCatalogPack,
  type NormalizedCatalogPack,
  type NormalizedCreditFeeBand,
  type NormalizedDiscoveryGate,
  type NormalizedInspectionTier,
  type NormalizedQualityTier,
  type NormalizedSearchTier,
} from '@agent-market/catalog-schema';

import { ConfigurationError } from './errors.js';
import { RUNTIME_VERSION } from './version.js';

export type SearchTier = NormalizedSearchTier;
export type QualityTier = NormalizedQualityTier;
export type InspectionTier = NormalizedInspectionTier;
export type DiscoveryGateDefinition = NormalizedDiscoveryGate;

export interface CreditBandResolution {
  readonly name: string;
  readonly modifier: number;
  /** `null` when the score is below every declared band. */
  readonly minScore: number | null;
}

export interface TierCatalogOptions {
  /**
   * Engine version checked against the pack's `engineCompatibility` range.
   *
   * @defaultValue {@link RUNTIME_VERSION}
   */
  readonly runtimeVersion?: string;
}

/**
 * Read-only lookup over a validated catalog pack. Lookups by unknown id throw
 * {@link ConfigurationError}; callers that can tolerate a missing tier use the
 * `find*` variants.
 */
export class TierCatalog {
  readonly pack: NormalizedCatalogPack;

  private readonly searchTiers: ReadonlyMap<string, SearchTier>;
  private readonly qualityTiers: ReadonlyMap<string, QualityTier>;
  private readonly inspectionTiers: ReadonlyMap<string, InspectionTier>;

  constructor(pack: NormalizedCatalogPack, options: TierCatalogOptions = {}) {
    const compatibility = checkCatalogCompatibility(
      pack,
      options.runtimeVersion ?? RUNTIME_VERSION,
    );
    if (!compatibility.compatible) {
      throw new ConfigurationError(
        compatibility.message ??
          `Catalog "${pack.metadata.id}" is not compatible with this engine.`,
      );
    }

    this.pack = pack;
    this.searchTiers = indexById(pack.searchTiers);
    this.qualityTiers = indexById(pack.qualityTiers);
    this.inspectionTiers = indexById(pack.inspectionTiers);
  }

  get discovery(): DiscoveryGateDefinition {
    return this.pack.discovery;
  }

  listSearchTiers(): readonly SearchTier[] {
    return this.pack.searchTiers;
  }

  listQualityTiers(): readonly QualityTier[] {
    return this.pack.qualityTiers;
  }

  listInspectionTiers(): readonly InspectionTier[] {
    return this.pack.inspectionTiers;
  }

  findSearchTier(id: string): SearchTier | undefined {
    return this.searchTiers.get(id);
  }

  findQualityTier(id: string): QualityTier | undefined {
    return this.qualityTiers.get(id);
  }

  findInspectionTier(id: string): InspectionTier | undefined {
    return this.inspectionTiers.get(id);
  }

  getSearchTier(id: string): SearchTier {
    return requireEntry(this.searchTiers, id, 'search tier');
  }

  getQualityTier(id: string): QualityTier {
    return requireEntry(this.qualityTiers, id, 'quality tier');
  }

  getInspectionTier(id: string): InspectionTier {
    return requireEntry(this.inspectionTiers, id, 'inspection tier');
  }

  /**
   * First band (descending by threshold) whose `minScore` the score reaches.
   */
  getCreditBand(score: number): CreditBandResolution {
    const { bands, fallbackModifier } = this.pack.creditFees;
    const band = Number.isFinite(score)
      ? bands.find((candidate: NormalizedCreditFeeBand) => score >= candidate.minScore)
      : undefined;

    if (!band) {
      const lowest = bands[bands.length - 1];
      return {
        name: lowest?.name ?? 'Unrated',
        modifier: fallbackModifier,
        minScore: null,
      };
    }

    return { name: band.name, modifier: band.modifier, minScore: band.minScore };
  }

  getCreditModifier(score: number): number {
    return this.getCreditBand(score).modifier;
  }

  getInspectionCost(inspectionTierId: string, price: number): number {
    return computeInspectionCost(this.getInspectionTier(inspectionTierId), price);
  }
}

export function computeInspectionCost(tier: InspectionTier, price: number): number {
  const raw = tier.baseCost + Math.max(0, price) * tier.percentCost;
  return Math.floor(Math.min(raw, tier.maxCost));
}

/**
 * Builds a catalog over the pack bundled with `@agent-market/catalog-schema`
 * unless another pack is given.
 */
export function createTierCatalog(
  pack: NormalizedCatalogPack = loadDefaultCatalogPack(),
  options?: TierCatalogOptions,
): TierCatalog {
  return new TierCatalog(pack, options);
}

function indexById<T extends { readonly id: string }>(
  entries: readonly T[],
): ReadonlyMap<string, T> {
  return new Map(entries.map((entry) => [entry.id, entry]));
}

function requireEntry<T>(
  entries: ReadonlyMap<string, T>,
  id: string,
  label: string,
): T {
  const entry = entries.get(id);
  if (entry === undefined) {
    throw new ConfigurationError(`Unknown ${label} "${id}".`);
  }
  return entry;
}
