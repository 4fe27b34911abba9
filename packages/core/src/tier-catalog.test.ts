import { describe, expect, it } from 'vitest';
import { loadDefaultCatalogPack, parseCatalogPack } from '@agent-market/catalog-schema';

import { ConfigurationError } from './errors.js';
import { computeInspectionCost, createTierCatalog } from './tier-catalog.js';

describe('TierCatalog', () => {
  const catalog = createTierCatalog();

  it('looks up the bundled tiers by id', () => {
    expect(catalog.getSearchTier('regional')).toMatchObject({
      feeFraction: 0.06,
      minDuration: 24,
      maxDuration: 48,
      durationStep: 24,
    });
    expect(catalog.getQualityTier('good').priceMultiplier).toBe(0.65);
    expect(catalog.listSearchTiers().map((tier) => tier.id)).toEqual([
      'local',
      'regional',
      'national',
    ]);
  });

  it('throws a configuration error for unknown ids', () => {
    expect(() => catalog.getSearchTier('orbital')).toThrow(ConfigurationError);
    expect(() => catalog.getQualityTier('mint')).toThrow('Unknown quality tier "mint".');
    expect(catalog.findInspectionTier('x-ray')).toBeUndefined();
  });

  it.each([
    [800, -0.15, 'Excellent'],
    [750, -0.15, 'Excellent'],
    [749, -0.08, 'Good'],
    [650, 0, 'Fair'],
    [600, 0.1, 'Poor'],
    [300, 0.2, 'Very Poor'],
  ])('maps score %d to modifier %d', (score, modifier, name) => {
    expect(catalog.getCreditBand(score)).toMatchObject({ modifier, name });
  });

  it('uses the fallback modifier below every band', () => {
    expect(catalog.getCreditBand(120)).toEqual({
      name: 'Very Poor',
      modifier: 0.2,
      minScore: null,
    });
    expect(catalog.getCreditModifier(Number.NaN)).toBe(0.2);
  });

  it('caps inspection cost at the tier maximum', () => {
    // 1000 + 40000 * 0.02 = 1800
    expect(catalog.getInspectionCost('quick', 40_000)).toBe(1800);
    // 1000 + 100000 * 0.02 = 3000, capped at 2500
    expect(catalog.getInspectionCost('quick', 100_000)).toBe(2500);
    // 4000 + 12345 * 0.05 = 4617.25
    expect(computeInspectionCost(catalog.getInspectionTier('comprehensive'), 12_345)).toBe(
      4617,
    );
  });

  it('rejects packs that do not support this engine version', () => {
    const base = loadDefaultCatalogPack();
    const pack = parseCatalogPack({
      metadata: {
        id: 'future-only',
        title: 'Future',
        version: '1.0.0',
        engineCompatibility: '>=2.0.0',
      },
      searchTiers: [
        {
          id: 'local',
          name: 'Local',
          feeFraction: 0.04,
          minDuration: 24,
          maxDuration: 24,
          baseSuccess: 0.25,
          matchChance: 0.25,
        },
      ],
      qualityTiers: [
        {
          id: 'any',
          name: 'Any',
          minCondition: 0.1,
          maxCondition: 0.4,
          priceMultiplier: 0.3,
        },
      ],
      creditFees: { bands: [{ minScore: 300, modifier: 0, name: 'Flat' }], fallbackModifier: 0 },
      discovery: {
        id: base.discovery.id,
        catalogKey: base.discovery.catalogKey,
        discoveryChance: 0.2,
        requiredUsageCount: 3,
        requiredScore: 700,
        degradationThreshold: 0.9,
        basePrice: 1000,
        opportunityWindowDays: 30,
        pityThreshold: 10,
      },
    });

    expect(() => createTierCatalog(pack)).toThrow(
      'Catalog "future-only" requires engine >=2.0.0 (runtime is 0.1.0).',
    );
  });
});
