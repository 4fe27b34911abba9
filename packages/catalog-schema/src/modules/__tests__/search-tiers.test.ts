import { describe, expect, it } from 'vitest';

import {
  searchTierCollectionSchema,
  searchTierDefinitionSchema,
} from '../search-tiers.js';

describe('searchTierDefinitionSchema', () => {
  const baseTier = {
    id: 'Regional',
    name: 'Regional Search',
    feeFraction: 0.06,
    minDuration: 24,
    maxDuration: 48,
    durationStep: 24,
    baseSuccess: 0.55,
    matchChance: 0.5,
  } as const;

  it('normalizes ids to lower case', () => {
    const tier = searchTierDefinitionSchema.parse(baseTier);
    expect(tier.id).toBe('regional');
    expect(tier.durationStep).toBe(24);
  });

  it('defaults the duration step to a single time unit', () => {
    const { durationStep: _durationStep, ...rest } = baseTier;
    const tier = searchTierDefinitionSchema.parse(rest);
    expect(tier.durationStep).toBe(1);
  });

  it('rejects inverted duration ranges', () => {
    const result = searchTierDefinitionSchema.safeParse({
      ...baseTier,
      minDuration: 48,
      maxDuration: 24,
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['maxDuration']);
    }
  });

  it('rejects spans that are not a multiple of the step', () => {
    const result = searchTierDefinitionSchema.safeParse({
      ...baseTier,
      maxDuration: 40,
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['durationStep']);
    }
  });

  it('rejects success chances above one', () => {
    expect(
      searchTierDefinitionSchema.safeParse({ ...baseTier, baseSuccess: 1.2 })
        .success,
    ).toBe(false);
  });
});

describe('searchTierCollectionSchema', () => {
  it('flags duplicate tier ids after normalization', () => {
    const tier = {
      id: 'local',
      name: 'Local Search',
      feeFraction: 0.04,
      minDuration: 24,
      maxDuration: 24,
      baseSuccess: 0.25,
      matchChance: 0.25,
    };
    const result = searchTierCollectionSchema.safeParse([
      tier,
      { ...tier, id: 'LOCAL' },
    ]);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe(
        'Duplicate search tier id "local" (first declared at index 0).',
      );
    }
  });

  it('requires at least one tier', () => {
    expect(searchTierCollectionSchema.safeParse([]).success).toBe(false);
  });
});
