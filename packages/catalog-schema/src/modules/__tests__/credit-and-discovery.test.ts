import { describe, expect, it } from 'vitest';

import { creditFeeScheduleSchema } from '../credit-fees.js';
import { discoveryGateDefinitionSchema } from '../discovery.js';

describe('creditFeeScheduleSchema', () => {
  it('sorts bands by descending threshold', () => {
    const schedule = creditFeeScheduleSchema.parse({
      bands: [
        { minScore: 600, modifier: 0.1, name: 'Poor' },
        { minScore: 750, modifier: -0.15, name: 'Excellent' },
        { minScore: 650, modifier: 0, name: 'Fair' },
      ],
      fallbackModifier: 0.2,
    });
    expect(schedule.bands.map((band) => band.minScore)).toEqual([750, 650, 600]);
  });

  it('rejects duplicate thresholds', () => {
    const result = creditFeeScheduleSchema.safeParse({
      bands: [
        { minScore: 700, modifier: -0.08, name: 'Good' },
        { minScore: 700, modifier: -0.1, name: 'Also good' },
      ],
      fallbackModifier: 0.2,
    });
    expect(result.success).toBe(false);
  });
});

describe('discoveryGateDefinitionSchema', () => {
  const baseGate = {
    id: 'service-truck',
    catalogKey: 'vehicles/serviceTruck.xml',
    discoveryChance: 0.2,
    requiredUsageCount: 3,
    requiredScore: 700,
    degradationThreshold: 0.9,
    basePrice: 75000,
    discountFraction: 0.1,
    opportunityWindowDays: 30,
    pityThreshold: 10,
    qualifyingEventKinds: ['purchase', 'Purchase', 'sale'],
  };

  it('derives the discounted price', () => {
    const gate = discoveryGateDefinitionSchema.parse(baseGate);
    expect(gate.price).toBe(67500);
  });

  it('deduplicates qualifying event kinds after normalization', () => {
    const gate = discoveryGateDefinitionSchema.parse(baseGate);
    expect(gate.qualifyingEventKinds).toEqual(['purchase', 'sale']);
  });

  it('requires a positive pity threshold', () => {
    expect(
      discoveryGateDefinitionSchema.safeParse({ ...baseGate, pityThreshold: 0 })
        .success,
    ).toBe(false);
  });
});
