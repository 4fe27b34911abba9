import { describe, expect, it } from 'vitest';

import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from './config.js';

describe('resolveEngineConfig', () => {
  it('returns the defaults when no overrides are given', () => {
    const config = resolveEngineConfig();

    expect(config).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.time)).toBe(true);
  });

  it('falls back to defaults for invalid overrides', () => {
    const config = resolveEngineConfig({
      time: { unitsPerDay: -4, failureSentinel: Number.NaN },
      listings: { expiryDays: 0, commissionRate: 1.5 },
      history: { closedSearchesPerConsumer: -1 },
      probability: { minSuccess: -0.1, maxSuccess: Number.POSITIVE_INFINITY },
      rating: { defaultScore: Number.NaN },
    });

    expect(config).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('floors fractional positive integers', () => {
    const config = resolveEngineConfig({
      time: { unitsPerDay: 12.7 },
      listings: { expiryDays: 0.4 },
    });

    expect(config.time.unitsPerDay).toBe(12);
    expect(config.time.failureSentinel).toBe(999);
    expect(config.listings.expiryDays).toBe(1);
  });

  it('keeps the success clamp ordered', () => {
    const config = resolveEngineConfig({
      probability: { minSuccess: 0.6, maxSuccess: 0.4 },
    });

    expect(config.probability).toEqual({ minSuccess: 0.6, maxSuccess: 0.6 });
  });

  it('accepts a zero commission rate', () => {
    const config = resolveEngineConfig({ listings: { commissionRate: 0 } });

    expect(config.listings.commissionRate).toBe(0);
  });

  it('allows closed search history to be turned off', () => {
    const config = resolveEngineConfig({ history: { closedSearchesPerConsumer: 0 } });

    expect(config.history.closedSearchesPerConsumer).toBe(0);
  });
});
