export interface EngineConfig {
  readonly time: {
    /**
     * Time units that make up one in-world day. Search durations, TTL/TTS
     * and inspection durations are all expressed in these units (hours by
     * default).
     *
     * @defaultValue `24`
     */
    readonly unitsPerDay: number;
    /**
     * Offset added to a failed search's duration to produce its TTS, so that
     * the TTL always runs out first.
     *
     * @defaultValue `999`
     */
    readonly failureSentinel: number;
  };
  readonly listings: {
    /**
     * Whole days a found listing stays available before it expires.
     *
     * @defaultValue `3`
     */
    readonly expiryDays: number;
    /**
     * Agent commission added on top of the found price.
     *
     * @defaultValue `0.08`
     */
    readonly commissionRate: number;
  };
  readonly history: {
    /**
     * Closed searches kept per consumer so they can still be looked up and
     * renewed. The oldest is dropped first.
     *
     * @defaultValue `10`
     */
    readonly closedSearchesPerConsumer: number;
  };
  readonly probability: {
    /**
     * @defaultValue `0.05`
     */
    readonly minSuccess: number;
    /**
     * @defaultValue `0.95`
     */
    readonly maxSuccess: number;
  };
  readonly rating: {
    /**
     * Score assumed when no rating collaborator is wired.
     *
     * @defaultValue `650`
     */
    readonly defaultScore: number;
  };
}

export type EngineConfigOverrides = Readonly<{
  readonly time?: Partial<EngineConfig['time']>;
  readonly listings?: Partial<EngineConfig['listings']>;
  readonly history?: Partial<EngineConfig['history']>;
  readonly probability?: Partial<EngineConfig['probability']>;
  readonly rating?: Partial<EngineConfig['rating']>;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  time: Object.freeze({
    unitsPerDay: 24,
    failureSentinel: 999,
  }),
  listings: Object.freeze({
    expiryDays: 3,
    commissionRate: 0.08,
  }),
  history: Object.freeze({
    closedSearchesPerConsumer: 10,
  }),
  probability: Object.freeze({
    minSuccess: 0.05,
    maxSuccess: 0.95,
  }),
  rating: Object.freeze({
    defaultScore: 650,
  }),
});

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toPositiveInt(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  if (numeric === undefined || numeric <= 0) {
    return undefined;
  }
  return Math.max(1, Math.floor(numeric));
}

function toFraction(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  if (numeric === undefined || numeric < 0 || numeric > 1) {
    return undefined;
  }
  return numeric;
}

function resolveTimeConfig(
  overrides: EngineConfigOverrides['time'] | undefined,
): EngineConfig['time'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ENGINE_CONFIG.time;

  return {
    unitsPerDay: toPositiveInt(source.unitsPerDay) ?? defaults.unitsPerDay,
    failureSentinel:
      toPositiveInt(source.failureSentinel) ?? defaults.failureSentinel,
  };
}

function resolveListingsConfig(
  overrides: EngineConfigOverrides['listings'] | undefined,
): EngineConfig['listings'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ENGINE_CONFIG.listings;

  return {
    expiryDays: toPositiveInt(source.expiryDays) ?? defaults.expiryDays,
    commissionRate: toFraction(source.commissionRate) ?? defaults.commissionRate,
  };
}

function resolveHistoryConfig(
  overrides: EngineConfigOverrides['history'] | undefined,
): EngineConfig['history'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ENGINE_CONFIG.history;
  const closed = toFiniteNumber(source.closedSearchesPerConsumer);

  return {
    closedSearchesPerConsumer:
      closed !== undefined && closed >= 0
        ? Math.floor(closed)
        : defaults.closedSearchesPerConsumer,
  };
}

function resolveProbabilityConfig(
  overrides: EngineConfigOverrides['probability'] | undefined,
): EngineConfig['probability'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ENGINE_CONFIG.probability;

  const minSuccess = toFraction(source.minSuccess) ?? defaults.minSuccess;
  const maxSuccess = toFraction(source.maxSuccess) ?? defaults.maxSuccess;

  // An inverted pair would make the clamp meaningless; keep min <= max.
  if (minSuccess > maxSuccess) {
    return { minSuccess, maxSuccess: minSuccess };
  }
  return { minSuccess, maxSuccess };
}

function resolveRatingConfig(
  overrides: EngineConfigOverrides['rating'] | undefined,
): EngineConfig['rating'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ENGINE_CONFIG.rating;

  return {
    defaultScore: toFiniteNumber(source.defaultScore) ?? defaults.defaultScore,
  };
}

export function resolveEngineConfig(
  overrides?: EngineConfigOverrides,
): EngineConfig {
  return Object.freeze({
    time: Object.freeze(resolveTimeConfig(overrides?.time)),
    listings: Object.freeze(resolveListingsConfig(overrides?.listings)),
    history: Object.freeze(resolveHistoryConfig(overrides?.history)),
    probability: Object.freeze(resolveProbabilityConfig(overrides?.probability)),
    rating: Object.freeze(resolveRatingConfig(overrides?.rating)),
  });
}
