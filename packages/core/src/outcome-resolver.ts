import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { randomBetween, randomInt, type RandomSource } from './rng.js';
import type { QualityTier, SearchTier, TierCatalog } from './tier-catalog.js';

export type SearchOutcomeKind = 'success' | 'failure';

/**
 * Requested option index per configuration id.
 */
export type RequestedConfigurations = Readonly<Record<string, number>>;

export interface ResolvedConfiguration {
  readonly configId: string;
  readonly requestedIndex: number;
  /** The requested index when matched, `null` when the seller picked. */
  readonly index: number | null;
}

export interface ResolvedFind {
  readonly condition: number;
  readonly price: number;
  readonly configurations: readonly ResolvedConfiguration[];
}

export interface SearchOutcome {
  readonly cost: number;
  readonly creditModifier: number;
  readonly effectiveSuccess: number;
  /** Total duration in time units. */
  readonly ttl: number;
  /** Time to success; past `ttl` on failure. */
  readonly tts: number;
  readonly outcome: SearchOutcomeKind;
  readonly find: ResolvedFind;
}

export interface OutcomeRequest {
  readonly tier: SearchTier;
  readonly quality: QualityTier;
  readonly basePrice: number;
  readonly creditModifier: number;
  readonly requestedConfigs?: RequestedConfigurations;
}

export type OutcomeConfig = Pick<EngineConfig, 'time' | 'probability'>;

const PRICE_VARIANCE_MIN = 0.9;
const PRICE_VARIANCE_MAX = 1.1;

const EMPTY_FIND: ResolvedFind = Object.freeze({
  condition: 0,
  price: 0,
  configurations: Object.freeze([]),
});

export function computeSearchCost(
  basePrice: number,
  feeFraction: number,
  creditModifier: number,
): number {
  return Math.floor(basePrice * feeFraction * (1 + creditModifier));
}

export function computeEffectiveSuccess(
  tier: SearchTier,
  quality: QualityTier,
  probability: EngineConfig['probability'] = DEFAULT_ENGINE_CONFIG.probability,
): number {
  const raw = tier.baseSuccess + quality.successModifier;
  return Math.min(probability.maxSuccess, Math.max(probability.minSuccess, raw));
}

/**
 * Resolves a search completely at request time.
 *
 * Draw order is fixed: warm-up, duration, success roll, then on success only
 * time-to-success, condition, price variance and one draw per requested
 * configuration in ascending id order. Reproducing an outcome requires only
 * the same generator state and inputs.
 */
export function resolveOutcome(
  request: OutcomeRequest,
  rng: RandomSource,
  config: OutcomeConfig = DEFAULT_ENGINE_CONFIG,
): SearchOutcome {
  const { tier, quality, basePrice, creditModifier } = request;
  if (!Number.isFinite(basePrice) || basePrice < 0) {
    throw new ConfigurationError(
      `Base price must be a finite non-negative number (received ${basePrice}).`,
    );
  }
  if (!Number.isFinite(creditModifier)) {
    throw new ConfigurationError('Credit modifier must be a finite number.');
  }

  const cost = computeSearchCost(basePrice, tier.feeFraction, creditModifier);
  const effectiveSuccess = computeEffectiveSuccess(tier, quality, config.probability);

  // Warm-up draw; kept so outcomes line up with recorded replays.
  rng.next();

  const steps = Math.floor((tier.maxDuration - tier.minDuration) / tier.durationStep);
  const ttl = tier.minDuration + tier.durationStep * randomInt(rng, 0, steps);

  const roll = rng.next();
  if (roll > effectiveSuccess) {
    return Object.freeze({
      cost,
      creditModifier,
      effectiveSuccess,
      ttl,
      tts: ttl + config.time.failureSentinel,
      outcome: 'failure',
      find: EMPTY_FIND,
    });
  }

  const tts = randomInt(rng, Math.max(1, Math.floor(ttl * 0.5)), ttl);
  const condition = randomBetween(rng, quality.minCondition, quality.maxCondition);
  const variance = randomBetween(rng, PRICE_VARIANCE_MIN, PRICE_VARIANCE_MAX);
  const price = Math.floor(
    basePrice * quality.priceMultiplier * (condition / quality.maxCondition) * variance,
  );
  const configurations = resolveConfigurations(
    request.requestedConfigs,
    tier.matchChance,
    rng,
  );

  return Object.freeze({
    cost,
    creditModifier,
    effectiveSuccess,
    ttl,
    tts,
    outcome: 'success',
    find: Object.freeze({ condition, price, configurations }),
  });
}

/**
 * {@link resolveOutcome} with tier lookups; unknown ids throw before any
 * draw is consumed.
 */
export function resolveOutcomeById(
  catalog: TierCatalog,
  request: Omit<OutcomeRequest, 'tier' | 'quality'> & {
    readonly tierId: string;
    readonly qualityId: string;
  },
  rng: RandomSource,
  config?: OutcomeConfig,
): SearchOutcome {
  const tier = catalog.getSearchTier(request.tierId);
  const quality = catalog.getQualityTier(request.qualityId);
  return resolveOutcome(
    {
      tier,
      quality,
      basePrice: request.basePrice,
      creditModifier: request.creditModifier,
      requestedConfigs: request.requestedConfigs,
    },
    rng,
    config,
  );
}

function resolveConfigurations(
  requested: RequestedConfigurations | undefined,
  matchChance: number,
  rng: RandomSource,
): readonly ResolvedConfiguration[] {
  if (!requested) {
    return Object.freeze([]);
  }

  const ids = Object.keys(requested).sort();
  const resolved: ResolvedConfiguration[] = [];
  for (const configId of ids) {
    const requestedIndex = requested[configId];
    if (requestedIndex === undefined) {
      continue;
    }
    const matched = rng.next() <= matchChance;
    resolved.push(
      Object.freeze({
        configId,
        requestedIndex,
        index: matched ? requestedIndex : null,
      }),
    );
  }
  return Object.freeze(resolved);
}
