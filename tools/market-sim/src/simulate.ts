import {
  ConfigurationError,
  InMemoryLedger,
  ProcurementEngine,
  createRecordingTelemetry,
  createSeededRandom,
  resetTelemetry,
  setTelemetry,
  type ConsumerStatistics,
} from '@agent-market/core';

import type { SimulationArgs } from './args.js';

export const SIMULATION_EVENT = 'market_simulation';

export interface ConsumerSummary {
  readonly consumerId: string;
  readonly balance: number;
  readonly statistics: ConsumerStatistics;
  readonly records: readonly {
    readonly id: string;
    readonly status: string;
    readonly ttl: number;
    readonly remaining: string;
  }[];
  readonly listings: readonly {
    readonly id: string;
    readonly askingPrice: number;
    readonly condition: number;
    readonly expiresInDays: number;
  }[];
}

export interface SimulationSummary {
  readonly event: typeof SIMULATION_EVENT;
  readonly seed: number;
  readonly days: number;
  readonly tierId: string;
  readonly qualityId: string;
  readonly price: number;
  readonly found: readonly string[];
  readonly failed: readonly string[];
  readonly expiredListings: readonly string[];
  readonly rejected: readonly string[];
  readonly consumers: readonly ConsumerSummary[];
  readonly warnings: number;
}

export const consumerIdFor = (index: number): string => `consumer-${index + 1}`;

/**
 * Submits one search per consumer on day 0, then ticks once per day. Unknown
 * tier or quality ids throw {@link ConfigurationError} before any search is
 * made.
 */
export function runSimulation(args: SimulationArgs): SimulationSummary {
  const consumerIds = Array.from({ length: args.consumers }, (_, index) => consumerIdFor(index));
  const ledger = new InMemoryLedger({
    initialBalances: Object.fromEntries(consumerIds.map((id) => [id, args.balance])),
  });
  const engine = new ProcurementEngine({ ledger, rng: createSeededRandom(args.seed) });
  if (!engine.catalog.findSearchTier(args.tierId)) {
    throw new ConfigurationError(`Unknown search tier "${args.tierId}".`);
  }
  if (!engine.catalog.findQualityTier(args.qualityId)) {
    throw new ConfigurationError(`Unknown quality tier "${args.qualityId}".`);
  }

  const recorder = createRecordingTelemetry();
  setTelemetry(recorder);
  try {
    const { unitsPerDay } = engine.config.time;
    engine.tick({ day: 0, hour: 0 });

    const rejected: string[] = [];
    for (const consumerId of consumerIds) {
      const result = engine.scheduler.submit({
        consumerId,
        tierId: args.tierId,
        qualityId: args.qualityId,
        item: { catalogKey: 'market-sim/item.xml', displayName: 'Simulated item', basePrice: args.price },
      });
      if (!result.success) {
        rejected.push(consumerId);
      }
    }

    const found: string[] = [];
    const failed: string[] = [];
    const expiredListings: string[] = [];
    for (let day = 1; day <= args.days; day += 1) {
      const { searches } = engine.tick({ day, hour: day * unitsPerDay });
      found.push(...searches.found);
      failed.push(...searches.failed);
      expiredListings.push(...searches.expiredListings);
    }

    return {
      event: SIMULATION_EVENT,
      seed: args.seed,
      days: args.days,
      tierId: args.tierId,
      qualityId: args.qualityId,
      price: args.price,
      found,
      failed,
      expiredListings,
      rejected,
      consumers: consumerIds.map((consumerId) => ({
        consumerId,
        balance: ledger.getBalance(consumerId),
        statistics: engine.scheduler.getStatistics(consumerId),
        records: engine.scheduler.getRecordsForConsumer(consumerId).map((record) => ({
          id: record.id,
          status: record.status,
          ttl: record.ttl,
          remaining: record.getRemainingTimeLabel(unitsPerDay),
        })),
        listings: engine.scheduler.getListingsForConsumer(consumerId).map((listing) => ({
          id: listing.id,
          askingPrice: listing.askingPrice,
          condition: listing.condition,
          expiresInDays: listing.expiresInDays,
        })),
      })),
      warnings: recorder.events.filter((event) => event.level === 'warning').length,
    };
  } finally {
    resetTelemetry();
  }
}
