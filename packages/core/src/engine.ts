import type {
  AcquisitionProvider,
  Ledger,
  PrerequisiteProvider,
  RatingProvider,
} from './collaborators.js';
import { resolveEngineConfig, type EngineConfig, type EngineConfigOverrides } from './config.js';
import { ConfigurationError } from './errors.js';
import { DiscoveryGate, type DiscoveryLoadReport } from './discovery-gate.js';
import { ProcurementEventBus } from './events/procurement-events.js';
import type { DiscoverySnapshot } from './persistence/discovery-persistence.js';
import type { LoadReport, SchedulerSnapshot } from './persistence/search-persistence.js';
import { createUnseededRandom, type RandomSource } from './rng.js';
import {
  SearchScheduler,
  type SchedulerClock,
  type TickSummary,
} from './search-scheduler.js';
import { createTierCatalog, type SearchTier, type TierCatalog } from './tier-catalog.js';

export interface ProcurementEngineOptions {
  readonly ledger: Ledger;
  readonly catalog?: TierCatalog;
  readonly config?: EngineConfigOverrides;
  /**
   * Shared by the scheduler and the gate, so one seed reproduces a whole
   * session.
   */
  readonly rng?: RandomSource;
  readonly rating?: RatingProvider;
  readonly acquisition?: AcquisitionProvider;
  readonly prerequisites?: PrerequisiteProvider;
  /**
   * Search tier whose purchases and sales count as qualifying discovery
   * events.
   *
   * @defaultValue the tier with the highest fee fraction
   */
  readonly discoveryTierId?: string;
}

export interface EngineTickResult {
  readonly searches: TickSummary;
  readonly expiredOpportunities: readonly string[];
}

export interface EngineSnapshot {
  readonly scheduler: SchedulerSnapshot;
  readonly discovery: DiscoverySnapshot;
}

export interface EngineLoadReport {
  readonly scheduler: LoadReport;
  readonly discovery: DiscoveryLoadReport;
}

/**
 * Wires a scheduler and a discovery gate onto one event bus, ledger and
 * random source. Purchases through the discovery tier are forwarded to the
 * gate as qualifying events.
 */
export class ProcurementEngine {
  readonly catalog: TierCatalog;
  readonly config: EngineConfig;
  readonly events: ProcurementEventBus;
  readonly scheduler: SearchScheduler;
  readonly gate: DiscoveryGate;
  readonly discoveryTierId: string;

  constructor(options: ProcurementEngineOptions) {
    this.catalog = options.catalog ?? createTierCatalog();
    this.config = resolveEngineConfig(options.config);
    this.events = new ProcurementEventBus();
    this.discoveryTierId =
      options.discoveryTierId === undefined
        ? selectTopTier(this.catalog.listSearchTiers()).id
        : this.catalog.getSearchTier(options.discoveryTierId).id;

    const rng = options.rng ?? createUnseededRandom();
    this.scheduler = new SearchScheduler({
      ledger: options.ledger,
      catalog: this.catalog,
      rng,
      rating: options.rating,
      acquisition: options.acquisition,
      events: this.events,
      config: this.config,
    });
    this.gate = new DiscoveryGate({
      ledger: options.ledger,
      prerequisites: options.prerequisites,
      rating: options.rating,
      acquisition: options.acquisition,
      catalog: this.catalog,
      rng,
      events: this.events,
      config: this.config,
    });

    this.events.subscribe('ListingPurchased', (event) => {
      if (event.payload.tierId === this.discoveryTierId) {
        this.gate.onQualifyingEvent(event.payload.consumerId, 'purchase', event.at);
      }
    });
  }

  tick(clock: SchedulerClock): EngineTickResult {
    const searches = this.scheduler.tick(clock);
    const expiredOpportunities = this.gate.expireCheck(clock.hour);
    return { searches, expiredOpportunities };
  }

  /**
   * Reports a sale the host brokered through a search tier. Returns whether
   * it opened a discovery opportunity.
   */
  recordSale(consumerId: string, tierId: string, now: number): boolean {
    if (tierId !== this.discoveryTierId) {
      return false;
    }
    return this.gate.onQualifyingEvent(consumerId, 'sale', now);
  }

  serialize(): EngineSnapshot {
    return {
      scheduler: this.scheduler.serialize(),
      discovery: this.gate.serialize(),
    };
  }

  hydrate(snapshot: EngineSnapshot): EngineLoadReport {
    return {
      scheduler: this.scheduler.hydrate(snapshot.scheduler),
      discovery: this.gate.hydrate(snapshot.discovery),
    };
  }
}

function selectTopTier(tiers: readonly SearchTier[]): SearchTier {
  let top: SearchTier | undefined;
  for (const tier of tiers) {
    if (!top || tier.feeFraction > top.feeFraction) {
      top = tier;
    }
  }
  if (!top) {
    throw new ConfigurationError('Catalog declares no search tiers.');
  }
  return top;
}
