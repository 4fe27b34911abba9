import type {
  AcquisitionProvider,
  AcquisitionResult,
  Ledger,
  RatingProvider,
} from './collaborators.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import {
  ConfigurationError,
  createOperationFailure,
  type OperationFailure,
} from './errors.js';
import { ProcurementEventBus } from './events/procurement-events.js';
import {
  createListing,
  formatListingId,
  formatSearchId,
  isHeldOnDay,
  isOnHold,
  listingToPersisted,
  viewListing,
  type Listing,
  type ListingView,
} from './listing.js';
import { computeSearchCost, type RequestedConfigurations } from './outcome-resolver.js';
import { assertSchemaVersion } from './persistence/decode-entries.js';
import {
  decodeSchedulerState,
  statisticsToPersisted,
  type LoadReport,
  type SchedulerSnapshot,
} from './persistence/search-persistence.js';
import { writeConsumerView } from './replication/codecs.js';
import type { WireWriter } from './replication/wire-stream.js';
import { createUnseededRandom, type RandomSource } from './rng.js';
import { SearchRecord, type ItemReference } from './search-record.js';
import { StatisticsBook, type ConsumerStatistics } from './statistics.js';
import { telemetry } from './telemetry.js';
import { computeInspectionCost, createTierCatalog, type TierCatalog } from './tier-catalog.js';
import { PERSISTENCE_SCHEMA_VERSION } from './version.js';

export interface SearchRequest {
  readonly consumerId: string;
  readonly item: ItemReference;
  readonly tierId: string;
  readonly qualityId: string;
  readonly requestedConfigs?: RequestedConfigurations;
  /**
   * Overrides the modifier derived from the consumer's credit score.
   */
  readonly creditModifier?: number;
}

/**
 * `day` counts whole in-world days; `hour` is the absolute elapsed time in
 * time units. Both must never decrease.
 */
export interface SchedulerClock {
  readonly day: number;
  readonly hour: number;
}

export interface TickSummary {
  readonly daysProcessed: number;
  readonly found: readonly string[];
  readonly failed: readonly string[];
  readonly expiredListings: readonly string[];
  readonly completedInspections: readonly string[];
}

export type SubmitResult =
  | { readonly success: true; readonly record: SearchRecord }
  | OperationFailure;

export type CancelResult = { readonly success: true } | OperationFailure;

export type PurchaseResult =
  | { readonly success: true; readonly listing: ListingView; readonly price: number }
  | OperationFailure;

export type InspectionResult =
  | { readonly success: true; readonly listing: ListingView; readonly cost: number }
  | OperationFailure;

export interface SearchSchedulerOptions {
  readonly ledger: Ledger;
  readonly catalog?: TierCatalog;
  readonly rng?: RandomSource;
  readonly rating?: RatingProvider;
  readonly acquisition?: AcquisitionProvider;
  readonly events?: ProcurementEventBus;
  readonly config?: EngineConfig;
}

const EMPTY_SUMMARY: TickSummary = Object.freeze({
  daysProcessed: 0,
  found: Object.freeze([]),
  failed: Object.freeze([]),
  expiredListings: Object.freeze([]),
  completedInspections: Object.freeze([]),
});

/**
 * Owns every search record, listing and inspection. All mutation happens on
 * the authoritative side through these methods; listings leave it only as
 * frozen copies and replicas only read.
 */
export class SearchScheduler {
  readonly events: ProcurementEventBus;

  private readonly ledger: Ledger;
  private readonly catalog: TierCatalog;
  private readonly rng: RandomSource;
  private readonly rating?: RatingProvider;
  private readonly acquisition?: AcquisitionProvider;
  private readonly config: EngineConfig;

  /** Records holding a consumer's slot: active searches and unsold finds. */
  private readonly records = new Map<string, SearchRecord>();
  private readonly activeByConsumer = new Map<string, Set<string>>();
  /** Most recently closed records per consumer, oldest first. */
  private readonly closedByConsumer = new Map<string, SearchRecord[]>();
  private readonly closedById = new Map<string, SearchRecord>();
  private readonly listings = new Map<string, Listing>();
  private readonly visibleByConsumer = new Map<string, Set<string>>();
  private readonly statistics = new StatisticsBook();

  private nextId = 1;
  private lastProcessedDay: number | null = null;
  private lastProcessedHour: number | null = null;

  constructor(options: SearchSchedulerOptions) {
    this.ledger = options.ledger;
    this.catalog = options.catalog ?? createTierCatalog();
    this.rng = options.rng ?? createUnseededRandom();
    this.rating = options.rating;
    this.acquisition = options.acquisition;
    this.events = options.events ?? new ProcurementEventBus();
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
  }

  /** Absolute time of the last processed clock, or 0 before the first tick. */
  get currentHour(): number {
    return this.lastProcessedHour ?? 0;
  }

  /**
   * Charges the search fee and registers a new record. Unknown tier or
   * quality ids throw before anything is charged.
   */
  submit(request: SearchRequest): SubmitResult {
    const result = this.open(request);
    if (result.success) {
      const { record } = result;
      this.events.publish(
        'SearchSubmitted',
        {
          searchId: record.id,
          consumerId: record.consumerId,
          tierId: record.tierId,
          qualityId: record.qualityId,
          cost: record.cost,
        },
        this.currentHour,
      );
    }
    return result;
  }

  /**
   * Resubmits a closed search (failed, cancelled, expired or bought) with the
   * same item, tier, quality and configuration choices. A new fee is charged.
   */
  renew(searchId: string): SubmitResult {
    const previous = this.findRecord(searchId);
    if (!previous) {
      return createOperationFailure('NotFound', `Search "${searchId}" does not exist.`);
    }
    if (this.records.has(searchId)) {
      return createOperationFailure(
        'InvalidState',
        `Search "${searchId}" is still open and cannot be renewed.`,
        { status: previous.status },
      );
    }

    const result = this.open({
      consumerId: previous.consumerId,
      item: previous.item,
      tierId: previous.tierId,
      qualityId: previous.qualityId,
      requestedConfigs: previous.requestedConfigs,
    });
    if (result.success) {
      this.events.publish(
        'SearchRenewed',
        {
          searchId: result.record.id,
          previousSearchId: previous.id,
          consumerId: previous.consumerId,
          cost: result.record.cost,
        },
        this.currentHour,
      );
    }
    return result;
  }

  cancel(searchId: string): CancelResult {
    const record = this.findRecord(searchId);
    if (!record) {
      return createOperationFailure('NotFound', `Search "${searchId}" does not exist.`);
    }
    if (!record.cancel()) {
      return createOperationFailure(
        'InvalidState',
        `Search "${searchId}" is ${record.status} and cannot be cancelled.`,
        { status: record.status },
      );
    }

    this.closeRecord(record);
    this.statistics.increment(record.consumerId, 'searchesCancelled');
    this.events.publish(
      'SearchCancelled',
      { searchId: record.id, consumerId: record.consumerId },
      this.currentHour,
    );
    return { success: true };
  }

  /**
   * Advances the scheduler to `clock`. Inspections are checked whenever the
   * hour moves; searches and listing countdowns run once per elapsed day.
   * Day `d` closes at hour `d * unitsPerDay`, so a jump over several days
   * ends in the same state as ticking through them one at a time. Listings
   * and events produced by the tick become visible together once the whole
   * batch has been processed.
   */
  tick(clock: SchedulerClock): TickSummary {
    assertClock(clock);
    telemetry.recordTick();

    if (this.lastProcessedDay === null || this.lastProcessedHour === null) {
      this.lastProcessedDay = clock.day;
      this.lastProcessedHour = clock.hour;
      return EMPTY_SUMMARY;
    }

    const completedInspections =
      clock.hour > this.lastProcessedHour ? this.completeInspections(clock.hour) : [];
    this.lastProcessedHour = Math.max(this.lastProcessedHour, clock.hour);

    const daysElapsed = clock.day - this.lastProcessedDay;
    const found: string[] = [];
    const failed: string[] = [];
    const expiredListings: string[] = [];
    const pendingListings: Listing[] = [];

    for (let offset = 1; offset <= daysElapsed; offset += 1) {
      const day = this.lastProcessedDay + offset;
      expiredListings.push(...this.countDownListings(day));
      this.advanceRecords(day, found, failed, pendingListings);
    }
    if (daysElapsed > 0) {
      this.lastProcessedDay = clock.day;
    }

    for (const listing of pendingListings) {
      if (listing.status === 'available') {
        addToIndex(this.visibleByConsumer, listing.consumerId, listing.id);
      }
    }
    this.events.flush();

    telemetry.recordCounters('scheduler.tick', {
      daysProcessed: Math.max(0, daysElapsed),
      found: found.length,
      failed: failed.length,
      listingsExpired: expiredListings.length,
      inspectionsCompleted: completedInspections.length,
      activeRecords: this.getActiveRecordCount(),
      visibleListings: countIndex(this.visibleByConsumer),
    });

    return {
      daysProcessed: Math.max(0, daysElapsed),
      found,
      failed,
      expiredListings,
      completedInspections,
    };
  }

  purchaseListing(listingId: string): PurchaseResult {
    const listing = this.getVisibleListing(listingId);
    if (!listing) {
      return createOperationFailure('NotFound', `Listing "${listingId}" does not exist.`);
    }
    if (listing.status !== 'available' || isOnHold(listing)) {
      return createOperationFailure(
        'InvalidState',
        isOnHold(listing)
          ? `Listing "${listingId}" is on hold until its inspection completes.`
          : `Listing "${listingId}" is ${listing.status}.`,
        { status: listing.status },
      );
    }

    const price = listing.askingPrice;
    const charge = this.ledger.charge(listing.consumerId, price, `purchase:${listing.id}`);
    if (!charge.success) {
      return createOperationFailure(
        'InsufficientFunds',
        `Asking price of ${price} exceeds the available balance of ${charge.balance}.`,
        { required: price, balance: charge.balance },
      );
    }

    const acquired: AcquisitionResult = this.acquisition?.materialize(
      listing.catalogKey,
      listing.consumerId,
    ) ?? { success: true };
    if (!acquired.success) {
      this.ledger.credit(listing.consumerId, price, `refund:${listing.id}`);
      telemetry.recordError('AcquisitionFailed', {
        listingId: listing.id,
        consumerId: listing.consumerId,
        catalogKey: listing.catalogKey,
        message: acquired.message,
      });
      return createOperationFailure(
        'SpawnFailure',
        `Could not deliver "${listing.displayName}": ${acquired.message}`,
        { refunded: price },
      );
    }

    listing.status = 'purchased';
    this.removeListing(listing);
    this.releaseSlot(listing, (record) => record.markCompleted());
    this.statistics.increment(listing.consumerId, 'listingsPurchased');
    this.statistics.increment(listing.consumerId, 'totalCommissions', listing.commissionAmount);
    this.events.publish(
      'ListingPurchased',
      {
        listingId: listing.id,
        searchId: listing.searchId,
        consumerId: listing.consumerId,
        tierId: listing.tierId,
        price,
      },
      this.currentHour,
    );

    return { success: true, listing: viewListing(listing), price };
  }

  requestInspection(
    listingId: string,
    inspectionTierId: string,
    now: number = this.currentHour,
  ): InspectionResult {
    const tier = this.catalog.getInspectionTier(inspectionTierId);
    const listing = this.getVisibleListing(listingId);
    if (!listing) {
      return createOperationFailure('NotFound', `Listing "${listingId}" does not exist.`);
    }
    if (listing.status !== 'available' || listing.inspection !== null) {
      return createOperationFailure(
        'InvalidState',
        listing.inspection === null
          ? `Listing "${listingId}" is ${listing.status}.`
          : `Listing "${listingId}" already has a ${listing.inspection.state} inspection.`,
        { status: listing.status },
      );
    }

    const cost = computeInspectionCost(tier, listing.basePrice);
    const charge = this.ledger.charge(listing.consumerId, cost, `inspection:${listing.id}`);
    if (!charge.success) {
      return createOperationFailure(
        'InsufficientFunds',
        `Inspection cost of ${cost} exceeds the available balance of ${charge.balance}.`,
        { required: cost, balance: charge.balance },
      );
    }

    listing.inspection = {
      state: 'pending',
      tierId: tier.id,
      revealLevel: tier.revealLevel,
      requestedAtHour: now,
      completesAtHour: now + tier.durationHours,
      costPaid: cost,
    };
    this.statistics.increment(listing.consumerId, 'inspectionsPurchased');
    this.statistics.increment(listing.consumerId, 'totalInspectionFees', cost);
    this.events.publish(
      'InspectionRequested',
      {
        listingId: listing.id,
        consumerId: listing.consumerId,
        tierId: tier.id,
        cost,
        completesAtHour: listing.inspection.completesAtHour,
      },
      now,
    );

    return { success: true, listing: viewListing(listing), cost };
  }

  /** Open records and the consumer's most recently closed ones. */
  getRecord(searchId: string): SearchRecord | undefined {
    return this.findRecord(searchId);
  }

  /** Records currently holding one of the consumer's slots. */
  getRecordsForConsumer(consumerId: string): readonly SearchRecord[] {
    return resolveIndex(this.activeByConsumer, consumerId, this.records);
  }

  getListingsForConsumer(consumerId: string): readonly ListingView[] {
    return resolveIndex(this.visibleByConsumer, consumerId, this.listings).map(viewListing);
  }

  getListing(listingId: string): ListingView | undefined {
    const listing = this.getVisibleListing(listingId);
    return listing && viewListing(listing);
  }

  getStatistics(consumerId: string): ConsumerStatistics {
    return this.statistics.get(consumerId);
  }

  getActiveRecordCount(consumerId?: string): number {
    if (consumerId !== undefined) {
      return this.activeByConsumer.get(consumerId)?.size ?? 0;
    }
    return countIndex(this.activeByConsumer);
  }

  /**
   * Writes the records and visible listings a consumer's replica shows. Read
   * them back with `readConsumerView`.
   */
  replicate(consumerId: string, writer: WireWriter): void {
    writeConsumerView(writer, {
      consumerId,
      records: this.getRecordsForConsumer(consumerId),
      listings: this.getListingsForConsumer(consumerId),
    });
  }

  serialize(): SchedulerSnapshot {
    return {
      schemaVersion: PERSISTENCE_SCHEMA_VERSION,
      nextId: this.nextId,
      lastProcessedDay: this.lastProcessedDay,
      lastProcessedHour: this.lastProcessedHour,
      records: [
        ...this.records.values(),
        ...[...this.closedByConsumer.values()].flat(),
      ].map((record) => record.toPersisted()),
      listings: [...this.listings.values()].map(listingToPersisted),
      statistics: this.statistics
        .consumers()
        .map((consumerId) =>
          statisticsToPersisted(consumerId, this.statistics.get(consumerId)),
        ),
    };
  }

  /**
   * Replaces all state with a snapshot. Corrupt entries are skipped and
   * listed in the returned report. A snapshot from another schema version
   * throws {@link ConfigurationError}.
   */
  hydrate(snapshot: SchedulerSnapshot): LoadReport {
    assertSchemaVersion(snapshot.schemaVersion, 'Scheduler');
    const decoded = decodeSchedulerState(snapshot);

    this.records.clear();
    this.activeByConsumer.clear();
    this.closedByConsumer.clear();
    this.closedById.clear();
    this.listings.clear();
    this.visibleByConsumer.clear();
    this.statistics.clear();

    let highestId = 0;
    const listedSearchIds = new Set<string>();
    for (const listing of decoded.listings) {
      if (listing.status !== 'available') {
        continue;
      }
      this.listings.set(listing.id, listing);
      addToIndex(this.visibleByConsumer, listing.consumerId, listing.id);
      listedSearchIds.add(listing.searchId);
      highestId = Math.max(highestId, parseSequence(listing.id));
    }
    for (const record of decoded.records) {
      highestId = Math.max(highestId, parseSequence(record.id));
      const holdingSlot =
        record.status === 'active' ||
        (record.status === 'success' && listedSearchIds.has(record.id));
      if (holdingSlot) {
        this.records.set(record.id, record);
        addToIndex(this.activeByConsumer, record.consumerId, record.id);
      } else {
        this.remember(record);
      }
    }
    for (const [consumerId, entry] of decoded.statistics) {
      this.statistics.set(consumerId, entry);
    }

    this.nextId = Math.max(
      highestId + 1,
      Number.isInteger(snapshot.nextId) ? snapshot.nextId : 1,
    );
    this.lastProcessedDay = snapshot.lastProcessedDay;
    this.lastProcessedHour = snapshot.lastProcessedHour;

    return decoded.report;
  }

  private open(request: SearchRequest): SubmitResult {
    const tier = this.catalog.getSearchTier(request.tierId);
    const quality = this.catalog.getQualityTier(request.qualityId);
    const { basePrice } = request.item;
    if (!Number.isFinite(basePrice) || basePrice < 0) {
      throw new ConfigurationError(
        `Base price must be a finite non-negative number (received ${basePrice}).`,
      );
    }

    const creditModifier =
      request.creditModifier ?? this.resolveCreditModifier(request.consumerId);
    const cost = computeSearchCost(basePrice, tier.feeFraction, creditModifier);

    const charge = this.ledger.charge(request.consumerId, cost, `search:${tier.id}`);
    if (!charge.success) {
      telemetry.recordWarning('SearchRejected', {
        consumerId: request.consumerId,
        tierId: tier.id,
        cost,
        balance: charge.balance,
      });
      return createOperationFailure(
        'InsufficientFunds',
        `Search fee of ${cost} exceeds the available balance of ${charge.balance}.`,
        { required: cost, balance: charge.balance },
      );
    }

    const record = SearchRecord.create(
      {
        id: formatSearchId(this.allocateId()),
        consumerId: request.consumerId,
        item: request.item,
        tier,
        quality,
        creditModifier,
        requestedConfigs: request.requestedConfigs,
        createdAt: this.currentHour,
      },
      this.rng,
      this.config,
    );

    this.records.set(record.id, record);
    addToIndex(this.activeByConsumer, record.consumerId, record.id);
    this.statistics.increment(record.consumerId, 'searchesStarted');
    this.statistics.increment(record.consumerId, 'totalSearchFees', record.cost);

    return { success: true, record };
  }

  private resolveCreditModifier(consumerId: string): number {
    const score = this.rating?.getScore(consumerId) ?? this.config.rating.defaultScore;
    return this.catalog.getCreditModifier(score);
  }

  private allocateId(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  private findRecord(searchId: string): SearchRecord | undefined {
    return this.records.get(searchId) ?? this.closedById.get(searchId);
  }

  /** Frees the consumer's slot and moves the record into closed history. */
  private closeRecord(record: SearchRecord): void {
    this.records.delete(record.id);
    removeFromIndex(this.activeByConsumer, record.consumerId, record.id);
    this.remember(record);
  }

  private releaseSlot(listing: Listing, settle?: (record: SearchRecord) => void): void {
    const record = this.records.get(listing.searchId);
    if (!record) {
      removeFromIndex(this.activeByConsumer, listing.consumerId, listing.searchId);
      return;
    }
    settle?.(record);
    this.closeRecord(record);
  }

  private remember(record: SearchRecord): void {
    const limit = this.config.history.closedSearchesPerConsumer;
    if (limit <= 0) {
      return;
    }
    let closed = this.closedByConsumer.get(record.consumerId);
    if (!closed) {
      closed = [];
      this.closedByConsumer.set(record.consumerId, closed);
    }
    closed.push(record);
    this.closedById.set(record.id, record);
    while (closed.length > limit) {
      const evicted = closed.shift();
      if (evicted) {
        this.closedById.delete(evicted.id);
      }
    }
  }

  private getVisibleListing(listingId: string): Listing | undefined {
    const listing = this.listings.get(listingId);
    if (!listing || !this.visibleByConsumer.get(listing.consumerId)?.has(listingId)) {
      return undefined;
    }
    return listing;
  }

  private completeInspections(hour: number): string[] {
    const completed: string[] = [];
    for (const listing of this.listings.values()) {
      const { inspection } = listing;
      if (!inspection || inspection.state !== 'pending' || inspection.completesAtHour > hour) {
        continue;
      }
      inspection.state = 'complete';
      completed.push(listing.id);
      this.events.stage(
        'InspectionCompleted',
        {
          listingId: listing.id,
          consumerId: listing.consumerId,
          tierId: inspection.tierId,
          revealLevel: inspection.revealLevel,
        },
        inspection.completesAtHour,
      );
    }
    return completed;
  }

  private countDownListings(day: number): string[] {
    const { unitsPerDay } = this.config.time;
    const expired: string[] = [];
    for (const listing of [...this.listings.values()]) {
      if (listing.status !== 'available' || isHeldOnDay(listing, day, unitsPerDay)) {
        continue;
      }
      listing.expiresInDays -= 1;
      if (listing.expiresInDays > 0) {
        continue;
      }

      listing.status = 'expired';
      this.removeListing(listing);
      this.releaseSlot(listing);
      this.statistics.increment(listing.consumerId, 'listingsExpired');
      expired.push(listing.id);
      this.events.stage(
        'ListingExpired',
        { listingId: listing.id, searchId: listing.searchId, consumerId: listing.consumerId },
        this.currentHour,
      );
    }
    return expired;
  }

  private advanceRecords(
    day: number,
    found: string[],
    failed: string[],
    pendingListings: Listing[],
  ): void {
    const { unitsPerDay } = this.config.time;
    for (const record of [...this.records.values()]) {
      if (!record.isActive) {
        continue;
      }
      record.advance(unitsPerDay);
      const completion = record.checkCompletion();

      if (completion === 'success' && record.markSucceeded()) {
        const listing = createListing(record, {
          id: formatListingId(day, this.allocateId()),
          day,
          expiryDays: this.config.listings.expiryDays,
          commissionRate: this.config.listings.commissionRate,
        });
        this.listings.set(listing.id, listing);
        pendingListings.push(listing);
        this.statistics.increment(record.consumerId, 'searchesSucceeded');
        found.push(record.id);
        this.events.stage(
          'SearchFound',
          {
            searchId: record.id,
            consumerId: record.consumerId,
            listingId: listing.id,
            askingPrice: listing.askingPrice,
          },
          this.currentHour,
        );
      } else if (completion === 'failed' && record.markFailed()) {
        this.closeRecord(record);
        this.statistics.increment(record.consumerId, 'searchesFailed');
        failed.push(record.id);
        this.events.stage(
          'SearchFailed',
          { searchId: record.id, consumerId: record.consumerId },
          this.currentHour,
        );
      }
    }
  }

  private removeListing(listing: Listing): void {
    this.listings.delete(listing.id);
    removeFromIndex(this.visibleByConsumer, listing.consumerId, listing.id);
  }
}

function assertClock(clock: SchedulerClock): void {
  if (!Number.isInteger(clock.day) || !Number.isFinite(clock.hour)) {
    throw new ConfigurationError(
      `Scheduler clock requires an integer day and a finite hour (received day ${clock.day}, hour ${clock.hour}).`,
    );
  }
}

function parseSequence(id: string): number {
  const match = /_(\d+)$/.exec(id);
  return match?.[1] ? Number.parseInt(match[1], 10) : 0;
}

function addToIndex(index: Map<string, Set<string>>, key: string, id: string): void {
  let entries = index.get(key);
  if (!entries) {
    entries = new Set();
    index.set(key, entries);
  }
  entries.add(id);
}

function removeFromIndex(index: Map<string, Set<string>>, key: string, id: string): void {
  const entries = index.get(key);
  if (!entries) {
    return;
  }
  entries.delete(id);
  if (entries.size === 0) {
    index.delete(key);
  }
}

function countIndex(index: ReadonlyMap<string, ReadonlySet<string>>): number {
  let total = 0;
  for (const entries of index.values()) {
    total += entries.size;
  }
  return total;
}

function resolveIndex<T>(
  index: ReadonlyMap<string, ReadonlySet<string>>,
  key: string,
  source: ReadonlyMap<string, T>,
): T[] {
  const resolved: T[] = [];
  for (const id of index.get(key) ?? []) {
    const entry = source.get(id);
    if (entry !== undefined) {
      resolved.push(entry);
    }
  }
  return resolved;
}
