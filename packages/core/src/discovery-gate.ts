import type {
  AcquisitionProvider,
  AcquisitionResult,
  Ledger,
  PrerequisiteProvider,
  RatingProvider,
} from './collaborators.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import { createOperationFailure, type OperationFailure } from './errors.js';
import { ProcurementEventBus } from './events/procurement-events.js';
import {
  assertSchemaVersion,
  decodeEntries,
  type SkippedRecord,
} from './persistence/decode-entries.js';
import {
  discoveryStateFromPersisted,
  discoveryStateToPersisted,
  type DiscoverySnapshot,
} from './persistence/discovery-persistence.js';
import { readDiscoveryState, writeDiscoveryState } from './replication/codecs.js';
import type { WireReader, WireWriter } from './replication/wire-stream.js';
import { createUnseededRandom, type RandomSource } from './rng.js';
import { telemetry } from './telemetry.js';
import {
  createTierCatalog,
  type DiscoveryGateDefinition,
  type TierCatalog,
} from './tier-catalog.js';
import { PERSISTENCE_SCHEMA_VERSION } from './version.js';

export type PrerequisiteReason =
  | 'already_discovered'
  | 'opportunity_active'
  | 'usage_count'
  | 'credit_score'
  | 'no_degraded_ceiling'
  | 'eligible';

export interface PrerequisiteCheck {
  readonly eligible: boolean;
  readonly reason: PrerequisiteReason;
  /** The measured value for `usage_count` and `credit_score`. */
  readonly detail?: number;
}

export interface DiscoveryGateState {
  readonly discovered: boolean;
  readonly purchased: boolean;
  readonly opportunityActive: boolean;
  /** Absolute hour the opportunity lapses at; 0 while none is active. */
  readonly opportunityExpiry: number;
  readonly eligibleTransactions: number;
  readonly prerequisiteSnapshot: PrerequisiteCheck | null;
}

export interface DiscoveryStatus {
  readonly discovered: boolean;
  readonly purchased: boolean;
  readonly opportunityActive: boolean;
  readonly remainingDays: number;
  readonly eligibleTransactions: number;
  readonly price: number;
}

export interface PrerequisiteRequirement {
  readonly required: number;
  readonly actual: number;
  readonly met: boolean;
}

export interface PrerequisiteStatus {
  readonly usageCount: PrerequisiteRequirement;
  readonly creditScore: PrerequisiteRequirement;
  readonly degradedCeiling: {
    readonly threshold: number;
    /** Lowest ceiling among the consumer's items, or null when it owns none. */
    readonly lowest: number | null;
    readonly met: boolean;
  };
}

export type AcceptResult =
  | { readonly success: true; readonly price: number }
  | OperationFailure;

export interface DeclineResult {
  readonly opportunityActive: boolean;
  readonly remainingDays: number;
}

export interface DiscoveryLoadReport {
  readonly states: number;
  readonly skipped: readonly SkippedRecord[];
}

export interface DiscoveryGateOptions {
  readonly ledger: Ledger;
  readonly prerequisites?: PrerequisiteProvider;
  readonly rating?: RatingProvider;
  readonly acquisition?: AcquisitionProvider;
  readonly catalog?: TierCatalog;
  readonly rng?: RandomSource;
  readonly events?: ProcurementEventBus;
  readonly config?: EngineConfig;
}

type MutableGateState = { -readonly [Key in keyof DiscoveryGateState]: DiscoveryGateState[Key] };

export const createInitialGateState = (): DiscoveryGateState => ({
  discovered: false,
  purchased: false,
  opportunityActive: false,
  opportunityExpiry: 0,
  eligibleTransactions: 0,
  prerequisiteSnapshot: null,
});

/**
 * Per-consumer unlock of a premium item. Qualifying events roll against the
 * discovery chance once every prerequisite holds; after `pityThreshold`
 * eligible events the roll always succeeds. A consumer discovers the item at
 * most once: an expired opportunity is never offered again.
 *
 * Times are absolute hours on the same clock the scheduler ticks with.
 */
export class DiscoveryGate {
  readonly events: ProcurementEventBus;

  private readonly ledger: Ledger;
  private readonly prerequisites?: PrerequisiteProvider;
  private readonly rating?: RatingProvider;
  private readonly acquisition?: AcquisitionProvider;
  private readonly definition: DiscoveryGateDefinition;
  private readonly qualifyingKinds: ReadonlySet<string>;
  private readonly rng: RandomSource;
  private readonly config: EngineConfig;
  private readonly states = new Map<string, MutableGateState>();
  private lastSeenHour = 0;

  constructor(options: DiscoveryGateOptions) {
    this.ledger = options.ledger;
    this.prerequisites = options.prerequisites;
    this.rating = options.rating;
    this.acquisition = options.acquisition;
    this.definition = (options.catalog ?? createTierCatalog()).discovery;
    this.qualifyingKinds = new Set<string>(this.definition.qualifyingEventKinds);
    this.rng = options.rng ?? createUnseededRandom();
    this.events = options.events ?? new ProcurementEventBus();
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
  }

  get price(): number {
    return this.definition.price;
  }

  /**
   * Evaluates the prerequisites in a fixed order and stops at the first one
   * that fails. The result is cached on the consumer's state for display.
   */
  checkPrerequisites(consumerId: string): PrerequisiteCheck {
    const state = this.ensure(consumerId);
    const check = this.evaluate(consumerId, state);
    state.prerequisiteSnapshot = check;
    return check;
  }

  /**
   * Reports a transaction that may trigger the discovery. Returns whether the
   * opportunity opened. Kinds outside the configured list are ignored without
   * drawing; an empty list accepts every kind.
   */
  onQualifyingEvent(consumerId: string, eventKind: string, now: number): boolean {
    this.observe(now);
    if (this.qualifyingKinds.size > 0 && !this.qualifyingKinds.has(eventKind)) {
      return false;
    }
    if (!this.checkPrerequisites(consumerId).eligible) {
      return false;
    }

    const state = this.ensure(consumerId);
    state.eligibleTransactions += 1;
    const pityReached = state.eligibleTransactions >= this.definition.pityThreshold;
    const threshold = pityReached ? 1 : this.definition.discoveryChance;
    const roll = this.rng.next();
    if (roll > threshold) {
      return false;
    }

    state.discovered = true;
    state.opportunityActive = true;
    state.opportunityExpiry = now + this.definition.opportunityWindowDays * this.unitsPerDay;
    this.events.publish(
      'DiscoveryTriggered',
      {
        consumerId,
        price: this.definition.price,
        expiresAt: state.opportunityExpiry,
        forced: roll > this.definition.discoveryChance,
      },
      now,
    );
    return true;
  }

  /**
   * Buys the discovered item. A failed delivery refunds the price and keeps
   * the opportunity open.
   */
  accept(consumerId: string, now: number = this.lastSeenHour): AcceptResult {
    this.observe(now);
    const state = this.states.get(consumerId);
    if (!state?.opportunityActive) {
      return createOperationFailure(
        'NoOpportunity',
        `Consumer "${consumerId}" has no open discovery opportunity.`,
      );
    }

    const { price } = this.definition;
    const charge = this.ledger.charge(consumerId, price, `discovery:${this.definition.id}`);
    if (!charge.success) {
      return createOperationFailure(
        'InsufficientFunds',
        `Discovery price of ${price} exceeds the available balance of ${charge.balance}.`,
        { required: price, balance: charge.balance },
      );
    }

    const acquired: AcquisitionResult = this.acquisition?.materialize(
      this.definition.catalogKey,
      consumerId,
    ) ?? { success: true };
    if (!acquired.success) {
      this.ledger.credit(consumerId, price, `refund:discovery:${this.definition.id}`);
      telemetry.recordError('AcquisitionFailed', {
        consumerId,
        catalogKey: this.definition.catalogKey,
        message: acquired.message,
      });
      return createOperationFailure(
        'SpawnFailure',
        `Could not deliver the discovered item: ${acquired.message}`,
        { refunded: price },
      );
    }

    state.purchased = true;
    state.opportunityActive = false;
    state.opportunityExpiry = 0;
    this.events.publish('DiscoveryPurchased', { consumerId, price }, now);
    return { success: true, price };
  }

  /** Acknowledges a declined offer. The opportunity stays open until it expires. */
  decline(consumerId: string, now: number): DeclineResult {
    this.observe(now);
    const state = this.states.get(consumerId);
    return {
      opportunityActive: state?.opportunityActive ?? false,
      remainingDays: this.remainingDays(state, now),
    };
  }

  /**
   * Closes every opportunity whose window has lapsed and returns the affected
   * consumers. `discovered` stays set, so the gate never re-arms.
   */
  expireCheck(now: number): string[] {
    this.observe(now);
    const expired: string[] = [];
    for (const [consumerId, state] of this.states) {
      if (!state.opportunityActive || state.opportunityExpiry <= 0) {
        continue;
      }
      if (now < state.opportunityExpiry) {
        continue;
      }
      state.opportunityActive = false;
      state.opportunityExpiry = 0;
      expired.push(consumerId);
      this.events.publish('DiscoveryExpired', { consumerId }, now);
    }
    return expired;
  }

  getState(consumerId: string): DiscoveryGateState {
    const state = this.states.get(consumerId);
    return state ? { ...state } : createInitialGateState();
  }

  getStatus(consumerId: string, now: number = this.lastSeenHour): DiscoveryStatus {
    const state = this.states.get(consumerId);
    return {
      discovered: state?.discovered ?? false,
      purchased: state?.purchased ?? false,
      opportunityActive: state?.opportunityActive ?? false,
      remainingDays: this.remainingDays(state, now),
      eligibleTransactions: state?.eligibleTransactions ?? 0,
      price: this.definition.price,
    };
  }

  getPrerequisiteStatus(consumerId: string): PrerequisiteStatus {
    const usage = this.readUsageCount(consumerId);
    const score = this.readScore(consumerId);
    const ceilings = this.prerequisites?.getResourceCeilings(consumerId) ?? [];
    const lowest = ceilings.length > 0 ? Math.min(...ceilings) : null;

    return {
      usageCount: {
        required: this.definition.requiredUsageCount,
        actual: usage,
        met: usage >= this.definition.requiredUsageCount,
      },
      creditScore: {
        required: this.definition.requiredScore,
        actual: score,
        met: score >= this.definition.requiredScore,
      },
      degradedCeiling: {
        threshold: this.definition.degradationThreshold,
        lowest,
        met: lowest !== null && lowest < this.definition.degradationThreshold,
      },
    };
  }

  /** Administrative reset back to the initial locked state. */
  reset(consumerId: string): void {
    this.states.set(consumerId, { ...createInitialGateState() });
  }

  serialize(): DiscoverySnapshot {
    return {
      schemaVersion: PERSISTENCE_SCHEMA_VERSION,
      states: [...this.states].map(([consumerId, state]) =>
        discoveryStateToPersisted(consumerId, state),
      ),
    };
  }

  hydrate(snapshot: DiscoverySnapshot): DiscoveryLoadReport {
    assertSchemaVersion(snapshot.schemaVersion, 'Discovery');
    const skipped: SkippedRecord[] = [];
    const decoded = decodeEntries(
      snapshot.states,
      'discovery',
      skipped,
      discoveryStateFromPersisted,
    );

    this.states.clear();
    for (const [consumerId, state] of decoded) {
      this.states.set(consumerId, { ...state });
    }
    return { states: decoded.length, skipped };
  }

  /** Writes one consumer's replicated state. */
  writeState(consumerId: string, writer: WireWriter): void {
    writeDiscoveryState(writer, consumerId, this.getState(consumerId));
  }

  /**
   * Applies a replicated state on a read-only copy. Returns the consumer id
   * it belonged to.
   */
  readState(reader: WireReader): string {
    const { consumerId, state } = readDiscoveryState(reader);
    this.states.set(consumerId, { ...state });
    return consumerId;
  }

  private get unitsPerDay(): number {
    return this.config.time.unitsPerDay;
  }

  private evaluate(consumerId: string, state: DiscoveryGateState): PrerequisiteCheck {
    if (state.discovered || state.purchased) {
      return { eligible: false, reason: 'already_discovered' };
    }
    if (state.opportunityActive) {
      return { eligible: false, reason: 'opportunity_active' };
    }

    const usage = this.readUsageCount(consumerId);
    if (usage < this.definition.requiredUsageCount) {
      return { eligible: false, reason: 'usage_count', detail: usage };
    }
    const score = this.readScore(consumerId);
    if (score < this.definition.requiredScore) {
      return { eligible: false, reason: 'credit_score', detail: score };
    }
    const ceilings = this.prerequisites?.getResourceCeilings(consumerId) ?? [];
    if (!ceilings.some((ceiling) => ceiling < this.definition.degradationThreshold)) {
      return { eligible: false, reason: 'no_degraded_ceiling' };
    }
    return { eligible: true, reason: 'eligible' };
  }

  private readUsageCount(consumerId: string): number {
    return this.prerequisites?.getUsageCount(consumerId) ?? 0;
  }

  private readScore(consumerId: string): number {
    return this.rating?.getScore(consumerId) ?? this.config.rating.defaultScore;
  }

  private remainingDays(state: DiscoveryGateState | undefined, now: number): number {
    if (!state?.opportunityActive) {
      return 0;
    }
    const remaining = state.opportunityExpiry - now;
    return remaining > 0 ? Math.ceil(remaining / this.unitsPerDay) : 0;
  }

  private ensure(consumerId: string): MutableGateState {
    let state = this.states.get(consumerId);
    if (!state) {
      state = { ...createInitialGateState() };
      this.states.set(consumerId, state);
    }
    return state;
  }

  private observe(now: number): void {
    if (Number.isFinite(now)) {
      this.lastSeenHour = Math.max(this.lastSeenHour, now);
    }
  }
}
