import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import { ConfigurationError, CorruptRecordError } from './errors.js';
import {
  resolveOutcome,
  type RequestedConfigurations,
  type ResolvedConfiguration,
  type ResolvedFind,
  type SearchOutcome,
  type SearchOutcomeKind,
} from './outcome-resolver.js';
import {
  AttributeRecordBuilder,
  AttributeRecordReader,
  type AttributeRecord,
} from './persistence/attribute-record.js';
import type { WireReader, WireWriter } from './replication/wire-stream.js';
import type { RandomSource } from './rng.js';
import type { QualityTier, SearchTier } from './tier-catalog.js';

export type SearchStatus = 'active' | 'success' | 'failed' | 'cancelled' | 'completed';

export type CompletionCheck = 'none' | 'success' | 'failed';

const SEARCH_STATUSES: readonly SearchStatus[] = [
  'active',
  'success',
  'failed',
  'cancelled',
  'completed',
];

export interface ItemReference {
  readonly catalogKey: string;
  readonly displayName: string;
  readonly basePrice: number;
}

export interface SearchRecordParams {
  readonly id: string;
  readonly consumerId: string;
  readonly item: ItemReference;
  readonly tier: SearchTier;
  readonly quality: QualityTier;
  readonly creditModifier: number;
  readonly requestedConfigs?: RequestedConfigurations;
  /** Absolute clock time (time units) at which the request was made. */
  readonly createdAt: number;
}

export interface SearchRecordSnapshot {
  readonly id: string;
  readonly consumerId: string;
  readonly catalogKey: string;
  readonly displayName: string;
  readonly basePrice: number;
  readonly tierId: string;
  readonly qualityId: string;
  readonly requestedConfigs: RequestedConfigurations;
  readonly cost: number;
  readonly creditModifier: number;
  readonly ttl: number;
  readonly tts: number;
  readonly outcome: SearchOutcomeKind;
  readonly status: SearchStatus;
  readonly createdAt: number;
  readonly foundCondition: number | null;
  readonly foundPrice: number | null;
  readonly foundConfigurations: readonly ResolvedConfiguration[] | null;
}

interface SearchRecordState {
  readonly id: string;
  readonly consumerId: string;
  readonly item: ItemReference;
  readonly tierId: string;
  readonly qualityId: string;
  readonly requestedConfigs: RequestedConfigurations;
  readonly cost: number;
  readonly creditModifier: number;
  readonly outcome: SearchOutcomeKind;
  readonly find: ResolvedFind;
  readonly createdAt: number;
  ttl: number;
  tts: number;
  status: SearchStatus;
  found: ResolvedFind | null;
}

const EMPTY_FIND: ResolvedFind = Object.freeze({
  condition: 0,
  price: 0,
  configurations: Object.freeze([]),
});

/**
 * One in-flight search. The outcome, including what will be found, is fixed
 * at construction; ticking only counts the clock down toward it.
 */
export class SearchRecord {
  private readonly state: SearchRecordState;

  private constructor(state: SearchRecordState) {
    this.state = state;
  }

  static create(
    params: SearchRecordParams,
    rng: RandomSource,
    config: Pick<EngineConfig, 'time' | 'probability'> = DEFAULT_ENGINE_CONFIG,
  ): SearchRecord {
    const requestedConfigs = Object.freeze({ ...(params.requestedConfigs ?? {}) });
    const outcome: SearchOutcome = resolveOutcome(
      {
        tier: params.tier,
        quality: params.quality,
        basePrice: params.item.basePrice,
        creditModifier: params.creditModifier,
        requestedConfigs,
      },
      rng,
      config,
    );

    return new SearchRecord({
      id: params.id,
      consumerId: params.consumerId,
      item: Object.freeze({ ...params.item }),
      tierId: params.tier.id,
      qualityId: params.quality.id,
      requestedConfigs,
      cost: outcome.cost,
      creditModifier: outcome.creditModifier,
      outcome: outcome.outcome,
      find: outcome.find,
      createdAt: params.createdAt,
      ttl: outcome.ttl,
      tts: outcome.tts,
      status: 'active',
      found: null,
    });
  }

  get id(): string {
    return this.state.id;
  }

  get consumerId(): string {
    return this.state.consumerId;
  }

  get item(): ItemReference {
    return this.state.item;
  }

  get tierId(): string {
    return this.state.tierId;
  }

  get qualityId(): string {
    return this.state.qualityId;
  }

  get requestedConfigs(): RequestedConfigurations {
    return this.state.requestedConfigs;
  }

  get cost(): number {
    return this.state.cost;
  }

  get creditModifier(): number {
    return this.state.creditModifier;
  }

  get outcome(): SearchOutcomeKind {
    return this.state.outcome;
  }

  get ttl(): number {
    return this.state.ttl;
  }

  get tts(): number {
    return this.state.tts;
  }

  get status(): SearchStatus {
    return this.state.status;
  }

  get createdAt(): number {
    return this.state.createdAt;
  }

  get isActive(): boolean {
    return this.state.status === 'active';
  }

  /** Populated once success has been committed. */
  get found(): ResolvedFind | null {
    return this.state.found;
  }

  /**
   * Counts both clocks down by `delta` time units. No clamping: values may go
   * negative between a tick and the completion check.
   */
  advance(delta: number): void {
    if (!Number.isFinite(delta) || delta === 0) {
      return;
    }
    if (delta < 0) {
      throw new ConfigurationError(
        `Search records cannot be advanced backwards (delta ${delta}).`,
      );
    }
    if (this.state.status !== 'active') {
      return;
    }
    this.state.ttl -= delta;
    this.state.tts -= delta;
  }

  checkCompletion(): CompletionCheck {
    if (this.state.status !== 'active') {
      return 'none';
    }
    if (this.state.tts <= 0) {
      return 'success';
    }
    if (this.state.ttl <= 0) {
      return 'failed';
    }
    return 'none';
  }

  markSucceeded(): boolean {
    if (this.state.status !== 'active' || this.state.outcome !== 'success') {
      return false;
    }
    this.state.status = 'success';
    this.state.found = this.state.find;
    return true;
  }

  markFailed(): boolean {
    if (this.state.status !== 'active') {
      return false;
    }
    this.state.status = 'failed';
    return true;
  }

  /** A found item was bought; the record is closed. */
  markCompleted(): boolean {
    if (this.state.status !== 'success') {
      return false;
    }
    this.state.status = 'completed';
    return true;
  }

  /**
   * Stops an active search. The fee is never refunded. Returns whether the
   * status changed.
   */
  cancel(): boolean {
    if (this.state.status !== 'active') {
      return false;
    }
    this.state.status = 'cancelled';
    return true;
  }

  getRemainingTimeLabel(
    unitsPerDay: number = DEFAULT_ENGINE_CONFIG.time.unitsPerDay,
  ): string {
    const units = Math.max(0, Math.floor(this.state.ttl));
    const days = Math.floor(units / unitsPerDay);
    const hours = units % unitsPerDay;
    if (days > 0) {
      return `${days} day${days > 1 ? 's' : ''}, ${hours} hours`;
    }
    return `${units} hours`;
  }

  toSnapshot(): SearchRecordSnapshot {
    const { state } = this;
    return {
      id: state.id,
      consumerId: state.consumerId,
      catalogKey: state.item.catalogKey,
      displayName: state.item.displayName,
      basePrice: state.item.basePrice,
      tierId: state.tierId,
      qualityId: state.qualityId,
      requestedConfigs: state.requestedConfigs,
      cost: state.cost,
      creditModifier: state.creditModifier,
      ttl: state.ttl,
      tts: state.tts,
      outcome: state.outcome,
      status: state.status,
      createdAt: state.createdAt,
      foundCondition: state.found?.condition ?? null,
      foundPrice: state.found?.price ?? null,
      foundConfigurations: state.found?.configurations ?? null,
    };
  }

  toPersisted(): AttributeRecord {
    const { state } = this;
    const resolvedById = new Map(
      state.find.configurations.map((entry) => [entry.configId, entry]),
    );

    return new AttributeRecordBuilder()
      .setAll({
        id: state.id,
        consumerId: state.consumerId,
        catalogKey: state.item.catalogKey,
        displayName: state.item.displayName,
        basePrice: state.item.basePrice,
        tierId: state.tierId,
        qualityId: state.qualityId,
        cost: state.cost,
        creditModifier: state.creditModifier,
        ttl: state.ttl,
        tts: state.tts,
        outcome: state.outcome,
        status: state.status,
        createdAt: state.createdAt,
        resolvedCondition: state.find.condition,
        resolvedPrice: state.find.price,
        foundCondition: state.found?.condition ?? 0,
        foundPrice: state.found?.price ?? 0,
      })
      .setIndexed(
        'configuration',
        Object.keys(state.requestedConfigs)
          .sort()
          .map((configId) => {
            const resolved = resolvedById.get(configId);
            return {
              id: configId,
              index: state.requestedConfigs[configId],
              matched: resolved !== undefined && resolved.index !== null,
            };
          }),
      )
      .build();
  }

  /**
   * Rebuilds a record from its persisted attributes. Missing optional fields
   * fall back to defaults; a missing id makes the whole record corrupt.
   */
  static fromPersisted(record: AttributeRecord, index = 0): SearchRecord {
    const reader = new AttributeRecordReader(record);
    const id = reader.raw('id')?.trim();
    if (!id) {
      throw new CorruptRecordError(index, 'Search record is missing an id.');
    }

    const catalogKey = reader.string('catalogKey', '');
    const ttl = reader.number('ttl', 0);
    const tts = reader.number('tts', 0);
    const outcome = parseOutcome(reader.raw('outcome'), ttl, tts);
    const status = parseStatus(reader.raw('status'));

    const requestedConfigs: Record<string, number> = {};
    const configurations: ResolvedConfiguration[] = [];
    for (const entry of reader.indexed('configuration', 'id')) {
      const configId = entry.string('id', '');
      if (configId.length === 0) {
        continue;
      }
      const requestedIndex = entry.integer('index', 0);
      requestedConfigs[configId] = requestedIndex;
      configurations.push(
        Object.freeze({
          configId,
          requestedIndex,
          index: entry.boolean('matched', false) ? requestedIndex : null,
        }),
      );
    }

    const find: ResolvedFind =
      outcome === 'success'
        ? Object.freeze({
            condition: reader.number('resolvedCondition', reader.number('foundCondition', 0)),
            price: reader.number('resolvedPrice', reader.number('foundPrice', 0)),
            configurations: Object.freeze(configurations),
          })
        : EMPTY_FIND;

    return new SearchRecord({
      id,
      consumerId: reader.string('consumerId', ''),
      item: Object.freeze({
        catalogKey,
        displayName: reader.string('displayName', catalogKey),
        basePrice: reader.number('basePrice', 0),
      }),
      tierId: reader.string('tierId', 'local'),
      qualityId: reader.string('qualityId', 'any'),
      requestedConfigs: Object.freeze(requestedConfigs),
      cost: reader.number('cost', 0),
      creditModifier: reader.number('creditModifier', 0),
      outcome,
      find,
      createdAt: reader.number('createdAt', 0),
      ttl,
      tts,
      status,
      found: status === 'success' || status === 'completed' ? find : null,
    });
  }

  /**
   * Network form. Found fields are written as zeros until success is
   * committed; the resolved find itself never leaves the server.
   */
  writeTo(writer: WireWriter): void {
    const { state } = this;
    const configIds = Object.keys(state.requestedConfigs).sort();

    writer
      .writeString(state.id)
      .writeString(state.consumerId)
      .writeString(state.item.catalogKey)
      .writeString(state.item.displayName)
      .writeFloat64(state.item.basePrice)
      .writeString(state.tierId)
      .writeString(state.qualityId)
      .writeFloat64(state.cost)
      .writeFloat64(state.creditModifier)
      .writeFloat64(state.ttl)
      .writeFloat64(state.tts)
      .writeString(state.outcome)
      .writeString(state.status)
      .writeFloat64(state.createdAt)
      .writeInt32(configIds.length);
    for (const configId of configIds) {
      writer.writeString(configId).writeInt32(state.requestedConfigs[configId] ?? 0);
    }

    const found = state.found;
    writer
      .writeBool(found !== null)
      .writeFloat64(found?.condition ?? 0)
      .writeFloat64(found?.price ?? 0)
      .writeInt32(found?.configurations.length ?? 0);
    for (const entry of found?.configurations ?? []) {
      writer
        .writeString(entry.configId)
        .writeInt32(entry.requestedIndex)
        .writeInt32(entry.index ?? -1);
    }
  }

  /**
   * Reads a replica written by {@link SearchRecord.writeTo}. Replicas carry
   * no resolved find and are never ticked.
   */
  static readFrom(reader: WireReader): SearchRecord {
    const id = reader.readString();
    const consumerId = reader.readString();
    const catalogKey = reader.readString();
    const displayName = reader.readString();
    const basePrice = reader.readFloat64();
    const tierId = reader.readString();
    const qualityId = reader.readString();
    const cost = reader.readFloat64();
    const creditModifier = reader.readFloat64();
    const ttl = reader.readFloat64();
    const tts = reader.readFloat64();
    const outcome = parseOutcome(reader.readString(), ttl, tts);
    const status = parseStatus(reader.readString());
    const createdAt = reader.readFloat64();

    const requestedConfigs: Record<string, number> = {};
    const requestedCount = reader.readInt32();
    for (let index = 0; index < requestedCount; index += 1) {
      const configId = reader.readString();
      requestedConfigs[configId] = reader.readInt32();
    }

    const hasFound = reader.readBool();
    const condition = reader.readFloat64();
    const price = reader.readFloat64();
    const foundCount = reader.readInt32();
    const configurations: ResolvedConfiguration[] = [];
    for (let index = 0; index < foundCount; index += 1) {
      const configId = reader.readString();
      const requestedIndex = reader.readInt32();
      const matchedIndex = reader.readInt32();
      configurations.push(
        Object.freeze({
          configId,
          requestedIndex,
          index: matchedIndex < 0 ? null : matchedIndex,
        }),
      );
    }

    const found: ResolvedFind | null = hasFound
      ? Object.freeze({ condition, price, configurations: Object.freeze(configurations) })
      : null;

    return new SearchRecord({
      id,
      consumerId,
      item: Object.freeze({ catalogKey, displayName, basePrice }),
      tierId,
      qualityId,
      requestedConfigs: Object.freeze(requestedConfigs),
      cost,
      creditModifier,
      outcome,
      find: found ?? EMPTY_FIND,
      createdAt,
      ttl,
      tts,
      status,
      found,
    });
  }
}

function parseStatus(value: string | undefined): SearchStatus {
  return SEARCH_STATUSES.find((status) => status === value) ?? 'active';
}

function parseOutcome(
  value: string | undefined,
  ttl: number,
  tts: number,
): SearchOutcomeKind {
  if (value === 'success' || value === 'failure') {
    return value;
  }
  return tts <= ttl ? 'success' : 'failure';
}
