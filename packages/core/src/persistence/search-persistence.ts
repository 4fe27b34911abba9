import { CorruptRecordError } from '../errors.js';
import { listingFromPersisted, type Listing } from '../listing.js';
import { SearchRecord } from '../search-record.js';
import {
  STATISTIC_KEYS,
  createEmptyStatistics,
  type ConsumerStatistics,
  type StatisticKey,
} from '../statistics.js';
import {
  AttributeRecordBuilder,
  AttributeRecordReader,
  type AttributeRecord,
} from './attribute-record.js';
import { decodeEntries, type SkippedRecord } from './decode-entries.js';

export type { SkippedRecord, SkippedRecordKind } from './decode-entries.js';

export interface SchedulerSnapshot {
  readonly schemaVersion: number;
  readonly nextId: number;
  readonly lastProcessedDay: number | null;
  readonly lastProcessedHour: number | null;
  readonly records: readonly AttributeRecord[];
  readonly listings: readonly AttributeRecord[];
  readonly statistics: readonly AttributeRecord[];
}

export interface LoadReport {
  readonly records: number;
  readonly listings: number;
  readonly skipped: readonly SkippedRecord[];
}

export interface DecodedSchedulerState {
  readonly records: readonly SearchRecord[];
  readonly listings: readonly Listing[];
  readonly statistics: ReadonlyMap<string, ConsumerStatistics>;
  readonly report: LoadReport;
}

export function statisticsToPersisted(
  consumerId: string,
  statistics: ConsumerStatistics,
): AttributeRecord {
  const builder = new AttributeRecordBuilder().set('consumerId', consumerId);
  for (const key of STATISTIC_KEYS) {
    builder.set(key, statistics[key]);
  }
  return builder.build();
}

/**
 * Corrupt entries are skipped and listed in the report; the rest still load.
 */
export function decodeSchedulerState(snapshot: SchedulerSnapshot): DecodedSchedulerState {
  const skipped: SkippedRecord[] = [];

  const records = decodeEntries(snapshot.records, 'record', skipped, (attributes, index) =>
    SearchRecord.fromPersisted(attributes, index),
  );
  const listings = decodeEntries(snapshot.listings, 'listing', skipped, listingFromPersisted);
  const statistics = new Map<string, ConsumerStatistics>();
  for (const [consumerId, entry] of decodeEntries(
    snapshot.statistics,
    'statistics',
    skipped,
    decodeStatistics,
  )) {
    statistics.set(consumerId, entry);
  }

  return {
    records,
    listings,
    statistics,
    report: { records: records.length, listings: listings.length, skipped },
  };
}

function decodeStatistics(
  attributes: AttributeRecord,
  index: number,
): readonly [string, ConsumerStatistics] {
  const reader = new AttributeRecordReader(attributes);
  const consumerId = reader.raw('consumerId')?.trim();
  if (!consumerId) {
    throw new CorruptRecordError(index, 'Statistics entry is missing a consumer id.');
  }
  const defaults = createEmptyStatistics();
  const entry: { -readonly [Key in StatisticKey]: number } = { ...defaults };
  for (const key of STATISTIC_KEYS) {
    entry[key] = reader.number(key, defaults[key]);
  }
  return [consumerId, entry];
}
