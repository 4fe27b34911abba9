import { ConfigurationError, CorruptRecordError } from './errors.js';
import type { ResolvedConfiguration } from './outcome-resolver.js';
import {
  AttributeRecordBuilder,
  AttributeRecordReader,
  type AttributeRecord,
} from './persistence/attribute-record.js';
import type { WireReader, WireWriter } from './replication/wire-stream.js';
import type { SearchRecord } from './search-record.js';

export type ListingStatus = 'available' | 'purchased' | 'expired';

export type InspectionState = 'pending' | 'complete';

export interface ListingInspection {
  state: InspectionState;
  readonly tierId: string;
  readonly revealLevel: number;
  readonly requestedAtHour: number;
  readonly completesAtHour: number;
  readonly costPaid: number;
}

/**
 * A found item offered to the consumer who searched for it. Mutable fields
 * are owned by the scheduler.
 */
export interface Listing {
  readonly id: string;
  readonly searchId: string;
  readonly consumerId: string;
  readonly catalogKey: string;
  readonly displayName: string;
  readonly tierId: string;
  readonly qualityId: string;
  readonly condition: number;
  /** Found price before commission. */
  readonly basePrice: number;
  readonly commissionRate: number;
  readonly commissionAmount: number;
  readonly askingPrice: number;
  readonly configurations: readonly ResolvedConfiguration[];
  readonly listedOnDay: number;
  expiresInDays: number;
  status: ListingStatus;
  inspection: ListingInspection | null;
}

/**
 * Read-only copy of a listing handed out by the scheduler. Changing it never
 * affects the scheduler's own listing.
 */
export type ListingView = Readonly<Omit<Listing, 'inspection'>> & {
  readonly inspection: Readonly<ListingInspection> | null;
};

export interface ListingTerms {
  readonly id: string;
  readonly day: number;
  readonly expiryDays: number;
  readonly commissionRate: number;
}

const LISTING_STATUSES: readonly ListingStatus[] = ['available', 'purchased', 'expired'];

const pad = (sequence: number): string => String(sequence).padStart(8, '0');

export const formatSearchId = (sequence: number): string => `SEARCH_${pad(sequence)}`;

export const formatListingId = (day: number, sequence: number): string =>
  `LISTING_D${day}_${pad(sequence)}`;

export function createListing(record: SearchRecord, terms: ListingTerms): Listing {
  const found = record.found;
  if (found === null) {
    throw new ConfigurationError(
      `Search "${record.id}" has no committed find to list.`,
    );
  }

  const commissionAmount = Math.floor(found.price * terms.commissionRate);
  return {
    id: terms.id,
    searchId: record.id,
    consumerId: record.consumerId,
    catalogKey: record.item.catalogKey,
    displayName: record.item.displayName,
    tierId: record.tierId,
    qualityId: record.qualityId,
    condition: found.condition,
    basePrice: found.price,
    commissionRate: terms.commissionRate,
    commissionAmount,
    askingPrice: found.price + commissionAmount,
    configurations: found.configurations,
    listedOnDay: terms.day,
    expiresInDays: terms.expiryDays,
    status: 'available',
    inspection: null,
  };
}

export function viewListing(listing: ListingView): ListingView {
  const inspection = listing.inspection === null ? null : Object.freeze({ ...listing.inspection });
  return Object.freeze({ ...listing, inspection });
}

/** Listings with a pending inspection cannot be bought. */
export const isOnHold = (listing: ListingView): boolean =>
  listing.inspection?.state === 'pending';

/**
 * Whether the listing sits out the countdown of `day`, where day `d` covers
 * the hours after `(d - 1) * unitsPerDay` up to `d * unitsPerDay`. A listing
 * is held while its inspection is pending and through the day the inspection
 * completes, however the days are batched into ticks.
 */
export function isHeldOnDay(listing: ListingView, day: number, unitsPerDay: number): boolean {
  const { inspection } = listing;
  if (inspection === null) {
    return false;
  }
  return inspection.state === 'pending' || inspection.completesAtHour > (day - 1) * unitsPerDay;
}

export function listingToPersisted(listing: ListingView): AttributeRecord {
  const builder = new AttributeRecordBuilder()
    .setAll({
      id: listing.id,
      searchId: listing.searchId,
      consumerId: listing.consumerId,
      catalogKey: listing.catalogKey,
      displayName: listing.displayName,
      tierId: listing.tierId,
      qualityId: listing.qualityId,
      condition: listing.condition,
      basePrice: listing.basePrice,
      commissionRate: listing.commissionRate,
      commissionAmount: listing.commissionAmount,
      askingPrice: listing.askingPrice,
      listedOnDay: listing.listedOnDay,
      expiresInDays: listing.expiresInDays,
      status: listing.status,
    })
    .setIndexed(
      'configuration',
      listing.configurations.map((entry) => ({
        id: entry.configId,
        index: entry.requestedIndex,
        matched: entry.index !== null,
      })),
    );

  const { inspection } = listing;
  if (inspection) {
    builder.setAll({
      'inspection#state': inspection.state,
      'inspection#tierId': inspection.tierId,
      'inspection#revealLevel': inspection.revealLevel,
      'inspection#requestedAtHour': inspection.requestedAtHour,
      'inspection#completesAtHour': inspection.completesAtHour,
      'inspection#costPaid': inspection.costPaid,
    });
  }
  return builder.build();
}

export function listingFromPersisted(record: AttributeRecord, index = 0): Listing {
  const reader = new AttributeRecordReader(record);
  const id = reader.raw('id')?.trim();
  if (!id) {
    throw new CorruptRecordError(index, 'Listing is missing an id.');
  }
  const searchId = reader.raw('searchId')?.trim();
  if (!searchId) {
    throw new CorruptRecordError(index, `Listing "${id}" is missing its search id.`);
  }

  const configurations = reader
    .indexed('configuration', 'id')
    .map((entry): ResolvedConfiguration => {
      const requestedIndex = entry.integer('index', 0);
      return Object.freeze({
        configId: entry.string('id', ''),
        requestedIndex,
        index: entry.boolean('matched', false) ? requestedIndex : null,
      });
    })
    .filter((entry) => entry.configId.length > 0);

  const basePrice = reader.number('basePrice', 0);
  const commissionRate = reader.number('commissionRate', 0);
  const commissionAmount = reader.number(
    'commissionAmount',
    Math.floor(basePrice * commissionRate),
  );
  const catalogKey = reader.string('catalogKey', '');

  return {
    id,
    searchId,
    consumerId: reader.string('consumerId', ''),
    catalogKey,
    displayName: reader.string('displayName', catalogKey),
    tierId: reader.string('tierId', 'local'),
    qualityId: reader.string('qualityId', 'any'),
    condition: reader.number('condition', 0),
    basePrice,
    commissionRate,
    commissionAmount,
    askingPrice: reader.number('askingPrice', basePrice + commissionAmount),
    configurations: Object.freeze(configurations),
    listedOnDay: reader.integer('listedOnDay', 0),
    expiresInDays: reader.number('expiresInDays', 0),
    status: LISTING_STATUSES.find((status) => status === reader.raw('status')) ?? 'available',
    inspection: readInspection(reader),
  };
}

function readInspection(reader: AttributeRecordReader): ListingInspection | null {
  const tierId = reader.raw('inspection#tierId');
  if (tierId === undefined || tierId.length === 0) {
    return null;
  }
  return {
    state: reader.raw('inspection#state') === 'complete' ? 'complete' : 'pending',
    tierId,
    revealLevel: reader.integer('inspection#revealLevel', 0),
    requestedAtHour: reader.number('inspection#requestedAtHour', 0),
    completesAtHour: reader.number('inspection#completesAtHour', 0),
    costPaid: reader.number('inspection#costPaid', 0),
  };
}

export function writeListing(writer: WireWriter, listing: ListingView): void {
  writer
    .writeString(listing.id)
    .writeString(listing.searchId)
    .writeString(listing.consumerId)
    .writeString(listing.catalogKey)
    .writeString(listing.displayName)
    .writeString(listing.tierId)
    .writeString(listing.qualityId)
    .writeFloat64(listing.condition)
    .writeFloat64(listing.basePrice)
    .writeFloat64(listing.commissionRate)
    .writeFloat64(listing.commissionAmount)
    .writeFloat64(listing.askingPrice)
    .writeInt32(listing.listedOnDay)
    .writeInt32(listing.expiresInDays)
    .writeString(listing.status)
    .writeInt32(listing.configurations.length);
  for (const entry of listing.configurations) {
    writer
      .writeString(entry.configId)
      .writeInt32(entry.requestedIndex)
      .writeInt32(entry.index ?? -1);
  }

  const { inspection } = listing;
  writer.writeBool(inspection !== null);
  if (inspection) {
    writer
      .writeString(inspection.state)
      .writeString(inspection.tierId)
      .writeInt32(inspection.revealLevel)
      .writeFloat64(inspection.requestedAtHour)
      .writeFloat64(inspection.completesAtHour)
      .writeFloat64(inspection.costPaid);
  }
}

export function readListing(reader: WireReader): Listing {
  const id = reader.readString();
  const searchId = reader.readString();
  const consumerId = reader.readString();
  const catalogKey = reader.readString();
  const displayName = reader.readString();
  const tierId = reader.readString();
  const qualityId = reader.readString();
  const condition = reader.readFloat64();
  const basePrice = reader.readFloat64();
  const commissionRate = reader.readFloat64();
  const commissionAmount = reader.readFloat64();
  const askingPrice = reader.readFloat64();
  const listedOnDay = reader.readInt32();
  const expiresInDays = reader.readInt32();
  const statusText = reader.readString();
  const configurationCount = reader.readInt32();
  const configurations: ResolvedConfiguration[] = [];
  for (let index = 0; index < configurationCount; index += 1) {
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

  let inspection: ListingInspection | null = null;
  if (reader.readBool()) {
    inspection = {
      state: reader.readString() === 'complete' ? 'complete' : 'pending',
      tierId: reader.readString(),
      revealLevel: reader.readInt32(),
      requestedAtHour: reader.readFloat64(),
      completesAtHour: reader.readFloat64(),
      costPaid: reader.readFloat64(),
    };
  }

  return {
    id,
    searchId,
    consumerId,
    catalogKey,
    displayName,
    tierId,
    qualityId,
    condition,
    basePrice,
    commissionRate,
    commissionAmount,
    askingPrice,
    configurations: Object.freeze(configurations),
    listedOnDay,
    expiresInDays,
    status: LISTING_STATUSES.find((status) => status === statusText) ?? 'available',
    inspection,
  };
}
