import type { DiscoveryGateState } from '../discovery-gate.js';
import { readListing, writeListing, type ListingView } from '../listing.js';
import { SearchRecord } from '../search-record.js';
import type { WireReader, WireWriter } from './wire-stream.js';

/** What a consumer's replica needs to render its searches and listings. */
export interface ConsumerView {
  readonly consumerId: string;
  readonly records: readonly SearchRecord[];
  readonly listings: readonly ListingView[];
}

export interface ReplicatedDiscoveryState {
  readonly consumerId: string;
  readonly state: DiscoveryGateState;
}

export function writeConsumerView(writer: WireWriter, view: ConsumerView): void {
  writer.writeString(view.consumerId).writeInt32(view.records.length);
  for (const record of view.records) {
    record.writeTo(writer);
  }
  writer.writeInt32(view.listings.length);
  for (const listing of view.listings) {
    writeListing(writer, listing);
  }
}

export function readConsumerView(reader: WireReader): ConsumerView {
  const consumerId = reader.readString();
  const records: SearchRecord[] = [];
  for (let count = reader.readInt32(); count > 0; count -= 1) {
    records.push(SearchRecord.readFrom(reader));
  }
  const listings: ListingView[] = [];
  for (let count = reader.readInt32(); count > 0; count -= 1) {
    listings.push(readListing(reader));
  }
  return { consumerId, records, listings };
}

export function writeDiscoveryState(
  writer: WireWriter,
  consumerId: string,
  state: DiscoveryGateState,
): void {
  writer
    .writeString(consumerId)
    .writeBool(state.discovered)
    .writeBool(state.purchased)
    .writeBool(state.opportunityActive)
    .writeFloat64(state.opportunityExpiry)
    .writeInt32(state.eligibleTransactions);
}

export function readDiscoveryState(reader: WireReader): ReplicatedDiscoveryState {
  const consumerId = reader.readString();
  return {
    consumerId,
    state: {
      discovered: reader.readBool(),
      purchased: reader.readBool(),
      opportunityActive: reader.readBool(),
      opportunityExpiry: reader.readFloat64(),
      eligibleTransactions: reader.readInt32(),
      prerequisiteSnapshot: null,
    },
  };
}
