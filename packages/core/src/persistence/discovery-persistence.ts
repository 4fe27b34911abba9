import type { DiscoveryGateState } from '../discovery-gate.js';
import { CorruptRecordError } from '../errors.js';
import {
  AttributeRecordBuilder,
  AttributeRecordReader,
  type AttributeRecord,
} from './attribute-record.js';

export interface DiscoverySnapshot {
  readonly schemaVersion: number;
  readonly states: readonly AttributeRecord[];
}

export function discoveryStateToPersisted(
  consumerId: string,
  state: DiscoveryGateState,
): AttributeRecord {
  return new AttributeRecordBuilder()
    .setAll({
      consumerId,
      discovered: state.discovered,
      purchased: state.purchased,
      opportunityActive: state.opportunityActive,
      opportunityExpiry: state.opportunityExpiry,
      eligibleTransactions: state.eligibleTransactions,
    })
    .build();
}

/**
 * The cached prerequisite snapshot is display-only and is not persisted. An
 * open opportunity implies a discovery even when the flag was lost.
 */
export function discoveryStateFromPersisted(
  record: AttributeRecord,
  index = 0,
): readonly [string, DiscoveryGateState] {
  const reader = new AttributeRecordReader(record);
  const consumerId = reader.raw('consumerId')?.trim();
  if (!consumerId) {
    throw new CorruptRecordError(index, 'Discovery state is missing a consumer id.');
  }

  const opportunityActive = reader.boolean('opportunityActive', false);
  return [
    consumerId,
    {
      discovered: reader.boolean('discovered', false) || opportunityActive,
      purchased: reader.boolean('purchased', false),
      opportunityActive,
      opportunityExpiry: opportunityActive ? reader.number('opportunityExpiry', 0) : 0,
      eligibleTransactions: reader.integer('eligibleTransactions', 0),
      prerequisiteSnapshot: null,
    },
  ];
}
