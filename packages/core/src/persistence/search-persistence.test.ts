import { afterEach, describe, expect, it } from 'vitest';

import { createEmptyStatistics } from '../statistics.js';
import {
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
} from '../telemetry.js';
import { PERSISTENCE_SCHEMA_VERSION } from '../version.js';
import {
  decodeSchedulerState,
  statisticsToPersisted,
  type SchedulerSnapshot,
} from './search-persistence.js';

const emptySnapshot: SchedulerSnapshot = {
  schemaVersion: PERSISTENCE_SCHEMA_VERSION,
  nextId: 1,
  lastProcessedDay: null,
  lastProcessedHour: null,
  records: [],
  listings: [],
  statistics: [],
};

describe('search persistence', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('writes every statistic as a string attribute', () => {
    const persisted = statisticsToPersisted('farm-1', {
      ...createEmptyStatistics(),
      searchesStarted: 3,
      totalSearchFees: 1200,
    });

    expect(persisted).toMatchObject({
      consumerId: 'farm-1',
      searchesStarted: '3',
      totalSearchFees: '1200',
      totalCommissions: '0',
    });
    expect(Object.keys(persisted)).toHaveLength(11);
  });

  it('decodes statistics and defaults unreadable counters to zero', () => {
    const decoded = decodeSchedulerState({
      ...emptySnapshot,
      statistics: [{ consumerId: 'farm-1', searchesStarted: '4', searchesFailed: 'many' }],
    });

    expect(decoded.statistics.get('farm-1')).toEqual({
      ...createEmptyStatistics(),
      searchesStarted: 4,
    });
  });

  it('skips corrupt entries of each kind', () => {
    const recorder = createRecordingTelemetry();
    setTelemetry(recorder);

    const decoded = decodeSchedulerState({
      ...emptySnapshot,
      records: [{ consumerId: 'farm-1' }],
      listings: [{ id: 'LISTING_D1_00000002' }],
      statistics: [{ searchesStarted: '1' }],
    });

    expect(decoded.report).toEqual({
      records: 0,
      listings: 0,
      skipped: [
        { kind: 'record', index: 0, message: 'Search record is missing an id.' },
        {
          kind: 'listing',
          index: 0,
          message: 'Listing "LISTING_D1_00000002" is missing its search id.',
        },
        { kind: 'statistics', index: 0, message: 'Statistics entry is missing a consumer id.' },
      ],
    });
    expect(recorder.events.map((event) => event.event)).toEqual([
      'CorruptRecordSkipped',
      'CorruptRecordSkipped',
      'CorruptRecordSkipped',
    ]);
  });
});
