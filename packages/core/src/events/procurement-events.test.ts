import { afterEach, describe, expect, it } from 'vitest';

import {
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
} from '../telemetry.js';
import { ProcurementEventBus, type ProcurementEvent } from './procurement-events.js';

describe('ProcurementEventBus', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('delivers typed events to matching subscribers only', () => {
    const bus = new ProcurementEventBus();
    const failures: string[] = [];
    bus.subscribe('SearchFailed', (event) => {
      failures.push(`${event.payload.searchId}@${event.at}`);
    });

    bus.publish('SearchFailed', { searchId: 'SEARCH_00000001', consumerId: 'farm-1' }, 48);
    bus.publish('SearchCancelled', { searchId: 'SEARCH_00000002', consumerId: 'farm-1' }, 50);

    expect(failures).toEqual(['SEARCH_00000001@48']);
  });

  it('holds staged events until flushed', () => {
    const bus = new ProcurementEventBus();
    const seen: ProcurementEvent[] = [];
    bus.subscribeAll((event) => seen.push(event));

    bus.stage('SearchFailed', { searchId: 'SEARCH_00000003', consumerId: 'farm-2' }, 24);
    bus.stage('ListingExpired', {
      listingId: 'LISTING_D1_00000004',
      searchId: 'SEARCH_00000001',
      consumerId: 'farm-2',
    }, 24);

    expect(seen).toEqual([]);
    expect(bus.stagedCount).toBe(2);
    expect(bus.flush()).toBe(2);
    expect(seen.map((event) => event.type)).toEqual(['SearchFailed', 'ListingExpired']);
    expect(bus.flush()).toBe(0);
  });

  it('freezes published events', () => {
    const bus = new ProcurementEventBus();
    let captured: ProcurementEvent | undefined;
    bus.subscribeAll((event) => {
      captured = event;
    });

    bus.publish('DiscoveryExpired', { consumerId: 'farm-3' }, 720);

    expect(Object.isFrozen(captured)).toBe(true);
    expect(Object.isFrozen(captured?.payload)).toBe(true);
  });

  it('stops delivering after unsubscribe', () => {
    const bus = new ProcurementEventBus();
    let count = 0;
    const subscription = bus.subscribe('DiscoveryExpired', () => {
      count += 1;
    });

    bus.publish('DiscoveryExpired', { consumerId: 'farm-3' }, 1);
    subscription.unsubscribe();
    bus.publish('DiscoveryExpired', { consumerId: 'farm-3' }, 2);

    expect(count).toBe(1);
  });

  it('reports dispatched events as telemetry progress', () => {
    const recorder = createRecordingTelemetry();
    setTelemetry(recorder);
    const bus = new ProcurementEventBus();

    bus.publish('DiscoveryPurchased', { consumerId: 'farm-4', price: 67_500 }, 90);

    expect(recorder.events).toEqual([
      {
        level: 'progress',
        event: 'DiscoveryPurchased',
        data: { at: 90, consumerId: 'farm-4', price: 67_500 },
      },
    ]);
  });
});
