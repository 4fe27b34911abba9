import { afterEach, describe, expect, it, vi } from 'vitest';

import type { TelemetryFacade } from './telemetry.js';
import {
  createConsoleTelemetry,
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
  telemetry,
} from './telemetry.js';

describe('telemetry facade', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('forwards every call to the active facade', () => {
    const recording = createRecordingTelemetry();
    setTelemetry(recording);

    telemetry.recordError('SpawnFailed', { consumerId: 'farm-1' });
    telemetry.recordWarning('CorruptSearchRecordSkipped');
    telemetry.recordProgress('SearchSubmitted', { searchId: 'SEARCH_00000001' });
    telemetry.recordCounters('scheduler.tick', { found: 2 });
    telemetry.recordTick();

    expect(recording.events).toEqual([
      { level: 'error', event: 'SpawnFailed', data: { consumerId: 'farm-1' } },
      { level: 'warning', event: 'CorruptSearchRecordSkipped', data: undefined },
      {
        level: 'progress',
        event: 'SearchSubmitted',
        data: { searchId: 'SEARCH_00000001' },
      },
      { level: 'counters', event: 'scheduler.tick', data: { found: 2 } },
    ]);
    expect(recording.ticks).toBe(1);
  });

  it('clears recorded events', () => {
    const recording = createRecordingTelemetry();
    recording.recordProgress('SearchSubmitted');
    recording.recordTick();
    recording.clear();
    expect(recording.events).toHaveLength(0);
    expect(recording.ticks).toBe(0);
  });

  it('guards against facades that throw', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const throwing: TelemetryFacade = {
      recordError() {
        throw new Error('boom');
      },
      recordWarning() {},
      recordProgress() {},
      recordCounters() {},
      recordTick() {},
    };
    setTelemetry(throwing);

    expect(() => telemetry.recordError('SearchFailed')).not.toThrow();
    expect(consoleError).toHaveBeenCalledWith(
      '[telemetry] invocation failed',
      expect.any(Error),
    );
  });

  it('returns to the silent facade after reset', () => {
    const recording = createRecordingTelemetry();
    setTelemetry(recording);
    resetTelemetry();
    telemetry.recordProgress('SearchSubmitted');
    expect(recording.events).toHaveLength(0);
  });

  it('prefixes console output', () => {
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {});
    const consoleDebug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const facade = createConsoleTelemetry({ prefix: 'broker' });

    facade.recordProgress('ListingPurchased', { listingId: 'L1' });
    facade.recordTick();

    expect(consoleInfo).toHaveBeenCalledWith('[broker:progress] ListingPurchased', {
      listingId: 'L1',
    });
    expect(consoleDebug).not.toHaveBeenCalled();
  });
});
