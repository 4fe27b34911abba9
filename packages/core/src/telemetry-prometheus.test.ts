import { describe, expect, it } from 'vitest';
import { Registry } from 'prom-client';

import { createPrometheusTelemetry } from './telemetry-prometheus.js';

describe('createPrometheusTelemetry', () => {
  it('counts search transitions by event', async () => {
    const registry = new Registry();
    const telemetry = createPrometheusTelemetry({
      registry,
      collectDefaultMetrics: false,
      prefix: 'test_',
    });

    telemetry.recordProgress('SearchSubmitted', { searchId: 'SEARCH_00000001' });
    telemetry.recordProgress('SearchSubmitted', { searchId: 'SEARCH_00000002' });
    telemetry.recordProgress('SearchFailed', { searchId: 'SEARCH_00000001' });
    telemetry.recordProgress('UnrelatedEvent');

    const searches = await registry.getSingleMetric('test_searches_total')?.get();
    expect(searches?.values).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ labels: { event: 'SearchSubmitted' }, value: 2 }),
        expect.objectContaining({ labels: { event: 'SearchFailed' }, value: 1 }),
      ]),
    );
    expect(searches?.values).toHaveLength(2);
  });

  it('accumulates scheduler tick counters and sets gauges', async () => {
    const registry = new Registry();
    const telemetry = createPrometheusTelemetry({
      registry,
      collectDefaultMetrics: false,
      prefix: 'test_',
    });

    telemetry.recordCounters('scheduler.tick', {
      daysProcessed: 3,
      found: 1,
      failed: 0,
      activeRecords: 4,
      visibleListings: 1,
    });
    telemetry.recordCounters('scheduler.tick', {
      daysProcessed: 1,
      found: 2,
      activeRecords: 2,
      visibleListings: 3,
    });
    telemetry.recordTick();
    telemetry.recordTick();

    const days = await registry
      .getSingleMetric('test_scheduler_days_processed_total')
      ?.get();
    const completions = await registry
      .getSingleMetric('test_scheduler_completions_total')
      ?.get();
    const active = await registry
      .getSingleMetric('test_scheduler_active_records')
      ?.get();
    const listings = await registry
      .getSingleMetric('test_scheduler_visible_listings')
      ?.get();
    const ticks = await registry.getSingleMetric('test_scheduler_ticks_total')?.get();

    expect(days?.values[0]?.value).toBe(4);
    expect(completions?.values).toEqual([
      expect.objectContaining({ labels: { kind: 'found' }, value: 3 }),
    ]);
    expect(active?.values[0]?.value).toBe(2);
    expect(listings?.values[0]?.value).toBe(3);
    expect(ticks?.values[0]?.value).toBe(2);
  });

  it('labels warnings and errors by event name', async () => {
    const registry = new Registry();
    const telemetry = createPrometheusTelemetry({
      registry,
      collectDefaultMetrics: false,
      prefix: 'test_',
    });

    telemetry.recordWarning('CorruptSearchRecordSkipped', { index: 2 });
    telemetry.recordError('AcquisitionFailed');

    const warnings = await registry
      .getSingleMetric('test_telemetry_warnings_total')
      ?.get();
    const errors = await registry
      .getSingleMetric('test_telemetry_errors_total')
      ?.get();

    expect(warnings?.values).toEqual([
      expect.objectContaining({
        labels: { event: 'CorruptSearchRecordSkipped' },
        value: 1,
      }),
    ]);
    expect(errors?.values).toEqual([
      expect.objectContaining({ labels: { event: 'AcquisitionFailed' }, value: 1 }),
    ]);
  });
});
