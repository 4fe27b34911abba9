/* eslint-disable no-console */

import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

import type { TelemetryEventData, TelemetryFacade } from './telemetry.js';

export interface PrometheusTelemetryOptions {
  readonly registry?: Registry;
  readonly prefix?: string;
  readonly collectDefaultMetrics?: boolean;
  /**
   * Mirror every event to the console in addition to the metrics.
   *
   * @defaultValue `false`
   */
  readonly logToConsole?: boolean;
}

interface SchedulerMetrics {
  readonly daysProcessed: Counter<string>;
  readonly completions: Counter<string>;
  readonly activeRecords: Gauge<string>;
  readonly visibleListings: Gauge<string>;
}

const DEFAULT_PREFIX = 'agent_market_';

/**
 * Progress events that map onto the `searches_total{event}` counter.
 */
const SEARCH_EVENTS = new Set([
  'SearchSubmitted',
  'SearchRenewed',
  'SearchFound',
  'SearchFailed',
  'SearchCancelled',
]);

const LISTING_EVENTS = new Set([
  'ListingPurchased',
  'ListingExpired',
  'InspectionRequested',
  'InspectionCompleted',
]);

const DISCOVERY_EVENTS = new Set([
  'DiscoveryTriggered',
  'DiscoveryExpired',
  'DiscoveryPurchased',
]);

export interface PrometheusTelemetryFacade extends TelemetryFacade {
  readonly registry: Registry;
}

export function createPrometheusTelemetry(
  options: PrometheusTelemetryOptions = {},
): PrometheusTelemetryFacade {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? DEFAULT_PREFIX;
  const logToConsole = options.logToConsole ?? false;

  if (options.collectDefaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const errors = new Counter({
    name: `${prefix}telemetry_errors_total`,
    help: 'Total number of telemetry errors emitted by the engine.',
    registers: [registry],
    labelNames: ['event'],
  });

  const warnings = new Counter({
    name: `${prefix}telemetry_warnings_total`,
    help: 'Total number of telemetry warnings emitted by the engine.',
    registers: [registry],
    labelNames: ['event'],
  });

  const ticks = new Counter({
    name: `${prefix}scheduler_ticks_total`,
    help: 'Total number of scheduler ticks processed.',
    registers: [registry],
  });

  const searches = new Counter({
    name: `${prefix}searches_total`,
    help: 'Search lifecycle transitions by event.',
    registers: [registry],
    labelNames: ['event'],
  });

  const listings = new Counter({
    name: `${prefix}listings_total`,
    help: 'Listing and inspection transitions by event.',
    registers: [registry],
    labelNames: ['event'],
  });

  const discoveries = new Counter({
    name: `${prefix}discovery_total`,
    help: 'Discovery gate transitions by event.',
    registers: [registry],
    labelNames: ['event'],
  });

  const scheduler: SchedulerMetrics = {
    daysProcessed: new Counter({
      name: `${prefix}scheduler_days_processed_total`,
      help: 'Simulated days rolled up by the scheduler, including skipped days.',
      registers: [registry],
    }),
    completions: new Counter({
      name: `${prefix}scheduler_completions_total`,
      help: 'Completions committed by scheduler ticks, by kind.',
      registers: [registry],
      labelNames: ['kind'],
    }),
    activeRecords: new Gauge({
      name: `${prefix}scheduler_active_records`,
      help: 'Search records currently tracked by the scheduler.',
      registers: [registry],
    }),
    visibleListings: new Gauge({
      name: `${prefix}scheduler_visible_listings`,
      help: 'Available listings visible to consumers.',
      registers: [registry],
    }),
  };

  const log = (method: 'error' | 'warn' | 'info', message: string, data?: TelemetryEventData) => {
    if (logToConsole) {
      console[method](message, data);
    }
  };

  const facade: PrometheusTelemetryFacade = {
    recordError(event: string, data?: TelemetryEventData) {
      errors.inc({ event });
      log('error', `[market:error] ${event}`, data);
    },
    recordWarning(event: string, data?: TelemetryEventData) {
      warnings.inc({ event });
      log('warn', `[market:warning] ${event}`, data);
    },
    recordProgress(event: string, data?: TelemetryEventData) {
      if (SEARCH_EVENTS.has(event)) {
        searches.inc({ event });
      } else if (LISTING_EVENTS.has(event)) {
        listings.inc({ event });
      } else if (DISCOVERY_EVENTS.has(event)) {
        discoveries.inc({ event });
      }
      log('info', `[market:progress] ${event}`, data);
    },
    recordCounters(group: string, counters: Readonly<Record<string, number>>) {
      if (group === 'scheduler.tick') {
        updateSchedulerMetrics(scheduler, counters);
      }
    },
    recordTick() {
      ticks.inc();
    },
    registry,
  };

  return facade;
}

const COMPLETION_KINDS = [
  'found',
  'failed',
  'listingsExpired',
  'inspectionsCompleted',
] as const;

function updateSchedulerMetrics(
  metrics: SchedulerMetrics,
  values: Readonly<Record<string, number>>,
): void {
  const { daysProcessed, activeRecords, visibleListings } = values;

  // Tick counters are per-tick increments; gauges are absolute.
  if (isPositive(daysProcessed)) {
    metrics.daysProcessed.inc(daysProcessed);
  }

  for (const kind of COMPLETION_KINDS) {
    const value = values[kind];
    if (isPositive(value)) {
      metrics.completions.inc({ kind }, value);
    }
  }

  if (isFiniteValue(activeRecords)) {
    metrics.activeRecords.set(activeRecords);
  }
  if (isFiniteValue(visibleListings)) {
    metrics.visibleListings.set(visibleListings);
  }
}

function isFiniteValue(value: number | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isPositive(value: number | undefined): value is number {
  return isFiniteValue(value) && value > 0;
}
