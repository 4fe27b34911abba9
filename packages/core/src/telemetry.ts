/* eslint-disable no-console */

export type TelemetryEventData = Readonly<Record<string, unknown>>;

export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
  recordTick(): void;
}

export interface ConsoleTelemetryOptions {
  /**
   * Prefix placed before every console line.
   *
   * @defaultValue `'market'`
   */
  readonly prefix?: string;
  /**
   * Emit `recordTick` calls at debug level. Ticks are hourly, so this is
   * noisy on long simulations.
   */
  readonly logTicks?: boolean;
}

/**
 * A no-op telemetry implementation that silently discards all events.
 * This is the default telemetry facade.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
  recordTick() {},
};

/**
 * Creates a telemetry facade that logs all events to the console.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@agent-market/core';
 * setTelemetry(createConsoleTelemetry({ prefix: 'broker' }));
 */
export function createConsoleTelemetry(
  options: ConsoleTelemetryOptions = {},
): TelemetryFacade {
  const prefix = options.prefix ?? 'market';
  const logTicks = options.logTicks ?? false;

  return {
    recordError(event, data) {
      console.error(`[${prefix}:error] ${event}`, data);
    },
    recordWarning(event, data) {
      console.warn(`[${prefix}:warning] ${event}`, data);
    },
    recordProgress(event, data) {
      console.info(`[${prefix}:progress] ${event}`, data);
    },
    recordCounters(group, counters) {
      console.info(`[${prefix}:counters] ${group}`, counters);
    },
    recordTick() {
      if (logTicks) {
        console.debug(`[${prefix}:tick]`);
      }
    },
  };
}

export type RecordedTelemetryLevel = 'error' | 'warning' | 'progress' | 'counters';

export interface RecordedTelemetryEvent {
  readonly level: RecordedTelemetryLevel;
  readonly event: string;
  readonly data?: TelemetryEventData;
}

export interface RecordingTelemetryFacade extends TelemetryFacade {
  readonly events: readonly RecordedTelemetryEvent[];
  readonly ticks: number;
  clear(): void;
}

/**
 * Keeps every event in memory. Intended for tests and the simulation CLI.
 */
export function createRecordingTelemetry(): RecordingTelemetryFacade {
  const events: RecordedTelemetryEvent[] = [];
  let ticks = 0;

  return {
    get events() {
      return events;
    },
    get ticks() {
      return ticks;
    },
    recordError(event, data) {
      events.push({ level: 'error', event, data });
    },
    recordWarning(event, data) {
      events.push({ level: 'warning', event, data });
    },
    recordProgress(event, data) {
      events.push({ level: 'progress', event, data });
    },
    recordCounters(group, counters) {
      events.push({ level: 'counters', event: group, data: counters });
    },
    recordTick() {
      ticks += 1;
    },
    clear() {
      events.length = 0;
      ticks = 0;
    },
  };
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(activeTelemetry, 'recordError', event, data);
  },
  recordWarning(event, data) {
    invokeSafely(activeTelemetry, 'recordWarning', event, data);
  },
  recordProgress(event, data) {
    invokeSafely(activeTelemetry, 'recordProgress', event, data);
  },
  recordCounters(group, counters) {
    invokeSafely(activeTelemetry, 'recordCounters', group, counters);
  },
  recordTick() {
    invokeSafely(activeTelemetry, 'recordTick');
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

function invokeSafely<TMethod extends keyof TelemetryFacade>(
  facade: TelemetryFacade,
  method: TMethod,
  ...args: Parameters<TelemetryFacade[TMethod]>
): void {
  try {
    (
      facade[method] as (
        ...fnArgs: Parameters<TelemetryFacade[TMethod]>
      ) => ReturnType<TelemetryFacade[TMethod]>
    ).call(facade, ...args);
  } catch (error) {
    console.error('[telemetry] invocation failed', error);
  }
}
