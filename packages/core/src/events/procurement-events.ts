import { telemetry } from '../telemetry.js';

export interface ProcurementEventPayloadMap {
  readonly SearchSubmitted: {
    readonly searchId: string;
    readonly consumerId: string;
    readonly tierId: string;
    readonly qualityId: string;
    readonly cost: number;
  };
  readonly SearchRenewed: {
    readonly searchId: string;
    readonly previousSearchId: string;
    readonly consumerId: string;
    readonly cost: number;
  };
  readonly SearchFound: {
    readonly searchId: string;
    readonly consumerId: string;
    readonly listingId: string;
    readonly askingPrice: number;
  };
  readonly SearchFailed: {
    readonly searchId: string;
    readonly consumerId: string;
  };
  readonly SearchCancelled: {
    readonly searchId: string;
    readonly consumerId: string;
  };
  readonly ListingExpired: {
    readonly listingId: string;
    readonly searchId: string;
    readonly consumerId: string;
  };
  readonly ListingPurchased: {
    readonly listingId: string;
    readonly searchId: string;
    readonly consumerId: string;
    /** Search tier the listing was found through. */
    readonly tierId: string;
    readonly price: number;
  };
  readonly InspectionRequested: {
    readonly listingId: string;
    readonly consumerId: string;
    readonly tierId: string;
    readonly cost: number;
    readonly completesAtHour: number;
  };
  readonly InspectionCompleted: {
    readonly listingId: string;
    readonly consumerId: string;
    readonly tierId: string;
    readonly revealLevel: number;
  };
  readonly DiscoveryTriggered: {
    readonly consumerId: string;
    readonly price: number;
    readonly expiresAt: number;
    /** Raised by the pity counter rather than the chance roll. */
    readonly forced: boolean;
  };
  readonly DiscoveryExpired: {
    readonly consumerId: string;
  };
  readonly DiscoveryPurchased: {
    readonly consumerId: string;
    readonly price: number;
  };
}

export type ProcurementEventType = keyof ProcurementEventPayloadMap;

export interface ProcurementEventOf<TType extends ProcurementEventType> {
  readonly type: TType;
  /** Clock time (time units) at which the transition happened. */
  readonly at: number;
  readonly payload: ProcurementEventPayloadMap[TType];
}

export type ProcurementEvent = ProcurementEventOf<ProcurementEventType>;

export type ProcurementEventHandler<TType extends ProcurementEventType> = (
  event: ProcurementEventOf<TType>,
) => void;

export interface EventSubscription {
  unsubscribe(): void;
}

export interface ProcurementEventPublisher {
  publish<TType extends ProcurementEventType>(
    type: TType,
    payload: ProcurementEventPayloadMap[TType],
    at: number,
  ): void;
}

export const isProcurementEventOfType = <TType extends ProcurementEventType>(
  event: ProcurementEvent,
  type: TType,
): event is ProcurementEventOf<TType> => event.type === type;

/**
 * Synchronous, in-order event fan-out. `stage` holds events until `flush`,
 * which the scheduler uses to release a whole tick's batch at once. Every
 * dispatched event is also reported as telemetry progress.
 */
export class ProcurementEventBus implements ProcurementEventPublisher {
  private readonly handlers = new Set<(event: ProcurementEvent) => void>();
  private readonly staged: ProcurementEvent[] = [];

  subscribe<TType extends ProcurementEventType>(
    type: TType,
    handler: ProcurementEventHandler<TType>,
  ): EventSubscription {
    return this.subscribeAll((event) => {
      if (isProcurementEventOfType(event, type)) {
        handler(event);
      }
    });
  }

  subscribeAll(handler: (event: ProcurementEvent) => void): EventSubscription {
    // Wrap so the same function can be registered twice.
    const entry = (event: ProcurementEvent) => handler(event);
    this.handlers.add(entry);
    return {
      unsubscribe: () => {
        this.handlers.delete(entry);
      },
    };
  }

  publish<TType extends ProcurementEventType>(
    type: TType,
    payload: ProcurementEventPayloadMap[TType],
    at: number,
  ): void {
    this.dispatch(createEvent(type, payload, at));
  }

  stage<TType extends ProcurementEventType>(
    type: TType,
    payload: ProcurementEventPayloadMap[TType],
    at: number,
  ): void {
    this.staged.push(createEvent(type, payload, at));
  }

  get stagedCount(): number {
    return this.staged.length;
  }

  flush(): number {
    const batch = this.staged.splice(0, this.staged.length);
    for (const event of batch) {
      this.dispatch(event);
    }
    return batch.length;
  }

  private dispatch(event: ProcurementEvent): void {
    telemetry.recordProgress(event.type, { at: event.at, ...event.payload });
    for (const handler of [...this.handlers]) {
      handler(event);
    }
  }
}

function createEvent<TType extends ProcurementEventType>(
  type: TType,
  payload: ProcurementEventPayloadMap[TType],
  at: number,
): ProcurementEventOf<TType> {
  const event: ProcurementEventOf<TType> = { type, at, payload };
  Object.freeze(payload);
  Object.freeze(event);
  return event;
}
