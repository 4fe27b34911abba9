export interface ConsumerStatistics {
  readonly searchesStarted: number;
  readonly searchesSucceeded: number;
  readonly searchesFailed: number;
  readonly searchesCancelled: number;
  readonly totalSearchFees: number;
  readonly listingsExpired: number;
  readonly listingsPurchased: number;
  readonly inspectionsPurchased: number;
  readonly totalInspectionFees: number;
  readonly totalCommissions: number;
}

export type StatisticKey = keyof ConsumerStatistics;

export const STATISTIC_KEYS: readonly StatisticKey[] = [
  'searchesStarted',
  'searchesSucceeded',
  'searchesFailed',
  'searchesCancelled',
  'totalSearchFees',
  'listingsExpired',
  'listingsPurchased',
  'inspectionsPurchased',
  'totalInspectionFees',
  'totalCommissions',
];

type MutableStatistics = { -readonly [Key in StatisticKey]: number };

export const createEmptyStatistics = (): ConsumerStatistics => ({
  searchesStarted: 0,
  searchesSucceeded: 0,
  searchesFailed: 0,
  searchesCancelled: 0,
  totalSearchFees: 0,
  listingsExpired: 0,
  listingsPurchased: 0,
  inspectionsPurchased: 0,
  totalInspectionFees: 0,
  totalCommissions: 0,
});

/**
 * Per-consumer counters. Counters only ever grow.
 */
export class StatisticsBook {
  private readonly entries = new Map<string, MutableStatistics>();

  increment(consumerId: string, key: StatisticKey, amount = 1): void {
    const entry = this.ensure(consumerId);
    entry[key] += amount;
  }

  get(consumerId: string): ConsumerStatistics {
    const entry = this.entries.get(consumerId);
    return entry ? { ...entry } : createEmptyStatistics();
  }

  set(consumerId: string, statistics: ConsumerStatistics): void {
    this.entries.set(consumerId, { ...statistics });
  }

  consumers(): readonly string[] {
    return [...this.entries.keys()];
  }

  clear(): void {
    this.entries.clear();
  }

  private ensure(consumerId: string): MutableStatistics {
    let entry = this.entries.get(consumerId);
    if (!entry) {
      entry = { ...createEmptyStatistics() };
      this.entries.set(consumerId, entry);
    }
    return entry;
  }
}
