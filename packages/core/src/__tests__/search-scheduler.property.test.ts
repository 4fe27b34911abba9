import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import { InMemoryLedger } from '../collaborators.js';
import { createSeededRandom } from '../rng.js';
import { SearchScheduler } from '../search-scheduler.js';

const PROPERTY_SEED = 515100;
const PROPERTY_RUNS = 150;

const propertyConfig = (offset: number): fc.Parameters<unknown> => ({
  seed: PROPERTY_SEED + offset,
  numRuns: PROPERTY_RUNS,
  endOnFailure: true,
});

const submissionArbitrary = fc.record({
  consumerId: fc.constantFrom('farm-1', 'farm-2', 'farm-3'),
  tierId: fc.constantFrom('local', 'regional', 'national'),
  qualityId: fc.constantFrom('poor', 'any', 'fair', 'good', 'excellent'),
  basePrice: fc.integer({ min: 1_000, max: 500_000 }),
});

const scenarioArbitrary = fc.record({
  seed: fc.integer({ min: 0, max: 0xffffffff }),
  submissions: fc.array(submissionArbitrary, { minLength: 1, maxLength: 8 }),
  days: fc.integer({ min: 1, max: 12 }),
});

type Scenario = typeof scenarioArbitrary extends fc.Arbitrary<infer T> ? T : never;

const inspectedScenarioArbitrary = fc.record({
  scenario: scenarioArbitrary,
  prefixDays: fc.integer({ min: 1, max: 4 }),
  inspectionHour: fc.integer({ min: 0, max: 23 }),
  inspectionTiers: fc.array(fc.constantFrom('quick', 'standard', 'comprehensive'), {
    maxLength: 8,
  }),
  extraDays: fc.integer({ min: 1, max: 10 }),
  midHour: fc.integer({ min: 0, max: 23 }),
});

type InspectedScenario =
  typeof inspectedScenarioArbitrary extends fc.Arbitrary<infer T> ? T : never;

function startScenario({ seed, submissions }: Scenario): SearchScheduler {
  const ledger = new InMemoryLedger({
    initialBalances: { 'farm-1': 1e9, 'farm-2': 1e9, 'farm-3': 1e9 },
  });
  const scheduler = new SearchScheduler({ ledger, rng: createSeededRandom(seed) });
  scheduler.tick({ day: 0, hour: 0 });
  submissions.forEach((submission, index) => {
    scheduler.submit({
      consumerId: submission.consumerId,
      tierId: submission.tierId,
      qualityId: submission.qualityId,
      item: {
        catalogKey: `vehicles/item-${index}.xml`,
        displayName: `Item ${index}`,
        basePrice: submission.basePrice,
      },
    });
  });
  return scheduler;
}

function startInspectedScenario({
  scenario,
  prefixDays,
  inspectionHour,
  inspectionTiers,
}: InspectedScenario): SearchScheduler {
  const scheduler = startScenario(scenario);
  for (let day = 1; day <= prefixDays; day += 1) {
    scheduler.tick({ day, hour: day * 24 });
  }
  scheduler.tick({ day: prefixDays, hour: prefixDays * 24 + inspectionHour });

  const listings = ['farm-1', 'farm-2', 'farm-3'].flatMap((consumerId) =>
    scheduler.getListingsForConsumer(consumerId),
  );
  listings.forEach((listing, index) => {
    const tierId = inspectionTiers[index];
    if (tierId !== undefined) {
      scheduler.requestInspection(listing.id, tierId);
    }
  });
  return scheduler;
}

function observe(scheduler: SearchScheduler) {
  const consumers = ['farm-1', 'farm-2', 'farm-3'];
  return {
    records: consumers.map((consumerId) =>
      scheduler.getRecordsForConsumer(consumerId).map((record) => record.toSnapshot()),
    ),
    listings: consumers.map((consumerId) => scheduler.getListingsForConsumer(consumerId)),
    statistics: consumers.map((consumerId) => scheduler.getStatistics(consumerId)),
    active: scheduler.getActiveRecordCount(),
    persisted: scheduler.serialize(),
  };
}

describe('SearchScheduler properties', () => {
  it('processes a multi-day jump like the same number of single-day ticks', () => {
    fc.assert(
      fc.property(scenarioArbitrary, (scenario) => {
        const jumped = startScenario(scenario);
        const stepped = startScenario(scenario);

        jumped.tick({ day: scenario.days, hour: scenario.days * 24 });
        for (let day = 1; day <= scenario.days; day += 1) {
          stepped.tick({ day, hour: day * 24 });
        }

        expect(observe(jumped)).toEqual(observe(stepped));
      }),
      propertyConfig(0),
    );
  });

  it('counts inspected listings down alike however the hours are batched', () => {
    fc.assert(
      fc.property(inspectedScenarioArbitrary, (inspected) => {
        const jumped = startInspectedScenario(inspected);
        const stepped = startInspectedScenario(inspected);
        const lastDay = inspected.prefixDays + inspected.extraDays;

        jumped.tick({ day: lastDay, hour: lastDay * 24 });
        for (let day = inspected.prefixDays + 1; day <= lastDay; day += 1) {
          if (inspected.midHour > 0) {
            stepped.tick({ day: day - 1, hour: (day - 1) * 24 + inspected.midHour });
          }
          stepped.tick({ day, hour: day * 24 });
        }

        expect(observe(jumped)).toEqual(observe(stepped));
      }),
      propertyConfig(2),
    );
  });

  it('never holds more slots than searches submitted', () => {
    fc.assert(
      fc.property(scenarioArbitrary, (scenario) => {
        const scheduler = startScenario(scenario);
        for (let day = 1; day <= scenario.days; day += 1) {
          scheduler.tick({ day, hour: day * 24 });
          expect(scheduler.getActiveRecordCount()).toBeLessThanOrEqual(
            scenario.submissions.length,
          );
        }

        const totals = ['farm-1', 'farm-2', 'farm-3']
          .map((consumerId) => scheduler.getStatistics(consumerId))
          .reduce(
            (sum, entry) => sum + entry.searchesSucceeded + entry.searchesFailed,
            0,
          );
        expect(totals + scheduler.getActiveRecordCount()).toBeGreaterThanOrEqual(
          scenario.submissions.length,
        );
      }),
      propertyConfig(1),
    );
  });
});
