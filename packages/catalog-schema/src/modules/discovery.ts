import { z } from 'zod';

import { catalogIdSchema, eventKindSchema } from '../base/ids.js';
import {
  fractionSchema,
  nonNegativeIntSchema,
  nonNegativeNumberSchema,
  positiveIntSchema,
} from '../base/numbers.js';

export const discoveryGateDefinitionSchema = z
  .object({
    id: catalogIdSchema,
    catalogKey: z
      .string()
      .trim()
      .min(1, { message: 'Discovery catalog keys must contain at least one character.' }),
    discoveryChance: fractionSchema,
    requiredUsageCount: nonNegativeIntSchema,
    requiredScore: nonNegativeIntSchema,
    degradationThreshold: fractionSchema,
    basePrice: nonNegativeNumberSchema,
    discountFraction: fractionSchema.default(0),
    opportunityWindowDays: positiveIntSchema,
    pityThreshold: positiveIntSchema,
    qualifyingEventKinds: z.array(eventKindSchema).default([]),
  })
  .strict()
  .transform((definition) => ({
    ...definition,
    price: Math.floor(definition.basePrice * (1 - definition.discountFraction)),
    qualifyingEventKinds: Object.freeze([
      ...new Set(definition.qualifyingEventKinds),
    ]),
  }));

export type NormalizedDiscoveryGate = z.output<typeof discoveryGateDefinitionSchema>;
