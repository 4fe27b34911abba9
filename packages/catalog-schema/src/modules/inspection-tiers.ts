import { z } from 'zod';

import { ensureUniqueIds } from '../base/collections.js';
import { catalogIdSchema } from '../base/ids.js';
import {
  fractionSchema,
  nonNegativeNumberSchema,
  positiveIntSchema,
} from '../base/numbers.js';

export const inspectionTierDefinitionSchema = z
  .object({
    id: catalogIdSchema,
    name: z
      .string()
      .trim()
      .min(1, { message: 'Inspection tier names must contain at least one character.' }),
    baseCost: nonNegativeNumberSchema,
    percentCost: fractionSchema,
    maxCost: nonNegativeNumberSchema,
    durationHours: positiveIntSchema,
    revealLevel: positiveIntSchema,
  })
  .strict()
  .superRefine((tier, ctx) => {
    if (tier.maxCost < tier.baseCost) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxCost'],
        message: `Cost cap (${tier.maxCost}) must not be below the base cost (${tier.baseCost}).`,
      });
    }
  });

export const inspectionTierCollectionSchema = z
  .array(inspectionTierDefinitionSchema)
  .default([])
  .superRefine((tiers, ctx) => ensureUniqueIds(tiers, ctx, 'inspection tier'));

export type NormalizedInspectionTier = z.output<
  typeof inspectionTierDefinitionSchema
>;
