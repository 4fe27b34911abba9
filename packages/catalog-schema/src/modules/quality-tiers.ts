import { z } from 'zod';

import { ensureUniqueIds } from '../base/collections.js';
import { catalogIdSchema } from '../base/ids.js';
import {
  fractionSchema,
  nonNegativeNumberSchema,
  signedFractionSchema,
} from '../base/numbers.js';

export const qualityTierDefinitionSchema = z
  .object({
    id: catalogIdSchema,
    name: z
      .string()
      .trim()
      .min(1, { message: 'Quality tier names must contain at least one character.' }),
    minCondition: fractionSchema,
    maxCondition: fractionSchema,
    priceMultiplier: nonNegativeNumberSchema,
    successModifier: signedFractionSchema.default(0),
  })
  .strict()
  .superRefine((tier, ctx) => {
    if (tier.maxCondition <= tier.minCondition) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxCondition'],
        message: `Condition range [${tier.minCondition}, ${tier.maxCondition}) must not be empty.`,
      });
    }
  });

export const qualityTierCollectionSchema = z
  .array(qualityTierDefinitionSchema)
  .min(1, { message: 'At least one quality tier must be declared.' })
  .superRefine((tiers, ctx) => ensureUniqueIds(tiers, ctx, 'quality tier'));

export type NormalizedQualityTier = z.output<typeof qualityTierDefinitionSchema>;
