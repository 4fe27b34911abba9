import { z } from 'zod';

import { ensureUniqueIds } from '../base/collections.js';
import { catalogIdSchema } from '../base/ids.js';
import { fractionSchema, positiveIntSchema } from '../base/numbers.js';

type SearchTierDefinitionInput = {
  readonly id: z.input<typeof catalogIdSchema>;
  readonly name: string;
  readonly feeFraction: number;
  readonly minDuration: number;
  readonly maxDuration: number;
  readonly durationStep?: number;
  readonly baseSuccess: number;
  readonly matchChance: number;
};

type SearchTierDefinition = {
  readonly id: z.infer<typeof catalogIdSchema>;
  readonly name: string;
  readonly feeFraction: number;
  readonly minDuration: number;
  readonly maxDuration: number;
  readonly durationStep: number;
  readonly baseSuccess: number;
  readonly matchChance: number;
};

export const searchTierDefinitionSchema: z.ZodType<
  SearchTierDefinition,
  z.ZodTypeDef,
  SearchTierDefinitionInput
> = z
  .object({
    id: catalogIdSchema,
    name: z
      .string()
      .trim()
      .min(1, { message: 'Tier names must contain at least one character.' }),
    feeFraction: fractionSchema,
    minDuration: positiveIntSchema,
    maxDuration: positiveIntSchema,
    durationStep: positiveIntSchema.default(1),
    baseSuccess: fractionSchema,
    matchChance: fractionSchema,
  })
  .strict()
  .superRefine((tier, ctx) => {
    if (tier.maxDuration < tier.minDuration) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxDuration'],
        message: `Maximum duration (${tier.maxDuration}) must be greater than or equal to minimum duration (${tier.minDuration}).`,
      });
      return;
    }

    if ((tier.maxDuration - tier.minDuration) % tier.durationStep !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['durationStep'],
        message: `Duration span ${tier.minDuration}..${tier.maxDuration} is not a multiple of the duration step ${tier.durationStep}.`,
      });
    }
  });

export const searchTierCollectionSchema = z
  .array(searchTierDefinitionSchema)
  .min(1, { message: 'At least one search tier must be declared.' })
  .superRefine((tiers, ctx) => ensureUniqueIds(tiers, ctx, 'search tier'));

export type NormalizedSearchTier = z.output<typeof searchTierDefinitionSchema>;
