import { z } from 'zod';

import { nonNegativeIntSchema, signedFractionSchema } from '../base/numbers.js';

export const creditFeeBandSchema = z
  .object({
    minScore: nonNegativeIntSchema,
    modifier: signedFractionSchema,
    name: z
      .string()
      .trim()
      .min(1, { message: 'Credit band names must contain at least one character.' }),
  })
  .strict();

const sortBandsDescending = <T extends { readonly minScore: number }>(
  bands: readonly T[],
): readonly T[] =>
  Object.freeze([...bands].sort((left, right) => right.minScore - left.minScore));

export const creditFeeScheduleSchema = z
  .object({
    bands: z
      .array(creditFeeBandSchema)
      .min(1, { message: 'At least one credit fee band must be declared.' })
      .superRefine((bands, ctx) => {
        const seen = new Set<number>();
        bands.forEach((band, index) => {
          if (seen.has(band.minScore)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [index, 'minScore'],
              message: `Duplicate credit band threshold ${band.minScore}.`,
            });
          }
          seen.add(band.minScore);
        });
      })
      .transform(sortBandsDescending),
    fallbackModifier: signedFractionSchema,
  })
  .strict();

export type NormalizedCreditFeeBand = z.output<typeof creditFeeBandSchema>;
export type NormalizedCreditFeeSchedule = z.output<typeof creditFeeScheduleSchema>;
