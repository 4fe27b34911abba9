import { z } from 'zod';

const FINITE_NUMBER_MESSAGE = 'Value must be a finite number.';
const NONNEGATIVE_NUMBER_MESSAGE = 'Value must be greater than or equal to 0.';
const POSITIVE_INTEGER_MESSAGE =
  'Value must be a positive integer greater than 0.';
const FRACTION_RANGE_MESSAGE = 'Value must be between 0 and 1 inclusive.';
const SIGNED_FRACTION_RANGE_MESSAGE = 'Value must be between -1 and 1 inclusive.';

const ensureFinite = (value: number, ctx: z.RefinementCtx) => {
  if (!Number.isFinite(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: FINITE_NUMBER_MESSAGE,
    });
    return z.NEVER;
  }

  return value;
};

export const finiteNumberSchema = z.coerce
  .number()
  .transform((value, ctx) => ensureFinite(value, ctx));

export const nonNegativeNumberSchema = finiteNumberSchema.refine(
  (value) => value >= 0,
  {
    message: NONNEGATIVE_NUMBER_MESSAGE,
  },
);

export const positiveIntSchema = z.coerce
  .number()
  .transform((value, ctx) => ensureFinite(value, ctx))
  .refine(Number.isInteger, {
    message: POSITIVE_INTEGER_MESSAGE,
  })
  .refine((value) => value > 0, {
    message: POSITIVE_INTEGER_MESSAGE,
  });

export const nonNegativeIntSchema = finiteNumberSchema
  .refine(Number.isInteger, {
    message: 'Value must be an integer.',
  })
  .refine((value) => value >= 0, {
    message: NONNEGATIVE_NUMBER_MESSAGE,
  });

/**
 * Probability or fee share in `[0, 1]`.
 */
export const fractionSchema = finiteNumberSchema.refine(
  (value) => value >= 0 && value <= 1,
  {
    message: FRACTION_RANGE_MESSAGE,
  },
);

/**
 * Additive modifier in `[-1, 1]` (discounts are negative).
 */
export const signedFractionSchema = finiteNumberSchema.refine(
  (value) => value >= -1 && value <= 1,
  {
    message: SIGNED_FRACTION_RANGE_MESSAGE,
  },
);
