import { describe, expect, it } from 'vitest';

import {
  fractionSchema,
  nonNegativeIntSchema,
  positiveIntSchema,
  signedFractionSchema,
} from './numbers.js';

describe('numeric schemas', () => {
  it('accepts fractions at both bounds', () => {
    expect(fractionSchema.parse(0)).toBe(0);
    expect(fractionSchema.parse(1)).toBe(1);
    expect(fractionSchema.safeParse(1.01).success).toBe(false);
  });

  it('rejects non-finite values', () => {
    const result = fractionSchema.safeParse(Number.POSITIVE_INFINITY);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Value must be a finite number.');
    }
  });

  it('accepts negative modifiers within range', () => {
    expect(signedFractionSchema.parse(-0.15)).toBe(-0.15);
    expect(signedFractionSchema.safeParse(-1.5).success).toBe(false);
  });

  it('requires positive integers for durations', () => {
    expect(positiveIntSchema.parse(24)).toBe(24);
    expect(positiveIntSchema.safeParse(0).success).toBe(false);
    expect(positiveIntSchema.safeParse(1.5).success).toBe(false);
  });

  it('allows zero for counters', () => {
    expect(nonNegativeIntSchema.parse(0)).toBe(0);
    expect(nonNegativeIntSchema.safeParse(-1).success).toBe(false);
  });
});
