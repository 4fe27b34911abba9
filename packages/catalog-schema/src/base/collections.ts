import { z } from 'zod';

/**
 * Flags duplicate `id` entries inside a catalog collection.
 */
export const ensureUniqueIds = <T extends { readonly id: string }>(
  entries: readonly T[],
  ctx: z.RefinementCtx,
  label: string,
): void => {
  const seen = new Map<string, number>();
  entries.forEach((entry, index) => {
    const previous = seen.get(entry.id);
    if (previous !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate ${label} id "${entry.id}" (first declared at index ${previous}).`,
      });
      return;
    }
    seen.set(entry.id, index);
  });
};
