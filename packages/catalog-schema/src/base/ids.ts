import semver from 'semver';
import { z } from 'zod';

const CATALOG_ID_PATTERN = /^[A-Za-z0-9][-./:\w]{0,63}$/;

const normalizeCatalogId = (value: string): string =>
  value.trim().toLowerCase();

const validateSemver = (value: string, ctx: z.RefinementCtx): string => {
  const cleaned = semver.clean(value.trim());
  if (cleaned) {
    return cleaned;
  }

  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'Invalid semantic version.',
  });
  return z.NEVER;
};

const validateSemverRange = (value: string, ctx: z.RefinementCtx): string => {
  const normalized = value.trim();
  const range = semver.validRange(normalized, { includePrerelease: true });
  if (range) {
    return range;
  }

  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'Invalid semantic version range.',
  });
  return z.NEVER;
};

const createCatalogSlugSchema = <Brand extends string>(label: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${label} must contain at least one character.` })
    .max(64, { message: `${label} must contain at most 64 characters.` })
    .regex(CATALOG_ID_PATTERN, {
      message: `${label} must start with an alphanumeric character and may include "-", "_", ".", "/", or ":" thereafter.`,
    })
    .transform(normalizeCatalogId)
    .pipe(z.string().brand<Brand>());

export const catalogIdSchema = createCatalogSlugSchema<'CatalogId'>('Catalog id');

export const eventKindSchema = createCatalogSlugSchema<'EventKind'>('Event kind');

export const semverSchema = z
  .string()
  .trim()
  .min(1, { message: 'Semantic versions must not be empty.' })
  .transform((value, ctx) => validateSemver(value, ctx))
  .pipe(z.string().brand<'SemanticVersion'>());

export const semverRangeSchema = z
  .string()
  .trim()
  .min(1, { message: 'Semantic version ranges must not be empty.' })
  .transform((value, ctx) => validateSemverRange(value, ctx))
  .pipe(z.string().brand<'SemanticVersionRange'>());

export type CatalogId = z.infer<typeof catalogIdSchema>;
