import { z } from 'zod';

import { catalogIdSchema, semverRangeSchema, semverSchema } from '../base/ids.js';

export const catalogMetadataSchema = z
  .object({
    id: catalogIdSchema,
    title: z
      .string()
      .trim()
      .min(1, { message: 'Catalog title must contain at least one character.' })
      .max(120, { message: 'Catalog title must contain at most 120 characters.' }),
    version: semverSchema,
    engineCompatibility: semverRangeSchema.optional(),
  })
  .strict();

export type CatalogMetadata = z.output<typeof catalogMetadataSchema>;
