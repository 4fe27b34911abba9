import type { z } from 'zod';

export class CatalogSchemaError extends Error {
  constructor(
    message = 'Catalog schema validation failed',
    readonly issues: readonly z.ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'CatalogSchemaError';
  }
}

export class CatalogReferenceError extends CatalogSchemaError {
  constructor(
    message: string,
    readonly path: readonly (string | number)[],
  ) {
    super(message);
    this.name = 'CatalogReferenceError';
  }
}
