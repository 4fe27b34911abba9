import { describe, expect, it } from 'vitest';

import {
  ConfigurationError,
  CorruptRecordError,
  ProcurementError,
  createOperationFailure,
} from './errors.js';

describe('errors', () => {
  it('tags thrown errors with a code', () => {
    const error = new ConfigurationError('Unknown search tier "orbital".');

    expect(error).toBeInstanceOf(ProcurementError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('Configuration');
    expect(error.name).toBe('ConfigurationError');
    expect(error.message).toBe('Unknown search tier "orbital".');
  });

  it('keeps the record index on corrupt record errors', () => {
    const error = new CorruptRecordError(4, 'Search record is missing an id.');

    expect(error.code).toBe('CorruptRecord');
    expect(error.index).toBe(4);
  });

  it('omits details when none are given', () => {
    expect(createOperationFailure('NotFound', 'No such search.')).toEqual({
      success: false,
      error: { code: 'NotFound', message: 'No such search.' },
    });
    expect(
      createOperationFailure('InsufficientFunds', 'Balance too low.', {
        required: 400,
      }),
    ).toEqual({
      success: false,
      error: {
        code: 'InsufficientFunds',
        message: 'Balance too low.',
        details: { required: 400 },
      },
    });
  });
});
