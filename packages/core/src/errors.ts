export type ProcurementErrorCode =
  | 'Configuration'
  | 'CorruptRecord'
  | OperationErrorCode;

/**
 * Recoverable failure codes. These are returned in result unions, never
 * thrown.
 */
export type OperationErrorCode =
  | 'InsufficientFunds'
  | 'NotFound'
  | 'InvalidState'
  | 'SpawnFailure'
  | 'NoOpportunity';

export class ProcurementError extends Error {
  readonly code: ProcurementErrorCode;

  constructor(code: ProcurementErrorCode, message: string) {
    super(message);
    this.name = 'ProcurementError';
    this.code = code;
  }
}

/**
 * Thrown for programmer errors: unknown tier ids, malformed catalogs,
 * invalid arguments.
 */
export class ConfigurationError extends ProcurementError {
  constructor(message: string) {
    super('Configuration', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised while decoding a persisted record. Loaders catch it per record and
 * report the record as skipped.
 */
export class CorruptRecordError extends ProcurementError {
  readonly index: number;

  constructor(index: number, message: string) {
    super('CorruptRecord', message);
    this.name = 'CorruptRecordError';
    this.index = index;
  }
}

export interface OperationError {
  readonly code: OperationErrorCode;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface OperationFailure {
  readonly success: false;
  readonly error: OperationError;
}

export function createOperationFailure(
  code: OperationErrorCode,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): OperationFailure {
  if (details) {
    return { success: false, error: { code, message, details } };
  }
  return { success: false, error: { code, message } };
}
