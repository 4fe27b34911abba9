import { ConfigurationError, CorruptRecordError } from '../errors.js';
import { telemetry } from '../telemetry.js';
import { PERSISTENCE_SCHEMA_VERSION } from '../version.js';
import type { AttributeRecord } from './attribute-record.js';

export type SkippedRecordKind = 'record' | 'listing' | 'statistics' | 'discovery';

export interface SkippedRecord {
  readonly kind: SkippedRecordKind;
  readonly index: number;
  readonly message: string;
}

/**
 * Decodes every persisted entry, skipping corrupt ones. A skipped entry is
 * reported as a telemetry warning and appended to `skipped`; it never fails
 * the whole load. Errors other than {@link CorruptRecordError} propagate.
 */
export function decodeEntries<T>(
  entries: readonly AttributeRecord[],
  kind: SkippedRecordKind,
  skipped: SkippedRecord[],
  decode: (attributes: AttributeRecord, index: number) => T,
): T[] {
  const decoded: T[] = [];
  entries.forEach((attributes, index) => {
    try {
      decoded.push(decode(attributes, index));
    } catch (error) {
      if (!(error instanceof CorruptRecordError)) {
        throw error;
      }
      skipped.push({ kind, index, message: error.message });
      telemetry.recordWarning('CorruptRecordSkipped', {
        kind,
        index,
        message: error.message,
      });
    }
  });
  return decoded;
}

/**
 * Snapshots from another schema version are refused outright; there is no
 * migration path yet.
 */
export function assertSchemaVersion(schemaVersion: number, label: string): void {
  if (schemaVersion !== PERSISTENCE_SCHEMA_VERSION) {
    throw new ConfigurationError(
      `${label} snapshot has schema version ${String(schemaVersion)}; expected ${PERSISTENCE_SCHEMA_VERSION}.`,
    );
  }
}
