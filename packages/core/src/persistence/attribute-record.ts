import {
  parseBooleanFlag,
  parseFiniteNumber,
  parseNonNegativeInteger,
} from '../validation/primitives.js';

/**
 * Flat string map, one per persisted record. Hosts store these however they
 * like (XML attributes, key/value rows, JSON objects).
 */
export type AttributeRecord = Readonly<Record<string, string>>;

export type AttributeValue = string | number | boolean;

export type AttributeEntries = Readonly<Record<string, AttributeValue | undefined>>;

/**
 * Key for field `field` of entry `index` in an indexed group, e.g.
 * `configuration(2)#matched`.
 */
export const indexedKey = (group: string, index: number, field: string): string =>
  `${group}(${index})#${field}`;

export class AttributeRecordBuilder {
  private readonly values: Record<string, string> = {};

  set(key: string, value: AttributeValue | undefined): this {
    if (value !== undefined) {
      this.values[key] = String(value);
    }
    return this;
  }

  setAll(entries: AttributeEntries): this {
    for (const [key, value] of Object.entries(entries)) {
      this.set(key, value);
    }
    return this;
  }

  setIndexed(group: string, entries: readonly AttributeEntries[]): this {
    entries.forEach((entry, index) => {
      for (const [field, value] of Object.entries(entry)) {
        this.set(indexedKey(group, index, field), value);
      }
    });
    return this;
  }

  build(): AttributeRecord {
    return Object.freeze({ ...this.values });
  }
}

/**
 * Typed reads over an attribute record. Every getter takes a fallback used
 * when the key is missing or unparsable.
 */
export class AttributeRecordReader {
  constructor(private readonly record: AttributeRecord) {}

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.record, key);
  }

  raw(key: string): string | undefined {
    return this.has(key) ? this.record[key] : undefined;
  }

  string(key: string, fallback: string): string {
    const value = this.raw(key);
    return value === undefined || value.length === 0 ? fallback : value;
  }

  number(key: string, fallback: number): number {
    return parseFiniteNumber(this.raw(key)) ?? fallback;
  }

  integer(key: string, fallback: number): number {
    return parseNonNegativeInteger(this.raw(key)) ?? fallback;
  }

  boolean(key: string, fallback: boolean): boolean {
    return parseBooleanFlag(this.raw(key)) ?? fallback;
  }

  /**
   * Readers for each entry of an indexed group, in index order. The group ends
   * at the first index without `sentinelField`.
   */
  indexed(group: string, sentinelField: string): readonly IndexedAttributeReader[] {
    const entries: IndexedAttributeReader[] = [];
    for (let index = 0; this.has(indexedKey(group, index, sentinelField)); index += 1) {
      entries.push(new IndexedAttributeReader(this, group, index));
    }
    return entries;
  }
}

export class IndexedAttributeReader {
  constructor(
    private readonly reader: AttributeRecordReader,
    private readonly group: string,
    readonly index: number,
  ) {}

  raw(field: string): string | undefined {
    return this.reader.raw(this.key(field));
  }

  string(field: string, fallback: string): string {
    return this.reader.string(this.key(field), fallback);
  }

  number(field: string, fallback: number): number {
    return this.reader.number(this.key(field), fallback);
  }

  integer(field: string, fallback: number): number {
    return this.reader.integer(this.key(field), fallback);
  }

  boolean(field: string, fallback: boolean): boolean {
    return this.reader.boolean(this.key(field), fallback);
  }

  private key(field: string): string {
    return indexedKey(this.group, this.index, field);
  }
}
