import { ConfigurationError } from '../errors.js';

const INITIAL_CAPACITY = 256;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

export interface WireWriterOptions {
  readonly initialCapacity?: number;
}

/**
 * Append-only little-endian encoder over a growable buffer. The transport
 * that ships the bytes is the host's concern.
 */
export class WireWriter {
  private buffer: ArrayBuffer;
  private view: DataView;
  private offset = 0;

  constructor(options: WireWriterOptions = {}) {
    const capacity = Math.max(16, Math.floor(options.initialCapacity ?? INITIAL_CAPACITY));
    this.buffer = new ArrayBuffer(capacity);
    this.view = new DataView(this.buffer);
  }

  get byteLength(): number {
    return this.offset;
  }

  writeInt32(value: number): this {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
      throw new ConfigurationError(`Value ${value} does not fit in an int32.`);
    }
    this.ensureCapacity(4);
    this.view.setInt32(this.offset, value, true);
    this.offset += 4;
    return this;
  }

  writeFloat32(value: number): this {
    this.ensureCapacity(4);
    this.view.setFloat32(this.offset, value, true);
    this.offset += 4;
    return this;
  }

  writeFloat64(value: number): this {
    this.ensureCapacity(8);
    this.view.setFloat64(this.offset, value, true);
    this.offset += 8;
    return this;
  }

  writeBool(value: boolean): this {
    this.ensureCapacity(1);
    this.view.setUint8(this.offset, value ? 1 : 0);
    this.offset += 1;
    return this;
  }

  writeString(value: string): this {
    const bytes = textEncoder.encode(value);
    this.writeInt32(bytes.byteLength);
    this.ensureCapacity(bytes.byteLength);
    new Uint8Array(this.buffer, this.offset, bytes.byteLength).set(bytes);
    this.offset += bytes.byteLength;
    return this;
  }

  /**
   * Copy of the bytes written so far.
   */
  toBytes(): Uint8Array {
    return new Uint8Array(this.buffer.slice(0, this.offset));
  }

  private ensureCapacity(additional: number): void {
    const required = this.offset + additional;
    if (required <= this.buffer.byteLength) {
      return;
    }
    let capacity = this.buffer.byteLength * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const next = new ArrayBuffer(capacity);
    new Uint8Array(next).set(new Uint8Array(this.buffer, 0, this.offset));
    this.buffer = next;
    this.view = new DataView(next);
  }
}

export class WireReadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WireReadError';
  }
}

export class WireReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  readInt32(): number {
    this.require(4);
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readFloat32(): number {
    this.require(4);
    const value = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readFloat64(): number {
    this.require(8);
    const value = this.view.getFloat64(this.offset, true);
    this.offset += 8;
    return value;
  }

  readBool(): boolean {
    this.require(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value !== 0;
  }

  readString(): string {
    const length = this.readInt32();
    if (length < 0) {
      throw new WireReadError(`Negative string length ${length}.`);
    }
    this.require(length);
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return textDecoder.decode(slice);
  }

  private require(byteCount: number): void {
    if (this.remaining < byteCount) {
      throw new WireReadError(
        `Unexpected end of stream: needed ${byteCount} bytes at offset ${this.offset}, ${this.remaining} remaining.`,
      );
    }
  }
}
