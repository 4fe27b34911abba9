import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../errors.js';
import { WireReadError, WireReader, WireWriter } from './wire-stream.js';

describe('wire stream', () => {
  it('reads back values in write order', () => {
    const writer = new WireWriter()
      .writeInt32(-42)
      .writeFloat32(0.5)
      .writeFloat64(0.1)
      .writeBool(true)
      .writeString('Sérvice truck')
      .writeString('');

    const reader = new WireReader(writer.toBytes());

    expect(reader.readInt32()).toBe(-42);
    expect(reader.readFloat32()).toBe(0.5);
    expect(reader.readFloat64()).toBe(0.1);
    expect(reader.readBool()).toBe(true);
    expect(reader.readString()).toBe('Sérvice truck');
    expect(reader.readString()).toBe('');
    expect(reader.remaining).toBe(0);
  });

  it('length-prefixes strings with their UTF-8 byte count', () => {
    const bytes = new WireWriter().writeString('é').toBytes();

    expect(Array.from(bytes)).toEqual([2, 0, 0, 0, 0xc3, 0xa9]);
  });

  it('grows past the initial capacity', () => {
    const writer = new WireWriter({ initialCapacity: 16 });
    for (let index = 0; index < 100; index += 1) {
      writer.writeInt32(index);
    }

    expect(writer.byteLength).toBe(400);
    const reader = new WireReader(writer.toBytes());
    reader.readInt32();
    expect(reader.readInt32()).toBe(1);
  });

  it('rejects values outside int32', () => {
    expect(() => new WireWriter().writeInt32(2 ** 31)).toThrow(ConfigurationError);
    expect(() => new WireWriter().writeInt32(1.5)).toThrow(ConfigurationError);
  });

  it('fails on truncated input', () => {
    const bytes = new WireWriter().writeString('truncated').toBytes().subarray(0, 6);

    expect(() => new WireReader(bytes).readString()).toThrow(WireReadError);
  });
});
