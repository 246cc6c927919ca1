import { ByteReader, ByteWriter } from '../slp-reader';
import { captureError } from './fixtures';

describe('ByteReader', () => {
  it('should read big-endian integers', () => {
    const reader = new ByteReader(Uint8Array.of(0x01, 0x02, 0xff, 0xfe, 0x80, 0x00, 0x00, 0x01));

    expect(reader.readU16()).toBe(258);
    expect(reader.readI16()).toBe(-2);
    expect(reader.readI32()).toBe(-2147483647);
    expect(reader.hasMore()).toBe(false);
  });

  it('should read five-byte flags as one number', () => {
    const reader = new ByteReader(Uint8Array.of(0x01, 0x00, 0x00, 0x00, 0x02));
    expect(reader.readU40()).toBe(4294967298);
  });

  it('should report absolute offsets from its base', () => {
    const reader = new ByteReader(Uint8Array.of(1, 2, 3), 100);
    reader.readU8();

    expect(reader.getPosition()).toBe(1);
    expect(reader.absolutePosition).toBe(101);
    expect(reader.remaining()).toBe(2);
  });

  it('should throw TruncatedStream when reading past the end', () => {
    const reader = new ByteReader(Uint8Array.of(1, 2), 100);
    reader.readU8();

    const err = captureError(() => reader.readU32());
    expect(err.code).toBe('TruncatedStream');
    expect(err.context.offset).toBe(101);
    // position is unchanged by a failed read
    expect(reader.getPosition()).toBe(1);
  });

  it('should return views from readBytes', () => {
    const bytes = Uint8Array.of(9, 8, 7, 6);
    const reader = new ByteReader(bytes);
    reader.readU8();

    const slice = reader.readBytes(2);
    expect(Array.from(slice)).toEqual([8, 7]);
    expect(slice.buffer).toBe(bytes.buffer);
  });
});

describe('ByteWriter', () => {
  it('should write big-endian values in order', () => {
    const writer = new ByteWriter();
    writer.writeU16(0x1234);
    writer.writeI8(-1);
    writer.writeF32(1.5);

    expect(writer.length).toBe(7);
    expect(Array.from(writer.toBytes())).toEqual([0x12, 0x34, 0xff, 0x3f, 0xc0, 0x00, 0x00]);
  });

  it('should read back what it wrote', () => {
    const writer = new ByteWriter();
    writer.writeI32(-123);
    writer.writeU32(0xdeadbeef);
    writer.writeF64(0.1);
    writer.writeI64(BigInt(-5));

    const reader = new ByteReader(writer.toBytes());
    expect(reader.readI32()).toBe(-123);
    expect(reader.readU32()).toBe(0xdeadbeef);
    expect(reader.readF64()).toBe(0.1);
    expect(reader.readI64()).toBe(BigInt(-5));
  });
});
