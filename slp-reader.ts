// slp-reader.ts - Big-endian byte cursor and chunked writer

import { SlpError } from './slp-errors';

/**
 * Byte cursor over an in-memory buffer.
 *
 * All multi-byte reads are big-endian. Reading past the end raises
 * `TruncatedStream` carrying the offset where the read started.
 */
class ByteReader {
  private view: DataView;
  private bytes: Uint8Array;
  private offset: number = 0;

  constructor(bytes: Uint8Array, private readonly base: number = 0) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  /** Offset in the original input, for error context. */
  get absolutePosition(): number {
    return this.base + this.offset;
  }

  getPosition(): number {
    return this.offset;
  }

  seek(offset: number): void {
    this.offset = offset;
  }

  remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  hasMore(): boolean {
    return this.offset < this.bytes.byteLength;
  }

  private ensure(count: number): void {
    if (this.offset + count > this.bytes.byteLength) {
      throw new SlpError(
        'TruncatedStream',
        `needed ${count} byte(s), ${Math.max(0, this.remaining())} left`,
        { offset: this.absolutePosition }
      );
    }
  }

  peekU8(): number {
    this.ensure(1);
    return this.view.getUint8(this.offset);
  }

  readU8(): number {
    this.ensure(1);
    return this.view.getUint8(this.offset++);
  }

  readI8(): number {
    this.ensure(1);
    return this.view.getInt8(this.offset++);
  }

  readU16(): number {
    this.ensure(2);
    const value = this.view.getUint16(this.offset);
    this.offset += 2;
    return value;
  }

  readI16(): number {
    this.ensure(2);
    const value = this.view.getInt16(this.offset);
    this.offset += 2;
    return value;
  }

  readU32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  readI32(): number {
    this.ensure(4);
    const value = this.view.getInt32(this.offset);
    this.offset += 4;
    return value;
  }

  readI64(): bigint {
    this.ensure(8);
    const value = this.view.getBigInt64(this.offset);
    this.offset += 8;
    return value;
  }

  readF32(): number {
    this.ensure(4);
    const value = this.view.getFloat32(this.offset);
    this.offset += 4;
    return value;
  }

  readF64(): number {
    this.ensure(8);
    const value = this.view.getFloat64(this.offset);
    this.offset += 8;
    return value;
  }

  /** Five bytes read as one unsigned integer (fits a double exactly). */
  readU40(): number {
    this.ensure(5);
    const high = this.view.getUint8(this.offset);
    const low = this.view.getUint32(this.offset + 1);
    this.offset += 5;
    return high * 0x1_0000_0000 + low;
  }

  /** Returns a view, not a copy. */
  readBytes(count: number): Uint8Array {
    this.ensure(count);
    const slice = this.bytes.subarray(this.offset, this.offset + count);
    this.offset += count;
    return slice;
  }
}

/**
 * Growable big-endian writer; chunks are joined once in `toBytes()`.
 */
class ByteWriter {
  private chunks: Uint8Array[] = [];
  private size = 0;

  get length(): number {
    return this.size;
  }

  private push(chunk: Uint8Array): void {
    this.chunks.push(chunk);
    this.size += chunk.byteLength;
  }

  private scratch(count: number, write: (view: DataView) => void): void {
    const buf = new Uint8Array(count);
    write(new DataView(buf.buffer));
    this.push(buf);
  }

  writeU8(value: number): void {
    this.push(Uint8Array.of(value & 0xff));
  }

  writeI8(value: number): void {
    this.scratch(1, view => view.setInt8(0, value));
  }

  writeU16(value: number): void {
    this.scratch(2, view => view.setUint16(0, value));
  }

  writeI16(value: number): void {
    this.scratch(2, view => view.setInt16(0, value));
  }

  writeU32(value: number): void {
    this.scratch(4, view => view.setUint32(0, value));
  }

  writeI32(value: number): void {
    this.scratch(4, view => view.setInt32(0, value));
  }

  writeI64(value: bigint): void {
    this.scratch(8, view => view.setBigInt64(0, value));
  }

  writeF32(value: number): void {
    this.scratch(4, view => view.setFloat32(0, value));
  }

  writeF64(value: number): void {
    this.scratch(8, view => view.setFloat64(0, value));
  }

  writeBytes(bytes: Uint8Array): void {
    this.push(bytes);
  }

  toBytes(): Uint8Array {
    const result = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return result;
  }
}

export { ByteReader, ByteWriter };
