// slp-ubjson.ts - UBJSON container around the raw event stream

import { ByteReader, ByteWriter } from './slp-reader';
import { SlpError } from './slp-errors';

type UbjsonValue =
  | null
  | boolean
  | number
  | string
  | UbjsonValue[]
  | { [key: string]: UbjsonValue };

type UbjsonObject = { [key: string]: UbjsonValue };

/**
 * `{U\x03raw[$U#l`: an object whose first key is `raw`, holding an optimized
 * uint8 array with an int32 count.
 */
const FILE_SIGNATURE = Uint8Array.of(0x7b, 0x55, 0x03, 0x72, 0x61, 0x77, 0x5b, 0x24, 0x55, 0x23, 0x6c);

const METADATA_KEY = 'metadata';

/** First event of every stream (Event Payloads). */
const BARE_STREAM_MARKER = 0x35;

interface TrailingMetadata {
  metadata: UbjsonObject | null;
  /** Why metadata could not be read, when the file has some but it is broken. */
  metadataError: string | null;
}

interface Container extends TrailingMetadata {
  raw: Uint8Array;
  /** Offset of `raw` within the file, for error context. */
  rawOffset: number;
  /**
   * The file declared no raw length, so `raw` runs to the end of the file and
   * metadata, if any, follows the end event inside it.
   */
  openEnded: boolean;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

function charCode(marker: string): number {
  return marker.charCodeAt(0);
}

// ============================================================================
// Decoding
// ============================================================================

class UbjsonReader {
  constructor(private reader: ByteReader) {}

  readValue(): UbjsonValue {
    let marker = this.reader.readU8();
    while (marker === charCode('N')) {
      marker = this.reader.readU8();
    }
    return this.readTyped(marker);
  }

  private readTyped(marker: number): UbjsonValue {
    switch (String.fromCharCode(marker)) {
      case 'Z':
        return null;
      case 'T':
        return true;
      case 'F':
        return false;
      case 'i':
      case 'U':
      case 'I':
      case 'l':
      case 'L':
        return this.readInteger(marker);
      case 'd':
        return this.reader.readF32();
      case 'D':
        return this.reader.readF64();
      case 'C':
        return String.fromCharCode(this.reader.readU8());
      case 'S':
      case 'H':
        return this.readString();
      case '[':
        return this.readArray();
      case '{':
        return this.readObject();
      default:
        throw new SlpError('MalformedHeader', `unsupported UBJSON marker '${String.fromCharCode(marker)}'`, {
          offset: this.reader.absolutePosition - 1,
        });
    }
  }

  private readInteger(marker: number): number {
    switch (String.fromCharCode(marker)) {
      case 'i':
        return this.reader.readI8();
      case 'U':
        return this.reader.readU8();
      case 'I':
        return this.reader.readI16();
      case 'l':
        return this.reader.readI32();
      case 'L':
        return Number(this.reader.readI64());
      default:
        throw new SlpError('MalformedHeader', `expected UBJSON integer, got '${String.fromCharCode(marker)}'`, {
          offset: this.reader.absolutePosition - 1,
        });
    }
  }

  private readLength(): number {
    const length = this.readInteger(this.reader.readU8());
    if (length < 0) {
      throw new SlpError('MalformedHeader', `negative UBJSON length ${length}`, {
        offset: this.reader.absolutePosition,
      });
    }
    return length;
  }

  private readString(): string {
    const length = this.readLength();
    return decoder.decode(this.reader.readBytes(length));
  }

  /** Optional `$type` then `#count`, shared by arrays and objects. */
  private readContainerHeader(): { type: number | null; count: number | null } {
    let type: number | null = null;
    let count: number | null = null;
    if (this.reader.peekU8() === charCode('$')) {
      this.reader.readU8();
      type = this.reader.readU8();
    }
    if (this.reader.peekU8() === charCode('#')) {
      this.reader.readU8();
      count = this.readLength();
    } else if (type !== null) {
      throw new SlpError('MalformedHeader', 'UBJSON typed container without a count', {
        offset: this.reader.absolutePosition,
      });
    }
    return { type, count };
  }

  private readArray(): UbjsonValue[] {
    const { type, count } = this.readContainerHeader();
    const items: UbjsonValue[] = [];
    if (count !== null) {
      for (let i = 0; i < count; i++) {
        items.push(type === null ? this.readValue() : this.readTyped(type));
      }
      return items;
    }
    while (this.reader.peekU8() !== charCode(']')) {
      items.push(this.readValue());
    }
    this.reader.readU8();
    return items;
  }

  private readObject(): UbjsonObject {
    const { type, count } = this.readContainerHeader();
    const object: UbjsonObject = {};
    if (count !== null) {
      for (let i = 0; i < count; i++) {
        const key = this.readString();
        object[key] = type === null ? this.readValue() : this.readTyped(type);
      }
      return object;
    }
    while (this.reader.peekU8() !== charCode('}')) {
      const key = this.readString();
      object[key] = this.readValue();
    }
    this.reader.readU8();
    return object;
  }
}

function decodeUbjson(bytes: Uint8Array, base: number = 0): UbjsonValue {
  return new UbjsonReader(new ByteReader(bytes, base)).readValue();
}

function isUbjsonObject(value: UbjsonValue | undefined): value is UbjsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (bytes.length < prefix.length) {
    return false;
  }
  return prefix.every((b, i) => bytes[i] === b);
}

/**
 * Reads the `metadata` entry that follows the raw stream, up to the closing
 * brace of the file object.
 */
function readTrailingMetadata(bytes: Uint8Array, base: number): TrailingMetadata {
  const rest = new ByteReader(bytes, base);
  if (!rest.hasMore() || rest.peekU8() === charCode('}')) {
    return { metadata: null, metadataError: null };
  }

  try {
    const keyReader = new UbjsonReader(rest);
    // keys carry no 'S' marker: a length, then the bytes
    const length = keyReader.readValue();
    if (length !== METADATA_KEY.length) {
      return { metadata: null, metadataError: `unexpected key after raw (length ${String(length)})` };
    }
    const key = decoder.decode(rest.readBytes(METADATA_KEY.length));
    if (key !== METADATA_KEY) {
      return { metadata: null, metadataError: `unexpected key '${key}' after raw` };
    }
    const metadata = keyReader.readValue();
    if (!isUbjsonObject(metadata)) {
      return { metadata: null, metadataError: 'metadata is not an object' };
    }
    return { metadata, metadataError: null };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { metadata: null, metadataError: message };
  }
}

/**
 * Separates the raw event stream from the side-channel metadata.
 *
 * A declared raw length of 0 means the file was still being written, so the
 * raw stream runs to the end of the file. A declared length past the end of
 * the file yields what is there; the event reader reports the truncation.
 */
function splitContainer(bytes: Uint8Array): Container {
  if (bytes.length > 0 && bytes[0] === BARE_STREAM_MARKER) {
    return { raw: bytes, rawOffset: 0, openEnded: false, metadata: null, metadataError: null };
  }

  if (!startsWith(bytes, FILE_SIGNATURE)) {
    throw new SlpError('MalformedHeader', 'missing replay file signature', { offset: 0 });
  }

  const header = new ByteReader(bytes);
  header.seek(FILE_SIGNATURE.length);
  const declared = header.readI32();
  const rawOffset = header.getPosition();

  if (declared < 0) {
    throw new SlpError('MalformedHeader', `negative raw length ${declared}`, { offset: FILE_SIGNATURE.length });
  }

  if (declared === 0 || rawOffset + declared > bytes.length) {
    return {
      raw: bytes.subarray(rawOffset),
      rawOffset,
      openEnded: declared === 0,
      metadata: null,
      metadataError: null,
    };
  }

  const end = rawOffset + declared;
  return {
    raw: bytes.subarray(rawOffset, end),
    rawOffset,
    openEnded: false,
    ...readTrailingMetadata(bytes.subarray(end), end),
  };
}

// ============================================================================
// Encoding
// ============================================================================

function writeInteger(writer: ByteWriter, value: number): void {
  if (value >= 0 && value <= 0xff) {
    writer.writeU8(charCode('U'));
    writer.writeU8(value);
  } else if (value >= -0x80 && value < 0x80) {
    writer.writeU8(charCode('i'));
    writer.writeI8(value);
  } else if (value >= -0x8000 && value < 0x8000) {
    writer.writeU8(charCode('I'));
    writer.writeI16(value);
  } else if (value >= -0x8000_0000 && value < 0x8000_0000) {
    writer.writeU8(charCode('l'));
    writer.writeI32(value);
  } else {
    writer.writeU8(charCode('L'));
    writer.writeI64(BigInt(value));
  }
}

function writeKey(writer: ByteWriter, key: string): void {
  const bytes = encoder.encode(key);
  writeInteger(writer, bytes.length);
  writer.writeBytes(bytes);
}

function writeValue(writer: ByteWriter, value: UbjsonValue): void {
  if (value === null) {
    writer.writeU8(charCode('Z'));
  } else if (typeof value === 'boolean') {
    writer.writeU8(charCode(value ? 'T' : 'F'));
  } else if (typeof value === 'number') {
    if (Number.isSafeInteger(value)) {
      writeInteger(writer, value);
    } else {
      writer.writeU8(charCode('D'));
      writer.writeF64(value);
    }
  } else if (typeof value === 'string') {
    writer.writeU8(charCode('S'));
    writeKey(writer, value);
  } else if (Array.isArray(value)) {
    writer.writeU8(charCode('['));
    for (const item of value) {
      writeValue(writer, item);
    }
    writer.writeU8(charCode(']'));
  } else {
    writer.writeU8(charCode('{'));
    for (const [key, item] of Object.entries(value)) {
      writeKey(writer, key);
      writeValue(writer, item);
    }
    writer.writeU8(charCode('}'));
  }
}

function encodeUbjson(value: UbjsonValue): Uint8Array {
  const writer = new ByteWriter();
  writeValue(writer, value);
  return writer.toBytes();
}

/**
 * Wraps a raw event stream and optional metadata into a replay file.
 */
function joinContainer(raw: Uint8Array, metadata: UbjsonObject | null): Uint8Array {
  const writer = new ByteWriter();
  writer.writeBytes(FILE_SIGNATURE);
  writer.writeI32(raw.length);
  writer.writeBytes(raw);
  if (metadata !== null) {
    writeKey(writer, METADATA_KEY);
    writeValue(writer, metadata);
  }
  writer.writeU8(charCode('}'));
  return writer.toBytes();
}

export {
  FILE_SIGNATURE,
  splitContainer,
  readTrailingMetadata,
  joinContainer,
  decodeUbjson,
  encodeUbjson,
  isUbjsonObject,
};

export type { UbjsonValue, UbjsonObject, Container, TrailingMetadata };
