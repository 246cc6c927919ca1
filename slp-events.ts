// slp-events.ts - Event codes, decoded event variants and their codecs

import { ByteReader, ByteWriter } from './slp-reader';
import { SlpError, hex } from './slp-errors';
import {
  PORT_HEADER_LAYOUT,
  FRAME_HEADER_LAYOUT,
  START_LAYOUT,
  PLAYER_LAYOUT,
  PRE_LAYOUT,
  POST_LAYOUT,
  ITEM_LAYOUT,
  FRAME_START_LAYOUT,
  FRAME_END_LAYOUT,
  END_LAYOUT,
  V2_2,
  V3_0,
  atLeast,
  formatVersion,
  requiredLength,
  decodeStruct,
  encodeStruct,
  writeField,
} from './slp-layout';
import type { FormatVersion, Layout, StructOf } from './slp-layout';

/**
 * Event Codes
 */
enum EventCode {
  MessageSplitter = 0x10,
  EventPayloads = 0x35,
  GameStart = 0x36,
  PreFrame = 0x37,
  PostFrame = 0x38,
  GameEnd = 0x39,
  FrameStart = 0x3a,
  Item = 0x3b,
  FrameBookend = 0x3c,
  GeckoList = 0x3d,
}

/** Player type byte of an empty slot. */
const PLAYER_TYPE_EMPTY = 3;

const PLAYER_SLOTS = 4;

type GameFields = StructOf<typeof START_LAYOUT>;
type PlayerFields = StructOf<typeof PLAYER_LAYOUT>;
type Player = PlayerFields & { readonly port: number };
type PreFrame = StructOf<typeof PRE_LAYOUT>;
type PostFrame = StructOf<typeof POST_LAYOUT>;
type ItemState = StructOf<typeof ITEM_LAYOUT>;
type FrameStartState = StructOf<typeof FRAME_START_LAYOUT>;
type FrameEndState = StructOf<typeof FRAME_END_LAYOUT>;
type EndFields = StructOf<typeof END_LAYOUT>;

interface GameStart {
  readonly version: FormatVersion;
  readonly game: GameFields;
  /** Active slots only, ascending by port (1-4). */
  readonly players: readonly Player[];
  /** Payload bytes after the command byte, as recorded. */
  readonly raw: Uint8Array;
}

interface GameEnd {
  readonly fields: EndFields;
  readonly raw: Uint8Array;
}

type DecodedEvent =
  | { readonly kind: 'start'; readonly start: GameStart }
  | { readonly kind: 'pre'; readonly frame: number; readonly port: number; readonly isFollower: boolean; readonly state: PreFrame }
  | { readonly kind: 'post'; readonly frame: number; readonly port: number; readonly isFollower: boolean; readonly state: PostFrame }
  | { readonly kind: 'item'; readonly frame: number; readonly state: ItemState }
  | { readonly kind: 'frameStart'; readonly frame: number; readonly state: FrameStartState }
  | { readonly kind: 'frameEnd'; readonly frame: number; readonly state: FrameEndState }
  | { readonly kind: 'end'; readonly end: GameEnd };

type EventKind = DecodedEvent['kind'];

interface EventDecoder {
  /** Version that introduced the event. */
  readonly since?: FormatVersion;
  /** Smallest event length for a version, command byte included. */
  minLength(version: FormatVersion): number;
  decode(view: DataView, bytes: Uint8Array, version: FormatVersion): DecodedEvent;
}

function lengthOf(layouts: Layout[], slots: number = 1): (version: FormatVersion) => number {
  return version => Math.max(...layouts.map(layout => requiredLength(layout, version, slots)));
}

const startLength = (version: FormatVersion): number =>
  Math.max(5, requiredLength(START_LAYOUT, version), requiredLength(PLAYER_LAYOUT, version, PLAYER_SLOTS));

function readStartVersion(bytes: Uint8Array): FormatVersion {
  if (bytes.length < 5) {
    throw new SlpError('MalformedEvent', `start event is ${bytes.length} byte(s), too short for a version`, {
      eventCode: EventCode.GameStart,
    });
  }
  return [bytes[1], bytes[2], bytes[3]];
}

function portOf(view: DataView, version: FormatVersion): { frame: number; port: number; isFollower: boolean } {
  const header = decodeStruct(PORT_HEADER_LAYOUT, view, version);
  if (header.port >= PLAYER_SLOTS) {
    throw new SlpError('MalformedEvent', `port index ${header.port} out of range`, {
      eventCode: view.getUint8(0),
      frame: header.frame,
    });
  }
  return { frame: header.frame, port: header.port + 1, isFollower: header.isFollower };
}

function decodeStart(view: DataView, bytes: Uint8Array, version: FormatVersion): DecodedEvent {
  const players: Player[] = [];
  for (let slot = 0; slot < PLAYER_SLOTS; slot++) {
    const fields = decodeStruct(PLAYER_LAYOUT, view, version, slot);
    if (fields.type !== PLAYER_TYPE_EMPTY) {
      players.push(Object.freeze({ port: slot + 1, ...fields }));
    }
  }
  const start: GameStart = Object.freeze({
    version,
    game: decodeStruct(START_LAYOUT, view, version),
    players: Object.freeze(players),
    raw: bytes.slice(1),
  });
  return { kind: 'start', start };
}

/**
 * One decoder per event code. Codes listed in the payload table but absent
 * here are skipped by the stream reader.
 */
const EVENT_DECODERS: ReadonlyMap<number, EventDecoder> = new Map<number, EventDecoder>([
  [EventCode.GameStart, { minLength: startLength, decode: decodeStart }],
  [
    EventCode.PreFrame,
    {
      minLength: lengthOf([PORT_HEADER_LAYOUT, PRE_LAYOUT]),
      decode: (view, _bytes, version) => ({
        kind: 'pre',
        ...portOf(view, version),
        state: decodeStruct(PRE_LAYOUT, view, version),
      }),
    },
  ],
  [
    EventCode.PostFrame,
    {
      minLength: lengthOf([PORT_HEADER_LAYOUT, POST_LAYOUT]),
      decode: (view, _bytes, version) => ({
        kind: 'post',
        ...portOf(view, version),
        state: decodeStruct(POST_LAYOUT, view, version),
      }),
    },
  ],
  [
    EventCode.Item,
    {
      since: V3_0,
      minLength: lengthOf([FRAME_HEADER_LAYOUT, ITEM_LAYOUT]),
      decode: (view, _bytes, version) => ({
        kind: 'item',
        frame: decodeStruct(FRAME_HEADER_LAYOUT, view, version).frame,
        state: decodeStruct(ITEM_LAYOUT, view, version),
      }),
    },
  ],
  [
    EventCode.FrameStart,
    {
      since: V2_2,
      minLength: lengthOf([FRAME_HEADER_LAYOUT, FRAME_START_LAYOUT]),
      decode: (view, _bytes, version) => ({
        kind: 'frameStart',
        frame: decodeStruct(FRAME_HEADER_LAYOUT, view, version).frame,
        state: decodeStruct(FRAME_START_LAYOUT, view, version),
      }),
    },
  ],
  [
    EventCode.FrameBookend,
    {
      since: V3_0,
      minLength: lengthOf([FRAME_HEADER_LAYOUT, FRAME_END_LAYOUT]),
      decode: (view, _bytes, version) => ({
        kind: 'frameEnd',
        frame: decodeStruct(FRAME_HEADER_LAYOUT, view, version).frame,
        state: decodeStruct(FRAME_END_LAYOUT, view, version),
      }),
    },
  ],
  [
    EventCode.GameEnd,
    {
      minLength: lengthOf([END_LAYOUT]),
      decode: (view, bytes, version) => ({
        kind: 'end',
        end: Object.freeze({ fields: decodeStruct(END_LAYOUT, view, version), raw: bytes.slice(1) }),
      }),
    },
  ],
]);

function hasDecoder(code: number): boolean {
  return EVENT_DECODERS.has(code);
}

/**
 * Decodes one event. `bytes` starts at the command byte. The Start event
 * carries its own version, so `version` is ignored for it. `offset` only
 * feeds error context.
 */
function decodeEvent(code: number, bytes: Uint8Array, version: FormatVersion, offset?: number): DecodedEvent {
  const decoder = EVENT_DECODERS.get(code);
  if (!decoder) {
    throw new SlpError('UnknownEventCode', 'no decoder for event', { offset, eventCode: code });
  }
  const eventVersion = code === EventCode.GameStart ? readStartVersion(bytes) : version;
  const need = decoder.minLength(eventVersion);
  if (bytes.length < need) {
    throw new SlpError(
      'MalformedEvent',
      `payload is ${bytes.length - 1} byte(s), version ${formatVersion(eventVersion)} needs ${need - 1}`,
      { offset, eventCode: code }
    );
  }
  return decoder.decode(new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength), bytes, eventVersion);
}

// ============================================================================
// Encoding
// ============================================================================

function codeOf(kind: EventKind): EventCode {
  switch (kind) {
    case 'start':
      return EventCode.GameStart;
    case 'pre':
      return EventCode.PreFrame;
    case 'post':
      return EventCode.PostFrame;
    case 'item':
      return EventCode.Item;
    case 'frameStart':
      return EventCode.FrameStart;
    case 'frameEnd':
      return EventCode.FrameBookend;
    case 'end':
      return EventCode.GameEnd;
  }
}

/**
 * Event length (command byte included) the encoder writes for a version.
 */
function eventLength(code: number, version: FormatVersion): number {
  const decoder = EVENT_DECODERS.get(code);
  if (!decoder) {
    throw new SlpError('UnknownEventCode', 'no encoder for event', { eventCode: code });
  }
  return decoder.minLength(version);
}

/**
 * Payload sizes (command byte excluded) for every event a version can carry.
 */
function eventPayloadSizes(version: FormatVersion): Map<number, number> {
  const sizes = new Map<number, number>();
  for (const [code, decoder] of EVENT_DECODERS) {
    if (atLeast(version, decoder.since)) {
      sizes.set(code, decoder.minLength(version) - 1);
    }
  }
  return sizes;
}

function encodeStart(start: GameStart, bytes: Uint8Array, view: DataView): void {
  const version = start.version;
  bytes.set(version, 1);
  encodeStruct(START_LAYOUT, start.game, view, version);
  for (let slot = 0; slot < PLAYER_SLOTS; slot++) {
    const player = start.players.find(p => p.port === slot + 1);
    if (player) {
      encodeStruct(PLAYER_LAYOUT, player, view, version, slot);
    } else {
      writeField(view, PLAYER_LAYOUT.type, slot, PLAYER_TYPE_EMPTY);
    }
  }
}

/**
 * Encodes one event at a version, command byte included. Fields newer than
 * the version are not written.
 */
function encodeEvent(event: DecodedEvent, version: FormatVersion): Uint8Array {
  const code = codeOf(event.kind);
  const eventVersion = event.kind === 'start' ? event.start.version : version;
  const bytes = new Uint8Array(eventLength(code, eventVersion));
  const view = new DataView(bytes.buffer);
  bytes[0] = code;

  switch (event.kind) {
    case 'start':
      encodeStart(event.start, bytes, view);
      break;
    case 'pre':
    case 'post':
      encodeStruct(
        PORT_HEADER_LAYOUT,
        { frame: event.frame, port: event.port - 1, isFollower: event.isFollower },
        view,
        version
      );
      if (event.kind === 'pre') {
        encodeStruct(PRE_LAYOUT, event.state, view, version);
      } else {
        encodeStruct(POST_LAYOUT, event.state, view, version);
      }
      break;
    case 'item':
      encodeStruct(FRAME_HEADER_LAYOUT, { frame: event.frame }, view, version);
      encodeStruct(ITEM_LAYOUT, event.state, view, version);
      break;
    case 'frameStart':
      encodeStruct(FRAME_HEADER_LAYOUT, { frame: event.frame }, view, version);
      encodeStruct(FRAME_START_LAYOUT, event.state, view, version);
      break;
    case 'frameEnd':
      encodeStruct(FRAME_HEADER_LAYOUT, { frame: event.frame }, view, version);
      encodeStruct(FRAME_END_LAYOUT, event.state, view, version);
      break;
    case 'end':
      encodeStruct(END_LAYOUT, event.end.fields, view, version);
      break;
  }
  return bytes;
}

// ============================================================================
// Event Payloads (0x35)
// ============================================================================

/**
 * Reads the payload size table. The reader sits on the 0x35 command byte.
 */
function readPayloadSizes(reader: ByteReader): Map<number, number> {
  const at = reader.absolutePosition;
  const code = reader.readU8();
  if (code !== EventCode.EventPayloads) {
    throw new SlpError('MalformedHeader', `stream must open with event payloads, got ${hex(code)}`, {
      offset: at,
      eventCode: code,
    });
  }
  const size = reader.readU8();
  if (size < 1 || (size - 1) % 3 !== 0) {
    throw new SlpError('MalformedHeader', `event payloads size ${size} is not 1 + 3n`, { offset: at });
  }
  const sizes = new Map<number, number>([[EventCode.EventPayloads, size]]);
  for (let i = 0; i < (size - 1) / 3; i++) {
    const eventCode = reader.readU8();
    sizes.set(eventCode, reader.readU16());
  }
  return sizes;
}

function writePayloadSizes(writer: ByteWriter, sizes: ReadonlyMap<number, number>): void {
  const entries = [...sizes].filter(([code]) => code !== EventCode.EventPayloads).sort((a, b) => a[0] - b[0]);
  writer.writeU8(EventCode.EventPayloads);
  writer.writeU8(1 + entries.length * 3);
  for (const [code, size] of entries) {
    writer.writeU8(code);
    writer.writeU16(size);
  }
}

export {
  EventCode,
  PLAYER_SLOTS,
  hasDecoder,
  decodeEvent,
  encodeEvent,
  eventLength,
  eventPayloadSizes,
  readPayloadSizes,
  writePayloadSizes,
};

export type {
  GameFields,
  PlayerFields,
  Player,
  PreFrame,
  PostFrame,
  ItemState,
  FrameStartState,
  FrameEndState,
  EndFields,
  GameStart,
  GameEnd,
  DecodedEvent,
  EventKind,
};
