// slp-columnar.ts - Frame and item tables as Arrow IPC, plus JSON side files

import {
  Table,
  Vector,
  vectorFromArray,
  tableToIPC,
  tableFromIPC,
  Bool,
  Int8,
  Int16,
  Int32,
  Uint8,
  Uint16,
  Uint32,
  Uint64,
  Float32,
  Utf8,
} from 'apache-arrow';
import {
  PRE_LAYOUT,
  POST_LAYOUT,
  ITEM_LAYOUT,
  FRAME_START_LAYOUT,
  FRAME_END_LAYOUT,
  V2_2,
  V3_0,
  V0_1,
  atLeast,
  formatVersion,
  presentFields,
  buildStruct,
} from './slp-layout';
import type { FieldValue, FormatVersion, Layout, PrimitiveType, StructOf } from './slp-layout';
import { SlpError } from './slp-errors';
import { renderJson } from './slp-json';
import { startNode, endNode, metadataNode } from './slp-query';
import { ReplayBuilder } from './slp-builder';
import type { Replay, Frame, FrameData } from './slp-builder';
import { EventCode, decodeEvent } from './slp-events';
import type { DecodedEvent, ItemState } from './slp-events';
import type { ArchiveWriter } from './slp-archive';

type Row = Readonly<Record<string, FieldValue>>;

/**
 * One output column: its name, its primitive type and how to read its value
 * from a row. The plan is fixed before any value is read.
 */
interface ColumnPlan<T> {
  readonly name: string;
  readonly type: PrimitiveType;
  read(row: T): FieldValue;
}

type Slot = 'leader' | 'follower';

const encoder = new TextEncoder();

function layoutColumns<T>(
  prefix: string,
  layout: Layout,
  replay: Replay,
  select: (row: T) => Row | null
): ColumnPlan<T>[] {
  return presentFields(layout, replay.version).map(([field, spec]) => ({
    name: `${prefix}${field}`,
    type: spec.type,
    read: (row: T) => select(row)?.[field] ?? null,
  }));
}

function slotData(frame: Frame, port: number, slot: Slot): FrameData | null {
  const entry = frame.ports.find(p => p.port === port);
  if (entry === undefined) return null;
  return slot === 'leader' ? entry.leader : entry.follower;
}

/**
 * Frame table columns: `frame`, frame start and bookend fields, then for each
 * active port (ascending) leader then follower, pre then post fields. A
 * follower slot is planned only when it appears on some frame.
 */
function planFrameColumns(replay: Replay): ColumnPlan<Frame>[] {
  const version = replay.version;
  const columns: ColumnPlan<Frame>[] = [{ name: 'frame', type: 'i32', read: frame => frame.index }];

  if (atLeast(version, V2_2)) {
    columns.push(...layoutColumns<Frame>('start.', FRAME_START_LAYOUT, replay, frame => frame.start));
  }
  if (atLeast(version, V3_0)) {
    columns.push(...layoutColumns<Frame>('end.', FRAME_END_LAYOUT, replay, frame => frame.end));
  }

  for (const { port } of replay.start.players) {
    const slots: Slot[] = ['leader'];
    if (replay.frames.some(frame => slotData(frame, port, 'follower') !== null)) {
      slots.push('follower');
    }
    for (const slot of slots) {
      const prefix = `p${port}.${slot}`;
      columns.push(
        ...layoutColumns<Frame>(`${prefix}.pre.`, PRE_LAYOUT, replay, frame => slotData(frame, port, slot)?.pre ?? null),
        ...layoutColumns<Frame>(`${prefix}.post.`, POST_LAYOUT, replay, frame => slotData(frame, port, slot)?.post ?? null)
      );
    }
  }
  return columns;
}

interface ItemRow {
  readonly frame: number;
  readonly item: ItemState;
}

function planItemColumns(replay: Replay): ColumnPlan<ItemRow>[] {
  return [
    { name: 'frame', type: 'i32', read: row => row.frame },
    ...layoutColumns<ItemRow>('', ITEM_LAYOUT, replay, row => row.item),
  ];
}

const numbers = (values: readonly FieldValue[]): (number | null)[] =>
  values.map(value => (typeof value === 'number' ? value : null));

function toVector(type: PrimitiveType, values: readonly FieldValue[]): Vector {
  switch (type) {
    case 'u8':
      return vectorFromArray(numbers(values), new Uint8());
    case 'i8':
      return vectorFromArray(numbers(values), new Int8());
    case 'u16':
      return vectorFromArray(numbers(values), new Uint16());
    case 'i16':
      return vectorFromArray(numbers(values), new Int16());
    case 'u32':
      return vectorFromArray(numbers(values), new Uint32());
    case 'i32':
      return vectorFromArray(numbers(values), new Int32());
    case 'f32':
      return vectorFromArray(numbers(values), new Float32());
    case 'flags40':
      return vectorFromArray(
        values.map(value => (typeof value === 'number' ? BigInt(value) : null)),
        new Uint64()
      );
    case 'bool':
      return vectorFromArray(
        values.map(value => (typeof value === 'boolean' ? value : null)),
        new Bool()
      );
    case 'sjis':
      return vectorFromArray(
        values.map(value => (typeof value === 'string' ? value : null)),
        new Utf8()
      );
  }
}

/**
 * Transposes rows into columns. Each column array is sized from the row
 * count up front and filled in plan order.
 */
function buildTable<T>(plan: readonly ColumnPlan<T>[], rows: readonly T[]): Table {
  const vectors: Record<string, Vector> = {};
  for (const column of plan) {
    const values = new Array<FieldValue>(rows.length);
    for (let i = 0; i < rows.length; i++) {
      values[i] = column.read(rows[i]);
    }
    vectors[column.name] = toVector(column.type, values);
  }
  return new Table(vectors);
}

function frameTable(replay: Replay): Table {
  return buildTable(planFrameColumns(replay), replay.frames);
}

function itemTable(replay: Replay): Table {
  const rows: ItemRow[] = [];
  for (const frame of replay.frames) {
    for (const item of frame.items) {
      rows.push({ frame: frame.index, item });
    }
  }
  return buildTable(planItemColumns(replay), rows);
}

const jsonBlob = (text: string): Uint8Array => encoder.encode(text);

/**
 * Every blob of the columnar layout, in the order they are written.
 * Identical replays give byte-identical blobs.
 */
function columnarBlobs(replay: Replay): Array<[string, Uint8Array]> {
  const frames = frameTable(replay);
  const items = itemTable(replay);
  const names = ['manifest.json', 'start.json', 'start.raw'];
  if (replay.end !== null) {
    names.push('end.json', 'end.raw');
  }
  names.push('metadata.json', 'frames.arrow', 'items.arrow');

  const manifest = {
    version: formatVersion(replay.version),
    partial: replay.partial,
    frames: frames.numRows,
    items: items.numRows,
    blobs: names,
  };

  const blobs: Array<[string, Uint8Array]> = [
    ['manifest.json', jsonBlob(JSON.stringify(manifest))],
    ['start.json', jsonBlob(renderJson(startNode(replay.start)))],
    ['start.raw', replay.start.raw],
  ];
  if (replay.end !== null) {
    blobs.push(['end.json', jsonBlob(renderJson(endNode(replay.end)))], ['end.raw', replay.end.raw]);
  }
  blobs.push(
    ['metadata.json', jsonBlob(renderJson(metadataNode(replay.metadata)))],
    ['frames.arrow', tableToIPC(frames, 'file')],
    ['items.arrow', tableToIPC(items, 'file')]
  );
  return blobs;
}

/**
 * Hands every columnar blob to the archive writer and finalizes it.
 */
async function encodeColumnar(replay: Replay, archive: ArchiveWriter): Promise<void> {
  for (const [name, bytes] of columnarBlobs(replay)) {
    archive.addBlob(name, bytes);
  }
  await archive.finalize();
}

// ============================================================================
// Reading
// ============================================================================

function requireBlob(blobs: ReadonlyMap<string, Uint8Array>, name: string): Uint8Array {
  const bytes = blobs.get(name);
  if (bytes === undefined) {
    throw new SlpError('MalformedHeader', `columnar archive has no '${name}'`);
  }
  return bytes;
}

function cell(table: Table, name: string, row: number): FieldValue {
  const column = table.getChild(name);
  if (column === null) {
    throw new SlpError('MalformedHeader', `columnar table has no column '${name}'`);
  }
  const value: unknown = column.get(row);
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  return null;
}

/**
 * Rebuilds one struct from its prefixed columns; `null` when every column
 * of the row is missing. A layout with no columns at this version (bookends
 * before 3.7) has nothing to mark it missing, so it reads as present.
 */
function readRow<L extends Layout>(
  table: Table,
  prefix: string,
  layout: L,
  replayVersion: FormatVersion,
  row: number
): StructOf<L> | null {
  const fields = presentFields(layout, replayVersion);
  if (fields.length > 0 && fields.every(([field]) => cell(table, `${prefix}${field}`, row) === null)) {
    return null;
  }
  return buildStruct(layout, replayVersion, name => cell(table, `${prefix}${name}`, row));
}

function withCommand(code: EventCode, raw: Uint8Array): Uint8Array {
  const bytes = new Uint8Array(raw.byteLength + 1);
  bytes[0] = code;
  bytes.set(raw, 1);
  return bytes;
}

function manifestPartial(bytes: Uint8Array): boolean {
  const manifest: unknown = JSON.parse(new TextDecoder().decode(bytes));
  if (typeof manifest !== 'object' || manifest === null || !('partial' in manifest)) {
    throw new SlpError('MalformedHeader', 'columnar manifest has no partial flag');
  }
  return manifest.partial === true;
}

/**
 * Reads the blobs of `columnarBlobs` back into a Replay. Frames, items and
 * the start and end events come back as written; the side-channel metadata
 * is not part of the layout, so the Replay has none.
 */
function readColumnar(blobs: ReadonlyMap<string, Uint8Array>): Replay {
  const startEvent = decodeEvent(EventCode.GameStart, withCommand(EventCode.GameStart, requireBlob(blobs, 'start.raw')), V0_1);
  if (startEvent.kind !== 'start') {
    throw new SlpError('InvariantViolation', 'start payload did not decode to a start event');
  }
  const start = startEvent.start;
  const version = start.version;
  const frames = tableFromIPC(requireBlob(blobs, 'frames.arrow'));
  const items = tableFromIPC(requireBlob(blobs, 'items.arrow'));

  const itemsByFrame = new Map<number, ItemState[]>();
  for (let row = 0; row < items.numRows; row++) {
    const index = cell(items, 'frame', row);
    const item = readRow(items, '', ITEM_LAYOUT, version, row);
    if (typeof index !== 'number' || item === null) {
      throw new SlpError('InvariantViolation', `item row ${row} is incomplete`);
    }
    const list = itemsByFrame.get(index) ?? [];
    list.push(item);
    itemsByFrame.set(index, list);
  }

  const columns = new Set(frames.schema.fields.map(field => field.name));
  const slots = start.players.map(({ port }) => ({
    port,
    follower: [...columns].some(name => name.startsWith(`p${port}.follower.`)),
  }));

  const builder = new ReplayBuilder();
  builder.apply(startEvent);

  for (let row = 0; row < frames.numRows; row++) {
    const frame = cell(frames, 'frame', row);
    if (typeof frame !== 'number') {
      throw new SlpError('InvariantViolation', `frame row ${row} has no index`);
    }
    const events: DecodedEvent[] = [];
    const posts: DecodedEvent[] = [];

    if (atLeast(version, V2_2)) {
      const state = readRow(frames, 'start.', FRAME_START_LAYOUT, version, row);
      if (state !== null) events.push({ kind: 'frameStart', frame, state });
    }
    for (const { port, follower } of slots) {
      for (const isFollower of follower ? [false, true] : [false]) {
        const prefix = `p${port}.${isFollower ? 'follower' : 'leader'}`;
        const pre = readRow(frames, `${prefix}.pre.`, PRE_LAYOUT, version, row);
        if (pre !== null) events.push({ kind: 'pre', frame, port, isFollower, state: pre });
        const post = readRow(frames, `${prefix}.post.`, POST_LAYOUT, version, row);
        if (post !== null) posts.push({ kind: 'post', frame, port, isFollower, state: post });
      }
    }
    for (const state of itemsByFrame.get(frame) ?? []) {
      events.push({ kind: 'item', frame, state });
    }
    events.push(...posts);
    if (atLeast(version, V3_0)) {
      const state = readRow(frames, 'end.', FRAME_END_LAYOUT, version, row);
      if (state !== null) events.push({ kind: 'frameEnd', frame, state });
    }

    for (const event of events) {
      builder.apply(event);
    }
  }

  const endRaw = blobs.get('end.raw');
  if (endRaw !== undefined) {
    builder.apply(decodeEvent(EventCode.GameEnd, withCommand(EventCode.GameEnd, endRaw), version));
  }

  return builder.finish({ partial: manifestPartial(requireBlob(blobs, 'manifest.json')) });
}

export {
  planFrameColumns,
  planItemColumns,
  frameTable,
  itemTable,
  columnarBlobs,
  encodeColumnar,
  readColumnar,
};

export type { ColumnPlan, ItemRow };
