// Builds replay streams in memory for tests

import { ByteWriter } from '../slp-reader';
import { SlpError } from '../slp-errors';
import { joinContainer } from '../slp-ubjson';
import type { UbjsonObject } from '../slp-ubjson';
import {
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
  decodeStruct,
  writeField,
} from '../slp-layout';
import type { FieldSpec, FormatVersion, Layout, StructOf } from '../slp-layout';
import { encodeEvent, eventPayloadSizes, writePayloadSizes } from '../slp-events';
import type { DecodedEvent, GameStart, Player } from '../slp-events';
import { FIRST_FRAME_INDEX } from '../slp-builder';

type Values = Readonly<Record<string, number | boolean | string>>;

const DEFAULT_VERSION: FormatVersion = [3, 12, 0];

/**
 * A struct for `layout` as `version` would decode it: unspecified fields are
 * 0, false or '', fields newer than `version` are null, floats are f32.
 */
function makeStruct<L extends Layout>(layout: L, version: FormatVersion, values: Values = {}): StructOf<L> {
  let length = 1;
  for (const spec of Object.values<FieldSpec>(layout)) {
    length = Math.max(length, spec.offset + (spec.type === 'sjis' ? spec.size ?? 0 : 8));
  }
  const view = new DataView(new ArrayBuffer(length));
  for (const [name, spec] of Object.entries<FieldSpec>(layout)) {
    const value = values[name] ?? (spec.type === 'bool' ? false : spec.type === 'sjis' ? '' : 0);
    writeField(view, spec, 0, value);
  }
  return decodeStruct(layout, view, version);
}

function makePlayer(port: number, version: FormatVersion, values: Values = {}): Player {
  return { port, ...makeStruct(PLAYER_LAYOUT, version, { type: 0, stocks: 4, ...values }) };
}

function makeStart(version: FormatVersion = DEFAULT_VERSION, ports: number[] = [1, 2], values: Values = {}): GameStart {
  return {
    version,
    game: makeStruct(START_LAYOUT, version, { stage: 31, timer: 480, damageRatio: 1, randomSeed: 42, ...values }),
    players: ports.map(port => makePlayer(port, version, { character: port === 1 ? 2 : 9 })),
    raw: new Uint8Array(0),
  };
}

interface FixtureOptions {
  version?: FormatVersion;
  ports?: number[];
  frames?: number;
  /** Action state of a port's leader post-frame. */
  state?: (frame: number, port: number) => number;
  /** Internal character of a port's leader post-frame. */
  character?: (frame: number, port: number) => number;
  /** Whether a port's follower sends data on a frame. */
  follower?: (frame: number, port: number) => boolean;
  items?: (frame: number) => number;
  end?: boolean;
  metadata?: UbjsonObject | null;
}

interface Fixture {
  /** Bare event stream. */
  stream: Uint8Array;
  /** Stream offset of each frame's first event. */
  frameOffsets: number[];
  /** The stream wrapped in a replay file. */
  file: Uint8Array;
}

/**
 * Frame `i` (0-based) has index FIRST_FRAME_INDEX + i. Post-frame percent is
 * `i / 2`; pre-frame positionX is `i`.
 */
function buildFixture(options: FixtureOptions = {}): Fixture {
  const version = options.version ?? DEFAULT_VERSION;
  const ports = options.ports ?? [1, 2];
  const frameCount = options.frames ?? 10;
  const state = options.state ?? (() => 14);
  const character = options.character ?? ((_frame: number, port: number) => (port === 1 ? 0 : 1));
  const follower = options.follower ?? (() => false);
  const items = options.items ?? (() => 0);

  const start = makeStart(version, ports);
  const startBytes = encodeEvent({ kind: 'start', start }, version);
  const end = makeStruct(END_LAYOUT, version, { method: 2, lrasInitiator: -1 });

  const writer = new ByteWriter();
  const write = (event: DecodedEvent): void => writer.writeBytes(encodeEvent(event, version));

  writePayloadSizes(writer, eventPayloadSizes(version));
  writer.writeBytes(startBytes);

  const frameOffsets: number[] = [];
  for (let i = 0; i < frameCount; i++) {
    const frame = FIRST_FRAME_INDEX + i;
    frameOffsets.push(writer.length);
    if (atLeast(version, V2_2)) {
      write({ kind: 'frameStart', frame, state: makeStruct(FRAME_START_LAYOUT, version, { randomSeed: 1000 + i }) });
    }
    for (const port of ports) {
      const pre = makeStruct(PRE_LAYOUT, version, { state: state(i, port), positionX: i });
      write({ kind: 'pre', frame, port, isFollower: false, state: pre });
      if (follower(i, port)) {
        write({ kind: 'pre', frame, port, isFollower: true, state: pre });
      }
    }
    if (atLeast(version, V3_0)) {
      for (let k = 0; k < items(i); k++) {
        write({ kind: 'item', frame, state: makeStruct(ITEM_LAYOUT, version, { type: 7, id: k, positionX: k }) });
      }
    }
    for (const port of ports) {
      const post = makeStruct(POST_LAYOUT, version, {
        character: character(i, port),
        state: state(i, port),
        percent: i / 2,
        stocks: 4,
      });
      write({ kind: 'post', frame, port, isFollower: false, state: post });
      if (follower(i, port)) {
        write({ kind: 'post', frame, port, isFollower: true, state: post });
      }
    }
    if (atLeast(version, V3_0)) {
      write({ kind: 'frameEnd', frame, state: makeStruct(FRAME_END_LAYOUT, version, { latestFinalizedFrame: frame }) });
    }
  }

  if (options.end ?? true) {
    write({ kind: 'end', end: { fields: end, raw: new Uint8Array(0) } });
  }

  const stream = writer.toBytes();
  const metadata = options.metadata === undefined ? { startAt: '2024-01-01T00:00:00Z', playedOn: 'dolphin' } : options.metadata;
  return { stream, frameOffsets, file: joinContainer(stream, metadata) };
}

/**
 * Runs `fn` and returns the SlpError it throws.
 */
function captureError(fn: () => unknown): SlpError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof SlpError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected an SlpError');
}

export { DEFAULT_VERSION, makeStruct, makePlayer, makeStart, buildFixture, captureError };

export type { FixtureOptions, Fixture, Values };
