// slp.ts - Slippi replay (.slp) stream decoder and writer

import { createHash } from 'crypto';
import { ByteReader, ByteWriter } from './slp-reader';
import { SlpError, isSlpError, hex } from './slp-errors';
import { splitContainer, joinContainer, readTrailingMetadata } from './slp-ubjson';
import type { UbjsonObject } from './slp-ubjson';
import { V0_1, V2_2, V3_0, atLeast, formatVersion } from './slp-layout';
import type { FormatVersion } from './slp-layout';
import {
  EventCode,
  hasDecoder,
  decodeEvent,
  encodeEvent,
  eventLength,
  eventPayloadSizes,
  readPayloadSizes,
  writePayloadSizes,
} from './slp-events';
import type { DecodedEvent } from './slp-events';
import { ReplayBuilder } from './slp-builder';
import type { Replay, Metadata, Frame } from './slp-builder';

interface DecodeOptions {
  verbose?: boolean;
  /** Keep start, end and metadata only. */
  skipFrames?: boolean;
  /** Record `hashBytes` of the input on `Replay.hash`. */
  computeHash?: boolean;
}

/**
 * Reads a replay file (or a bare event stream) into a Replay.
 *
 * Fatal problems throw `SlpError`: a bad container, anything wrong before or
 * in the start event. Later problems are collected on `Replay.errors`; a
 * truncated or unreadable tail marks the Replay partial.
 */
export class SlpDecoder {
  private bytes: Uint8Array;
  private verbose: boolean = false;
  private skipFrames: boolean;
  private computeHash: boolean;

  constructor(bytes: Uint8Array, options: DecodeOptions = {}) {
    this.bytes = bytes;
    this.verbose = options.verbose ?? false;
    this.skipFrames = options.skipFrames ?? false;
    this.computeHash = options.computeHash ?? false;
  }

  private log(message: string): void {
    if (this.verbose) {
      console.error(`[SLP] ${message}`);
    }
  }

  /** The stream cannot continue: fatal before the start event, partial after. */
  private stop(builder: ReplayBuilder, errors: SlpError[], err: SlpError): void {
    if (!builder.hasStart) {
      throw err;
    }
    this.log(`Stopping: ${err.message}`);
    errors.push(err);
  }

  /**
   * Size of an event the payload table leaves out. Only events with a
   * known layout qualify, and only once the start event fixed the version.
   */
  private fixedSize(
    sizes: Map<number, number>,
    builder: ReplayBuilder,
    code: number,
    version: FormatVersion
  ): number | undefined {
    if (!builder.hasStart || !hasDecoder(code) || code === EventCode.GameStart) {
      return undefined;
    }
    const size = eventLength(code, version) - 1;
    this.log(`${hex(code)} missing from payload table, assuming ${size} bytes`);
    sizes.set(code, size);
    return size;
  }

  decode(): Replay {
    this.log(`Starting decode, buffer size: ${this.bytes.byteLength} bytes`);

    const container = splitContainer(this.bytes);
    this.log(`Raw stream at ${hex(container.rawOffset)}, ${container.raw.byteLength} bytes`);
    if (container.metadataError !== null) {
      this.log(`Metadata unreadable: ${container.metadataError}`);
    }

    const reader = new ByteReader(container.raw, container.rawOffset);
    const sizes = readPayloadSizes(reader);
    this.log(
      `Payload sizes: ${[...sizes].map(([code, size]) => `${hex(code)}=${size}`).join(', ')}`
    );

    const builder = new ReplayBuilder({ skipFrames: this.skipFrames });
    const errors: SlpError[] = [];
    let version: FormatVersion = V0_1;
    let partial = false;
    let count = 0;
    let sideChannel = container.metadata;

    while (reader.hasMore()) {
      const position = reader.getPosition();
      const at = reader.absolutePosition;
      const code = reader.readU8();
      const size = sizes.get(code) ?? this.fixedSize(sizes, builder, code, version);

      if (size === undefined) {
        this.stop(builder, errors, new SlpError('UnknownEventCode', 'event code missing from payload table', {
          offset: at,
          eventCode: code,
        }));
        partial = true;
        break;
      }
      if (reader.remaining() < size) {
        this.stop(builder, errors, new SlpError('TruncatedStream', `event needs ${size} byte(s), ${reader.remaining()} left`, {
          offset: at,
          eventCode: code,
        }));
        partial = true;
        break;
      }

      reader.seek(position);
      const bytes = reader.readBytes(size + 1);

      if (!hasDecoder(code)) {
        this.log(`Skipping ${hex(code)} (${size} bytes) at ${hex(at)}`);
        continue;
      }
      if (!builder.hasStart && code !== EventCode.GameStart) {
        throw new SlpError('MalformedHeader', 'event before start', { offset: at, eventCode: code });
      }

      let event: DecodedEvent;
      try {
        event = decodeEvent(code, bytes, version, at);
      } catch (err: unknown) {
        if (isSlpError(err, 'MalformedEvent') && code !== EventCode.GameStart) {
          this.log(`Skipping malformed event: ${err.message}`);
          errors.push(err);
          continue;
        }
        throw err;
      }

      if (event.kind === 'start') {
        version = event.start.version;
        this.log(`Start at ${hex(at)}: version ${formatVersion(version)}, ${event.start.players.length} player(s)`);
      } else if (event.kind === 'end') {
        this.log(`End at ${hex(at)}: method ${event.end.fields.method}`);
      }

      builder.apply(event);
      count++;

      if (event.kind === 'end' && container.openEnded) {
        const after = reader.getPosition();
        const trailing = readTrailingMetadata(container.raw.subarray(after), reader.absolutePosition);
        if (trailing.metadataError !== null) {
          this.log(`Metadata unreadable: ${trailing.metadataError}`);
        }
        sideChannel = trailing.metadata;
        break;
      }
    }

    if (!builder.hasStart) {
      throw new SlpError('MalformedHeader', 'stream has no start event', { offset: reader.absolutePosition });
    }

    this.log(`Total events decoded: ${count}, frames: ${builder.frameCount}${partial ? ' (partial)' : ''}`);
    const hash = this.computeHash ? hashBytes(this.bytes) : null;
    return builder.finish({ partial, errors, sideChannel, hash });
  }
}

function metadataToUbjson(metadata: Metadata): UbjsonObject {
  const players: UbjsonObject = {};
  for (const player of metadata.players) {
    const characters: UbjsonObject = {};
    for (const entry of player.characters) {
      characters[String(entry.character)] = entry.frames;
    }
    const record: UbjsonObject = { characters };
    if (player.netplay !== null) {
      record['names'] = { netplay: player.netplay.name, code: player.netplay.code };
    }
    players[String(player.port - 1)] = record;
  }

  const result: UbjsonObject = {};
  if (metadata.startAt !== null) result['startAt'] = metadata.startAt;
  if (metadata.lastFrame !== null) result['lastFrame'] = metadata.lastFrame;
  result['players'] = players;
  if (metadata.playedOn !== null) result['playedOn'] = metadata.playedOn;
  if (metadata.consoleNick !== null) result['consoleNick'] = metadata.consoleNick;
  return result;
}

/**
 * Writes a Replay back to the `.slp` format.
 *
 * Start and end are copied from their recorded payloads; frames are encoded
 * at the replay's version in the order the console emits them.
 */
export class SlpEncoder {
  encode(replay: Replay): Uint8Array {
    return joinContainer(this.encodeStream(replay), replay.sideChannel ?? metadataToUbjson(replay.metadata));
  }

  /** The event stream alone, without the container and metadata. */
  encodeStream(replay: Replay): Uint8Array {
    const writer = new ByteWriter();
    const version = replay.version;
    const sizes = eventPayloadSizes(version);
    sizes.set(EventCode.GameStart, replay.start.raw.byteLength);
    if (replay.end !== null) {
      sizes.set(EventCode.GameEnd, replay.end.raw.byteLength);
    }

    writePayloadSizes(writer, sizes);
    writer.writeU8(EventCode.GameStart);
    writer.writeBytes(replay.start.raw);

    for (const frame of replay.frames) {
      for (const event of frameEvents(frame, version)) {
        writer.writeBytes(encodeEvent(event, version));
      }
    }

    if (replay.end !== null) {
      writer.writeU8(EventCode.GameEnd);
      writer.writeBytes(replay.end.raw);
    }
    return writer.toBytes();
  }
}

/**
 * Events of one frame in console order: frame start, pre-frames, items,
 * post-frames, bookend. Halves that are missing are left out.
 */
function frameEvents(frame: Frame, version: FormatVersion): DecodedEvent[] {
  const index = frame.index;
  const events: DecodedEvent[] = [];
  if (frame.start !== null && atLeast(version, V2_2)) {
    events.push({ kind: 'frameStart', frame: index, state: frame.start });
  }
  for (const { port, leader, follower } of frame.ports) {
    if (leader.pre !== null) {
      events.push({ kind: 'pre', frame: index, port, isFollower: false, state: leader.pre });
    }
    if (follower !== null && follower.pre !== null) {
      events.push({ kind: 'pre', frame: index, port, isFollower: true, state: follower.pre });
    }
  }
  if (atLeast(version, V3_0)) {
    for (const item of frame.items) {
      events.push({ kind: 'item', frame: index, state: item });
    }
  }
  for (const { port, leader, follower } of frame.ports) {
    if (leader.post !== null) {
      events.push({ kind: 'post', frame: index, port, isFollower: false, state: leader.post });
    }
    if (follower !== null && follower.post !== null) {
      events.push({ kind: 'post', frame: index, port, isFollower: true, state: follower.post });
    }
  }
  if (frame.end !== null && atLeast(version, V3_0)) {
    events.push({ kind: 'frameEnd', frame: index, state: frame.end });
  }
  return events;
}

/** `sha256:<hex>` of a byte buffer. */
function hashBytes(bytes: Uint8Array): string {
  return `sha256:${createHash('sha256').update(bytes).digest('hex')}`;
}

/**
 * Hash of the replay's re-encoded event stream. Two replays that carry the
 * same events hash the same, whatever container they were read from.
 */
function contentHash(replay: Replay): string {
  return hashBytes(new SlpEncoder().encodeStream(replay));
}

function decodeReplay(bytes: Uint8Array, options: DecodeOptions = {}): Replay {
  return new SlpDecoder(bytes, options).decode();
}

function encodeReplay(replay: Replay): Uint8Array {
  return new SlpEncoder().encode(replay);
}

export { decodeReplay, encodeReplay, frameEvents, hashBytes, contentHash };

export type { DecodeOptions };

export { SlpError, isSlpError } from './slp-errors';
export type { SlpErrorCode } from './slp-errors';
export { EventCode } from './slp-events';
export type { DecodedEvent, GameStart, GameEnd, Player, PreFrame, PostFrame, ItemState } from './slp-events';
export { ReplayBuilder, FIRST_FRAME_INDEX } from './slp-builder';
export type { Replay, Frame, PortFrame, FrameData, Metadata, PlayerMetadata } from './slp-builder';
export type { FormatVersion } from './slp-layout';
