// slp-builder.ts - Accumulates decoded events into an immutable Replay

import { SlpError } from './slp-errors';
import { isUbjsonObject } from './slp-ubjson';
import type { UbjsonObject, UbjsonValue } from './slp-ubjson';
import type { FormatVersion } from './slp-layout';
import type {
  DecodedEvent,
  GameStart,
  GameEnd,
  PreFrame,
  PostFrame,
  ItemState,
  FrameStartState,
  FrameEndState,
} from './slp-events';

/** Index of the first frame of every game. */
const FIRST_FRAME_INDEX = -123;

interface FrameData {
  readonly pre: PreFrame | null;
  readonly post: PostFrame | null;
}

interface PortFrame {
  readonly port: number;
  readonly leader: FrameData;
  /** Present only on frames where the follower sent data. */
  readonly follower: FrameData | null;
}

interface Frame {
  readonly index: number;
  readonly start: FrameStartState | null;
  /** Bookend; its presence marks the frame complete. */
  readonly end: FrameEndState | null;
  /** One entry per active port, ascending. */
  readonly ports: readonly PortFrame[];
  readonly items: readonly ItemState[];
}

interface CharacterFrames {
  readonly character: number;
  readonly frames: number;
}

interface Netplay {
  readonly name: string;
  readonly code: string;
}

interface PlayerMetadata {
  readonly port: number;
  /** Frames with an observed leader post-frame. */
  readonly frameCount: number;
  readonly characters: readonly CharacterFrames[];
  readonly netplay: Netplay | null;
}

interface Metadata {
  readonly startAt: string | null;
  readonly playedOn: string | null;
  readonly consoleNick: string | null;
  readonly firstFrame: number | null;
  readonly lastFrame: number | null;
  readonly frameCount: number;
  readonly rollbacks: number;
  readonly players: readonly PlayerMetadata[];
}

interface Replay {
  readonly version: FormatVersion;
  readonly start: GameStart;
  /** `null` when the stream has no end event. */
  readonly end: GameEnd | null;
  readonly metadata: Metadata;
  readonly frames: readonly Frame[];
  readonly partial: boolean;
  readonly errors: readonly SlpError[];
  /** Metadata block stored beside the event stream, as read. */
  readonly sideChannel: UbjsonObject | null;
  /** Hash of the input bytes, when the reader was asked for one. */
  readonly hash: string | null;
}

interface BuilderOptions {
  /** Ignore frame events; only start, end and metadata are kept. */
  skipFrames?: boolean;
}

interface FinishOptions {
  partial?: boolean;
  errors?: readonly SlpError[];
  sideChannel?: UbjsonObject | null;
  hash?: string | null;
}

// Mutable counterparts used while building
interface FrameDataDraft {
  pre: PreFrame | null;
  post: PostFrame | null;
}

interface PortDraft {
  port: number;
  leader: FrameDataDraft;
  follower: FrameDataDraft | null;
}

interface FrameDraft {
  index: number;
  start: FrameStartState | null;
  end: FrameEndState | null;
  ports: PortDraft[];
  items: ItemState[];
  /** `port/slot/half` keys written since the frame was (re)entered. */
  seen: Set<string>;
}

function childObject(value: UbjsonValue | undefined, key: string): UbjsonObject | null {
  if (!isUbjsonObject(value)) return null;
  const child = value[key];
  return isUbjsonObject(child) ? child : null;
}

function childString(value: UbjsonObject | null, key: string): string | null {
  const child = value?.[key];
  return typeof child === 'string' ? child : null;
}

export class ReplayBuilder {
  private start: GameStart | null = null;
  private end: GameEnd | null = null;
  private frames: FrameDraft[] = [];
  private positions = new Map<number, number>();
  private current: FrameDraft | null = null;
  private rollbacks = 0;
  private diagnostics: SlpError[] = [];
  private skipFrames: boolean;

  constructor(options: BuilderOptions = {}) {
    this.skipFrames = options.skipFrames ?? false;
  }

  get hasStart(): boolean {
    return this.start !== null;
  }

  get frameCount(): number {
    return this.frames.length;
  }

  /** Routes one decoded event to its entry point. */
  apply(event: DecodedEvent): void {
    switch (event.kind) {
      case 'start':
        this.gameStart(event.start);
        break;
      case 'frameStart':
        this.frameStart(event.frame, event.state);
        break;
      case 'pre':
        this.pre(event.frame, event.port, event.isFollower, event.state);
        break;
      case 'post':
        this.post(event.frame, event.port, event.isFollower, event.state);
        break;
      case 'item':
        this.item(event.frame, event.state);
        break;
      case 'frameEnd':
        this.frameEnd(event.frame, event.state);
        break;
      case 'end':
        this.gameEnd(event.end);
        break;
    }
  }

  gameStart(start: GameStart): void {
    if (this.start !== null) {
      throw new SlpError('MalformedHeader', 'second start event');
    }
    this.start = start;
  }

  frameStart(index: number, state: FrameStartState): void {
    if (this.skipFrames) return;
    const existing = this.lookup(index);
    if (existing !== undefined && (existing !== this.current || existing.start !== null)) {
      // replaying a frame that already began
      this.rollback(existing, true);
      this.current = existing;
    }
    const frame = this.enter(index);
    if (frame) frame.start = state;
  }

  pre(index: number, port: number, isFollower: boolean, state: PreFrame): void {
    if (this.skipFrames) return;
    const data = this.half(index, port, isFollower, 'pre');
    if (data) data.pre = state;
  }

  post(index: number, port: number, isFollower: boolean, state: PostFrame): void {
    if (this.skipFrames) return;
    const data = this.half(index, port, isFollower, 'post');
    if (data) data.post = state;
  }

  item(index: number, state: ItemState): void {
    if (this.skipFrames) return;
    this.enter(index)?.items.push(state);
  }

  frameEnd(index: number, state: FrameEndState): void {
    if (this.skipFrames) return;
    const frame = this.enter(index);
    if (!frame) return;
    if (frame.seen.has('end')) {
      this.flag('duplicate bookend', index);
    }
    frame.seen.add('end');
    frame.end = state;
  }

  gameEnd(end: GameEnd): void {
    if (this.end !== null) {
      this.diagnostics.push(new SlpError('FrameOrder', 'second end event, keeping the later one'));
    }
    this.end = end;
  }

  private lookup(index: number): FrameDraft | undefined {
    const position = this.positions.get(index);
    return position === undefined ? undefined : this.frames[position];
  }

  private flag(message: string, frame: number): void {
    this.diagnostics.push(new SlpError('FrameOrder', message, { frame }));
  }

  private rollback(frame: FrameDraft, resetItems: boolean): void {
    this.rollbacks++;
    this.flag('rollback', frame.index);
    frame.seen.clear();
    if (resetItems) {
      frame.items = [];
    }
  }

  /**
   * Makes `index` the current frame, opening it when it is newer than every
   * frame so far and treating an older one as a rollback. Returns `null` for
   * an older index that was never opened.
   */
  private enter(index: number): FrameDraft | null {
    if (this.current !== null && this.current.index === index) {
      return this.current;
    }

    const existing = this.lookup(index);
    if (existing !== undefined) {
      this.rollback(existing, false);
      this.current = existing;
      return existing;
    }

    const newest = this.frames.length > 0 ? this.frames[this.frames.length - 1].index : null;
    if (newest !== null && index < newest) {
      this.flag('frame older than the newest was never opened, dropped', index);
      return null;
    }
    if (newest !== null && index > newest + 1) {
      this.flag(`gap of ${index - newest - 1} frame(s)`, index);
    }

    const frame: FrameDraft = {
      index,
      start: null,
      end: null,
      ports: this.activePorts().map(port => ({ port, leader: { pre: null, post: null }, follower: null })),
      items: [],
      seen: new Set(),
    };
    this.positions.set(index, this.frames.length);
    this.frames.push(frame);
    this.current = frame;
    return frame;
  }

  private activePorts(): number[] {
    if (this.start === null) {
      throw new SlpError('MalformedHeader', 'frame event before start');
    }
    return this.start.players.map(player => player.port);
  }

  private half(index: number, port: number, isFollower: boolean, half: 'pre' | 'post'): FrameDataDraft | null {
    const frame = this.enter(index);
    if (!frame) return null;
    const entry = frame.ports.find(p => p.port === port);
    if (!entry) {
      this.diagnostics.push(new SlpError('MalformedEvent', `event for inactive port ${port}`, { frame: index }));
      return null;
    }
    const key = `${port}/${isFollower ? 'follower' : 'leader'}/${half}`;
    if (frame.seen.has(key)) {
      this.flag(`duplicate ${key}`, index);
    }
    frame.seen.add(key);
    if (!isFollower) {
      return entry.leader;
    }
    if (entry.follower === null) {
      entry.follower = { pre: null, post: null };
    }
    return entry.follower;
  }

  /**
   * Derives metadata, checks the character histogram and freezes the Replay.
   */
  finish(options: FinishOptions = {}): Replay {
    if (this.start === null) {
      throw new SlpError('MalformedHeader', 'stream has no start event');
    }
    const sideChannel = options.sideChannel ?? null;
    const frames = Object.freeze(this.frames.map(freezeFrame));
    const metadata = deriveMetadata(this.start, frames, this.rollbacks, sideChannel);

    return Object.freeze({
      version: this.start.version,
      start: this.start,
      end: this.end,
      metadata,
      frames,
      partial: options.partial ?? false,
      errors: Object.freeze([...(options.errors ?? []), ...this.diagnostics]),
      sideChannel,
      hash: options.hash ?? null,
    });
  }
}

function freezeData(data: FrameDataDraft): FrameData {
  return Object.freeze({ pre: data.pre, post: data.post });
}

function freezeFrame(frame: FrameDraft): Frame {
  return Object.freeze({
    index: frame.index,
    start: frame.start,
    end: frame.end,
    ports: Object.freeze(
      frame.ports.map(p =>
        Object.freeze({
          port: p.port,
          leader: freezeData(p.leader),
          follower: p.follower === null ? null : freezeData(p.follower),
        })
      )
    ),
    items: Object.freeze([...frame.items]),
  });
}

function netplayOf(start: GameStart, port: number, sideChannel: UbjsonObject | null): Netplay | null {
  const player = start.players.find(p => p.port === port);
  if (player && player.displayName !== null && player.connectCode !== null && player.connectCode !== '') {
    return { name: player.displayName, code: player.connectCode };
  }
  const names = childObject(childObject(sideChannel?.['players'], String(port - 1)), 'names');
  const name = childString(names, 'netplay');
  const code = childString(names, 'code');
  return name !== null && code !== null ? { name, code } : null;
}

function deriveMetadata(
  start: GameStart,
  frames: readonly Frame[],
  rollbacks: number,
  sideChannel: UbjsonObject | null
): Metadata {
  const players: PlayerMetadata[] = start.players.map(player => {
    const histogram = new Map<number, number>();
    let frameCount = 0;
    for (const frame of frames) {
      const post = frame.ports.find(p => p.port === player.port)?.leader.post;
      if (post) {
        frameCount++;
        histogram.set(post.character, (histogram.get(post.character) ?? 0) + 1);
      }
    }
    const characters = [...histogram]
      .sort((a, b) => a[0] - b[0])
      .map(([character, count]) => Object.freeze({ character, frames: count }));
    const total = characters.reduce((sum, entry) => sum + entry.frames, 0);
    if (total !== frameCount) {
      throw new SlpError(
        'InvariantViolation',
        `port ${player.port} histogram covers ${total} frame(s), ${frameCount} observed`
      );
    }
    return Object.freeze({
      port: player.port,
      frameCount,
      characters: Object.freeze(characters),
      netplay: netplayOf(start, player.port, sideChannel),
    });
  });

  const firstFrame = frames.length > 0 ? frames[0].index : null;
  const lastFrame = frames.length > 0 ? frames[frames.length - 1].index : null;

  return Object.freeze({
    startAt: childString(sideChannel, 'startAt'),
    playedOn: childString(sideChannel, 'playedOn'),
    consoleNick: childString(sideChannel, 'consoleNick'),
    firstFrame,
    lastFrame,
    frameCount: firstFrame !== null && lastFrame !== null ? lastFrame - firstFrame + 1 : 0,
    rollbacks,
    players: Object.freeze(players),
  });
}

export { FIRST_FRAME_INDEX };

export type {
  FrameData,
  PortFrame,
  Frame,
  CharacterFrames,
  Netplay,
  PlayerMetadata,
  Metadata,
  Replay,
  BuilderOptions,
  FinishOptions,
};
