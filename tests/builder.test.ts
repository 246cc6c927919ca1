import { ReplayBuilder } from '../slp-builder';
import { FRAME_START_LAYOUT, ITEM_LAYOUT, POST_LAYOUT, PRE_LAYOUT, V3_12 } from '../slp-layout';
import type { PostFrame } from '../slp-events';
import { captureError, makePlayer, makeStart, makeStruct } from './fixtures';

const frameStart = makeStruct(FRAME_START_LAYOUT, V3_12);
const pre = makeStruct(PRE_LAYOUT, V3_12);
const item = makeStruct(ITEM_LAYOUT, V3_12);

function post(character: number, state: number = 14): PostFrame {
  return makeStruct(POST_LAYOUT, V3_12, { character, state });
}

function started(): ReplayBuilder {
  const builder = new ReplayBuilder();
  builder.gameStart(makeStart());
  return builder;
}

function play(builder: ReplayBuilder, index: number, state: number = 14): void {
  builder.frameStart(index, frameStart);
  builder.pre(index, 1, false, pre);
  builder.pre(index, 2, false, pre);
  builder.post(index, 1, false, post(0, state));
  builder.post(index, 2, false, post(1, state));
}

describe('ReplayBuilder', () => {
  let builder: ReplayBuilder;

  beforeEach(() => {
    builder = started();
  });

  it('should open one entry per active port on every frame', () => {
    builder.pre(-123, 1, false, pre);
    const replay = builder.finish();

    expect(replay.frames.length).toBe(1);
    expect(replay.frames[0].ports.map(p => p.port)).toEqual([1, 2]);
    expect(replay.frames[0].ports[1].leader).toEqual({ pre: null, post: null });
    expect(replay.frames[0].ports[1].follower).toBeNull();
  });

  it('should count replayed frames as rollbacks and keep the later data', () => {
    play(builder, -123);
    play(builder, -122);
    play(builder, -121);
    play(builder, -122, 20);
    play(builder, -121, 20);
    play(builder, -120);
    const replay = builder.finish();

    expect(replay.frames.map(f => f.index)).toEqual([-123, -122, -121, -120]);
    expect(replay.metadata.rollbacks).toBe(2);
    expect(replay.frames[1].ports[0].leader.post?.state).toBe(20);
    expect(replay.frames[3].ports[0].leader.post?.state).toBe(14);
    expect(replay.errors.map(err => err.message)).toEqual([
      'FrameOrder: rollback (frame -122)',
      'FrameOrder: rollback (frame -121)',
    ]);
  });

  it('should reset items when a frame is replayed', () => {
    builder.frameStart(-123, frameStart);
    builder.item(-123, item);
    builder.item(-123, item);
    builder.frameStart(-122, frameStart);
    builder.frameStart(-123, frameStart);
    builder.item(-123, item);

    expect(builder.finish().frames[0].items.length).toBe(1);
  });

  it('should flag duplicate events and keep the later value', () => {
    play(builder, -123);
    builder.post(-123, 1, false, post(0, 30));
    const replay = builder.finish();

    expect(replay.frames[0].ports[0].leader.post?.state).toBe(30);
    expect(replay.errors.map(err => err.message)).toEqual(['FrameOrder: duplicate 1/leader/post (frame -123)']);
    expect(replay.metadata.rollbacks).toBe(0);
  });

  it('should flag gaps and drop frames that were skipped over', () => {
    play(builder, -123);
    play(builder, -120);
    builder.post(-121, 1, false, post(0));
    const replay = builder.finish();

    expect(replay.frames.length).toBe(2);
    expect(replay.metadata.frameCount).toBe(4);
    expect(replay.metadata.players[0].frameCount).toBe(2);
    expect(replay.errors.map(err => err.message)).toEqual([
      'FrameOrder: gap of 2 frame(s) (frame -120)',
      'FrameOrder: frame older than the newest was never opened, dropped (frame -121)',
    ]);
  });

  it('should report events for inactive ports', () => {
    builder.pre(-123, 4, false, pre);
    const replay = builder.finish();

    expect(replay.errors.map(err => err.message)).toEqual(['MalformedEvent: event for inactive port 4 (frame -123)']);
    expect(replay.frames[0].ports.length).toBe(2);
  });

  it('should keep follower data only on frames that carry it', () => {
    play(builder, -123);
    play(builder, -122);
    builder.pre(-122, 2, true, pre);
    const replay = builder.finish();

    expect(replay.frames[0].ports[1].follower).toBeNull();
    expect(replay.frames[1].ports[1].follower).toEqual({ pre, post: null });
    expect(replay.errors).toEqual([]);
  });

  it('should histogram characters by frame, sorted by character', () => {
    for (let i = 0; i < 5; i++) {
      const index = -123 + i;
      builder.post(index, 1, false, post(i < 3 ? 19 : 7));
    }
    const { metadata } = builder.finish();

    expect(metadata.players[0].characters).toEqual([
      { character: 7, frames: 2 },
      { character: 19, frames: 3 },
    ]);
    expect(metadata.players[0].frameCount).toBe(5);
    expect(metadata.players[1]).toEqual({ port: 2, frameCount: 0, characters: [], netplay: null });
  });

  it('should take netplay names from the start event, then the side channel', () => {
    const netplayBuilder = new ReplayBuilder();
    netplayBuilder.gameStart({
      ...makeStart(),
      players: [
        makePlayer(1, V3_12, { displayName: 'alpha', connectCode: 'ALP#1' }),
        makePlayer(2, V3_12),
      ],
    });
    const { metadata } = netplayBuilder.finish({
      sideChannel: { players: { '1': { names: { netplay: 'beta', code: 'BET#2' } } } },
    });

    expect(metadata.players.map(p => p.netplay)).toEqual([
      { name: 'alpha', code: 'ALP#1' },
      { name: 'beta', code: 'BET#2' },
    ]);
  });

  it('should freeze the finished replay', () => {
    play(builder, -123);
    const replay = builder.finish({ partial: true });

    expect(replay.partial).toBe(true);
    expect(Object.isFrozen(replay)).toBe(true);
    expect(Object.isFrozen(replay.frames[0].ports[0].leader)).toBe(true);
  });

  it('should reject a second start event', () => {
    const err = captureError(() => builder.gameStart(makeStart()));
    expect(err.code).toBe('MalformedHeader');
  });

  it('should reject frame events before the start event', () => {
    const err = captureError(() => new ReplayBuilder().pre(-123, 1, false, pre));
    expect(err.message).toBe('MalformedHeader: frame event before start');
  });
});
