import { tableFromIPC } from 'apache-arrow';
import { contentHash, decodeReplay } from '../slp';
import type { Replay } from '../slp';
import { columnarBlobs, encodeColumnar, planFrameColumns, readColumnar } from '../slp-columnar';
import { MemoryArchiveWriter } from '../slp-archive';
import { buildFixture, captureError } from './fixtures';

const text = (bytes: Uint8Array | undefined): string => new TextDecoder().decode(bytes);

function blob(blobs: Array<[string, Uint8Array]>, name: string): Uint8Array {
  const entry = blobs.find(([existing]) => existing === name);
  if (entry === undefined) {
    throw new Error(`no blob '${name}'`);
  }
  return entry[1];
}

describe('columnar encoding', () => {
  let replay: Replay;

  beforeAll(() => {
    replay = decodeReplay(
      buildFixture({
        frames: 3,
        items: frame => (frame === 1 ? 2 : 0),
        follower: (frame, port) => port === 2 && frame === 1,
      }).file
    );
  });

  it('should write blobs in a fixed order', () => {
    expect(columnarBlobs(replay).map(([name]) => name)).toEqual([
      'manifest.json',
      'start.json',
      'start.raw',
      'end.json',
      'end.raw',
      'metadata.json',
      'frames.arrow',
      'items.arrow',
    ]);
  });

  it('should leave out end blobs when the game has no end', () => {
    const endless = decodeReplay(buildFixture({ frames: 2, end: false }).file);
    const names = columnarBlobs(endless).map(([name]) => name);

    expect(names).toEqual(['manifest.json', 'start.json', 'start.raw', 'metadata.json', 'frames.arrow', 'items.arrow']);
  });

  it('should describe the archive in its manifest', () => {
    expect(text(blob(columnarBlobs(replay), 'manifest.json'))).toBe(
      '{"version":"3.12.0","partial":false,"frames":3,"items":2,"blobs":["manifest.json","start.json",' +
        '"start.raw","end.json","end.raw","metadata.json","frames.arrow","items.arrow"]}'
    );
  });

  it('should keep the raw start and end payloads', () => {
    const blobs = columnarBlobs(replay);

    expect(blob(blobs, 'start.raw').length).toBe(701);
    expect(Array.from(blob(blobs, 'end.raw'))).toEqual([2, 0xff]);
    expect(text(blob(blobs, 'end.json'))).toBe('{"method":2,"lrasInitiator":-1}');
  });

  it('should produce byte-identical output across runs', () => {
    const first = columnarBlobs(replay);
    const second = columnarBlobs(replay);

    expect(second.map(([name]) => name)).toEqual(first.map(([name]) => name));
    first.forEach(([, bytes], i) => {
      expect(Buffer.from(second[i][1]).equals(Buffer.from(bytes))).toBe(true);
    });
  });

  it('should name frame columns by port, slot and half', () => {
    const table = tableFromIPC(blob(columnarBlobs(replay), 'frames.arrow'));
    const names = table.schema.fields.map(field => field.name);

    expect(names).toEqual(planFrameColumns(replay).map(column => column.name));
    expect(names.slice(0, 5)).toEqual([
      'frame',
      'start.randomSeed',
      'start.sceneFrameCounter',
      'end.latestFinalizedFrame',
      'p1.leader.pre.randomSeed',
    ]);
    expect(names).toContain('p2.follower.post.state');
    expect(names).not.toContain('p1.follower.pre.state');
    expect(names).not.toContain('p1.leader.pre.rawAnalogY');
    expect(table.numRows).toBe(3);
  });

  it('should store one row per frame with nulls for missing data', () => {
    const table = tableFromIPC(blob(columnarBlobs(replay), 'frames.arrow'));

    expect(Array.from(table.getChild('frame')?.toArray() ?? [])).toEqual([-123, -122, -121]);
    expect(Array.from(table.getChild('p2.leader.post.percent')?.toArray() ?? [])).toEqual([0, 0.5, 1]);
    expect(table.getChild('p1.leader.post.flags')?.get(0)).toBe(BigInt(0));
    expect(table.getChild('p1.leader.post.airborne')?.get(0)).toBe(false);

    const follower = table.getChild('p2.follower.post.state');
    expect(follower?.nullCount).toBe(2);
    expect(follower?.get(0)).toBeNull();
    expect(follower?.get(1)).toBe(14);
  });

  it('should store one row per item', () => {
    const table = tableFromIPC(blob(columnarBlobs(replay), 'items.arrow'));

    expect(table.numRows).toBe(2);
    expect(table.schema.fields.map(field => field.name).slice(0, 3)).toEqual(['frame', 'type', 'state']);
    expect(Array.from(table.getChild('frame')?.toArray() ?? [])).toEqual([-122, -122]);
    expect(Array.from(table.getChild('id')?.toArray() ?? [])).toEqual([0, 1]);
  });

  it('should plan no frame start or bookend columns for old versions', () => {
    const old = decodeReplay(buildFixture({ version: [2, 0, 0], frames: 1 }).file);
    const names = planFrameColumns(old).map(column => column.name);

    expect(names.slice(0, 2)).toEqual(['frame', 'p1.leader.pre.randomSeed']);
    expect(names).not.toContain('p1.leader.post.hurtboxState');
  });

  it('should hand every blob to the archive and finalize it', async () => {
    const archive = new MemoryArchiveWriter();
    await encodeColumnar(replay, archive);

    expect(archive.finalized).toBe(true);
    expect(archive.entries().map(([name]) => name)).toEqual(columnarBlobs(replay).map(([name]) => name));
    expect(text(archive.get('metadata.json'))).toBe(
      text(blob(columnarBlobs(replay), 'metadata.json'))
    );
  });
});

describe('columnar reading', () => {
  it('should read back the frames, items and events it wrote', () => {
    const replay = decodeReplay(
      buildFixture({
        frames: 4,
        items: frame => frame % 2,
        follower: (frame, port) => port === 2 && frame === 1,
      }).file
    );
    const back = readColumnar(new Map(columnarBlobs(replay)));

    expect(back.version).toEqual([3, 12, 0]);
    expect(back.frames).toEqual(replay.frames);
    expect(back.end).toEqual(replay.end);
    expect(back.partial).toBe(false);
    expect(back.sideChannel).toBeNull();
    expect(contentHash(back)).toBe(contentHash(replay));
  });

  it('should read back versions without frame start or bookend', () => {
    const replay = decodeReplay(buildFixture({ version: [2, 0, 0], frames: 2 }).file);
    const back = readColumnar(new Map(columnarBlobs(replay)));

    expect(back.frames).toEqual(replay.frames);
    expect(contentHash(back)).toBe(contentHash(replay));
  });

  it('should leave the end out when none was written', () => {
    const replay = decodeReplay(buildFixture({ frames: 2, end: false }).file);
    const back = readColumnar(new Map(columnarBlobs(replay)));

    expect(back.end).toBeNull();
    expect(back.frames.length).toBe(2);
  });

  it('should reject an archive without a start payload', () => {
    const err = captureError(() => readColumnar(new Map()));

    expect(err.code).toBe('MalformedHeader');
    expect(err.message).toBe("MalformedHeader: columnar archive has no 'start.raw'");
  });
});
