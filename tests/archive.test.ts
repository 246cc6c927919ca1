import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as zlib from 'zlib';
import {
  DirectoryArchiveWriter,
  MemoryArchiveWriter,
  TarArchiveWriter,
  packTar,
  readArchive,
  unpackTar,
} from '../slp-archive';

const bytesOf = (value: string): Uint8Array => new TextEncoder().encode(value);

describe('MemoryArchiveWriter', () => {
  it('should keep blobs in insertion order', async () => {
    const archive = new MemoryArchiveWriter();
    archive.addBlob('b.json', bytesOf('{}'));
    archive.addBlob('a.raw', Uint8Array.of(1, 2));
    await archive.finalize();

    expect(archive.finalized).toBe(true);
    expect(archive.entries().map(([name]) => name)).toEqual(['b.json', 'a.raw']);
    expect(Array.from(archive.get('a.raw') ?? [])).toEqual([1, 2]);
    expect(archive.get('missing')).toBeUndefined();
  });

  it('should reject bad and duplicate names', () => {
    const archive = new MemoryArchiveWriter();
    archive.addBlob('a', Uint8Array.of(1));

    expect(() => archive.addBlob('a', Uint8Array.of(2))).toThrow("Duplicate blob name: 'a'");
    expect(() => archive.addBlob('', Uint8Array.of(2))).toThrow("Invalid blob name: ''");
    expect(() => archive.addBlob('../escape', Uint8Array.of(2))).toThrow("Invalid blob name: '../escape'");
    expect(() => archive.addBlob('dir//name', Uint8Array.of(2))).toThrow("Invalid blob name: 'dir//name'");
  });

  it('should refuse blobs after finalize', async () => {
    const archive = new MemoryArchiveWriter();
    await archive.finalize();

    expect(() => archive.addBlob('late', Uint8Array.of(1))).toThrow("Archive already finalized, cannot add 'late'");
    await expect(archive.finalize()).rejects.toThrow('Archive already finalized');
  });
});

describe('packTar', () => {
  it('should write a header block then padded data', async () => {
    const archive = await packTar([['a.txt', bytesOf('hi')]]);

    // header, one data block, two end-of-archive blocks
    expect(archive.length).toBe(2048);
    expect(archive.subarray(0, 6).toString('latin1')).toBe('a.txt\0');
    expect(archive.subarray(512, 514).toString('latin1')).toBe('hi');
    expect(archive[514]).toBe(0);
  });

  it('should give identical archives for identical blobs', async () => {
    const blobs: Array<[string, Uint8Array]> = [
      ['x.json', bytesOf('{"a":1}')],
      ['y.raw', Uint8Array.of(1, 2, 3)],
    ];
    const first = await packTar(blobs);
    const second = await packTar(blobs);

    expect(second.equals(first)).toBe(true);
  });
});

describe('unpackTar', () => {
  it('should list the files a packed archive holds', async () => {
    const blobs = await unpackTar(await packTar([['a.txt', bytesOf('hi')], ['b.raw', Uint8Array.of(9)]]));

    expect([...blobs.keys()]).toEqual(['a.txt', 'b.raw']);
    expect(Buffer.from(blobs.get('a.txt') ?? []).toString('utf8')).toBe('hi');
    expect(Array.from(blobs.get('b.raw') ?? [])).toEqual([9]);
  });
});

describe('file-backed writers', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'slp-archive-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should write one file per blob under a directory', async () => {
    const target = path.join(dir, 'out', 'run');
    const archive = new DirectoryArchiveWriter(target);
    archive.addBlob('a.json', bytesOf('{}'));
    archive.addBlob('sub/b.raw', Uint8Array.of(7));
    await archive.finalize();

    expect(fs.readFileSync(path.join(target, 'a.json'), 'utf8')).toBe('{}');
    expect(Array.from(fs.readFileSync(path.join(target, 'sub', 'b.raw')))).toEqual([7]);
  });

  it('should write a plain tar file', async () => {
    const file = path.join(dir, 'game.tar');
    const archive = new TarArchiveWriter(file);
    archive.addBlob('a.txt', bytesOf('hi'));
    await archive.finalize();

    const expected = await packTar([['a.txt', bytesOf('hi')]]);
    expect(fs.readFileSync(file).equals(expected)).toBe(true);
  });

  it('should gzip the tar when asked to', async () => {
    const file = path.join(dir, 'nested', 'game.tar.gz');
    const archive = new TarArchiveWriter(file, 'gzip');
    archive.addBlob('a.txt', bytesOf('hi'));
    await archive.finalize();

    const compressed = fs.readFileSync(file);
    expect(Array.from(compressed.subarray(0, 2))).toEqual([0x1f, 0x8b]);

    const expected = await packTar([['a.txt', bytesOf('hi')]]);
    expect(zlib.gunzipSync(compressed).equals(expected)).toBe(true);
  });

  it('should read back a directory and a gzipped tar', async () => {
    const target = path.join(dir, 'run');
    const directory = new DirectoryArchiveWriter(target);
    directory.addBlob('sub/b.raw', Uint8Array.of(7));
    directory.addBlob('a.json', bytesOf('{}'));
    await directory.finalize();

    const fromDir = await readArchive(target);
    expect([...fromDir.keys()]).toEqual(['a.json', 'sub/b.raw']);
    expect(Array.from(fromDir.get('sub/b.raw') ?? [])).toEqual([7]);

    const file = path.join(dir, 'run.tar.gz');
    const tarball = new TarArchiveWriter(file, 'gzip');
    tarball.addBlob('a.json', bytesOf('{}'));
    await tarball.finalize();

    const fromTar = await readArchive(file);
    expect(Buffer.from(fromTar.get('a.json') ?? []).toString('utf8')).toBe('{}');
  });
});
