// slp-archive.ts - Named-blob sinks: directory, tar (optionally gzipped), memory

import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import * as tar from 'tar-stream';

interface ArchiveWriter {
  addBlob(name: string, bytes: Uint8Array): void;
  /** Writes everything added so far; the writer is spent afterwards. */
  finalize(): Promise<void>;
}

type Compression = 'gzip' | null;

abstract class BufferedArchiveWriter implements ArchiveWriter {
  protected blobs: Array<[string, Uint8Array]> = [];
  private sealed = false;

  addBlob(name: string, bytes: Uint8Array): void {
    if (this.sealed) {
      throw new Error(`Archive already finalized, cannot add '${name}'`);
    }
    if (name === '' || name.split('/').some(part => part === '..' || part === '')) {
      throw new Error(`Invalid blob name: '${name}'`);
    }
    if (this.blobs.some(([existing]) => existing === name)) {
      throw new Error(`Duplicate blob name: '${name}'`);
    }
    this.blobs.push([name, bytes]);
  }

  async finalize(): Promise<void> {
    if (this.sealed) {
      throw new Error('Archive already finalized');
    }
    this.sealed = true;
    await this.flush();
  }

  protected abstract flush(): Promise<void>;
}

/**
 * One file per blob under a directory, created when missing.
 */
class DirectoryArchiveWriter extends BufferedArchiveWriter {
  constructor(private directory: string) {
    super();
  }

  protected async flush(): Promise<void> {
    await fs.promises.mkdir(this.directory, { recursive: true });
    for (const [name, bytes] of this.blobs) {
      const target = path.join(this.directory, name);
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, bytes);
    }
  }
}

/**
 * Builds a tar stream in memory. Headers carry fixed owner and time fields
 * so identical blobs give identical archives.
 */
async function packTar(blobs: ReadonlyArray<readonly [string, Uint8Array]>): Promise<Buffer> {
  const pack = tar.pack();
  const chunks: Buffer[] = [];
  const done = new Promise<Buffer>((resolve, reject) => {
    pack.on('data', (chunk: unknown) => {
      if (Buffer.isBuffer(chunk)) {
        chunks.push(chunk);
      } else {
        reject(new Error('tar stream emitted a non-buffer chunk'));
      }
    });
    pack.on('end', () => resolve(Buffer.concat(chunks)));
    pack.on('error', reject);
  });

  for (const [name, bytes] of blobs) {
    pack.entry(
      { name, size: bytes.byteLength, mode: 0o644, mtime: new Date(0), uid: 0, gid: 0, uname: '', gname: '' },
      Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    );
  }
  pack.finalize();
  return done;
}

class TarArchiveWriter extends BufferedArchiveWriter {
  constructor(private file: string, private compression: Compression = null) {
    super();
  }

  protected async flush(): Promise<void> {
    const archive = await packTar(this.blobs);
    const bytes = this.compression === 'gzip' ? zlib.gzipSync(archive) : archive;
    await fs.promises.mkdir(path.dirname(path.resolve(this.file)), { recursive: true });
    await fs.promises.writeFile(this.file, bytes);
  }
}

/**
 * Keeps blobs in memory; `entries()` lists them in insertion order.
 */
class MemoryArchiveWriter extends BufferedArchiveWriter {
  private done = false;

  get finalized(): boolean {
    return this.done;
  }

  entries(): ReadonlyArray<readonly [string, Uint8Array]> {
    return this.blobs;
  }

  get(name: string): Uint8Array | undefined {
    return this.blobs.find(([existing]) => existing === name)?.[1];
  }

  protected async flush(): Promise<void> {
    this.done = true;
  }
}

// ============================================================================
// Reading
// ============================================================================

/**
 * Inverse of `packTar`: regular files by name.
 */
async function unpackTar(archive: Uint8Array): Promise<Map<string, Uint8Array>> {
  const extract = tar.extract();
  const blobs = new Map<string, Uint8Array>();
  const done = new Promise<Map<string, Uint8Array>>((resolve, reject) => {
    extract.on('entry', (header, stream, next) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: unknown) => {
        if (Buffer.isBuffer(chunk)) {
          chunks.push(chunk);
        }
      });
      stream.on('end', () => {
        if (header.type === 'file') {
          blobs.set(header.name, Buffer.concat(chunks));
        }
        next();
      });
      stream.on('error', reject);
    });
    extract.on('finish', () => resolve(blobs));
    extract.on('error', reject);
  });

  extract.write(Buffer.from(archive.buffer, archive.byteOffset, archive.byteLength));
  extract.end();
  return done;
}

async function readDirectory(root: string, prefix: string, blobs: Map<string, Uint8Array>): Promise<void> {
  const entries = await fs.promises.readdir(path.join(root, prefix), { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const name = prefix === '' ? entry.name : `${prefix}/${entry.name}`;
    if (entry.isDirectory()) {
      await readDirectory(root, name, blobs);
    } else if (entry.isFile()) {
      blobs.set(name, await fs.promises.readFile(path.join(root, name)));
    }
  }
}

/**
 * Reads back what a directory or tar writer produced. Gzip is recognised by
 * its magic bytes.
 */
async function readArchive(target: string): Promise<Map<string, Uint8Array>> {
  const stat = await fs.promises.stat(target);
  if (stat.isDirectory()) {
    const blobs = new Map<string, Uint8Array>();
    await readDirectory(target, '', blobs);
    return blobs;
  }
  const bytes = await fs.promises.readFile(target);
  const gzipped = bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
  return unpackTar(gzipped ? zlib.gunzipSync(bytes) : bytes);
}

export { DirectoryArchiveWriter, TarArchiveWriter, MemoryArchiveWriter, packTar, unpackTar, readArchive };

export type { ArchiveWriter, Compression };
