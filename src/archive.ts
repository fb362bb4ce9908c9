import { promises as fs, createReadStream } from 'fs';
import type { Stats } from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import * as tar from 'tar-stream';
import unbzip2 from 'unbzip2-stream';
import { createGunzip } from 'zlib';
import { ExtractionError } from './errors.js';
import type { LogType } from './log.js';

export type Compression = 'gzip' | 'bzip2' | 'none';

export interface ArchiveStats {
  files: number;
  directories: number;
  links: number;
  /** Devices, fifos and other entries that are not unpacked */
  skipped: number;
}

const GzipMagic = Buffer.from([0x1f, 0x8b]);
const Bzip2Magic = Buffer.from('BZh');

/** Sniff the compression of an archive from its first bytes */
export async function detectCompression(archiveFile: string): Promise<Compression> {
  const handle = await fs.open(archiveFile, 'r');
  try {
    const { bytesRead, buffer } = await handle.read(Buffer.alloc(3), 0, 3, 0);
    const head = buffer.subarray(0, bytesRead);
    if (head.subarray(0, GzipMagic.length).equals(GzipMagic)) return 'gzip';
    if (head.equals(Bzip2Magic)) return 'bzip2';
    return 'none';
  } finally {
    await handle.close();
  }
}

function createDecompressor(compression: Compression): NodeJS.ReadWriteStream | null {
  switch (compression) {
    case 'gzip':
      return createGunzip();
    case 'bzip2':
      return unbzip2();
    case 'none':
      return null;
  }
}

function assertInside(root: string, target: string, name: string): void {
  const relative = path.relative(root, target);
  if (relative === '..' || relative.startsWith('..' + path.sep) || path.isAbsolute(relative)) {
    throw new ExtractionError('Archive entry escapes the destination', name);
  }
}

/**
 * Resolve a path from an archive against the destination.
 *
 * @throws ExtractionError if the path resolves outside of `destDir`
 */
export function resolveInside(destDir: string, name: string): string {
  const root = path.resolve(destDir);
  const target = path.resolve(root, name);
  assertInside(root, target, name);
  return target;
}

async function lstatOrNull(target: string): Promise<Stats | null> {
  return fs.lstat(target).catch((err: NodeJS.ErrnoException) => {
    if (err.code === 'ENOENT') return null;
    throw err;
  });
}

/** Real path of `target`, following symbolic links of the longest part that already exists */
async function realPath(target: string): Promise<string> {
  const missing: string[] = [];
  let current = target;
  for (;;) {
    const real = await fs.realpath(current).catch((err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') return null;
      throw err;
    });
    if (real != null) return path.join(real, ...missing.reverse());
    const parent = path.dirname(current);
    if (parent === current) return target;
    missing.push(path.basename(current));
    current = parent;
  }
}

/**
 * Links unpacked earlier in the archive are already on disk, so a path that is inside `destDir` on paper can
 * still be redirected outside by the filesystem.
 *
 * @throws ExtractionError if `target` really resolves outside of `realRoot`
 */
async function confine(realRoot: string, target: string, name: string): Promise<void> {
  assertInside(realRoot, await realPath(target), name);
}

/** Remove whatever is at `target` so it can be replaced, an existing directory is kept when `keepDirectory` */
async function clearTarget(target: string, keepDirectory = false): Promise<void> {
  const stat = await lstatOrNull(target);
  if (stat == null) return;
  if (keepDirectory && stat.isDirectory()) return;
  await fs.rm(target, { recursive: true, force: true });
}

/** Skip over the body of an entry that has nothing to write */
function drain(stream: Readable): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.on('end', resolve);
    stream.on('error', reject);
    stream.resume();
  });
}

async function writeEntry(
  header: tar.Headers,
  stream: Readable,
  destDir: string,
  realRoot: string,
  stats: ArchiveStats,
): Promise<void> {
  const target = resolveInside(destDir, header.name);
  await confine(realRoot, path.dirname(target), header.name);

  switch (header.type ?? 'file') {
    case 'directory':
      await clearTarget(target, true);
      await fs.mkdir(target, { recursive: true });
      stats.directories++;
      return drain(stream);

    case 'file':
    case 'contiguous-file':
      await fs.mkdir(path.dirname(target), { recursive: true });
      await clearTarget(target);
      await fs.writeFile(target, stream, { mode: header.mode });
      stats.files++;
      return;

    case 'symlink': {
      const linkName = header.linkname;
      if (linkName == null || linkName === '') throw new ExtractionError('Symbolic link without a target', header.name);
      // Relative link targets resolve from the directory holding the link
      const linkTarget = resolveInside(destDir, path.join(path.dirname(header.name), linkName));
      await confine(realRoot, linkTarget, header.name);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await clearTarget(target);
      await fs.symlink(linkName, target);
      stats.links++;
      return drain(stream);
    }

    case 'link': {
      if (header.linkname == null || header.linkname === '') {
        throw new ExtractionError('Hard link without a target', header.name);
      }
      const source = resolveInside(destDir, header.linkname);
      await confine(realRoot, source, header.name);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await clearTarget(target);
      await fs.link(source, target);
      stats.links++;
      return drain(stream);
    }

    default:
      stats.skipped++;
      return drain(stream);
  }
}

/**
 * Unpack a tar archive, optionally gzip or bzip2 compressed, into `destDir`.
 *
 * Existing files are overwritten. Entries and link targets that would land outside of `destDir`, whether by name or
 * through links unpacked before them, abort the extraction.
 */
export async function extractArchive(archiveFile: string, destDir: string, log: LogType): Promise<ArchiveStats> {
  const compression = await detectCompression(archiveFile);
  const stats: ArchiveStats = { files: 0, directories: 0, links: 0, skipped: 0 };
  log.debug({ path: archiveFile, compression, destDir }, 'Archive:Open');

  const realRoot = await realPath(path.resolve(destDir));
  const extract = tar.extract();
  extract.on('entry', (header: tar.Headers, stream: Readable, next: (err?: unknown) => void) => {
    writeEntry(header, stream, destDir, realRoot, stats).then(
      () => next(),
      (err: unknown) => {
        stream.resume();
        next(err);
      },
    );
  });

  const input = createReadStream(archiveFile);
  const decompressor = createDecompressor(compression);
  if (decompressor == null) await pipeline(input, extract);
  else await pipeline(input, decompressor, extract);

  return stats;
}
