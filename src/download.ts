import { promises as fs, createWriteStream } from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { pipeline } from 'stream/promises';
import { msSince } from './commands/common.js';
import { IntegrityError, ManifestError } from './errors.js';
import { hashFile, HashVerifier, isDigestEqual } from './hash.js';
import { fetchStream, type HttpFetcher } from './http.js';
import type { LogType } from './log.js';
import type { ArtifactManifestEntry, DownloadResult } from './manifest.js';

/** Name of the cached copy of an artifact: the last path segment of its url */
export function cacheFileName(entry: ArtifactManifestEntry): string {
  const segments = new URL(entry.url).pathname.split('/');
  const name = decodeURIComponent(segments[segments.length - 1] ?? '');
  if (name === '' || name === '.' || name === '..') {
    throw new ManifestError(`${entry.id}: url has no file name ${entry.url}`, entry.url);
  }
  return name;
}

async function isFile(filePath: string): Promise<boolean> {
  const stat = await fs.stat(filePath).catch((err: NodeJS.ErrnoException) => {
    if (err.code === 'ENOENT') return null;
    throw err;
  });
  return stat != null && stat.isFile();
}

/**
 * Keep one verified copy of every artifact in a cache directory.
 *
 * A cached file is hashed before it is trusted, a mismatch is treated the same as a missing file
 * and the file is overwritten by a fresh download.
 */
export class CachingDownloader {
  fetcher: HttpFetcher;
  logger: LogType;

  constructor(logger: LogType, fetcher: HttpFetcher = fetchStream) {
    this.logger = logger;
    this.fetcher = fetcher;
  }

  async ensure(entry: ArtifactManifestEntry, cacheDir: string): Promise<DownloadResult> {
    const filePath = path.join(cacheDir, cacheFileName(entry));
    const log = this.logger.child({ artifact: entry.id });

    if (await isFile(filePath)) {
      log.debug({ path: filePath }, 'Download:Cache:Verify');
      const digest = await hashFile(filePath);
      if (isDigestEqual(digest, entry.expectedDigest)) {
        const { size } = await fs.stat(filePath);
        log.info({ path: filePath, size }, 'Download:Cache:Hit');
        return { path: filePath, digest, size, source: 'cache' };
      }
      log.warn({ path: filePath, expected: entry.expectedDigest, got: digest }, 'Download:Cache:Mismatch');
    }

    const startTime = performance.now();
    log.info({ url: entry.url, path: filePath }, 'Download:Start');
    const hash = new HashVerifier();
    const source = await this.fetcher(entry.url);
    source.on('data', (chunk: Buffer) => hash.update(chunk));
    await pipeline(source, createWriteStream(filePath));

    const digest = hash.digest();
    if (!isDigestEqual(digest, entry.expectedDigest)) {
      log.error({ url: entry.url, path: filePath, expected: entry.expectedDigest, got: digest }, 'Download:Mismatch');
      throw new IntegrityError(entry.id, entry.url, entry.expectedDigest, digest);
    }

    log.info({ url: entry.url, path: filePath, size: hash.size, duration: msSince(startTime) }, 'Download:Done');
    return { path: filePath, digest, size: hash.size, source: 'network' };
  }
}
