import { promises as fs } from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { msSince } from './commands/common.js';
import { CachingDownloader, cacheFileName } from './download.js';
import { StampedExtractor } from './extract.js';
import { hashFile, isDigestEqual } from './hash.js';
import type { LogType } from './log.js';
import type { ManifestLoader } from './manifest.loader.js';
import { Tracer } from './tracer.js';

export interface ProvisionDirs {
  /** Where the cross compiler will be installed */
  destDir: string;
  /** Archives are extracted here */
  buildDir: string;
  /** Downloaded archives are cached here */
  downloadDir: string;
}

export interface ProvisionStats {
  /** Artifacts fetched over the network */
  downloaded: number;
  downloadedBytes: number;
  /** Artifacts served from the download cache */
  cached: number;
  cachedBytes: number;
  extracted: number;
  /** Extractions skipped because the marker matched */
  extractSkipped: number;
}

export type VerifyStatus = 'ok' | 'missing' | 'mismatch';

export interface VerifyResult {
  id: string;
  path: string;
  status: VerifyStatus;
}

export interface ProvisionerOptions {
  manifest: ManifestLoader;
  logger: LogType;
  downloader?: CachingDownloader;
  extractor?: StampedExtractor;
}

/** Create a directory and its parents if it does not exist */
export async function ensureDir(dir: string, log: LogType): Promise<void> {
  const stat = await fs.stat(dir).catch((err: NodeJS.ErrnoException) => {
    if (err.code === 'ENOENT') return null;
    throw err;
  });
  if (stat?.isDirectory()) return;
  log.info({ path: dir }, 'Directory:Create');
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Download every artifact in a manifest then extract the ones needed by a build stage.
 *
 * Everything runs one artifact at a time, the first failure stops the run.
 */
export class Provisioner {
  manifest: ManifestLoader;
  downloader: CachingDownloader;
  extractor: StampedExtractor;
  logger: LogType;

  constructor(opts: ProvisionerOptions) {
    this.manifest = opts.manifest;
    this.logger = opts.logger;
    this.downloader = opts.downloader ?? new CachingDownloader(opts.logger);
    this.extractor = opts.extractor ?? new StampedExtractor(opts.logger);
  }

  async run(stage: string, dirs: ProvisionDirs): Promise<ProvisionStats> {
    const startTime = performance.now();
    const toExtract = this.manifest.stage(stage);
    const stats: ProvisionStats = {
      downloaded: 0,
      downloadedBytes: 0,
      cached: 0,
      cachedBytes: 0,
      extracted: 0,
      extractSkipped: 0,
    };

    this.logger.info({ stage, ...dirs, artifacts: this.manifest.artifacts.size }, 'Provision:Start');
    await ensureDir(dirs.destDir, this.logger);
    await ensureDir(dirs.buildDir, this.logger);
    await ensureDir(dirs.downloadDir, this.logger);

    const archives = new Map<string, string>();
    for (const entry of this.manifest.artifacts.values()) {
      const res = await Tracer.span('artifact:download:' + entry.id, async (span) => {
        const res = await this.downloader.ensure(entry, dirs.downloadDir);
        span.setAttribute('source', res.source);
        span.setAttribute('size', res.size);
        return res;
      });
      archives.set(entry.id, res.path);
      if (res.source === 'network') {
        stats.downloaded++;
        stats.downloadedBytes += res.size;
      } else {
        stats.cached++;
        stats.cachedBytes += res.size;
      }
    }

    for (const entry of toExtract) {
      const archiveFile = archives.get(entry.id);
      if (archiveFile == null) throw new Error(`Archive for ${entry.id} was not downloaded`);
      const res = await Tracer.span('artifact:extract:' + entry.id, async (span) => {
        const res = await this.extractor.ensure(archiveFile, entry, dirs.buildDir);
        span.setAttribute('extracted', res.extracted);
        return res;
      });
      if (res.extracted) stats.extracted++;
      else stats.extractSkipped++;
    }

    this.logger.info({ stage, ...stats, duration: msSince(startTime) }, 'Provision:Done');
    return stats;
  }

  /** Hash every cached archive without touching the network */
  async verify(downloadDir: string): Promise<VerifyResult[]> {
    const results: VerifyResult[] = [];
    for (const entry of this.manifest.artifacts.values()) {
      const filePath = path.join(downloadDir, cacheFileName(entry));
      const digest = await hashFile(filePath).catch((err: NodeJS.ErrnoException) => {
        if (err.code === 'ENOENT') return null;
        throw err;
      });

      if (digest == null) {
        this.logger.warn({ artifact: entry.id, path: filePath }, 'Verify:Missing');
        results.push({ id: entry.id, path: filePath, status: 'missing' });
      } else if (isDigestEqual(digest, entry.expectedDigest)) {
        this.logger.debug({ artifact: entry.id, path: filePath }, 'Verify:Ok');
        results.push({ id: entry.id, path: filePath, status: 'ok' });
      } else {
        this.logger.warn(
          { artifact: entry.id, path: filePath, expected: entry.expectedDigest, got: digest },
          'Verify:Mismatch',
        );
        results.push({ id: entry.id, path: filePath, status: 'mismatch' });
      }
    }
    return results;
  }
}
