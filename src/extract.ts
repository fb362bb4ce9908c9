import { promises as fs } from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { extractArchive } from './archive.js';
import { msSince } from './commands/common.js';
import { ExtractionError } from './errors.js';
import { isDigestEqual } from './hash.js';
import type { LogType } from './log.js';
import type { ArtifactManifestEntry } from './manifest.js';

export const MarkerSuffix = '.extract.stamp.txt';

export interface ExtractResult {
  /** false when a marker proved the current archive was already extracted */
  extracted: boolean;
  /** Extracted top level directory */
  path: string;
}

export function markerPath(entry: ArtifactManifestEntry, destDir: string): string {
  return path.join(destDir, entry.extractedDirName + MarkerSuffix);
}

/**
 * Unpack an archive once per manifest digest.
 *
 * A marker file holding the digest is written next to the extracted directory only after the directory is
 * verified, the directory itself is never trusted on its own.
 */
export class StampedExtractor {
  logger: LogType;

  constructor(logger: LogType) {
    this.logger = logger;
  }

  /** Digest recorded by the last successful extraction, null if there is no readable marker */
  async readMarker(entry: ArtifactManifestEntry, destDir: string): Promise<string | null> {
    const filePath = markerPath(entry, destDir);
    try {
      // invalid utf8 is replaced rather than rejected, a garbled marker is simply stale
      const buf = await fs.readFile(filePath);
      return buf.toString('utf8').trim();
    } catch (err) {
      this.logger.debug({ artifact: entry.id, path: filePath, err }, 'Extract:Marker:Unreadable');
      return null;
    }
  }

  async writeMarker(entry: ArtifactManifestEntry, destDir: string): Promise<void> {
    await fs.writeFile(markerPath(entry, destDir), entry.expectedDigest + '\n');
  }

  async ensure(archiveFile: string, entry: ArtifactManifestEntry, destDir: string): Promise<ExtractResult> {
    const log = this.logger.child({ artifact: entry.id });
    const targetDir = path.join(destDir, entry.extractedDirName);

    const marker = await this.readMarker(entry, destDir);
    if (marker != null && isDigestEqual(marker, entry.expectedDigest)) {
      log.info({ path: targetDir }, 'Extract:Skip');
      return { extracted: false, path: targetDir };
    }
    if (marker != null) log.info({ expected: entry.expectedDigest, got: marker }, 'Extract:Marker:Stale');

    const startTime = performance.now();
    log.info({ archive: archiveFile, destDir }, 'Extract:Start');
    const stats = await extractArchive(archiveFile, destDir, log).catch((err: unknown) => {
      if (err instanceof ExtractionError && err.artifactId == null) {
        throw new ExtractionError(err.reason, err.path, entry.id);
      }
      throw err;
    });

    const stat = await fs.stat(targetDir).catch((err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') return null;
      throw err;
    });
    if (stat == null || !stat.isDirectory()) {
      log.error({ archive: archiveFile, path: targetDir }, 'Extract:Missing');
      throw new ExtractionError('Archive did not contain the expected directory', targetDir, entry.id);
    }

    await this.writeMarker(entry, destDir);
    log.info({ path: targetDir, ...stats, duration: msSince(startTime) }, 'Extract:Done');
    return { extracted: true, path: targetDir };
  }
}
