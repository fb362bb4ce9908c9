import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pino } from 'pino';
import * as tar from 'tar-stream';
import type { LogType } from '../log.js';

export const log: LogType = pino({ level: 'silent' });

export function sha512(data: Buffer | string): string {
  return createHash('sha512').update(data).digest('hex');
}

export function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'cts-test-'));
}

export async function exists(filePath: string): Promise<boolean> {
  return fs.lstat(filePath).then(
    () => true,
    () => false,
  );
}

/** Capture a rejection so it can be asserted on */
export async function rejection(p: Promise<unknown>): Promise<unknown> {
  return p.then(
    () => null,
    (err: unknown) => err,
  );
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
}

export interface TestEntry {
  name: string;
  type?: 'file' | 'directory' | 'symlink' | 'link';
  content?: string;
  linkname?: string;
  mode?: number;
}

/** Build an uncompressed tar in memory */
export function createTar(entries: TestEntry[]): Promise<Buffer> {
  const pack = tar.pack();
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    pack.on('data', (chunk: Buffer) => chunks.push(chunk));
    pack.on('end', () => resolve(Buffer.concat(chunks)));
    pack.on('error', reject);

    for (const entry of entries) {
      const type = entry.type ?? 'file';
      const header: tar.Headers = {
        name: entry.name,
        type,
        mode: entry.mode ?? (type === 'directory' ? 0o755 : 0o644),
        linkname: entry.linkname,
      };
      const onEntry = (err?: Error | null): void => {
        if (err) pack.destroy(err);
      };
      // only files carry a body, links and directories are header only
      if (type === 'file') pack.entry(header, entry.content ?? '', onEntry);
      else pack.entry(header, onEntry);
    }
    pack.finalize();
  });
}
