import { createHash, type Hash } from 'crypto';
import { createReadStream } from 'fs';
import type { Readable } from 'stream';

export const HashAlgorithm = 'sha512';
/** Length of a hex encoded SHA-512 digest */
export const DigestLength = 128;

/** Incremental SHA-512, digests are lower case hex */
export class HashVerifier {
  private hash: Hash = createHash(HashAlgorithm);
  size = 0;

  update(chunk: Buffer): void {
    this.hash.update(chunk);
    this.size += chunk.length;
  }

  digest(): string {
    return this.hash.digest('hex');
  }
}

export async function hashStream(stream: Readable): Promise<string> {
  const verifier = new HashVerifier();
  return new Promise((resolve, reject) => {
    stream.on('data', (chunk: Buffer) => verifier.update(chunk));
    stream.on('end', () => resolve(verifier.digest()));
    stream.on('error', (err) => reject(err));
  });
}

export function hashFile(filePath: string): Promise<string> {
  return hashStream(createReadStream(filePath));
}

export function normalizeDigest(digest: string): string {
  return digest.trim().toLowerCase();
}

export function isDigestEqual(a: string, b: string): boolean {
  return normalizeDigest(a) === normalizeDigest(b);
}
