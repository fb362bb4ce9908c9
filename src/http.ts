import axios from 'axios';
import { createReadStream } from 'fs';
import type { Readable } from 'stream';
import { fileURLToPath } from 'url';
import { getVersion } from './version.js';

/** Open a stream of the bytes at a url */
export type HttpFetcher = (url: string) => Promise<Readable>;

const UserAgent = `cross-toolchain-sources/${getVersion().version ?? 'unknown'}`;

/**
 * Fetch a url over http(s), `file:` urls are read from the local filesystem
 *
 * Non 2xx responses reject.
 */
export const fetchStream: HttpFetcher = async (url: string): Promise<Readable> => {
  const parsed = new URL(url);
  if (parsed.protocol === 'file:') return createReadStream(fileURLToPath(parsed));
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Unsupported protocol "${parsed.protocol}" for ${url}`);
  }

  const res = await axios.get<Readable>(url, {
    responseType: 'stream',
    headers: { 'User-Agent': UserAgent },
    maxRedirects: 5,
  });
  return res.data;
};
