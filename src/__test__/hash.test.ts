import { promises as fs } from 'fs';
import o from 'ospec';
import * as path from 'path';
import { Readable } from 'stream';
import { hashFile, hashStream, HashVerifier, isDigestEqual, normalizeDigest } from '../hash.js';
import { rejection, tempDir } from './util.js';

const HelloDigest =
  '9b71d224bd62f3785d96d46ad3ea3d73319bfbc2890caadae2dff72519673ca72323c3d99ba5c11d7c7acc6e14b8c5da0c4663475c2e5c3adef46f73bcdec043';
const EmptyDigest =
  'cf83e1357eefb8bdf1542850d66d8007d620e4050b5715dc83f4a921d36ce9ce47d0d13c5d85f2b0ff8318d2877eec2f63b931bd47417a81a538327af927da3e';

o.spec('HashVerifier', () => {
  o.specTimeout(2000);

  o('should produce a lower case hex sha512', () => {
    const verifier = new HashVerifier();
    verifier.update(Buffer.from('hello'));
    o(verifier.digest()).equals(HelloDigest);
  });

  o('should count the bytes it has seen', () => {
    const verifier = new HashVerifier();
    verifier.update(Buffer.from('hel'));
    verifier.update(Buffer.from('lo'));
    o(verifier.size).equals(5);
    o(verifier.digest()).equals(HelloDigest);
  });

  o('should hash a stream split over many chunks', async () => {
    const stream = Readable.from([Buffer.from('h'), Buffer.from('ell'), Buffer.from('o')]);
    o(await hashStream(stream)).equals(HelloDigest);
  });

  o('should hash an empty stream', async () => {
    o(await hashStream(Readable.from([]))).equals(EmptyDigest);
  });

  o('should reject when the stream fails', async () => {
    const stream = new Readable({
      read(): void {
        this.destroy(new Error('disk on fire'));
      },
    });
    const err = await rejection(hashStream(stream));
    o(err instanceof Error && err.message).equals('disk on fire');
  });

  o('should hash a file', async () => {
    const dir = await tempDir();
    const filePath = path.join(dir, 'hello.txt');
    await fs.writeFile(filePath, 'hello');
    o(await hashFile(filePath)).equals(HelloDigest);
    await fs.rm(dir, { recursive: true, force: true });
  });

  o('should compare digests ignoring case and whitespace', () => {
    o(isDigestEqual(HelloDigest.toUpperCase(), HelloDigest)).equals(true);
    o(isDigestEqual(HelloDigest + '\n', HelloDigest)).equals(true);
    o(isDigestEqual(EmptyDigest, HelloDigest)).equals(false);
    o(normalizeDigest(' ABC\n')).equals('abc');
  });
});
