import { promises as fs } from 'fs';
import o from 'ospec';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { gzipSync } from 'zlib';
import { detectCompression, extractArchive, resolveInside } from '../archive.js';
import { ExtractionError } from '../errors.js';
import { createTar, exists, log, rejection, tempDir, thrown } from './util.js';

const Bzip2Fixture = fileURLToPath(new URL('./fixtures/pkg-2.0.tar.bz2', import.meta.url));

o.spec('Archive', () => {
  o.specTimeout(5000);
  let workDir = '';
  let destDir = '';

  o.beforeEach(async () => {
    workDir = await tempDir();
    destDir = path.join(workDir, 'build');
    await fs.mkdir(destDir);
  });

  o.afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  async function writeArchive(name: string, data: Buffer): Promise<string> {
    const filePath = path.join(workDir, name);
    await fs.writeFile(filePath, data);
    return filePath;
  }

  o('should detect compression from the leading bytes', async () => {
    const gz = await writeArchive('a.tar.gz', gzipSync(Buffer.from('hello')));
    const bz = await writeArchive('b.tar.bz2', Buffer.from('BZh91AY&SY'));
    const plain = await writeArchive('c.tar', Buffer.from('hello'));
    const short = await writeArchive('d.tar', Buffer.from('B'));

    o(await detectCompression(gz)).equals('gzip');
    o(await detectCompression(bz)).equals('bzip2');
    o(await detectCompression(plain)).equals('none');
    o(await detectCompression(short)).equals('none');
  });

  o('should only resolve paths inside the destination', () => {
    o(resolveInside('/build', 'gmp-6.3.0/configure')).equals(path.resolve('/build/gmp-6.3.0/configure'));
    o(resolveInside('/build', './gmp-6.3.0/')).equals(path.resolve('/build/gmp-6.3.0'));
    o(resolveInside('/build', 'gmp-6.3.0/../mpc-1.3.1')).equals(path.resolve('/build/mpc-1.3.1'));
    o(resolveInside('/build', '..build/x')).equals(path.resolve('/build/..build/x'));
    o(thrown(() => resolveInside('/build', '../etc/passwd')) instanceof ExtractionError).equals(true);
    o(thrown(() => resolveInside('/build', 'gmp/../../x')) instanceof ExtractionError).equals(true);
    o(thrown(() => resolveInside('/build', '/etc/passwd')) instanceof ExtractionError).equals(true);
  });

  o('should extract a gzip tar', async () => {
    const tarball = await createTar([
      { name: 'pkg-1.0/', type: 'directory' },
      { name: 'pkg-1.0/README', content: 'read me' },
      { name: 'pkg-1.0/bin/configure', content: '#!/bin/sh\n', mode: 0o755 },
      { name: 'pkg-1.0/LATEST', type: 'symlink', linkname: 'README' },
    ]);
    const archive = await writeArchive('pkg-1.0.tar.gz', gzipSync(tarball));

    const stats = await extractArchive(archive, destDir, log);
    o(stats).deepEquals({ files: 2, directories: 1, links: 1, skipped: 0 });

    o(await fs.readFile(path.join(destDir, 'pkg-1.0/README'), 'utf8')).equals('read me');
    o(await fs.readFile(path.join(destDir, 'pkg-1.0/bin/configure'), 'utf8')).equals('#!/bin/sh\n');
    o(await fs.readlink(path.join(destDir, 'pkg-1.0/LATEST'))).equals('README');
    const stat = await fs.stat(path.join(destDir, 'pkg-1.0/bin/configure'));
    o((stat.mode & 0o100) !== 0).equals(true);
  });

  o('should extract a bzip2 tar', async () => {
    const stats = await extractArchive(Bzip2Fixture, destDir, log);
    o(stats).deepEquals({ files: 1, directories: 1, links: 0, skipped: 0 });
    o(await fs.readFile(path.join(destDir, 'pkg-2.0/README'), 'utf8')).equals('packed with bzip2\n');
  });

  o('should extract an uncompressed tar with hard links', async () => {
    const tarball = await createTar([
      { name: 'pkg-1.0/a.txt', content: 'shared' },
      { name: 'pkg-1.0/b.txt', type: 'link', linkname: 'pkg-1.0/a.txt' },
    ]);
    const archive = await writeArchive('pkg-1.0.tar', tarball);

    const stats = await extractArchive(archive, destDir, log);
    o(stats).deepEquals({ files: 1, directories: 0, links: 1, skipped: 0 });
    o(await fs.readFile(path.join(destDir, 'pkg-1.0/b.txt'), 'utf8')).equals('shared');
  });

  o('should overwrite files from a previous extraction', async () => {
    await fs.mkdir(path.join(destDir, 'pkg-1.0'));
    await fs.writeFile(path.join(destDir, 'pkg-1.0/README'), 'edited by hand');
    const archive = await writeArchive(
      'pkg-1.0.tar.gz',
      gzipSync(await createTar([{ name: 'pkg-1.0/README', content: 'read me' }])),
    );

    await extractArchive(archive, destDir, log);
    o(await fs.readFile(path.join(destDir, 'pkg-1.0/README'), 'utf8')).equals('read me');
  });

  o('should replace entries whose kind changed since the last extraction', async () => {
    await fs.mkdir(path.join(destDir, 'pkg-1.0/docs'), { recursive: true });
    await fs.writeFile(path.join(destDir, 'pkg-1.0/docs/old.txt'), 'old');
    await fs.writeFile(path.join(destDir, 'pkg-1.0/bin'), 'was a file');
    const archive = await writeArchive(
      'pkg-1.0.tar',
      await createTar([
        { name: 'pkg-1.0/docs', content: 'now a file' },
        { name: 'pkg-1.0/bin', type: 'directory' },
        { name: 'pkg-1.0/bin/configure', content: '#!/bin/sh\n' },
      ]),
    );

    await extractArchive(archive, destDir, log);
    o(await fs.readFile(path.join(destDir, 'pkg-1.0/docs'), 'utf8')).equals('now a file');
    o((await fs.stat(path.join(destDir, 'pkg-1.0/bin'))).isDirectory()).equals(true);
    o(await fs.readFile(path.join(destDir, 'pkg-1.0/bin/configure'), 'utf8')).equals('#!/bin/sh\n');
  });

  o('should reject entries that escape the destination', async () => {
    const archive = await writeArchive(
      'evil.tar.gz',
      gzipSync(await createTar([{ name: '../evil.txt', content: 'gotcha' }])),
    );

    const err = await rejection(extractArchive(archive, destDir, log));
    o(err instanceof ExtractionError).equals(true);
    o(await exists(path.join(workDir, 'evil.txt'))).equals(false);
  });

  o('should reject symbolic links pointing outside the destination', async () => {
    const archive = await writeArchive(
      'evil.tar.gz',
      gzipSync(await createTar([{ name: 'pkg-1.0/etc', type: 'symlink', linkname: '../../etc' }])),
    );

    const err = await rejection(extractArchive(archive, destDir, log));
    o(err instanceof ExtractionError).equals(true);
    o(await exists(path.join(destDir, 'pkg-1.0/etc'))).equals(false);
  });

  o('should reject files written through chained symbolic links', async () => {
    const archive = await writeArchive(
      'evil.tar',
      await createTar([
        // each link looks inside on its own, together pkg/a is the parent of the destination
        { name: 'pkg/b/c', type: 'symlink', linkname: '../..' },
        { name: 'pkg/a', type: 'symlink', linkname: 'b/c/..' },
        { name: 'pkg/a/evil.txt', content: 'gotcha' },
      ]),
    );

    const err = await rejection(extractArchive(archive, destDir, log));
    o(err instanceof ExtractionError && err.path).equals('pkg/a/evil.txt');
    o(await exists(path.join(workDir, 'evil.txt'))).equals(false);
  });

  o('should reject hard links to files reached through symbolic links', async () => {
    await fs.writeFile(path.join(workDir, 'secret.txt'), 'secret');
    const archive = await writeArchive(
      'evil.tar',
      await createTar([
        { name: 'pkg/b/c', type: 'symlink', linkname: '../..' },
        { name: 'pkg/a', type: 'symlink', linkname: 'b/c/..' },
        { name: 'pkg/copy.txt', type: 'link', linkname: 'pkg/a/secret.txt' },
      ]),
    );

    const err = await rejection(extractArchive(archive, destDir, log));
    o(err instanceof ExtractionError && err.path).equals('pkg/copy.txt');
    o(await exists(path.join(destDir, 'pkg/copy.txt'))).equals(false);
  });

  o('should reject corrupt archives', async () => {
    const archive = await writeArchive('broken.tar.gz', gzipSync(Buffer.from('x')).subarray(0, 8));
    const err = await rejection(extractArchive(archive, destDir, log));
    o(err instanceof Error).equals(true);
  });
});
