import test, { after, before } from 'node:test';
import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { LocalPagedCache, fileIdForPath } from '../src/cache/localPagedCache';
import { PagedCacheError } from '../src/cache/types';
import { LocalFileSystemClient } from '../src/fs/localFileSystem';
import { FileSystemError, READ_EOF } from '../src/fs/types';

let rootDir = '';
let cacheDir = '';

before(async () => {
  rootDir = await mkdtemp(path.join(tmpdir(), 'worker-http-root-'));
  cacheDir = await mkdtemp(path.join(tmpdir(), 'worker-http-cache-'));
  await mkdir(path.join(rootDir, 'data', 'nested'), { recursive: true });
  await writeFile(path.join(rootDir, 'data', 'b.txt'), 'bravo');
  await writeFile(path.join(rootDir, 'data', 'a.txt'), 'alpha-one');
});

after(async () => {
  await rm(rootDir, { recursive: true, force: true });
  await rm(cacheDir, { recursive: true, force: true });
});

test('lists directory children in name order', async () => {
  const client = new LocalFileSystemClient(rootDir);
  const statuses = await client.listStatus('/data/');

  assert.deepEqual(
    statuses.map((status) => [status.path, status.folder, status.length]),
    [
      ['/data/a.txt', false, 9],
      ['/data/b.txt', false, 5],
      ['/data/nested', true, 0]
    ]
  );
  assert.equal(statuses[0].backingPath, path.join(rootDir, 'data', 'a.txt'));
  assert.equal(statuses[0].name, 'a.txt');
});

test('listing a file returns the file itself', async () => {
  const client = new LocalFileSystemClient(rootDir);
  const statuses = await client.listStatus('/data/a.txt');

  assert.equal(statuses.length, 1);
  assert.equal(statuses[0].path, '/data/a.txt');
});

test('reports missing paths and paths escaping the root', async () => {
  const client = new LocalFileSystemClient(rootDir);

  await assert.rejects(client.getStatus('/data/none.txt'), (err: unknown) => {
    assert.ok(err instanceof FileSystemError);
    assert.equal(err.code, 'NOT_FOUND');
    return true;
  });
  assert.equal(client.resolve('/../../etc'), path.join(rootDir, 'etc'));
});

test('position reader reads ranges and signals the end of the file', async () => {
  const client = new LocalFileSystemClient(rootDir);
  const reader = await client.openPositionReader('/data/a.txt');
  try {
    const target = Buffer.alloc(4);
    assert.equal(await reader.read(6, target, 4), 3);
    assert.equal(target.subarray(0, 3).toString('utf8'), 'one');
    assert.equal(await reader.read(9, target, 4), READ_EOF);
    assert.equal(await reader.read(0, target, 0), 0);
  } finally {
    await reader.close();
  }
});

test('file ids are the sha-256 of the logical path', () => {
  assert.equal(fileIdForPath('/data/a.txt'), createHash('sha256').update('/data/a.txt').digest('hex'));
  assert.match(fileIdForPath('/data/a.txt'), /^[0-9a-f]{64}$/);
  assert.notEqual(fileIdForPath('/data/a.txt'), fileIdForPath('/data/b.txt'));
});

test('paged cache registers files and locates pages in the source file', async () => {
  const cache = new LocalPagedCache({ cacheDir, pageSize: 4 });
  const fileId = await cache.registerFile('/data/a.txt');

  assert.equal(fileId, fileIdForPath('/data/a.txt'));
  assert.equal(await readFile(path.join(cacheDir, fileId, 'source'), 'utf8'), '/data/a.txt');
  assert.deepEqual(await cache.locatePage(fileId, 2), { path: '/data/a.txt', position: 8 });
  assert.equal(await cache.locatePage(fileIdForPath('/never/registered'), 0), null);
  assert.equal(await cache.locatePage('not-an-id', 0), null);
});

test('paged cache stores pages and rejects oversized ones', async () => {
  const cache = new LocalPagedCache({ cacheDir, pageSize: 4 });
  const fileId = await cache.registerFile('/data/b.txt');

  assert.equal(await cache.hasPage(fileId, 0), false);
  assert.equal(await cache.writePage(fileId, 0, Buffer.from('brav')), true);
  assert.equal(await cache.hasPage(fileId, 0), true);
  assert.equal(await readFile(path.join(cacheDir, fileId, '0.page'), 'utf8'), 'brav');
  await assert.rejects(cache.writePage(fileId, 1, Buffer.from('too long')), PagedCacheError);
  await assert.rejects(cache.writePage('abc', 0, Buffer.from('x')), PagedCacheError);
});

test('concurrent writes to one page all succeed and leave no staging files', async () => {
  const cache = new LocalPagedCache({ cacheDir, pageSize: 4 });
  const fileId = await cache.registerFile('/data/concurrent.bin');
  const payloads = Array.from({ length: 20 }, (_, index) => Buffer.from(String(index).padStart(4, '0')));

  const results = await Promise.all(payloads.map((payload) => cache.writePage(fileId, 0, payload)));

  assert.deepEqual(results, payloads.map(() => true));
  const stored = await readFile(path.join(cacheDir, fileId, '0.page'), 'utf8');
  assert.ok(payloads.some((payload) => payload.toString('utf8') === stored));
  assert.deepEqual((await readdir(path.join(cacheDir, fileId))).sort(), ['0.page', 'source']);
});

test('paged cache requires a positive page size', () => {
  assert.throws(() => new LocalPagedCache({ cacheDir, pageSize: 0 }), PagedCacheError);
});
