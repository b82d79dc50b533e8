import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import crypto from 'node:crypto';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FsSummaryCache, MemorySummaryCache, cacheKeyFor } from '../summary-cache.js';

const URLS = [
  'https://example.com/a',
  'https://example.com/b',
  'https://example.com/a?ref=digest',
  'http://example.com/a',
  'https://news.example.org/2026/10/19/kubernetes-release',
];

describe('cacheKeyFor', () => {
  it('is a 32 character lowercase hex digest', () => {
    expect(cacheKeyFor('https://example.com/a')).toMatch(/^[0-9a-f]{32}$/);
  });

  it('is the MD5 of the UTF-8 bytes of the URL', () => {
    const url = 'https://example.com/café';
    const expected = crypto.createHash('md5').update(Buffer.from(url, 'utf8')).digest('hex');
    expect(cacheKeyFor(url)).toBe(expected);
  });

  it('returns the same key on repeated calls', () => {
    for (const url of URLS) {
      expect(cacheKeyFor(url)).toBe(cacheKeyFor(url));
    }
  });

  it('gives distinct URLs distinct keys', () => {
    const keys = new Set(URLS.map(cacheKeyFor));
    expect(keys.size).toBe(URLS.length);
  });

  it('is shared by both cache implementations', () => {
    const url = URLS[0] ?? '';
    expect(new FsSummaryCache('/unused').keyFor(url)).toBe(new MemorySummaryCache().keyFor(url));
  });
});

describe('FsSummaryCache', () => {
  let root: string;
  let cache: FsSummaryCache;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'summary-cache-'));
    cache = new FsSummaryCache(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('returns undefined for a missing entry', async () => {
    expect(await cache.get(cache.keyFor('https://example.com/missing'))).toBeUndefined();
  });

  it('stores entries under a two-character shard directory', async () => {
    const key = cache.keyFor('https://example.com/a');
    await cache.put(key, 'A short summary.');

    const file = path.join(root, key.slice(0, 2), `${key}_summary.txt`);
    expect(cache.entryPath(key)).toBe(file);
    expect(await readFile(file, 'utf-8')).toBe('A short summary.');
    expect(await readdir(path.join(root, key.slice(0, 2)))).toEqual([`${key}_summary.txt`]);
  });

  it('reads back what was written, including an empty value', async () => {
    const key = cache.keyFor('https://example.com/empty');
    await cache.put(key, '');
    expect(await cache.get(key)).toBe('');
  });

  it('survives a new instance over the same root', async () => {
    const key = cache.keyFor('https://example.com/b');
    await cache.put(key, 'Persisted.');
    expect(await new FsSummaryCache(root).get(key)).toBe('Persisted.');
  });

  it('lets the last writer win', async () => {
    const key = cache.keyFor('https://example.com/race');
    await cache.put(key, 'first');
    await cache.put(key, 'second');
    expect(await cache.get(key)).toBe('second');
  });

  it('raises CacheIoError when the shard cannot be created', async () => {
    const blocked = new FsSummaryCache(path.join(root, 'file-root'));
    const key = blocked.keyFor('https://example.com/c');
    await writeFile(path.join(root, 'file-root'), 'not a directory');

    await expect(blocked.put(key, 'summary')).rejects.toMatchObject({ name: 'CacheIoError' });
  });
});

describe('MemorySummaryCache', () => {
  it('stores and returns values', async () => {
    const cache = new MemorySummaryCache();
    const key = cache.keyFor('https://example.com/a');
    expect(await cache.get(key)).toBeUndefined();
    await cache.put(key, 'value');
    expect(await cache.get(key)).toBe('value');
    expect(cache.size).toBe(1);
  });
});
