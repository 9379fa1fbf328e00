/**
 * Test suite for CoverImageService.
 * Run with: node --import tsx --test src/test/CoverImageService.test.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import fs from 'node:fs/promises';
import path from 'node:path';
import { TransientNetworkError } from '../shared/errors';
import { CoverImageService, coverFileName } from '../main/services/CoverImageService';
import type { FetchFunction } from '../main/services/catalogs/CatalogClient';
import { cleanupDirectory, getTempLibraryPath, makeIdentity } from './testHelpers';

describe('coverFileName', () => {
  it('should use the extension from the url path', () => {
    assert.strictEqual(coverFileName('anilist', '16498', 'https://images.example.test/a/cover.PNG?size=xl'), 'anilist_16498.png');
  });

  it('should normalize jpeg and sanitize ids', () => {
    assert.strictEqual(coverFileName('tvdb', 'abc/1', 'https://images.example.test/y.jpeg'), 'tvdb_abc_1.jpg');
  });

  it('should default to jpg', () => {
    assert.strictEqual(coverFileName('anilist', '1', 'https://images.example.test/cover'), 'anilist_1.jpg');
    assert.strictEqual(coverFileName('anilist', '1', 'not a url'), 'anilist_1.jpg');
  });

  it('should be empty without a catalog, id or url', () => {
    assert.strictEqual(coverFileName('', '1', 'https://images.example.test/a.jpg'), '');
    assert.strictEqual(coverFileName('anilist', '', 'https://images.example.test/a.jpg'), '');
    assert.strictEqual(coverFileName('anilist', '1', ''), '');
  });
});

describe('CoverImageService', () => {
  let directory: string;
  let requested: string[];
  let status: number;

  const fakeFetch: FetchFunction = async (input) => {
    requested.push(String(input));
    return new Response('image-bytes', { status });
  };

  beforeEach(() => {
    directory = getTempLibraryPath();
    requested = [];
    status = 200;
  });

  afterEach(async () => {
    await cleanupDirectory(directory);
  });

  it('should download a cover once', async () => {
    const covers = new CoverImageService(directory, { fetch: fakeFetch });
    const identity = makeIdentity();

    const first = await covers.ensureCover(identity);
    const second = await covers.ensureCover(identity);

    assert.strictEqual(first, path.join(directory, 'anilist_101.jpg'));
    assert.strictEqual(second, first);
    assert.deepStrictEqual(requested, ['https://images.example.test/101.jpg']);
    assert.strictEqual(await fs.readFile(path.join(directory, 'anilist_101.jpg'), 'utf-8'), 'image-bytes');
  });

  it('should skip identities without a cover', async () => {
    const covers = new CoverImageService(directory, { fetch: fakeFetch });
    assert.strictEqual(await covers.ensureCover(makeIdentity({ imageFileName: '' })), null);
    assert.strictEqual(covers.pathFor(makeIdentity({ imageFileName: '' })), null);
    assert.deepStrictEqual(requested, []);
  });

  it('should not write anything on a failed download', async () => {
    status = 404;
    const covers = new CoverImageService(directory, { fetch: fakeFetch });

    await assert.rejects(covers.ensureCover(makeIdentity()), TransientNetworkError);
    await assert.rejects(fs.access(path.join(directory, 'anilist_101.jpg')));
  });
});
