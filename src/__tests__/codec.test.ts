import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { Bookmark, BookmarkFields } from '../types.js';
import { encodeBookmark, decodeBookmark } from '../codec.js';

function makeBookmark(overrides: Partial<BookmarkFields> = {}): Bookmark {
  return {
    id: 'bm-1',
    url: 'https://example.com/docs',
    title: 'Example docs',
    keywords: ['docs', 'guide'],
    tags: ['reference'],
    description: null,
    folderPath: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    lastModified: null,
    lastAccessed: null,
    deleted: false,
    deletedAt: null,
    faviconPath: null,
    screenshotPath: null,
    storageRoot: 'main',
    ...overrides,
  };
}

/** Top-level keys of a YAML mapping, in document order */
function topLevelKeys(yamlText: string): string[] {
  return yamlText.split('\n')
    .map(line => /^([a-z_]+):/.exec(line))
    .flatMap(match => (match ? [match[1]] : []));
}

describe('encodeBookmark', () => {
  it('writes snake_case keys in canonical order', () => {
    assert.deepStrictEqual(topLevelKeys(encodeBookmark(makeBookmark())), [
      'id', 'url', 'title', 'keywords', 'description', 'tags', 'folder_path',
      'created_at', 'last_modified', 'last_accessed', 'deleted', 'deleted_at',
      'favicon_path', 'screenshot_path', 'storage_root',
    ]);
  });

  it('writes absent values as null and the url as a plain string', () => {
    const lines = encodeBookmark(makeBookmark()).split('\n');
    assert.ok(lines.includes('id: bm-1'));
    assert.ok(lines.includes('url: https://example.com/docs'));
    assert.ok(lines.includes('description: null'));
    assert.ok(lines.includes('deleted: false'));
    assert.ok(lines.includes('storage_root: main'));
  });
});

describe('decodeBookmark', () => {
  it('round-trips an active bookmark', () => {
    const bookmark = makeBookmark({ description: 'Notes: with a colon\nand a second line', folderPath: 'dev/ts' });
    const decoded = decodeBookmark(encodeBookmark(bookmark));
    assert.ok(decoded.ok);
    if (!decoded.ok) return;
    assert.deepStrictEqual(decoded.bookmark, bookmark);
  });

  it('round-trips a tombstone with every optional field set', () => {
    const bookmark: Bookmark = {
      ...makeBookmark({
        lastModified: '2026-01-02T00:00:00.000Z',
        lastAccessed: '2026-01-03T00:00:00.000Z',
        faviconPath: 'favicons/example.com.ico',
        screenshotPath: 'screenshots/bm-1.png',
      }),
      deleted: true,
      deletedAt: '2026-01-04T00:00:00.000Z',
    };
    const decoded = decodeBookmark(encodeBookmark(bookmark));
    assert.ok(decoded.ok);
    if (!decoded.ok) return;
    assert.deepStrictEqual(decoded.bookmark, bookmark);
  });

  it('reports broken YAML as malformed', () => {
    const decoded = decodeBookmark('id: [unclosed');
    assert.strictEqual(decoded.ok, false);
    if (decoded.ok) return;
    assert.strictEqual(decoded.kind, 'malformed');
    assert.ok(decoded.message.startsWith('Invalid YAML:'), decoded.message);
  });

  it('reports an empty document as malformed', () => {
    const decoded = decodeBookmark('');
    assert.deepStrictEqual(decoded, { ok: false, kind: 'malformed', message: 'YAML content is empty' });
  });

  it('reports a sequence as malformed', () => {
    const decoded = decodeBookmark('- a\n- b\n');
    assert.deepStrictEqual(decoded, { ok: false, kind: 'malformed', message: 'YAML content is not a mapping' });
  });

  it('lists the missing required fields', () => {
    const decoded = decodeBookmark('id: bm-2\nurl: https://example.com\n');
    assert.deepStrictEqual(decoded, {
      ok: false,
      kind: 'missing-fields',
      missing: ['title', 'storage_root'],
      message: 'Missing required fields: title, storage_root',
    });
  });

  it('treats a null required field as missing', () => {
    const decoded = decodeBookmark('id: bm-2\nurl: https://example.com\ntitle: null\nstorage_root: main\n');
    assert.strictEqual(decoded.ok, false);
    if (decoded.ok) return;
    assert.strictEqual(decoded.kind, 'missing-fields');
  });

  it('accepts the legacy storage_location key', () => {
    const decoded = decodeBookmark([
      'id: bm-3',
      'url: https://example.com',
      'title: Legacy',
      'created_at: 2025-06-01T12:00:00.000Z',
      'storage_location: archive',
    ].join('\n'));
    assert.ok(decoded.ok);
    if (!decoded.ok) return;
    assert.strictEqual(decoded.bookmark.storageRoot, 'archive');
  });

  it('fills defaults for optional fields', () => {
    const decoded = decodeBookmark('id: bm-4\nurl: https://example.com\ntitle: Minimal\nstorage_root: main\n');
    assert.ok(decoded.ok);
    if (!decoded.ok) return;
    assert.deepStrictEqual(decoded.bookmark, {
      id: 'bm-4',
      url: 'https://example.com',
      title: 'Minimal',
      keywords: [],
      tags: [],
      description: null,
      folderPath: null,
      createdAt: '1970-01-01T00:00:00.000Z',
      lastModified: null,
      lastAccessed: null,
      deleted: false,
      deletedAt: null,
      faviconPath: null,
      screenshotPath: null,
      storageRoot: 'main',
    });
  });

  it('uses the caller fallback when created_at is missing', () => {
    const decoded = decodeBookmark(
      'id: bm-5\nurl: https://example.com\ntitle: Dated\nstorage_root: main\n',
      { fallbackCreatedAt: '2026-03-01T08:00:00.000Z' },
    );
    assert.ok(decoded.ok);
    if (!decoded.ok) return;
    assert.strictEqual(decoded.bookmark.createdAt, '2026-03-01T08:00:00.000Z');
  });

  it('reports rule violations as invalid', () => {
    const decoded = decodeBookmark([
      'id: bm-6',
      'url: https://example.com',
      'title: Too many keywords',
      'keywords: [a, b, c, d, e]',
      'created_at: 2026-01-01T00:00:00.000Z',
      'storage_root: main',
    ].join('\n'));
    assert.deepStrictEqual(decoded, {
      ok: false,
      kind: 'invalid',
      message: 'Invalid bookmark: keywords: at most 4 keywords allowed',
    });
  });

  it('rejects a deleted flag without deleted_at', () => {
    const decoded = decodeBookmark([
      'id: bm-7',
      'url: https://example.com',
      'title: Half deleted',
      'created_at: 2026-01-01T00:00:00.000Z',
      'deleted: true',
      'storage_root: main',
    ].join('\n'));
    assert.deepStrictEqual(decoded, {
      ok: false,
      kind: 'invalid',
      message: 'Invalid bookmark: deletedAt: deleted bookmarks must carry deletedAt',
    });
  });
});
