// YAML codec for bookmark records, one document per file.
//
// On-disk keys are snake_case so files stay readable next to the ones older
// releases wrote. URLs are plain strings and lists plain sequences, which
// keeps the files diffable.

import { parse, stringify } from 'yaml';
import type { Bookmark } from './types.js';
import { validateBookmark } from './bookmark.js';

/** Keys a file must carry to be a bookmark at all */
const REQUIRED_KEYS = ['id', 'url', 'title', 'storage_root'] as const;

/** Older files named the owning root `storage_location` */
const LEGACY_ROOT_KEY = 'storage_location';

/** Stand-in creation time when neither the file nor the caller supplies one; sorts oldest */
const UNKNOWN_CREATED_AT = new Date(0).toISOString();

/** Result of decoding one file. Failures say whether the file is corrupt or merely incomplete. */
export type DecodeResult =
  | { readonly ok: true; readonly bookmark: Bookmark }
  | { readonly ok: false; readonly kind: 'malformed'; readonly message: string }
  | { readonly ok: false; readonly kind: 'missing-fields'; readonly missing: readonly string[]; readonly message: string }
  | { readonly ok: false; readonly kind: 'invalid'; readonly message: string };

export type DecodeFailure = Extract<DecodeResult, { ok: false }>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function present(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/** Serialize a bookmark to its canonical YAML form (fixed key order) */
export function encodeBookmark(bookmark: Bookmark): string {
  const document = {
    id: bookmark.id,
    url: bookmark.url,
    title: bookmark.title,
    keywords: [...bookmark.keywords],
    description: bookmark.description,
    tags: [...bookmark.tags],
    folder_path: bookmark.folderPath,
    created_at: bookmark.createdAt,
    last_modified: bookmark.lastModified,
    last_accessed: bookmark.lastAccessed,
    deleted: bookmark.deleted,
    deleted_at: bookmark.deletedAt,
    favicon_path: bookmark.faviconPath,
    screenshot_path: bookmark.screenshotPath,
    storage_root: bookmark.storageRoot,
  };
  return stringify(document, { lineWidth: 0 });
}

export interface DecodeOptions {
  /** Used when the file has no created_at (the loader passes the file's mtime) */
  readonly fallbackCreatedAt?: string;
}

/** Parse a YAML document into a bookmark. Never throws. */
export function decodeBookmark(text: string, options: DecodeOptions = {}): DecodeResult {
  let data: unknown;
  try {
    data = parse(text);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, kind: 'malformed', message: `Invalid YAML: ${message}` };
  }

  if (!present(data)) {
    return { ok: false, kind: 'malformed', message: 'YAML content is empty' };
  }
  if (!isRecord(data)) {
    return { ok: false, kind: 'malformed', message: 'YAML content is not a mapping' };
  }

  const storageRoot = present(data['storage_root']) ? data['storage_root'] : data[LEGACY_ROOT_KEY];
  const missing = REQUIRED_KEYS.filter(key =>
    key === 'storage_root' ? !present(storageRoot) : !present(data[key]));
  if (missing.length > 0) {
    return {
      ok: false, kind: 'missing-fields', missing,
      message: `Missing required fields: ${missing.join(', ')}`,
    };
  }

  const result = validateBookmark({
    id: data['id'],
    url: data['url'],
    title: data['title'],
    keywords: data['keywords'] ?? [],
    tags: data['tags'] ?? [],
    description: data['description'] ?? null,
    folderPath: data['folder_path'] ?? null,
    createdAt: data['created_at'] ?? options.fallbackCreatedAt ?? UNKNOWN_CREATED_AT,
    lastModified: data['last_modified'] ?? null,
    lastAccessed: data['last_accessed'] ?? null,
    deleted: data['deleted'] ?? false,
    deletedAt: data['deleted_at'] ?? null,
    faviconPath: data['favicon_path'] ?? null,
    screenshotPath: data['screenshot_path'] ?? null,
    storageRoot,
  });

  if (!result.ok) {
    return { ok: false, kind: 'invalid', message: `Invalid bookmark: ${result.issues.join('; ')}` };
  }
  return { ok: true, bookmark: result.bookmark };
}
