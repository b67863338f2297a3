// Bookmark lifecycle: create, update, soft delete, restore, purge, track access.
//
//   Active --delete--> SoftDeleted --restore--> Active
//   SoftDeleted --purge--> Gone
//
// Purge is only reachable from SoftDeleted: losing a record permanently always
// takes two deliberate steps. Every mutation reads the current record first, so
// each transition is a function of the prior state plus the caller's input.
// Expected refusals come back as LifecycleFailure values; disk and lock
// failures still throw StorageError.

import { randomUUID } from 'crypto';
import type { Bookmark, Clock, ManagerListFilter } from './types.js';
import { realClock } from './types.js';
import { validateBookmark } from './bookmark.js';
import { ValidationError } from './errors.js';
import type { StorageManager } from './storage-manager.js';

/** Why a lifecycle operation refused to act */
export type LifecycleFailure =
  | { readonly kind: 'not-found'; readonly id: string; readonly message: string }
  | { readonly kind: 'validation'; readonly issues: readonly string[]; readonly message: string }
  | { readonly kind: 'no-storage-root'; readonly root: string | null; readonly message: string }
  | { readonly kind: 'already-deleted'; readonly id: string; readonly message: string }
  | { readonly kind: 'not-deleted'; readonly id: string; readonly message: string }
  | { readonly kind: 'safety-violation'; readonly id: string; readonly message: string };

export type LifecycleResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: LifecycleFailure };

export interface CreateBookmarkInput {
  readonly url: string;
  readonly title: string;
  /** Target root; defaults to the manager's current root */
  readonly root?: string;
  readonly keywords?: readonly string[];
  readonly tags?: readonly string[];
  readonly description?: string | null;
  readonly folderPath?: string | null;
  readonly faviconPath?: string | null;
  readonly screenshotPath?: string | null;
}

/** Fields an update may change. Omitted fields stay as they are; null clears a nullable field. */
export interface BookmarkPatch {
  readonly url?: string;
  readonly title?: string;
  readonly keywords?: readonly string[];
  readonly tags?: readonly string[];
  readonly description?: string | null;
  readonly folderPath?: string | null;
  readonly faviconPath?: string | null;
  readonly screenshotPath?: string | null;
}

function ok<T>(value: T): LifecycleResult<T> {
  return { ok: true, value };
}

function fail<T>(failure: LifecycleFailure): LifecycleResult<T> {
  return { ok: false, failure };
}

function invalid<T>(issues: readonly string[]): LifecycleResult<T> {
  return fail({ kind: 'validation', issues, message: `Invalid bookmark: ${issues.join('; ')}` });
}

function pick<T>(override: T | undefined, current: T): T {
  return override === undefined ? current : override;
}

export class BookmarkService {
  private readonly storage: StorageManager;
  private readonly clock: Clock;

  constructor(storage: StorageManager, options: { readonly clock?: Clock } = {}) {
    this.storage = storage;
    this.clock = options.clock ?? realClock;
  }

  /** Create a bookmark with a fresh id in the given (or current) root */
  async create(input: CreateBookmarkInput): Promise<LifecycleResult<Bookmark>> {
    if (input.title.trim().length === 0) {
      return invalid(['title: title cannot be empty or whitespace']);
    }

    const root = input.root ?? this.storage.currentRootName();
    if (root === null) {
      return fail({ kind: 'no-storage-root', root: null, message: 'No storage root is configured' });
    }
    if (!this.storage.getRoot(root)) {
      return fail({ kind: 'no-storage-root', root, message: `Storage not found: ${root}` });
    }

    const result = await this.persist({
      id: randomUUID(),
      url: input.url,
      title: input.title,
      keywords: input.keywords ?? [],
      tags: input.tags ?? [],
      description: input.description ?? null,
      folderPath: input.folderPath ?? null,
      createdAt: this.clock.isoNow(),
      lastModified: null,
      lastAccessed: null,
      deleted: false,
      deletedAt: null,
      faviconPath: input.faviconPath ?? null,
      screenshotPath: input.screenshotPath ?? null,
      storageRoot: root,
    });

    if (result.ok) {
      process.stderr.write(`[bookmark-store] Created bookmark ${result.value.id}: ${result.value.title}\n`);
    }
    return result;
  }

  get(id: string, root?: string): LifecycleResult<Bookmark> {
    const bookmark = this.storage.get(id, root);
    if (!bookmark) {
      return fail({ kind: 'not-found', id, message: `Bookmark not found: ${id}` });
    }
    return ok(bookmark);
  }

  list(filter: ManagerListFilter = {}): Bookmark[] {
    return this.storage.list(filter);
  }

  /** Active bookmarks already saved under this URL, across all roots */
  findByUrl(url: string, limit?: number): Bookmark[] {
    return this.storage.findByUrl(url, limit);
  }

  /** Apply field overrides and stamp lastModified. id and storageRoot never change. */
  async update(id: string, patch: BookmarkPatch, root?: string): Promise<LifecycleResult<Bookmark>> {
    const found = this.get(id, root);
    if (!found.ok) return found;
    const current = found.value;

    return this.persist({
      ...current,
      url: pick(patch.url, current.url),
      title: pick(patch.title, current.title),
      keywords: pick(patch.keywords, current.keywords),
      tags: pick(patch.tags, current.tags),
      description: pick(patch.description, current.description),
      folderPath: pick(patch.folderPath, current.folderPath),
      faviconPath: pick(patch.faviconPath, current.faviconPath),
      screenshotPath: pick(patch.screenshotPath, current.screenshotPath),
      lastModified: this.clock.isoNow(),
    });
  }

  /** Soft delete: the record stays on disk as a tombstone until purged */
  async delete(id: string, root?: string): Promise<LifecycleResult<Bookmark>> {
    const found = this.get(id, root);
    if (!found.ok) return found;
    const current = found.value;

    if (current.deleted) {
      return fail({ kind: 'already-deleted', id, message: `Bookmark ${id} is already deleted` });
    }

    const result = await this.persist({ ...current, deleted: true, deletedAt: this.clock.isoNow() });
    if (result.ok) process.stderr.write(`[bookmark-store] Soft deleted bookmark ${id}\n`);
    return result;
  }

  async restore(id: string, root?: string): Promise<LifecycleResult<Bookmark>> {
    const found = this.get(id, root);
    if (!found.ok) return found;
    const current = found.value;

    if (!current.deleted) {
      return fail({ kind: 'not-deleted', id, message: `Bookmark ${id} is not deleted` });
    }

    const result = await this.persist({ ...current, deleted: false, deletedAt: null });
    if (result.ok) process.stderr.write(`[bookmark-store] Restored bookmark ${id}\n`);
    return result;
  }

  /** Permanently remove a soft-deleted bookmark. Returns the record as it was. */
  async purge(id: string, root?: string): Promise<LifecycleResult<Bookmark>> {
    const found = this.get(id, root);
    if (!found.ok) return found;
    const current = found.value;

    if (!current.deleted) {
      return fail({
        kind: 'safety-violation', id,
        message: `Bookmark ${id} must be soft-deleted before it can be purged`,
      });
    }

    await this.storage.hardDelete(id, current.storageRoot);
    process.stderr.write(`[bookmark-store] Hard deleted bookmark ${id} permanently\n`);
    return ok(current);
  }

  /** Stamp lastAccessed only; lastModified is left alone */
  async trackAccess(id: string, root?: string): Promise<LifecycleResult<Bookmark>> {
    const found = this.get(id, root);
    if (!found.ok) return found;
    return this.persist({ ...found.value, lastAccessed: this.clock.isoNow() });
  }

  // --- Private helpers ---

  /** Validate, then save into the bookmark's own root */
  private async persist(candidate: Bookmark): Promise<LifecycleResult<Bookmark>> {
    const validated = validateBookmark(candidate);
    if (!validated.ok) return invalid(validated.issues);

    try {
      return ok(await this.storage.save(validated.bookmark, validated.bookmark.storageRoot));
    } catch (error: unknown) {
      if (error instanceof ValidationError) return invalid(error.issues);
      throw error;
    }
  }
}
