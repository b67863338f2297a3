// Storage manager: owns one index per configured root.
//
// Roots are independent: each has its own directory tree, index, error log
// and conflict log. Writes go through the per-file lock and touch the index
// only after the file is on disk, so a failed save leaves readers seeing
// exactly what they saw before. A record file is replaced by renaming a
// finished scratch file over it, never rewritten in place.

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import type {
  Bookmark, ConflictRecord, LoadError, ManagerListFilter, RootStats, StorageRoot, StoreSettings,
} from './types.js';
import { cloneBookmark, comparableUrl, isValidRecordId, parseRootName, validateBookmark } from './bookmark.js';
import { encodeBookmark } from './codec.js';
import { withFileLock, type FileLockOptions } from './file-lock.js';
import {
  StorageIndex, describeConflict, loadStorageIndex, recordFileName, recordsDirFor,
} from './storage-index.js';
import { LockTimeoutError, StorageError, ValidationError, errnoCode, errorMessage } from './errors.js';
import {
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_LOCK_POLL_INTERVAL_MS,
  DEFAULT_RECENT_CONFLICT_LIMIT,
  DUPLICATE_URL_LIMIT,
  PROBE_FILE,
  TEMP_SUFFIX,
} from './thresholds.js';

/** Check that a root exists, is a directory, and can be read and written */
export async function validateRootAccess(root: StorageRoot): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(root.path)).isDirectory();
  } catch (error: unknown) {
    if (errnoCode(error) === 'ENOENT') {
      throw new StorageError('root-missing', `Storage path does not exist: ${root.path}`, { cause: error });
    }
    throw new StorageError('root-inaccessible', `Cannot access storage ${root.path}: ${errorMessage(error)}`, { cause: error });
  }
  if (!isDirectory) {
    throw new StorageError('root-not-directory', `Storage path is not a directory: ${root.path}`);
  }

  const probe = path.join(root.path, PROBE_FILE);
  try {
    await fs.readdir(root.path);
    await fs.writeFile(probe, '', 'utf-8');
    await fs.unlink(probe);
  } catch (error: unknown) {
    const code = errnoCode(error);
    const reason = code === 'EACCES' || code === 'EPERM' ? 'Permission denied' : errorMessage(error);
    throw new StorageError('root-inaccessible', `Cannot access storage ${root.path}: ${reason}`, { cause: error });
  }
}

export class StorageManager {
  private roots = new Map<string, StorageRoot>();
  private indices = new Map<string, StorageIndex>();
  private cachedCurrentRoot: string | null = null;
  private readonly lockOptions: FileLockOptions;
  private readonly recentConflictLimit: number;

  constructor(settings: StoreSettings = {}) {
    this.lockOptions = {
      timeoutMs: settings.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS,
      pollIntervalMs: settings.lockPollIntervalMs ?? DEFAULT_LOCK_POLL_INTERVAL_MS,
    };
    this.recentConflictLimit = settings.recentConflictLimit ?? DEFAULT_RECENT_CONFLICT_LIMIT;
  }

  /** Validate and load every root in order. The first unusable root aborts the
   *  whole call and the manager keeps whatever state it had before. */
  async initialize(roots: readonly StorageRoot[]): Promise<void> {
    const nextRoots = new Map<string, StorageRoot>();
    const nextIndices = new Map<string, StorageIndex>();

    for (const root of roots) {
      if (parseRootName(root.name) === null) {
        throw new StorageError('invalid-root', `Invalid storage name "${root.name}": use letters, numbers, dashes and underscores`, { root: root.name });
      }
      if (nextRoots.has(root.name)) {
        throw new StorageError('duplicate-root', `Storage "${root.name}" is configured more than once`, { root: root.name });
      }
      try {
        await validateRootAccess(root);
        nextIndices.set(root.name, await loadStorageIndex(root.name, root.path));
      } catch (error: unknown) {
        process.stderr.write(`[bookmark-store] Failed to initialize storage ${root.name}: ${errorMessage(error)}\n`);
        if (error instanceof StorageError && error.root === undefined) {
          throw new StorageError(error.kind, error.message, { cause: error.cause, root: root.name });
        }
        throw error;
      }
      nextRoots.set(root.name, root);
    }

    // Atomic swap
    this.roots = nextRoots;
    this.indices = nextIndices;
    this.cachedCurrentRoot = this.selectCurrentRoot();
  }

  /** Rebuild one root's index from disk, e.g. after files were edited by hand */
  async reloadRoot(rootName: string): Promise<RootStats> {
    const { root } = this.requireRoot(rootName);
    await validateRootAccess(root);
    const index = await loadStorageIndex(root.name, root.path);
    this.indices.set(root.name, index);
    return index.stats();
  }

  /** Persist a bookmark into a root as `<id>.yaml`. Validation runs before any
   *  disk access; the index changes only once the file has been written. Other
   *  files still holding this id (an import under another name, a conflict
   *  loser) are removed afterwards so they cannot win the next load. */
  async save(bookmark: Bookmark, rootName: string): Promise<Bookmark> {
    const validated = validateBookmark(bookmark);
    if (!validated.ok) throw new ValidationError(validated.issues);
    const record = validated.bookmark;
    if (record.storageRoot !== rootName) {
      throw new ValidationError([`storageRoot: bookmark belongs to "${record.storageRoot}", not "${rootName}"`]);
    }

    const { root } = this.requireRoot(rootName);
    const recordsDir = recordsDirFor(root.path);
    const file = recordFileName(record.id);
    const filePath = path.join(recordsDir, file);

    try {
      await withFileLock(filePath, this.lockOptions, async () => {
        let text: string;
        try {
          text = encodeBookmark(record);
        } catch (error: unknown) {
          throw new StorageError('encode-failed', `Failed to encode bookmark ${record.id}: ${errorMessage(error)}`, { cause: error });
        }
        await this.replaceFile(filePath, text);
        // Resolve again: reloadRoot() may have swapped the index while we waited
        const index = this.indices.get(rootName);
        if (!index) return;
        index.put(record, file);
        await this.removeShadowFiles(index, recordsDir, record.id);
      });
    } catch (error: unknown) {
      throw this.toStorageError(error, `save ${record.id}`);
    }

    return cloneBookmark(record);
  }

  /** Look a bookmark up in one root, or in every root in configured order */
  get(id: string, rootName?: string): Bookmark | undefined {
    if (rootName !== undefined) {
      return this.indices.get(rootName)?.get(id);
    }
    for (const index of this.indices.values()) {
      const found = index.get(id);
      if (found) return found;
    }
    return undefined;
  }

  list(filter: ManagerListFilter = {}): Bookmark[] {
    const { rootName, ...indexFilter } = filter;
    if (rootName !== undefined) {
      return this.indices.get(rootName)?.list(indexFilter) ?? [];
    }
    return Array.from(this.indices.values()).flatMap(index => index.list(indexFilter));
  }

  /** Permanently remove a bookmark's file and index entry. A missing file is fine. */
  async hardDelete(id: string, rootName: string): Promise<void> {
    if (!isValidRecordId(id)) throw new ValidationError([`id: "${id}" is not a valid bookmark id`]);
    const { root, index } = this.requireRoot(rootName);
    const recordsDir = recordsDirFor(root.path);
    const file = recordFileName(id);
    const filePath = path.join(recordsDir, file);

    // The indexed copy may have been loaded from a differently named file,
    // and conflict losers for the id would otherwise come back on the next load
    const files = new Set([file, ...index.filesFor(id)]);

    try {
      await withFileLock(filePath, this.lockOptions, async () => {
        for (const name of files) {
          try {
            await fs.unlink(path.join(recordsDir, name));
          } catch (error: unknown) {
            if (errnoCode(error) !== 'ENOENT') throw error;
          }
        }
        this.indices.get(rootName)?.remove(id);
      });
    } catch (error: unknown) {
      throw this.toStorageError(error, `delete ${id}`);
    }
  }

  /** Active bookmarks in any root whose URL matches, in configured root order */
  findByUrl(url: string, limit: number = DUPLICATE_URL_LIMIT): Bookmark[] {
    const wanted = comparableUrl(url);
    const matches: Bookmark[] = [];
    if (limit <= 0) return matches;
    for (const index of this.indices.values()) {
      for (const bookmark of index.list()) {
        if (comparableUrl(bookmark.url) !== wanted) continue;
        matches.push(bookmark);
        if (matches.length >= limit) return matches;
      }
    }
    return matches;
  }

  stats(rootName: string): RootStats {
    return this.requireRoot(rootName).index.stats();
  }

  loadErrors(rootName: string): readonly LoadError[] {
    return this.requireRoot(rootName).index.loadErrors();
  }

  conflicts(rootName: string): readonly ConflictRecord[] {
    return this.requireRoot(rootName).index.conflicts();
  }

  rootNames(): readonly string[] {
    return Array.from(this.roots.keys());
  }

  getRoot(rootName: string): StorageRoot | undefined {
    return this.roots.get(rootName);
  }

  /** Filesystem path of a root; favicon and screenshot paths are relative to it */
  rootPath(rootName: string): string {
    return this.requireRoot(rootName).root.path;
  }

  /** The root flagged current, else the first configured, else null.
   *  Cached; recomputed only when the cached name stops being a configured root. */
  currentRootName(): string | null {
    if (this.cachedCurrentRoot !== null && this.roots.has(this.cachedCurrentRoot)) {
      return this.cachedCurrentRoot;
    }
    this.cachedCurrentRoot = this.selectCurrentRoot();
    return this.cachedCurrentRoot;
  }

  /** Conflict messages across all roots, oldest first, at most `limit` of the newest */
  recentConflicts(limit: number = this.recentConflictLimit): string[] {
    if (limit <= 0) return [];
    const merged: string[] = [];
    for (const [rootName, index] of this.indices) {
      for (const conflict of index.conflicts()) {
        merged.push(`[${rootName}] ${describeConflict(conflict)}`);
      }
    }
    return merged.slice(-limit);
  }

  /** Write a scratch file beside its target. Overridable so tests can fail a write. */
  protected async writeTempFile(tempPath: string, text: string): Promise<void> {
    await fs.writeFile(tempPath, text, { encoding: 'utf-8', flag: 'wx' });
  }

  // --- Private helpers ---

  private async replaceFile(filePath: string, text: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}-${randomUUID()}${TEMP_SUFFIX}`;
    try {
      await this.writeTempFile(tempPath, text);
      await fs.rename(tempPath, filePath);
    } catch (error: unknown) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  /** Unlink files that hold an older copy of id. One that cannot be removed
   *  stays shadowed and is retried by the next save or purge. */
  private async removeShadowFiles(index: StorageIndex, recordsDir: string, id: string): Promise<void> {
    for (const name of index.shadowFiles(id)) {
      try {
        await fs.unlink(path.join(recordsDir, name));
      } catch (error: unknown) {
        if (errnoCode(error) !== 'ENOENT') {
          process.stderr.write(`[bookmark-store] [${index.rootName}] Could not remove superseded file ${name}: ${errorMessage(error)}\n`);
          continue;
        }
      }
      index.unshadow(id, name);
    }
  }

  private selectCurrentRoot(): string | null {
    for (const root of this.roots.values()) {
      if (root.isCurrent) return root.name;
    }
    const first = this.roots.keys().next();
    return first.done ? null : first.value;
  }

  private requireRoot(rootName: string): { readonly root: StorageRoot; readonly index: StorageIndex } {
    const root = this.roots.get(rootName);
    const index = this.indices.get(rootName);
    if (!root || !index) {
      throw new StorageError('unknown-root', `Storage not found: ${rootName}`);
    }
    return { root, index };
  }

  private toStorageError(error: unknown, action: string): StorageError {
    if (error instanceof StorageError) return error;
    if (error instanceof LockTimeoutError) {
      return new StorageError('lock-timeout', `Could not ${action}: ${error.message}`, { cause: error });
    }
    return new StorageError('io', `Could not ${action}: ${errorMessage(error)}`, { cause: error });
  }
}
