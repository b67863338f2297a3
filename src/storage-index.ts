// Per-root in-memory index, rebuilt from disk on every load.
//
// The filesystem is the source of truth; this is a disposable cache of it.
// Bookmarks go in and come out as copies so nothing outside the index can
// reach into it and change what other readers see.

import { promises as fs } from 'fs';
import path from 'path';
import type { Bookmark, ConflictRecord, ListFilter, LoadError, RootStats } from './types.js';
import { cloneBookmark } from './bookmark.js';
import { decodeBookmark } from './codec.js';
import { StorageError, errorMessage } from './errors.js';
import { ASSET_DIRS, RECORDS_DIR, RECORD_EXTENSION } from './thresholds.js';

interface IndexedBookmark {
  readonly bookmark: Bookmark;
  readonly file: string;
}

/** Best available time for last-writer-wins: lastModified, else createdAt */
function conflictTimestamp(bookmark: Bookmark): number {
  const millis = Date.parse(bookmark.lastModified ?? bookmark.createdAt);
  return Number.isNaN(millis) ? Number.NEGATIVE_INFINITY : millis;
}

/** Human-readable one-liner for a conflict, shared by logs and diagnostics */
export function describeConflict(conflict: ConflictRecord): string {
  return `Conflict for bookmark ID ${conflict.id}: ${conflict.files[0]} vs ${conflict.files[1]}`;
}

export class StorageIndex {
  private readonly entries = new Map<string, IndexedBookmark>();
  private readonly errors: LoadError[] = [];
  private readonly conflictLog: ConflictRecord[] = [];
  /** Other files on disk that decoded to an indexed id: conflict losers and
   *  copies a save has since written under the canonical name */
  private readonly shadowed = new Map<string, Set<string>>();

  constructor(readonly rootName: string) {}

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): Bookmark | undefined {
    const entry = this.entries.get(id);
    return entry ? cloneBookmark(entry.bookmark) : undefined;
  }

  /** File name the indexed version of this bookmark was read from or written to */
  sourceFile(id: string): string | undefined {
    return this.entries.get(id)?.file;
  }

  /** Files besides the indexed one that still hold a copy of this bookmark */
  shadowFiles(id: string): string[] {
    return Array.from(this.shadowed.get(id) ?? []).sort();
  }

  /** Every file that holds a copy of this bookmark, indexed one first */
  filesFor(id: string): string[] {
    const source = this.sourceFile(id);
    return source === undefined ? this.shadowFiles(id) : [source, ...this.shadowFiles(id)];
  }

  /** Forget a shadow file once it is gone from disk */
  unshadow(id: string, file: string): void {
    const files = this.shadowed.get(id);
    if (!files) return;
    files.delete(file);
    if (files.size === 0) this.shadowed.delete(id);
  }

  list(filter: ListFilter = {}): Bookmark[] {
    const results: Bookmark[] = [];
    for (const { bookmark } of this.entries.values()) {
      if (!filter.includeDeleted && bookmark.deleted) continue;
      if (filter.folderPath !== undefined && bookmark.folderPath !== filter.folderPath) continue;
      results.push(cloneBookmark(bookmark));
    }
    return results;
  }

  /** Index a bookmark as stored in file. A different file that held the
   *  previous copy becomes a shadow of it. */
  put(bookmark: Bookmark, file: string): void {
    const previous = this.entries.get(bookmark.id);
    if (previous && previous.file !== file) this.shadow(bookmark.id, previous.file);
    this.unshadow(bookmark.id, file);
    this.entries.set(bookmark.id, { bookmark: cloneBookmark(bookmark), file });
  }

  remove(id: string): boolean {
    this.shadowed.delete(id);
    return this.entries.delete(id);
  }

  stats(): RootStats {
    let deleted = 0;
    for (const { bookmark } of this.entries.values()) {
      if (bookmark.deleted) deleted++;
    }
    return {
      total: this.entries.size,
      active: this.entries.size - deleted,
      deleted,
      errorCount: this.errors.length,
      conflictCount: this.conflictLog.length,
    };
  }

  loadErrors(): readonly LoadError[] {
    return [...this.errors];
  }

  conflicts(): readonly ConflictRecord[] {
    return [...this.conflictLog];
  }

  recordLoadError(error: LoadError): void {
    this.errors.push(error);
    process.stderr.write(`[bookmark-store] [${this.rootName}] Skipped ${error.file}: ${error.message}\n`);
  }

  /** Add a freshly decoded bookmark during load. When its id is already indexed,
   *  the later timestamp wins; equal timestamps go to the smaller file name so
   *  the outcome never depends on enumeration order. */
  absorb(bookmark: Bookmark, file: string): void {
    const incumbent = this.entries.get(bookmark.id);
    if (!incumbent) {
      this.put(bookmark, file);
      return;
    }

    const incumbentTime = conflictTimestamp(incumbent.bookmark);
    const candidateTime = conflictTimestamp(bookmark);
    const candidateWins = candidateTime > incumbentTime
      || (candidateTime === incumbentTime && file < incumbent.file);

    const conflict: ConflictRecord = {
      id: bookmark.id,
      winnerFile: candidateWins ? file : incumbent.file,
      loserFile: candidateWins ? incumbent.file : file,
      files: [incumbent.file, file],
    };
    this.conflictLog.push(conflict);
    process.stderr.write(`[bookmark-store] [${this.rootName}] ${describeConflict(conflict)} (kept ${conflict.winnerFile})\n`);

    if (candidateWins) {
      this.put(bookmark, file);
    } else {
      this.shadow(bookmark.id, file);
    }
  }

  private shadow(id: string, file: string): void {
    const files = this.shadowed.get(id);
    if (files) {
      files.add(file);
    } else {
      this.shadowed.set(id, new Set([file]));
    }
  }
}

export function recordsDirFor(rootPath: string): string {
  return path.join(rootPath, RECORDS_DIR);
}

export function recordFileName(id: string): string {
  return `${id}${RECORD_EXTENSION}`;
}

/** Create the records and asset directories if missing. Idempotent. */
export async function ensureRootLayout(rootPath: string): Promise<void> {
  try {
    for (const dir of [RECORDS_DIR, ...ASSET_DIRS]) {
      await fs.mkdir(path.join(rootPath, dir), { recursive: true });
    }
  } catch (error: unknown) {
    throw new StorageError(
      'root-inaccessible',
      `Failed to create storage layout in ${rootPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

/** Read one record file. A file without created_at is dated by its mtime. */
async function readRecord(
  index: StorageIndex,
  recordsDir: string,
  file: string,
): Promise<void> {
  let text: string;
  let mtime: Date;
  try {
    const fullPath = path.join(recordsDir, file);
    mtime = (await fs.stat(fullPath)).mtime;
    text = await fs.readFile(fullPath, 'utf-8');
  } catch (error: unknown) {
    index.recordLoadError({ file, kind: 'read-failed', message: `Failed to read ${file}: ${errorMessage(error)}` });
    return;
  }

  const decoded = decodeBookmark(text, { fallbackCreatedAt: mtime.toISOString() });
  if (!decoded.ok) {
    index.recordLoadError({ file, kind: decoded.kind, message: decoded.message });
    return;
  }
  index.absorb(decoded.bookmark, file);
}

/** Build a root's index from its records directory.
 *  A corrupt or unreadable file is logged and skipped; it never fails the load. */
export async function loadStorageIndex(rootName: string, rootPath: string): Promise<StorageIndex> {
  await ensureRootLayout(rootPath);

  const recordsDir = recordsDirFor(rootPath);
  let files: string[];
  try {
    const dirents = await fs.readdir(recordsDir, { withFileTypes: true });
    files = dirents
      .filter(d => d.isFile() && d.name.endsWith(RECORD_EXTENSION))
      .map(d => d.name)
      .sort();
  } catch (error: unknown) {
    throw new StorageError(
      'root-inaccessible',
      `Cannot list ${recordsDir}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const index = new StorageIndex(rootName);
  for (const file of files) {
    await readRecord(index, recordsDir, file);
  }

  const stats = index.stats();
  process.stderr.write(
    `[bookmark-store] Loaded ${stats.total} bookmarks from ${rootName} ` +
    `(${stats.errorCount} errors, ${stats.conflictCount} conflicts)\n`,
  );
  return index;
}
