// Core types for the bookmark storage engine
//
// Design principles:
//   - Make illegal states unrepresentable: a tombstone carries its timestamp, an active record cannot
//   - Validate at boundaries, trust inside: bookmarks are parsed once on the way in (codec, service)
//   - Explicit domain types over primitives where meaning matters

/** Injectable clock for deterministic time in tests */
export interface Clock {
  now(): Date;
  isoNow(): string;
}

/** Production clock using real wall time */
export const realClock: Clock = {
  now: () => new Date(),
  isoNow: () => new Date().toISOString(),
};

/** Soft-delete state. `deletedAt` is set if and only if `deleted` is true. */
export type Tombstone =
  | { readonly deleted: false; readonly deletedAt: null }
  | { readonly deleted: true; readonly deletedAt: string };

/** Everything about a bookmark except its soft-delete state */
export interface BookmarkFields {
  readonly id: string;
  readonly url: string;
  readonly title: string;
  readonly keywords: readonly string[];   // priority order, max 4
  readonly tags: readonly string[];
  readonly description: string | null;
  readonly folderPath: string | null;     // relative, e.g. "development/typescript"
  readonly createdAt: string;             // ISO 8601
  readonly lastModified: string | null;   // ISO 8601
  readonly lastAccessed: string | null;   // ISO 8601
  readonly faviconPath: string | null;    // relative to the root, e.g. favicons/example.com.ico
  readonly screenshotPath: string | null; // relative to the root, e.g. screenshots/<id>.png
  readonly storageRoot: string;           // name of the owning root
}

/** A single bookmark record, stored as one YAML file inside a storage root */
export type Bookmark = BookmarkFields & Tombstone;

/** A configured storage location. The engine only reads these fields. */
export interface StorageRoot {
  readonly name: string;
  readonly path: string;
  readonly isCurrent: boolean;
  readonly isDefault: boolean;
}

/** Filters accepted by index listing */
export interface ListFilter {
  readonly includeDeleted?: boolean;
  readonly folderPath?: string;
}

/** Listing across one root (rootName set) or every root */
export interface ManagerListFilter extends ListFilter {
  readonly rootName?: string;
}

/** Per-root health statistics */
export interface RootStats {
  readonly total: number;
  readonly active: number;
  readonly deleted: number;
  readonly errorCount: number;
  readonly conflictCount: number;
}

/** A file that could not be turned into a bookmark during load */
export interface LoadError {
  readonly file: string;   // file name within the records directory
  readonly kind: 'malformed' | 'missing-fields' | 'invalid' | 'read-failed';
  readonly message: string;
}

/** Two files in one root that decode to the same bookmark id */
export interface ConflictRecord {
  readonly id: string;
  readonly winnerFile: string;
  readonly loserFile: string;
  /** Both files in the order they were compared: the indexed one first, the newcomer second */
  readonly files: readonly [string, string];
}

/** Tunables for the storage manager; every field falls back to thresholds.ts */
export interface StoreSettings {
  readonly lockTimeoutMs?: number;
  readonly lockPollIntervalMs?: number;
  readonly recentConflictLimit?: number;
}
