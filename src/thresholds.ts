// Tunable constants for locking, validation and diagnostics.
// Kept in one place so config.ts, the engine and the tests agree on defaults.

/** How long a writer waits for a record lock before giving up */
export const DEFAULT_LOCK_TIMEOUT_MS = 5000;

/** Delay between lock acquisition attempts */
export const DEFAULT_LOCK_POLL_INTERVAL_MS = 100;

/** A lock marker older than this multiple of the timeout is considered abandoned */
export const STALE_LOCK_FACTOR = 2;

/** Accepted range for a configured lock timeout */
export const MIN_LOCK_TIMEOUT_MS = 100;
export const MAX_LOCK_TIMEOUT_MS = 60_000;

/** Default number of conflict messages returned by recentConflicts() */
export const DEFAULT_RECENT_CONFLICT_LIMIT = 20;
export const MAX_RECENT_CONFLICT_LIMIT = 500;

/** Most existing bookmarks reported as sharing a new bookmark's URL */
export const DUPLICATE_URL_LIMIT = 5;

/** Bookmark field limits */
export const MAX_KEYWORDS = 4;
export const MAX_TITLE_LENGTH = 500;
export const MAX_DESCRIPTION_LENGTH = 5000;

/** On-disk layout of a storage root */
export const RECORDS_DIR = 'bookmarks';
export const ASSET_DIRS: readonly string[] = ['favicons', 'screenshots'];
export const RECORD_EXTENSION = '.yaml';
export const LOCK_SUFFIX = '.lock';
export const STALE_SUFFIX = '.stale';
export const TEMP_SUFFIX = '.tmp';
export const PROBE_FILE = '.bookmark-store-probe';
