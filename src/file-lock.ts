// Advisory per-file locking with sidecar markers.
//
// Holding the lock on `<file>` means `<file>.lock` exists. The marker is created
// with an exclusive open so two writers can never both believe they hold it.
// A marker older than STALE_LOCK_FACTOR x timeout belongs to a holder that died
// without releasing and is removed. Removal first renames the marker to a name
// only this waiter knows, so two waiters that both judged the same marker stale
// cannot both go on to delete it (the second would be deleting a fresh one).
// Single host, single filesystem: every writer has to go through this module
// for the convention to mean anything.

import { promises as fs, type Stats } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { setTimeout as sleep } from 'timers/promises';
import { LockTimeoutError, errnoCode } from './errors.js';
import {
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_LOCK_POLL_INTERVAL_MS,
  STALE_LOCK_FACTOR,
  LOCK_SUFFIX,
  STALE_SUFFIX,
} from './thresholds.js';

export interface FileLockOptions {
  /** Give up after waiting this long for a fresh marker to disappear */
  readonly timeoutMs?: number;
  readonly pollIntervalMs?: number;
}

/** A held lock. release() is idempotent and never throws. */
export interface FileLock {
  readonly targetPath: string;
  readonly lockPath: string;
  release(): Promise<void>;
}

export function lockPathFor(targetPath: string): string {
  return `${targetPath}${LOCK_SUFFIX}`;
}

class MarkerLock implements FileLock {
  private released = false;

  constructor(readonly targetPath: string, readonly lockPath: string) {}

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    try {
      await fs.unlink(this.lockPath);
    } catch { /* best-effort: a missing marker is already released */ }
  }
}

function sameFile(a: Stats, b: Stats): boolean {
  return a.ino === b.ino && a.dev === b.dev && a.mtimeMs === b.mtimeMs;
}

/** Remove the marker if it is older than staleAfterMs.
 *  Returns true when the caller should retry creation right away. */
async function removeIfStale(lockPath: string, staleAfterMs: number): Promise<boolean> {
  let observed: Stats;
  try {
    observed = await fs.stat(lockPath);
  } catch (error: unknown) {
    if (errnoCode(error) === 'ENOENT') return true; // released between our open and stat
    throw error;
  }

  if (Date.now() - observed.mtimeMs <= staleAfterMs) return false;

  // Claim the marker under a private name, then check it is the one we judged stale
  const claimed = `${lockPath}.${process.pid}-${randomUUID()}${STALE_SUFFIX}`;
  try {
    await fs.rename(lockPath, claimed);
  } catch (error: unknown) {
    if (errnoCode(error) === 'ENOENT') return true; // another waiter got there first
    throw error;
  }

  const taken = await fs.stat(claimed);
  if (!sameFile(observed, taken)) {
    // A new holder's marker replaced the stale one in between: hand it back
    try {
      await fs.link(claimed, lockPath);
    } catch (error: unknown) {
      if (errnoCode(error) !== 'EEXIST') throw error;
    } finally {
      await fs.rm(claimed, { force: true });
    }
    return false;
  }

  await fs.rm(claimed, { force: true });
  process.stderr.write(`[bookmark-store] Removed stale lock ${lockPath}\n`);
  return true;
}

/** Acquire the lock on targetPath, polling until timeoutMs has elapsed */
export async function acquireFileLock(targetPath: string, options: FileLockOptions = {}): Promise<FileLock> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_LOCK_POLL_INTERVAL_MS;
  const lockPath = lockPathFor(targetPath);
  const startedAt = performance.now();

  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  for (;;) {
    try {
      await fs.writeFile(lockPath, `${process.pid}\n`, { flag: 'wx' });
      return new MarkerLock(targetPath, lockPath);
    } catch (error: unknown) {
      if (errnoCode(error) !== 'EEXIST') throw error;
    }

    if (await removeIfStale(lockPath, timeoutMs * STALE_LOCK_FACTOR)) continue;

    if (performance.now() - startedAt > timeoutMs) {
      throw new LockTimeoutError(targetPath, timeoutMs);
    }
    await sleep(pollIntervalMs);
  }
}

/** Run fn while holding the lock on targetPath; the lock is released on every exit path */
export async function withFileLock<T>(
  targetPath: string,
  options: FileLockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const lock = await acquireFileLock(targetPath, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
