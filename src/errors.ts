// Error taxonomy for the storage engine.
//
// Exceptions are reserved for conditions the caller cannot route around:
// an unusable root, a lock that never frees, a disk that refuses a write.
// Expected outcomes of the lifecycle (not found, already deleted, ...) are
// data: see LifecycleFailure in bookmark-service.ts.

/** Root-level and write-path failures. The operation that threw changed nothing. */
export type StorageErrorKind =
  | 'root-missing'
  | 'root-not-directory'
  | 'root-inaccessible'
  | 'invalid-root'
  | 'duplicate-root'
  | 'unknown-root'
  | 'lock-timeout'
  | 'encode-failed'
  | 'io';

export class StorageError extends Error {
  readonly kind: StorageErrorKind;
  /** Name of the root involved, when the failure belongs to one */
  readonly root?: string;

  constructor(kind: StorageErrorKind, message: string, options?: { cause?: unknown; root?: string }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StorageError';
    this.kind = kind;
    this.root = options?.root;
  }
}

/** A bookmark broke a field rule. Raised before any disk access. */
export class ValidationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid bookmark: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** The lock marker stayed fresh for longer than the caller was willing to wait */
export class LockTimeoutError extends Error {
  readonly targetPath: string;
  readonly timeoutMs: number;

  constructor(targetPath: string, timeoutMs: number) {
    super(`Could not acquire lock on ${targetPath} after ${timeoutMs}ms`);
    this.name = 'LockTimeoutError';
    this.targetPath = targetPath;
    this.timeoutMs = timeoutMs;
  }
}

/** Narrow an unknown error to a Node errno code, if it has one */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
