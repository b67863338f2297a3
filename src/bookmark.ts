// Bookmark validation: the single boundary every record crosses on its way in,
// whether it comes from a YAML file, a tool call or a lifecycle transition.

import { z } from 'zod';
import type { Bookmark } from './types.js';
import { MAX_DESCRIPTION_LENGTH, MAX_KEYWORDS, MAX_TITLE_LENGTH } from './thresholds.js';

/** Storage root names: letters, digits, dash and underscore */
const ROOT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Parse a raw string into a root name, returning null for invalid input */
export function parseRootName(raw: string): string | null {
  return ROOT_NAME_PATTERN.test(raw) ? raw : null;
}

/** Record ids double as file names: no separators, no leading dot */
const RECORD_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export function isValidRecordId(id: string): boolean {
  return RECORD_ID_PATTERN.test(id);
}

/** Returns an error message when the URL is not http(s), null when it is fine */
export function checkUrlScheme(url: string): string | null {
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    return `not a valid URL: "${url}"`;
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    return `URL scheme '${protocol.replace(/:$/, '')}' not allowed, only http:// and https:// are permitted`;
  }
  return null;
}

/** Folder paths stay inside the root: no parent segments, no absolute paths */
/** URL form used to spot duplicates: surrounding whitespace and trailing slashes dropped */
export function comparableUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}

export function isSafeFolderPath(folderPath: string): boolean {
  return !folderPath.includes('..') && !folderPath.startsWith('/') && !folderPath.startsWith('\\');
}

function cleanList(items: readonly string[]): string[] {
  return items.map(item => item.trim()).filter(item => item.length > 0);
}

const isoTimestamp = z.string().refine(
  value => !Number.isNaN(Date.parse(value)),
  { message: 'must be an ISO 8601 timestamp' },
);

const bookmarkSchema = z.object({
  id: z.string().trim()
    .min(1, 'id cannot be empty')
    .regex(RECORD_ID_PATTERN, 'id may only contain letters, digits, dots, dashes and underscores'),
  url: z.string().trim().superRefine((url, ctx) => {
    const problem = checkUrlScheme(url);
    if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
  }),
  title: z.string().trim()
    .min(1, 'title cannot be empty or whitespace')
    .max(MAX_TITLE_LENGTH, `title is longer than ${MAX_TITLE_LENGTH} characters`),
  keywords: z.array(z.string())
    .max(MAX_KEYWORDS, `at most ${MAX_KEYWORDS} keywords allowed`)
    .transform(cleanList),
  tags: z.array(z.string()).transform(cleanList),
  description: z.string()
    .max(MAX_DESCRIPTION_LENGTH, `description is longer than ${MAX_DESCRIPTION_LENGTH} characters`)
    .nullable(),
  folderPath: z.string().trim()
    .refine(isSafeFolderPath, { message: "folder path cannot contain '..' or start with / or \\ (directory traversal)" })
    .transform(value => (value.length > 0 ? value : null))
    .nullable(),
  createdAt: isoTimestamp,
  lastModified: isoTimestamp.nullable(),
  lastAccessed: isoTimestamp.nullable(),
  deleted: z.boolean(),
  deletedAt: isoTimestamp.nullable(),
  faviconPath: z.string().nullable(),
  screenshotPath: z.string().nullable(),
  storageRoot: z.string().refine(
    value => parseRootName(value) !== null,
    { message: 'storage root must contain only letters, numbers, dashes and underscores' },
  ),
}).superRefine((candidate, ctx) => {
  if (candidate.deleted !== (candidate.deletedAt !== null)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['deletedAt'],
      message: candidate.deleted
        ? 'deleted bookmarks must carry deletedAt'
        : 'deletedAt must be null unless the bookmark is deleted',
    });
  }
});

/** Outcome of validating a candidate bookmark */
export type ValidationResult =
  | { readonly ok: true; readonly bookmark: Bookmark }
  | { readonly ok: false; readonly issues: readonly string[] };

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/** Validate and normalize a bookmark: trims text, drops empty keywords and tags,
 *  turns an empty folder path into null. Never throws. */
export function validateBookmark(candidate: unknown): ValidationResult {
  const parsed = bookmarkSchema.safeParse(candidate);
  if (!parsed.success) {
    return { ok: false, issues: parsed.error.issues.map(formatIssue) };
  }
  const value = parsed.data;
  const bookmark: Bookmark = value.deletedAt === null
    ? { ...value, deleted: false, deletedAt: null }
    : { ...value, deleted: true, deletedAt: value.deletedAt };
  return { ok: true, bookmark };
}

/** Copy a bookmark so the caller's object shares nothing mutable with ours */
export function cloneBookmark(bookmark: Bookmark): Bookmark {
  return { ...bookmark, keywords: [...bookmark.keywords], tags: [...bookmark.tags] };
}
