// Response formatters for MCP tool handlers.
//
// Pure functions with no state. Each takes structured data
// and returns a formatted string for the tool response.

import type { Bookmark, LoadError, RootStats, StorageRoot } from './types.js';
import type { LifecycleFailure } from './bookmark-service.js';
import type { StoreConfigSettings } from './config.js';
import { DEFAULT_LOCK_TIMEOUT_MS, DEFAULT_RECENT_CONFLICT_LIMIT } from './thresholds.js';

/** Full view of one bookmark */
export function formatBookmark(bookmark: Bookmark): string {
  const lines = [
    `## ${bookmark.title}`,
    ``,
    `**ID:** ${bookmark.id}`,
    `**URL:** ${bookmark.url}`,
    `**Root:** ${bookmark.storageRoot}`,
  ];
  if (bookmark.folderPath) lines.push(`**Folder:** ${bookmark.folderPath}`);
  if (bookmark.keywords.length > 0) lines.push(`**Keywords:** ${bookmark.keywords.join(', ')}`);
  if (bookmark.tags.length > 0) lines.push(`**Tags:** ${bookmark.tags.map(t => `#${t}`).join(' ')}`);
  lines.push(`**Created:** ${bookmark.createdAt}`);
  if (bookmark.lastModified) lines.push(`**Modified:** ${bookmark.lastModified}`);
  if (bookmark.lastAccessed) lines.push(`**Accessed:** ${bookmark.lastAccessed}`);
  if (bookmark.deleted) lines.push(`**Deleted:** ${bookmark.deletedAt} (restore with bookmark_restore)`);
  if (bookmark.description) {
    lines.push('');
    lines.push(bookmark.description);
  }
  return lines.join('\n');
}

/** One-line summary used in listings */
export function formatBookmarkLine(bookmark: Bookmark): string {
  const folder = bookmark.folderPath ? ` (${bookmark.folderPath})` : '';
  const deleted = bookmark.deleted ? ' [deleted]' : '';
  return `- ${bookmark.id}: "${bookmark.title}" <${bookmark.url}>${folder} [${bookmark.storageRoot}]${deleted}`;
}

/** Listing, oldest first. The order is stable so repeated calls diff cleanly. */
export function formatBookmarkList(bookmarks: readonly Bookmark[], scope: string): string {
  if (bookmarks.length === 0) {
    return `No bookmarks in ${scope}.`;
  }
  const sorted = [...bookmarks].sort((a, b) =>
    a.createdAt === b.createdAt ? a.id.localeCompare(b.id) : a.createdAt.localeCompare(b.createdAt));
  return [
    `## ${bookmarks.length} bookmark${bookmarks.length === 1 ? '' : 's'} in ${scope}`,
    ``,
    ...sorted.map(formatBookmarkLine),
  ].join('\n');
}

/** Note appended to a create response when the URL was already saved */
export function formatDuplicateNotice(matches: readonly Bookmark[]): string {
  if (matches.length === 0) return '';
  return [
    `**Already bookmarked (${matches.length}):**`,
    ...matches.map(formatBookmarkLine),
  ].join('\n');
}

/** Stats for a single root */
export function formatRootStats(root: StorageRoot, stats: RootStats, isCurrent: boolean): string {
  const flags = [isCurrent ? 'current' : '', root.isDefault ? 'default' : ''].filter(Boolean);
  return [
    `## [${root.name}] Bookmark Stats${flags.length > 0 ? ` (${flags.join(', ')})` : ''}`,
    ``,
    `**Location:** ${root.path}`,
    `**Total bookmarks:** ${stats.total}`,
    `  - Active: ${stats.active}`,
    `  - Deleted: ${stats.deleted}`,
    `**Unreadable files:** ${stats.errorCount}`,
    `**Conflicts:** ${stats.conflictCount}`,
  ].join('\n');
}

/** Files that were skipped while loading a root */
export function formatLoadErrors(rootName: string, errors: readonly LoadError[]): string {
  if (errors.length === 0) return `[${rootName}] All files loaded.`;
  return [
    `[${rootName}] ${errors.length} file${errors.length === 1 ? '' : 's'} skipped:`,
    ...errors.map(e => `  - ${e.file} (${e.kind}): ${e.message}`),
  ].join('\n');
}

/** Explain a refused lifecycle operation and what to do next */
export function formatLifecycleFailure(failure: LifecycleFailure): string {
  switch (failure.kind) {
    case 'not-found':
      return `${failure.message}\n\nHint: use bookmark_list (with includeDeleted: true) to find ids.`;
    case 'validation':
      return [failure.message, '', ...failure.issues.map(issue => `- ${issue}`)].join('\n');
    case 'no-storage-root':
      return `${failure.message}\n\nHint: use bookmark_roots to see configured roots.`;
    case 'already-deleted':
      return `${failure.message}\n\nHint: bookmark_restore brings it back; bookmark_purge removes it for good.`;
    case 'not-deleted':
      return failure.message;
    case 'safety-violation':
      return `${failure.message}\n\nHint: call bookmark_delete first, then bookmark_purge.`;
  }
}

/** Active store settings for diagnostics, marking overrides vs defaults */
export function formatSettingsSection(settings: StoreConfigSettings): string {
  const tag = (val: number, def: number) => val !== def ? ' (overridden)' : ' (default)';
  return [
    `- lockTimeoutMs: ${settings.lockTimeoutMs}${tag(settings.lockTimeoutMs, DEFAULT_LOCK_TIMEOUT_MS)}`,
    `- recentConflictLimit: ${settings.recentConflictLimit}${tag(settings.recentConflictLimit, DEFAULT_RECENT_CONFLICT_LIMIT)}`,
  ].join('\n');
}
