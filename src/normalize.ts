// Argument normalization for MCP tool calls.
//
// Agents frequently guess wrong param names. This module resolves common aliases
// and reshapes obvious near-misses to avoid wasted round-trips from validation errors.
// Pure functions, no state.

/** Canonical param name aliases: maps guessed names to their correct form */
const PARAM_ALIASES: Record<string, string> = {
  // bookmark fields
  name: 'title',
  link: 'url',
  href: 'url',
  uri: 'url',
  tag: 'tags',
  labels: 'tags',
  keyword: 'keywords',
  folder: 'folderPath',
  folder_path: 'folderPath',
  favicon_path: 'faviconPath',
  screenshot_path: 'screenshotPath',
  // identity
  bookmark_id: 'id',
  bookmarkId: 'id',
  // roots
  storage: 'root',
  location: 'root',
  storage_root: 'root',
  storageRoot: 'root',
  // list filters
  include_deleted: 'includeDeleted',
};

/** Root values that mean "every root" for tools that span roots */
const ROOT_WILDCARDS = new Set(['all', 'any', '*', 'every', 'everything']);

/** Tools where omitting the root searches every root */
const MULTI_ROOT_TOOLS = new Set(['bookmark_list', 'bookmark_stats', 'bookmark_diagnose']);

/** "a, b" → ["a", "b"]; a lone string becomes a one-element list */
function splitList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/** Normalize args before zod validation: resolve aliases, split list strings, fix root wildcards */
export function normalizeArgs(
  toolName: string,
  raw: Record<string, unknown> | undefined,
): Record<string, unknown> {
  const args: Record<string, unknown> = { ...(raw ?? {}) };

  // 1. Resolve param aliases (move aliased keys to canonical names)
  for (const [alias, canonical] of Object.entries(PARAM_ALIASES)) {
    if (alias in args && !(canonical in args)) {
      args[canonical] = args[alias];
      delete args[alias];
    }
  }

  // 2. Accept comma-separated strings for list fields
  for (const key of ['keywords', 'tags']) {
    const value = args[key];
    if (typeof value === 'string') {
      args[key] = splitList(value);
    }
  }

  // 3. Empty or wildcard root: drop it so the tool falls back to its default
  const root = args['root'];
  if (root === '' || root === null) {
    delete args['root'];
  } else if (typeof root === 'string' && ROOT_WILDCARDS.has(root.toLowerCase()) && MULTI_ROOT_TOOLS.has(toolName)) {
    delete args['root'];
  }

  return args;
}
