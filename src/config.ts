// Configuration loading for the bookmark store.
//
// Priority: config.json → BOOKMARK_STORE_ROOTS env var → single default root
// Graceful degradation: each source falls through to the next on failure.

import { readFileSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import type { StorageRoot } from './types.js';
import { parseRootName } from './bookmark.js';
import { errnoCode, errorMessage } from './errors.js';
import {
  DEFAULT_LOCK_TIMEOUT_MS,
  MIN_LOCK_TIMEOUT_MS,
  MAX_LOCK_TIMEOUT_MS,
  DEFAULT_RECENT_CONFLICT_LIMIT,
  MAX_RECENT_CONFLICT_LIMIT,
} from './thresholds.js';

export const CONFIG_PATH_ENV = 'BOOKMARK_STORE_CONFIG';
export const ROOTS_ENV = 'BOOKMARK_STORE_ROOTS';

/** How the config was loaded; path only exists when source is 'file' */
export type ConfigOrigin =
  | { readonly source: 'file'; readonly path: string }
  | { readonly source: 'env' }
  | { readonly source: 'default' };

/** Store-wide tunables, already clamped */
export interface StoreConfigSettings {
  readonly lockTimeoutMs: number;
  readonly recentConflictLimit: number;
}

export interface LoadedConfig {
  readonly roots: readonly StorageRoot[];
  readonly origin: ConfigOrigin;
  readonly settings: StoreConfigSettings;
}

/** Where getStoreConfig looks. Defaults to the real process environment. */
export interface ConfigSources {
  readonly configPath?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly home?: string;
}

const rootEntrySchema = z.object({
  name: z.string(),
  path: z.string().min(1, 'path cannot be empty'),
  current: z.boolean().optional(),
  default: z.boolean().optional(),
});

const configFileSchema = z.object({
  roots: z.array(z.unknown()),
  lockTimeoutMs: z.unknown().optional(),
  recentConflictLimit: z.unknown().optional(),
}).passthrough();

const envRootsSchema = z.record(z.string());

/** Known top-level keys, used to warn on typos at startup */
const KNOWN_CONFIG_KEYS = new Set<string>(['roots', 'lockTimeoutMs', 'recentConflictLimit']);

export const DEFAULT_SETTINGS: StoreConfigSettings = {
  lockTimeoutMs: DEFAULT_LOCK_TIMEOUT_MS,
  recentConflictLimit: DEFAULT_RECENT_CONFLICT_LIMIT,
};

/** ~/.bookmark-store: home of the config file, the default root and crash reports */
export function storeHomeDir(home: string = os.homedir()): string {
  return path.join(home, '.bookmark-store');
}

export function defaultRootPath(home: string = os.homedir()): string {
  return path.join(storeHomeDir(home), 'default');
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env, home: string = os.homedir()): string {
  const override = env[CONFIG_PATH_ENV];
  return override ? resolveRoot(override, home) : path.join(storeHomeDir(home), 'config.json');
}

/** Expand a leading `$HOME` or `~` */
export function resolveRoot(raw: string, home: string = os.homedir()): string {
  return raw
    .replace(/^\$HOME(?=$|[/\\])/, home)
    .replace(/^~(?=$|[/\\])/, home);
}

/** Validate and clamp a numeric setting to a given range.
 *  Returns the default if the value is missing, NaN, or out of range. */
function clampSetting(key: string, value: unknown, defaultValue: number, min: number, max: number): number {
  if (value === undefined || value === null) return defaultValue;
  const n = Number(value);
  if (Number.isNaN(n) || n < min || n > max) {
    process.stderr.write(`[bookmark-store] ${key} out of range [${min}, ${max}]: ${String(value)}; using default ${defaultValue}\n`);
    return defaultValue;
  }
  return Math.round(n);
}

/** Clamp the tunables from a config file. Exported for testing. */
export function parseStoreSettings(raw: { readonly lockTimeoutMs?: unknown; readonly recentConflictLimit?: unknown }): StoreConfigSettings {
  return {
    lockTimeoutMs: clampSetting('lockTimeoutMs', raw.lockTimeoutMs, DEFAULT_LOCK_TIMEOUT_MS, MIN_LOCK_TIMEOUT_MS, MAX_LOCK_TIMEOUT_MS),
    recentConflictLimit: clampSetting('recentConflictLimit', raw.recentConflictLimit, DEFAULT_RECENT_CONFLICT_LIMIT, 0, MAX_RECENT_CONFLICT_LIMIT),
  };
}

/** Turn raw root entries into StorageRoots. Bad entries and repeated names are
 *  skipped with a warning; the rest load. Exported for testing. */
export function parseRootEntries(entries: readonly unknown[], home: string = os.homedir()): StorageRoot[] {
  const roots: StorageRoot[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, position) => {
    const parsed = rootEntrySchema.safeParse(entry);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'entry'}: ${i.message}`).join('; ');
      process.stderr.write(`[bookmark-store] Skipping root #${position + 1}: ${issues}\n`);
      return;
    }
    const { name, path: rawPath, current, default: isDefault } = parsed.data;
    if (parseRootName(name) === null) {
      process.stderr.write(`[bookmark-store] Skipping root "${name}": names may only contain letters, numbers, dashes and underscores\n`);
      return;
    }
    if (seen.has(name)) {
      process.stderr.write(`[bookmark-store] Skipping duplicate root "${name}"\n`);
      return;
    }
    seen.add(name);
    roots.push({
      name,
      path: resolveRoot(rawPath, home),
      isCurrent: current ?? false,
      isDefault: isDefault ?? false,
    });
  });

  return roots;
}

function warnUnknownKeys(configPath: string, raw: Record<string, unknown>): void {
  for (const key of Object.keys(raw)) {
    if (!KNOWN_CONFIG_KEYS.has(key)) {
      process.stderr.write(
        `[bookmark-store] Unknown key "${key}" in ${configPath}, ignored. ` +
        `Valid keys: ${Array.from(KNOWN_CONFIG_KEYS).join(', ')}\n`,
      );
    }
  }
}

/** Load roots and settings with priority: config file → env var → default root */
export function getStoreConfig(sources: ConfigSources = {}): LoadedConfig {
  const env = sources.env ?? process.env;
  const home = sources.home ?? os.homedir();
  const configPath = sources.configPath ?? resolveConfigPath(env, home);

  // 1. Config file (highest priority)
  try {
    const raw = readFileSync(configPath, 'utf-8');
    const parsed = configFileSchema.safeParse(JSON.parse(raw));

    if (!parsed.success) {
      process.stderr.write(`[bookmark-store] Invalid ${configPath}: missing "roots" array\n`);
    } else {
      warnUnknownKeys(configPath, parsed.data);
      const roots = parseRootEntries(parsed.data.roots, home);
      if (roots.length > 0) {
        process.stderr.write(`[bookmark-store] Loaded ${roots.length} root(s) from ${configPath}\n`);
        return { roots, origin: { source: 'file', path: configPath }, settings: parseStoreSettings(parsed.data) };
      }
      process.stderr.write(`[bookmark-store] ${configPath} lists no usable roots\n`);
    }
  } catch (error: unknown) {
    // ENOENT = no config file, which is expected; fall through quietly
    if (errnoCode(error) !== 'ENOENT') {
      process.stderr.write(`[bookmark-store] Failed to parse ${configPath}: ${errorMessage(error)}\n`);
    }
  }

  // 2. Env var: JSON object of name → path, in order
  const rootsJson = env[ROOTS_ENV];
  if (rootsJson) {
    try {
      const parsed = envRootsSchema.safeParse(JSON.parse(rootsJson));
      if (!parsed.success) {
        process.stderr.write(`[bookmark-store] ${ROOTS_ENV} must be a JSON object of name to path\n`);
      } else {
        const roots = parseRootEntries(
          Object.entries(parsed.data).map(([name, rootPath]) => ({ name, path: rootPath })),
          home,
        );
        if (roots.length > 0) {
          process.stderr.write(`[bookmark-store] Loaded ${roots.length} root(s) from ${ROOTS_ENV} env var\n`);
          return { roots, origin: { source: 'env' }, settings: DEFAULT_SETTINGS };
        }
      }
    } catch (error: unknown) {
      process.stderr.write(`[bookmark-store] Failed to parse ${ROOTS_ENV}: ${errorMessage(error)}\n`);
    }
  }

  // 3. Single default root
  const rootPath = defaultRootPath(home);
  process.stderr.write(`[bookmark-store] Using single default root (${rootPath})\n`);
  return {
    roots: [{ name: 'default', path: rootPath, isCurrent: true, isDefault: true }],
    origin: { source: 'default' },
    settings: DEFAULT_SETTINGS,
  };
}
