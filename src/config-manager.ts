// ConfigManager: config hot-reload with stat-based freshness checking
//
// Owns the live StorageManager. ensureFresh() stats the config file and, when it
// changed, builds and initializes a brand-new manager from it. Tool handlers
// call ensureFresh() at entry.

import { stat } from 'fs/promises';
import type { StorageRoot } from './types.js';
import { getStoreConfig, type ConfigOrigin, type LoadedConfig, type StoreConfigSettings } from './config.js';
import { StorageManager } from './storage-manager.js';
import { errorMessage } from './errors.js';

/** Whether the running configuration matches the file on disk */
export type ConfigHealth =
  | { readonly status: 'current' }
  | { readonly status: 'stale'; readonly error: string; readonly since: string; readonly recovery: string[] };

export interface ConfigManagerOptions {
  /** Re-read the config; defaults to getStoreConfig on the same path */
  readonly loadConfig?: () => LoadedConfig;
}

/**
 * Design:
 * - Constructor takes configPath, the startup LoadedConfig and its initialized manager
 * - ensureFresh() stats the config file, reloads if mtime moved forward
 * - Reload is atomic: config and manager swap together, only once the new
 *   manager initialized every root
 * - Any failure keeps the old state and is logged to stderr
 */
export class ConfigManager {
  private readonly configPath: string;
  private readonly loadConfig: () => LoadedConfig;
  private config: LoadedConfig;
  private manager: StorageManager;
  private health: ConfigHealth = { status: 'current' };
  private configMtime: number;

  // Dependency injection for testing: allow tests to override stat function
  protected async statFile(path: string): Promise<{ mtimeMs: number }> {
    return stat(path);
  }

  constructor(configPath: string, initial: LoadedConfig, initialManager: StorageManager, options: ConfigManagerOptions = {}) {
    this.configPath = configPath;
    this.config = initial;
    this.manager = initialManager;
    this.loadConfig = options.loadConfig ?? (() => getStoreConfig({ configPath }));
    this.configMtime = Date.now(); // files written before startup are already loaded
  }

  /**
   * Ensure config is fresh. Call at the start of every tool handler.
   * Never throws: a failed stat or reload keeps the current manager.
   */
  async ensureFresh(): Promise<void> {
    // Only file-based configs can change at runtime
    if (this.config.origin.source !== 'file') {
      return;
    }

    try {
      const stats = await this.statFile(this.configPath);
      if (stats.mtimeMs > this.configMtime) {
        await this.reload(stats.mtimeMs);
      }
    } catch (error: unknown) {
      process.stderr.write(`[bookmark-store] Config stat failed: ${errorMessage(error)}. Keeping current config.\n`);
    }
  }

  private async reload(newMtime: number): Promise<void> {
    const next = this.loadConfig();

    // getStoreConfig falls through to env/default when the file cannot be used
    if (next.origin.source !== 'file') {
      this.markStale('config file could not be parsed', [
        `Check that ${this.configPath} is valid JSON with a "roots" array.`,
      ]);
      process.stderr.write(`[bookmark-store] Config reload failed (parse error). Keeping current config.\n`);
      return;
    }

    const nextManager = new StorageManager(next.settings);
    try {
      await nextManager.initialize(next.roots);
    } catch (error: unknown) {
      const message = errorMessage(error);
      this.markStale(message, [
        ...next.roots.map(root => `Verify storage "${root.name}" exists and is writable: ${root.path}`),
        `If a root was moved, update ${this.configPath}.`,
      ]);
      process.stderr.write(`[bookmark-store] Config reload failed: ${message}. Keeping current config.\n`);
      return;
    }

    // Atomic swap
    this.config = next;
    this.manager = nextManager;
    this.health = { status: 'current' };
    this.configMtime = newMtime;

    const timestamp = new Date().toISOString();
    process.stderr.write(`[bookmark-store] [${timestamp}] Config reloaded: ${next.roots.length} root(s)\n`);
  }

  private markStale(error: string, recovery: string[]): void {
    // Keep the first failure time while the problem persists
    const since = this.health.status === 'stale' ? this.health.since : new Date().toISOString();
    this.health = { status: 'stale', error, since, recovery };
  }

  // Accessors

  getManager(): StorageManager {
    return this.manager;
  }

  getRoots(): readonly StorageRoot[] {
    return this.config.roots;
  }

  getSettings(): StoreConfigSettings {
    return this.config.settings;
  }

  getConfigOrigin(): ConfigOrigin {
    return this.config.origin;
  }

  getHealth(): ConfigHealth {
    return this.health;
  }
}
