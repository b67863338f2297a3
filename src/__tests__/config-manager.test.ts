import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { ConfigManager } from '../config-manager.js';
import { DEFAULT_SETTINGS, type LoadedConfig } from '../config.js';
import type { StorageRoot } from '../types.js';
import { StorageManager } from '../storage-manager.js';

// Test helper: ConfigManager subclass with injectable stat function
class TestableConfigManager extends ConfigManager {
  statImplementation: (path: string) => Promise<{ mtimeMs: number }> = async () => {
    return { mtimeMs: Date.now() - 1000 };
  };

  protected override statFile(path: string): Promise<{ mtimeMs: number }> {
    return this.statImplementation(path);
  }
}

function rootAt(name: string, rootPath: string): StorageRoot {
  return { name, path: rootPath, isCurrent: false, isDefault: false };
}

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;
  let initialConfig: LoadedConfig;
  let initialManager: StorageManager;

  function fileConfig(roots: readonly StorageRoot[], lockTimeoutMs = 5000): LoadedConfig {
    return {
      roots,
      origin: { source: 'file', path: configPath },
      settings: { lockTimeoutMs, recentConflictLimit: 20 },
    };
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bookmark-store-config-manager-test-'));
    configPath = path.join(tempDir, 'config.json');
    for (const name of ['main', 'second']) {
      await fs.mkdir(path.join(tempDir, name));
    }

    initialConfig = fileConfig([rootAt('main', path.join(tempDir, 'main'))]);
    initialManager = new StorageManager(initialConfig.settings);
    await initialManager.initialize(initialConfig.roots);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true }).catch(() => {});
  });

  describe('ensureFresh', () => {
    it('does not reload when mtime unchanged', async () => {
      let loadCount = 0;
      const manager = new TestableConfigManager(configPath, initialConfig, initialManager, {
        loadConfig: () => { loadCount++; return initialConfig; },
      });

      let statCallCount = 0;
      manager.statImplementation = async () => {
        statCallCount++;
        return { mtimeMs: Date.now() - 1000 }; // mtime in the past (no change)
      };

      await manager.ensureFresh();
      await manager.ensureFresh();

      assert.equal(statCallCount, 2, 'stat should be called twice');
      assert.equal(loadCount, 0, 'config should not be re-read');
      assert.equal(manager.getManager(), initialManager);
    });

    it('swaps in a new manager when the file changed', async () => {
      const next = fileConfig(
        [rootAt('main', path.join(tempDir, 'main')), rootAt('second', path.join(tempDir, 'second'))],
        2500,
      );
      const manager = new TestableConfigManager(configPath, initialConfig, initialManager, { loadConfig: () => next });
      manager.statImplementation = async () => ({ mtimeMs: Date.now() + 60_000 });

      await manager.ensureFresh();

      assert.notEqual(manager.getManager(), initialManager);
      assert.deepEqual(manager.getManager().rootNames(), ['main', 'second']);
      assert.deepEqual(manager.getRoots(), next.roots);
      assert.deepEqual(manager.getSettings(), { lockTimeoutMs: 2500, recentConflictLimit: 20 });
      assert.deepEqual(manager.getHealth(), { status: 'current' });
    });

    it('reloads once per change', async () => {
      let loadCount = 0;
      const manager = new TestableConfigManager(configPath, initialConfig, initialManager, {
        loadConfig: () => { loadCount++; return initialConfig; },
      });
      const changedAt = Date.now() + 60_000;
      manager.statImplementation = async () => ({ mtimeMs: changedAt });

      await manager.ensureFresh();
      await manager.ensureFresh();

      assert.equal(loadCount, 1);
    });

    it('keeps the old manager when a new root fails to initialize', async () => {
      const missing = path.join(tempDir, 'missing');
      const manager = new TestableConfigManager(configPath, initialConfig, initialManager, {
        loadConfig: () => fileConfig([rootAt('main', path.join(tempDir, 'main')), rootAt('missing', missing)]),
      });
      manager.statImplementation = async () => ({ mtimeMs: Date.now() + 60_000 });

      await manager.ensureFresh();

      assert.equal(manager.getManager(), initialManager);
      assert.deepEqual(manager.getRoots(), initialConfig.roots);
      const health = manager.getHealth();
      assert.equal(health.status, 'stale');
      if (health.status !== 'stale') return;
      assert.equal(health.error, `Storage path does not exist: ${missing}`);
      assert.deepEqual(health.recovery, [
        `Verify storage "main" exists and is writable: ${path.join(tempDir, 'main')}`,
        `Verify storage "missing" exists and is writable: ${missing}`,
        `If a root was moved, update ${configPath}.`,
      ]);
    });

    it('retries a failed reload and keeps the first failure time', async () => {
      let loadCount = 0;
      const manager = new TestableConfigManager(configPath, initialConfig, initialManager, {
        loadConfig: () => {
          loadCount++;
          return fileConfig([rootAt('missing', path.join(tempDir, 'missing'))]);
        },
      });
      const changedAt = Date.now() + 60_000;
      manager.statImplementation = async () => ({ mtimeMs: changedAt });

      await manager.ensureFresh();
      const first = manager.getHealth();
      await manager.ensureFresh();
      const second = manager.getHealth();

      assert.equal(loadCount, 2, 'a failed reload is attempted again');
      assert.equal(first.status, 'stale');
      assert.equal(second.status, 'stale');
      if (first.status !== 'stale' || second.status !== 'stale') return;
      assert.equal(second.since, first.since);
    });

    it('recovers once the file is fixed', async () => {
      let broken = true;
      const manager = new TestableConfigManager(configPath, initialConfig, initialManager, {
        loadConfig: () => broken
          ? fileConfig([rootAt('missing', path.join(tempDir, 'missing'))])
          : fileConfig([rootAt('second', path.join(tempDir, 'second'))]),
      });
      manager.statImplementation = async () => ({ mtimeMs: Date.now() + 60_000 });

      await manager.ensureFresh();
      assert.equal(manager.getHealth().status, 'stale');

      broken = false;
      await manager.ensureFresh();
      assert.deepEqual(manager.getHealth(), { status: 'current' });
      assert.deepEqual(manager.getManager().rootNames(), ['second']);
    });

    it('marks the config stale when the file no longer parses', async () => {
      const manager = new TestableConfigManager(configPath, initialConfig, initialManager, {
        loadConfig: () => ({ roots: [], origin: { source: 'default' }, settings: DEFAULT_SETTINGS }),
      });
      manager.statImplementation = async () => ({ mtimeMs: Date.now() + 60_000 });

      await manager.ensureFresh();

      assert.equal(manager.getManager(), initialManager);
      assert.deepEqual(manager.getConfigOrigin(), { source: 'file', path: configPath });
      const health = manager.getHealth();
      assert.equal(health.status, 'stale');
      if (health.status !== 'stale') return;
      assert.equal(health.error, 'config file could not be parsed');
      assert.deepEqual(health.recovery, [`Check that ${configPath} is valid JSON with a "roots" array.`]);
    });

    it('keeps the current config when the file was deleted', async () => {
      const manager = new TestableConfigManager(configPath, initialConfig, initialManager);
      manager.statImplementation = async () => {
        throw Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });
      };

      await manager.ensureFresh();
      assert.equal(manager.getManager(), initialManager, 'Should keep old config on ENOENT');
      assert.deepEqual(manager.getHealth(), { status: 'current' });
    });

    it('keeps the current config when stat is denied', async () => {
      const manager = new TestableConfigManager(configPath, initialConfig, initialManager);
      manager.statImplementation = async () => {
        throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
      };

      await manager.ensureFresh();
      assert.equal(manager.getManager(), initialManager, 'Should keep old config on EACCES');
    });

    it('skips reload for env-var-based configs', async () => {
      const envConfig: LoadedConfig = { ...initialConfig, origin: { source: 'env' } };

      let statCalled = false;
      const manager = new TestableConfigManager(configPath, envConfig, initialManager);
      manager.statImplementation = async () => {
        statCalled = true;
        return { mtimeMs: Date.now() + 60_000 };
      };

      await manager.ensureFresh();
      assert.equal(statCalled, false, 'Should not stat for env-based configs');
    });

    it('skips reload for default-based configs', async () => {
      const defaultConfig: LoadedConfig = { ...initialConfig, origin: { source: 'default' } };

      let statCalled = false;
      const manager = new TestableConfigManager(configPath, defaultConfig, initialManager);
      manager.statImplementation = async () => {
        statCalled = true;
        return { mtimeMs: Date.now() + 60_000 };
      };

      await manager.ensureFresh();
      assert.equal(statCalled, false, 'Should not stat for default configs');
    });
  });

  describe('accessors', () => {
    it('expose the startup state', () => {
      const manager = new ConfigManager(configPath, initialConfig, initialManager);
      assert.equal(manager.getManager(), initialManager);
      assert.deepEqual(manager.getRoots(), initialConfig.roots);
      assert.deepEqual(manager.getSettings(), { lockTimeoutMs: 5000, recentConflictLimit: 20 });
      assert.deepEqual(manager.getConfigOrigin(), { source: 'file', path: configPath });
      assert.deepEqual(manager.getHealth(), { status: 'current' });
    });
  });
});
