// Tests for config.ts: configuration loading with 3-tier fallback.
// Every test passes its own config path, env and home, so nothing here
// reads the real ~/.bookmark-store or process.env.

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import {
  getStoreConfig,
  parseStoreSettings,
  parseRootEntries,
  resolveRoot,
  resolveConfigPath,
  defaultRootPath,
  DEFAULT_SETTINGS,
  ROOTS_ENV,
  CONFIG_PATH_ENV,
} from '../config.js';

const HOME = '/home/tester';

describe('getStoreConfig', () => {
  let tempDir: string;
  let configPath: string;

  async function writeConfig(content: unknown): Promise<void> {
    const text = typeof content === 'string' ? content : JSON.stringify(content);
    await fs.writeFile(configPath, text, 'utf-8');
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bookmark-store-config-test-'));
    configPath = path.join(tempDir, 'config.json');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true }).catch(() => {});
  });

  describe('config file (tier 1)', () => {
    it('loads roots and settings', async () => {
      await writeConfig({
        roots: [
          { name: 'main', path: '~/bookmarks/main', current: true },
          { name: 'work', path: '/srv/work', default: true },
        ],
        lockTimeoutMs: 2000,
      });

      const config = getStoreConfig({ configPath, env: {}, home: HOME });
      assert.deepStrictEqual(config, {
        roots: [
          { name: 'main', path: '/home/tester/bookmarks/main', isCurrent: true, isDefault: false },
          { name: 'work', path: '/srv/work', isCurrent: false, isDefault: true },
        ],
        origin: { source: 'file', path: configPath },
        settings: { lockTimeoutMs: 2000, recentConflictLimit: 20 },
      });
    });

    it('wins over the env var', async () => {
      await writeConfig({ roots: [{ name: 'main', path: '/srv/main' }] });
      const config = getStoreConfig({ configPath, env: { [ROOTS_ENV]: '{"other":"/srv/other"}' }, home: HOME });
      assert.deepStrictEqual(config.roots.map(r => r.name), ['main']);
      assert.strictEqual(config.origin.source, 'file');
    });

    it('keeps loading when one root entry is bad', async () => {
      await writeConfig({ roots: [{ name: 'bad name', path: '/srv/a' }, { name: 'good', path: '/srv/b' }] });
      const config = getStoreConfig({ configPath, env: {}, home: HOME });
      assert.deepStrictEqual(config.roots.map(r => r.name), ['good']);
    });

    it('falls through on invalid JSON', async () => {
      await writeConfig('{ "roots": [');
      const config = getStoreConfig({ configPath, env: { [ROOTS_ENV]: '{"env":"/srv/env"}' }, home: HOME });
      assert.deepStrictEqual(config.origin, { source: 'env' });
    });

    it('falls through when roots is missing', async () => {
      await writeConfig({ lockTimeoutMs: 1000 });
      const config = getStoreConfig({ configPath, env: {}, home: HOME });
      assert.deepStrictEqual(config.origin, { source: 'default' });
    });

    it('falls through when no root is usable', async () => {
      await writeConfig({ roots: [{ name: 'x' }] });
      const config = getStoreConfig({ configPath, env: {}, home: HOME });
      assert.deepStrictEqual(config.origin, { source: 'default' });
    });
  });

  describe('env var (tier 2)', () => {
    it('loads a JSON object of name to path in order', () => {
      const config = getStoreConfig({
        configPath,
        env: { [ROOTS_ENV]: '{"personal":"$HOME/bm","shared":"/srv/shared"}' },
        home: HOME,
      });
      assert.deepStrictEqual(config, {
        roots: [
          { name: 'personal', path: '/home/tester/bm', isCurrent: false, isDefault: false },
          { name: 'shared', path: '/srv/shared', isCurrent: false, isDefault: false },
        ],
        origin: { source: 'env' },
        settings: DEFAULT_SETTINGS,
      });
    });

    it('falls back to the default root when the value is not an object', () => {
      const config = getStoreConfig({ configPath, env: { [ROOTS_ENV]: '["/srv/a"]' }, home: HOME });
      assert.deepStrictEqual(config.origin, { source: 'default' });
    });

    it('falls back to the default root when the value is not JSON', () => {
      const config = getStoreConfig({ configPath, env: { [ROOTS_ENV]: 'main=/srv/main' }, home: HOME });
      assert.deepStrictEqual(config.origin, { source: 'default' });
    });
  });

  describe('default (tier 3)', () => {
    it('uses one current, default root under the home directory', () => {
      const config = getStoreConfig({ configPath, env: {}, home: HOME });
      assert.deepStrictEqual(config, {
        roots: [{ name: 'default', path: '/home/tester/.bookmark-store/default', isCurrent: true, isDefault: true }],
        origin: { source: 'default' },
        settings: DEFAULT_SETTINGS,
      });
    });
  });
});

describe('resolveConfigPath', () => {
  it('defaults to config.json in the store home', () => {
    assert.strictEqual(resolveConfigPath({}, HOME), '/home/tester/.bookmark-store/config.json');
  });

  it('honors the override env var', () => {
    assert.strictEqual(resolveConfigPath({ [CONFIG_PATH_ENV]: '~/custom.json' }, HOME), '/home/tester/custom.json');
  });
});

describe('resolveRoot', () => {
  it('expands a leading ~ or $HOME', () => {
    assert.strictEqual(resolveRoot('~', HOME), HOME);
    assert.strictEqual(resolveRoot('~/bm', HOME), '/home/tester/bm');
    assert.strictEqual(resolveRoot('$HOME/bm', HOME), '/home/tester/bm');
  });

  it('leaves other paths alone', () => {
    assert.strictEqual(resolveRoot('/srv/bm', HOME), '/srv/bm');
    assert.strictEqual(resolveRoot('~other/bm', HOME), '~other/bm');
    assert.strictEqual(resolveRoot('$HOMEDIR/bm', HOME), '$HOMEDIR/bm');
    assert.strictEqual(resolveRoot('relative/~/bm', HOME), 'relative/~/bm');
  });
});

describe('defaultRootPath', () => {
  it('lives under the store home', () => {
    assert.strictEqual(defaultRootPath(HOME), '/home/tester/.bookmark-store/default');
  });
});

describe('parseStoreSettings', () => {
  it('returns defaults when nothing is set', () => {
    assert.deepStrictEqual(parseStoreSettings({}), { lockTimeoutMs: 5000, recentConflictLimit: 20 });
  });

  it('accepts values in range and rounds them', () => {
    assert.deepStrictEqual(
      parseStoreSettings({ lockTimeoutMs: 1500.4, recentConflictLimit: 0 }),
      { lockTimeoutMs: 1500, recentConflictLimit: 0 },
    );
  });

  it('accepts numeric strings', () => {
    assert.strictEqual(parseStoreSettings({ lockTimeoutMs: '750' }).lockTimeoutMs, 750);
  });

  it('falls back to the default when out of range or not a number', () => {
    assert.deepStrictEqual(
      parseStoreSettings({ lockTimeoutMs: 50, recentConflictLimit: 501 }),
      { lockTimeoutMs: 5000, recentConflictLimit: 20 },
    );
    assert.strictEqual(parseStoreSettings({ lockTimeoutMs: 'soon' }).lockTimeoutMs, 5000);
    assert.strictEqual(parseStoreSettings({ lockTimeoutMs: 60_001 }).lockTimeoutMs, 5000);
  });
});

describe('parseRootEntries', () => {
  it('maps flags and expands paths', () => {
    assert.deepStrictEqual(
      parseRootEntries([{ name: 'a', path: '~/a', current: true }], HOME),
      [{ name: 'a', path: '/home/tester/a', isCurrent: true, isDefault: false }],
    );
  });

  it('skips malformed entries', () => {
    const roots = parseRootEntries([
      'not an object',
      { name: 'no-path' },
      { name: 'empty-path', path: '' },
      { name: 'flag', path: '/srv/flag', current: 'yes' },
      { name: 'ok', path: '/srv/ok' },
    ], HOME);
    assert.deepStrictEqual(roots.map(r => r.name), ['ok']);
  });

  it('skips names outside the allowed charset', () => {
    const roots = parseRootEntries([{ name: 'my.root', path: '/srv/a' }, { name: 'my_root-2', path: '/srv/b' }], HOME);
    assert.deepStrictEqual(roots.map(r => r.name), ['my_root-2']);
  });

  it('keeps the first of two entries with the same name', () => {
    const roots = parseRootEntries([{ name: 'a', path: '/srv/one' }, { name: 'a', path: '/srv/two' }], HOME);
    assert.deepStrictEqual(roots, [{ name: 'a', path: '/srv/one', isCurrent: false, isDefault: false }]);
  });
});
