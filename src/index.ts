#!/usr/bin/env node

// Bookmark Store MCP Server
// Exposes the bookmark lifecycle over stdio; each bookmark is one YAML file
// inside one of several independently configured storage roots.

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { promises as fs } from 'fs';
import type { Bookmark } from './types.js';
import { getStoreConfig, resolveConfigPath } from './config.js';
import { ConfigManager } from './config-manager.js';
import { StorageManager } from './storage-manager.js';
import { BookmarkService, type LifecycleResult } from './bookmark-service.js';
import { StorageError, errorMessage } from './errors.js';
import { normalizeArgs } from './normalize.js';
import {
  formatBookmark, formatBookmarkList, formatDuplicateNotice, formatLifecycleFailure,
  formatLoadErrors, formatRootStats, formatSettingsSection,
} from './formatters.js';
import {
  buildCrashReport, writeCrashReport, writeCrashReportSync, readLatestCrash,
  readCrashHistory, clearLatestCrash, formatCrashReport, formatCrashSummary,
  markServerStarted, defaultCrashDir, type CrashContext,
} from './crash-journal.js';

// --- Server health state ---
// "Errors are data": safe mode is a variant, not a boolean flag.
// The server is in safe mode while no root is initialized; a successful
// config hot-reload brings it back to running.

type ServerMode =
  | { readonly kind: 'running' }
  | { readonly kind: 'safe-mode'; readonly error: string; readonly recovery: string[] };

type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

const serverStartTime = Date.now();
const crashDir = defaultCrashDir();

/** Track the last tool call for crash context */
let lastToolCall: string | undefined;

/** Why startup could not initialize the roots, if it could not */
let startupFailure: { readonly error: string; readonly recovery: string[] } | undefined;

// --- Configuration ---
const initialConfig = getStoreConfig();
const configPath = initialConfig.origin.source === 'file' ? initialConfig.origin.path : resolveConfigPath();
const configManager = new ConfigManager(configPath, initialConfig, new StorageManager(initialConfig.settings));

function serverMode(): ServerMode {
  if (configManager.getManager().rootNames().length > 0) {
    return { kind: 'running' };
  }
  return {
    kind: 'safe-mode',
    error: startupFailure?.error ?? 'No storage root is initialized.',
    recovery: startupFailure?.recovery ?? [`Add a root to ${configPath}.`],
  };
}

/** A service over whichever manager is live right now (hot-reload swaps it) */
function bookmarkService(): BookmarkService {
  return new BookmarkService(configManager.getManager());
}

function currentCrashContext(phase: CrashContext['phase']): CrashContext {
  return {
    phase,
    lastToolCall,
    configSource: configManager.getConfigOrigin().source,
    rootCount: configManager.getRoots().length,
  };
}

// --- Process-level crash protection ---
// On uncaught exception: journal the crash to disk, then die.
// The journal persists so the NEXT startup can report what happened.

process.on('uncaughtException', (error) => {
  process.stderr.write(`[bookmark-store] FATAL: Uncaught exception, journaling and exiting.\n`);
  process.stderr.write(`[bookmark-store] Error: ${error.message}\n`);
  if (error.stack) process.stderr.write(`[bookmark-store] Stack: ${error.stack}\n`);

  const filepath = writeCrashReportSync(buildCrashReport(error, 'uncaught-exception', currentCrashContext('running')), crashDir);
  if (filepath) {
    process.stderr.write(`[bookmark-store] Crash report saved: ${filepath}\n`);
  }
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  process.stderr.write(`[bookmark-store] FATAL: Unhandled rejection, journaling and exiting.\n`);
  process.stderr.write(`[bookmark-store] Error: ${error.message}\n`);
  if (error.stack) process.stderr.write(`[bookmark-store] Stack: ${error.stack}\n`);

  const filepath = writeCrashReportSync(buildCrashReport(error, 'unhandled-rejection', currentCrashContext('running')), crashDir);
  if (filepath) {
    process.stderr.write(`[bookmark-store] Crash report saved: ${filepath}\n`);
  }
  process.exit(1);
});

// --- Response helpers ---

function text(body: string): ToolResponse {
  return { content: [{ type: 'text', text: body }] };
}

function errorText(body: string): ToolResponse {
  return { content: [{ type: 'text', text: body }], isError: true };
}

function lifecycleResponse(result: LifecycleResult<Bookmark>, describe: (bookmark: Bookmark) => string): ToolResponse {
  return result.ok ? text(describe(result.value)) : errorText(formatLifecycleFailure(result.failure));
}

const server = new Server(
  { name: 'bookmark-store', version: '0.1.0' },
  { capabilities: { tools: {} } }
);

// --- Argument schemas ---

const idArgs = z.object({
  id: z.string().min(1),
  root: z.string().optional(),
});

const createArgs = z.object({
  url: z.string(),
  title: z.string(),
  root: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  tags: z.array(z.string()).optional(),
  description: z.string().nullable().optional(),
  folderPath: z.string().nullable().optional(),
  faviconPath: z.string().nullable().optional(),
  screenshotPath: z.string().nullable().optional(),
});

const updateArgs = idArgs.extend({
  url: z.string().optional(),
  title: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  tags: z.array(z.string()).optional(),
  description: z.string().nullable().optional(),
  folderPath: z.string().nullable().optional(),
  faviconPath: z.string().nullable().optional(),
  screenshotPath: z.string().nullable().optional(),
});

const listArgs = z.object({
  root: z.string().optional(),
  includeDeleted: z.boolean().default(false),
  folderPath: z.string().optional(),
});

const statsArgs = z.object({
  root: z.string().optional(),
});

const diagnoseArgs = z.object({
  showCrashHistory: z.boolean().default(false),
  reloadRoot: z.string().optional(),
});

/** Required arguments per tool, for hints after a failed parse */
const REQUIRED_ARGS: Record<string, string> = {
  bookmark_create: 'url, title',
  bookmark_get: 'id',
  bookmark_update: 'id',
  bookmark_delete: 'id',
  bookmark_restore: 'id',
  bookmark_purge: 'id',
  bookmark_track_access: 'id',
};

// Shared property definitions for tool schemas
const rootProperty = {
  type: 'string' as const,
  description: 'Storage root name. Defaults to the current root for writes and to every root for lookups.',
};
const idProperty = { type: 'string' as const, description: 'Bookmark id (a UUID)' };
const stringList = { type: 'array' as const, items: { type: 'string' as const } };

// --- Tool definitions ---
server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: [
    {
      name: 'bookmark_roots',
      description: 'List configured storage roots with their paths, bookmark counts and health.',
      inputSchema: { type: 'object' as const, properties: {} },
    },
    {
      name: 'bookmark_create',
      description: 'Save a new bookmark. Lists up to 5 active bookmarks that already have the same URL. Example: bookmark_create(url: "https://example.com", title: "Example", tags: ["docs"])',
      inputSchema: {
        type: 'object' as const,
        properties: {
          url: { type: 'string', description: 'http:// or https:// URL' },
          title: { type: 'string', description: 'Non-empty title (max 500 characters)' },
          root: rootProperty,
          keywords: { ...stringList, description: 'Up to 4 keywords, most important first' },
          tags: { ...stringList, description: 'Free-form tags' },
          description: { type: 'string', description: 'Longer notes (max 5000 characters)' },
          folderPath: { type: 'string', description: 'Relative folder, e.g. "development/typescript"' },
          faviconPath: { type: 'string', description: 'Favicon path relative to the root' },
          screenshotPath: { type: 'string', description: 'Screenshot path relative to the root' },
        },
        required: ['url', 'title'],
      },
    },
    {
      name: 'bookmark_get',
      description: 'Show one bookmark, including soft-deleted ones.',
      inputSchema: {
        type: 'object' as const,
        properties: { id: idProperty, root: rootProperty },
        required: ['id'],
      },
    },
    {
      name: 'bookmark_list',
      description: 'List bookmarks across all roots, or in one root. Soft-deleted bookmarks are hidden unless includeDeleted is true.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          root: rootProperty,
          includeDeleted: { type: 'boolean', description: 'Include soft-deleted bookmarks', default: false },
          folderPath: { type: 'string', description: 'Only bookmarks in exactly this folder' },
        },
      },
    },
    {
      name: 'bookmark_update',
      description: 'Change fields of a bookmark. Omitted fields stay as they are; null clears description, folder and asset paths.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          id: idProperty,
          root: rootProperty,
          url: { type: 'string' },
          title: { type: 'string' },
          keywords: stringList,
          tags: stringList,
          description: { type: ['string', 'null'] },
          folderPath: { type: ['string', 'null'] },
          faviconPath: { type: ['string', 'null'] },
          screenshotPath: { type: ['string', 'null'] },
        },
        required: ['id'],
      },
    },
    {
      name: 'bookmark_delete',
      description: 'Soft delete a bookmark. It stays on disk and can be restored until purged.',
      inputSchema: { type: 'object' as const, properties: { id: idProperty, root: rootProperty }, required: ['id'] },
    },
    {
      name: 'bookmark_restore',
      description: 'Undo a soft delete.',
      inputSchema: { type: 'object' as const, properties: { id: idProperty, root: rootProperty }, required: ['id'] },
    },
    {
      name: 'bookmark_purge',
      description: 'Permanently remove a soft-deleted bookmark. Active bookmarks must be deleted first.',
      inputSchema: { type: 'object' as const, properties: { id: idProperty, root: rootProperty }, required: ['id'] },
    },
    {
      name: 'bookmark_track_access',
      description: 'Record that a bookmark was opened (updates lastAccessed only).',
      inputSchema: { type: 'object' as const, properties: { id: idProperty, root: rootProperty }, required: ['id'] },
    },
    {
      name: 'bookmark_stats',
      description: 'Counts per root: total, active, deleted, unreadable files, conflicts.',
      inputSchema: {
        type: 'object' as const,
        properties: { root: { type: 'string' as const, description: 'Optional. Omit = all roots.' } },
      },
    },
    {
      name: 'bookmark_diagnose',
      description: 'Health check: server mode, per-root load errors and conflicts, settings, crash history. Pass reloadRoot to re-read a root after editing files by hand.',
      inputSchema: {
        type: 'object' as const,
        properties: {
          showCrashHistory: {
            type: 'boolean',
            description: 'Include full crash history (default: false, shows only latest)',
            default: false,
          },
          reloadRoot: { type: 'string', description: 'Rebuild this root\'s index from disk first' },
        },
      },
    },
  ],
}));

// --- Tool handlers ---
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: rawArgs } = request.params;
  lastToolCall = name; // track for crash context
  const args = normalizeArgs(name, rawArgs);

  try {
    // Ensure config is fresh before handling any tool
    await configManager.ensureFresh();

    // In safe mode, only bookmark_diagnose and bookmark_roots work
    const mode = serverMode();
    if (mode.kind === 'safe-mode' && name !== 'bookmark_diagnose' && name !== 'bookmark_roots') {
      return errorText([
        `## Bookmark Store is in Safe Mode`,
        ``,
        `**Reason:** ${mode.error}`,
        ``,
        `Available tools in safe mode:`,
        `- **bookmark_diagnose**: crash details and recovery steps`,
        `- **bookmark_roots**: server configuration`,
        ``,
        `### Recovery Steps`,
        ...mode.recovery.map(s => `- ${s}`),
      ].join('\n'));
    }

    switch (name) {
      case 'bookmark_roots': {
        const manager = configManager.getManager();
        const origin = configManager.getConfigOrigin();
        const roots = configManager.getRoots().map(root => {
          const loaded = manager.getRoot(root.name) !== undefined;
          return {
            name: root.name,
            path: root.path,
            current: manager.currentRootName() === root.name,
            default: root.isDefault,
            health: loaded ? 'loaded' : 'not initialized',
            ...(loaded ? manager.stats(root.name) : {}),
          };
        });
        const result = {
          serverMode: mode.kind,
          configFile: origin.source === 'file' ? origin.path : '(not using config file)',
          configSource: origin.source,
          roots,
          recentConflicts: manager.recentConflicts(),
        };
        return text(JSON.stringify(result, null, 2));
      }

      case 'bookmark_create': {
        const input = createArgs.parse(args);
        const service = bookmarkService();
        // Looked up first so the new record does not match itself
        const duplicates = formatDuplicateNotice(service.findByUrl(input.url));
        const result = await service.create(input);
        return lifecycleResponse(result, b => {
          const created = `[${b.storageRoot}] Created bookmark ${b.id}\n\n${formatBookmark(b)}`;
          return duplicates ? `${created}\n\n${duplicates}` : created;
        });
      }

      case 'bookmark_get': {
        const { id, root } = idArgs.parse(args);
        return lifecycleResponse(bookmarkService().get(id, root), formatBookmark);
      }

      case 'bookmark_list': {
        const { root, includeDeleted, folderPath } = listArgs.parse(args);
        const bookmarks = bookmarkService().list({ rootName: root, includeDeleted, folderPath });
        return text(formatBookmarkList(bookmarks, root ? `root "${root}"` : 'all roots'));
      }

      case 'bookmark_update': {
        const { id, root, ...patch } = updateArgs.parse(args);
        const result = await bookmarkService().update(id, patch, root);
        return lifecycleResponse(result, b => `[${b.storageRoot}] Updated bookmark ${b.id}\n\n${formatBookmark(b)}`);
      }

      case 'bookmark_delete': {
        const { id, root } = idArgs.parse(args);
        const result = await bookmarkService().delete(id, root);
        return lifecycleResponse(result, b => `[${b.storageRoot}] Soft deleted ${b.id} ("${b.title}"). Use bookmark_restore to undo.`);
      }

      case 'bookmark_restore': {
        const { id, root } = idArgs.parse(args);
        const result = await bookmarkService().restore(id, root);
        return lifecycleResponse(result, b => `[${b.storageRoot}] Restored ${b.id} ("${b.title}").`);
      }

      case 'bookmark_purge': {
        const { id, root } = idArgs.parse(args);
        const result = await bookmarkService().purge(id, root);
        return lifecycleResponse(result, b => `[${b.storageRoot}] Permanently removed ${b.id} ("${b.title}").`);
      }

      case 'bookmark_track_access': {
        const { id, root } = idArgs.parse(args);
        const result = await bookmarkService().trackAccess(id, root);
        return lifecycleResponse(result, b => `[${b.storageRoot}] ${b.id} last accessed ${b.lastAccessed ?? 'never'}`);
      }

      case 'bookmark_stats': {
        const { root } = statsArgs.parse(args);
        const manager = configManager.getManager();
        const current = manager.currentRootName();
        const names = root ? [root] : manager.rootNames();
        const sections = names.map(rootName => {
          const config = manager.getRoot(rootName);
          if (!config) throw new StorageError('unknown-root', `Storage not found: ${rootName}`);
          return formatRootStats(config, manager.stats(rootName), rootName === current);
        });
        return text(sections.join('\n\n---\n\n'));
      }

      case 'bookmark_diagnose': {
        const { showCrashHistory, reloadRoot } = diagnoseArgs.parse(args);
        const sections: string[] = [];
        if (reloadRoot) {
          const stats = await configManager.getManager().reloadRoot(reloadRoot);
          sections.push(`Reloaded ${reloadRoot}: ${stats.total} bookmarks, ${stats.errorCount} errors, ${stats.conflictCount} conflicts`);
          sections.push('');
        }
        sections.push(await buildDiagnosticsText(showCrashHistory));
        return text(sections.join('\n'));
      }

      default:
        return errorText(`Unknown tool: ${name}`);
    }
  } catch (error: unknown) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(i => `- ${i.path.join('.') || 'arguments'}: ${i.message}`);
      const required = REQUIRED_ARGS[name];
      const hint = required ? `\n\nHint: ${name} requires: ${required}` : '';
      return errorText(`Invalid arguments for ${name}:\n${issues.join('\n')}${hint}`);
    }

    let hint = '';
    if (error instanceof StorageError) {
      if (error.kind === 'unknown-root') {
        hint = `\n\nHint: available roots: ${configManager.getManager().rootNames().join(', ')}`;
      } else if (error.kind === 'lock-timeout') {
        hint = '\n\nHint: another writer is holding this bookmark; retry shortly.';
      }
    }
    return errorText(`Error: ${errorMessage(error)}${hint}`);
  }
});

// --- Helpers ---

/** Build diagnostics text for bookmark_diagnose */
async function buildDiagnosticsText(showFullCrashHistory: boolean): Promise<string> {
  const sections: string[] = [];
  const manager = configManager.getManager();
  const mode = serverMode();
  const origin = configManager.getConfigOrigin();

  sections.push(`## Bookmark Store Diagnostics`);
  sections.push('');
  sections.push(`**Server mode:** ${mode.kind}`);
  sections.push(`**Uptime:** ${Math.round((Date.now() - serverStartTime) / 1000)}s`);
  sections.push(`**Config source:** ${origin.source}${origin.source === 'file' ? ` (${origin.path})` : ''}`);
  sections.push(`**Roots:** ${configManager.getRoots().length} configured, current: ${manager.currentRootName() ?? '(none)'}`);
  sections.push('');

  const health = configManager.getHealth();
  if (health.status === 'stale') {
    sections.push('### Config Reload Failed');
    sections.push(`Since ${health.since}: ${health.error}`);
    for (const step of health.recovery) {
      sections.push(`- ${step}`);
    }
    sections.push('');
  }

  sections.push('### Root Health');
  for (const rootName of manager.rootNames()) {
    const stats = manager.stats(rootName);
    sections.push(`- **${rootName}**: ${stats.total} bookmarks (${stats.active} active, ${stats.deleted} deleted)`);
    sections.push(formatLoadErrors(rootName, manager.loadErrors(rootName)));
  }
  const conflicts = manager.recentConflicts();
  if (conflicts.length > 0) {
    sections.push('');
    sections.push('### Recent Conflicts');
    sections.push(...conflicts.map(c => `- ${c}`));
  }
  sections.push('');

  sections.push('### Active Settings');
  sections.push(formatSettingsSection(configManager.getSettings()));
  sections.push('');

  const latestCrash = await readLatestCrash(crashDir);
  if (latestCrash) {
    sections.push('### Latest Crash');
    sections.push(formatCrashSummary(latestCrash));
    sections.push('');
    sections.push(formatCrashReport(latestCrash));
    sections.push('');
    await clearLatestCrash(crashDir);
  } else {
    sections.push('### Crash History');
    sections.push('No recent crashes recorded.');
    sections.push('');
  }

  if (showFullCrashHistory) {
    const history = await readCrashHistory(10, crashDir);
    if (history.length > 0) {
      sections.push('### Full Crash History (last 10)');
      for (const crash of history) {
        sections.push(`- **${crash.timestamp}** [${crash.type}]: ${crash.error.substring(0, 100)}`);
        sections.push(`  Phase: ${crash.context.phase}, Uptime: ${crash.serverUptime}s`);
      }
      sections.push('');
    }
  }

  if (mode.kind === 'safe-mode') {
    sections.push('### Safe Mode Recovery');
    sections.push('The server is in safe mode: bookmark tools are disabled.');
    for (const step of mode.recovery) {
      sections.push(`- ${step}`);
    }
  }

  return sections.join('\n');
}

// --- Startup ---
async function main(): Promise<void> {
  markServerStarted();

  // Check for crash report from a previous run
  const previousCrash = await readLatestCrash(crashDir);
  if (previousCrash) {
    process.stderr.write(`[bookmark-store] Previous crash detected: ${formatCrashSummary(previousCrash)}\n`);
    process.stderr.write(`[bookmark-store] Crash report will be shown in bookmark_diagnose.\n`);
  }

  // The default root lives under ~/.bookmark-store and is ours to create
  if (initialConfig.origin.source === 'default') {
    for (const root of initialConfig.roots) {
      await fs.mkdir(root.path, { recursive: true });
    }
  }

  try {
    await configManager.getManager().initialize(initialConfig.roots);
    for (const root of initialConfig.roots) {
      process.stderr.write(`[bookmark-store] Root "${root.name}" -> ${root.path}\n`);
    }
  } catch (error: unknown) {
    const rootName = error instanceof StorageError ? error.root : undefined;
    const message = errorMessage(error);
    startupFailure = {
      error: message,
      recovery: [
        rootName ? `Fix or remove the root "${rootName}" in ${configPath}.` : `Check the roots in ${configPath}.`,
        'Each root must be an existing, writable directory.',
        'The server reloads the config file automatically once it changes.',
        'Call bookmark_diagnose for detailed error information.',
      ],
    };
    process.stderr.write(`[bookmark-store] SAFE MODE: ${message}\n`);

    const report = buildCrashReport(error, 'root-init-failure', {
      phase: 'startup',
      activeRoot: rootName,
      configSource: initialConfig.origin.source,
      rootCount: initialConfig.roots.length,
    });
    try {
      await writeCrashReport(report, crashDir);
    } catch (writeError: unknown) {
      process.stderr.write(`[bookmark-store] Could not write crash report: ${errorMessage(writeError)}\n`);
    }
  }

  const transport = new StdioServerTransport();

  // Handle transport errors: journal, keep serving
  transport.onerror = (error) => {
    process.stderr.write(`[bookmark-store] Transport error: ${error.message}\n`);
    writeCrashReportSync(buildCrashReport(error, 'transport-error', currentCrashContext('running')), crashDir);
  };

  server.onerror = (error) => {
    process.stderr.write(`[bookmark-store] Server error: ${error.message}\n`);
  };

  // Handle stdin/stdout pipe breaks
  process.stdin.on('end', () => {
    process.stderr.write('[bookmark-store] stdin closed, host disconnected. Exiting.\n');
    process.exit(0);
  });
  process.stdout.on('error', (error) => {
    process.stderr.write(`[bookmark-store] stdout error (pipe broken?): ${error.message}\n`);
    process.exit(0);
  });

  await server.connect(transport);
  const mode = serverMode();
  const modeStr = mode.kind === 'running' ? '' : ` [${mode.kind.toUpperCase()}]`;
  process.stderr.write(`[bookmark-store] Server started${modeStr} with ${configManager.getManager().rootNames().length} root(s)\n`);

  // Graceful shutdown on signals
  const shutdown = () => {
    process.stderr.write('[bookmark-store] Shutting down gracefully.\n');
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  process.stderr.write(`[bookmark-store] Fatal startup error: ${errorMessage(error)}\n`);
  if (error instanceof Error && error.stack) {
    process.stderr.write(`[bookmark-store] Stack: ${error.stack}\n`);
  }

  writeCrashReportSync(buildCrashReport(error, 'startup-failure', {
    phase: 'startup',
    configSource: initialConfig.origin.source,
    rootCount: initialConfig.roots.length,
  }), crashDir);

  process.exit(1);
});
