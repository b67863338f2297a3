// Crash journal: persistent, human-readable record of server failures.
//
// Crashes become structured JSON reports instead of silent exits, and the
// newest one is surfaced by bookmark_diagnose on the next start.
//
// Location: ~/.bookmark-store/crashes/ (every function takes the directory)
//   crash-<timestamp>.json   one file per crash
//   LATEST.json             copy of the most recent crash

import { promises as fs, mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import { storeHomeDir } from './config.js';
import { errorMessage } from './errors.js';

/** A single crash report */
export interface CrashReport {
  readonly timestamp: string;         // ISO 8601
  readonly pid: number;
  readonly error: string;
  readonly stack?: string;
  readonly type: CrashType;
  readonly context: CrashContext;
  readonly recovery: string[];        // human-readable recovery steps
  readonly serverUptime: number;      // seconds since startup
}

export type CrashType =
  | 'uncaught-exception'
  | 'unhandled-rejection'
  | 'startup-failure'
  | 'root-init-failure'
  | 'transport-error'
  | 'unknown';

/** What the server was doing when it crashed */
export interface CrashContext {
  readonly phase: 'startup' | 'running' | 'shutdown';
  readonly lastToolCall?: string;
  readonly activeRoot?: string;       // which root was involved, if any
  readonly configSource?: string;
  readonly rootCount?: number;
}

const LATEST_FILE = 'LATEST.json';
const MAX_CRASH_FILES = 20; // keep last 20 crash reports

let serverStartTime = Date.now();

export function defaultCrashDir(): string {
  return path.join(storeHomeDir(), 'crashes');
}

/** Reset the start time (called on startup) */
export function markServerStarted(): void {
  serverStartTime = Date.now();
}

function crashFileName(report: CrashReport): string {
  return `crash-${report.timestamp.replace(/[:.]/g, '-')}.json`;
}

async function listCrashFiles(dir: string): Promise<string[]> {
  return (await fs.readdir(dir))
    .filter(f => f.startsWith('crash-') && f.endsWith('.json'))
    .sort()
    .reverse();
}

function isCrashReport(value: unknown): value is CrashReport {
  return typeof value === 'object' && value !== null
    && 'timestamp' in value && typeof value.timestamp === 'string'
    && 'type' in value && typeof value.type === 'string'
    && 'error' in value && typeof value.error === 'string';
}

async function readReport(filePath: string): Promise<CrashReport | null> {
  const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  return isCrashReport(parsed) ? parsed : null;
}

/** Write a crash report and prune all but the newest MAX_CRASH_FILES. Returns its path. */
export async function writeCrashReport(report: CrashReport, dir: string = defaultCrashDir()): Promise<string> {
  await fs.mkdir(dir, { recursive: true });

  const filepath = path.join(dir, crashFileName(report));
  const content = JSON.stringify(report, null, 2);

  await fs.writeFile(filepath, content, 'utf-8');
  await fs.writeFile(path.join(dir, LATEST_FILE), content, 'utf-8');

  try {
    for (const old of (await listCrashFiles(dir)).slice(MAX_CRASH_FILES)) {
      await fs.unlink(path.join(dir, old));
    }
  } catch (error: unknown) {
    process.stderr.write(`[bookmark-store] Crash journal pruning failed: ${errorMessage(error)}\n`);
  }

  return filepath;
}

/** Synchronous version for process exit handlers, where pending promises never settle */
export function writeCrashReportSync(report: CrashReport, dir: string = defaultCrashDir()): string | null {
  try {
    mkdirSync(dir, { recursive: true });
    const filepath = path.join(dir, crashFileName(report));
    const content = JSON.stringify(report, null, 2);
    writeFileSync(filepath, content, 'utf-8');
    writeFileSync(path.join(dir, LATEST_FILE), content, 'utf-8');
    return filepath;
  } catch (error: unknown) {
    process.stderr.write(`[bookmark-store] Could not write crash report: ${errorMessage(error)}\n`);
    return null;
  }
}

export function buildCrashReport(
  error: unknown,
  type: CrashType,
  context: CrashContext,
): CrashReport {
  const message = errorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    timestamp: new Date().toISOString(),
    pid: process.pid,
    error: message,
    stack,
    type,
    context,
    recovery: generateRecoverySteps(type, message, context),
    serverUptime: Math.round((Date.now() - serverStartTime) / 1000),
  };
}

function generateRecoverySteps(type: CrashType, message: string, context: CrashContext): string[] {
  const steps: string[] = ['Restart the bookmark-store server from your MCP client.'];

  switch (type) {
    case 'startup-failure':
      if (message.includes('config.json')) {
        steps.push('Check ~/.bookmark-store/config.json for syntax errors (invalid JSON).');
      }
      if (message.includes('does not exist') || message.includes('ENOENT')) {
        steps.push('Verify every "path" in the "roots" list exists on disk.');
      }
      steps.push('Run node dist/index.js directly to see stderr output.');
      break;

    case 'root-init-failure':
      steps.push(`The storage root "${context.activeRoot ?? 'unknown'}" failed to initialize.`);
      steps.push('Check that the root directory exists, is a directory, and is writable.');
      steps.push('Remove or fix the root in the config file; other roots load once it is gone.');
      break;

    case 'uncaught-exception':
    case 'unhandled-rejection':
      steps.push('This is likely a bug in the bookmark-store server.');
      steps.push('If reproducible, note which tool call triggered it.');
      if (message.includes('ENOSPC')) {
        steps.push('Disk is full: free space and restart.');
      }
      if (message.includes('EACCES') || message.includes('EPERM')) {
        steps.push('Permission error: check file permissions on the storage root directories.');
      }
      break;

    case 'transport-error':
      steps.push('The stdio channel to the MCP client broke.');
      steps.push('This usually happens when the client restarts; reconnecting is enough.');
      break;

    default:
      steps.push('Check the stack trace for details.');
  }

  return steps;
}

/** Read the most recent crash report, or null when there is none */
export async function readLatestCrash(dir: string = defaultCrashDir()): Promise<CrashReport | null> {
  try {
    return await readReport(path.join(dir, LATEST_FILE));
  } catch {
    return null;
  }
}

/** Read crash reports, newest first. Unreadable files are skipped. */
export async function readCrashHistory(limit: number = 10, dir: string = defaultCrashDir()): Promise<CrashReport[]> {
  let files: string[];
  try {
    files = (await listCrashFiles(dir)).slice(0, limit);
  } catch {
    return [];
  }

  const reports: CrashReport[] = [];
  for (const file of files) {
    try {
      const report = await readReport(path.join(dir, file));
      if (report) reports.push(report);
    } catch (error: unknown) {
      process.stderr.write(`[bookmark-store] Skipping unreadable crash report ${file}: ${errorMessage(error)}\n`);
    }
  }
  return reports;
}

/** Clear the latest crash indicator once it has been shown */
export async function clearLatestCrash(dir: string = defaultCrashDir()): Promise<void> {
  await fs.rm(path.join(dir, LATEST_FILE), { force: true });
}

export function formatCrashReport(report: CrashReport): string {
  const lines: string[] = [
    `## Bookmark Store Crash Report`,
    ``,
    `**When:** ${report.timestamp}`,
    `**Type:** ${report.type}`,
    `**Phase:** ${report.context.phase}`,
    `**Uptime:** ${report.serverUptime}s before crash`,
    `**Error:** ${report.error}`,
  ];

  if (report.context.lastToolCall) {
    lines.push(`**Last tool call:** ${report.context.lastToolCall}`);
  }
  if (report.context.activeRoot) {
    lines.push(`**Affected root:** ${report.context.activeRoot}`);
  }

  lines.push('');
  lines.push('### Recovery Steps');
  for (const step of report.recovery) {
    lines.push(`- ${step}`);
  }

  if (report.stack) {
    const stackLines = report.stack.split('\n');
    lines.push('');
    lines.push('### Stack Trace');
    lines.push('```');
    lines.push(stackLines.slice(0, 10).join('\n'));
    if (stackLines.length > 10) {
      lines.push('... (truncated)');
    }
    lines.push('```');
  }

  return lines.join('\n');
}

/** One-line summary for diagnostics headers */
export function formatCrashSummary(report: CrashReport, now: Date = new Date()): string {
  const age = Math.round((now.getTime() - new Date(report.timestamp).getTime()) / 1000 / 60);
  const ageStr = age < 60 ? `${age}m ago` : `${Math.round(age / 60)}h ago`;
  return `[!] Server crashed ${ageStr}: ${report.type}: ${report.error.substring(0, 100)}`;
}
