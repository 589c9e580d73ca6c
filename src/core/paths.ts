/**
 * Path resolution for task-ledger.
 *
 * Environment variables:
 *   TASK_LEDGER_HOME - Global directory (default: ~/.task-ledger)
 *   TASK_LEDGER_DIR  - Project data directory (default: .task-ledger)
 */

import { resolve, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';
import type { TaskLedgerConfig } from '../types/config.js';

/**
 * Get the global task-ledger home directory.
 * Respects TASK_LEDGER_HOME env var, defaults to ~/.task-ledger.
 */
export function getLedgerHome(): string {
  return process.env['TASK_LEDGER_HOME'] ?? join(homedir(), '.task-ledger');
}

/**
 * Get the absolute path to the project data directory.
 * Respects TASK_LEDGER_DIR env var, defaults to ".task-ledger" under cwd.
 */
export function getDataDir(cwd?: string): string {
  const dataDir = process.env['TASK_LEDGER_DIR'] ?? '.task-ledger';
  if (isAbsolute(dataDir)) {
    return dataDir;
  }
  return resolve(cwd ?? process.cwd(), dataDir);
}

/** Get the path to the project's config.json file. */
export function getConfigPath(dataDir: string): string {
  return join(dataDir, 'config.json');
}

/** Get the path to the global config.json file. */
export function getGlobalConfigPath(): string {
  return join(getLedgerHome(), 'config.json');
}

/** Resolve a path from the config relative to the data directory. */
function resolveInDataDir(dataDir: string, path: string): string {
  return isAbsolute(path) ? path : join(dataDir, path);
}

/** Get the path to the collection document. */
export function getTaskPath(dataDir: string, config: TaskLedgerConfig): string {
  return resolveInDataDir(dataDir, config.storage.dataFile);
}

/** Get the path to the audit log. */
export function getAuditLogPath(dataDir: string, config: TaskLedgerConfig): string {
  return resolveInDataDir(dataDir, config.storage.auditFile);
}

/** Get the backup directory for the collection document. */
export function getBackupDir(dataDir: string, config: TaskLedgerConfig): string {
  return resolveInDataDir(dataDir, config.backup.dir);
}
