/**
 * Numbered backup system for the collection document.
 * Maintains a rotating window of recent backups for manual rollback:
 * tasks.json.1 is the newest, tasks.json.<maxBackups> the oldest.
 */

import { copyFile, readdir, rename, rm, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, basename } from 'node:path';
import { StorageError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { atomicWrite, hasErrorCode, safeReadFile } from './atomic.js';

export const DEFAULT_MAX_BACKUPS = 5;

/**
 * Create a numbered backup of a file.
 * Rotates existing backups (file.1 -> file.2, etc.) and drops the oldest.
 * Returns the backup path, or null when the source does not exist yet.
 */
export async function createBackup(
  filePath: string,
  backupDir: string,
  maxBackups: number = DEFAULT_MAX_BACKUPS,
): Promise<string | null> {
  if (!existsSync(filePath)) return null;

  try {
    await mkdir(backupDir, { recursive: true });
    const fileName = basename(filePath);

    await rm(join(backupDir, `${fileName}.${maxBackups}`), { force: true });
    for (let i = maxBackups - 1; i >= 1; i--) {
      const current = join(backupDir, `${fileName}.${i}`);
      if (existsSync(current)) {
        await rename(current, join(backupDir, `${fileName}.${i + 1}`));
      }
    }

    const backupPath = join(backupDir, `${fileName}.1`);
    await copyFile(filePath, backupPath);
    return backupPath;
  } catch (err) {
    throw new StorageError(`Backup failed for: ${filePath}`, { cause: err });
  }
}

/**
 * List existing backups for a file, sorted by number (newest first).
 */
export async function listBackups(fileName: string, backupDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(backupDir);
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return [];
    throw new StorageError(`Failed to list backups in: ${backupDir}`, { cause: err });
  }

  const prefix = `${fileName}.`;
  return entries
    .filter((e) => e.startsWith(prefix) && /^\d+$/.test(e.slice(prefix.length)))
    .sort((a, b) => parseInt(a.slice(prefix.length), 10) - parseInt(b.slice(prefix.length), 10))
    .map((e) => join(backupDir, e));
}

/**
 * Restore a file from its most recent backup. The target is replaced
 * atomically, so a crash leaves either the old or the restored content.
 * Returns the path of the backup that was restored.
 */
export async function restoreFromBackup(
  fileName: string,
  backupDir: string,
  targetPath: string,
): Promise<string> {
  const [newest] = await listBackups(fileName, backupDir);
  if (newest === undefined) {
    throw new StorageError(`No backups found for: ${fileName}`, {
      code: ExitCode.NOT_FOUND,
      fix: `Backups are written to ${backupDir} on every save`,
    });
  }
  const content = await safeReadFile(newest);
  if (content === null) {
    throw new StorageError(`Restore failed, backup disappeared: ${newest}`);
  }
  await atomicWrite(targetPath, content);
  return newest;
}
