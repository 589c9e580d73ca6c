/**
 * Atomic file write operations using write-file-atomic.
 * Ensures writes are crash-safe: temp file -> rename. Readers observe either
 * the previous content or the new content, never a partial write.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir, appendFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StorageError } from '../core/errors.js';

/** True when a filesystem error carries the given errno code. */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 */
export async function atomicWrite(
  filePath: string,
  data: string,
  options?: { mode?: number; encoding?: BufferEncoding },
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, {
      encoding: options?.encoding ?? 'utf8',
      mode: options?.mode,
    });
  } catch (err) {
    throw new StorageError(`Atomic write failed: ${filePath}`, { cause: err });
  }
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) {
      return null;
    }
    throw new StorageError(`Failed to read: ${filePath}`, { cause: err });
  }
}

/**
 * Write JSON data atomically with consistent formatting.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options?: { indent?: number },
): Promise<void> {
  const json = JSON.stringify(data, null, options?.indent ?? 2) + '\n';
  await atomicWrite(filePath, json);
}

/**
 * Append text to the end of a file, creating it (and its parent
 * directories) when absent. Existing content is never rewritten.
 */
export async function appendToFile(filePath: string, data: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await appendFile(filePath, data, 'utf8');
  } catch (err) {
    throw new StorageError(`Append failed: ${filePath}`, { cause: err });
  }
}

/**
 * Truncate a file to zero length, creating it when absent.
 */
export async function truncateFile(filePath: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, '', 'utf8');
  } catch (err) {
    throw new StorageError(`Truncate failed: ${filePath}`, { cause: err });
  }
}
