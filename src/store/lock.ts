/**
 * Locking primitives for task-ledger data files.
 *
 * Two layers:
 *   - Mutex: an in-process FIFO lock owned by one repository instance.
 *     Every operation on that instance runs inside it.
 *   - withLock: an advisory file lock (proper-lockfile) held for the same
 *     critical section, so a second process touching the same file fails
 *     fast instead of interleaving writes.
 */

import lockfile from 'proper-lockfile';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StorageError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default lock options. */
const DEFAULT_LOCK_OPTIONS = {
  retries: {
    retries: 3,
    minTimeout: 100,
    maxTimeout: 1000,
    factor: 2,
  },
  stale: 10_000,
  realpath: false,
};

/** A release function returned by acquireLock. */
export type ReleaseFn = () => Promise<void>;

/** Overrides for the default lock options. */
export interface LockOptions {
  stale?: number;
  retries?: number;
}

/**
 * Acquire an exclusive lock on a file.
 * The file itself need not exist; its parent directory is created.
 * Returns a release function that must be called when done.
 */
export async function acquireLock(filePath: string, options?: LockOptions): Promise<ReleaseFn> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    return await lockfile.lock(filePath, {
      ...DEFAULT_LOCK_OPTIONS,
      ...(options?.stale !== undefined && { stale: options.stale }),
      ...(options?.retries !== undefined && {
        retries: {
          ...DEFAULT_LOCK_OPTIONS.retries,
          retries: options.retries,
        },
      }),
    });
  } catch (err) {
    throw new StorageError(`Failed to acquire lock: ${filePath}`, {
      code: ExitCode.LOCK_TIMEOUT,
      fix: 'Another process may be writing to this file. Wait and retry.',
      cause: err,
    });
  }
}

/**
 * Check if a file is currently locked.
 */
export async function isLocked(filePath: string): Promise<boolean> {
  try {
    return await lockfile.check(filePath, { realpath: false });
  } catch (err) {
    throw new StorageError(`Failed to check lock: ${filePath}`, { cause: err });
  }
}

/**
 * Execute a function while holding an exclusive lock on a file.
 * The lock is released when the function completes (or throws).
 */
export async function withLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options?: LockOptions,
): Promise<T> {
  const release = await acquireLock(filePath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}

/**
 * In-process mutual exclusion. Callers queue in arrival order and wait
 * without a timeout; a failing task releases the lock like a passing one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
