/**
 * Append-only audit trail stored as JSONL, one entry per line.
 *
 * The log owns its file. Entries are never edited; the only destructive
 * operation is clear(), which truncates the whole file.
 */

import type { Logger } from 'pino';
import { appendJsonl } from './json.js';
import { safeReadFile, truncateFile } from './atomic.js';
import { Mutex } from './lock.js';
import { AuditEntrySchema, type AuditEntry } from './validation-schemas.js';
import { StorageError, ValidationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { systemClock, type Clock } from '../core/clock.js';
import type { AuditOperation } from '../types/task.js';

export type { AuditEntry };

/** Actor recorded when the caller does not name one. */
export const DEFAULT_ACTOR = 'system';

/** Equality filters and result cap for query(). */
export interface AuditQuery {
  recordId?: string;
  operation?: AuditOperation;
  limit?: number;
}

export interface AuditLogOptions {
  clock?: Clock;
  logger?: Logger;
}

export class AuditLog {
  readonly filePath: string;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly mutex = new Mutex();

  constructor(filePath: string, options: AuditLogOptions = {}) {
    this.filePath = filePath;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? getLogger('audit');
  }

  /**
   * Write one entry to the end of the log.
   * Fails only with StorageError when the file cannot be written.
   */
  async append(
    operation: AuditOperation,
    recordId: string,
    actor: string = DEFAULT_ACTOR,
    details: Record<string, unknown> = {},
  ): Promise<AuditEntry> {
    const entry: AuditEntry = {
      timestamp: this.clock.now().toISOString(),
      operation,
      record_id: recordId,
      actor,
      details,
    };
    await this.mutex.runExclusive(() => appendJsonl(this.filePath, entry));
    this.log.debug({ operation, recordId, actor }, 'Audit entry appended');
    return entry;
  }

  /**
   * Read every entry from disk, filter, and sort newest first.
   * Entries with equal timestamps keep reverse append order (the later
   * append first). `limit` caps the result after sorting.
   */
  async query(filter: AuditQuery = {}): Promise<AuditEntry[]> {
    if (filter.limit !== undefined && (!Number.isInteger(filter.limit) || filter.limit < 1)) {
      throw new ValidationError(`Invalid limit: ${filter.limit}. Use a positive integer`);
    }

    // Reads share the append mutex so a line is never seen half-written.
    const entries = (await this.mutex.runExclusive(() => this.readAll()))
      .filter((e) => filter.recordId === undefined || e.record_id === filter.recordId)
      .filter((e) => filter.operation === undefined || e.operation === filter.operation)
      .reverse()
      .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp));

    return filter.limit !== undefined ? entries.slice(0, filter.limit) : entries;
  }

  /**
   * Truncate the log to empty. Irreversible; maintenance use only.
   */
  async clear(): Promise<void> {
    await this.mutex.runExclusive(() => truncateFile(this.filePath));
    this.log.warn({ filePath: this.filePath }, 'Audit log cleared');
  }

  /** All entries in file order. A missing file reads as empty. */
  private async readAll(): Promise<AuditEntry[]> {
    const content = await safeReadFile(this.filePath);
    if (content === null) return [];

    const entries: AuditEntry[] = [];
    const lines = content.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim();
      if (!line) continue;
      entries.push(this.parseLine(line, i + 1));
    }
    return entries;
  }

  private parseLine(line: string, lineNumber: number): AuditEntry {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      throw new StorageError(`Malformed audit entry at ${this.filePath}:${lineNumber}`, { cause: err });
    }
    const result = AuditEntrySchema.safeParse(raw);
    if (!result.success) {
      throw new StorageError(`Malformed audit entry at ${this.filePath}:${lineNumber}`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}
