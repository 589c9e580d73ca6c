/**
 * Task repository: owns the collection document and the lock guarding it.
 *
 * Every operation runs load -> mutate -> save inside one exclusive section
 * (reads included, so they never observe a torn document). The document
 * carries a SHA-256 checksum over its canonical content; a document that
 * fails the check is never trusted or repaired. Each accepted mutation is
 * appended to the audit log after the lock is released, before returning.
 */

import { existsSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { Logger } from 'pino';
import { atomicWriteJson, safeReadFile } from './atomic.js';
import { AuditLog, DEFAULT_ACTOR, type AuditEntry } from './audit-log.js';
import { createBackup, restoreFromBackup, DEFAULT_MAX_BACKUPS } from './backup.js';
import { computeChecksum, verifyChecksum } from './json.js';
import { Mutex, withLock } from './lock.js';
import { CollectionContentSchema } from './validation-schemas.js';
import { DuplicateIdError, IntegrityError, ValidationError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { systemClock, type Clock } from '../core/clock.js';
import { TaskRecord, hasChanges } from '../core/tasks/record.js';
import type {
  ChangeSet,
  CollectionDocument,
  TaskChangesInput,
  TaskDocument,
  TaskFilters,
} from '../types/task.js';

export interface TaskRepositoryOptions {
  /** Path of the collection document (e.g. .task-ledger/tasks.json). */
  dataPath: string;
  /** Audit log to append to. Defaults to audit.log beside the document. */
  auditLog?: AuditLog;
  /** Numbered backups of the previous document are kept here on every save. */
  backupDir?: string;
  maxBackups?: number;
  clock?: Clock;
  logger?: Logger;
}

/** Loaded, verified document content. */
interface LoadedDocument {
  records: TaskDocument[];
  checksum: string;
}

/** Outcome of verify(). */
export interface VerifyResult {
  ok: true;
  records: number;
  checksum: string;
}

/** Outcome of applyUpdate(). */
export interface UpdateOutcome {
  record: TaskRecord;
  changeSet: ChangeSet;
}

/** Outcome of restoreLatestBackup(). */
export interface RestoreResult {
  backup: string;
  records: number;
}

export class TaskRepository {
  readonly dataPath: string;
  readonly auditLog: AuditLog;
  private readonly backupDir?: string;
  private readonly maxBackups: number;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly mutex = new Mutex();

  constructor(options: TaskRepositoryOptions) {
    this.dataPath = options.dataPath;
    this.clock = options.clock ?? systemClock;
    this.auditLog = options.auditLog
      ?? new AuditLog(join(dirname(options.dataPath), 'audit.log'), { clock: this.clock });
    this.backupDir = options.backupDir;
    this.maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;
    this.log = options.logger ?? getLogger('repository');
  }

  /**
   * Create a repository and write an empty, checksummed document when the
   * data file does not exist yet.
   */
  static async open(options: TaskRepositoryOptions): Promise<TaskRepository> {
    const repository = new TaskRepository(options);
    await repository.exclusive(async () => {
      if (!existsSync(repository.dataPath)) {
        await repository.save([]);
      }
    });
    return repository;
  }

  /**
   * Add a record. Rejects with DuplicateIdError when the id already exists,
   * leaving the document untouched and nothing audited.
   */
  async create(record: TaskRecord, actor: string = DEFAULT_ACTOR): Promise<TaskRecord> {
    const snapshot = await this.exclusive(async () => {
      const { records } = await this.load();
      if (records.some((r) => r.id === record.id)) {
        throw new DuplicateIdError(record.id);
      }
      const snapshot = record.serialize();
      records.push(snapshot);
      await this.save(records);
      return snapshot;
    });

    await this.auditLog.append('CREATE', record.id, actor, { record: snapshot });
    this.log.info({ id: record.id, actor }, 'Task created');
    return record;
  }

  /** Fetch one record, or null when the id does not exist. Not audited. */
  async get(id: string): Promise<TaskRecord | null> {
    return this.exclusive(async () => {
      const { records } = await this.load();
      const found = records.find((r) => r.id === id);
      return found ? TaskRecord.deserialize(found, this.clock) : null;
    });
  }

  /** Records matching every supplied filter, in document order. */
  async list(filters: TaskFilters = {}): Promise<TaskRecord[]> {
    return this.exclusive(async () => {
      const { records } = await this.load();
      return records
        .filter((r) => filters.status === undefined || r.status === filters.status)
        .filter((r) => filters.priority === undefined || r.priority === filters.priority)
        .filter((r) => filters.assignee === undefined || r.assignee === filters.assignee)
        .map((r) => TaskRecord.deserialize(r, this.clock));
    });
  }

  /**
   * Apply proposed field values to a record. Returns null when the id does
   * not exist. A no-op update returns the record unchanged with no write
   * and no audit entry.
   */
  async update(
    id: string,
    changes: TaskChangesInput,
    actor: string = DEFAULT_ACTOR,
  ): Promise<TaskRecord | null> {
    const outcome = await this.applyUpdate(id, changes, actor);
    return outcome?.record ?? null;
  }

  /**
   * update() that also reports the change-set, computed in the same
   * exclusive section as the write. An empty change-set means nothing
   * was written.
   */
  async applyUpdate(
    id: string,
    changes: TaskChangesInput,
    actor: string = DEFAULT_ACTOR,
  ): Promise<UpdateOutcome | null> {
    const outcome = await this.exclusive(async () => {
      const { records } = await this.load();
      const index = records.findIndex((r) => r.id === id);
      const current = records[index];
      if (current === undefined) return null;

      const record = TaskRecord.deserialize(current, this.clock);
      const changeSet = record.update(changes);
      if (hasChanges(changeSet)) {
        records[index] = record.serialize();
        await this.save(records);
      }
      return { record, changeSet };
    });

    if (outcome === null) return null;
    if (hasChanges(outcome.changeSet)) {
      await this.auditLog.append('UPDATE', id, actor, updateDetails(outcome.changeSet));
      this.log.info({ id, actor, version: outcome.changeSet.version }, 'Task updated');
    }
    return outcome;
  }

  /**
   * Remove a record. Returns false (and audits nothing) when the id does
   * not exist; otherwise logs a DELETE entry with the removed snapshot.
   */
  async delete(id: string, actor: string = DEFAULT_ACTOR): Promise<boolean> {
    const removed = await this.exclusive(async () => {
      const { records } = await this.load();
      const index = records.findIndex((r) => r.id === id);
      if (index === -1) return null;
      const [removed] = records.splice(index, 1);
      await this.save(records);
      return removed ?? null;
    });

    if (removed === null) return false;
    await this.auditLog.append('DELETE', id, actor, { record: removed });
    this.log.info({ id, actor }, 'Task deleted');
    return true;
  }

  /** Every audit entry for a record, newest first. */
  async getHistory(id: string): Promise<AuditEntry[]> {
    return this.auditLog.query({ recordId: id });
  }

  /** Load and integrity-check the document without changing it. */
  async verify(): Promise<VerifyResult> {
    return this.exclusive(async () => {
      const { records, checksum } = await this.load();
      return { ok: true, records: records.length, checksum };
    });
  }

  /**
   * Replace the document with its newest numbered backup, then verify it.
   * Requires a backup directory. The restore is not audited: it replaces
   * state wholesale rather than mutating a record.
   */
  async restoreLatestBackup(): Promise<RestoreResult> {
    const backupDir = this.backupDir;
    if (backupDir === undefined) {
      throw new ValidationError('Backups are not enabled for this repository');
    }
    return this.exclusive(async () => {
      const backup = await restoreFromBackup(basename(this.dataPath), backupDir, this.dataPath);
      const { records } = await this.load();
      this.log.warn({ backup, records: records.length }, 'Collection restored from backup');
      return { backup, records: records.length };
    });
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => withLock(this.dataPath, fn));
  }

  /**
   * Read and verify the document. A missing file is an empty collection.
   * Unparseable content, a missing or mismatched checksum, or a malformed
   * shape fails with IntegrityError.
   */
  private async load(): Promise<LoadedDocument> {
    const content = await safeReadFile(this.dataPath);
    if (content === null) {
      return { records: [], checksum: computeChecksum({ records: [] }) };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw this.integrityFailure('Collection document is not valid JSON', err);
    }
    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
      throw this.integrityFailure('Collection document is not a JSON object');
    }
    if (!('checksum' in raw) || typeof raw.checksum !== 'string') {
      throw this.integrityFailure('Collection document has no checksum');
    }
    if (!verifyChecksum(raw)) {
      throw this.integrityFailure('Checksum mismatch: collection document is corrupted');
    }

    const parsed = CollectionContentSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.integrityFailure('Collection document has an invalid shape', parsed.error);
    }

    this.log.debug({ records: parsed.data.records.length }, 'Collection loaded');
    return { records: parsed.data.records, checksum: raw.checksum };
  }

  /** Embed a fresh checksum and replace the file atomically. */
  private async save(records: TaskDocument[]): Promise<void> {
    const document: CollectionDocument = {
      records,
      checksum: computeChecksum({ records }),
    };
    if (this.backupDir !== undefined) {
      await createBackup(this.dataPath, this.backupDir, this.maxBackups);
    }
    await atomicWriteJson(this.dataPath, document);
    this.log.debug({ records: records.length }, 'Collection saved');
  }

  private integrityFailure(message: string, cause?: unknown): IntegrityError {
    const error = new IntegrityError(this.dataPath, `${message}: ${this.dataPath}`, { cause });
    this.log.error({ filePath: this.dataPath, err: cause }, message);
    return error;
  }
}

/** Audit payload for an accepted update. */
function updateDetails(changeSet: ChangeSet): Record<string, unknown> {
  return {
    changes: changeSet.changes,
    version: changeSet.version,
    updated_at: changeSet.updated_at,
  };
}
