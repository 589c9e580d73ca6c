/**
 * Tests for the task repository: persistence, integrity, versioning and
 * auditing of every operation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import pino from 'pino';
import { TaskRepository } from '../task-repository.js';
import { AuditLog } from '../audit-log.js';
import { computeChecksum } from '../json.js';
import { listBackups } from '../backup.js';
import { TaskRecord } from '../../core/tasks/record.js';
import { DuplicateIdError, IntegrityError, StorageError, ValidationError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Clock } from '../../core/clock.js';

const logger = pino({ level: 'silent' });

function steppingClock(start: string = '2026-03-01T09:00:00.000Z', stepMs: number = 1000): Clock {
  let t = Date.parse(start);
  return {
    now: () => {
      const d = new Date(t);
      t += stepMs;
      return d;
    },
  };
}

describe('TaskRepository', () => {
  let tempDir: string;
  let dataPath: string;
  let auditPath: string;
  let clock: Clock;
  let repository: TaskRepository;

  function task(id: string, title: string, assignee: string = 'alice', priority: string = 'MEDIUM'): TaskRecord {
    return TaskRecord.create({ id, title, description: `${title} details`, assignee, priority }, clock);
  }

  async function readDocument(): Promise<unknown> {
    return JSON.parse(await readFile(dataPath, 'utf8'));
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'task-ledger-test-'));
    dataPath = join(tempDir, 'data', 'tasks.json');
    auditPath = join(tempDir, 'data', 'audit.log');
    clock = steppingClock();
    repository = await TaskRepository.open({
      dataPath,
      auditLog: new AuditLog(auditPath, { clock, logger }),
      clock,
      logger,
    });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('open', () => {
    it('writes an empty checksummed document', async () => {
      expect(await readFile(dataPath, 'utf8')).toBe(
        `{\n  "records": [],\n  "checksum": "${computeChecksum({ records: [] })}"\n}\n`,
      );
    });

    it('keeps an existing document', async () => {
      await repository.create(task('T1', 'Implement auth'));
      const reopened = await TaskRepository.open({ dataPath, logger });
      expect((await reopened.list()).map((t) => t.id)).toEqual(['T1']);
    });

    it('the constructor alone treats a missing file as empty', async () => {
      const path = join(tempDir, 'elsewhere', 'tasks.json');
      const fresh = new TaskRepository({ dataPath: path, logger });
      expect(await fresh.list()).toEqual([]);
      expect(existsSync(path)).toBe(false);
    });
  });

  describe('create', () => {
    it('persists the record and audits CREATE with a snapshot', async () => {
      const record = task('T1', 'Implement auth');
      const returned = await repository.create(record, 'alice');
      expect(returned).toBe(record);

      const stored = await repository.get('T1');
      expect(stored?.serialize()).toEqual(record.serialize());

      const history = await repository.getHistory('T1');
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({
        operation: 'CREATE',
        record_id: 'T1',
        actor: 'alice',
        details: { record: record.serialize() },
      });
    });

    it('stores the checksum of the saved content', async () => {
      await repository.create(task('T1', 'Implement auth'));
      const doc = await readDocument();
      expect(doc).toMatchObject({ records: [expect.objectContaining({ id: 'T1' })] });
      const verified = await repository.verify();
      expect(doc).toMatchObject({ checksum: verified.checksum });
      expect(verified).toEqual({ ok: true, records: 1, checksum: verified.checksum });
    });

    it('rejects a duplicate id without writing or auditing', async () => {
      await repository.create(task('T1', 'Implement auth'));
      const before = await readFile(dataPath, 'utf8');

      await expect(repository.create(task('T1', 'Another'))).rejects.toThrow(DuplicateIdError);
      await expect(repository.create(task('T1', 'Another'))).rejects.toThrow('Task with id T1 already exists');

      expect(await readFile(dataPath, 'utf8')).toBe(before);
      expect(await repository.auditLog.query()).toHaveLength(1);
    });

    it('defaults the actor to system', async () => {
      await repository.create(task('T1', 'Implement auth'));
      expect((await repository.getHistory('T1'))[0]?.actor).toBe('system');
    });
  });

  describe('get / list', () => {
    beforeEach(async () => {
      await repository.create(task('T1', 'Implement auth', 'alice', 'HIGH'));
      await repository.create(task('T2', 'Write docs', 'bob', 'LOW'));
      await repository.create(task('T3', 'Fix login bug', 'alice', 'LOW'));
      await repository.update('T3', { status: 'DONE' });
    });

    it('returns null for an unknown id', async () => {
      expect(await repository.get('missing')).toBeNull();
    });

    it('lists every record in document order', async () => {
      expect((await repository.list()).map((t) => t.id)).toEqual(['T1', 'T2', 'T3']);
    });

    it('combines filters with AND', async () => {
      expect((await repository.list({ assignee: 'alice' })).map((t) => t.id)).toEqual(['T1', 'T3']);
      expect((await repository.list({ priority: 'LOW' })).map((t) => t.id)).toEqual(['T2', 'T3']);
      expect((await repository.list({ status: 'PENDING', assignee: 'alice' })).map((t) => t.id)).toEqual(['T1']);
      expect(await repository.list({ status: 'CANCELLED' })).toEqual([]);
    });

    it('does not audit reads', async () => {
      const count = (await repository.auditLog.query()).length;
      await repository.get('T1');
      await repository.list();
      expect(await repository.auditLog.query()).toHaveLength(count);
    });
  });

  describe('update', () => {
    beforeEach(async () => {
      await repository.create(task('T1', 'Implement auth'), 'alice');
    });

    it('persists changes and audits the change-set', async () => {
      const updated = await repository.update('T1', { status: 'IN_PROGRESS' }, 'bob');
      expect(updated?.version).toBe(2);
      expect(updated?.status).toBe('IN_PROGRESS');
      expect((await repository.get('T1'))?.version).toBe(2);

      const history = await repository.getHistory('T1');
      expect(history.map((e) => e.operation)).toEqual(['UPDATE', 'CREATE']);
      expect(history[0]).toMatchObject({
        actor: 'bob',
        details: {
          changes: { status: { previous: 'PENDING', new: 'IN_PROGRESS' } },
          version: 2,
          updated_at: updated?.updatedAt,
        },
      });
    });

    it('writes and audits nothing for a no-op', async () => {
      const before = await readFile(dataPath, 'utf8');
      const result = await repository.update('T1', { status: 'PENDING', title: 'Implement auth' });

      expect(result?.version).toBe(1);
      expect(await readFile(dataPath, 'utf8')).toBe(before);
      expect(await repository.getHistory('T1')).toHaveLength(1);
    });

    it('returns null for an unknown id and audits nothing', async () => {
      expect(await repository.update('missing', { title: 'x' })).toBeNull();
      expect(await repository.auditLog.query()).toHaveLength(1);
    });

    it('rejects an invalid status and leaves the record unchanged', async () => {
      await expect(repository.update('T1', { title: 'Renamed', status: 'FINISHED' }))
        .rejects.toThrow(ValidationError);
      const stored = await repository.get('T1');
      expect(stored?.title).toBe('Implement auth');
      expect(stored?.version).toBe(1);
      expect(await repository.getHistory('T1')).toHaveLength(1);
    });

    it('records a status change then a priority change as versions 2 and 3', async () => {
      const created = await repository.create(task('A1', 'Implement auth', 'alice', 'HIGH'), 'alice');
      expect(created.version).toBe(1);
      const started = await repository.update('A1', { status: 'IN_PROGRESS' }, 'alice');
      expect(started?.version).toBe(2);
      const escalated = await repository.update('A1', { priority: 'CRITICAL' }, 'bob');
      expect(escalated?.version).toBe(3);

      const history = await repository.getHistory('A1');
      expect(history.map((e) => e.operation)).toEqual(['UPDATE', 'UPDATE', 'CREATE']);
      expect(history[0]).toMatchObject({
        actor: 'bob',
        details: { changes: { priority: { previous: 'HIGH', new: 'CRITICAL' } }, version: 3 },
      });
      expect(history[1]).toMatchObject({
        actor: 'alice',
        details: { changes: { status: { previous: 'PENDING', new: 'IN_PROGRESS' } }, version: 2 },
      });
      expect(history[2]).toMatchObject({
        details: { record: { id: 'A1', priority: 'HIGH', status: 'PENDING', version: 1 } },
      });
    });

    it('applyUpdate reports the change-set of the write', async () => {
      const outcome = await repository.applyUpdate('T1', { assignee: 'bob' }, 'alice');
      expect(outcome?.record.assignee).toBe('bob');
      expect(outcome?.changeSet).toMatchObject({
        changes: { assignee: { previous: 'alice', new: 'bob' } },
        version: 2,
      });
    });

    it('applyUpdate reports an empty change-set for a no-op', async () => {
      const outcome = await repository.applyUpdate('T1', { assignee: 'alice' });
      expect(outcome?.changeSet.changes).toEqual({});
      expect(outcome?.record.version).toBe(1);
      expect(await repository.applyUpdate('missing', { assignee: 'bob' })).toBeNull();
    });

    it('never loses concurrent updates', async () => {
      await Promise.all(
        Array.from({ length: 10 }, (_, i) => repository.update('T1', { title: `title-${i}` })),
      );
      expect((await repository.get('T1'))?.version).toBe(11);
      expect(await repository.auditLog.query({ operation: 'UPDATE' })).toHaveLength(10);
    });
  });

  describe('delete', () => {
    beforeEach(async () => {
      await repository.create(task('T1', 'Implement auth'));
      await repository.create(task('T2', 'Write docs'));
    });

    it('removes exactly one record and audits its last snapshot', async () => {
      await repository.update('T1', { priority: 'HIGH' });
      const last = (await repository.get('T1'))?.serialize();

      expect(await repository.delete('T1', 'carol')).toBe(true);
      expect(await repository.get('T1')).toBeNull();
      expect((await repository.list()).map((t) => t.id)).toEqual(['T2']);

      const [entry] = await repository.getHistory('T1');
      expect(entry).toMatchObject({ operation: 'DELETE', actor: 'carol', details: { record: last } });
    });

    it('returns false for an unknown id and audits nothing', async () => {
      expect(await repository.delete('missing')).toBe(false);
      expect(await repository.auditLog.query()).toHaveLength(2);
    });

    it('returns false the second time', async () => {
      expect(await repository.delete('T1')).toBe(true);
      expect(await repository.delete('T1')).toBe(false);
      expect(await repository.auditLog.query({ operation: 'DELETE' })).toHaveLength(1);
    });
  });

  describe('integrity', () => {
    beforeEach(async () => {
      await repository.create(task('T1', 'Implement auth'));
    });

    it('refuses a document whose content was altered', async () => {
      const tampered = (await readFile(dataPath, 'utf8')).replace('Implement auth', 'Implement oauth');
      await writeFile(dataPath, tampered);

      const err = await repository.list().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(IntegrityError);
      expect(err).toMatchObject({
        code: ExitCode.CHECKSUM_MISMATCH,
        message: `Checksum mismatch: collection document is corrupted: ${dataPath}`,
      });
      // Never repaired
      expect(await readFile(dataPath, 'utf8')).toBe(tampered);
    });

    it('refuses writes on a corrupted document', async () => {
      await writeFile(dataPath, (await readFile(dataPath, 'utf8')).replace('MEDIUM', 'HIGH'));
      await expect(repository.create(task('T2', 'Write docs'))).rejects.toThrow(IntegrityError);
      await expect(repository.update('T1', { title: 'x' })).rejects.toThrow(IntegrityError);
      await expect(repository.verify()).rejects.toThrow(IntegrityError);
      expect(await repository.auditLog.query()).toHaveLength(1);
    });

    it('refuses a document without a checksum', async () => {
      await writeFile(dataPath, JSON.stringify({ records: [] }));
      await expect(repository.list()).rejects.toThrow(`Collection document has no checksum: ${dataPath}`);
    });

    it('refuses unparseable JSON', async () => {
      await writeFile(dataPath, '{"records": [');
      await expect(repository.get('T1')).rejects.toThrow(`Collection document is not valid JSON: ${dataPath}`);
    });

    it('refuses a checksummed document with an invalid shape', async () => {
      const records = [{ id: 'T9' }];
      await writeFile(dataPath, JSON.stringify({ records, checksum: computeChecksum({ records }) }));
      await expect(repository.list()).rejects.toThrow(`Collection document has an invalid shape: ${dataPath}`);
    });
  });

  describe('backups', () => {
    let backupDir: string;
    let backedUp: TaskRepository;

    beforeEach(async () => {
      backupDir = join(tempDir, 'backups');
      dataPath = join(tempDir, 'backed-up', 'tasks.json');
      backedUp = await TaskRepository.open({ dataPath, backupDir, maxBackups: 2, clock, logger });
    });

    it('keeps the previous document on every save, up to maxBackups', async () => {
      await backedUp.create(task('T1', 'Implement auth'));
      await backedUp.create(task('T2', 'Write docs'));
      await backedUp.create(task('T3', 'Fix login bug'));
      expect(await listBackups('tasks.json', backupDir)).toHaveLength(2);
    });

    it('restores the newest backup', async () => {
      await backedUp.create(task('T1', 'Implement auth'));
      await backedUp.create(task('T2', 'Write docs'));
      await writeFile(dataPath, 'garbage');

      const result = await backedUp.restoreLatestBackup();
      expect(result).toEqual({ backup: join(backupDir, 'tasks.json.1'), records: 1 });
      expect((await backedUp.list()).map((t) => t.id)).toEqual(['T1']);
    });

    it('fails when no backup exists yet', async () => {
      const err = await backedUp.restoreLatestBackup().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(StorageError);
      expect(err).toMatchObject({ code: ExitCode.NOT_FOUND });
    });

    it('requires a backup directory', async () => {
      await expect(repository.restoreLatestBackup()).rejects.toThrow('Backups are not enabled for this repository');
    });
  });
});
