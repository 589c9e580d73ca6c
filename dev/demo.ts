#!/usr/bin/env npx tsx
/**
 * Walkthrough of every repository operation against a scratch directory.
 *
 *   npm run demo            # uses a fresh temp directory
 *   npm run demo -- ./tmp   # uses ./tmp
 *
 * Ends by tampering with a copy of the collection document to show the
 * integrity check refusing to load it.
 */

import { copyFile, mkdir, mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  AuditLog,
  IntegrityError,
  TaskRecord,
  TaskRepository,
  ValidationError,
  getLogger,
  type AuditEntry,
} from '../src/index.js';

const log = getLogger('demo');

function section(title: string): void {
  console.log(`\n== ${title} ==`);
}

function printEntries(entries: AuditEntry[]): void {
  for (const e of entries) {
    console.log(`  ${e.timestamp} ${e.operation.padEnd(6)} ${e.record_id} by ${e.actor} ${JSON.stringify(e.details)}`);
  }
}

async function main(): Promise<void> {
  const dir = process.argv[2]
    ? resolve(process.argv[2])
    : await mkdtemp(join(tmpdir(), 'task-ledger-demo-'));
  await mkdir(dir, { recursive: true });
  log.info({ dir }, 'Demo starting');
  console.log(`Data directory: ${dir}`);

  const repository = await TaskRepository.open({
    dataPath: join(dir, 'tasks.json'),
    auditLog: new AuditLog(join(dir, 'audit.log')),
    backupDir: join(dir, 'backups'),
  });

  section('Create');
  const auth = await repository.create(
    TaskRecord.create({ title: 'Implement auth', description: 'Login and sessions', assignee: 'alice', priority: 'HIGH' }),
    'alice',
  );
  const docs = await repository.create(
    TaskRecord.create({ title: 'Write docs', description: 'User guide', assignee: 'bob' }),
    'bob',
  );
  const cleanup = await repository.create(
    TaskRecord.create({ title: 'Remove dead code', description: 'Old handlers', assignee: 'alice', priority: 'LOW' }),
  );
  for (const task of [auth, docs, cleanup]) {
    console.log(`  ${task.toString()}`);
  }

  section('List');
  for (const task of await repository.list()) {
    console.log(`  ${task.toString()}`);
  }
  const alices = await repository.list({ assignee: 'alice' });
  console.log(`  assigned to alice: ${alices.map((t) => t.title).join(', ')}`);

  section('Update');
  const started = await repository.update(auth.id, { status: 'IN_PROGRESS' }, 'alice');
  console.log(`  ${started?.toString() ?? 'missing'} (version ${started?.version ?? '-'})`);
  const done = await repository.update(auth.id, { status: 'DONE', description: 'Login, sessions and logout' }, 'alice');
  console.log(`  ${done?.toString() ?? 'missing'} (version ${done?.version ?? '-'})`);

  section('No-op update');
  const same = await repository.update(auth.id, { status: 'DONE' }, 'alice');
  console.log(`  version stays ${same?.version ?? '-'}, no audit entry written`);

  section('Invalid update');
  try {
    await repository.update(docs.id, { title: 'Never applied', status: 'FINISHED' });
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    console.log(`  rejected: ${err.message}`);
  }
  const untouched = await repository.get(docs.id);
  console.log(`  title is still "${untouched?.title ?? '-'}"`);

  section(`History of ${auth.id}`);
  printEntries(await repository.getHistory(auth.id));

  section('Delete');
  console.log(`  deleted: ${String(await repository.delete(cleanup.id, 'alice'))}`);
  console.log(`  get after delete: ${String(await repository.get(cleanup.id))}`);
  console.log(`  delete again: ${String(await repository.delete(cleanup.id))}`);
  printEntries(await repository.getHistory(cleanup.id));

  section('Verify');
  const verified = await repository.verify();
  console.log(`  ok, ${verified.records} record(s), checksum ${verified.checksum}`);

  section('Tampered copy');
  const tamperedDir = join(dir, 'tampered');
  await mkdir(tamperedDir, { recursive: true });
  const tamperedPath = join(tamperedDir, 'tasks.json');
  await copyFile(join(dir, 'tasks.json'), tamperedPath);
  const content = await readFile(tamperedPath, 'utf-8');
  await writeFile(tamperedPath, content.replace('Write docs', 'Write d0cs'));

  const tampered = new TaskRepository({
    dataPath: tamperedPath,
    auditLog: new AuditLog(join(tamperedDir, 'audit.log')),
  });
  try {
    await tampered.list();
    console.log('  unexpected: tampered document loaded');
  } catch (err) {
    if (!(err instanceof IntegrityError)) throw err;
    console.log(`  refused: ${err.message}`);
  }

  log.info({ dir }, 'Demo finished');
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
