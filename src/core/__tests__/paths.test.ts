/**
 * Tests for path resolution.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { homedir } from 'node:os';
import {
  getAuditLogPath,
  getBackupDir,
  getConfigPath,
  getDataDir,
  getGlobalConfigPath,
  getLedgerHome,
  getTaskPath,
} from '../paths.js';
import type { TaskLedgerConfig } from '../../types/config.js';

const config: TaskLedgerConfig = {
  storage: { dataFile: 'tasks.json', auditFile: '/var/log/task-ledger/audit.log' },
  defaultActor: 'system',
  backup: { enabled: true, maxBackups: 5, dir: 'backups' },
  output: { defaultFormat: 'json' },
  logging: { level: 'info', filePath: 'logs/task-ledger.log', maxFileSize: 1024, maxFiles: 1 },
};

describe('paths', () => {
  const origHome = process.env['TASK_LEDGER_HOME'];
  const origDir = process.env['TASK_LEDGER_DIR'];

  beforeEach(() => {
    delete process.env['TASK_LEDGER_HOME'];
    delete process.env['TASK_LEDGER_DIR'];
  });

  afterEach(() => {
    if (origHome !== undefined) process.env['TASK_LEDGER_HOME'] = origHome;
    else delete process.env['TASK_LEDGER_HOME'];
    if (origDir !== undefined) process.env['TASK_LEDGER_DIR'] = origDir;
    else delete process.env['TASK_LEDGER_DIR'];
  });

  it('defaults the home directory to ~/.task-ledger', () => {
    expect(getLedgerHome()).toBe(join(homedir(), '.task-ledger'));
    expect(getGlobalConfigPath()).toBe(join(homedir(), '.task-ledger', 'config.json'));
  });

  it('respects TASK_LEDGER_HOME', () => {
    process.env['TASK_LEDGER_HOME'] = '/custom/ledger';
    expect(getLedgerHome()).toBe('/custom/ledger');
  });

  it('resolves the data directory against the working directory', () => {
    expect(getDataDir('/work/project')).toBe('/work/project/.task-ledger');
    process.env['TASK_LEDGER_DIR'] = 'state';
    expect(getDataDir('/work/project')).toBe('/work/project/state');
  });

  it('keeps an absolute TASK_LEDGER_DIR as is', () => {
    process.env['TASK_LEDGER_DIR'] = '/srv/ledger';
    expect(getDataDir('/work/project')).toBe('/srv/ledger');
  });

  it('resolves configured files inside the data directory unless absolute', () => {
    expect(getConfigPath('/data')).toBe('/data/config.json');
    expect(getTaskPath('/data', config)).toBe('/data/tasks.json');
    expect(getAuditLogPath('/data', config)).toBe('/var/log/task-ledger/audit.log');
    expect(getBackupDir('/data', config)).toBe('/data/backups');
  });
});
