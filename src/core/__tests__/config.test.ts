/**
 * Tests for config engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, getConfigValue } from '../config.js';
import { TaskLedgerError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

const ENV_KEYS = [
  'TASK_LEDGER_HOME',
  'TASK_LEDGER_ACTOR',
  'TASK_LEDGER_MAX_BACKUPS',
  'TASK_LEDGER_FORMAT',
  'TASK_LEDGER_LOG_FILE',
  'TASK_LEDGER_BACKUP_ENABLED',
] as const;

describe('config', () => {
  let tempDir: string;
  let dataDir: string;
  let globalDir: string;
  const saved = new Map<string, string | undefined>();

  async function writeConfig(dir: string, content: unknown): Promise<void> {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'config.json'), JSON.stringify(content));
  }

  beforeEach(async () => {
    for (const key of ENV_KEYS) saved.set(key, process.env[key]);
    for (const key of ENV_KEYS) delete process.env[key];

    tempDir = await mkdtemp(join(tmpdir(), 'task-ledger-config-test-'));
    dataDir = join(tempDir, 'project', '.task-ledger');
    globalDir = join(tempDir, 'global');
    process.env['TASK_LEDGER_HOME'] = globalDir;
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    for (const [key, value] of saved) {
      if (value !== undefined) process.env[key] = value;
      else delete process.env[key];
    }
  });

  describe('loadConfig', () => {
    it('returns defaults when no config files exist', async () => {
      const config = await loadConfig(dataDir);
      expect(config).toEqual({
        storage: { dataFile: 'tasks.json', auditFile: 'audit.log' },
        defaultActor: 'system',
        backup: { enabled: true, maxBackups: 5, dir: 'backups' },
        output: { defaultFormat: 'json' },
        logging: { level: 'info', filePath: 'logs/task-ledger.log', maxFileSize: 10 * 1024 * 1024, maxFiles: 5 },
      });
    });

    it('deep-merges project config over defaults', async () => {
      await writeConfig(dataDir, { defaultActor: 'ci-bot', backup: { maxBackups: 3 } });
      const config = await loadConfig(dataDir);
      expect(config.defaultActor).toBe('ci-bot');
      expect(config.backup).toEqual({ enabled: true, maxBackups: 3, dir: 'backups' });
    });

    it('lets project config override global config', async () => {
      await writeConfig(globalDir, { defaultActor: 'global-actor', output: { defaultFormat: 'human' } });
      await writeConfig(dataDir, { defaultActor: 'project-actor' });
      const config = await loadConfig(dataDir);
      expect(config.defaultActor).toBe('project-actor');
      expect(config.output.defaultFormat).toBe('human');
    });

    it('lets environment variables override files', async () => {
      await writeConfig(dataDir, { defaultActor: 'project-actor' });
      process.env['TASK_LEDGER_ACTOR'] = 'env-actor';
      process.env['TASK_LEDGER_MAX_BACKUPS'] = '7';
      const config = await loadConfig(dataDir);
      expect(config.defaultActor).toBe('env-actor');
      expect(config.backup.maxBackups).toBe(7);
    });

    it('keeps numeric-looking values of string keys as strings', async () => {
      process.env['TASK_LEDGER_ACTOR'] = '1001';
      process.env['TASK_LEDGER_LOG_FILE'] = '2024';
      const config = await loadConfig(dataDir);
      expect(config.defaultActor).toBe('1001');
      expect(config.logging.filePath).toBe('2024');
    });

    it('parses boolean keys from the environment', async () => {
      process.env['TASK_LEDGER_BACKUP_ENABLED'] = 'false';
      const config = await loadConfig(dataDir);
      expect(config.backup.enabled).toBe(false);
    });

    it('rejects a non-numeric value for a number key', async () => {
      process.env['TASK_LEDGER_MAX_BACKUPS'] = 'many';
      await expect(loadConfig(dataDir)).rejects.toThrow(/^Invalid configuration: backup\.maxBackups/);
    });

    it('rejects invalid values with CONFIG_ERROR', async () => {
      await writeConfig(dataDir, { backup: { maxBackups: 0 } });
      const err = await loadConfig(dataDir).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TaskLedgerError);
      expect(err).toMatchObject({ code: ExitCode.CONFIG_ERROR });
    });

    it('rejects an invalid output format from the environment', async () => {
      process.env['TASK_LEDGER_FORMAT'] = 'xml';
      await expect(loadConfig(dataDir)).rejects.toThrow(/^Invalid configuration: output\.defaultFormat/);
    });

    it('rejects a config file that is not an object', async () => {
      await mkdir(dataDir, { recursive: true });
      await writeFile(join(dataDir, 'config.json'), '[1, 2]');
      await expect(loadConfig(dataDir)).rejects.toThrow(`Config must be a JSON object: ${join(dataDir, 'config.json')}`);
    });
  });

  describe('getConfigValue', () => {
    it('reports the default source', async () => {
      expect(await getConfigValue('defaultActor', dataDir)).toEqual({ value: 'system', source: 'default' });
    });

    it('reports the project and global sources', async () => {
      await writeConfig(globalDir, { backup: { dir: 'global-backups' } });
      await writeConfig(dataDir, { defaultActor: 'project-actor' });
      expect(await getConfigValue('defaultActor', dataDir)).toEqual({ value: 'project-actor', source: 'project' });
      expect(await getConfigValue('backup.dir', dataDir)).toEqual({ value: 'global-backups', source: 'global' });
    });

    it('reports the env source with a parsed value', async () => {
      process.env['TASK_LEDGER_MAX_BACKUPS'] = '9';
      expect(await getConfigValue('backup.maxBackups', dataDir)).toEqual({ value: 9, source: 'env' });
    });

    it('reports a numeric-looking actor from the env as a string', async () => {
      process.env['TASK_LEDGER_ACTOR'] = '1001';
      expect(await getConfigValue('defaultActor', dataDir)).toEqual({ value: '1001', source: 'env' });
    });
  });
});
