/**
 * Builds a TaskRepository from a loaded configuration.
 *
 * Front ends (CLI, demo) call openTaskRepository() rather than wiring the
 * audit log, backup directory and paths themselves.
 */

import type { Logger } from 'pino';
import type { TaskLedgerConfig } from '../types/config.js';
import type { Clock } from '../core/clock.js';
import { getLogger } from '../core/logger.js';
import { getAuditLogPath, getBackupDir, getTaskPath } from '../core/paths.js';
import { AuditLog } from './audit-log.js';
import { TaskRepository } from './task-repository.js';

export interface OpenTaskRepositoryOptions {
  /** Absolute data directory; config paths resolve against it. */
  dataDir: string;
  config: TaskLedgerConfig;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Open (and initialize, when absent) the collection document and its audit
 * log as configured.
 */
export async function openTaskRepository(options: OpenTaskRepositoryOptions): Promise<TaskRepository> {
  const { dataDir, config, clock } = options;
  const logger = options.logger ?? getLogger('repository');

  const auditLog = new AuditLog(getAuditLogPath(dataDir, config), {
    clock,
    logger: logger.child({ component: 'audit' }),
  });

  return TaskRepository.open({
    dataPath: getTaskPath(dataDir, config),
    auditLog,
    ...(config.backup.enabled && {
      backupDir: getBackupDir(dataDir, config),
      maxBackups: config.backup.maxBackups,
    }),
    clock,
    logger,
  });
}
