/**
 * Unified store interface for task-ledger data access.
 */

export { atomicWrite, atomicWriteJson, safeReadFile } from './atomic.js';
export { createBackup, listBackups, restoreFromBackup } from './backup.js';
export { acquireLock, isLocked, withLock, Mutex } from './lock.js';
export type { ReleaseFn, LockOptions } from './lock.js';
export { readJson, appendJsonl, canonicalJson, computeChecksum, verifyChecksum } from './json.js';
export { AuditLog, DEFAULT_ACTOR } from './audit-log.js';
export type { AuditEntry, AuditQuery, AuditLogOptions } from './audit-log.js';
export { TaskRepository } from './task-repository.js';
export type { TaskRepositoryOptions, UpdateOutcome, VerifyResult, RestoreResult } from './task-repository.js';
export { openTaskRepository } from './provider.js';
export type { OpenTaskRepositoryOptions } from './provider.js';
