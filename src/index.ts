/**
 * task-ledger public API.
 *
 * A checksummed JSON record store for tasks with per-record versioning
 * and an append-only JSONL audit trail.
 */

// Types
export * from './types/task.js';
export type * from './types/config.js';
export { ExitCode, getExitCodeName } from './types/exit-codes.js';

// Core
export {
  TaskLedgerError,
  ValidationError,
  DuplicateIdError,
  NotFoundError,
  IntegrityError,
  StorageError,
} from './core/errors.js';
export type { TaskLedgerErrorOptions } from './core/errors.js';
export { TaskRecord, parseStatus, parsePriority, pickTaskChanges, hasChanges } from './core/tasks/record.js';
export type { CreateTaskInput } from './core/tasks/record.js';
export { systemClock, nextTimestamp } from './core/clock.js';
export type { Clock } from './core/clock.js';
export { loadConfig, getConfigValue } from './core/config.js';
export { getDataDir, getLedgerHome } from './core/paths.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';

// Store
export * from './store/index.js';
