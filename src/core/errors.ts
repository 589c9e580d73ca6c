/**
 * task-ledger error types with exit code integration.
 *
 * Every failure raised by the core is a TaskLedgerError subclass, so front
 * ends can map it to an exit code and a structured JSON error without
 * inspecting messages.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/** Options accepted by every TaskLedgerError constructor. */
export interface TaskLedgerErrorOptions {
  fix?: string;
  cause?: unknown;
}

/**
 * Structured error class for task-ledger operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class TaskLedgerError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(code: ExitCode, message: string, options?: TaskLedgerErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = 'TaskLedgerError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for CLI output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/** Invalid status/priority or other rejected input. Raised before any mutation. */
export class ValidationError extends TaskLedgerError {
  constructor(message: string, options?: TaskLedgerErrorOptions) {
    super(ExitCode.VALIDATION_ERROR, message, options);
    this.name = 'ValidationError';
  }
}

/** Create with an id that is already present in the collection. */
export class DuplicateIdError extends TaskLedgerError {
  readonly recordId: string;

  constructor(recordId: string, options?: TaskLedgerErrorOptions) {
    super(ExitCode.ID_COLLISION, `Task with id ${recordId} already exists`, options);
    this.name = 'DuplicateIdError';
    this.recordId = recordId;
  }
}

/** Operation referencing a record id that does not exist. */
export class NotFoundError extends TaskLedgerError {
  readonly recordId: string;

  constructor(recordId: string, options?: TaskLedgerErrorOptions) {
    super(ExitCode.NOT_FOUND, `Task not found: ${recordId}`, {
      fix: "Use 'task-ledger list' to see existing task ids",
      ...options,
    });
    this.name = 'NotFoundError';
    this.recordId = recordId;
  }
}

/**
 * The collection document failed its integrity check.
 * Never repaired automatically: the stored data may be lost or tampered with.
 */
export class IntegrityError extends TaskLedgerError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: TaskLedgerErrorOptions) {
    super(ExitCode.CHECKSUM_MISMATCH, message, {
      fix: `Inspect ${filePath} and restore it from a backup; the file was not modified`,
      ...options,
    });
    this.name = 'IntegrityError';
    this.filePath = filePath;
  }
}

/** Underlying read/write/lock failure. */
export class StorageError extends TaskLedgerError {
  constructor(message: string, options?: TaskLedgerErrorOptions & { code?: ExitCode }) {
    super(options?.code ?? ExitCode.FILE_ERROR, message, options);
    this.name = 'StorageError';
  }
}
