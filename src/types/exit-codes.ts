/**
 * task-ledger exit codes.
 * 0 = success; 1-9 general errors; 20-29 integrity errors.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === INTEGRITY / CONCURRENCY ERRORS (20-29) ===
  CHECKSUM_MISMATCH = 20,
  ID_COLLISION = 22,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
