/**
 * task-ledger configuration types.
 */

/** Output format for the CLI. */
export type OutputFormat = 'json' | 'human';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
}

/** Storage file names, relative to the data directory. */
export interface StorageConfig {
  dataFile: string;
  auditFile: string;
}

/** Backup configuration for the collection document. */
export interface BackupConfig {
  enabled: boolean;
  /** Number of numbered backups to retain (default: 5) */
  maxBackups: number;
  /** Backup directory relative to the data directory (default: 'backups') */
  dir: string;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the data directory (default: 'logs/task-ledger.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Project configuration (config.json). */
export interface TaskLedgerConfig {
  storage: StorageConfig;
  /** Actor recorded on audit entries when none is given. */
  defaultActor: string;
  backup: BackupConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

/** Configuration resolution priority. */
export type ConfigSource = 'env' | 'project' | 'global' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
