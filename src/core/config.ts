/**
 * Configuration engine for task-ledger.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import type { ConfigSource, ResolvedValue, TaskLedgerConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { readJson } from '../store/json.js';
import { TaskLedgerConfigSchema } from '../store/validation-schemas.js';
import { TaskLedgerError } from './errors.js';
import { getConfigPath, getDataDir, getGlobalConfigPath } from './paths.js';

/** Default configuration values. */
const DEFAULTS: TaskLedgerConfig = {
  storage: {
    dataFile: 'tasks.json',
    auditFile: 'audit.log',
  },
  defaultActor: 'system',
  backup: {
    enabled: true,
    maxBackups: 5,
    dir: 'backups',
  },
  output: {
    defaultFormat: 'json',
  },
  logging: {
    level: 'info',
    filePath: 'logs/task-ledger.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

/** Type an environment variable is parsed as before validation. */
type EnvValueType = 'string' | 'number' | 'boolean';

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, { path: string; type: EnvValueType }> = {
  'TASK_LEDGER_ACTOR': { path: 'defaultActor', type: 'string' },
  'TASK_LEDGER_FORMAT': { path: 'output.defaultFormat', type: 'string' },
  'TASK_LEDGER_BACKUP_ENABLED': { path: 'backup.enabled', type: 'boolean' },
  'TASK_LEDGER_MAX_BACKUPS': { path: 'backup.maxBackups', type: 'number' },
  'TASK_LEDGER_LOG_LEVEL': { path: 'logging.level', type: 'string' },
  'TASK_LEDGER_LOG_FILE': { path: 'logging.filePath', type: 'string' },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key];
    result[key] = isPlainObject(sourceVal) && isPlainObject(targetVal)
      ? deepMerge(targetVal, sourceVal)
      : sourceVal;
  }
  return result;
}

/**
 * Parse an environment variable value to its key's type. A value that does
 * not parse is passed through as-is and rejected by schema validation.
 */
function parseEnvValue(value: string, type: EnvValueType): unknown {
  if (type === 'boolean') {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  }
  if (type === 'number') {
    const num = Number(value);
    if (!isNaN(num) && value.trim() !== '') return num;
    return value;
  }
  return value;
}

/** Read a config file layer; a missing file is an empty layer. */
async function readConfigLayer(filePath: string): Promise<Record<string, unknown>> {
  const data = await readJson(filePath);
  if (data === null) return {};
  if (!isPlainObject(data)) {
    throw new TaskLedgerError(ExitCode.CONFIG_ERROR, `Config must be a JSON object: ${filePath}`);
  }
  return data;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(dataDir: string = getDataDir()): Promise<TaskLedgerConfig> {
  let merged: Record<string, unknown> = { ...structuredClone(DEFAULTS) };

  merged = deepMerge(merged, await readConfigLayer(getGlobalConfigPath()));
  merged = deepMerge(merged, await readConfigLayer(getConfigPath(dataDir)));

  for (const [envKey, { path, type }] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, path, parseEnvValue(envValue, type));
    }
  }

  const result = TaskLedgerConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new TaskLedgerError(ExitCode.CONFIG_ERROR, `Invalid configuration: ${issues}`, {
      fix: `Check ${getConfigPath(dataDir)} and TASK_LEDGER_* environment variables`,
    });
  }
  return result.data;
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(
  path: string,
  dataDir: string = getDataDir(),
): Promise<ResolvedValue<unknown>> {
  for (const [envKey, mapping] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (mapping.path === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue, mapping.type), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, string]> = [
    ['project', getConfigPath(dataDir)],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, filePath] of layers) {
    const val = getNestedValue(await readConfigLayer(filePath), path);
    if (val !== undefined) {
      return { value: val, source };
    }
  }

  return { value: getNestedValue(DEFAULTS, path), source: 'default' };
}
