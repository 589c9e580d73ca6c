/**
 * Shared CLI middleware for resolving output format from --human/--json/--quiet flags.
 *
 * An explicit flag wins over the configured default (config `output.defaultFormat`
 * or TASK_LEDGER_FORMAT), which wins over JSON.
 */

import { ValidationError } from '../../core/errors.js';
import type { OutputFormat } from '../../types/config.js';
import type { FormatResolution } from '../format-context.js';

/** Output-related global flags as parsed by Commander.js. */
export interface FormatFlags {
  json?: boolean;
  human?: boolean;
  quiet?: boolean;
}

/**
 * Resolve output format from Commander.js option values.
 *
 * @param flags - Global --json/--human/--quiet values
 * @param configured - Format from the loaded configuration
 */
export function resolveFormat(flags: FormatFlags, configured?: OutputFormat): FormatResolution {
  if (flags.json && flags.human) {
    throw new ValidationError('--json and --human are mutually exclusive');
  }
  const quiet = flags.quiet === true;
  if (flags.human) return { format: 'human', source: 'flag', quiet };
  if (flags.json) return { format: 'json', source: 'flag', quiet };
  if (configured) return { format: configured, source: 'config', quiet };
  return { format: 'json', source: 'default', quiet };
}
