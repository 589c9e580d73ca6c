/**
 * Per-invocation CLI context: resolved data directory, configuration and
 * acting identity.
 *
 * Built once in the preAction hook from the global options; commands read
 * it through getCliContext() and open the repository on demand.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { z } from 'zod';
import { loadConfig } from '../core/config.js';
import { TaskLedgerError } from '../core/errors.js';
import { getLogger, initLogger } from '../core/logger.js';
import { getDataDir } from '../core/paths.js';
import { openTaskRepository, type TaskRepository } from '../store/index.js';
import { ExitCode } from '../types/exit-codes.js';
import type { TaskLedgerConfig } from '../types/config.js';
import { setFormatContext } from './format-context.js';
import { resolveFormat } from './middleware/output-format.js';

/** Global options declared on the root program. */
const GlobalOptionsSchema = z.object({
  actor: z.string().min(1).optional(),
  dataDir: z.string().min(1).optional(),
  json: z.boolean().optional(),
  human: z.boolean().optional(),
  quiet: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CliContext {
  dataDir: string;
  config: TaskLedgerConfig;
  /** Actor recorded in audit entries for this invocation. */
  actor: string;
}

let currentContext: CliContext | null = null;

/**
 * Resolve global options, load configuration, start logging and set the
 * output format for the invocation.
 */
export async function initCliContext(command: Command): Promise<CliContext> {
  const parsed = GlobalOptionsSchema.safeParse(command.optsWithGlobals());
  if (!parsed.success) {
    throw new TaskLedgerError(ExitCode.INVALID_INPUT, `Invalid global options: ${parsed.error.message}`);
  }
  const opts = parsed.data;

  // Format flags apply before config loads so config errors honour --human.
  setFormatContext(resolveFormat(opts));

  const dataDir = opts.dataDir ? resolve(opts.dataDir) : getDataDir();
  const config = await loadConfig(dataDir);
  setFormatContext(resolveFormat(opts, config.output.defaultFormat));
  initLogger(dataDir, config.logging);

  currentContext = {
    dataDir,
    config,
    actor: opts.actor ?? config.defaultActor,
  };
  getLogger('cli').debug({ command: command.name(), dataDir }, 'CLI context initialized');
  return currentContext;
}

/** Context of the running invocation. */
export function getCliContext(): CliContext {
  if (currentContext === null) {
    throw new TaskLedgerError(ExitCode.GENERAL_ERROR, 'CLI context used before initialization');
  }
  return currentContext;
}

/** Open the configured repository for the running invocation. */
export async function openRepository(): Promise<TaskRepository> {
  const { dataDir, config } = getCliContext();
  return openTaskRepository({ dataDir, config });
}
