/**
 * Central output dispatch for CLI commands.
 *
 * Commands call cliOutput(result, { command }) and never write to stdout
 * themselves. The resolved format decides between the JSON envelope and a
 * human-readable renderer; errors go to stderr through cliError().
 */

import { getFormatContext } from '../format-context.js';
import { IntegrityError, TaskLedgerError } from '../../core/errors.js';
import { ExitCode, getExitCodeName } from '../../types/exit-codes.js';
import type { RestoreResult, VerifyResult } from '../../store/index.js';
import {
  renderShow, renderCreate, renderUpdate, renderList, renderDelete,
  renderHistory, renderAudit, renderAuditClear, renderVerify, renderRestore, renderVersion,
  type AuditClearResult, type AuditResult, type DeleteResult, type HistoryResult,
  type ListResult, type TaskResult, type UpdateResult, type VersionResult,
} from './tasks.js';
import { BOLD, NC, RED } from './colors.js';

/** Result payload of every command, keyed by command name. */
export interface CommandResults {
  'create': TaskResult;
  'list': ListResult;
  'view': TaskResult;
  'update': UpdateResult;
  'delete': DeleteResult;
  'history': HistoryResult;
  'audit': AuditResult;
  'audit-clear': AuditClearResult;
  'verify': VerifyResult;
  'restore': RestoreResult;
  'version': VersionResult;
}

export type CommandName = keyof CommandResults;

type HumanRenderer<K extends CommandName> = (data: CommandResults[K], quiet: boolean) => string;

// ---------------------------------------------------------------------------
// Renderer registry: maps command name to human renderer function
// ---------------------------------------------------------------------------

const renderers: { [K in CommandName]: HumanRenderer<K> } = {
  'create': renderCreate,
  'list': renderList,
  'view': renderShow,
  'update': renderUpdate,
  'delete': renderDelete,
  'history': renderHistory,
  'audit': renderAudit,
  'audit-clear': renderAuditClear,
  'verify': renderVerify,
  'restore': renderRestore,
  'version': renderVersion,
};

export interface CliOutputOptions<K extends CommandName> {
  /** Command name (used to pick the correct human renderer). */
  command: K;
  /** Optional success message for the JSON envelope. */
  message?: string;
}

/**
 * Output a command result to stdout in the resolved format.
 *
 * JSON: `{ success: true, command, result, message? }` on one line.
 * Human: the command's renderer; nothing is printed for an empty render.
 */
export function cliOutput<K extends CommandName>(data: CommandResults[K], opts: CliOutputOptions<K>): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const renderer: HumanRenderer<K> = renderers[opts.command];
    const text = renderer(data, ctx.quiet);
    if (text) {
      console.log(text);
    }
    return;
  }

  console.log(JSON.stringify({
    success: true,
    command: opts.command,
    result: data,
    ...(opts.message && { message: opts.message }),
  }));
}

/**
 * Output an error to stderr in the resolved format and return the exit code
 * the process should end with.
 *
 * An IntegrityError is printed with a data-loss banner in human mode: the
 * stored document can no longer be trusted and nothing was modified.
 */
export function cliError(err: unknown): ExitCode {
  const ctx = getFormatContext();
  const error = err instanceof TaskLedgerError
    ? err
    : new TaskLedgerError(ExitCode.GENERAL_ERROR, err instanceof Error ? err.message : String(err), { cause: err });

  if (ctx.format === 'json') {
    console.error(JSON.stringify(error.toJSON()));
    return error.code;
  }

  if (error instanceof IntegrityError) {
    console.error('');
    console.error(`${RED}${BOLD}!! DATA INTEGRITY FAILURE !!${NC}`);
    console.error(`${RED}The task collection failed its integrity check and was not loaded.${NC}`);
    console.error(`${RED}Stored data may be lost or tampered with.${NC}`);
    console.error('');
  }
  console.error(`Error: ${error.message} (${getExitCodeName(error.code)})`);
  if (error.fix) {
    console.error(`Fix: ${error.fix}`);
  }
  return error.code;
}
