/**
 * CLI audit and audit-clear commands.
 */

import { Command } from 'commander';
import { ValidationError } from '../../core/errors.js';
import type { AuditQuery } from '../../store/index.js';
import { AuditOperationSchema } from '../../store/validation-schemas.js';
import { AUDIT_OPERATIONS } from '../../types/task.js';
import { openRepository } from '../context.js';
import { cliOutput } from '../renderers/index.js';

interface AuditOptions {
  record?: string;
  operation?: string;
  limit?: string;
}

/** Build an audit query from raw option strings. */
export function parseAuditQuery(opts: AuditOptions): AuditQuery {
  const query: AuditQuery = {};
  if (opts.record !== undefined) query.recordId = opts.record;
  if (opts.operation !== undefined) {
    const op = AuditOperationSchema.safeParse(opts.operation.toUpperCase());
    if (!op.success) {
      throw new ValidationError(`Invalid operation: ${opts.operation}. Use: ${AUDIT_OPERATIONS.join(', ')}`);
    }
    query.operation = op.data;
  }
  if (opts.limit !== undefined) query.limit = Number(opts.limit);
  return query;
}

/**
 * Register the audit command.
 */
export function registerAuditCommand(program: Command): void {
  program
    .command('audit')
    .description('Query the audit log, newest first')
    .option('-r, --record <id>', 'Only entries for this task id')
    .option('-o, --operation <op>', 'Only CREATE, UPDATE or DELETE entries')
    .option('-n, --limit <n>', 'Return at most n entries')
    .action(async (opts: AuditOptions) => {
      const query = parseAuditQuery(opts);
      const repository = await openRepository();
      const entries = await repository.auditLog.query(query);
      cliOutput({ entries, total: entries.length }, { command: 'audit' });
    });
}

/**
 * Register the audit-clear command. Irreversible, so it requires --yes.
 */
export function registerAuditClearCommand(program: Command): void {
  program
    .command('audit-clear')
    .description('Truncate the audit log (irreversible)')
    .option('-y, --yes', 'Confirm clearing the audit log')
    .action(async (opts: { yes?: boolean }) => {
      if (!opts.yes) {
        throw new ValidationError('Refusing to clear the audit log without confirmation', {
          fix: 'Re-run with --yes',
        });
      }
      const repository = await openRepository();
      await repository.auditLog.clear();
      cliOutput({ cleared: true, path: repository.auditLog.filePath }, { command: 'audit-clear' });
    });
}
