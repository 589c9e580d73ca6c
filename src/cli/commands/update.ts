/**
 * CLI update command.
 */

import { Command } from 'commander';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { hasChanges } from '../../core/tasks/record.js';
import { UPDATABLE_FIELDS, type TaskChangesInput } from '../../types/task.js';
import { getCliContext, openRepository } from '../context.js';
import { cliOutput } from '../renderers/index.js';

interface UpdateOptions {
  title?: string;
  description?: string;
  assignee?: string;
  status?: string;
  priority?: string;
}

/**
 * Collect the supplied field options. Enum values are upper-cased here and
 * validated by the record.
 */
export function collectChanges(opts: UpdateOptions): TaskChangesInput {
  const changes: TaskChangesInput = {};
  if (opts.title !== undefined) changes.title = opts.title;
  if (opts.description !== undefined) changes.description = opts.description;
  if (opts.assignee !== undefined) changes.assignee = opts.assignee;
  if (opts.status !== undefined) changes.status = opts.status.toUpperCase();
  if (opts.priority !== undefined) changes.priority = opts.priority.toUpperCase();
  return changes;
}

/**
 * Register the update command.
 */
export function registerUpdateCommand(program: Command): void {
  program
    .command('update <id>')
    .description('Update task fields')
    .option('--title <title>', 'New title')
    .option('-d, --description <desc>', 'New description')
    .option('-a, --assignee <assignee>', 'New assignee')
    .option('-s, --status <status>', 'New status')
    .option('-p, --priority <priority>', 'New priority')
    .action(async (id: string, opts: UpdateOptions) => {
      const changes = collectChanges(opts);
      if (Object.keys(changes).length === 0) {
        throw new ValidationError('Nothing to update', {
          fix: `Pass at least one of: ${UPDATABLE_FIELDS.map((f) => `--${f}`).join(', ')}`,
        });
      }

      const { actor } = getCliContext();
      const repository = await openRepository();
      const outcome = await repository.applyUpdate(id, changes, actor);
      if (outcome === null) {
        throw new NotFoundError(id);
      }
      cliOutput(
        { task: outcome.record.serialize(), changed: hasChanges(outcome.changeSet) },
        { command: 'update' },
      );
    });
}
