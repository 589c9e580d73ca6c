/**
 * CLI delete command.
 */

import { Command } from 'commander';
import { NotFoundError } from '../../core/errors.js';
import { getCliContext, openRepository } from '../context.js';
import { cliOutput } from '../renderers/index.js';

/**
 * Register the delete command.
 */
export function registerDeleteCommand(program: Command): void {
  program
    .command('delete <id>')
    .alias('rm')
    .description('Delete a task')
    .action(async (id: string) => {
      const { actor } = getCliContext();
      const repository = await openRepository();
      if (!(await repository.delete(id, actor))) {
        throw new NotFoundError(id);
      }
      cliOutput({ id, deleted: true }, { command: 'delete', message: `Deleted task ${id}` });
    });
}
