/**
 * CLI view command.
 */

import { Command } from 'commander';
import { NotFoundError } from '../../core/errors.js';
import { openRepository } from '../context.js';
import { cliOutput } from '../renderers/index.js';

/**
 * Register the view command.
 */
export function registerViewCommand(program: Command): void {
  program
    .command('view <id>')
    .alias('show')
    .description('Show full task details by id')
    .action(async (id: string) => {
      const repository = await openRepository();
      const record = await repository.get(id);
      if (record === null) {
        throw new NotFoundError(id);
      }
      cliOutput({ task: record.serialize() }, { command: 'view' });
    });
}
