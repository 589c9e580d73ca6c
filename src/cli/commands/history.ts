/**
 * CLI history command.
 */

import { Command } from 'commander';
import { openRepository } from '../context.js';
import { cliOutput } from '../renderers/index.js';

/**
 * Register the history command.
 * Works for deleted tasks too: the audit log outlives the record.
 */
export function registerHistoryCommand(program: Command): void {
  program
    .command('history <id>')
    .description('Show the audit history of a task, newest first')
    .action(async (id: string) => {
      const repository = await openRepository();
      const entries = await repository.getHistory(id);
      cliOutput({ id, entries }, { command: 'history' });
    });
}
