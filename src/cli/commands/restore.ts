/**
 * CLI restore command.
 */

import { Command } from 'commander';
import { ValidationError } from '../../core/errors.js';
import { openRepository } from '../context.js';
import { cliOutput } from '../renderers/index.js';

/**
 * Register the restore command.
 * Replaces the collection with its newest backup; requires --yes.
 */
export function registerRestoreCommand(program: Command): void {
  program
    .command('restore')
    .description('Restore the task collection from its newest backup')
    .option('-y, --yes', 'Confirm replacing the current collection')
    .action(async (opts: { yes?: boolean }) => {
      if (!opts.yes) {
        throw new ValidationError('Refusing to replace the collection without confirmation', {
          fix: 'Re-run with --yes',
        });
      }
      const repository = await openRepository();
      cliOutput(await repository.restoreLatestBackup(), { command: 'restore' });
    });
}
