/**
 * CLI verify command.
 */

import { Command } from 'commander';
import { openRepository } from '../context.js';
import { cliOutput } from '../renderers/index.js';

/**
 * Register the verify command.
 * Loads the collection under its lock and checks the embedded checksum;
 * a failure exits with CHECKSUM_MISMATCH.
 */
export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Check the integrity of the task collection')
    .action(async () => {
      const repository = await openRepository();
      cliOutput(await repository.verify(), { command: 'verify' });
    });
}
