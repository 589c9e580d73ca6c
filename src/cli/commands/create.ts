/**
 * CLI create command.
 */

import { Command } from 'commander';
import { TaskRecord } from '../../core/tasks/record.js';
import { getCliContext, openRepository } from '../context.js';
import { cliOutput } from '../renderers/index.js';

interface CreateOptions {
  status?: string;
  priority?: string;
  id?: string;
}

/**
 * Register the create command.
 */
export function registerCreateCommand(program: Command): void {
  program
    .command('create <title> <description> <assignee>')
    .description('Create a new task')
    .option('-s, --status <status>', 'Task status: PENDING, IN_PROGRESS, DONE, CANCELLED')
    .option('-p, --priority <priority>', 'Priority: LOW, MEDIUM, HIGH, CRITICAL')
    .option('--id <id>', 'Explicit task id (default: generated UUID)')
    .action(async (title: string, description: string, assignee: string, opts: CreateOptions) => {
      const { actor } = getCliContext();
      const record = TaskRecord.create({
        title,
        description,
        assignee,
        status: opts.status?.toUpperCase(),
        priority: opts.priority?.toUpperCase(),
        id: opts.id,
      });
      const repository = await openRepository();
      await repository.create(record, actor);
      cliOutput({ task: record.serialize() }, { command: 'create', message: `Created task ${record.id}` });
    });
}
