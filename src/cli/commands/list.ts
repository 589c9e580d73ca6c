/**
 * CLI list command.
 */

import { Command } from 'commander';
import { parsePriority, parseStatus } from '../../core/tasks/record.js';
import type { TaskFilters } from '../../types/task.js';
import { openRepository } from '../context.js';
import { cliOutput } from '../renderers/index.js';

interface ListOptions {
  status?: string;
  priority?: string;
  assignee?: string;
}

/** Build typed filters from raw option strings. */
export function parseListFilters(opts: ListOptions): TaskFilters {
  const filters: TaskFilters = {};
  if (opts.status !== undefined) filters.status = parseStatus(opts.status.toUpperCase());
  if (opts.priority !== undefined) filters.priority = parsePriority(opts.priority.toUpperCase());
  if (opts.assignee !== undefined) filters.assignee = opts.assignee;
  return filters;
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List tasks, optionally filtered')
    .option('-s, --status <status>', 'Filter by status')
    .option('-p, --priority <priority>', 'Filter by priority')
    .option('-a, --assignee <assignee>', 'Filter by assignee')
    .action(async (opts: ListOptions) => {
      const filters = parseListFilters(opts);
      const repository = await openRepository();
      const tasks = (await repository.list(filters)).map((t) => t.serialize());
      cliOutput({ tasks, total: tasks.length }, { command: 'list' });
    });
}
