import { Command } from 'commander';
import chalk from 'chalk';
import type { Task, StatusFilter } from '@taskdeck/core';
import { FILTERS, parseFilter, queryTasks, groupUpcoming } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

interface ListOptions {
  filter: string;
  category?: string;
  search?: string;
}

const EMPTY_MESSAGES: Record<StatusFilter, string> = {
  all: 'No tasks saved yet... use the add command to create one',
  active: 'No active tasks',
  today: 'Nothing due today',
  upcoming: 'No upcoming tasks',
  completed: 'No completed tasks found',
  deleted: 'Trash is empty',
};

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List tasks')
    .option('-f, --filter <name>', `Status filter (${FILTERS.join(', ')})`, 'all')
    .option('-c, --category <name>', 'Only tasks in this category')
    .option('-s, --search <text>', 'Only tasks whose title or notes contain this text')
    .action((opts: ListOptions) => $try(() => {
      const filter = parseFilter(opts.filter);
      if (filter == null) {
        throw new Error(`Unknown filter '${opts.filter}'. Use one of: ${FILTERS.join(', ')}`);
      }

      const now = new Date();
      const query = { category: opts.category ?? null, search: opts.search ?? '', now };

      if (filter === 'upcoming') {
        const groups = groupUpcoming(ctx.store.all(), query);
        if (groups.length === 0) {
          out.info(EMPTY_MESSAGES.upcoming);
          return;
        }
        groups.forEach((group, i) => {
          if (i > 0) console.log();
          console.log(chalk.bold.underline(out.formatGroupDate(group.date)));
          displayTasks(group.tasks, now);
        });
        return;
      }

      const tasks = queryTasks(ctx.store.all(), { ...query, filter });
      if (tasks.length === 0) {
        out.info(EMPTY_MESSAGES[filter]);
        return;
      }
      displayTasks(tasks, now);
    }));
}

function displayTasks(tasks: readonly Task[], now: Date): void {
  for (const task of tasks) {
    console.log(out.formatTaskLine(task, now));
  }
}
