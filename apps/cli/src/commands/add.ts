import { Command } from 'commander';
import type { TaskDraft } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $mutate, requireDate, requireTime, requirePriority } from '../helpers.js';

interface AddOptions {
  due?: string;
  time?: string;
  priority?: string;
  category?: string;
  notes?: string;
}

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-d, --due <date>', 'Due date (today, tomorrow, +3d, friday, jan15, 2026-03-01)')
    .option('-t, --time <time>', 'Due time (9:30, 7pm, 18h); needs --due')
    .option('-p, --priority <level>', 'Priority (high, medium, low)')
    .option('-c, --category <name>', 'Category')
    .option('-n, --notes <text>', 'Notes')
    .action((title: string, opts: AddOptions) => $mutate(ctx, 'add', () => {
      if (opts.time && !opts.due) throw new Error('A due time needs a due date (--due)');

      const draft: TaskDraft = {
        title,
        dueDate: opts.due ? requireDate(opts.due) : null,
        dueTime: opts.time ? requireTime(opts.time) : null,
        notes: opts.notes ?? '',
      };
      if (opts.priority) draft.priority = requirePriority(opts.priority);
      if (opts.category) {
        draft.category = opts.category.trim();
        if (!ctx.categories.has(draft.category)) {
          out.warning(`'${draft.category}' is not a known category. Use 'categories add' to register it`);
        }
      }

      const result = ctx.store.add(draft);
      if (result.type === 'success') {
        out.success(`${result.message}. Use the list command to see your tasks`);
      } else {
        out.printResult(result);
      }
    }));
}
