import { Command } from 'commander';
import type { Task } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $mutate, requireDate, requireTime, requirePriority } from '../helpers.js';

interface EditOptions {
  title?: string;
  /** false for --no-due */
  due?: string | false;
  /** false for --no-time */
  time?: string | false;
  priority?: string;
  category?: string;
  notes?: string;
}

/** Apply the given options to a task; fields without an option stay as they are */
export function applyEdits(task: Task, opts: EditOptions, now?: Date): Task {
  let dueDate = task.dueDate;
  if (opts.due === false) dueDate = null;
  else if (opts.due !== undefined) dueDate = requireDate(opts.due, now);

  let dueTime = task.dueTime;
  if (opts.time === false || dueDate == null) dueTime = null;
  else if (opts.time !== undefined) dueTime = requireTime(opts.time);

  if (opts.time && dueDate == null) throw new Error('A due time needs a due date (--due)');

  return {
    ...task,
    title: opts.title ?? task.title,
    dueDate,
    dueTime,
    priority: opts.priority ? requirePriority(opts.priority) : task.priority,
    category: opts.category?.trim() || task.category,
    notes: opts.notes ?? task.notes,
  };
}

export function createEditCommand(ctx: CliContext): Command {
  return new Command('edit')
    .description('Change the fields of a task')
    .argument('<taskId>', 'The id of the task to edit')
    .option('--title <title>', 'New title')
    .option('-d, --due <date>', 'New due date')
    .option('--no-due', 'Remove the due date (and time)')
    .option('-t, --time <time>', 'New due time')
    .option('--no-time', 'Remove the due time')
    .option('-p, --priority <level>', 'New priority (high, medium, low)')
    .option('-c, --category <name>', 'New category')
    .option('-n, --notes <text>', 'New notes')
    .action((taskId: string, opts: EditOptions) => $mutate(ctx, 'edit', () => {
      const task = ctx.store.get(taskId);
      if (!task) {
        out.printResult({ type: 'not-found', taskId });
        return;
      }
      out.printResult(ctx.store.update(applyEdits(task, opts)));
    }));
}
