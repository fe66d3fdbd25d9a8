import { Command } from 'commander';
import { queryTasks } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try, $mutate } from '../helpers.js';

export function createTrashCommand(ctx: CliContext): Command {
  const trashCommand = new Command('trash')
    .description('Manage deleted tasks');

  trashCommand.addCommand(
    new Command('list')
      .description('List deleted tasks in trash')
      .action(() => $try(() => {
        const now = new Date();
        const trash = queryTasks(ctx.store.all(), { filter: 'deleted', now });
        if (trash.length === 0) {
          out.info('Trash is empty');
          return;
        }
        for (const task of trash) console.log(out.formatTaskLine(task, now));
      })),
  );

  trashCommand.addCommand(
    new Command('restore')
      .description('Restore a task from trash')
      .argument('<taskId>', 'The id of the task to restore')
      .action((taskId: string) => $mutate(ctx, 'trash restore', () => {
        out.printResult(ctx.store.restore(taskId));
      })),
  );

  trashCommand.addCommand(
    new Command('purge')
      .description('Permanently delete one task')
      .argument('<taskId>', 'The id of the task to delete for good')
      .action((taskId: string) => $mutate(ctx, 'trash purge', () => {
        out.printResult(ctx.store.permanentlyDelete(taskId));
      })),
  );

  trashCommand.addCommand(
    new Command('empty')
      .description('Permanently delete all tasks in trash')
      .action(() => $mutate(ctx, 'trash empty', () => {
        const count = ctx.store.purgeDeleted();
        out.success(`Permanently deleted ${count} task(s) from trash`);
      })),
  );

  return trashCommand;
}
