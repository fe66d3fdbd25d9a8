import { Command } from 'commander';
import { anyFailed } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $mutate } from '../helpers.js';

export function createToggleCommand(ctx: CliContext): Command {
  return new Command('toggle')
    .description('Mark tasks as completed, or reopen completed ones')
    .argument('<taskIds...>', 'The id(s) of the task(s) to toggle')
    .action((taskIds: string[]) => $mutate(ctx, 'toggle', () => {
      const batch = { results: taskIds.map(taskId => ctx.store.toggleCompletion(taskId)) };
      out.printBatchResults(batch);
      if (anyFailed(batch)) process.exitCode = 1;
    }));
}
