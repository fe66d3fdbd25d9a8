import { Command } from 'commander';
import { anyFailed } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $mutate } from '../helpers.js';

export function createDeleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Move one or more tasks to the trash')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[]) => $mutate(ctx, 'delete', () => {
      const batch = ctx.store.softDelete(taskIds);
      out.printBatchResults(batch);
      if (anyFailed(batch)) process.exitCode = 1;
    }));
}
