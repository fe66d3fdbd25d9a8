import { Command } from 'commander';
import chalk from 'chalk';
import { getReminderLeadMinutes } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import { $try } from '../helpers.js';

export function createStatusCommand(ctx: CliContext): Command {
  return new Command('status')
    .description('Show task counts and where data is stored')
    .action(() => $try(() => {
      const stats = ctx.store.stats();

      const activeLabel = stats.active > 0 ? chalk.yellow(`${stats.active} active`) : chalk.dim('0 active');
      const doneLabel = stats.completed > 0 ? chalk.green(`${stats.completed} completed`) : chalk.dim('0 completed');
      const trashLabel = stats.deleted > 0 ? chalk.red(`${stats.deleted} in trash`) : chalk.dim('0 in trash');

      console.log(chalk.bold.underline('Summary'));
      console.log();
      console.log(`  Total tasks: ${chalk.bold(String(stats.total))} (${activeLabel}, ${doneLabel})`);
      console.log(`  Total in trash: ${trashLabel}`);
      console.log(`  Reminder lead time: ${getReminderLeadMinutes(ctx.db)} minute(s)`);
      console.log(`  Database: ${chalk.dim(ctx.dbPath)}`);
    }));
}
