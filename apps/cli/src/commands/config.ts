import { Command } from 'commander';
import chalk from 'chalk';
import { getReminderLeadMinutes, setReminderLeadMinutes } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try, requireMinutes } from '../helpers.js';

const KEYS = ['lead-time'] as const;

function requireKey(key: string): void {
  if (!KEYS.some(k => k === key)) {
    throw new Error(`Unknown setting '${key}'. Known settings: ${KEYS.join(', ')}`);
  }
}

export function createConfigCommand(ctx: CliContext): Command {
  const configCommand = new Command('config')
    .description('Read and change settings');

  configCommand.addCommand(
    new Command('get')
      .description('Show settings')
      .argument('[key]', `Setting name (${KEYS.join(', ')})`)
      .action((key: string | undefined) => $try(() => {
        if (key) requireKey(key);
        const minutes = getReminderLeadMinutes(ctx.db);
        console.log(`  ${chalk.bold('lead-time')}: ${minutes} minute(s) before the deadline`);
      })),
  );

  configCommand.addCommand(
    new Command('set')
      .description('Change a setting')
      .argument('<key>', `Setting name (${KEYS.join(', ')})`)
      .argument('<value>', 'New value')
      .action((key: string, value: string) => $try(() => {
        requireKey(key);
        const minutes = setReminderLeadMinutes(ctx.db, requireMinutes(value));
        out.success(`Reminders will fire ${minutes} minute(s) before the deadline`);
        out.info(chalk.dim("A running 'watch' picks this up on the next change"));
      })),
  );

  return configCommand;
}
