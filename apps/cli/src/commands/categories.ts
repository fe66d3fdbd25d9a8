import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CATEGORIES } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createCategoriesCommand(ctx: CliContext): Command {
  const categoriesCommand = new Command('categories')
    .description('Manage task categories');

  categoriesCommand.addCommand(
    new Command('list')
      .description('List built-in and custom categories')
      .action(() => $try(() => {
        const counts = new Map<string, number>();
        for (const task of ctx.store.all()) {
          if (task.isDeleted) continue;
          counts.set(task.category, (counts.get(task.category) ?? 0) + 1);
        }

        for (const name of ctx.categories.allCategories()) {
          const custom = DEFAULT_CATEGORIES.includes(name) ? '' : ` ${chalk.dim('(custom)')}`;
          const count = counts.get(name) ?? 0;
          console.log(`  ${out.formatCategory(name)}${custom} ${chalk.dim(`${count} task(s)`)}`);
        }
      })),
  );

  categoriesCommand.addCommand(
    new Command('add')
      .description('Register a custom category')
      .argument('<name>', 'Category name')
      .action((name: string) => $try(() => {
        if (ctx.categories.add(name)) {
          out.success(`Added category '${name.trim()}'`);
        } else {
          out.info(`Category '${name.trim()}' already exists`);
        }
      })),
  );

  return categoriesCommand;
}
