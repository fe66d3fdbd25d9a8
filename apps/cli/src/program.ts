import { Command } from 'commander';
import type { CliContext } from './context.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createEditCommand } from './commands/edit.js';
import { createToggleCommand } from './commands/toggle.js';
import { createDeleteCommand } from './commands/delete.js';
import { createTrashCommand } from './commands/trash.js';
import { createCategoriesCommand } from './commands/categories.js';
import { createConfigCommand } from './commands/config.js';
import { createWatchCommand, createNotifyTestCommand } from './commands/watch.js';
import { createBackupCommand } from './commands/backup.js';
import { createStatusCommand } from './commands/status.js';

export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('taskdeck')
    .description('Task manager with categories, a trash and due-date reminders')
    .version('1.0.0');

  // Register commands
  program.addCommand(createListCommand(ctx), { isDefault: true });
  program.addCommand(createAddCommand(ctx));
  program.addCommand(createEditCommand(ctx));
  program.addCommand(createToggleCommand(ctx));
  program.addCommand(createDeleteCommand(ctx));
  program.addCommand(createTrashCommand(ctx));
  program.addCommand(createCategoriesCommand(ctx));
  program.addCommand(createConfigCommand(ctx));
  program.addCommand(createWatchCommand(ctx));
  program.addCommand(createNotifyTestCommand());
  program.addCommand(createBackupCommand(ctx));
  program.addCommand(createStatusCommand(ctx));

  return program;
}
