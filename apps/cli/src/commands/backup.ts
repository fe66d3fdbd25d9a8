import { Command } from 'commander';
import chalk from 'chalk';
import type { SnapshotInfo } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

function describeContents(info: SnapshotInfo): string {
  const unreadable = info.unreadableCount > 0 ? `, ${info.unreadableCount} unreadable` : '';
  return `${info.taskCount} task(s)${unreadable}`;
}

export function createBackupCommand(ctx: CliContext): Command {
  const backupCommand = new Command('backup')
    .description('List and restore the snapshots taken before each change');

  backupCommand.addCommand(
    new Command('list')
      .description('List available backups, most recent first')
      .action(() => $try(() => {
        const snapshots = ctx.snapshots.listSnapshots();
        if (snapshots.length === 0) {
          out.info('No backups yet. One is taken before every command that changes tasks.');
          return;
        }

        console.log(`${chalk.bold('Available backups:')}\n`);
        snapshots.forEach((s, i) => {
          const pin = s.pinned ? ` ${chalk.yellow('(kept)')}` : '';
          console.log(
            `  ${String(i + 1).padStart(2)}. ${out.formatTimestamp(s.createdAt)} ${chalk.dim(`(${out.getTimeAgo(s.createdAt)})`)}  ${describeContents(s)}  ${s.reason}${pin}`,
          );
        });
      })),
  );

  backupCommand.addCommand(
    new Command('restore')
      .description('Replace tasks, categories and settings with a backup')
      .argument('[index]', 'Backup number from "backup list" (1 = most recent)', '1')
      .option('--force', 'Restore instead of only describing the backup')
      .action((indexStr: string, opts: { force?: boolean }) => $try(() => {
        const index = Number(indexStr);
        const snapshots = ctx.snapshots.listSnapshots();
        if (snapshots.length === 0) throw new Error('No backups available');

        const chosen = Number.isInteger(index) ? snapshots[index - 1] : undefined;
        if (!chosen) {
          throw new Error(`Backup #${indexStr} not found. Choose 1-${snapshots.length} from 'backup list'`);
        }

        const when = out.formatTimestamp(chosen.createdAt);
        if (!opts.force) {
          out.warning(`This would replace your tasks with the backup from ${when} (${describeContents(chosen)})`);
          out.info('Your current tasks are backed up first. Add --force to restore.');
          return;
        }

        ctx.snapshots.restoreSnapshot(chosen.id);
        ctx.store.reload();
        ctx.categories.reload();
        out.success(`Restored the backup from ${when} (${describeContents(chosen)})`);
        if (ctx.store.loadError) {
          out.warning(`Some restored tasks could not be read: ${ctx.store.loadError.message}`);
        }
      })),
  );

  return backupCommand;
}
