import { Command } from 'commander';
import chalk from 'chalk';
import {
  ReminderScheduler, TimerNotificationCenter, getReminderLeadMinutes, createLogger,
} from '@taskdeck/core';
import type { ReminderRequest } from '@taskdeck/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import { startDbWatcher } from '../watcher.js';

const log = createLogger('watch');

function printReminder(request: ReminderRequest): void {
  console.log(out.formatReminder(request));
}

function createScheduler(ctx: CliContext): { center: TimerNotificationCenter; scheduler: ReminderScheduler } {
  const center = new TimerNotificationCenter({ deliver: printReminder });
  const scheduler = new ReminderScheduler(center, {
    leadMinutes: () => getReminderLeadMinutes(ctx.db),
  });
  return { center, scheduler };
}

function waitForShutdown(): Promise<void> {
  return new Promise(resolve => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

export function createWatchCommand(ctx: CliContext): Command {
  return new Command('watch')
    .description('Keep running and print reminders before tasks are due')
    .action(() => $try(async () => {
      const { center, scheduler } = createScheduler(ctx);
      await scheduler.requestPermission();

      const count = scheduler.reconcile(ctx.store.all());
      out.info(`Watching ${chalk.dim(ctx.dbPath)}: ${count} reminder(s) pending. Press Ctrl+C to stop.`);

      const watcher = startDbWatcher(ctx.dbPath, () => {
        log.log('database changed, reconciling reminders');
        scheduler.reconcile(ctx.store.reload());
      });

      await waitForShutdown();

      await watcher.close();
      center.removeAllPending();
      scheduler.dispose();
      log.log('stopped');
    }));
}

export function createNotifyTestCommand(): Command {
  return new Command('notify-test')
    .description('Send a sample reminder in five seconds')
    .action(() => $try(async () => {
      const center = new TimerNotificationCenter({ deliver: printReminder });
      const scheduler = new ReminderScheduler(center);
      if (!(await scheduler.requestPermission())) {
        throw new Error('Notifications are not authorized');
      }

      const delivered = new Promise<void>(resolve => {
        const off = center.onDelivered(() => {
          off();
          resolve();
        });
      });
      scheduler.sendTestNotification();
      out.info('Test notification scheduled; it will arrive in 5 seconds');

      await delivered;
      scheduler.dispose();
    }));
}
