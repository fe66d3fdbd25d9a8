import type { Task, TaskId } from '../types/task.js';
import { toLocalDateTime } from '../parsers/date-parser.js';
import { normalizeLeadMinutes } from '../queries/config-queries.js';
import { createLogger } from '../log.js';
import { buildReminderContent } from './reminder-content.js';
import type { NotificationCenter, ReminderRequest, ReminderState } from './types.js';

const log = createLogger('reminders');

export const TEST_NOTIFICATION_ID = 'test-notification';
const TEST_NOTIFICATION_DELAY_MS = 5_000;

export interface ReminderSchedulerOptions {
  /** Minutes before the deadline; read on every scheduling pass */
  leadMinutes?: () => number;
  clock?: () => Date;
}

/** Incomplete, not deleted, and dated */
export function isReminderEligible(task: Task): boolean {
  return !task.isCompleted && !task.isDeleted && task.dueDate != null;
}

/**
 * The moment a reminder for `task` should fire: its due date at the due
 * time (midnight when there is none) minus the lead time. Null when the
 * task has no due date.
 */
export function computeFireMoment(task: Task, leadMinutes: number): Date | null {
  if (task.dueDate == null) return null;
  const deadline = toLocalDateTime(task.dueDate, task.dueTime);
  return new Date(deadline.getTime() - normalizeLeadMinutes(leadMinutes) * 60_000);
}

/**
 * Keeps at most one pending reminder per task. The task store calls
 * cancel/schedule on every mutation; reconcile rebuilds everything at startup.
 */
export class ReminderScheduler {
  private states = new Map<TaskId, ReminderState>();
  private readonly center: NotificationCenter;
  private readonly leadMinutes: () => number;
  private readonly clock: () => Date;
  private readonly unsubscribe: () => void;

  constructor(center: NotificationCenter, opts: ReminderSchedulerOptions = {}) {
    this.center = center;
    this.leadMinutes = opts.leadMinutes ?? (() => normalizeLeadMinutes(null));
    this.clock = opts.clock ?? (() => new Date());
    this.unsubscribe = center.onDelivered((request) => {
      if (this.states.get(request.id) === 'scheduled') {
        this.states.set(request.id, 'fired');
        log.log(`fired reminder for ${request.id}`);
      }
    });
  }

  /** Ask the notification center for permission. Never rejects. */
  async requestPermission(): Promise<boolean> {
    try {
      const granted = await this.center.requestAuthorization();
      if (!granted) log.warn('notification permission denied; reminders will not be delivered');
      return granted;
    } catch (err) {
      log.error('error requesting notification permission:', err);
      return false;
    }
  }

  fireMomentFor(task: Task): Date | null {
    return computeFireMoment(task, this.leadMinutes());
  }

  /**
   * Register the reminder for `task`, replacing any pending one.
   * Returns false when the task is not eligible or the fire moment has passed.
   */
  schedule(task: Task): boolean {
    if (!isReminderEligible(task)) return false;

    const fireAt = this.fireMomentFor(task);
    // A reminder that would already have fired is dropped, not fired late
    if (fireAt == null || fireAt.getTime() <= this.clock().getTime()) return false;

    const request: ReminderRequest = { id: task.id, fireAt, ...buildReminderContent(task) };
    this.states.set(task.id, 'scheduled');
    this.center.add(request).catch((err: unknown) => {
      if (this.states.get(task.id) === 'scheduled') this.states.delete(task.id);
      log.error(`error scheduling reminder for ${task.id}:`, err);
    });
    return true;
  }

  cancel(taskId: TaskId): void {
    this.center.removePending([taskId]);
    this.states.delete(taskId);
  }

  /** Drop every pending reminder and schedule each eligible task again */
  reconcile(tasks: readonly Task[]): number {
    this.center.removeAllPending();
    this.states.clear();
    let scheduled = 0;
    for (const task of tasks) {
      if (this.schedule(task)) scheduled++;
    }
    log.log(`reconciled: ${scheduled} reminder(s) pending`);
    return scheduled;
  }

  stateOf(taskId: TaskId): ReminderState {
    return this.states.get(taskId) ?? 'unscheduled';
  }

  pendingIds(): TaskId[] {
    return [...this.states.entries()]
      .filter(([, state]) => state === 'scheduled')
      .map(([id]) => id);
  }

  /** Deliver a sample reminder five seconds from now */
  sendTestNotification(): void {
    const request: ReminderRequest = {
      id: TEST_NOTIFICATION_ID,
      title: 'Test Notification',
      body: 'This is a sample notification with priority info (High Priority) - Work',
      fireAt: new Date(this.clock().getTime() + TEST_NOTIFICATION_DELAY_MS),
    };
    this.center.add(request).catch((err: unknown) => {
      log.error('error scheduling test notification:', err);
    });
  }

  dispose(): void {
    this.unsubscribe();
  }
}
