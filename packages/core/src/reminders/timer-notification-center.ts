import type { TaskId } from '../types/task.js';
import type { NotificationCenter, ReminderRequest } from './types.js';

// setTimeout overflows past ~24.8 days; longer waits are re-armed in steps
const MAX_TIMER_MS = 2_147_483_647;

export interface TimerNotificationCenterOptions {
  /** Called when a reminder comes due */
  deliver: (request: ReminderRequest) => void;
  /** Whether requestAuthorization grants delivery. Defaults to true. */
  authorize?: () => boolean | Promise<boolean>;
  clock?: () => Date;
}

interface PendingReminder {
  request: ReminderRequest;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * In-process notification center backed by timers. Reminders live only as
 * long as the process does; the owner reconciles them again on start.
 */
export class TimerNotificationCenter implements NotificationCenter {
  private pending = new Map<TaskId, PendingReminder>();
  private listeners: Array<(request: ReminderRequest) => void> = [];
  private authorized: boolean | null = null;
  private readonly deliver: (request: ReminderRequest) => void;
  private readonly authorize: () => boolean | Promise<boolean>;
  private readonly clock: () => Date;

  constructor(opts: TimerNotificationCenterOptions) {
    this.deliver = opts.deliver;
    this.authorize = opts.authorize ?? (() => true);
    this.clock = opts.clock ?? (() => new Date());
  }

  async requestAuthorization(): Promise<boolean> {
    this.authorized = await this.authorize();
    return this.authorized;
  }

  async add(request: ReminderRequest): Promise<void> {
    if (this.authorized === false) {
      throw new Error('Notifications are not authorized');
    }
    this.removePending([request.id]);
    this.arm(request);
  }

  removePending(ids: readonly TaskId[]): void {
    for (const id of ids) {
      const entry = this.pending.get(id);
      if (!entry) continue;
      clearTimeout(entry.timer);
      this.pending.delete(id);
    }
  }

  removeAllPending(): void {
    this.removePending([...this.pending.keys()]);
  }

  pendingIds(): TaskId[] {
    return [...this.pending.keys()];
  }

  onDelivered(listener: (request: ReminderRequest) => void): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private arm(request: ReminderRequest): void {
    const delay = Math.max(0, request.fireAt.getTime() - this.clock().getTime());
    const timer = setTimeout(() => {
      if (delay > MAX_TIMER_MS) {
        this.arm(request);
        return;
      }
      this.pending.delete(request.id);
      this.deliver(request);
      for (const cb of this.listeners) cb(request);
    }, Math.min(delay, MAX_TIMER_MS));
    this.pending.set(request.id, { request, timer });
  }
}
