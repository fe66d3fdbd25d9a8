import type { TaskId } from '../types/task.js';

/** A single pending local notification, keyed by task id */
export interface ReminderRequest {
  id: TaskId;
  title: string;
  body: string;
  fireAt: Date;
}

export type ReminderState = 'unscheduled' | 'scheduled' | 'fired';

/**
 * Local notification delivery. Adding a request with an id that is already
 * pending replaces it.
 */
export interface NotificationCenter {
  requestAuthorization(): Promise<boolean>;
  add(request: ReminderRequest): Promise<void>;
  removePending(ids: readonly TaskId[]): void;
  removeAllPending(): void;
  pendingIds(): TaskId[];
  onDelivered(listener: (request: ReminderRequest) => void): () => void;
}
