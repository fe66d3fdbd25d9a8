/**
 * The single owner of the task collection. Every mutation updates the
 * in-memory list first, then persists it, then brings reminders in line.
 * Persistence and reminder failures are logged and never undo the mutation.
 */

import type { TaskDeckDb } from '../db.js';
import type { Task, TaskId, TaskDraft } from '../types/task.js';
import type { TaskResult, DataResult, BatchResult } from '../types/results.js';
import { loadTasks, saveTasks } from '../queries/task-queries.js';
import {
  createTask, generateId, withCompletion, withDeletion, validateTask,
} from '../queries/task-helpers.js';
import type { ReminderScheduler } from '../reminders/reminder-scheduler.js';
import { createLogger } from '../log.js';

const log = createLogger('store');

export type TaskChangeType = 'add' | 'update' | 'delete' | 'restore' | 'purge' | 'toggle' | 'reload';

export interface TaskChange {
  type: TaskChangeType;
  taskIds: TaskId[];
}

export interface TaskStats {
  total: number;
  active: number;
  completed: number;
  deleted: number;
}

export interface TaskStoreOptions {
  /** Receives cancel/schedule calls for every relevant mutation */
  reminders?: Pick<ReminderScheduler, 'schedule' | 'cancel'>;
  clock?: () => Date;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class TaskStore {
  private tasks: Task[] = [];
  private listeners: Array<(change: TaskChange) => void> = [];
  private readonly db: TaskDeckDb;
  private readonly reminders: TaskStoreOptions['reminders'];
  private readonly clock: () => Date;
  private _persistenceError: Error | null = null;
  private _loadError: Error | null = null;

  constructor(db: TaskDeckDb, opts: TaskStoreOptions = {}) {
    this.db = db;
    this.reminders = opts.reminders;
    this.clock = opts.clock ?? (() => new Date());
    this.tasks = this.load();
  }

  /** Last failed write, cleared by the next successful one */
  get persistenceError(): Error | null {
    return this._persistenceError;
  }

  /** Set when the persisted collection was unreadable and the store started empty */
  get loadError(): Error | null {
    return this._loadError;
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /** Snapshot of the full collection, in insertion order */
  all(): Task[] {
    return [...this.tasks];
  }

  get(taskId: TaskId): Task | null {
    return this.tasks.find(t => t.id === taskId) ?? null;
  }

  stats(): TaskStats {
    const live = this.tasks.filter(t => !t.isDeleted);
    return {
      total: live.length,
      active: live.filter(t => !t.isCompleted).length,
      completed: live.filter(t => t.isCompleted).length,
      deleted: this.tasks.length - live.length,
    };
  }

  subscribe(listener: (change: TaskChange) => void): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  add(draft: TaskDraft): DataResult<Task> {
    const taken = new Set(this.tasks.map(t => t.id));
    const task = Object.freeze(createTask(draft, generateId(taken)));
    const problems = validateTask(task);
    if (problems.length > 0) return { type: 'error', message: `Cannot add task: ${problems.join(', ')}` };

    this.tasks.push(task);
    this.persist();
    this.reminders?.schedule(task);
    this.emit('add', [task.id]);
    return { type: 'success', data: task, message: `Added task (${task.id})` };
  }

  /** Replace the stored task with the same id */
  update(task: Task): TaskResult {
    const index = this.indexOf(task.id);
    if (index < 0) return { type: 'not-found', taskId: task.id };

    const problems = validateTask(task);
    if (problems.length > 0) return { type: 'error', message: `Cannot update task (${task.id}): ${problems.join(', ')}` };

    const next = Object.freeze({ ...task, title: task.title.trim() });
    this.tasks[index] = next;
    this.persist();
    this.reminders?.cancel(next.id);
    this.reminders?.schedule(next);
    this.emit('update', [next.id]);
    return { type: 'success', message: `Updated task (${next.id})` };
  }

  /** Move tasks to the trash; completion is left as it is */
  softDelete(taskIds: readonly TaskId[]): BatchResult {
    const now = this.clock();
    const results: TaskResult[] = [];
    const changed: TaskId[] = [];

    for (const taskId of taskIds) {
      const index = this.indexOf(taskId);
      const task = this.tasks[index];
      if (!task) { results.push({ type: 'not-found', taskId }); continue; }
      if (task.isDeleted) { results.push({ type: 'no-change', message: `Task (${taskId}) is already in trash` }); continue; }

      this.tasks[index] = Object.freeze(withDeletion(task, true, now));
      changed.push(taskId);
      results.push({ type: 'success', message: `Moved task (${taskId}) to trash` });
    }

    if (changed.length > 0) {
      this.persist();
      for (const taskId of changed) this.reminders?.cancel(taskId);
      this.emit('delete', changed);
    }
    return { results };
  }

  restore(taskId: TaskId): TaskResult {
    const index = this.indexOf(taskId);
    const task = this.tasks[index];
    if (!task) return { type: 'not-found', taskId };
    if (!task.isDeleted) return { type: 'no-change', message: `Task (${taskId}) is not in trash` };

    const restored = Object.freeze(withDeletion(task, false, this.clock()));
    this.tasks[index] = restored;
    this.persist();
    if (!restored.isCompleted) {
      this.reminders?.cancel(taskId);
      this.reminders?.schedule(restored);
    }
    this.emit('restore', [taskId]);
    return { type: 'success', message: `Restored task (${taskId})` };
  }

  /** Remove a task for good. Irreversible. */
  permanentlyDelete(taskId: TaskId): TaskResult {
    const index = this.indexOf(taskId);
    if (index < 0) return { type: 'not-found', taskId };

    this.tasks.splice(index, 1);
    this.persist();
    this.reminders?.cancel(taskId);
    this.emit('purge', [taskId]);
    return { type: 'success', message: `Permanently deleted task (${taskId})` };
  }

  /** Permanently delete everything in the trash; returns how many tasks went */
  purgeDeleted(): number {
    const purged = this.tasks.filter(t => t.isDeleted).map(t => t.id);
    if (purged.length === 0) return 0;

    this.tasks = this.tasks.filter(t => !t.isDeleted);
    this.persist();
    for (const taskId of purged) this.reminders?.cancel(taskId);
    this.emit('purge', purged);
    return purged.length;
  }

  toggleCompletion(taskId: TaskId): TaskResult {
    const index = this.indexOf(taskId);
    const task = this.tasks[index];
    if (!task) return { type: 'not-found', taskId };

    const toggled = Object.freeze(withCompletion(task, !task.isCompleted, this.clock()));
    this.tasks[index] = toggled;
    this.persist();
    this.reminders?.cancel(taskId);
    if (!toggled.isCompleted) this.reminders?.schedule(toggled);
    this.emit('toggle', [taskId]);
    return {
      type: 'success',
      message: toggled.isCompleted ? `Completed task (${taskId})` : `Reopened task (${taskId})`,
    };
  }

  /** Re-read the collection from the database (after another process wrote it) */
  reload(): Task[] {
    this.tasks = this.load();
    this.emit('reload', this.tasks.map(t => t.id));
    return this.all();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private indexOf(taskId: TaskId): number {
    return this.tasks.findIndex(t => t.id === taskId);
  }

  private load(): Task[] {
    try {
      const loaded = loadTasks(this.db).map(t => Object.freeze(t));
      this._loadError = null;
      return loaded;
    } catch (err) {
      this._loadError = toError(err);
      log.warn('could not read saved tasks, starting with an empty list:', this._loadError);
      return [];
    }
  }

  private persist(): void {
    try {
      saveTasks(this.db, this.tasks);
      this._persistenceError = null;
    } catch (err) {
      this._persistenceError = toError(err);
      log.error('could not save tasks:', this._persistenceError);
    }
  }

  private emit(type: TaskChangeType, taskIds: TaskId[]): void {
    const change: TaskChange = { type, taskIds };
    // Copy: a listener may unsubscribe while being notified
    for (const cb of [...this.listeners]) {
      try {
        cb(change);
      } catch (err) {
        log.error(`listener failed on ${type}:`, err);
      }
    }
  }
}
