/**
 * Task persistence using Drizzle ORM.
 * The store keeps the authoritative collection in memory and writes the
 * whole ordered collection back after every mutation.
 */

import { asc } from 'drizzle-orm';
import type { TaskDeckDb } from '../db.js';
import { getRawDb } from '../db.js';
import type { Task } from '../types/task.js';
import { isPriority } from '../types/priority.js';
import { tasks } from '../schema/tasks.js';
import { validateTask } from './task-helpers.js';

/** Persisted data that cannot be turned back into tasks */
export class MalformedDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedDataError';
  }
}

// ---------------------------------------------------------------------------
// Row mapper
// ---------------------------------------------------------------------------

function toFlag(value: number, column: string, id: string): boolean {
  if (value !== 0 && value !== 1) {
    throw new MalformedDataError(`Task ${id}: ${column} must be 0 or 1, got ${value}`);
  }
  return value === 1;
}

export type TaskRow = typeof tasks.$inferSelect;

/** Map a stored row to a Task, rejecting anything that breaks the model */
export function parseTaskRow(row: TaskRow): Task {
  if (!isPriority(row.priority)) {
    throw new MalformedDataError(`Task ${row.id}: unknown priority ${row.priority}`);
  }
  const task: Task = {
    id: row.id,
    title: row.title,
    isCompleted: toFlag(row.isCompleted, 'is_completed', row.id),
    completedDate: row.completedDate,
    dueDate: row.dueDate,
    dueTime: row.dueTime,
    priority: row.priority,
    category: row.category,
    notes: row.notes,
    isDeleted: toFlag(row.isDeleted, 'is_deleted', row.id),
    deletedDate: row.deletedDate,
  };
  const problems = validateTask(task);
  if (problems.length > 0) {
    throw new MalformedDataError(`Task ${row.id}: ${problems.join(', ')}`);
  }
  return task;
}

function toRow(task: Task, sortOrder: number): typeof tasks.$inferInsert {
  return {
    id: task.id,
    title: task.title,
    isCompleted: task.isCompleted ? 1 : 0,
    completedDate: task.completedDate,
    dueDate: task.dueDate,
    dueTime: task.dueTime,
    priority: task.priority,
    category: task.category,
    notes: task.notes,
    isDeleted: task.isDeleted ? 1 : 0,
    deletedDate: task.deletedDate,
    sortOrder,
  };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/**
 * Load the full collection in stored order.
 * Throws MalformedDataError if any row is invalid.
 */
export function loadTasks(db: TaskDeckDb): Task[] {
  return loadTaskRows(db).map(parseTaskRow);
}

/** Stored rows as they are, without validation */
export function loadTaskRows(db: TaskDeckDb): TaskRow[] {
  return db.select().from(tasks).orderBy(asc(tasks.sortOrder)).all();
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Replace the stored collection with `list`, keeping its order */
export function saveTasks(db: TaskDeckDb, list: readonly Task[]): void {
  const raw = getRawDb(db);
  const run = raw.transaction(() => {
    db.delete(tasks).run();
    list.forEach((task, i) => {
      db.insert(tasks).values(toRow(task, i)).run();
    });
  });
  run();
}
