import type { TaskId, Task, TaskDraft, LifecycleState } from '../types/task.js';
import { Priority, isPriority } from '../types/priority.js';
import { isValidDate, isValidTime } from '../parsers/date-parser.js';

const ID_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_LENGTH = 4;

export const DEFAULT_CATEGORY = 'Personal';

/** Generate a random 4-character task ID that is not in `taken` */
export function generateId(taken?: ReadonlySet<TaskId>): TaskId {
  for (;;) {
    let id = '';
    for (let i = 0; i < ID_LENGTH; i++) {
      id += ID_CHARS[Math.floor(Math.random() * ID_CHARS.length)];
    }
    if (!taken?.has(id)) return id;
  }
}

/** Create a new, active Task from a draft */
export function createTask(draft: TaskDraft, id: TaskId): Task {
  return {
    id,
    title: draft.title.trim(),
    isCompleted: false,
    completedDate: null,
    dueDate: draft.dueDate ?? null,
    dueTime: draft.dueTime ?? null,
    priority: draft.priority ?? Priority.Medium,
    category: draft.category ?? DEFAULT_CATEGORY,
    notes: draft.notes ?? '',
    isDeleted: false,
    deletedDate: null,
  };
}

/** Return a copy of the task with completion set (stamps completedDate, or clears it) */
export function withCompletion(task: Task, completed: boolean, now: Date = new Date()): Task {
  return {
    ...task,
    isCompleted: completed,
    completedDate: completed ? now.toISOString() : null,
  };
}

/** Return a copy of the task moved into or out of the trash */
export function withDeletion(task: Task, deleted: boolean, now: Date = new Date()): Task {
  return {
    ...task,
    isDeleted: deleted,
    deletedDate: deleted ? now.toISOString() : null,
  };
}

export function lifecycleState(task: Task): LifecycleState {
  if (task.isDeleted) return task.isCompleted ? 'completed-deleted' : 'deleted';
  return task.isCompleted ? 'completed' : 'active';
}

/**
 * List every invariant the task breaks; empty when the task is consistent.
 * Timestamps must be present exactly when their flag is set.
 */
export function checkLifecycleInvariants(task: Task): string[] {
  const problems: string[] = [];
  if (task.isCompleted !== (task.completedDate != null)) {
    problems.push(task.isCompleted
      ? 'completed task has no completion date'
      : 'incomplete task has a completion date');
  }
  if (task.isDeleted !== (task.deletedDate != null)) {
    problems.push(task.isDeleted
      ? 'deleted task has no deletion date'
      : 'task not in trash has a deletion date');
  }
  return problems;
}

/**
 * Everything that makes a task unstorable: lifecycle problems plus an empty
 * title, an unknown priority or a malformed date/time.
 */
export function validateTask(task: Task): string[] {
  const problems = checkLifecycleInvariants(task);
  if (!task.title.trim()) problems.push('title is empty');
  if (!isPriority(task.priority)) problems.push(`unknown priority ${String(task.priority)}`);
  if (task.dueDate != null && !isValidDate(task.dueDate)) problems.push(`invalid due date '${task.dueDate}'`);
  if (task.dueTime != null && !isValidTime(task.dueTime)) problems.push(`invalid due time '${task.dueTime}'`);
  return problems;
}
