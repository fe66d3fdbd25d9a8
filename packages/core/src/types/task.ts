import type { Priority } from './priority.js';

export type TaskId = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly isCompleted: boolean;
  readonly completedDate: string | null; // ISO string
  readonly dueDate: string | null; // yyyy-MM-dd
  readonly dueTime: string | null; // HH:mm
  readonly priority: Priority;
  readonly category: string;
  readonly notes: string;
  readonly isDeleted: boolean;
  readonly deletedDate: string | null; // ISO string
}

/** Fields a caller supplies when adding a task; everything else is derived */
export interface TaskDraft {
  title: string;
  dueDate?: string | null;
  dueTime?: string | null;
  priority?: Priority;
  category?: string;
  notes?: string;
}

/**
 * The completion and deletion flags combined into one state.
 * Timestamps are a function of this state, see checkLifecycleInvariants.
 */
export type LifecycleState = 'active' | 'completed' | 'deleted' | 'completed-deleted';
