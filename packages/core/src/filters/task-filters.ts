/**
 * Derived list views: status filter, category, free-text search and the
 * display order every list uses. Pure functions over a task snapshot.
 */

import type { Task } from '../types/task.js';
import { formatDate } from '../parsers/date-parser.js';

export const FILTERS = ['all', 'active', 'today', 'upcoming', 'completed', 'deleted'] as const;

export type StatusFilter = (typeof FILTERS)[number];

export interface TaskQuery {
  filter: StatusFilter;
  /** Exact category match; null/undefined keeps every category */
  category?: string | null;
  /** Case-insensitive substring of title or notes; empty keeps everything */
  search?: string;
  /** Reference moment for today/upcoming. Defaults to the current time. */
  now?: Date;
}

export interface UpcomingGroup {
  /** yyyy-MM-dd */
  date: string;
  tasks: Task[];
}

/** Parse a filter name (case-insensitive). Returns null if unknown. */
export function parseFilter(input: string): StatusFilter | null {
  const normalized = input.trim().toLowerCase();
  return FILTERS.find(f => f === normalized) ?? null;
}

function matchesStatus(task: Task, filter: StatusFilter, todayStr: string): boolean {
  switch (filter) {
    case 'all':
      return true;
    case 'active':
      return !task.isCompleted;
    case 'today':
      // No due date counts as due today
      if (task.isCompleted) return false;
      return task.dueDate == null || task.dueDate === todayStr;
    case 'upcoming':
      return !task.isCompleted && task.dueDate != null && task.dueDate > todayStr;
    case 'completed':
      return task.isCompleted;
    case 'deleted':
      return task.isDeleted;
  }
}

function matchesSearch(task: Task, needle: string): boolean {
  return task.title.toLowerCase().includes(needle) || task.notes.toLowerCase().includes(needle);
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Display order: incomplete first, then priority high→low, then dated before
 * undated (earlier date first), then title, then id.
 */
export function compareTasks(a: Task, b: Task): number {
  if (a.isCompleted !== b.isCompleted) return a.isCompleted ? 1 : -1;
  // Lower number = higher priority
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.dueDate !== b.dueDate) {
    if (a.dueDate == null) return 1;
    if (b.dueDate == null) return -1;
    return compareText(a.dueDate, b.dueDate);
  }
  return compareText(a.title, b.title) || compareText(a.id, b.id);
}

/** Sorted copy of `tasks` in display order */
export function sortTasksForDisplay(tasks: readonly Task[]): Task[] {
  return [...tasks].sort(compareTasks);
}

/** Filter and sort a task collection for one list view */
export function queryTasks(tasks: readonly Task[], query: TaskQuery): Task[] {
  const todayStr = formatDate(query.now ?? new Date());
  const needle = query.search ? query.search.toLowerCase() : '';

  const result = tasks.filter(t =>
    // Deleted tasks are only visible through the deleted filter
    (query.filter === 'deleted' || !t.isDeleted)
    && matchesStatus(t, query.filter, todayStr)
    && (query.category == null || t.category === query.category)
    && (needle === '' || matchesSearch(t, needle)),
  );

  return result.sort(compareTasks);
}

/**
 * The upcoming view bucketed by due date. Buckets come back in date order;
 * each keeps the display order of its tasks.
 */
export function groupUpcoming(tasks: readonly Task[], query: Omit<TaskQuery, 'filter'>): UpcomingGroup[] {
  const groups = new Map<string, Task[]>();
  for (const task of queryTasks(tasks, { ...query, filter: 'upcoming' })) {
    if (task.dueDate == null) continue;
    const bucket = groups.get(task.dueDate);
    if (bucket) {
      bucket.push(task);
    } else {
      groups.set(task.dueDate, [task]);
    }
  }

  return [...groups.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([date, bucket]) => ({ date, tasks: bucket }));
}
