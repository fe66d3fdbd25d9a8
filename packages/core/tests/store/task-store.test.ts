import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createTestDb, getRawDb, type TaskDeckDb } from '../../src/db.js';
import { TaskStore, type TaskChange } from '../../src/store/task-store.js';
import { loadTasks, MalformedDataError } from '../../src/queries/task-queries.js';
import { checkLifecycleInvariants } from '../../src/queries/task-helpers.js';
import { ReminderScheduler } from '../../src/reminders/reminder-scheduler.js';
import { TimerNotificationCenter } from '../../src/reminders/timer-notification-center.js';
import type { ReminderRequest } from '../../src/reminders/types.js';
import { Priority } from '../../src/types/priority.js';
import type { TaskDraft } from '../../src/types/task.js';
import { setConsoleEcho, getLogHistory, clearLogs } from '../../src/log.js';

const NOW = new Date(2026, 4, 10, 9, 0); // May 10 2026, 09:00 local

let db: TaskDeckDb;
let store: TaskStore;

beforeEach(() => {
  setConsoleEcho(false);
  clearLogs();
  db = createTestDb();
  store = new TaskStore(db, { clock: () => NOW });
});

afterEach(() => {
  setConsoleEcho(true);
});

function addTask(title: string, extra: Omit<TaskDraft, 'title'> = {}): string {
  const result = store.add({ title, ...extra });
  if (result.type !== 'success') throw new Error(`add failed: ${result.type}`);
  return result.data.id;
}

function expectConsistent() {
  for (const t of store.all()) expect(checkLifecycleInvariants(t)).toEqual([]);
  expect(loadTasks(db)).toEqual(store.all());
}

describe('TaskStore.add', () => {
  it('adds an active task and persists it', () => {
    const result = store.add({ title: 'Buy milk', priority: Priority.High });
    expect(result.type).toBe('success');
    if (result.type !== 'success') return;

    expect(result.message).toBe(`Added task (${result.data.id})`);
    expect(result.data.isCompleted).toBe(false);
    expect(result.data.isDeleted).toBe(false);
    expect(store.get(result.data.id)).toEqual(result.data);
    expectConsistent();
  });

  it('rejects an empty title without changing anything', () => {
    const result = store.add({ title: '  ' });
    expect(result).toEqual({ type: 'error', message: 'Cannot add task: title is empty' });
    expect(store.all()).toEqual([]);
  });

  it('keeps insertion order', () => {
    const ids = [addTask('first'), addTask('second'), addTask('third')];
    expect(store.all().map(t => t.id)).toEqual(ids);
    expect(new TaskStore(db).all().map(t => t.id)).toEqual(ids);
  });
});

describe('TaskStore.update', () => {
  it('replaces the task with the same id', () => {
    const id = addTask('Draft');
    const current = store.get(id);
    if (!current) throw new Error('missing');

    expect(store.update({ ...current, title: 'Final', category: 'Work' })).toEqual({
      type: 'success', message: `Updated task (${id})`,
    });
    expect(store.get(id)?.title).toBe('Final');
    expect(store.get(id)?.category).toBe('Work');
    expectConsistent();
  });

  it('reports not-found for an unknown id', () => {
    const id = addTask('x');
    const current = store.get(id);
    if (!current) throw new Error('missing');
    expect(store.update({ ...current, id: 'zzzz' })).toEqual({ type: 'not-found', taskId: 'zzzz' });
    expect(store.all()).toHaveLength(1);
  });

  it('rejects a task that breaks an invariant', () => {
    const id = addTask('x');
    const current = store.get(id);
    if (!current) throw new Error('missing');
    const result = store.update({ ...current, isCompleted: true });
    expect(result.type).toBe('error');
    expect(store.get(id)?.isCompleted).toBe(false);
  });
});

describe('TaskStore lifecycle', () => {
  it('toggles completion and stamps the date', () => {
    const id = addTask('x');

    expect(store.toggleCompletion(id)).toEqual({ type: 'success', message: `Completed task (${id})` });
    expect(store.get(id)?.completedDate).toBe(NOW.toISOString());
    expectConsistent();

    expect(store.toggleCompletion(id)).toEqual({ type: 'success', message: `Reopened task (${id})` });
    expect(store.get(id)?.completedDate).toBeNull();
    expectConsistent();
  });

  it('soft-deletes in batches and reports each id', () => {
    const a = addTask('a');
    const b = addTask('b');
    store.softDelete([a]);

    const batch = store.softDelete([a, b, 'nope']);
    expect(batch.results).toEqual([
      { type: 'no-change', message: `Task (${a}) is already in trash` },
      { type: 'success', message: `Moved task (${b}) to trash` },
      { type: 'not-found', taskId: 'nope' },
    ]);
    expect(store.get(b)?.deletedDate).toBe(NOW.toISOString());
    expectConsistent();
  });

  it('keeps completion when a task moves through the trash', () => {
    const id = addTask('x');
    store.toggleCompletion(id);
    store.softDelete([id]);
    expect(store.get(id)?.isCompleted).toBe(true);

    expect(store.restore(id)).toEqual({ type: 'success', message: `Restored task (${id})` });
    expect(store.get(id)?.isCompleted).toBe(true);
    expect(store.get(id)?.deletedDate).toBeNull();
    expectConsistent();
  });

  it('restore is a no-op for tasks outside the trash', () => {
    const id = addTask('x');
    expect(store.restore(id)).toEqual({ type: 'no-change', message: `Task (${id}) is not in trash` });
    expect(store.restore('nope')).toEqual({ type: 'not-found', taskId: 'nope' });
  });

  it('permanently deletes a task', () => {
    const id = addTask('x');
    expect(store.permanentlyDelete(id)).toEqual({ type: 'success', message: `Permanently deleted task (${id})` });
    expect(store.get(id)).toBeNull();
    expect(loadTasks(db)).toEqual([]);
  });

  it('treats permanently deleting an unknown id as not-found', () => {
    addTask('x');
    expect(store.permanentlyDelete('nope')).toEqual({ type: 'not-found', taskId: 'nope' });
    expect(store.all()).toHaveLength(1);
  });

  it('purges only the trash', () => {
    const keep = addTask('keep');
    const a = addTask('a');
    const b = addTask('b');
    store.softDelete([a, b]);

    expect(store.purgeDeleted()).toBe(2);
    expect(store.all().map(t => t.id)).toEqual([keep]);
    expect(store.purgeDeleted()).toBe(0);
  });

  it('counts tasks by state', () => {
    const a = addTask('a');
    addTask('b');
    const c = addTask('c');
    store.toggleCompletion(a);
    store.softDelete([c]);
    expect(store.stats()).toEqual({ total: 2, active: 1, completed: 1, deleted: 1 });
  });
});

describe('TaskStore change notifications', () => {
  it('notifies subscribers until they unsubscribe', () => {
    const changes: TaskChange[] = [];
    const unsubscribe = store.subscribe(c => changes.push(c));
    const id = addTask('x');
    store.toggleCompletion(id);
    unsubscribe();
    store.softDelete([id]);

    expect(changes).toEqual([
      { type: 'add', taskIds: [id] },
      { type: 'toggle', taskIds: [id] },
    ]);
  });

  it('still notifies later subscribers when one unsubscribes during a change', () => {
    const seen: string[] = [];
    const unsubscribeA = store.subscribe(() => {
      seen.push('a');
      unsubscribeA();
    });
    store.subscribe(() => seen.push('b'));

    addTask('x');
    addTask('y');

    expect(seen).toEqual(['a', 'b', 'b']);
  });

  it('logs a failing subscriber and keeps going', () => {
    const seen: string[] = [];
    store.subscribe(() => {
      throw new Error('listener broke');
    });
    store.subscribe(c => seen.push(c.type));

    const result = store.add({ title: 'x' });

    expect(result.type).toBe('success');
    expect(seen).toEqual(['add']);
    expect(loadTasks(db)).toHaveLength(1);
    const failure = getLogHistory().find(e => e.level === 'error' && e.tag === 'store');
    expect(failure?.message).toContain('listener failed on add:');
  });
});

describe('TaskStore failures', () => {
  it('keeps the in-memory change when saving fails', () => {
    const id = addTask('saved');
    getRawDb(db).close();

    const result = store.toggleCompletion(id);

    expect(result.type).toBe('success');
    expect(store.get(id)?.isCompleted).toBe(true);
    expect(store.persistenceError).toBeInstanceOf(Error);
    expect(getLogHistory().some(e => e.level === 'error' && e.tag === 'store')).toBe(true);
  });

  it('starts empty when the saved data is malformed', () => {
    getRawDb(db).exec(`INSERT INTO tasks (id, title, priority, category) VALUES ('bad1', 'x', 9, 'Work')`);

    const fresh = new TaskStore(db);

    expect(fresh.all()).toEqual([]);
    expect(fresh.loadError).toBeInstanceOf(MalformedDataError);
    expect(getLogHistory().some(e => e.level === 'warn' && e.tag === 'store')).toBe(true);
  });

  it('reload picks up changes written by another store', () => {
    const other = new TaskStore(db, { clock: () => NOW });
    other.add({ title: 'from elsewhere' });
    expect(store.all()).toEqual([]);
    expect(store.reload().map(t => t.title)).toEqual(['from elsewhere']);
  });
});

describe('TaskStore reminders', () => {
  let delivered: ReminderRequest[];
  let scheduler: ReminderScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    delivered = [];
    const center = new TimerNotificationCenter({ deliver: r => delivered.push(r) });
    scheduler = new ReminderScheduler(center, { leadMinutes: () => 60 });
    store = new TaskStore(db, { reminders: scheduler, clock: () => new Date() });
  });

  afterEach(() => {
    scheduler.dispose();
    vi.useRealTimers();
  });

  it('schedules a reminder for a dated task and fires it at deadline minus lead', () => {
    const id = addTask('Standup', { dueDate: '2026-05-10', dueTime: '12:00' });
    expect(scheduler.pendingIds()).toEqual([id]);

    vi.advanceTimersByTime(2 * 60 * 60_000 - 1);
    expect(delivered).toEqual([]);
    vi.advanceTimersByTime(1);

    expect(delivered.map(r => r.id)).toEqual([id]);
    expect(delivered[0]?.title).toBe('Task Reminder: Standup');
    expect(scheduler.stateOf(id)).toBe('fired');
  });

  it('does not schedule when the fire moment has already passed', () => {
    const id = addTask('Soon', { dueDate: '2026-05-10', dueTime: '09:30' });
    expect(scheduler.stateOf(id)).toBe('unscheduled');
    expect(scheduler.pendingIds()).toEqual([]);
  });

  it('cancels on completion and re-schedules on reopen', () => {
    const id = addTask('x', { dueDate: '2026-05-11' });
    store.toggleCompletion(id);
    expect(scheduler.pendingIds()).toEqual([]);
    store.toggleCompletion(id);
    expect(scheduler.pendingIds()).toEqual([id]);
  });

  it('re-establishes exactly one reminder on restore', () => {
    const id = addTask('x', { dueDate: '2026-05-11' });
    store.softDelete([id]);
    expect(scheduler.pendingIds()).toEqual([]);

    store.restore(id);
    expect(scheduler.pendingIds()).toEqual([id]);

    vi.advanceTimersByTime(24 * 60 * 60_000);
    expect(delivered.map(r => r.id)).toEqual([id]);
  });

  it('does not re-establish a reminder whose moment passed while in the trash', () => {
    const id = addTask('x', { dueDate: '2026-05-11' });
    expect(scheduler.pendingIds()).toEqual([id]);
    store.softDelete([id]);

    // Past the 23:00 fire moment
    vi.advanceTimersByTime(15 * 60 * 60_000);
    store.restore(id);

    expect(scheduler.pendingIds()).toEqual([]);
    vi.advanceTimersByTime(24 * 60 * 60_000);
    expect(delivered).toEqual([]);
  });

  it('moves the reminder when the due date changes', () => {
    const id = addTask('x', { dueDate: '2026-05-11' });
    const current = store.get(id);
    if (!current) throw new Error('missing');
    store.update({ ...current, dueDate: '2026-05-12' });

    vi.advanceTimersByTime(24 * 60 * 60_000);
    expect(delivered).toEqual([]);
    vi.advanceTimersByTime(24 * 60 * 60_000);
    expect(delivered.map(r => r.id)).toEqual([id]);
  });

  it('drops the reminder when a task is permanently deleted', () => {
    const id = addTask('x', { dueDate: '2026-05-11' });
    store.permanentlyDelete(id);
    vi.advanceTimersByTime(2 * 24 * 60 * 60_000);
    expect(delivered).toEqual([]);
  });
});
