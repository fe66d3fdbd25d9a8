import { describe, it, expect } from 'vitest';
import {
  queryTasks, groupUpcoming, sortTasksForDisplay, compareTasks, parseFilter, FILTERS,
} from '../../src/filters/task-filters.js';
import { createTask, withCompletion, withDeletion } from '../../src/queries/task-helpers.js';
import { Priority } from '../../src/types/priority.js';
import type { Task, TaskDraft } from '../../src/types/task.js';

const NOW = new Date(2026, 4, 10, 9, 0); // May 10 2026

function task(id: string, draft: Partial<TaskDraft> = {}): Task {
  return createTask({ title: id, ...draft }, id);
}

describe('parseFilter', () => {
  it('accepts every filter name case-insensitively', () => {
    for (const f of FILTERS) expect(parseFilter(f.toUpperCase())).toBe(f);
  });

  it('returns null for unknown names', () => {
    expect(parseFilter('overdue')).toBeNull();
  });
});

describe('queryTasks', () => {
  it('orders upcoming tasks by priority before date', () => {
    const a = task('A', { dueDate: '2026-05-12', priority: Priority.High });
    const b = task('B', { dueDate: '2026-05-11', priority: Priority.Low });
    expect(queryTasks([b, a], { filter: 'upcoming', now: NOW }).map(t => t.id)).toEqual(['A', 'B']);
  });

  it('shows undated and due-today tasks under today, and drops them once completed', () => {
    const undated = task('u');
    const dueToday = task('t', { dueDate: '2026-05-10' });
    const tomorrow = task('m', { dueDate: '2026-05-11' });
    const list = [undated, dueToday, tomorrow];

    expect(queryTasks(list, { filter: 'today', now: NOW }).map(t => t.id)).toEqual(['t', 'u']);

    const done = withCompletion(dueToday, true, NOW);
    const afterToggle = [undated, done, tomorrow];
    expect(queryTasks(afterToggle, { filter: 'today', now: NOW }).map(t => t.id)).toEqual(['u']);
    expect(queryTasks(afterToggle, { filter: 'completed', now: NOW }).map(t => t.id)).toEqual(['t']);
  });

  it('excludes past-due tasks from upcoming', () => {
    const past = task('p', { dueDate: '2026-05-09' });
    const today = task('t', { dueDate: '2026-05-10' });
    expect(queryTasks([past, today], { filter: 'upcoming', now: NOW })).toEqual([]);
  });

  it('only shows deleted tasks under the deleted filter', () => {
    const live = task('l');
    const trashed = withDeletion(task('d'), true, NOW);
    const trashedDone = withDeletion(withCompletion(task('c'), true, NOW), true, NOW);
    const list = [live, trashed, trashedDone];

    for (const filter of FILTERS.filter(f => f !== 'deleted')) {
      expect(queryTasks(list, { filter, now: NOW }).map(t => t.id)).not.toContain('d');
    }
    expect(queryTasks(list, { filter: 'completed', now: NOW })).toEqual([]);
    expect(queryTasks(list, { filter: 'deleted', now: NOW }).map(t => t.id)).toEqual(['d', 'c']);
  });

  it('filters by exact category', () => {
    const work = task('w', { category: 'Work' });
    const home = task('h', { category: 'Personal' });
    expect(queryTasks([work, home], { filter: 'all', category: 'Work' }).map(t => t.id)).toEqual(['w']);
    expect(queryTasks([work, home], { filter: 'all', category: 'work' })).toEqual([]);
    expect(queryTasks([work, home], { filter: 'all', category: null })).toHaveLength(2);
  });

  it('searches title and notes case-insensitively', () => {
    const byTitle = createTask({ title: 'Call Plumber' }, 'a001');
    const byNotes = createTask({ title: 'Kitchen', notes: 'ask the PLUMBER about the sink' }, 'a002');
    const other = createTask({ title: 'Groceries' }, 'a003');
    const found = queryTasks([byTitle, byNotes, other], { filter: 'all', search: 'plumber' });
    expect(found.map(t => t.id)).toEqual(['a001', 'a002']);
    expect(queryTasks([other], { filter: 'all', search: '' })).toHaveLength(1);
  });

  it('does not modify its input', () => {
    const list = [task('b'), task('a')];
    queryTasks(list, { filter: 'all' });
    expect(list.map(t => t.id)).toEqual(['b', 'a']);
  });
});

describe('sortTasksForDisplay', () => {
  it('puts incomplete tasks first', () => {
    const done = withCompletion(task('d', { priority: Priority.High }), true, NOW);
    const open = task('o', { priority: Priority.Low });
    expect(sortTasksForDisplay([done, open]).map(t => t.id)).toEqual(['o', 'd']);
  });

  it('puts dated tasks before undated ones at equal priority', () => {
    const undated = task('a');
    const later = task('b', { dueDate: '2026-06-01' });
    const sooner = task('c', { dueDate: '2026-05-20' });
    expect(sortTasksForDisplay([undated, later, sooner]).map(t => t.id)).toEqual(['c', 'b', 'a']);
  });

  it('breaks remaining ties by title, then id', () => {
    const x = createTask({ title: 'Same' }, 'x000');
    const y = createTask({ title: 'Same' }, 'a000');
    const z = createTask({ title: 'Earlier' }, 'z000');
    expect(sortTasksForDisplay([x, y, z]).map(t => t.id)).toEqual(['z000', 'a000', 'x000']);
  });

  it('is idempotent', () => {
    const list = [
      task('q', { dueDate: '2026-05-12', priority: Priority.Low }),
      task('r', { priority: Priority.High }),
      withCompletion(task('s'), true, NOW),
      task('t', { dueDate: '2026-05-11' }),
    ];
    const once = sortTasksForDisplay(list);
    expect(sortTasksForDisplay(once)).toEqual(once);
    expect(once.map(t => t.id)).toEqual(['r', 't', 'q', 's']);
  });

  it('compareTasks is zero only for the same task', () => {
    const a = task('a');
    expect(compareTasks(a, a)).toBe(0);
    expect(compareTasks(a, task('b'))).toBeLessThan(0);
  });
});

describe('groupUpcoming', () => {
  it('buckets upcoming tasks by date in ascending order', () => {
    const list = [
      task('late', { dueDate: '2026-05-20' }),
      task('soonLow', { dueDate: '2026-05-11', priority: Priority.Low }),
      task('soonHigh', { dueDate: '2026-05-11', priority: Priority.High }),
      task('undated'),
      withCompletion(task('done', { dueDate: '2026-05-12' }), true, NOW),
    ];

    const groups = groupUpcoming(list, { now: NOW });

    expect(groups.map(g => g.date)).toEqual(['2026-05-11', '2026-05-20']);
    expect(groups[0]?.tasks.map(t => t.id)).toEqual(['soonHigh', 'soonLow']);
    expect(groups[1]?.tasks.map(t => t.id)).toEqual(['late']);
  });

  it('applies category and search', () => {
    const list = [
      task('w', { dueDate: '2026-05-11', category: 'Work' }),
      task('p', { dueDate: '2026-05-11', category: 'Personal' }),
    ];
    expect(groupUpcoming(list, { now: NOW, category: 'Work' })).toEqual([
      { date: '2026-05-11', tasks: [list[0]] },
    ]);
  });
});
