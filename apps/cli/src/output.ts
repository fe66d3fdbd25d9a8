/**
 * chalk-based output formatting for task lines, results and messages.
 */

import chalk from 'chalk';
import { Priority, toLocalDateTime, startOfDay } from '@taskdeck/core';
import type { Task, TaskResult, BatchResult, ReminderRequest } from '@taskdeck/core';

const DAY_MS = 86_400_000;

// --- Category colors (deterministic from category name) ---

const CATEGORY_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

function categoryColor(category: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < category.length; i++) {
    hash = ((hash << 5) - hash + category.charCodeAt(i)) | 0;
  }
  return CATEGORY_COLORS[Math.abs(hash) % CATEGORY_COLORS.length] ?? chalk.white;
}

// --- Formatting functions ---

export function formatCheckbox(task: Task): string {
  return task.isCompleted ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

export function formatCategory(category: string): string {
  return categoryColor(category)(`@${category}`);
}

/** Whole days from the calendar day of `from` to the calendar day of `to` */
function dayDiff(from: Date, to: Date): number {
  return Math.round((startOfDay(to).getTime() - startOfDay(from).getTime()) / DAY_MS);
}

export function formatDueDate(task: Task, now: Date = new Date()): string {
  if (!task.dueDate) return '';

  const dueD = toLocalDateTime(task.dueDate);
  const at = task.dueTime ? ` ${task.dueTime}` : '';

  // For completed tasks, freeze the label based on completion time
  if (task.isCompleted && task.completedDate) {
    const lateDays = dayDiff(dueD, new Date(task.completedDate));
    return lateDays > 0
      ? chalk.dim(`  Completed ${lateDays}d late`)
      : chalk.dim(`  Due: ${formatMonthDay(dueD)}${at}`);
  }

  const diff = dayDiff(now, dueD);
  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow(`  Due: Today${at}`);
  if (diff === 1) return chalk.dim(`  Due: Tomorrow${at}`);
  if (diff < 7) return chalk.dim(`  Due: ${dueD.toLocaleDateString('en-US', { weekday: 'long' })}${at}`);
  return chalk.dim(`  Due: ${formatMonthDay(dueD)}${at}`);
}

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}

/** Header for one upcoming bucket, e.g. "May 11, 2026" */
export function formatGroupDate(date: string): string {
  return toLocalDateTime(date).toLocaleDateString('en-US', { month: 'short', day: 'numeric', year: 'numeric' });
}

const INDENT = '          '; // id(6) + space + priority(3)

/** One task as printed by list and trash: id, priority, checkbox, title, due, category, notes */
export function formatTaskLine(task: Task, now: Date = new Date()): string {
  const taskId = chalk.dim(`(${task.id})`);
  const title = task.isCompleted ? chalk.dim.strikethrough(task.title) : chalk.bold(task.title);
  const head = `${taskId} ${formatPriority(task.priority)} ${formatCheckbox(task)} ${title}`
    + `${formatDueDate(task, now)}  ${formatCategory(task.category)}`;

  const notes = task.notes
    .split('\n')
    .filter(l => l.trim().length > 0)
    .map(l => `\n${INDENT}${chalk.dim(l)}`)
    .join('');
  return head + notes;
}

// --- Result output ---

export function printResult(result: TaskResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'not-found': error(`Could not find task with id ${result.taskId}`); break;
    case 'no-change': info(result.message); break;
    case 'error': error(result.message); break;
  }
}

export function printBatchResults(batch: BatchResult): void {
  for (const result of batch.results) {
    printResult(result);
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Utilities ---

export function getTimeAgo(timestamp: Date, now: Date = new Date()): string {
  const diff = now.getTime() - timestamp.getTime();
  const mins = diff / 60000;
  if (mins < 1) return 'just now';
  if (mins < 60) return `${Math.floor(mins)}m ago`;
  const hours = mins / 60;
  if (hours < 24) return `${Math.floor(hours)}h ago`;
  const days = hours / 24;
  if (days < 7) return `${Math.floor(days)}d ago`;
  return formatMonthDay(timestamp);
}

export function formatTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/** A delivered reminder, as printed by watch and notify-test */
export function formatReminder(request: ReminderRequest, at: Date = new Date()): string {
  const body = request.body
    .split('\n')
    .filter(l => l.trim().length > 0)
    .map(l => `\n   ${l}`)
    .join('');
  return `${chalk.dim(formatTimestamp(at))} ${chalk.magenta.bold(request.title)}${body}`;
}
