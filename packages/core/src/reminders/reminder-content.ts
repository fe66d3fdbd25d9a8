import type { Task } from '../types/task.js';
import { PriorityName } from '../types/priority.js';

const MAX_NOTES_LENGTH = 100;

export interface ReminderContent {
  title: string;
  body: string;
}

/** Notification text: priority and category, led by the notes when there are any */
export function buildReminderContent(task: Task): ReminderContent {
  const footer = `(${PriorityName[task.priority]} Priority) - ${task.category}`;
  const title = `Task Reminder: ${task.title}`;

  if (task.notes.length === 0) {
    return { title, body: `Don't forget to complete this task! ${footer}` };
  }

  const notes = task.notes.length > MAX_NOTES_LENGTH
    ? `${task.notes.slice(0, MAX_NOTES_LENGTH)}...`
    : task.notes;
  return { title, body: `${notes}\n\n${footer}` };
}
