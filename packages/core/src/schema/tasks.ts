import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  isCompleted: integer('is_completed').notNull().default(0),
  completedDate: text('completed_date'),
  /** yyyy-MM-dd, no time component */
  dueDate: text('due_date'),
  /** HH:mm, only meaningful together with due_date */
  dueTime: text('due_time'),
  priority: integer('priority').notNull().default(2),
  category: text('category').notNull(),
  notes: text('notes').notNull().default(''),
  isDeleted: integer('is_deleted').notNull().default(0),
  deletedDate: text('deleted_date'),
  /** Position in the store's collection (insertion order) */
  sortOrder: integer('sort_order').notNull().default(0),
}, (table) => [
  index('idx_tasks_sort_order').on(table.sortOrder),
]);
