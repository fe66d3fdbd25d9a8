/**
 * Custom category storage. Built-in categories are never written.
 */

import { asc, max } from 'drizzle-orm';
import type { TaskDeckDb } from '../db.js';
import { categories } from '../schema/categories.js';

/** Custom category names in insertion order */
export function loadCustomCategories(db: TaskDeckDb): string[] {
  const rows = db.select({ name: categories.name }).from(categories).orderBy(asc(categories.sortOrder)).all();
  return rows.map(r => r.name);
}

/** Append a custom category after the existing ones; an existing name is left alone */
export function insertCategory(db: TaskDeckDb, name: string): void {
  const row = db.select({ maxOrder: max(categories.sortOrder) }).from(categories).get();
  const maxOrder = row?.maxOrder ?? -1;
  db.insert(categories).values({ name, sortOrder: maxOrder + 1 }).onConflictDoNothing().run();
}
