import type { TaskDeckDb } from '../db.js';
import { loadCustomCategories, insertCategory } from '../queries/category-queries.js';
import { createLogger } from '../log.js';

const log = createLogger('categories');

export const DEFAULT_CATEGORIES: readonly string[] = ['Personal', 'Work', 'Study', 'Health', 'Shopping', 'Other'];

/** Built-in categories followed by user-added ones, without duplicates */
export class CategoryRegistry {
  private custom: string[];
  private readonly db: TaskDeckDb;

  constructor(db: TaskDeckDb) {
    this.db = db;
    this.custom = this.load();
  }

  /**
   * Add a custom category. A name that already exists (built-in or custom)
   * or is blank is ignored. Returns whether the name was added.
   */
  add(name: string): boolean {
    const trimmed = name.trim();
    if (!trimmed || this.has(trimmed)) return false;

    this.custom.push(trimmed);
    try {
      insertCategory(this.db, trimmed);
    } catch (err) {
      log.error(`could not save category '${trimmed}':`, err);
    }
    return true;
  }

  has(name: string): boolean {
    return DEFAULT_CATEGORIES.includes(name) || this.custom.includes(name);
  }

  allCategories(): string[] {
    return [...DEFAULT_CATEGORIES, ...this.custom];
  }

  customCategories(): string[] {
    return [...this.custom];
  }

  /** Re-read custom categories from the database */
  reload(): string[] {
    this.custom = this.load();
    return this.allCategories();
  }

  private load(): string[] {
    try {
      return loadCustomCategories(this.db);
    } catch (err) {
      log.warn('could not read saved categories, starting with none:', err);
      return [];
    }
  }
}
