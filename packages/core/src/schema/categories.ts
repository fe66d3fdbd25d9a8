import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/** User-added categories only; the built-in ones are never stored */
export const categories = sqliteTable('categories', {
  name: text('name').primaryKey(),
  sortOrder: integer('sort_order').notNull().default(0),
});
