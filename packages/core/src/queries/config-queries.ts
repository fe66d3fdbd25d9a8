/**
 * Key-value config storage operations.
 */

import { eq } from 'drizzle-orm';
import type { TaskDeckDb } from '../db.js';
import { config } from '../schema/index.js';

const LEAD_MINUTES_KEY = 'reminder_lead_minutes';
export const DEFAULT_LEAD_MINUTES = 60;

/** Get a config value by key */
export function getConfig(db: TaskDeckDb, key: string): string | null {
  const row = db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
  return row?.value ?? null;
}

/** Set a config value */
export function setConfig(db: TaskDeckDb, key: string, value: string): void {
  db.insert(config).values({ key, value }).onConflictDoUpdate({ target: config.key, set: { value } }).run();
}

/** Lead time in minutes; anything unset, unparsable or not positive means 60 */
export function normalizeLeadMinutes(value: number | null | undefined): number {
  if (value == null || !Number.isFinite(value) || value <= 0) return DEFAULT_LEAD_MINUTES;
  return value;
}

/** Get the reminder lead time (minutes before the deadline) */
export function getReminderLeadMinutes(db: TaskDeckDb): number {
  const raw = getConfig(db, LEAD_MINUTES_KEY);
  return normalizeLeadMinutes(raw == null ? null : Number(raw));
}

/** Set the reminder lead time; returns the value that will take effect */
export function setReminderLeadMinutes(db: TaskDeckDb, minutes: number): number {
  setConfig(db, LEAD_MINUTES_KEY, String(minutes));
  return normalizeLeadMinutes(minutes);
}
