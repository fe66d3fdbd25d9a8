/**
 * Point-in-time snapshots of everything taskdeck stores: the task rows
 * (kept exactly as stored, so rows the store refused to load survive),
 * the custom categories and the config table. One JSON file per snapshot.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { join, basename } from 'node:path';
import { asc } from 'drizzle-orm';
import type { TaskDeckDb } from '../db.js';
import { getRawDb } from '../db.js';
import { tasks, categories, config } from '../schema/index.js';
import { loadTaskRows, parseTaskRow, type TaskRow } from '../queries/task-queries.js';
import { loadCustomCategories } from '../queries/category-queries.js';
import { createLogger } from '../log.js';

const log = createLogger('backup');

const SNAPSHOT_FORMAT = 1;
const SNAPSHOT_EXT = '.snapshot.json';
const MAX_SNAPSHOTS = 20;

type ConfigRow = typeof config.$inferSelect;

export interface SnapshotContent {
  tasks: TaskRow[];
  categories: string[];
  config: ConfigRow[];
}

export interface Snapshot extends SnapshotContent {
  format: typeof SNAPSHOT_FORMAT;
  createdAt: string;
  /** What was about to happen, e.g. "before add" */
  reason: string;
}

export interface SnapshotInfo {
  id: string;
  createdAt: Date;
  reason: string;
  taskCount: number;
  /** Rows that do not map to a valid task */
  unreadableCount: number;
  /** Pinned snapshots hold unreadable rows and are never rotated away */
  pinned: boolean;
}

export class SnapshotFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotFormatError';
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const isString = (v: unknown): v is string => typeof v === 'string';
const isNumber = (v: unknown): v is number => typeof v === 'number';
const isOptionalString = (v: unknown): v is string | null => v === null || typeof v === 'string';

function toTaskRow(value: unknown): TaskRow | null {
  if (!isRecord(value)) return null;
  const {
    id, title, isCompleted, completedDate, dueDate, dueTime,
    priority, category, notes, isDeleted, deletedDate, sortOrder,
  } = value;
  if (!isString(id) || !isString(title) || !isString(category) || !isString(notes)) return null;
  if (!isNumber(isCompleted) || !isNumber(isDeleted) || !isNumber(priority) || !isNumber(sortOrder)) return null;
  if (!isOptionalString(completedDate) || !isOptionalString(dueDate)
    || !isOptionalString(dueTime) || !isOptionalString(deletedDate)) return null;
  return {
    id, title, isCompleted, completedDate, dueDate, dueTime,
    priority, category, notes, isDeleted, deletedDate, sortOrder,
  };
}

function toConfigRow(value: unknown): ConfigRow | null {
  if (!isRecord(value)) return null;
  const { key, value: stored } = value;
  return isString(key) && isString(stored) ? { key, value: stored } : null;
}

function parseList<T>(value: unknown, field: string, parse: (item: unknown) => T | null): T[] {
  if (!Array.isArray(value)) throw new SnapshotFormatError(`'${field}' is not a list`);
  return value.map((item, i) => {
    const parsed = parse(item);
    if (parsed === null) throw new SnapshotFormatError(`'${field}' entry ${i} is malformed`);
    return parsed;
  });
}

/** Parse the text of a snapshot file */
export function parseSnapshot(text: string): Snapshot {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new SnapshotFormatError(`not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(data)) throw new SnapshotFormatError('not an object');
  if (data.format !== SNAPSHOT_FORMAT) throw new SnapshotFormatError(`unsupported format ${String(data.format)}`);
  const { createdAt, reason } = data;
  if (!isString(createdAt) || isNaN(new Date(createdAt).getTime())) {
    throw new SnapshotFormatError('missing creation time');
  }
  return {
    format: SNAPSHOT_FORMAT,
    createdAt,
    reason: isString(reason) ? reason : '',
    tasks: parseList(data.tasks, 'tasks', toTaskRow),
    categories: parseList(data.categories, 'categories', v => (isString(v) ? v : null)),
    config: parseList(data.config, 'config', toConfigRow),
  };
}

function countUnreadable(rows: readonly TaskRow[]): number {
  let unreadable = 0;
  for (const row of rows) {
    try {
      parseTaskRow(row);
    } catch {
      unreadable++;
    }
  }
  return unreadable;
}

function summarize(id: string, snapshot: Snapshot): SnapshotInfo {
  const unreadableCount = countUnreadable(snapshot.tasks);
  return {
    id,
    createdAt: new Date(snapshot.createdAt),
    reason: snapshot.reason,
    taskCount: snapshot.tasks.length,
    unreadableCount,
    pinned: unreadableCount > 0,
  };
}

/** yyyy-MM-ddTHH-mm-ss-SSS (filesystem-safe, sorts by time) */
function formatSnapshotId(d: Date): string {
  const pad = (n: number, w = 2) => String(n).padStart(w, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`
    + `T${pad(d.getHours())}-${pad(d.getMinutes())}-${pad(d.getSeconds())}-${pad(d.getMilliseconds(), 3)}`;
}

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

export class SnapshotManager {
  private readonly snapshotDir: string;
  private readonly db: TaskDeckDb;

  constructor(snapshotDir: string, db: TaskDeckDb) {
    this.snapshotDir = snapshotDir;
    this.db = db;
  }

  /** What the database holds right now */
  readContent(): SnapshotContent {
    return {
      tasks: loadTaskRows(this.db),
      categories: loadCustomCategories(this.db),
      config: this.db.select().from(config).orderBy(asc(config.key)).all(),
    };
  }

  /**
   * Snapshot the database unless the newest snapshot already holds the same
   * data. Failures are logged, never thrown; returns null on failure.
   */
  createSnapshot(reason: string, now: Date = new Date()): SnapshotInfo | null {
    try {
      const content = this.readContent();
      const latest = this.listSnapshots()[0];
      if (latest && this.sameContent(latest.id, content)) return latest;

      const snapshot: Snapshot = { format: SNAPSHOT_FORMAT, createdAt: now.toISOString(), reason, ...content };
      const id = this.freeId(now);
      mkdirSync(this.snapshotDir, { recursive: true });
      writeFileSync(this.pathOf(id), JSON.stringify(snapshot, null, 2));
      this.rotate();
      return summarize(id, snapshot);
    } catch (err) {
      log.warn('snapshot failed:', err);
      return null;
    }
  }

  /** Readable snapshots, newest first. Files that fail to parse are skipped. */
  listSnapshots(): SnapshotInfo[] {
    if (!existsSync(this.snapshotDir)) return [];

    const infos: SnapshotInfo[] = [];
    for (const name of readdirSync(this.snapshotDir)) {
      if (!name.endsWith(SNAPSHOT_EXT)) continue;
      const id = basename(name, SNAPSHOT_EXT);
      try {
        infos.push(summarize(id, this.read(id)));
      } catch (err) {
        log.warn(`skipping unreadable snapshot ${name}:`, err);
      }
    }
    return infos.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id));
  }

  /**
   * Replace the stored tasks, categories and config with a snapshot's.
   * The current data is snapshotted first. Stores holding the data in memory
   * must reload afterwards.
   */
  restoreSnapshot(id: string): SnapshotInfo {
    if (!existsSync(this.pathOf(id))) throw new Error(`Backup ${id} not found`);
    const snapshot = this.read(id);

    this.createSnapshot('before restore');

    const run = getRawDb(this.db).transaction(() => {
      this.db.delete(tasks).run();
      this.db.delete(categories).run();
      this.db.delete(config).run();
      for (const row of snapshot.tasks) this.db.insert(tasks).values(row).run();
      snapshot.categories.forEach((name, i) => {
        this.db.insert(categories).values({ name, sortOrder: i }).run();
      });
      for (const row of snapshot.config) this.db.insert(config).values(row).run();
    });
    run();

    log.log(`restored snapshot ${id} (${snapshot.tasks.length} task rows)`);
    return summarize(id, snapshot);
  }

  private read(id: string): Snapshot {
    return parseSnapshot(readFileSync(this.pathOf(id), 'utf8'));
  }

  private sameContent(id: string, content: SnapshotContent): boolean {
    const { tasks: t, categories: c, config: k } = this.read(id);
    return JSON.stringify({ tasks: t, categories: c, config: k }) === JSON.stringify(content);
  }

  /** Keep the newest unpinned snapshots; pinned ones stay until removed by hand */
  private rotate(): void {
    const unpinned = this.listSnapshots().filter(s => !s.pinned);
    for (const old of unpinned.slice(MAX_SNAPSHOTS)) {
      try {
        unlinkSync(this.pathOf(old.id));
      } catch (err) {
        log.warn(`could not remove old snapshot ${old.id}:`, err);
      }
    }
  }

  private freeId(now: Date): string {
    const base = formatSnapshotId(now);
    let id = base;
    for (let n = 1; existsSync(this.pathOf(id)); n++) id = `${base}-${n}`;
    return id;
  }

  private pathOf(id: string): string {
    return join(this.snapshotDir, `${id}${SNAPSHOT_EXT}`);
  }
}
