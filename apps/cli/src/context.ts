import { join } from 'node:path';
import { homedir } from 'node:os';
import {
  createDb, getDefaultDbPath, TaskStore, CategoryRegistry, SnapshotManager,
} from '@taskdeck/core';
import type { TaskDeckDb } from '@taskdeck/core';

/** Everything a command needs, opened once per invocation */
export interface CliContext {
  db: TaskDeckDb;
  dbPath: string;
  store: TaskStore;
  categories: CategoryRegistry;
  snapshots: SnapshotManager;
}

export function getDefaultBackupDir(): string {
  return join(homedir(), '.taskdeck', 'backups');
}

export function createContext(
  dbPath: string = getDefaultDbPath(),
  backupDir: string = getDefaultBackupDir(),
): CliContext {
  const db = createDb(dbPath);
  return {
    db,
    dbPath,
    store: new TaskStore(db),
    categories: new CategoryRegistry(db),
    snapshots: new SnapshotManager(backupDir, db),
  };
}
