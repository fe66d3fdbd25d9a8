// Types
export { Priority, PriorityName, isPriority } from './types/priority.js';
export type { TaskId, Task, TaskDraft, LifecycleState } from './types/task.js';
export type { TaskResult, DataResult, BatchResult } from './types/results.js';
export { isError, anyFailed } from './types/results.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDbPath, getRawDb, getDbPath, CREATE_SCHEMA_SQL } from './db.js';
export type { TaskDeckDb } from './db.js';

// Logging
export { createLogger, setConsoleEcho, getLogHistory, clearLogs, onLog } from './log.js';
export type { Logger, LogEntry } from './log.js';

// Parsers
export * from './parsers/index.js';

// Queries
export * from './queries/index.js';

// Query engine
export * from './filters/index.js';

// Store
export * from './store/index.js';

// Reminders
export * from './reminders/index.js';

// Backup
export * from './backup/index.js';
