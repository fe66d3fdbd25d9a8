export { TaskStore } from './task-store.js';
export type { TaskChange, TaskChangeType, TaskStats, TaskStoreOptions } from './task-store.js';
export { CategoryRegistry, DEFAULT_CATEGORIES } from './category-registry.js';
