// Task helpers
export {
  generateId,
  createTask,
  withCompletion,
  withDeletion,
  lifecycleState,
  checkLifecycleInvariants,
  validateTask,
  DEFAULT_CATEGORY,
} from './task-helpers.js';

// Task queries
export {
  loadTasks,
  saveTasks,
  loadTaskRows,
  parseTaskRow,
  MalformedDataError,
} from './task-queries.js';
export type { TaskRow } from './task-queries.js';

// Category queries
export {
  loadCustomCategories,
  insertCategory,
} from './category-queries.js';

// Config queries
export {
  getConfig,
  setConfig,
  normalizeLeadMinutes,
  getReminderLeadMinutes,
  setReminderLeadMinutes,
  DEFAULT_LEAD_MINUTES,
} from './config-queries.js';
