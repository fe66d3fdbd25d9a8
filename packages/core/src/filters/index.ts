export {
  FILTERS,
  parseFilter,
  compareTasks,
  sortTasksForDisplay,
  queryTasks,
  groupUpcoming,
} from './task-filters.js';
export type { StatusFilter, TaskQuery, UpcomingGroup } from './task-filters.js';
