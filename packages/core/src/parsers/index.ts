export {
  parseDate,
  parseTime,
  formatDate,
  formatTime,
  addDays,
  startOfDay,
  toLocalDateTime,
  isValidDate,
  isValidTime,
} from './date-parser.js';
