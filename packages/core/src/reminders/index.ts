export type { ReminderRequest, ReminderState, NotificationCenter } from './types.js';
export { TimerNotificationCenter } from './timer-notification-center.js';
export type { TimerNotificationCenterOptions } from './timer-notification-center.js';
export { buildReminderContent } from './reminder-content.js';
export type { ReminderContent } from './reminder-content.js';
export {
  ReminderScheduler,
  computeFireMoment,
  isReminderEligible,
  TEST_NOTIFICATION_ID,
} from './reminder-scheduler.js';
export type { ReminderSchedulerOptions } from './reminder-scheduler.js';
