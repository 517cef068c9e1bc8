/**
 * Shared Scheduler Module - SM-2 Implementation
 *
 * Pure functions that decide which cards are due, in what order, and how a
 * review outcome moves a card's next due date and ease. No I/O, no hidden
 * state: safe to call again on retry.
 */

export {
  type SchedulerSettings,
  DEFAULT_SCHEDULER_SETTINGS,
  resolveSchedulerSettings,
} from './settings';

export {
  type SM2Result,
  calculateSM2,
  applyOutcome,
  getGradeName,
  addDays,
  addMinutes,
} from './sm2';

export { isDue, nextDue } from './due';

export { type IntervalPreview, getIntervalPreviews, formatInterval } from './preview';

export {
  type CollectionStats,
  type DashboardStats,
  getCollectionStats,
  getDashboardStats,
  collectTags,
} from './stats';
