import { GRADES, type CardSchedule, type Grade } from '../types';
import { DEFAULT_SCHEDULER_SETTINGS, SchedulerSettings } from './settings';
import { calculateSM2, getGradeName } from './sm2';

export interface IntervalPreview {
  grade: Grade;
  /** Button label, e.g. "Good" */
  label: string;
  intervalText: string;
  intervalDays: number;
}

/**
 * Get interval previews for all grades.
 * Used to label rating buttons with "what happens if I pick this".
 */
export function getIntervalPreviews(
  card: CardSchedule,
  now: Date,
  settings: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS
): IntervalPreview[] {
  return GRADES.map(grade => {
    const result = calculateSM2(grade, card, now, settings);
    const intervalMs = result.due_at.getTime() - now.getTime();
    const intervalDays = intervalMs / (1000 * 60 * 60 * 24);

    return {
      grade,
      label: getGradeName(grade),
      intervalText: formatInterval(intervalDays * 24 * 60),
      intervalDays,
    };
  });
}

/**
 * Format interval for display.
 * @param minutes - interval in minutes
 */
export function formatInterval(minutes: number): string {
  if (minutes < 1) {
    return 'now';
  }
  if (minutes < 60) {
    return `${Math.round(minutes)}m`;
  }
  if (minutes < 1440) { // less than 1 day
    const hours = Math.round(minutes / 60);
    return `${hours}h`;
  }
  const days = Math.round(minutes / 1440);
  if (days < 7) {
    return `${days}d`;
  }
  if (days < 30) {
    const weeks = days / 7;
    return weeks === Math.floor(weeks) ? `${weeks}w` : `${weeks.toFixed(1)}w`;
  }
  if (days < 365) {
    const months = days / 30;
    return months === Math.floor(months) ? `${months}mo` : `${months.toFixed(1)}mo`;
  }
  const years = days / 365;
  return years === Math.floor(years) ? `${years}y` : `${years.toFixed(1)}y`;
}
