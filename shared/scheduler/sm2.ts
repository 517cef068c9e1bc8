import type { CardSchedule, Grade } from '../types';
import { DEFAULT_SCHEDULER_SETTINGS, SchedulerSettings } from './settings';

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

export interface SM2Result {
  ease_factor: number;
  interval_days: number;
  repetitions: number;
  lapses: number;
  due_at: Date;
}

// Ease is stored with 2 decimals. The floor applies after rounding.
function clampEase(ease: number, minEase: number): number {
  return Math.max(minEase, Math.round(ease * 100) / 100);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
}

/**
 * SM-2 Spaced Repetition Algorithm (four-grade variant)
 *
 * - again: streak resets, lapse counted, ease penalised, relearn shortly
 * - hard:  ease penalised, interval grows by hard_multiplier
 * - good:  ease kept, interval grows by the ease factor (first success = 1 day)
 * - easy:  ease raised, interval grows by ease * easy_bonus
 */
export function calculateSM2(
  grade: Grade,
  current: Pick<CardSchedule, 'ease_factor' | 'interval_days' | 'repetitions' | 'lapses'>,
  now: Date,
  settings: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS
): SM2Result {
  const { min_ease } = settings;

  switch (grade) {
    case 'again':
      return {
        ease_factor: clampEase(current.ease_factor - settings.again_ease_penalty, min_ease),
        interval_days: 0,
        repetitions: 0,
        lapses: current.lapses + 1,
        due_at: addMinutes(now, settings.relearn_interval_minutes),
      };

    case 'hard': {
      const interval = Math.max(1, Math.round(current.interval_days * settings.hard_multiplier));
      return {
        ease_factor: clampEase(current.ease_factor - settings.hard_ease_penalty, min_ease),
        interval_days: interval,
        repetitions: current.repetitions + 1,
        lapses: current.lapses,
        due_at: addDays(now, interval),
      };
    }

    case 'good': {
      const easeFactor = clampEase(current.ease_factor, min_ease);
      const repetitions = current.repetitions + 1;
      const interval = repetitions === 1
        ? 1
        : Math.max(1, Math.round(current.interval_days * easeFactor));
      return {
        ease_factor: easeFactor,
        interval_days: interval,
        repetitions,
        lapses: current.lapses,
        due_at: addDays(now, interval),
      };
    }

    case 'easy': {
      const easeFactor = clampEase(current.ease_factor + settings.easy_ease_bonus, min_ease);
      const interval = Math.round(Math.max(1, current.interval_days) * easeFactor * settings.easy_bonus);
      return {
        ease_factor: easeFactor,
        interval_days: interval,
        repetitions: current.repetitions + 1,
        lapses: current.lapses,
        due_at: addDays(now, interval),
      };
    }
  }
}

/**
 * Apply one review outcome to a card. Pure: the input card is not touched and
 * the same (card, grade, now, settings) always yields the same card.
 */
export function applyOutcome<T extends CardSchedule>(
  card: T,
  grade: Grade,
  now: Date,
  settings: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS
): T {
  const result = calculateSM2(grade, card, now, settings);
  const reviewedAt = now.toISOString();

  return {
    ...card,
    ease_factor: result.ease_factor,
    interval_days: result.interval_days,
    repetitions: result.repetitions,
    lapses: result.lapses,
    due_at: result.due_at.toISOString(),
    last_reviewed_at: reviewedAt,
    ...('updated_at' in card ? { updated_at: reviewedAt } : {}),
  };
}

/**
 * Get the grade name for display
 */
export function getGradeName(grade: Grade): string {
  const names: Record<Grade, string> = {
    again: 'Again',
    hard: 'Hard',
    good: 'Good',
    easy: 'Easy',
  };
  return names[grade];
}
