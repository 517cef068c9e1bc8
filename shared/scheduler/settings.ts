import { InvalidArgumentError } from '../errors';

/**
 * Tuning parameters for the SM-2 family scheduler.
 * These are product knobs, not structural constants.
 */
export interface SchedulerSettings {
  default_ease: number;          // ease for new cards
  min_ease: number;              // ease never drops below this
  again_ease_penalty: number;    // subtracted on "again"
  hard_ease_penalty: number;     // subtracted on "hard"
  easy_ease_bonus: number;       // added on "easy"
  hard_multiplier: number;       // interval multiplier on "hard"
  easy_bonus: number;            // extra interval multiplier on "easy"
  relearn_interval_minutes: number; // delay after a lapse, 0 = due immediately
}

export const DEFAULT_SCHEDULER_SETTINGS: SchedulerSettings = {
  default_ease: 2.5,
  min_ease: 1.3,
  again_ease_penalty: 0.2,
  hard_ease_penalty: 0.15,
  easy_ease_bonus: 0.15,
  hard_multiplier: 1.2,
  easy_bonus: 1.3,
  relearn_interval_minutes: 0,
};

/**
 * Merge overrides onto the defaults and reject combinations that would break
 * the ease floor or make intervals shrink to nothing.
 */
export function resolveSchedulerSettings(overrides: Partial<SchedulerSettings> = {}): SchedulerSettings {
  const d = DEFAULT_SCHEDULER_SETTINGS;
  const settings: SchedulerSettings = {
    default_ease: overrides.default_ease ?? d.default_ease,
    min_ease: overrides.min_ease ?? d.min_ease,
    again_ease_penalty: overrides.again_ease_penalty ?? d.again_ease_penalty,
    hard_ease_penalty: overrides.hard_ease_penalty ?? d.hard_ease_penalty,
    easy_ease_bonus: overrides.easy_ease_bonus ?? d.easy_ease_bonus,
    hard_multiplier: overrides.hard_multiplier ?? d.hard_multiplier,
    easy_bonus: overrides.easy_bonus ?? d.easy_bonus,
    relearn_interval_minutes: overrides.relearn_interval_minutes ?? d.relearn_interval_minutes,
  };

  for (const [key, value] of Object.entries(settings)) {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError(`Scheduler setting ${key} must be a finite number`);
    }
  }
  if (settings.min_ease <= 0) {
    throw new InvalidArgumentError('min_ease must be positive');
  }
  if (settings.default_ease < settings.min_ease) {
    throw new InvalidArgumentError('default_ease must not be below min_ease');
  }
  if (settings.hard_multiplier <= 0 || settings.easy_bonus <= 0) {
    throw new InvalidArgumentError('Interval multipliers must be positive');
  }
  if (
    settings.again_ease_penalty < 0 ||
    settings.hard_ease_penalty < 0 ||
    settings.easy_ease_bonus < 0 ||
    settings.relearn_interval_minutes < 0
  ) {
    throw new InvalidArgumentError('Ease adjustments and relearn interval must not be negative');
  }

  return settings;
}
