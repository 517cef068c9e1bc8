import { z } from 'zod';
import { InvalidArgumentError } from '@shared/errors';
import { resolveSchedulerSettings, type SchedulerSettings } from '@shared/scheduler';
import type { LogLevel } from './logger';

export interface SessionOptions {
  cards_per_session: number;   // queue cap per review session
  store_timeout_ms: number;    // 0 disables the timeout
}

export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
  cards_per_session: 20,
  store_timeout_ms: 5000,
};

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  scheduler: SchedulerSettings;
  session: SessionOptions;
}

const optionalNumber = z.coerce.number().finite().optional();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SRS_DEFAULT_EASE: optionalNumber,
  SRS_MIN_EASE: optionalNumber,
  SRS_AGAIN_EASE_PENALTY: optionalNumber,
  SRS_HARD_EASE_PENALTY: optionalNumber,
  SRS_EASY_EASE_BONUS: optionalNumber,
  SRS_HARD_MULTIPLIER: optionalNumber,
  SRS_EASY_BONUS: optionalNumber,
  SRS_RELEARN_MINUTES: optionalNumber,
  SRS_CARDS_PER_SESSION: z.coerce.number().int().min(1).max(10000).default(DEFAULT_SESSION_OPTIONS.cards_per_session),
  SRS_STORE_TIMEOUT_MS: z.coerce.number().int().min(0).default(DEFAULT_SESSION_OPTIONS.store_timeout_ms),
});

type EnvInput = Record<string, string | undefined>;

// Empty strings are treated as unset so `FOO=` in a .env file falls back to the default
function dropEmpty(env: EnvInput): EnvInput {
  const cleaned: EnvInput = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Build the application config from environment variables.
 */
export function loadConfig(env: EnvInput = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new InvalidArgumentError(`Invalid ${variable}: ${issue?.message ?? 'unknown error'}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    scheduler: resolveSchedulerSettings({
      default_ease: e.SRS_DEFAULT_EASE,
      min_ease: e.SRS_MIN_EASE,
      again_ease_penalty: e.SRS_AGAIN_EASE_PENALTY,
      hard_ease_penalty: e.SRS_HARD_EASE_PENALTY,
      easy_ease_bonus: e.SRS_EASY_EASE_BONUS,
      hard_multiplier: e.SRS_HARD_MULTIPLIER,
      easy_bonus: e.SRS_EASY_BONUS,
      relearn_interval_minutes: e.SRS_RELEARN_MINUTES,
    }),
    session: {
      cards_per_session: e.SRS_CARDS_PER_SESSION,
      store_timeout_ms: e.SRS_STORE_TIMEOUT_MS,
    },
  };
}
