import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '@shared/errors';
import { DEFAULT_SCHEDULER_SETTINGS } from '@shared/scheduler';
import { DEFAULT_SESSION_OPTIONS, loadConfig } from '../config';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8787);
    expect(config.host).toBe('0.0.0.0');
    expect(config.logLevel).toBe('info');
    expect(config.scheduler).toEqual(DEFAULT_SCHEDULER_SETTINGS);
    expect(config.session).toEqual(DEFAULT_SESSION_OPTIONS);
  });

  it('reads overrides and treats empty values as unset', () => {
    const config = loadConfig({
      PORT: '3000',
      LOG_LEVEL: 'debug',
      SRS_MIN_EASE: '1.5',
      SRS_RELEARN_MINUTES: '10',
      SRS_CARDS_PER_SESSION: '5',
      SRS_EASY_BONUS: '',
    });

    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe('debug');
    expect(config.scheduler.min_ease).toBe(1.5);
    expect(config.scheduler.relearn_interval_minutes).toBe(10);
    expect(config.scheduler.easy_bonus).toBe(1.3);
    expect(config.session.cards_per_session).toBe(5);
  });

  it('names the variable that failed to parse', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(InvalidArgumentError);
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid PORT: /);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid LOG_LEVEL: /);
  });

  it('rejects inconsistent scheduler settings', () => {
    expect(() => loadConfig({ SRS_DEFAULT_EASE: '1.2' })).toThrow('default_ease must not be below min_ease');
  });
});
