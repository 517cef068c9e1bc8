import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from '../logger';

describe('createLogger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
  });

  it('tags lines with level and module', () => {
    setLogLevel('debug');
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('Scheduler').info('Review started');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[INFO \] \[Scheduler\] Review started$/);
  });

  it('drops messages below the threshold', () => {
    setLogLevel('warn');
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const log = createLogger('Store');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown', { id: 1 });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[1]).toEqual({ id: 1 });
  });
});
