/**
 * Tagged console logger.
 *
 * Every line carries a time, a level and the module tag, e.g.
 * `[10:00:00.123] [INFO ] [StudySession] Review started`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function formatLine(level: LogLevel, module: string, message: string): string {
  const timestamp = new Date().toISOString();
  const time = timestamp.split('T')[1]?.slice(0, 12) ?? timestamp;
  return `[${time}] [${level.toUpperCase().padEnd(5)}] [${module}] ${message}`;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string): Logger {
  const log = (level: LogLevel, message: string, data?: unknown) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }

    const line = formatLine(level, module, message);
    const args = data !== undefined ? [line, data] : [line];

    switch (level) {
      case 'debug':
      case 'info':
        console.log(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}
