/**
 * Console logger that prefixes every line with the component name, the way
 * the services have always logged (`[RunCoordinator] ...`).
 *
 * LOG_LEVEL = debug | info | warn | error | silent (default: info)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER;

function currentLevel(): number {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= currentLevel();

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    }
  };
}
