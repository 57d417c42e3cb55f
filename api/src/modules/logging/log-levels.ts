/**
 * Log levels, ordered by severity. A message is written when its level is
 * at or above the logger's configured level.
 */
export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

export enum LogCategory {
  SCIM_VALIDATION = 'scim.validation',
  SCIM_PATCH = 'scim.patch',
  SCIM_DISCOVERY = 'scim.discovery',
}

export const DEFAULT_LOG_LEVEL = LogLevel.INFO;

/** Environment variable read when no level is configured on the module */
export const LOG_LEVEL_ENV = 'SCIM_LOG_LEVEL';

const LEVEL_NAMES: Record<string, LogLevel> = {
  trace: LogLevel.TRACE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  fatal: LogLevel.FATAL,
  off: LogLevel.OFF,
};

/** Parse a level name such as "debug" or "WARN"; unknown names yield undefined */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const key = value.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, key) ? LEVEL_NAMES[key] : undefined;
}

export function resolveLogLevel(configured: LogLevel | undefined, envValue: string | undefined): LogLevel {
  return configured ?? parseLogLevel(envValue) ?? DEFAULT_LOG_LEVEL;
}
