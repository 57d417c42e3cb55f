import { Inject, Injectable, Logger, Optional } from '@nestjs/common';

import { LOG_LEVEL_ENV, LogCategory, LogLevel, resolveLogLevel } from './log-levels';

export const SCIM_LOGGER_OPTIONS = 'SCIM_LOGGER_OPTIONS';

export interface ScimLoggerOptions {
  level?: LogLevel;
}

export type LogData = Record<string, unknown>;

/**
 * Category-tagged structured logger on top of the NestJS Logger.
 *
 *   [scim.patch] Patch validated {"resourceType":"User","opCount":2}
 */
@Injectable()
export class ScimLogger {
  private readonly logger = new Logger('SCIM');
  readonly level: LogLevel;

  constructor(@Optional() @Inject(SCIM_LOGGER_OPTIONS) options?: ScimLoggerOptions) {
    this.level = resolveLogLevel(options?.level, process.env[LOG_LEVEL_ENV]);
  }

  isEnabled(level: LogLevel): boolean {
    return this.level !== LogLevel.OFF && level >= this.level;
  }

  trace(category: LogCategory, message: string, data?: LogData): void {
    if (this.isEnabled(LogLevel.TRACE)) {
      this.logger.verbose(format(category, message, data));
    }
  }

  debug(category: LogCategory, message: string, data?: LogData): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      this.logger.debug(format(category, message, data));
    }
  }

  info(category: LogCategory, message: string, data?: LogData): void {
    if (this.isEnabled(LogLevel.INFO)) {
      this.logger.log(format(category, message, data));
    }
  }

  warn(category: LogCategory, message: string, data?: LogData): void {
    if (this.isEnabled(LogLevel.WARN)) {
      this.logger.warn(format(category, message, data));
    }
  }

  error(category: LogCategory, message: string, data?: LogData): void {
    if (this.isEnabled(LogLevel.ERROR)) {
      this.logger.error(format(category, message, data));
    }
  }

  fatal(category: LogCategory, message: string, data?: LogData): void {
    if (this.isEnabled(LogLevel.FATAL)) {
      this.logger.fatal(format(category, message, data));
    }
  }
}

function format(category: LogCategory, message: string, data?: LogData): string {
  if (!data || Object.keys(data).length === 0) {
    return `[${category}] ${message}`;
  }
  return `[${category}] ${message} ${stringify(data)}`;
}

function stringify(data: LogData): string {
  try {
    return JSON.stringify(data);
  } catch (err) {
    // circular structures, bigint
    return `<unserializable: ${err instanceof Error ? err.message : String(err)}>`;
  }
}
