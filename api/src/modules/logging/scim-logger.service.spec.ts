import { Logger } from '@nestjs/common';

import { LogCategory, LogLevel, parseLogLevel, resolveLogLevel } from './log-levels';
import { ScimLogger } from './scim-logger.service';

describe('log levels', () => {
  it('should parse level names in any case', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' WARN ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel('constructor')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });

  it('should prefer the configured level, then the environment, then info', () => {
    expect(resolveLogLevel(LogLevel.ERROR, 'debug')).toBe(LogLevel.ERROR);
    expect(resolveLogLevel(undefined, 'debug')).toBe(LogLevel.DEBUG);
    expect(resolveLogLevel(undefined, 'nonsense')).toBe(LogLevel.INFO);
    expect(resolveLogLevel(undefined, undefined)).toBe(LogLevel.INFO);
  });
});

describe('ScimLogger', () => {
  const originalEnv = process.env.SCIM_LOG_LEVEL;
  let log: jest.SpyInstance;
  let debug: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    debug = jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalEnv === undefined) {
      delete process.env.SCIM_LOG_LEVEL;
    } else {
      process.env.SCIM_LOG_LEVEL = originalEnv;
    }
  });

  it('should default to info', () => {
    delete process.env.SCIM_LOG_LEVEL;
    const logger = new ScimLogger();
    expect(logger.level).toBe(LogLevel.INFO);
    expect(logger.isEnabled(LogLevel.DEBUG)).toBe(false);
    expect(logger.isEnabled(LogLevel.WARN)).toBe(true);
  });

  it('should read SCIM_LOG_LEVEL when no level is configured', () => {
    process.env.SCIM_LOG_LEVEL = 'debug';
    expect(new ScimLogger().level).toBe(LogLevel.DEBUG);
    expect(new ScimLogger({ level: LogLevel.WARN }).level).toBe(LogLevel.WARN);
  });

  it('should write the category, message and data', () => {
    const logger = new ScimLogger({ level: LogLevel.INFO });
    logger.info(LogCategory.SCIM_PATCH, 'Patch validated', { resourceType: 'User', opCount: 2 });
    expect(log).toHaveBeenCalledWith('[scim.patch] Patch validated {"resourceType":"User","opCount":2}');
  });

  it('should omit empty data', () => {
    const logger = new ScimLogger({ level: LogLevel.INFO });
    logger.warn(LogCategory.SCIM_DISCOVERY, 'Nothing configured', {});
    expect(warn).toHaveBeenCalledWith('[scim.discovery] Nothing configured');
  });

  it('should drop messages below the level', () => {
    const logger = new ScimLogger({ level: LogLevel.INFO });
    logger.debug(LogCategory.SCIM_VALIDATION, 'Validate create');
    expect(debug).not.toHaveBeenCalled();
  });

  it('should write nothing when off', () => {
    const logger = new ScimLogger({ level: LogLevel.OFF });
    logger.warn(LogCategory.SCIM_VALIDATION, 'Request rejected');
    expect(logger.isEnabled(LogLevel.FATAL)).toBe(false);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should survive data that cannot be serialized', () => {
    const logger = new ScimLogger({ level: LogLevel.INFO });
    const data: Record<string, unknown> = { id: 1 };
    data.self = data;
    logger.info(LogCategory.SCIM_VALIDATION, 'Circular');
    logger.info(LogCategory.SCIM_VALIDATION, 'Circular', data);
    expect(log).toHaveBeenLastCalledWith(expect.stringMatching(/^\[scim\.validation\] Circular <unserializable: /));
  });
});
