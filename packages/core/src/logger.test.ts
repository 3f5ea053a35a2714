/**
 * Tests for logger utilities
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  createLogger,
  createSilentLogger,
  defaultLogLevel,
  isLogLevel,
  LOG_LEVELS,
  shouldLog
} from './logger.js';

describe('LOG_LEVELS', () => {
  it('should be ordered from least to most verbose', () => {
    expect(LOG_LEVELS.silent).toBeLessThan(LOG_LEVELS.error);
    expect(LOG_LEVELS.error).toBeLessThan(LOG_LEVELS.warn);
    expect(LOG_LEVELS.warn).toBeLessThan(LOG_LEVELS.info);
    expect(LOG_LEVELS.info).toBeLessThan(LOG_LEVELS.debug);
    expect(LOG_LEVELS.debug).toBeLessThan(LOG_LEVELS.trace);
  });
});

describe('shouldLog', () => {
  it('should log warnings at warn level and above', () => {
    expect(shouldLog('silent', 'warn')).toBe(false);
    expect(shouldLog('error', 'warn')).toBe(false);
    expect(shouldLog('warn', 'warn')).toBe(true);
    expect(shouldLog('trace', 'warn')).toBe(true);
  });

  it('should log trace only at trace level', () => {
    expect(shouldLog('debug', 'trace')).toBe(false);
    expect(shouldLog('trace', 'trace')).toBe(true);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

describe('defaultLogLevel', () => {
  it('should read PROBEWIRE_LOG_LEVEL', () => {
    expect(defaultLogLevel({ PROBEWIRE_LOG_LEVEL: 'trace' })).toBe('trace');
  });

  it('should fall back to warn for missing or unknown values', () => {
    expect(defaultLogLevel({})).toBe('warn');
    expect(defaultLogLevel({ PROBEWIRE_LOG_LEVEL: 'loud' })).toBe('warn');
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should respect log level configuration', () => {
    const output = vi.fn();
    const logger = createLogger({ level: 'warn', output });

    logger.error('error message');
    logger.warn('warn message');
    logger.info('info message');
    logger.debug('debug message');

    expect(output).toHaveBeenCalledTimes(2);
  });

  it('should format messages in text mode', () => {
    const output = vi.fn();
    const logger = createLogger({ level: 'info', output, prefix: '[probe]' });

    logger.info({ token: 3 }, 'reply routed');

    expect(output).toHaveBeenCalledTimes(1);
    const line = String(output.mock.calls[0]?.[0]);
    expect(line).toMatch(/^\[[^\]]+\] \[INFO\] \[probe\] reply routed \{"token":3\}$/);
  });

  it('should format messages in JSON mode', () => {
    const output = vi.fn();
    const logger = createLogger({ level: 'info', output, json: true });

    logger.info({ key: 'value' }, 'message text');

    const parsed: unknown = JSON.parse(String(output.mock.calls[0]?.[0]));
    expect(parsed).toMatchObject({ level: 'info', msg: 'message text', data: { key: 'value' } });
    expect(parsed).not.toHaveProperty('prefix');
  });

  it('should create child loggers with combined prefix and the same level', () => {
    const output = vi.fn();
    const parent = createLogger({ level: 'debug', output, prefix: '[client]' });
    const child = parent.child('dispatcher');

    child.debug('hello');

    expect(child.level).toBe('debug');
    expect(String(output.mock.calls[0]?.[0])).toContain('[client][dispatcher] hello');
  });

  it('should render a bare data object as JSON text', () => {
    const output = vi.fn();
    const logger = createLogger({ level: 'info', output });

    logger.info({ code: 0, signal: null });

    expect(String(output.mock.calls[0]?.[0])).toMatch(
      /^\[[^\]]+\] \[INFO\] \{"code":0,"signal":null\}$/
    );
  });

  it('should carry the child scope as prefix in JSON mode', () => {
    const output = vi.fn();
    const logger = createLogger({ level: 'warn', output, json: true }).child('channel');

    logger.warn('stderr line');

    const parsed: unknown = JSON.parse(String(output.mock.calls[0]?.[0]));
    expect(parsed).toMatchObject({ level: 'warn', prefix: '[channel]', msg: 'stderr line' });
    expect(parsed).not.toHaveProperty('data');
  });

  it('should write to stderr by default', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger({ level: 'error' });

    logger.error('boom');

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toMatch(/\[ERROR\] boom\n$/);
  });
});

describe('createSilentLogger', () => {
  it('should create a silent logger', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createSilentLogger();

    logger.error('nothing');

    expect(logger.level).toBe('silent');
    expect(write).not.toHaveBeenCalled();
    write.mockRestore();
  });
});
