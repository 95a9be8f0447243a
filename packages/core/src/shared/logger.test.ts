import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel, type LogLevel } from './logger.js';

describe('logger', () => {
  let previous: LogLevel;

  beforeEach(() => {
    previous = getLogLevel();
  });

  afterEach(() => {
    setLogLevel(previous);
    vi.restoreAllMocks();
  });

  it('should write prefixed lines to stderr only', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('debug');

    createLogger('transcript').info('reconciled', 3);

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    const [prefix, ...rest] = stderr.mock.calls[0];
    expect(prefix).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO \] \[transcript\]$/);
    expect(rest).toEqual(['reconciled', 3]);
  });

  it('should drop lines below the current level', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');

    const log = createLogger('engine');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0][1]).toBe('shown');
  });
});

describe('isLogLevel', () => {
  it('should accept only known levels', () => {
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
