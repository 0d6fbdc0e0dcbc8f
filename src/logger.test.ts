import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  clearLogBuffer,
  createLogger,
  formatLogPrefix,
  getLogLevel,
  getRecentLogs,
  setLogLevel,
} from './logger';

beforeEach(() => {
  clearLogBuffer();
  setLogLevel('debug');
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('records entries with their module', () => {
    createLogger('app').info('Pet opened', { petId: 'pet-1' });
    const [entry] = getRecentLogs();
    expect(entry).toMatchObject({
      level: 'info',
      module: 'app',
      message: 'Pet opened',
      data: { petId: 'pet-1' },
    });
  });

  it('writes to the console method of the level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    createLogger('config').warn('Config write failed');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][1]).toBe('Config write failed');
  });
});

describe('setLogLevel', () => {
  it('suppresses entries below the level', () => {
    setLogLevel('warn');
    expect(getLogLevel()).toBe('warn');
    const log = createLogger('test');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown');
    expect(getRecentLogs().map((entry) => entry.level)).toEqual(['warn', 'error']);
  });
});

describe('getRecentLogs', () => {
  it('returns the newest entries', () => {
    const log = createLogger('test');
    for (let index = 0; index < 5; index++) {
      log.debug(`entry ${index}`);
    }
    expect(getRecentLogs(2).map((entry) => entry.message)).toEqual(['entry 3', 'entry 4']);
  });

  it('keeps at most two hundred entries', () => {
    const log = createLogger('test');
    for (let index = 0; index < 205; index++) {
      log.debug(`entry ${index}`);
    }
    const all = getRecentLogs(1000);
    expect(all).toHaveLength(200);
    expect(all[0].message).toBe('entry 5');
  });
});

describe('formatLogPrefix', () => {
  it('pads the level', () => {
    expect(
      formatLogPrefix({
        level: 'info',
        module: 'app',
        message: 'ignored',
        timestamp: '2026-01-01T00:00:00.000Z',
      }),
    ).toBe('[2026-01-01T00:00:00.000Z] [INFO ] [app]');
  });
});
