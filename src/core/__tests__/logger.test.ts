import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Logger, isLogLevel } from '../logger.js';

describe('Logger', () => {
  let errorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('writes tagged lines to stderr', () => {
    const log = new Logger('info');
    log.info('Browser launched');
    log.warn('Slow site');

    expect(errorSpy.mock.calls).toEqual([['[INFO] Browser launched'], ['[WARN] Slow site']]);
  });

  it('drops messages below the level', () => {
    const log = new Logger('warn');
    log.info('hidden');
    log.debug('hidden');
    log.error('shown');

    expect(errorSpy.mock.calls).toEqual([['[ERROR] shown']]);
  });

  it('prints nothing when silent', () => {
    const log = new Logger('silent');
    log.error('hidden');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('scopes child loggers and follows the parent level', () => {
    const log = new Logger('info');
    const child = log.child('renderer');

    child.debug('hidden');
    log.setLevel('debug');
    child.debug('Context closed');

    expect(errorSpy.mock.calls).toEqual([['[DEBUG] [renderer] Context closed']]);
    expect(log.getLevel()).toBe('debug');
  });

  it('recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
