import { createLogger } from './logger';

describe('createLogger', () => {
  const originalLevel = process.env['LOG_LEVEL'];

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env['LOG_LEVEL'];
    } else {
      process.env['LOG_LEVEL'] = originalLevel;
    }
    jest.restoreAllMocks();
  });

  it('should prefix messages at or above the configured level', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation();
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    const log = createLogger('[Test] ', 'info');

    log.debug('hidden');
    log.info('visible', 42);
    log.warn('careful');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('[Test] visible', 42);
    expect(warnSpy).toHaveBeenCalledWith('[Test] careful');
  });

  it('should print nothing when silent', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation();
    const log = createLogger('[Test] ', 'silent');

    log.error('boom');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should read the level from LOG_LEVEL when none is given', () => {
    process.env['LOG_LEVEL'] = 'debug';
    const logSpy = jest.spyOn(console, 'log').mockImplementation();
    const log = createLogger('[Env] ');

    log.debug('trace');

    expect(logSpy).toHaveBeenCalledWith('[Env] trace');
  });

  it('should be silent under the test environment when LOG_LEVEL is unset', () => {
    delete process.env['LOG_LEVEL'];
    const logSpy = jest.spyOn(console, 'log').mockImplementation();
    const log = createLogger('[Quiet] ');

    log.info('nothing');

    expect(logSpy).not.toHaveBeenCalled();
  });
});
