/**
 * Unit tests for Logger configuration and error message formatting
 */

import { Logger, configureLoggerFromEnvironment } from '../../../../src/core/components/Logger';
import { formatError } from '../../../../src/core/constants/Errors';

describe('Logger', () => {
  const initial = Logger.getConfig();

  afterEach(() => {
    Logger.configure(initial);
    jest.restoreAllMocks();
  });

  describe('configureLoggerFromEnvironment', () => {
    beforeEach(() => {
      Logger.configure({ enabled: true, level: 'info' });
    });

    it('should switch to debug when ZIPSINK_DEBUG is true', () => {
      configureLoggerFromEnvironment({ ZIPSINK_DEBUG: 'true' });
      expect(Logger.getConfig()).toEqual({ enabled: true, level: 'debug' });
    });

    it('should disable output when ZIPSINK_DEBUG is false', () => {
      configureLoggerFromEnvironment({ ZIPSINK_DEBUG: 'false' });
      expect(Logger.getConfig().enabled).toBe(false);
    });

    it('should take a known ZIPSINK_LOG_LEVEL', () => {
      configureLoggerFromEnvironment({ ZIPSINK_LOG_LEVEL: 'warn' });
      expect(Logger.getConfig().level).toBe('warn');
    });

    it('should ignore an unknown ZIPSINK_LOG_LEVEL', () => {
      configureLoggerFromEnvironment({ ZIPSINK_LOG_LEVEL: 'verbose' });
      expect(Logger.getConfig().level).toBe('info');
    });

    it('should only report errors in production', () => {
      configureLoggerFromEnvironment({ ZIPSINK_LOG_LEVEL: 'debug', NODE_ENV: 'production' });
      expect(Logger.getConfig().level).toBe('error');
    });
  });

  describe('levels', () => {
    it('should drop messages below the configured level', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      Logger.configure({ enabled: true, level: 'warn' });

      Logger.debug('hidden');
      Logger.warn('shown');

      expect(log).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith('shown');
    });

    it('should drop everything when disabled', () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      Logger.configure({ enabled: true, level: 'debug' });
      Logger.disable();

      Logger.error('hidden');
      expect(error).not.toHaveBeenCalled();
    });
  });
});

describe('formatError', () => {
  it('should fill placeholders in order', () => {
    expect(formatError('%s of %s', 'a', 2)).toBe('a of 2');
  });

  it('should leave unfilled placeholders', () => {
    expect(formatError('Failed to write %s')).toBe('Failed to write %s');
  });
});
