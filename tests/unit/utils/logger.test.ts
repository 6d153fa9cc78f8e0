/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const consoleSpy = {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    // Reset singleton state
    logger.setLevel('info');
    logger.setVerbosity('default');
  });

  describe('log levels', () => {
    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(consoleSpy.log).toHaveBeenCalled();
    });

    it('should not log debug when level is info', () => {
      const log = new Logger();

      log.debug('test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should not log warn when level is error', () => {
      const log = new Logger();
      log.setLevel('error');

      log.warn('test message');

      expect(consoleSpy.warn).not.toHaveBeenCalled();
    });

    it('should not log anything when level is silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.debug('debug');
      log.info('info');
      log.warn('warn');
      log.error('error');
      log.success('done');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });
  });

  describe('data', () => {
    it('should log data object after a debug message', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test', { key: 'value' });

      expect(consoleSpy.log).toHaveBeenCalledTimes(2);
    });

    it('should log Error object with stack', () => {
      const log = new Logger();

      log.error('test', new Error('test error'));

      expect(consoleSpy.error).toHaveBeenCalledTimes(2);
    });
  });

  describe('status', () => {
    it('should print quiet and default messages at default verbosity', () => {
      const log = new Logger();

      log.status('quiet', 'essential');
      log.status('default', 'normal');
      log.status('verbose', 'chatty');

      expect(consoleSpy.log).toHaveBeenCalledTimes(2);
      expect(consoleSpy.log).toHaveBeenNthCalledWith(1, 'essential');
      expect(consoleSpy.log).toHaveBeenNthCalledWith(2, 'normal');
    });

    it('should print every message at verbose verbosity', () => {
      const log = new Logger();
      log.setVerbosity('verbose');

      log.status('verbose', 'chatty');

      expect(consoleSpy.log).toHaveBeenCalledWith('chatty');
    });

    it('should print only quiet messages at quiet verbosity', () => {
      const log = new Logger();
      log.setVerbosity('quiet');

      log.status('default', 'normal');
      log.status('quiet', 'essential');

      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
      expect(consoleSpy.log).toHaveBeenCalledWith('essential');
    });

    it('should print nothing when silent', () => {
      const log = new Logger();
      log.setVerbosity('silent');

      log.status('quiet', 'essential');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should not depend on the log level', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.status('default', 'normal');

      expect(consoleSpy.log).toHaveBeenCalledWith('normal');
      expect(log.getVerbosity()).toBe('default');
    });
  });
});
