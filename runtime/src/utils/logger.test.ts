import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createLogger, isLogLevel, silentLogger, type Logger } from './logger.js';

describe('Logger', () => {
  let consoleSpy: {
    debug: MockInstance<Parameters<Console['debug']>, ReturnType<Console['debug']>>;
    info: MockInstance<Parameters<Console['info']>, ReturnType<Console['info']>>;
    warn: MockInstance<Parameters<Console['warn']>, ReturnType<Console['warn']>>;
    error: MockInstance<Parameters<Console['error']>, ReturnType<Console['error']>>;
  };

  beforeEach(() => {
    consoleSpy = {
      debug: vi.spyOn(console, 'debug').mockImplementation(() => {}),
      info: vi.spyOn(console, 'info').mockImplementation(() => {}),
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createLogger', () => {
    it('defaults to info with the [cronmarket] prefix', () => {
      const logger = createLogger();

      logger.debug('hidden');
      logger.info('shown');

      expect(consoleSpy.debug).not.toHaveBeenCalled();
      expect(consoleSpy.info).toHaveBeenCalledWith(
        expect.stringContaining('[cronmarket] shown'),
      );
    });

    it('filters logs below the minimum level', () => {
      const logger = createLogger('warn');

      logger.debug('debug');
      logger.info('info');
      logger.warn('warn');
      logger.error('error');

      expect(consoleSpy.debug).not.toHaveBeenCalled();
      expect(consoleSpy.info).not.toHaveBeenCalled();
      expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });

    it('formats as: timestamp level prefix message', () => {
      const logger = createLogger('info', '[Test]');
      logger.info('hello');

      const [call] = consoleSpy.info.mock.calls[0];
      expect(call).toMatch(
        /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z INFO  \[Test\] hello$/,
      );
    });

    it('passes additional arguments through', () => {
      const logger = createLogger('debug');
      const extra = { jobId: 'job-1' };

      logger.error('msg', extra, 7);

      expect(consoleSpy.error).toHaveBeenCalledWith(expect.any(String), extra, 7);
    });
  });

  describe('setLevel', () => {
    it('changes filtering dynamically', () => {
      const logger = createLogger('error');

      logger.info('not yet');
      expect(consoleSpy.info).not.toHaveBeenCalled();

      logger.setLevel('info');
      logger.info('now');
      expect(consoleSpy.info).toHaveBeenCalledTimes(1);
    });
  });

  describe('child', () => {
    it('appends the scope inside the bracketed prefix', () => {
      const logger = createLogger('info').child('matching');
      logger.info('matched');

      expect(consoleSpy.info.mock.calls[0][0]).toContain('[cronmarket:matching] matched');
    });

    it('appends the scope to an unbracketed prefix', () => {
      const logger = createLogger('info', 'market').child('report');
      logger.warn('late');

      expect(consoleSpy.warn.mock.calls[0][0]).toContain(' market:report late');
    });

    it('shares the parent level', () => {
      const parent = createLogger('error');
      const child = parent.child('store');

      child.info('hidden');
      expect(consoleSpy.info).not.toHaveBeenCalled();

      parent.setLevel('debug');
      child.debug('visible');
      expect(consoleSpy.debug).toHaveBeenCalledTimes(1);
    });
  });

  describe('silentLogger', () => {
    it('never writes to the console', () => {
      silentLogger.debug('a');
      silentLogger.info('b');
      silentLogger.warn('c');
      silentLogger.error('d');
      silentLogger.child('x').error('e');

      expect(consoleSpy.debug).not.toHaveBeenCalled();
      expect(consoleSpy.info).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it('implements Logger', () => {
      const logger: Logger = silentLogger;
      expect(logger.child('any')).toBe(silentLogger);
    });
  });

  describe('isLogLevel', () => {
    it('accepts only the four levels', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('error')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
      expect(isLogLevel('toString')).toBe(false);
      expect(isLogLevel(1)).toBe(false);
    });
  });
});
