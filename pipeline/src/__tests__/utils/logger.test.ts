// Test file for logger utility
import { Logger, loaderLogger, parseLogLevel, pipelineLogger } from '../../utils/logger';

describe('Logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('logger instances', () => {
    it('should have all required methods', () => {
      expect(typeof loaderLogger.info).toBe('function');
      expect(typeof loaderLogger.error).toBe('function');
      expect(typeof pipelineLogger.warn).toBe('function');
      expect(typeof pipelineLogger.debug).toBe('function');
    });

    it('should not throw when calling each level', () => {
      expect(() => pipelineLogger.info('Test message')).not.toThrow();
      expect(() => pipelineLogger.error('Test error', {}, new Error('boom'))).not.toThrow();
      expect(() => pipelineLogger.warn('Test warning')).not.toThrow();
      expect(() => pipelineLogger.debug('Test debug')).not.toThrow();
    });
  });

  describe('Logger class', () => {
    it('should write structured JSON entries to the matching console method', () => {
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const logger = new Logger('loader', 'INFO');

      logger.info('Extract category loaded', { category: 'stream' });

      expect(logSpy).toHaveBeenCalledTimes(1);
      const entry = JSON.parse(String(logSpy.mock.calls[0][0]));
      expect(entry).toMatchObject({
        level: 'INFO',
        message: 'Extract category loaded',
        service: 'loader',
        data: { category: 'stream' },
      });
      expect(typeof entry.timestamp).toBe('string');
    });

    it('should skip entries below the configured level', () => {
      const debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const logger = new Logger('pipeline', 'WARN');

      logger.debug('hidden');
      logger.info('hidden');

      expect(debugSpy).not.toHaveBeenCalled();
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should include error details on error entries', () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = new Logger('pipeline', 'ERROR');

      logger.error('Load failed', { category: 'snapshot' }, new Error('bad cell'));

      const entry = JSON.parse(String(errorSpy.mock.calls[0][0]));
      expect(entry.error).toMatchObject({ name: 'Error', message: 'bad cell' });
      expect(entry.data).toEqual({ category: 'snapshot' });
    });

    it('should warn about identity violations with a sample of ids', () => {
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const logger = new Logger('pipeline', 'INFO');

      logger.identityViolations(0, []);
      expect(warnSpy).not.toHaveBeenCalled();

      logger.identityViolations(2, ['C1', 'C2']);
      const entry = JSON.parse(String(warnSpy.mock.calls[0][0]));
      expect(entry.level).toBe('WARN');
      expect(entry.data).toEqual({ violations: 2, sample: ['C1', 'C2'] });
    });
  });

  describe('parseLogLevel', () => {
    it('should accept level names in any casing', () => {
      expect(parseLogLevel('warn')).toBe('WARN');
      expect(parseLogLevel('DEBUG')).toBe('DEBUG');
      expect(parseLogLevel(' info ')).toBe('INFO');
    });

    it('should reject unknown levels', () => {
      expect(parseLogLevel('verbose')).toBeNull();
    });
  });
});
