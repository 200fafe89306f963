import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SilentLogger, ConsoleLogger } from '../../src/core/types/Logger';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('SilentLogger', () => {
    it('should not output anything', () => {
      const logger = new SilentLogger();
      const spies = (['log', 'debug', 'info', 'warn', 'error'] as const).map((method) =>
        vi.spyOn(console, method).mockImplementation(() => {})
      );

      logger.debug('test');
      logger.info('test');
      logger.warn('test');
      logger.error('test', new Error('boom'));

      for (const spy of spies) {
        expect(spy).not.toHaveBeenCalled();
      }
    });
  });

  describe('ConsoleLogger', () => {
    beforeEach(() => {
      vi.clearAllMocks();
    });

    it('should log debug messages when minLevel is debug', () => {
      const logger = new ConsoleLogger('debug');
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});

      logger.debug('test message', { foo: 'bar' });

      expect(spy).toHaveBeenCalledWith('[DEBUG] rpcwire: test message {"foo":"bar"}');
    });

    it('should not log debug messages when minLevel is info', () => {
      const logger = new ConsoleLogger('info');
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});

      logger.debug('test message');

      expect(spy).not.toHaveBeenCalled();
    });

    it('should log info messages', () => {
      const logger = new ConsoleLogger('info');
      const spy = vi.spyOn(console, 'info').mockImplementation(() => {});

      logger.info('test message', { key: 'value' });

      expect(spy).toHaveBeenCalledWith('[INFO] rpcwire: test message {"key":"value"}');
    });

    it('should omit the scope when empty', () => {
      const logger = new ConsoleLogger('info', '');
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});

      logger.warn('test warning');

      expect(spy).toHaveBeenCalledWith('[WARN] test warning');
    });

    it('should log error messages with error object and stack', () => {
      const logger = new ConsoleLogger('error');
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const error = new Error('boom');

      logger.error('Failed to parse RPC request', error, { source: 'local' });

      expect(spy).toHaveBeenNthCalledWith(
        1,
        '[ERROR] rpcwire: Failed to parse RPC request - boom {"source":"local"}'
      );
      expect(spy).toHaveBeenNthCalledWith(2, error.stack);
    });

    it('should filter below the minimum level', () => {
      const logger = new ConsoleLogger('error');
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});

      logger.warn('ignored');

      expect(spy).not.toHaveBeenCalled();
    });
  });
});
