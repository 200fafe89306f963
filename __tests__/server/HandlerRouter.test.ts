import { describe, it, expect, vi } from 'vitest';
import { HandlerRouter } from '../../src/server';
import { RpcError } from '../../src/core';
import { createMockLogger } from '../helpers/logger';
import type { TestMethod, TestResult } from '../helpers/methods';

describe('HandlerRouter', () => {
  it('should call the handler registered for the tag with its params and source', () => {
    const hello = vi.fn((params: { name: string }, source: string) => `${params.name}@${source}`);
    const router = new HandlerRouter<TestMethod, TestResult>().on('hello', hello);

    expect(router.handle({ method: 'hello', params: { name: 'world' } }, 'local')).toBe('world@local');
    expect(hello).toHaveBeenCalledWith({ name: 'world' }, 'local');
  });

  it('should throw MethodNotFound for tags without handler', () => {
    const router = new HandlerRouter<TestMethod, TestResult>();

    expect(() => router.handle({ method: 'test', params: {} }, 'local')).toThrow(
      RpcError.methodNotFound('no handler registered for method `test`')
    );
  });

  it('should let handlers throw RpcError', () => {
    const router = new HandlerRouter<TestMethod, TestResult>().on('complicated', () => {
      throw RpcError.custom(-32000, 'Complicated method not implemented');
    });

    expect(() => router.handle({ method: 'complicated', params: {} }, 'local')).toThrow(
      'Complicated method not implemented (-32000)'
    );
  });

  it('should warn when overwriting a handler', () => {
    const logger = createMockLogger();
    const router = new HandlerRouter<TestMethod, TestResult>(logger)
      .on('test', () => ({ ok: true }))
      .on('test', () => ({ ok: false }));

    expect(logger.warn).toHaveBeenCalledWith('Overwriting existing handler for method: test');
    expect(logger.debug).toHaveBeenCalledWith('Handler registered for method: test');
    expect(router.size).toBe(1);
    expect(router.handle({ method: 'test', params: {} }, 'local')).toEqual({ ok: false });
  });

  it('should unregister handlers', () => {
    const logger = createMockLogger();
    const router = new HandlerRouter<TestMethod, TestResult>(logger).on('test', () => ({ ok: true }));

    router.off('test');
    router.off('hello');

    expect(router.size).toBe(0);
    expect(logger.debug).toHaveBeenCalledWith('Handler unregistered for method: test');
    expect(logger.warn).toHaveBeenCalledWith('No handler found for method: hello');
  });
});
