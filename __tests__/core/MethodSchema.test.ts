import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { EnvelopeError, formatIssues, parseMethodCall, parseResult } from '../../src/core';
import { TestMethods, TestResultSchema } from '../helpers/methods';

describe('MethodSchema', () => {
  describe('parseMethodCall', () => {
    it('should return the typed variant', () => {
      const call = parseMethodCall(TestMethods, 'hello', { name: 'world' });

      expect(call).toEqual({ method: 'hello', params: { name: 'world' } });
      if (call.method === 'hello') {
        expect(call.params.name).toBe('world');
      }
    });

    it('should reject an unknown method tag', () => {
      expect(() => parseMethodCall(TestMethods, 'nope', {})).toThrow(EnvelopeError);
    });

    it('should reject missing and extra params', () => {
      expect(() => parseMethodCall(TestMethods, 'hello', undefined)).toThrow(EnvelopeError);
      expect(() => parseMethodCall(TestMethods, 'test', { abc: 123 })).toThrow(
        "params: Unrecognized key(s) in object: 'abc'"
      );
    });
  });

  describe('parseResult', () => {
    it('should accept every result variant', () => {
      expect(parseResult(TestResultSchema, { ok: true })).toEqual({ ok: true });
      expect(parseResult(TestResultSchema, 'Hello, world')).toBe('Hello, world');
    });

    it('should reject other values', () => {
      expect(() => parseResult(TestResultSchema, 42)).toThrow(EnvelopeError);
    });
  });

  describe('formatIssues', () => {
    it('should join issue paths and messages', () => {
      const parsed = z.object({ a: z.string(), b: z.number() }).safeParse({ a: 1, b: 'x' });

      expect(parsed.success).toBe(false);
      if (!parsed.success) {
        expect(formatIssues(parsed.error)).toBe(
          'a: Expected string, received number; b: Expected number, received string'
        );
      }
    });

    it('should name the root for top-level issues', () => {
      const parsed = z.string().safeParse(1);

      if (!parsed.success) {
        expect(formatIssues(parsed.error)).toBe('<root>: Expected string, received number');
      }
    });
  });
});
