import { z } from 'zod';
import { RpcError, methodVariant } from '../../src/core';

export const TestMethods = z.discriminatedUnion('method', [
  methodVariant('test', z.object({}).strict()),
  methodVariant('hello', z.object({ name: z.string() }).strict()),
  methodVariant('list', z.object({ i: z.string() }).strict()),
  methodVariant('complicated', z.object({}).strict()),
]);

export type TestMethod = z.output<typeof TestMethods>;

export const TestResultSchema = z.union([z.object({ ok: z.boolean() }).strict(), z.string()]);

export type TestResult = z.output<typeof TestResultSchema>;

export const testHandler = (call: TestMethod, _source: string): TestResult => {
  switch (call.method) {
    case 'test':
      return { ok: true };
    case 'hello':
      return `Hello, ${call.params.name}`;
    case 'list':
      return `List, ${call.params.i}`;
    case 'complicated':
      throw RpcError.custom(-32000, 'Complicated method not implemented');
  }
};
