import { z } from 'zod';
import { EnvelopeError } from '../types/Errors';
import type { MethodCall } from '../types/Messages';

/**
 * Schema of an application's closed method union.
 *
 * Usually a `z.discriminatedUnion('method', [...])` of {@link methodVariant} entries.
 * Params schemas should be `.strict()` so that unknown parameters are rejected.
 */
export type MethodSchema<TCall extends MethodCall = MethodCall> = z.ZodType<TCall, z.ZodTypeDef, unknown>;

/**
 * Schema of the result values a client accepts
 */
export type ResultSchema<TResult = unknown> = z.ZodType<TResult, z.ZodTypeDef, unknown>;

/**
 * One variant of a method union: a literal tag with its params schema
 *
 * @example
 * ```typescript
 * const methods = z.discriminatedUnion('method', [
 *   methodVariant('test', z.object({}).strict()),
 *   methodVariant('hello', z.object({ name: z.string() }).strict()),
 * ]);
 * type MyMethod = z.output<typeof methods>;
 * ```
 */
export function methodVariant<TMethod extends string, TParams extends z.ZodTypeAny>(
  method: TMethod,
  params: TParams
) {
  return z.object({ method: z.literal(method), params }).strict();
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a tag/params pair against the method schema
 *
 * @throws {EnvelopeError} When the tag is unknown or the params are rejected
 */
export function parseMethodCall<TCall extends MethodCall>(
  schema: MethodSchema<TCall>,
  method: unknown,
  params: unknown
): TCall {
  const parsed = schema.safeParse({ method, params });
  if (!parsed.success) {
    throw EnvelopeError.method(formatIssues(parsed.error), { method });
  }
  return parsed.data;
}

/**
 * Validate a result value against the result schema
 *
 * @throws {EnvelopeError} When the value is rejected
 */
export function parseResult<TResult>(schema: ResultSchema<TResult>, value: unknown): TResult {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw EnvelopeError.result(formatIssues(parsed.error));
  }
  return parsed.data;
}
