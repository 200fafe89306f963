import { RpcError } from '../errors/RpcError';

/**
 * Call identifier, echoed unchanged by the callee.
 *
 * A decoded request with an explicit `null` identifier is treated as fire-and-forget.
 */
export type Id = string | number | null;

/**
 * One variant of an application's method union: the tag plus its structured parameters
 */
export interface MethodCall<TMethod extends string = string, TParams = unknown> {
  method: TMethod;
  params: TParams;
}

/**
 * Request envelope. `id` is absent for fire-and-forget calls.
 *
 * The version marker is not part of the semantic value: the wire format adds it on encode
 * and checks it on decode.
 */
export interface Request<TCall extends MethodCall = MethodCall> {
  id?: Id;
  method: TCall;
}

/**
 * Success/error union carried inside a response
 */
export type Outcome<TResult = unknown> =
  | { ok: true; result: TResult }
  | { ok: false; error: RpcError };

/**
 * Response envelope
 */
export interface Response<TResult = unknown> {
  id: Id;
  outcome: Outcome<TResult>;
}

/**
 * Build a request expecting a response
 */
export function createRequest<TCall extends MethodCall>(id: Id, method: TCall): Request<TCall> {
  return { id, method };
}

/**
 * Build a request without identifier; no response is ever produced for it
 */
export function createFireAndForget<TCall extends MethodCall>(method: TCall): Request<TCall> {
  return { method };
}

/**
 * Combine parts into a request, e.g. after third-party deserialization
 */
export function requestFromParts<TCall extends MethodCall>(
  id: Id | undefined,
  method: TCall
): Request<TCall> {
  return id === undefined ? createFireAndForget(method) : createRequest(id, method);
}

export function expectsResponse<TCall extends MethodCall>(
  request: Request<TCall>
): request is Request<TCall> & { id: Id } {
  return request.id !== undefined;
}

export function okOutcome<TResult>(result: TResult): Outcome<TResult> {
  return { ok: true, result };
}

export function errOutcome<TResult = never>(error: RpcError): Outcome<TResult> {
  return { ok: false, error };
}

/**
 * Return the result, or throw the carried RpcError
 */
export function unwrapOutcome<TResult>(outcome: Outcome<TResult>): TResult {
  if (outcome.ok) return outcome.result;
  throw outcome.error;
}

export function responseFromOutcome<TResult>(id: Id, outcome: Outcome<TResult>): Response<TResult> {
  return { id, outcome };
}

/**
 * Wrap `message` into an `InternalError` response
 */
export function responseFromInternalError<TResult = never>(
  id: Id,
  message: string
): Response<TResult> {
  return { id, outcome: errOutcome(RpcError.internal(message)) };
}
