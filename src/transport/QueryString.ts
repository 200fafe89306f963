import {
  QUERY_STRING,
  TransportError,
  createFireAndForget,
  createRequest,
  errorMessage,
  isRecord,
  parseMethodCall,
  scalarIds,
} from '../core';
import type { Id, MethodCall, MethodSchema, Request } from '../core';

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function scalarToString(field: string, value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean' || typeof value === 'string') return String(value);
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  throw TransportError.invalidData(`unsupported value type for field '${field}'`, { field });
}

/**
 * Infer a scalar from its text: booleans and null, then integers, then floats, else the string.
 * Integers beyond 2^53 lose precision.
 */
export function inferScalar(text: string): unknown {
  if (text === 'true') return true;
  if (text === 'false') return false;
  if (text === 'null') return null;
  if (INTEGER.test(text) || FLOAT.test(text)) {
    const value = Number(text);
    if (Number.isFinite(value)) return value;
  }
  return text;
}

/**
 * Represent a request as `i=<id>&m=<method>&<param>=<value>&...`
 *
 * The identifier (JSON-encoded) comes first when present, the method tag second. Parameter values
 * must be scalars.
 *
 * @throws {TransportError} When params are not an object or hold a nested value
 */
export function requestToQueryString<TCall extends MethodCall>(request: Request<TCall>): string {
  const pairs = new URLSearchParams();
  if (request.id !== undefined) {
    pairs.append(QUERY_STRING.ID_KEY, JSON.stringify(request.id));
  }
  pairs.append(QUERY_STRING.METHOD_KEY, request.method.method);

  const params = request.method.params;
  if (params !== undefined) {
    if (!isRecord(params)) {
      throw TransportError.invalidData('params must be object');
    }
    for (const [name, value] of Object.entries(params)) {
      if (value === undefined) continue;
      pairs.append(name, scalarToString(name, value));
    }
  }
  return pairs.toString();
}

function parseId(text: string): Id {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw TransportError.invalidData(`invalid id: ${errorMessage(error)}`, { id: text });
  }
  try {
    return scalarIds().accept(value);
  } catch (error) {
    throw TransportError.invalidData(errorMessage(error), { id: text });
  }
}

/**
 * Read a request from its query-string representation
 *
 * `i` is the identifier only as the first pair; the first `m` is the method tag; every other pair
 * is a parameter whose type is inferred from its text.
 *
 * @throws {TransportError} When the method is missing, the id is not JSON or the schema rejects the call
 */
export function requestFromQueryString<TCall extends MethodCall>(
  query: string,
  methods: MethodSchema<TCall>
): Request<TCall> {
  let id: Id | undefined;
  let method: string | undefined;
  const params = new Map<string, unknown>();

  let index = 0;
  for (const [name, value] of new URLSearchParams(query)) {
    if (name === QUERY_STRING.ID_KEY && index === 0) {
      id = parseId(value);
    } else if (name === QUERY_STRING.METHOD_KEY && method === undefined) {
      method = value;
    } else {
      params.set(name, inferScalar(value));
    }
    index++;
  }

  if (method === undefined) {
    throw TransportError.invalidData('the method is missing');
  }

  let call: TCall;
  try {
    call = parseMethodCall(methods, method, Object.fromEntries(params));
  } catch (error) {
    throw TransportError.invalidData(errorMessage(error), { method });
  }
  return id === undefined ? createFireAndForget(call) : createRequest(id, call);
}
