import { HTTP, JsonSerializer, TransportError } from '../core';
import type { Id, Response, WireFormat } from '../core';

/**
 * Minimal HTTP response: no version marker, the call id travels in the `X-JSONRPC-ID` header
 */
export interface HttpResponse {
  /** 200 for success, 500 for error */
  status: number;
  headers: Record<string, string>;
  /** JSON of the outcome member alone */
  body: string;
}

const HEADER_VALUE = /^[\t\x20-\x7e]*$/;
const json = new JsonSerializer();

function idToHeader(id: Id): string {
  const value = typeof id === 'string' ? id : String(id);
  if (!HEADER_VALUE.test(value)) {
    throw TransportError.invalidData('failed to parse id as http header', { id });
  }
  return value;
}

/**
 * Map a response to its minimal HTTP view, tagging the outcome the way `format` does
 *
 * @throws {TransportError} When the id cannot be carried in a header
 * @throws {SerializationError} When the outcome is not representable as JSON
 */
export function responseToHttp<TResult>(response: Response<TResult>, format: WireFormat): HttpResponse {
  const headers = {
    'Content-Type': HTTP.CONTENT_TYPE,
    [HTTP.ID_HEADER]: idToHeader(response.id),
  };
  const body = Buffer.from(json.encode(format.encodeOutcome(response.outcome))).toString('utf8');
  return {
    status: response.outcome.ok ? HTTP.STATUS_OK : HTTP.STATUS_INTERNAL_SERVER_ERROR,
    headers,
    body,
  };
}
