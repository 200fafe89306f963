import { describe, it, expect } from 'vitest';
import { RpcError, TransportError, createWireFormat, errOutcome, okOutcome } from '../../src/core';
import { responseToHttp } from '../../src/transport';

describe('responseToHttp', () => {
  it('should carry a success with status 200 and the id header', () => {
    const http = responseToHttp({ id: 1, outcome: okOutcome('Hello, world') }, createWireFormat('canonical'));

    expect(http).toEqual({
      status: 200,
      headers: { 'Content-Type': 'application/json', 'X-JSONRPC-ID': '1' },
      body: '{"result":"Hello, world"}',
    });
  });

  it('should carry an error with status 500 using the format member names', () => {
    const http = responseToHttp(
      { id: 'abc', outcome: errOutcome(RpcError.custom(-32000, 'X')) },
      createWireFormat('compact')
    );

    expect(http.status).toBe(500);
    expect(http.headers['X-JSONRPC-ID']).toBe('abc');
    expect(http.body).toBe('{"e":{"code":-32000,"message":"X"}}');
  });

  it('should write a null id as text', () => {
    const http = responseToHttp({ id: null, outcome: okOutcome(true) }, createWireFormat('compact'));

    expect(http.headers['X-JSONRPC-ID']).toBe('null');
    expect(http.body).toBe('{"r":true}');
  });

  it('should reject ids that cannot be a header value', () => {
    expect(() =>
      responseToHttp({ id: 'a\nb', outcome: okOutcome(true) }, createWireFormat('canonical'))
    ).toThrow(TransportError.invalidData('failed to parse id as http header'));
  });
});
