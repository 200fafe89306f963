import { describe, it, expect } from 'vitest';
import { JsonSerializer, MsgpackSerializer, SerializationError } from '../../src/core';
import { bytes, text } from '../helpers/payload';

describe('JsonSerializer', () => {
  const serializer = new JsonSerializer();

  it('should describe itself', () => {
    expect(serializer.name).toBe('json');
    expect(serializer.contentType).toBe('application/json');
  });

  it('should encode to UTF-8 JSON', () => {
    expect(text(serializer.encode({ i: 1, m: 'hello', p: { name: 'wörld' } }))).toBe(
      '{"i":1,"m":"hello","p":{"name":"wörld"}}'
    );
  });

  it('should decode UTF-8 JSON', () => {
    expect(serializer.decode(bytes('{"i":1,"r":[1,2]}'))).toEqual({ i: 1, r: [1, 2] });
  });

  it('should decode a view into a larger buffer', () => {
    const buffer = bytes('xx{"a":1}yy');
    const view = buffer.subarray(2, 9);

    expect(serializer.decode(view)).toEqual({ a: 1 });
  });

  it('should raise an unpack error for invalid UTF-8', () => {
    const payload = Uint8Array.from([...bytes('{"name":"'), 0xff, ...bytes('"}')]);

    expect(() => serializer.decode(payload)).toThrow(SerializationError);
  });

  it('should raise a pack error for values JSON cannot hold', () => {
    expect(() => serializer.encode(BigInt(1))).toThrow(SerializationError);
    expect(() => serializer.encode(undefined)).toThrow(
      'value of type undefined is not representable as JSON'
    );
  });

  it('should raise an unpack error with the start of the content', () => {
    try {
      serializer.decode(bytes('{not json'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SerializationError);
      if (error instanceof SerializationError) {
        expect(error.code).toBe('SERIALIZATION_ERROR:UNPACK');
        expect(error.details).toEqual({ content: '{not json' });
      }
    }
  });
});

describe('MsgpackSerializer', () => {
  const serializer = new MsgpackSerializer();

  it('should describe itself', () => {
    expect(serializer.name).toBe('msgpack');
    expect(serializer.contentType).toBe('application/msgpack');
  });

  it('should keep field names in maps', () => {
    const value = { jsonrpc: '2.0', id: 1, method: 'hello', params: { name: 'world' } };

    expect(serializer.decode(serializer.encode(value))).toEqual(value);
  });

  it('should produce a fixmap for small objects', () => {
    const encoded = serializer.encode({ i: 1 });

    expect(Array.from(encoded)).toEqual([0x81, 0xa1, 0x69, 0x01]);
  });

  it('should skip undefined fields', () => {
    expect(serializer.decode(serializer.encode({ a: 1, b: undefined }))).toEqual({ a: 1 });
  });

  it('should raise an unpack error for invalid bytes', () => {
    expect(() => serializer.decode(new Uint8Array([0xc1]))).toThrow(SerializationError);
  });
});
