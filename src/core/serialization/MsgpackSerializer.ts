import { decode, encode } from '@msgpack/msgpack';
import { SerializationError, errorMessage } from '../types/Errors';
import type { Serializer } from './Serializer';

/**
 * MessagePack serializer implementation. Maps keep their field names; undefined fields are skipped.
 */
export class MsgpackSerializer implements Serializer {
  readonly name = 'msgpack';
  readonly contentType = 'application/msgpack';

  encode(data: unknown): Uint8Array {
    try {
      return encode(data, { ignoreUndefined: true });
    } catch (error) {
      throw SerializationError.pack(errorMessage(error));
    }
  }

  decode(payload: Uint8Array): unknown {
    try {
      return decode(payload);
    } catch (error) {
      throw SerializationError.unpack(errorMessage(error), { size: payload.byteLength });
    }
  }
}
