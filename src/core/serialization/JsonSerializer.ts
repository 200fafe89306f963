import { SerializationError, errorMessage } from '../types/Errors';
import type { Serializer } from './Serializer';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * JSON serializer implementation (UTF-8 text; invalid UTF-8 is rejected)
 */
export class JsonSerializer implements Serializer {
  readonly name = 'json';
  readonly contentType = 'application/json';

  encode(data: unknown): Uint8Array {
    let text: string | undefined;
    try {
      text = JSON.stringify(data);
    } catch (error) {
      throw SerializationError.pack(errorMessage(error));
    }
    if (text === undefined) {
      throw SerializationError.pack(`value of type ${typeof data} is not representable as JSON`);
    }
    return Buffer.from(text);
  }

  decode(payload: Uint8Array): unknown {
    let text: string;
    try {
      text = utf8.decode(payload);
    } catch (error) {
      throw SerializationError.unpack(errorMessage(error), { size: payload.byteLength });
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw SerializationError.unpack(errorMessage(error), {
        content: text.substring(0, 100),
      });
    }
  }
}
