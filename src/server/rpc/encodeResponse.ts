import { SERVER_MESSAGES, asError, errorMessage, responseFromInternalError } from '../../core';
import type { Logger, Response, Serializer, WireFormat } from '../../core';

/**
 * Encode a response; when that fails, encode an `InternalError` carrying the encoder's message
 * instead. Returns `undefined` only when the substitute cannot be encoded either.
 */
export function encodeResponseWithFallback<TResult>(
  response: Response<TResult>,
  format: WireFormat,
  serializer: Serializer,
  logger: Logger
): Uint8Array | undefined {
  try {
    return serializer.encode(format.encodeResponse(response));
  } catch (error) {
    logger.error(SERVER_MESSAGES.FAILED_TO_SERIALIZE, asError(error), { id: response.id });
    try {
      const fallback = responseFromInternalError(response.id, errorMessage(error));
      return serializer.encode(format.encodeResponse(fallback));
    } catch (fallbackError) {
      // Nothing reaches the caller; the transport is left to time out.
      logger.error(SERVER_MESSAGES.FAILED_TO_SERIALIZE_FALLBACK, asError(fallbackError), {
        id: response.id,
      });
      return undefined;
    }
  }
}
