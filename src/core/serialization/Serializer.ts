/**
 * Byte codec turning structured values into bytes and back.
 *
 * Implementations must round-trip every envelope value losslessly. Failures are reported as
 * {@link SerializationError}; only their message is meaningful to the protocol layer.
 */
export interface Serializer {
  readonly name: string;
  readonly contentType: string;
  /**
   * @throws {SerializationError} When the value cannot be packed
   */
  encode(data: unknown): Uint8Array;
  /**
   * @throws {SerializationError} When the payload cannot be unpacked
   */
  decode(payload: Uint8Array): unknown;
}
