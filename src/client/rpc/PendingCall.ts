import {
  CLIENT_MESSAGES,
  RpcError,
  errorMessage,
  unwrapOutcome,
} from '../../core';
import type {
  Logger,
  Outcome,
  Response,
  ResultSchema,
  Serializer,
  WireFormat,
} from '../../core';

/**
 * Settings a pending call borrows from the client that issued it
 */
export interface PendingCallContext<TResult> {
  format: WireFormat;
  serializer: Serializer;
  results: ResultSchema<TResult>;
  logger: Logger;
}

/**
 * One issued call: its encoded payload and the means to resolve its response
 *
 * The call holds no timer and registers nowhere; timeouts and retries belong to the transport.
 */
export class PendingCall<TResult = unknown> {
  private content: Uint8Array;

  constructor(
    readonly id: number | undefined,
    payload: Uint8Array,
    private readonly context: PendingCallContext<TResult>
  ) {
    this.content = payload;
  }

  /**
   * Encoded request, ready to hand to a transport
   */
  get payload(): Uint8Array {
    return this.content;
  }

  /**
   * Take ownership of the encoded request; the call keeps an empty payload afterwards
   */
  takePayload(): Uint8Array {
    const content = this.content;
    this.content = new Uint8Array(0);
    return content;
  }

  /**
   * Whether a response is expected for this call
   */
  expectsResponse(): boolean {
    return this.id !== undefined;
  }

  /**
   * Resolve a response payload into an outcome, never throwing
   */
  tryHandleResponse(payload: Uint8Array): Outcome<TResult> {
    if (this.id === undefined) {
      return { ok: false, error: RpcError.invalidRequest(CLIENT_MESSAGES.NO_IDENTIFIER) };
    }

    let response: Response<TResult>;
    try {
      const raw = this.context.serializer.decode(payload);
      response = this.context.format.decodeResponse(raw, this.context.results);
    } catch (error) {
      this.context.logger.debug('Failed to decode response', {
        id: this.id,
        error: errorMessage(error),
      });
      return { ok: false, error: RpcError.parseError(errorMessage(error)) };
    }

    if (response.id !== this.id) {
      this.context.logger.warn('Received response for another call', {
        id: this.id,
        responseId: response.id,
      });
      return { ok: false, error: RpcError.invalidRequest(CLIENT_MESSAGES.ID_MISMATCH) };
    }

    return response.outcome;
  }

  /**
   * Resolve a response payload into the call's result
   *
   * @throws {RpcError} `ParseError` when the payload cannot be decoded, `InvalidRequest` for a
   * fire-and-forget call or a foreign response id, or the error the server answered with
   */
  handleResponse(payload: Uint8Array): TResult {
    return unwrapOutcome(this.tryHandleResponse(payload));
  }
}
