import { z } from 'zod';
import { createFireAndForget, createRequest, resolveProtocolConfig } from '../../core';
import type {
  Logger,
  MethodCall,
  ProtocolConfig,
  Request,
  ResultSchema,
  Serializer,
  WireFormat,
} from '../../core';
import { PendingCall } from './PendingCall';

/**
 * RPC Client configuration
 */
export interface RpcClientConfig<TResult = unknown> extends ProtocolConfig {
  /** Validates decoded results; defaults to accepting any value */
  resultSchema?: ResultSchema<TResult>;
}

/**
 * Identifier following `id`; wraps to 0 after 2^32 - 1
 */
export function nextCallId(id: number): number {
  return (id + 1) >>> 0;
}

/**
 * RpcClient builds request payloads and correlates response payloads with them
 *
 * Call identifiers come from a counter starting at 0 and wrapping after 2^32 - 1. The client
 * performs no I/O: hand `payload` to a transport and feed the reply to `handleResponse`.
 *
 * @example
 * ```typescript
 * import { RpcClient } from 'rpcwire';
 *
 * const client = new RpcClient<MyMethod, string>({ mode: 'canonical', resultSchema: z.string() });
 *
 * const call = client.request({ method: 'hello', params: { name: 'world' } });
 * const reply = await transport.send(call.payload);
 * console.log(call.handleResponse(reply)); // Hello, world
 * ```
 */
export class RpcClient<TCall extends MethodCall = MethodCall, TResult = unknown> {
  private readonly format: WireFormat;
  private readonly serializer: Serializer;
  private readonly logger: Logger;
  private readonly results: ResultSchema<TResult>;
  private nextId = 0;

  /**
   * Create a new RPC client instance
   *
   * @param config - Wire mode, serializer, profile, result schema and logger
   * @throws {ValidationError} When the configuration is invalid
   */
  constructor(config: RpcClientConfig<TResult> = {}) {
    const resolved = resolveProtocolConfig(config);
    this.format = resolved.format;
    this.serializer = resolved.serializer;
    this.logger = resolved.logger;
    this.results = config.resultSchema ?? defaultResultSchema<TResult>();
  }

  /**
   * Identifier the next call expecting a response will get
   */
  peekNextId(): number {
    return this.nextId;
  }

  private allocateId(): number {
    const id = this.nextId;
    this.nextId = nextCallId(this.nextId);
    return id;
  }

  private encode(request: Request<TCall>): Uint8Array {
    return this.serializer.encode(this.format.encodeRequest(request));
  }

  /**
   * Build and encode a call expecting a response
   *
   * @throws {RpcWireError} When the request cannot be encoded
   */
  request(method: TCall): PendingCall<TResult> {
    const id = this.allocateId();
    const payload = this.encode(createRequest(id, method));
    this.logger.debug('RPC request built', { id, method: method.method });
    return new PendingCall(id, payload, this.context());
  }

  /**
   * Build and encode a call without identifier; no response will ever come for it
   *
   * @throws {RpcWireError} When the request cannot be encoded
   */
  requestFireAndForget(method: TCall): PendingCall<TResult> {
    const payload = this.encode(createFireAndForget(method));
    this.logger.debug('RPC fire-and-forget request built', { method: method.method });
    return new PendingCall(undefined, payload, this.context());
  }

  private context() {
    return {
      format: this.format,
      serializer: this.serializer,
      results: this.results,
      logger: this.logger,
    };
  }
}

function defaultResultSchema<TResult>(): ResultSchema<TResult> {
  return z.custom<TResult>(() => true);
}
