import {
  RpcError,
  SERVER_MESSAGES,
  ValidationError,
  asError,
  errOutcome,
  errorMessage,
  okOutcome,
  resolveProtocolConfig,
  responseFromOutcome,
} from '../../core';
import type {
  Logger,
  MethodCall,
  MethodSchema,
  Outcome,
  ProtocolConfig,
  RecoveryProbe,
  Request,
  Response,
  Serializer,
  WireFormat,
} from '../../core';
import { encodeResponseWithFallback } from './encodeResponse';

/**
 * Handler capability invoked for every decoded call.
 *
 * Return the result, or throw an {@link RpcError} to answer with that error. Any other thrown
 * value is answered as `InternalError`. Handlers run synchronously.
 */
export interface RpcHandler<TCall extends MethodCall = MethodCall, TResult = unknown, TSource = string> {
  handle(call: TCall, source: TSource): TResult;
}

export type RpcHandlerFunction<TCall extends MethodCall = MethodCall, TResult = unknown, TSource = string> = (
  call: TCall,
  source: TSource
) => TResult;

/**
 * RPC Server configuration
 */
export interface RpcServerConfig<TCall extends MethodCall = MethodCall, TResult = unknown, TSource = string>
  extends ProtocolConfig {
  /** Closed method union accepted by this server */
  methods: MethodSchema<TCall>;
  handler: RpcHandler<TCall, TResult, TSource> | RpcHandlerFunction<TCall, TResult, TSource>;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * RpcServer decodes request payloads, dispatches them to the handler and encodes the answer
 *
 * Every call is independent: the server keeps no state between payloads and performs no I/O.
 * Payloads without a recoverable identifier, and fire-and-forget calls, produce no output.
 *
 * @example
 * ```typescript
 * import { RpcServer } from 'rpcwire';
 *
 * const server = new RpcServer({
 *   mode: 'canonical',
 *   methods: MyMethods,
 *   handler: (call, source) => {
 *     switch (call.method) {
 *       case 'hello':
 *         return `Hello, ${call.params.name}`;
 *       case 'complicated':
 *         throw RpcError.custom(-32000, 'Complicated method not implemented');
 *     }
 *   },
 * });
 *
 * const reply = server.handlePayload(payload, '10.0.0.7:4100');
 * if (reply) socket.write(reply);
 * ```
 */
export class RpcServer<TCall extends MethodCall = MethodCall, TResult = unknown, TSource = string> {
  private readonly methods: MethodSchema<TCall>;
  private readonly handler: RpcHandler<TCall, TResult, TSource>;
  private readonly format: WireFormat;
  private readonly serializer: Serializer;
  private readonly logger: Logger;

  /**
   * Create a new RPC server instance
   *
   * @param config - Method schema, handler, wire mode, serializer, profile and logger
   * @throws {ValidationError} When the configuration is invalid
   */
  constructor(config: RpcServerConfig<TCall, TResult, TSource>) {
    if (!config.methods) {
      throw ValidationError.methodsRequired('A method schema is required');
    }
    if (!config.handler) {
      throw ValidationError.handlerRequired('A handler is required');
    }

    const resolved = resolveProtocolConfig(config);
    this.methods = config.methods;
    this.handler =
      typeof config.handler === 'function' ? { handle: config.handler } : config.handler;
    this.format = resolved.format;
    this.serializer = resolved.serializer;
    this.logger = resolved.logger;
  }

  /**
   * Dispatch an already decoded request
   *
   * @returns The response, or `undefined` for a fire-and-forget request
   */
  handleRequest(request: Request<TCall>, source: TSource): Response<TResult> | undefined {
    const outcome = this.invoke(request.method, source);

    if (request.id === undefined) {
      this.logger.debug('Fire-and-forget request handled', {
        method: request.method.method,
        source: String(source),
        ok: outcome.ok,
      });
      return undefined;
    }

    return responseFromOutcome(request.id, outcome);
  }

  /**
   * Decode a request payload, dispatch it and encode the response
   *
   * @returns Response bytes, or `undefined` when nothing must be sent back
   */
  handlePayload(payload: Uint8Array, source: TSource): Uint8Array | undefined {
    let raw: unknown;
    try {
      raw = this.serializer.decode(payload);
    } catch (error) {
      this.logger.error(SERVER_MESSAGES.FAILED_TO_PARSE, asError(error), { source: String(source) });
      return undefined;
    }

    let request: Request<TCall>;
    try {
      request = this.format.decodeRequest(raw, this.methods);
    } catch (error) {
      this.logger.error(SERVER_MESSAGES.FAILED_TO_PARSE, asError(error), { source: String(source) });
      return this.recover(raw, errorMessage(error));
    }

    const response = this.handleRequest(request, source);
    if (response === undefined) {
      return undefined;
    }
    return this.encode(response);
  }

  /**
   * Answer a payload that is not a valid request, if it carries an identifier
   */
  private recover(raw: unknown, decodeMessage: string): Uint8Array | undefined {
    let probe: RecoveryProbe;
    try {
      probe = this.format.probe(raw);
    } catch (error) {
      this.logger.debug('Request is not identifiable, dropping', { error: errorMessage(error) });
      return undefined;
    }

    if (probe.id === undefined) {
      this.logger.debug('Malformed request carries no identifier, dropping');
      return undefined;
    }

    const error = this.format.recoveryError(probe, decodeMessage);
    return this.encode(responseFromOutcome<TResult>(probe.id, errOutcome(error)));
  }

  private invoke(call: TCall, source: TSource): Outcome<TResult> {
    let result: TResult;
    try {
      result = this.handler.handle(call, source);
    } catch (error) {
      if (error instanceof RpcError) {
        return errOutcome(error);
      }
      this.logger.error('Handler failed', asError(error), {
        method: call.method,
        source: String(source),
      });
      return errOutcome(RpcError.internal(errorMessage(error)));
    }

    if (isPromiseLike(result)) {
      this.logger.error('Handler returned a promise', undefined, { method: call.method });
      return errOutcome(RpcError.internal('handler must return synchronously'));
    }
    return okOutcome(result);
  }

  private encode(response: Response<TResult>): Uint8Array | undefined {
    return encodeResponseWithFallback(response, this.format, this.serializer, this.logger);
  }
}
