import { RpcError, SilentLogger } from '../../core';
import type { Logger, MethodCall } from '../../core';
import type { RpcHandler } from './RpcServer';

/**
 * Params of the variant tagged `TMethod`
 */
export type ParamsOf<TCall extends MethodCall, TMethod extends TCall['method']> = Extract<
  TCall,
  { method: TMethod }
>['params'];

export type MethodHandler<TParams, TResult, TSource> = (params: TParams, source: TSource) => TResult;

function isVariant<TCall extends MethodCall, TMethod extends TCall['method']>(
  call: TCall,
  method: TMethod
): call is Extract<TCall, { method: TMethod }> {
  return call.method === method;
}

/**
 * RpcHandler built from one function per method tag
 *
 * @example
 * ```typescript
 * const router = new HandlerRouter<MyMethod, MyResult>()
 *   .on('test', () => ({ ok: true }))
 *   .on('hello', ({ name }) => `Hello, ${name}`);
 *
 * const server = new RpcServer({ methods: MyMethods, handler: router });
 * ```
 */
export class HandlerRouter<TCall extends MethodCall, TResult = unknown, TSource = string>
  implements RpcHandler<TCall, TResult, TSource>
{
  private handlers = new Map<string, (call: TCall, source: TSource) => TResult>();
  private logger: Logger;

  constructor(logger: Logger = new SilentLogger()) {
    this.logger = logger;
  }

  /**
   * Register the handler for one method tag
   */
  on<TMethod extends TCall['method']>(
    method: TMethod,
    handler: MethodHandler<ParamsOf<TCall, TMethod>, TResult, TSource>
  ): this {
    if (this.handlers.has(method)) {
      this.logger.warn(`Overwriting existing handler for method: ${method}`);
    }

    this.handlers.set(method, (call, source) => {
      if (!isVariant(call, method)) {
        throw RpcError.methodNotFound(`handler for \`${method}\` received \`${call.method}\``);
      }
      return handler(call.params, source);
    });
    this.logger.debug(`Handler registered for method: ${method}`);
    return this;
  }

  /**
   * Unregister the handler for one method tag
   */
  off(method: TCall['method']): this {
    if (this.handlers.delete(method)) {
      this.logger.debug(`Handler unregistered for method: ${method}`);
    } else {
      this.logger.warn(`No handler found for method: ${method}`);
    }
    return this;
  }

  /**
   * Number of registered handlers
   */
  get size(): number {
    return this.handlers.size;
  }

  handle(call: TCall, source: TSource): TResult {
    const handler = this.handlers.get(call.method);
    if (!handler) {
      throw RpcError.methodNotFound(`no handler registered for method \`${call.method}\``);
    }
    return handler(call, source);
  }
}
