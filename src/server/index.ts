export { RpcServer } from './rpc/RpcServer';
export type { RpcServerConfig, RpcHandler, RpcHandlerFunction } from './rpc/RpcServer';
export { HandlerRouter } from './rpc/HandlerRouter';
export type { MethodHandler, ParamsOf } from './rpc/HandlerRouter';
export { encodeResponseWithFallback } from './rpc/encodeResponse';
