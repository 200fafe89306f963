export { RpcClient, nextCallId } from './rpc/RpcClient';
export type { RpcClientConfig } from './rpc/RpcClient';
export { PendingCall } from './rpc/PendingCall';
export type { PendingCallContext } from './rpc/PendingCall';
