/**
 * rpcwire - transport-agnostic JSON-RPC 2.0 message protocol
 *
 * Envelopes in a canonical (JSON-RPC 2.0) or compact encoding, pluggable byte codecs,
 * client-side response correlation and a server-side dispatcher that answers malformed input
 * whenever the caller can be identified.
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE - Errors, Envelopes, Codecs, Wire Formats, Configuration
// ============================================================================

export {
  RpcError,
  errorKindToCode,
  errorKindFromCode,
  isSameErrorKind,
  RpcWireError,
  SerializationError,
  EnvelopeError,
  CapacityError,
  ValidationError,
  TransportError,
  createRequest,
  createFireAndForget,
  requestFromParts,
  expectsResponse,
  okOutcome,
  errOutcome,
  unwrapOutcome,
  responseFromOutcome,
  responseFromInternalError,
  methodVariant,
  scalarIds,
  uint32Ids,
  growableStrings,
  fixedCapacityStrings,
  createProfile,
  fullProfile,
  constrainedProfile,
  JsonSerializer,
  MsgpackSerializer,
  CanonicalWireFormat,
  CompactWireFormat,
  createWireFormat,
  SilentLogger,
  ConsoleLogger,
  DEFAULT_CONFIG,
  modeFromEnv,
  resolveProtocolConfig,
  PROTOCOL,
  ERROR_CODES,
} from './core';

export type {
  RpcErrorKind,
  ReservedErrorKind,
  CustomErrorKind,
  Id,
  MethodCall,
  Request,
  Response,
  Outcome,
  MethodSchema,
  ResultSchema,
  IdPolicy,
  StringStorage,
  DeploymentProfile,
  Serializer,
  WireFormat,
  WireMode,
  WireObject,
  RecoveryProbe,
  Logger,
  LogLevel,
  ProtocolConfig,
} from './core';

// ============================================================================
// CLIENT - Call building and response correlation
// ============================================================================

export { RpcClient, PendingCall, nextCallId } from './client';
export type { RpcClientConfig } from './client';

// ============================================================================
// SERVER - Request dispatch
// ============================================================================

export { RpcServer, HandlerRouter, encodeResponseWithFallback } from './server';
export type { RpcServerConfig, RpcHandler, RpcHandlerFunction, MethodHandler, ParamsOf } from './server';

// ============================================================================
// TRANSPORT - Query-string and HTTP views
// ============================================================================

export { requestToQueryString, requestFromQueryString, responseToHttp } from './transport';
export type { HttpResponse } from './transport';
