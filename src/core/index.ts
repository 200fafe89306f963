/**
 * Core protocol layer: constants, errors, envelopes, codecs, wire formats and configuration
 */

// Constants
export {
  PROTOCOL,
  ERROR_CODES,
  LIMITS,
  CLIENT_MESSAGES,
  SERVER_MESSAGES,
  WIRE_MODE,
  ENV,
  HTTP,
  QUERY_STRING,
} from './constants';

// Errors
export {
  RpcError,
  errorKindToCode,
  errorKindFromCode,
  isSameErrorKind,
  isInt16,
  RpcWireError,
  SerializationError,
  EnvelopeError,
  CapacityError,
  ValidationError,
  TransportError,
  errorMessage,
  asError,
} from './errors';
export type { RpcErrorKind, ReservedErrorKind, CustomErrorKind } from './errors';

// Messages
export {
  createRequest,
  createFireAndForget,
  requestFromParts,
  expectsResponse,
  okOutcome,
  errOutcome,
  unwrapOutcome,
  responseFromOutcome,
  responseFromInternalError,
} from './types/Messages';
export type { Id, MethodCall, Request, Response, Outcome } from './types/Messages';

// Methods
export { methodVariant, parseMethodCall, parseResult, formatIssues } from './methods/MethodSchema';
export type { MethodSchema, ResultSchema } from './methods/MethodSchema';

// Profiles
export {
  scalarIds,
  uint32Ids,
  growableStrings,
  fixedCapacityStrings,
  createProfile,
  fullProfile,
  constrainedProfile,
} from './profile/Profile';
export type { IdPolicy, StringStorage, DeploymentProfile } from './profile/Profile';

// Serialization
export { JsonSerializer, MsgpackSerializer } from './serialization';
export type { Serializer } from './serialization';

// Wire formats
export { CanonicalWireFormat, CompactWireFormat, createWireFormat } from './wire';
export { isRecord } from './wire/fields';
export type { WireFormat, WireMode, WireObject, RecoveryProbe } from './wire';

// Logging
export { SilentLogger, ConsoleLogger } from './types/Logger';
export type { Logger, LogLevel, LogContext } from './types/Logger';

// Configuration
export { DEFAULT_CONFIG, modeFromEnv, resolveProtocolConfig } from './config';
export type { ProtocolConfig, ResolvedProtocolConfig } from './config';
