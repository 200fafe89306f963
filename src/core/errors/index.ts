export {
  RpcError,
  errorKindToCode,
  errorKindFromCode,
  isSameErrorKind,
  isInt16,
} from './RpcError';
export type { RpcErrorKind, ReservedErrorKind, CustomErrorKind } from './RpcError';
export {
  RpcWireError,
  SerializationError,
  EnvelopeError,
  CapacityError,
  ValidationError,
  TransportError,
  errorMessage,
  asError,
} from '../types/Errors';
