/**
 * Base error class for all rpcwire errors
 */
export class RpcWireError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Byte codec errors. Only the display message is meaningful to the protocol layer.
 * - SerializationError.pack() - Value could not be turned into bytes
 * - SerializationError.unpack() - Bytes could not be turned into a value
 */
export class SerializationError extends RpcWireError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
  }

  static pack(message: string, details?: unknown): SerializationError {
    return new SerializationError(message, 'SERIALIZATION_ERROR:PACK', details);
  }

  static unpack(message: string, details?: unknown): SerializationError {
    return new SerializationError(message, 'SERIALIZATION_ERROR:UNPACK', details);
  }
}

/**
 * Envelope errors, raised when a decoded value does not have the shape of a request or response.
 * - EnvelopeError.malformed() - Wrong structure, unknown or duplicated fields
 * - EnvelopeError.version() - Version marker present but not the supported one
 * - EnvelopeError.method() - Method tag or params rejected by the method catalog
 * - EnvelopeError.result() - Result value rejected by the result schema
 */
export class EnvelopeError extends RpcWireError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
  }

  static malformed(message: string, details?: unknown): EnvelopeError {
    return new EnvelopeError(message, 'ENVELOPE_ERROR:MALFORMED', details);
  }

  static version(message: string, details?: unknown): EnvelopeError {
    return new EnvelopeError(message, 'ENVELOPE_ERROR:VERSION', details);
  }

  static method(message: string, details?: unknown): EnvelopeError {
    return new EnvelopeError(message, 'ENVELOPE_ERROR:METHOD', details);
  }

  static result(message: string, details?: unknown): EnvelopeError {
    return new EnvelopeError(message, 'ENVELOPE_ERROR:RESULT', details);
  }
}

/**
 * Raised when a string does not fit a fixed-capacity storage
 */
export class CapacityError extends RpcWireError {
  constructor(message: string, details?: unknown) {
    super(message, 'CAPACITY_ERROR', details);
  }
}

/**
 * Validation errors.
 * - ValidationError.invalidConfig() - Invalid configuration
 * - ValidationError.invalidErrorCode() - Error code outside the signed 16-bit range
 * - ValidationError.methodsRequired() - Method catalog is required
 * - ValidationError.handlerRequired() - Handler is required/missing
 */
export class ValidationError extends RpcWireError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
  }

  static invalidConfig(message: string, details?: unknown): ValidationError {
    return new ValidationError(message, 'VALIDATION_ERROR:INVALID_CONFIG', details);
  }

  static invalidErrorCode(message: string, details?: unknown): ValidationError {
    return new ValidationError(message, 'VALIDATION_ERROR:INVALID_ERROR_CODE', details);
  }

  static methodsRequired(message: string, details?: unknown): ValidationError {
    return new ValidationError(message, 'VALIDATION_ERROR:METHODS_REQUIRED', details);
  }

  static handlerRequired(message: string, details?: unknown): ValidationError {
    return new ValidationError(message, 'VALIDATION_ERROR:HANDLER_REQUIRED', details);
  }
}

/**
 * Transport adapter errors (query-string and HTTP views)
 * - TransportError.invalidData() - The envelope cannot be expressed in (or read from) the view
 */
export class TransportError extends RpcWireError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, details);
  }

  static invalidData(message: string, details?: unknown): TransportError {
    return new TransportError(`invalid data: ${message}`, 'TRANSPORT_ERROR:INVALID_DATA', details);
  }
}

/**
 * Extract a display message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Narrow anything thrown to an Error for logging, if it is one
 */
export function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
