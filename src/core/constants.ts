/**
 * Centralized constants for rpcwire
 *
 * This file contains all magic numbers and string constants used throughout the library.
 */

/**
 * Protocol-level constants
 */
export const PROTOCOL = {
  /**
   * Value of the version marker carried by canonical envelopes
   */
  JSONRPC_VERSION: '2.0',

  /**
   * Message used when a canonical envelope carries a foreign version marker
   */
  ERR_INVALID_PROTOCOL_VERSION: 'Invalid protocol version',
} as const;

/**
 * Reserved JSON-RPC 2.0 error codes
 */
export const ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

/**
 * Size limits and capacity constraints
 */
export const LIMITS = {
  /**
   * Smallest value of a signed 16-bit wire error code
   */
  INT16_MIN: -32768,

  /**
   * Largest value of a signed 16-bit wire error code
   */
  INT16_MAX: 32767,

  /**
   * Largest call identifier in the constrained profile (u32)
   */
  UINT32_MAX: 0xffff_ffff,

  /**
   * Capacity, in UTF-8 bytes, of fixed-capacity strings in the constrained profile
   */
  FIXED_STRING_CAPACITY: 128,
} as const;

/**
 * Client-side error messages
 */
export const CLIENT_MESSAGES = {
  NO_IDENTIFIER: 'request has no identifier',
  ID_MISMATCH: 'response id does not match request id',
} as const;

/**
 * Server-side log messages
 */
export const SERVER_MESSAGES = {
  FAILED_TO_PARSE: 'Failed to parse RPC request',
  FAILED_TO_SERIALIZE: 'Failed to serialize response',
  FAILED_TO_SERIALIZE_FALLBACK: 'Failed to serialize fallback error response',
} as const;

/**
 * Wire encoding mode constants
 */
export const WIRE_MODE = {
  CANONICAL: 'canonical',
  COMPACT: 'compact',
} as const;

/**
 * Environment variable consulted for the default wire mode
 */
export const ENV = {
  WIRE_MODE: 'RPCWIRE_MODE',
} as const;

/**
 * Minimal HTTP response view constants
 */
export const HTTP = {
  STATUS_OK: 200,
  STATUS_INTERNAL_SERVER_ERROR: 500,
  CONTENT_TYPE: 'application/json',
  ID_HEADER: 'X-JSONRPC-ID',
} as const;

/**
 * Query-string view keys
 */
export const QUERY_STRING = {
  ID_KEY: 'i',
  METHOD_KEY: 'm',
} as const;
