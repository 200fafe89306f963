import { ERROR_CODES, LIMITS } from '../constants';
import { ValidationError } from '../types/Errors';

/**
 * The five error kinds reserved by JSON-RPC 2.0
 */
export type ReservedErrorKind =
  | 'ParseError'
  | 'InvalidRequest'
  | 'MethodNotFound'
  | 'InvalidParams'
  | 'InternalError';

/**
 * Application-defined error kind, carrying its own wire code
 */
export interface CustomErrorKind {
  readonly custom: number;
}

export type RpcErrorKind = ReservedErrorKind | CustomErrorKind;

const KIND_TO_CODE: Record<ReservedErrorKind, number> = {
  ParseError: ERROR_CODES.PARSE_ERROR,
  InvalidRequest: ERROR_CODES.INVALID_REQUEST,
  MethodNotFound: ERROR_CODES.METHOD_NOT_FOUND,
  InvalidParams: ERROR_CODES.INVALID_PARAMS,
  InternalError: ERROR_CODES.INTERNAL_ERROR,
};

const RESERVED_KINDS: readonly ReservedErrorKind[] = [
  'ParseError',
  'InvalidRequest',
  'MethodNotFound',
  'InvalidParams',
  'InternalError',
];

const CODE_TO_KIND = new Map<number, ReservedErrorKind>(
  RESERVED_KINDS.map((kind) => [KIND_TO_CODE[kind], kind])
);

export function isInt16(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= LIMITS.INT16_MIN &&
    value <= LIMITS.INT16_MAX
  );
}

/**
 * Map a kind to its signed 16-bit wire code
 */
export function errorKindToCode(kind: RpcErrorKind): number {
  return typeof kind === 'string' ? KIND_TO_CODE[kind] : kind.custom;
}

/**
 * Map a signed 16-bit wire code to its kind. Codes outside the reserved five become `Custom`.
 */
export function errorKindFromCode(code: number): RpcErrorKind {
  return CODE_TO_KIND.get(code) ?? { custom: code };
}

export function isSameErrorKind(a: RpcErrorKind, b: RpcErrorKind): boolean {
  return errorKindToCode(a) === errorKindToCode(b);
}

/**
 * RPC error as carried inside a response envelope
 *
 * `reason` is the optional human-readable message sent on the wire; `message` is the display
 * form, `"<reason> (<code>)"` or just `"<code>"`.
 *
 * @example
 * ```typescript
 * throw RpcError.custom(-32000, 'Complicated method not implemented');
 * ```
 */
export class RpcError extends Error {
  readonly kind: RpcErrorKind;
  readonly reason: string | undefined;

  constructor(kind: RpcErrorKind, reason?: string) {
    const code = errorKindToCode(kind);
    if (!isInt16(code)) {
      throw ValidationError.invalidErrorCode(`Error code ${code} is not a signed 16-bit integer`, {
        code,
      });
    }
    super(reason === undefined ? `${code}` : `${reason} (${code})`);
    this.name = 'RpcError';
    this.kind = typeof kind === 'string' ? kind : errorKindFromCode(code);
    this.reason = reason;
  }

  /** The signed 16-bit wire code */
  get code(): number {
    return errorKindToCode(this.kind);
  }

  is(kind: RpcErrorKind): boolean {
    return isSameErrorKind(this.kind, kind);
  }

  static parseError(reason?: string): RpcError {
    return new RpcError('ParseError', reason);
  }

  static invalidRequest(reason?: string): RpcError {
    return new RpcError('InvalidRequest', reason);
  }

  static methodNotFound(reason?: string): RpcError {
    return new RpcError('MethodNotFound', reason);
  }

  static invalidParams(reason?: string): RpcError {
    return new RpcError('InvalidParams', reason);
  }

  static internal(reason?: string): RpcError {
    return new RpcError('InternalError', reason);
  }

  static custom(code: number, reason?: string): RpcError {
    return new RpcError({ custom: code }, reason);
  }
}
