import type { RpcError } from '../errors/RpcError';
import type { MethodSchema, ResultSchema } from '../methods/MethodSchema';
import type { DeploymentProfile } from '../profile/Profile';
import type { Id, MethodCall, Outcome, Request, Response } from '../types/Messages';

export type WireMode = 'canonical' | 'compact';

/**
 * Structured (pre-serialization) form of an envelope
 */
export type WireObject = Record<string, unknown>;

/**
 * What the recovery path could read from a payload that is not a valid request
 */
export interface RecoveryProbe {
  version?: string;
  id?: Id;
}

/**
 * Mapping between the semantic envelopes and their structured wire form.
 *
 * Exactly one implementation is bound to a client or server when it is constructed.
 * Every operation throws an {@link RpcWireError} subclass on failure.
 */
export interface WireFormat {
  readonly mode: WireMode;
  readonly profile: DeploymentProfile;

  encodeRequest<TCall extends MethodCall>(request: Request<TCall>): WireObject;
  decodeRequest<TCall extends MethodCall>(raw: unknown, methods: MethodSchema<TCall>): Request<TCall>;

  encodeResponse<TResult>(response: Response<TResult>): WireObject;
  decodeResponse<TResult>(raw: unknown, results: ResultSchema<TResult>): Response<TResult>;

  /**
   * Outcome member alone, e.g. `{ result: ... }` or `{ e: { code: -32603 } }`
   */
  encodeOutcome<TResult>(outcome: Outcome<TResult>): WireObject;

  /**
   * Minimal decode reading only the version marker and the identifier
   */
  probe(raw: unknown): RecoveryProbe;

  /**
   * Error answered to an identifiable request that could not be decoded
   */
  recoveryError(probe: RecoveryProbe, decodeMessage: string): RpcError;
}
