import { RpcError } from '../errors/RpcError';
import { parseMethodCall, parseResult } from '../methods/MethodSchema';
import type { MethodSchema, ResultSchema } from '../methods/MethodSchema';
import type { DeploymentProfile } from '../profile/Profile';
import { EnvelopeError } from '../types/Errors';
import type { MethodCall, Outcome, Request, Response } from '../types/Messages';
import {
  decodeOutcomeMember,
  encodeOutcomeMember,
  expectRecord,
  readOptionalId,
  readOptionalString,
  readRequiredId,
  rejectUnknownFields,
} from './fields';
import type { RecoveryProbe, WireFormat, WireObject } from './WireFormat';

const ID_NAMES = ['i', 'id'] as const;
const REQUEST_FIELDS = ['jsonrpc', 'i', 'id', 'm', 'p'] as const;
const RESPONSE_FIELDS = ['jsonrpc', 'i', 'id', 'r', 'e'] as const;

/**
 * Space-reduced, non-standard encoding
 *
 * ```json
 * {"i":1,"m":"hello","p":{"name":"world"}}
 * {"i":1,"r":"Hello, world"}
 * ```
 *
 * No version marker is emitted; one sent by a canonical peer is tolerated whatever its value.
 */
export class CompactWireFormat implements WireFormat {
  readonly mode = 'compact';

  constructor(readonly profile: DeploymentProfile) {}

  encodeRequest<TCall extends MethodCall>(request: Request<TCall>): WireObject {
    const encoded: WireObject = {};
    if (request.id !== undefined) {
      encoded.i = this.profile.ids.accept(request.id);
    }
    encoded.m = request.method.method;
    if (request.method.params !== undefined) {
      encoded.p = request.method.params;
    }
    return encoded;
  }

  decodeRequest<TCall extends MethodCall>(raw: unknown, methods: MethodSchema<TCall>): Request<TCall> {
    const record = expectRecord(raw, 'request');
    rejectUnknownFields(record, REQUEST_FIELDS, 'request');
    readOptionalString(record, 'jsonrpc');
    const id = readOptionalId(record, ID_NAMES, this.profile);
    if (record.m === undefined) {
      throw EnvelopeError.malformed('missing field `m`');
    }
    const method = parseMethodCall(methods, record.m, record.p);
    return id === undefined ? { method } : { id, method };
  }

  encodeResponse<TResult>(response: Response<TResult>): WireObject {
    return {
      i: this.profile.ids.accept(response.id),
      ...this.encodeOutcome(response.outcome),
    };
  }

  decodeResponse<TResult>(raw: unknown, results: ResultSchema<TResult>): Response<TResult> {
    const record = expectRecord(raw, 'response');
    rejectUnknownFields(record, RESPONSE_FIELDS, 'response');
    readOptionalString(record, 'jsonrpc');
    const id = readRequiredId(record, ID_NAMES, this.profile);
    const outcome = decodeOutcomeMember(
      record,
      { result: ['r', 'r'], error: ['e', 'e'] },
      this.profile,
      (value) => parseResult(results, value)
    );
    return { id, outcome };
  }

  encodeOutcome<TResult>(outcome: Outcome<TResult>): WireObject {
    return encodeOutcomeMember(outcome, { result: 'r', error: 'e' }, this.profile);
  }

  probe(raw: unknown): RecoveryProbe {
    const record = expectRecord(raw, 'request');
    const version = readOptionalString(record, 'jsonrpc');
    const id = readOptionalId(record, ID_NAMES, this.profile);
    return { version, id };
  }

  /**
   * Compact peers never send a version marker, so any identifiable request is answered as an
   * unknown or malformed method.
   */
  recoveryError(_probe: RecoveryProbe, decodeMessage: string): RpcError {
    return RpcError.methodNotFound(decodeMessage);
  }
}
