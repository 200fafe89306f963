import { PROTOCOL } from '../constants';
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

const ID_NAMES = ['id', 'i'] as const;
const RESULT_NAMES = ['result', 'r'] as const;
const ERROR_NAMES = ['error', 'e'] as const;
const REQUEST_FIELDS = ['jsonrpc', 'id', 'i', 'method', 'params'] as const;
const RESPONSE_FIELDS = ['jsonrpc', 'id', 'i', 'result', 'r', 'error', 'e'] as const;

/**
 * Strict JSON-RPC 2.0 encoding
 *
 * ```json
 * {"jsonrpc":"2.0","id":1,"method":"hello","params":{"name":"world"}}
 * {"jsonrpc":"2.0","id":1,"result":"Hello, world"}
 * ```
 *
 * The version marker is always emitted; on decode it may be omitted but, when present, must be
 * `"2.0"`. Short member names (`i`, `r`, `e`) are accepted as aliases.
 */
export class CanonicalWireFormat implements WireFormat {
  readonly mode = 'canonical';

  constructor(readonly profile: DeploymentProfile) {}

  private checkVersion(record: Record<string, unknown>): void {
    const version = readOptionalString(record, 'jsonrpc');
    if (version !== undefined && version !== PROTOCOL.JSONRPC_VERSION) {
      throw EnvelopeError.version(PROTOCOL.ERR_INVALID_PROTOCOL_VERSION, { version });
    }
  }

  encodeRequest<TCall extends MethodCall>(request: Request<TCall>): WireObject {
    const encoded: WireObject = { jsonrpc: PROTOCOL.JSONRPC_VERSION };
    if (request.id !== undefined) {
      encoded.id = this.profile.ids.accept(request.id);
    }
    encoded.method = request.method.method;
    if (request.method.params !== undefined) {
      encoded.params = request.method.params;
    }
    return encoded;
  }

  decodeRequest<TCall extends MethodCall>(raw: unknown, methods: MethodSchema<TCall>): Request<TCall> {
    const record = expectRecord(raw, 'request');
    rejectUnknownFields(record, REQUEST_FIELDS, 'request');
    this.checkVersion(record);
    const id = readOptionalId(record, ID_NAMES, this.profile);
    if (record.method === undefined) {
      throw EnvelopeError.malformed('missing field `method`');
    }
    const method = parseMethodCall(methods, record.method, record.params);
    return id === undefined ? { method } : { id, method };
  }

  encodeResponse<TResult>(response: Response<TResult>): WireObject {
    return {
      jsonrpc: PROTOCOL.JSONRPC_VERSION,
      id: this.profile.ids.accept(response.id),
      ...this.encodeOutcome(response.outcome),
    };
  }

  decodeResponse<TResult>(raw: unknown, results: ResultSchema<TResult>): Response<TResult> {
    const record = expectRecord(raw, 'response');
    rejectUnknownFields(record, RESPONSE_FIELDS, 'response');
    this.checkVersion(record);
    const id = readRequiredId(record, ID_NAMES, this.profile);
    const outcome = decodeOutcomeMember(
      record,
      { result: RESULT_NAMES, error: ERROR_NAMES },
      this.profile,
      (value) => parseResult(results, value)
    );
    return { id, outcome };
  }

  encodeOutcome<TResult>(outcome: Outcome<TResult>): WireObject {
    return encodeOutcomeMember(outcome, { result: 'result', error: 'error' }, this.profile);
  }

  probe(raw: unknown): RecoveryProbe {
    const record = expectRecord(raw, 'request');
    const version = readOptionalString(record, 'jsonrpc');
    const id = readOptionalId(record, ID_NAMES, this.profile);
    return { version, id };
  }

  recoveryError(probe: RecoveryProbe, decodeMessage: string): RpcError {
    if (probe.version === undefined) {
      return RpcError.invalidRequest();
    }
    if (probe.version === PROTOCOL.JSONRPC_VERSION) {
      return RpcError.methodNotFound(decodeMessage);
    }
    return RpcError.invalidRequest(PROTOCOL.ERR_INVALID_PROTOCOL_VERSION);
  }
}
