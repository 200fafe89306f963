import { RpcError, errorKindFromCode, isInt16 } from '../errors/RpcError';
import type { DeploymentProfile } from '../profile/Profile';
import { EnvelopeError } from '../types/Errors';
import type { Id, Outcome } from '../types/Messages';
import type { WireObject } from './WireFormat';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw EnvelopeError.malformed(`invalid type: expected ${what} object`);
  }
  return value;
}

export function rejectUnknownFields(
  record: Record<string, unknown>,
  allowed: readonly string[],
  what: string
): void {
  for (const key of Object.keys(record)) {
    if (!allowed.includes(key)) {
      throw EnvelopeError.malformed(`unknown field \`${key}\` in ${what}`, { field: key });
    }
  }
}

function hasField(record: Record<string, unknown>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, name);
}

/**
 * Read a field that may appear under either of two names, but not both.
 * Pass the same name twice for a field without alias.
 */
export function readAliased(
  record: Record<string, unknown>,
  names: readonly [string, string]
): { present: boolean; value: unknown } {
  const [primary, alias] = names;
  if (primary !== alias && hasField(record, primary) && hasField(record, alias)) {
    throw EnvelopeError.malformed(`duplicate field \`${primary}\``);
  }
  if (hasField(record, primary)) return { present: true, value: record[primary] };
  if (hasField(record, alias)) return { present: true, value: record[alias] };
  return { present: false, value: undefined };
}

/**
 * Read an optional string field; `null` counts as absent
 */
export function readOptionalString(record: Record<string, unknown>, name: string): string | undefined {
  const value = record[name];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw EnvelopeError.malformed(`invalid type for \`${name}\`: expected a string`);
  }
  return value;
}

/**
 * Read an identifier that may be omitted; `null` counts as omitted
 */
export function readOptionalId(
  record: Record<string, unknown>,
  names: readonly [string, string],
  profile: DeploymentProfile
): Id | undefined {
  const { value } = readAliased(record, names);
  if (value === undefined || value === null) return undefined;
  return profile.ids.accept(value);
}

export function readRequiredId(
  record: Record<string, unknown>,
  names: readonly [string, string],
  profile: DeploymentProfile
): Id {
  const { present, value } = readAliased(record, names);
  if (!present) {
    throw EnvelopeError.malformed(`missing field \`${names[0]}\``);
  }
  return profile.ids.accept(value);
}

export function encodeError(error: RpcError, profile: DeploymentProfile): WireObject {
  const encoded: WireObject = { code: error.code };
  if (error.reason !== undefined) {
    encoded.message = profile.strings.store(error.reason);
  }
  return encoded;
}

/**
 * Decode `{ code, message? }`. Extra members are ignored.
 */
export function decodeError(raw: unknown, profile: DeploymentProfile): RpcError {
  const record = expectRecord(raw, 'error');
  const code = record.code;
  if (!isInt16(code)) {
    throw EnvelopeError.malformed('error code must be a signed 16-bit integer', { code });
  }
  const message = readOptionalString(record, 'message');
  return new RpcError(
    errorKindFromCode(code),
    message === undefined ? undefined : profile.strings.store(message)
  );
}

/**
 * Encode an outcome under the given member names; a void result is sent as `null`
 */
export function encodeOutcomeMember<TResult>(
  outcome: Outcome<TResult>,
  names: { result: string; error: string },
  profile: DeploymentProfile
): WireObject {
  if (outcome.ok) {
    return { [names.result]: outcome.result === undefined ? null : outcome.result };
  }
  return { [names.error]: encodeError(outcome.error, profile) };
}

/**
 * Decode exactly one outcome member; each may appear under its name or its alias
 */
export function decodeOutcomeMember<TResult>(
  record: Record<string, unknown>,
  names: { result: readonly [string, string]; error: readonly [string, string] },
  profile: DeploymentProfile,
  parseResult: (value: unknown) => TResult
): Outcome<TResult> {
  const result = readAliased(record, names.result);
  const error = readAliased(record, names.error);
  if (result.present === error.present) {
    throw EnvelopeError.malformed('response must carry exactly one of result or error');
  }
  if (result.present) {
    return { ok: true, result: parseResult(result.value) };
  }
  return { ok: false, error: decodeError(error.value, profile) };
}
