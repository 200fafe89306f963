import { LIMITS } from '../constants';
import { CapacityError, EnvelopeError } from '../types/Errors';
import type { Id } from '../types/Messages';

/**
 * Decides which values are acceptable call identifiers
 */
export interface IdPolicy {
  readonly name: string;
  /**
   * @throws {EnvelopeError} When the value is not an identifier under this policy
   */
  accept(value: unknown): Id;
}

/**
 * String-storage strategy for messages carried inside envelopes
 */
export interface StringStorage {
  /** Capacity in UTF-8 bytes, `undefined` when growable */
  readonly capacity: number | undefined;
  /**
   * @throws {CapacityError} When the value does not fit
   */
  store(value: string): string;
}

/**
 * Per-deployment choice of identifier and string policies
 */
export interface DeploymentProfile {
  readonly name: string;
  readonly ids: IdPolicy;
  readonly strings: StringStorage;
}

/**
 * Any JSON scalar: string, finite number or null. Integers beyond the safe range are rejected,
 * as they cannot be echoed unchanged.
 */
export function scalarIds(): IdPolicy {
  return {
    name: 'scalar',
    accept(value: unknown): Id {
      if (value === null || typeof value === 'string') return value;
      if (typeof value === 'number' && Number.isFinite(value)) {
        if (Number.isInteger(value) && !Number.isSafeInteger(value)) {
          throw EnvelopeError.malformed('id exceeds the safe integer range', { id: value });
        }
        return value;
      }
      throw EnvelopeError.malformed('id must be a string, a number or null', { id: value });
    },
  };
}

/**
 * Unsigned 32-bit integers only
 */
export function uint32Ids(): IdPolicy {
  return {
    name: 'uint32',
    accept(value: unknown): Id {
      if (
        typeof value === 'number' &&
        Number.isInteger(value) &&
        value >= 0 &&
        value <= LIMITS.UINT32_MAX
      ) {
        return value;
      }
      throw EnvelopeError.malformed('id must be an unsigned 32-bit integer', { id: value });
    },
  };
}

export function growableStrings(): StringStorage {
  return {
    capacity: undefined,
    store: (value) => value,
  };
}

export function fixedCapacityStrings(capacity: number = LIMITS.FIXED_STRING_CAPACITY): StringStorage {
  return {
    capacity,
    store(value: string): string {
      const size = Buffer.byteLength(value, 'utf8');
      if (size > capacity) {
        throw new CapacityError(`string of ${size} bytes exceeds fixed capacity of ${capacity} bytes`, {
          size,
          capacity,
        });
      }
      return value;
    },
  };
}

export function createProfile(options: {
  name: string;
  ids: IdPolicy;
  strings: StringStorage;
}): DeploymentProfile {
  return { name: options.name, ids: options.ids, strings: options.strings };
}

/**
 * Full deployments: any scalar identifier, growable strings
 */
export const fullProfile: DeploymentProfile = createProfile({
  name: 'full',
  ids: scalarIds(),
  strings: growableStrings(),
});

/**
 * Constrained deployments: u32 identifiers, 128-byte strings
 */
export const constrainedProfile: DeploymentProfile = createProfile({
  name: 'constrained',
  ids: uint32Ids(),
  strings: fixedCapacityStrings(),
});
