import { z } from 'zod';
import { ENV, WIRE_MODE } from './constants';
import { formatIssues } from './methods/MethodSchema';
import { fullProfile } from './profile/Profile';
import type { DeploymentProfile } from './profile/Profile';
import { JsonSerializer } from './serialization/JsonSerializer';
import type { Serializer } from './serialization/Serializer';
import { ValidationError } from './types/Errors';
import { SilentLogger } from './types/Logger';
import type { Logger } from './types/Logger';
import { createWireFormat } from './wire';
import type { WireFormat, WireMode } from './wire';
import { isRecord } from './wire/fields';

/**
 * Settings shared by clients and servers. The wire mode is fixed for the lifetime of the instance.
 */
export interface ProtocolConfig {
  /** Envelope encoding; defaults to `$RPCWIRE_MODE`, else `compact` */
  mode?: WireMode;
  serializer?: Serializer;
  profile?: DeploymentProfile;
  logger?: Logger;
}

export interface ResolvedProtocolConfig {
  format: WireFormat;
  serializer: Serializer;
  logger: Logger;
}

/**
 * Default protocol configuration
 */
export const DEFAULT_CONFIG = {
  mode: WIRE_MODE.COMPACT,
  profile: fullProfile,
} as const;

const modeSchema = z.enum([WIRE_MODE.CANONICAL, WIRE_MODE.COMPACT]);

const configSchema = z.object({
  mode: modeSchema.optional(),
  serializer: z
    .custom<Serializer>(
      (value) =>
        isRecord(value) && typeof value.encode === 'function' && typeof value.decode === 'function',
      { message: 'serializer must implement encode() and decode()' }
    )
    .optional(),
  profile: z
    .custom<DeploymentProfile>(
      (value) => isRecord(value) && isRecord(value.ids) && isRecord(value.strings),
      { message: 'profile must provide ids and strings policies' }
    )
    .optional(),
  logger: z
    .custom<Logger>((value) => isRecord(value) && typeof value.error === 'function', {
      message: 'logger must implement the Logger interface',
    })
    .optional(),
});

/**
 * Read the default wire mode from the environment
 *
 * @throws {ValidationError} When the variable holds an unknown mode
 */
export function modeFromEnv(env: NodeJS.ProcessEnv = process.env): WireMode | undefined {
  const value = env[ENV.WIRE_MODE];
  if (value === undefined || value === '') return undefined;
  const parsed = modeSchema.safeParse(value);
  if (!parsed.success) {
    throw ValidationError.invalidConfig(`${ENV.WIRE_MODE} must be "canonical" or "compact"`, {
      value,
    });
  }
  return parsed.data;
}

/**
 * Validate a config object and bind its wire format, serializer and logger
 *
 * @throws {ValidationError} When a setting is invalid
 */
export function resolveProtocolConfig(
  config: ProtocolConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedProtocolConfig {
  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    throw ValidationError.invalidConfig(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const settings = parsed.data;
  const mode = settings.mode ?? modeFromEnv(env) ?? DEFAULT_CONFIG.mode;
  const profile = settings.profile ?? DEFAULT_CONFIG.profile;

  return {
    format: createWireFormat(mode, profile),
    serializer: settings.serializer ?? new JsonSerializer(),
    logger: settings.logger ?? new SilentLogger(),
  };
}
