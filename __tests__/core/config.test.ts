import { describe, it, expect } from 'vitest';
import {
  CanonicalWireFormat,
  CompactWireFormat,
  ConsoleLogger,
  DEFAULT_CONFIG,
  JsonSerializer,
  MsgpackSerializer,
  SilentLogger,
  ValidationError,
  constrainedProfile,
  fullProfile,
  modeFromEnv,
  resolveProtocolConfig,
} from '../../src/core';
import type { ProtocolConfig } from '../../src/core';

describe('config', () => {
  describe('modeFromEnv', () => {
    it('should read the wire mode from the environment', () => {
      expect(modeFromEnv({ RPCWIRE_MODE: 'canonical' })).toBe('canonical');
      expect(modeFromEnv({ RPCWIRE_MODE: 'compact' })).toBe('compact');
    });

    it('should return undefined when unset or empty', () => {
      expect(modeFromEnv({})).toBeUndefined();
      expect(modeFromEnv({ RPCWIRE_MODE: '' })).toBeUndefined();
    });

    it('should reject unknown modes', () => {
      expect(() => modeFromEnv({ RPCWIRE_MODE: 'verbose' })).toThrow(
        'RPCWIRE_MODE must be "canonical" or "compact"'
      );
    });
  });

  describe('resolveProtocolConfig', () => {
    it('should apply defaults', () => {
      const resolved = resolveProtocolConfig({}, {});

      expect(DEFAULT_CONFIG.mode).toBe('compact');
      expect(resolved.format).toBeInstanceOf(CompactWireFormat);
      expect(resolved.format.profile).toBe(fullProfile);
      expect(resolved.serializer).toBeInstanceOf(JsonSerializer);
      expect(resolved.logger).toBeInstanceOf(SilentLogger);
    });

    it('should take the default mode from the environment', () => {
      const resolved = resolveProtocolConfig({}, { RPCWIRE_MODE: 'canonical' });

      expect(resolved.format).toBeInstanceOf(CanonicalWireFormat);
    });

    it('should prefer an explicit mode over the environment', () => {
      const resolved = resolveProtocolConfig({ mode: 'compact' }, { RPCWIRE_MODE: 'canonical' });

      expect(resolved.format.mode).toBe('compact');
    });

    it('should keep the given serializer, profile and logger', () => {
      const serializer = new MsgpackSerializer();
      const logger = new ConsoleLogger('warn');
      const resolved = resolveProtocolConfig(
        { mode: 'canonical', serializer, profile: constrainedProfile, logger },
        {}
      );

      expect(resolved.serializer).toBe(serializer);
      expect(resolved.logger).toBe(logger);
      expect(resolved.format.profile).toBe(constrainedProfile);
    });

    it('should reject an unknown mode', () => {
      const config: ProtocolConfig = JSON.parse('{"mode":"bogus"}');

      expect(() => resolveProtocolConfig(config, {})).toThrow(ValidationError);
    });

    it('should reject a serializer without codec methods', () => {
      const config: ProtocolConfig = JSON.parse('{"serializer":{"name":"json"}}');

      expect(() => resolveProtocolConfig(config, {})).toThrow(
        'Invalid configuration: serializer: serializer must implement encode() and decode()'
      );
    });
  });
});
