import { describe, it, expect } from 'vitest';
import {
  CapacityError,
  EnvelopeError,
  constrainedProfile,
  createProfile,
  fixedCapacityStrings,
  fullProfile,
  growableStrings,
  scalarIds,
  uint32Ids,
} from '../../src/core';

describe('Profile', () => {
  describe('scalarIds', () => {
    const ids = scalarIds();

    it('should accept strings, finite numbers and null', () => {
      expect(ids.accept('abc')).toBe('abc');
      expect(ids.accept(-1.5)).toBe(-1.5);
      expect(ids.accept(null)).toBeNull();
    });

    it('should reject other values', () => {
      expect(() => ids.accept({})).toThrow(EnvelopeError);
      expect(() => ids.accept(Number.NaN)).toThrow('id must be a string, a number or null');
      expect(() => ids.accept(true)).toThrow(EnvelopeError);
    });

    it('should reject integers it cannot echo unchanged', () => {
      expect(ids.accept(9007199254740991)).toBe(9007199254740991);
      expect(() => ids.accept(9007199254740992)).toThrow('id exceeds the safe integer range');
      expect(() => ids.accept(-9007199254740992)).toThrow(EnvelopeError);
      expect(() => ids.accept(1e300)).toThrow(EnvelopeError);
    });
  });

  describe('uint32Ids', () => {
    const ids = uint32Ids();

    it('should accept unsigned 32-bit integers', () => {
      expect(ids.accept(0)).toBe(0);
      expect(ids.accept(4294967295)).toBe(4294967295);
    });

    it('should reject everything else', () => {
      expect(() => ids.accept(4294967296)).toThrow('id must be an unsigned 32-bit integer');
      expect(() => ids.accept(-1)).toThrow(EnvelopeError);
      expect(() => ids.accept(1.5)).toThrow(EnvelopeError);
      expect(() => ids.accept('1')).toThrow(EnvelopeError);
      expect(() => ids.accept(null)).toThrow(EnvelopeError);
    });
  });

  describe('string storage', () => {
    it('should store any string when growable', () => {
      const storage = growableStrings();
      const long = 'x'.repeat(10_000);

      expect(storage.capacity).toBeUndefined();
      expect(storage.store(long)).toBe(long);
    });

    it('should measure fixed capacity in UTF-8 bytes', () => {
      const storage = fixedCapacityStrings(4);

      expect(storage.store('abcd')).toBe('abcd');
      expect(() => storage.store('ééé')).toThrow(
        'string of 6 bytes exceeds fixed capacity of 4 bytes'
      );
    });

    it('should default to 128 bytes', () => {
      const storage = fixedCapacityStrings();

      expect(storage.capacity).toBe(128);
      expect(storage.store('x'.repeat(128))).toHaveLength(128);
      expect(() => storage.store('x'.repeat(129))).toThrow(CapacityError);
    });
  });

  describe('profiles', () => {
    it('should pair the policies of each deployment', () => {
      expect(fullProfile.name).toBe('full');
      expect(fullProfile.ids.name).toBe('scalar');
      expect(fullProfile.strings.capacity).toBeUndefined();
      expect(constrainedProfile.name).toBe('constrained');
      expect(constrainedProfile.ids.name).toBe('uint32');
      expect(constrainedProfile.strings.capacity).toBe(128);
    });

    it('should build custom profiles', () => {
      const profile = createProfile({
        name: 'tiny',
        ids: uint32Ids(),
        strings: fixedCapacityStrings(16),
      });

      expect(profile.name).toBe('tiny');
      expect(profile.strings.capacity).toBe(16);
    });
  });
});
