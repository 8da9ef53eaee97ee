/**
 * Unit tests for source identity
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  DEFAULT_SOURCE_ID,
  Source,
  SourceRegistry,
  parseSourceSpec,
  toSource,
} from '../../src/core/identity/source.js';
import { SourceDataError } from '../../src/core/errors.js';
import { createRecordingLogger } from '../../src/core/logging/recording.js';
import type { RecordingLogger } from '../../src/core/logging/recording.js';

describe('Source Identity', () => {
  let logger: RecordingLogger;
  let registry: SourceRegistry;

  beforeEach(() => {
    logger = createRecordingLogger();
    registry = new SourceRegistry({ logger });
  });

  describe('parseSourceSpec', () => {
    it('should return a bare identifier', () => {
      expect(parseSourceSpec(' Smith 2009 ')).toEqual({ id: 'Smith 2009' });
    });

    it('should split off a location after the last slash', () => {
      expect(parseSourceSpec('Smith 2009/arXiv:0901.0001')).toEqual({
        id: 'Smith 2009',
        location: 'arXiv:0901.0001',
      });
      expect(parseSourceSpec('a/b/c')).toEqual({ id: 'a/b', location: 'c' });
    });

    it('should read a double slash as a resolved code', () => {
      expect(parseSourceSpec('Jones 2011//2011ApJ...742...1J')).toEqual({
        id: 'Jones 2011',
        code: '2011ApJ...742...1J',
      });
    });
  });

  describe('interning', () => {
    it('should return the same instance for the same identifier', () => {
      const first = registry.intern('Smith 2009');
      const second = registry.intern('Smith 2009');

      expect(second).toBe(first);
      expect(registry.has('Smith 2009')).toBe(true);
      expect(registry.get('Smith 2009')).toBe(first);
      expect(registry.ids()).toEqual(['Smith 2009']);
    });

    it('should attach a location from the spec to the shared instance', () => {
      const plain = registry.intern('Smith 2009');
      const located = registry.intern('Smith 2009/arXiv:0901.0001');

      expect(located).toBe(plain);
      expect(plain.location).toBe('arXiv:0901.0001');
      expect(plain.toSpec()).toBe('Smith 2009/arXiv:0901.0001');
      expect(plain.toString()).toBe('Source Smith 2009 @arXiv:0901.0001');
    });

    it('should take an explicit location, slashes included', () => {
      const source = registry.intern('Smith 2009', '10.1086/345678');

      expect(source.id).toBe('Smith 2009');
      expect(source.location).toBe('10.1086/345678');
    });

    it('should warn when a different location overwrites an existing one', () => {
      registry.intern('Lee/loc1');
      const source = registry.intern('Lee/loc2');

      expect(source.location).toBe('loc2');
      expect(logger.byLevel('warn')).toHaveLength(1);
      expect(logger.byLevel('warn')[0]?.event_type).toBe('source_location_overwritten');
      expect(logger.byLevel('warn')[0]?.metadata).toEqual({ source: 'Lee', previous: 'loc1', next: 'loc2' });
    });

    it('should not warn when the same location is repeated', () => {
      registry.intern('Lee/loc1');
      registry.intern('Lee/loc1');

      expect(logger.entries).toHaveLength(0);
    });

    it('should store a resolved code', () => {
      const source = registry.intern('Jones 2011//2011ApJ...742...1J');

      expect(source.code).toBe('2011ApJ...742...1J');
      expect(source.location).toBeUndefined();
      expect(source.toSpec()).toBe('Jones 2011//2011ApJ...742...1J');
    });

    it('should reject an empty identifier', () => {
      expect(() => registry.intern('')).toThrow(SourceDataError);
      expect(() => registry.intern('/somewhere')).toThrow(SourceDataError);
    });

    it('should keep separate registries apart', () => {
      const other = new SourceRegistry();

      expect(other.intern('Smith 2009')).not.toBe(registry.intern('Smith 2009'));
    });
  });

  describe('locations and codes', () => {
    it('should clear the code when the location changes', () => {
      const source = registry.intern('Kim 2015/arXiv:1501.00001');
      source.setCode('2015ApJ...800....1K');

      source.setLocation('arXiv:1501.00002');

      expect(source.location).toBe('arXiv:1501.00002');
      expect(source.code).toBeUndefined();
    });

    it('should keep the code when the same location is set again', () => {
      const source = registry.intern('Kim 2015/arXiv:1501.00001');
      source.setCode('2015ApJ...800....1K');

      source.setLocation('arXiv:1501.00001');

      expect(source.code).toBe('2015ApJ...800....1K');
    });

    it('should treat blank values as absent', () => {
      const source = registry.intern('Kim 2015/arXiv:1501.00001');

      source.setLocation('  ');
      source.setCode('');

      expect(source.location).toBeUndefined();
      expect(source.code).toBeUndefined();
      expect(source.toString()).toBe('Source Kim 2015');
    });
  });

  describe('default source', () => {
    it('should be a reserved singleton', () => {
      expect(Source.DEFAULT.id).toBe(DEFAULT_SOURCE_ID);
      expect(Source.DEFAULT.isDefault).toBe(true);
      expect(registry.intern(DEFAULT_SOURCE_ID)).toBe(Source.DEFAULT);
      expect(registry.get(DEFAULT_SOURCE_ID)).toBe(Source.DEFAULT);
      expect(toSource(null)).toBe(Source.DEFAULT);
    });

    it('should not be the default for ordinary sources', () => {
      expect(registry.intern('Smith 2009').isDefault).toBe(false);
    });
  });

  describe('toSource', () => {
    it('should pass sources through and intern strings', () => {
      const source = registry.intern('Smith 2009');

      expect(toSource(source)).toBe(source);
      expect(toSource('Smith 2009', registry)).toBe(source);
    });
  });
});
