import { describe, it, expect } from 'vitest';
import { FIELD_MAPPINGS, findMapping, parseMappings, GA4_SCHEMA_VERSION } from './mappings.js';

describe('FIELD_MAPPINGS', () => {
  it('has exactly one mapping per (source, dimension, version)', () => {
    const keys = FIELD_MAPPINGS.map(m => `${m.source}:${m.dimension}:${m.schemaVersion}`);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it('never maps one raw field to two metrics', () => {
    for (const mapping of FIELD_MAPPINGS) {
      const fields = Object.values(mapping.metrics).map(s =>
        typeof s === 'string' ? s : s?.field,
      );
      expect(new Set(fields).size).toBe(fields.length);
    }
  });

  it('includes the natural key fields in the required list', () => {
    for (const mapping of FIELD_MAPPINGS) {
      for (const field of mapping.naturalKey) {
        expect(mapping.required).toContain(field);
      }
    }
  });
});

describe('findMapping', () => {
  it('finds a mapping by source, dimension and version', () => {
    const mapping = findMapping('traffic', 'device', GA4_SCHEMA_VERSION);
    expect(mapping?.naturalKey).toEqual(['deviceCategory']);
    expect(mapping?.shareOf).toBe('sessions');
  });

  it('returns undefined for an unknown version', () => {
    expect(findMapping('traffic', 'device', 'ga4-v0')).toBeUndefined();
  });
});

describe('parseMappings', () => {
  const base = {
    source: 'traffic',
    dimension: 'device',
    schemaVersion: 'test-v1',
    naturalKey: ['deviceCategory'],
    required: ['deviceCategory'],
  };

  it('accepts a valid mapping and defaults drop to empty', () => {
    const [mapping] = parseMappings([{ ...base, metrics: { sessions: 'sessions' } }]);
    expect(mapping?.drop).toEqual([]);
    expect(mapping?.metrics).toEqual({ sessions: 'sessions' });
  });

  it('rejects a raw field used by two metrics', () => {
    expect(() =>
      parseMappings([{ ...base, metrics: { sessions: 'sessions', activeUsers: 'sessions' } }]),
    ).toThrow('Raw field "sessions" is used by both');
  });

  it('rejects metrics outside the vocabulary', () => {
    expect(() =>
      parseMappings([{ ...base, metrics: { sessionz: 'sessions' } }]),
    ).toThrow('not in the canonical vocabulary');
  });

  it('rejects required fields that are not mapped', () => {
    expect(() =>
      parseMappings([{ ...base, required: ['deviceCategory', 'users'], metrics: { sessions: 'sessions' } }]),
    ).toThrow('Required field "users" is not mapped');
  });

  it('rejects a share base that is not mapped', () => {
    expect(() =>
      parseMappings([{ ...base, metrics: { sessions: 'sessions' }, shareOf: 'clicks' }]),
    ).toThrow('shareOf "clicks" is not a mapped metric');
  });
});
