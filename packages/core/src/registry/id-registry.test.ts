import { describe, it, expect } from 'vitest';
import { IdRegistry, RegistryGroup, formatId } from './id-registry.js';
import { normalize } from '../normalize/normalizer.js';
import { GA4_SCHEMA_VERSION } from '../normalize/mappings.js';
import type { CanonicalRecord, RawDataset } from '../normalize/types.js';

const range = { start: '2024-06-03', end: '2024-06-09' };

function makeRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    source: 'traffic',
    dimension: 'device',
    naturalKey: 'mobile',
    metrics: { sessions: 120 },
    dateRange: range,
    ...overrides,
  };
}

const devices: RawDataset = {
  source: 'traffic',
  dimension: 'device',
  schemaVersion: GA4_SCHEMA_VERSION,
  dateRange: range,
  rows: [
    { deviceCategory: 'mobile', sessions: 120 },
    { deviceCategory: 'desktop', sessions: 80 },
  ],
};

describe('formatId', () => {
  it('encodes source, dimension and a padded sequence', () => {
    expect(formatId('traffic', 'device', 3)).toBe('GA4-DEV-003');
    expect(formatId('search', 'query', 12)).toBe('GSC-KW-012');
    expect(formatId('ads', 'campaign', 1234)).toBe('ADS-CMP-1234');
  });

  it('prepends a period prefix', () => {
    expect(formatId('traffic', 'device', 1, 'PREV')).toBe('PREV-GA4-DEV-001');
  });
});

describe('IdRegistry', () => {
  it('assigns sequential IDs to normalized device records', () => {
    const registry = new IdRegistry();
    const ids = normalize(devices).records.map(r => registry.assign(r));
    expect(ids).toEqual(['GA4-DEV-001', 'GA4-DEV-002']);
    expect(registry.resolve('GA4-DEV-002')?.naturalKey).toBe('desktop');
  });

  it('keeps separate counters per source and dimension', () => {
    const registry = new IdRegistry();
    expect(registry.assign(makeRecord())).toBe('GA4-DEV-001');
    expect(registry.assign(makeRecord({ dimension: 'page', naturalKey: '/' }))).toBe('GA4-PAGE-001');
    expect(registry.assign(makeRecord({ source: 'search', naturalKey: 'MOBILE' }))).toBe('GSC-DEV-001');
    expect(registry.assign(makeRecord({ naturalKey: 'tablet' }))).toBe('GA4-DEV-002');
  });

  it('never issues the same ID twice', () => {
    const registry = new IdRegistry();
    const ids = Array.from({ length: 50 }, (_, i) => registry.assign(makeRecord({ naturalKey: `k${i % 3}` })));
    expect(new Set(ids).size).toBe(50);
    expect(registry.size).toBe(50);
  });

  it('produces identical IDs for identical input order', () => {
    const run = () => {
      const registry = new IdRegistry();
      return normalize(devices).records.map(r => registry.assign(r));
    };
    expect(run()).toEqual(run());
  });

  it('returns undefined for unknown IDs', () => {
    const registry = new IdRegistry();
    registry.assign(makeRecord());
    expect(registry.resolve('GA4-DEV-999')).toBeUndefined();
    expect(registry.has('GA4-DEV-001')).toBe(true);
  });

  it('tags records with the registry period', () => {
    const registry = new IdRegistry({ prefix: 'PREV', period: 'previous' });
    const record = registry.register(makeRecord());
    expect(record).toMatchObject({ id: 'PREV-GA4-DEV-001', period: 'previous' });
  });

  it('rejects prefixes that would break the citation pattern', () => {
    expect(() => new IdRegistry({ prefix: 'prev-1' })).toThrow('uppercase letters');
  });
});

describe('RegistryGroup', () => {
  it('resolves across disjoint period registries', () => {
    const current = new IdRegistry();
    const previous = new IdRegistry({ prefix: 'PREV', period: 'previous' });
    current.assign(makeRecord());
    previous.assign(makeRecord({ metrics: { sessions: 100 } }));

    const group = new RegistryGroup([current, previous]);
    expect(group.size).toBe(2);
    expect(group.ids()).toEqual(['GA4-DEV-001', 'PREV-GA4-DEV-001']);
    expect(group.resolve('PREV-GA4-DEV-001')?.metrics.sessions).toBe(100);
    expect(group.forPeriod('previous')).toBe(previous);
  });

  it('rejects registries that share a prefix', () => {
    expect(() => new RegistryGroup([new IdRegistry(), new IdRegistry()])).toThrow('distinct prefixes');
  });
});
