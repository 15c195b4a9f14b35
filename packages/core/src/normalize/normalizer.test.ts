import { describe, it, expect } from 'vitest';
import { normalize, roundTo } from './normalizer.js';
import { FIELD_MAPPINGS, GA4_SCHEMA_VERSION, GADS_SCHEMA_VERSION, GSC_SCHEMA_VERSION } from './mappings.js';
import { SchemaMappingError } from '../errors.js';
import type { RawDataset, RawRow } from './types.js';

const range = { start: '2024-06-03', end: '2024-06-09' };

function makeDataset(overrides: Partial<RawDataset> = {}): RawDataset {
  return {
    source: 'traffic',
    dimension: 'device',
    schemaVersion: GA4_SCHEMA_VERSION,
    dateRange: range,
    rows: [
      { deviceCategory: 'mobile', sessions: 120 },
      { deviceCategory: 'desktop', sessions: 80 },
    ],
    ...overrides,
  };
}

describe('roundTo', () => {
  it('rounds half away from zero', () => {
    expect(roundTo(1.005, 2)).toBe(1.01);
    expect(roundTo(-2.345, 2)).toBe(-2.35);
    expect(roundTo(12.3456, 2)).toBe(12.35);
  });

  it('keeps integers unchanged', () => {
    expect(roundTo(120, 2)).toBe(120);
    expect(roundTo(0, 2)).toBe(0);
  });

  it('supports other precisions', () => {
    expect(roundTo(12.345, 1)).toBe(12.3);
    expect(roundTo(12.5, 0)).toBe(13);
  });
});

describe('normalize', () => {
  it('maps a device breakdown onto canonical records', () => {
    const { records, warnings } = normalize(makeDataset());

    expect(warnings).toEqual([]);
    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      source: 'traffic',
      dimension: 'device',
      naturalKey: 'mobile',
      metrics: { sessions: 120, share: 60 },
      dateRange: range,
    });
    expect(records[1]?.naturalKey).toBe('desktop');
    expect(records[1]?.metrics.sessions).toBe(80);
    expect(records[1]?.metrics.share).toBe(40);
  });

  it('converts ratio metrics to percentages exactly once', () => {
    const { records } = normalize(makeDataset({
      rows: [{ deviceCategory: 'mobile', sessions: 10, bounceRate: 0.218 }],
    }));
    expect(records[0]?.metrics.bounceRate).toBe(21.8);
  });

  it('rounds converted ratios to the configured precision', () => {
    const ratios = [0, 0.5, 0.123456, 1, 0.0049];
    const expected = [0, 50, 12.35, 100, 0.49];
    const { records } = normalize(makeDataset({
      rows: ratios.map((r, i) => ({ deviceCategory: `d${i}`, sessions: 1, bounceRate: r })),
    }));
    expect(records.map(r => r.metrics.bounceRate)).toEqual(expected);
  });

  it('honours a custom precision', () => {
    const { records } = normalize(
      makeDataset({ rows: [{ deviceCategory: 'mobile', sessions: 3, averageSessionDuration: 84.567 }] }),
      { precision: 1 },
    );
    expect(records[0]?.metrics.avgSessionDuration).toBe(84.6);
  });

  it('leaves metrics off the percentage allowlist unscaled', () => {
    const { records } = normalize(
      makeDataset({ rows: [{ deviceCategory: 'mobile', sessions: 3, bounceRate: 0.25 }] }),
      { percentMetrics: [] },
    );
    expect(records[0]?.metrics.bounceRate).toBe(0.25);
  });

  it('parses numeric strings', () => {
    const { records } = normalize(makeDataset({ rows: [{ deviceCategory: 'tablet', sessions: '42' }] }));
    expect(records[0]?.metrics.sessions).toBe(42);
  });

  it('rejects values that are not numbers', () => {
    expect(() => normalize(makeDataset({ rows: [{ deviceCategory: 'tablet', sessions: 'many' }] })))
      .toThrow(SchemaMappingError);
  });

  it('joins multi-field natural keys', () => {
    const { records } = normalize(makeDataset({
      dimension: 'channel',
      rows: [{ sessionSource: 'google', sessionMedium: 'organic', sessions: 300 }],
    }));
    expect(records[0]?.naturalKey).toBe('google / organic');
  });

  it('uses a totals key for overview rows', () => {
    const { records } = normalize(makeDataset({
      dimension: 'overview',
      rows: [{ activeUsers: 900, sessions: 1200, screenPageViews: 3400, engagementRate: 0.61 }],
    }));
    expect(records[0]?.naturalKey).toBe('total');
    expect(records[0]?.metrics).toEqual({
      activeUsers: 900,
      sessions: 1200,
      pageViews: 3400,
      engagementRate: 61,
    });
  });

  it('applies unit scale for micros', () => {
    const { records } = normalize({
      source: 'ads',
      dimension: 'overview',
      schemaVersion: GADS_SCHEMA_VERSION,
      dateRange: range,
      rows: [{ 'metrics.costMicros': '12345678', 'metrics.clicks': '40', 'metrics.ctr': 0.05 }],
    });
    expect(records[0]?.metrics).toEqual({ clicks: 40, ctr: 5, cost: 12.35 });
  });

  it('drops unknown fields with a warning', () => {
    const { records, warnings } = normalize(makeDataset({
      rows: [{ deviceCategory: 'mobile', sessions: 5, deviceModel: 'x1' }],
    }));
    expect(warnings).toEqual(['traffic/device: dropped unmapped field "deviceModel"']);
    expect(Object.keys(records[0]?.metrics ?? {})).toEqual(['sessions', 'share']);
  });

  it('drops explicitly listed fields silently', () => {
    const { warnings } = normalize(makeDataset({
      dimension: 'page',
      rows: [{ pagePath: '/pricing', pageTitle: 'Pricing', screenPageViews: 50 }],
    }));
    expect(warnings).toEqual([]);
  });

  it('fails when a required field is missing', () => {
    const dataset = makeDataset({
      source: 'search',
      dimension: 'device',
      schemaVersion: GSC_SCHEMA_VERSION,
      rows: [{ clicks: 10, impressions: 100 }],
    });

    let error: unknown;
    try {
      normalize(dataset);
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(SchemaMappingError);
    expect(error).toMatchObject({ source: 'search', dimension: 'device', field: 'device', stage: 'normalize' });
  });

  it('fails when no mapping exists for the schema version', () => {
    expect(() => normalize(makeDataset({ schemaVersion: 'ga4-v0' }))).toThrow('No field mapping');
  });

  it('returns no records for an empty dataset', () => {
    expect(normalize(makeDataset({ rows: [] })).records).toEqual([]);
  });

  it('maps every declared field of every mapping without warnings', () => {
    for (const mapping of FIELD_MAPPINGS) {
      const row: RawRow = {};
      for (const field of mapping.naturalKey) row[field] = 'key';
      for (const field of mapping.drop) row[field] = 'ignored';
      for (const source of Object.values(mapping.metrics)) {
        if (source === undefined) continue;
        row[typeof source === 'string' ? source : source.field] = 1;
      }

      const { records, warnings } = normalize({
        source: mapping.source,
        dimension: mapping.dimension,
        schemaVersion: mapping.schemaVersion,
        dateRange: range,
        rows: [row],
      });

      expect(warnings).toEqual([]);
      const metricCount = Object.keys(mapping.metrics).length + (mapping.shareOf ? 1 : 0);
      expect(Object.keys(records[0]?.metrics ?? {})).toHaveLength(metricCount);
    }
  });
});
