import { describe, it, expect } from 'vitest';
import type { RawDataset } from '@citeline/core';
import { SourceRegistry } from './registry.js';
import type { SourcesConfig } from './types.js';

function makeConfig(overrides: Partial<SourcesConfig> = {}): SourcesConfig {
  return {
    accessToken: 'test-secret',
    traffic: { enabled: true, required: true, propertyId: '123456' },
    search: { enabled: true, required: true, siteUrl: 'sc-domain:example.com' },
    ads: { enabled: true, required: false },
    ...overrides,
  };
}

describe('SourceRegistry', () => {
  it('builds fetchers for configured sources in canonical order', () => {
    const specs = new SourceRegistry(makeConfig()).specs();
    expect(specs.map(s => [s.id, s.required, s.fetcher?.id])).toEqual([
      ['traffic', true, 'traffic'],
      ['search', true, 'search'],
      ['ads', false, undefined],
    ]);
  });

  it('leaves out disabled sources', () => {
    const specs = new SourceRegistry(makeConfig({ ads: { enabled: false, required: false } })).specs();
    expect(specs.map(s => s.id)).toEqual(['traffic', 'search']);
  });

  it('reports missing settings', () => {
    const registry = new SourceRegistry(makeConfig({ accessToken: undefined }));
    expect(registry.status('traffic')).toEqual({
      id: 'traffic',
      enabled: true,
      required: true,
      configured: false,
      missing: ['sources.access_token'],
    });
    expect(registry.status('ads').missing).toEqual([
      'sources.access_token',
      'sources.ads.customer_id',
      'sources.ads.developer_token',
    ]);
    expect(registry.specs().every(s => s.fetcher === undefined)).toBe(true);
  });

  it('creates an ads fetcher once both IDs are set', () => {
    const registry = new SourceRegistry(makeConfig({
      ads: { enabled: true, required: false, customerId: '1234567890', developerToken: 'test-secret' },
    }));
    expect(registry.status('ads').configured).toBe(true);
    expect(registry.fetcher('ads')?.label).toBe('Ad spend');
  });

  it('serves every enabled source from a snapshot', () => {
    const datasets: RawDataset[] = [];
    const registry = SourceRegistry.fromSnapshot(makeConfig({ accessToken: undefined }), datasets);
    expect(registry.isReplay).toBe(true);
    expect(registry.specs().map(s => s.fetcher?.label)).toEqual([
      'Site traffic (replay)',
      'Search performance (replay)',
      'Ad spend (replay)',
    ]);
    expect(registry.statuses().every(s => s.configured)).toBe(true);
  });

  it('reports the window a snapshot covers', () => {
    const dataset = (start: string, end: string): RawDataset => ({
      source: 'traffic',
      dimension: 'device',
      schemaVersion: 'ga4-data-v1beta',
      dateRange: { start, end },
      rows: [],
    });
    const registry = SourceRegistry.fromSnapshot(makeConfig(), [
      dataset('2024-04-22', '2024-04-28'),
      dataset('2024-04-29', '2024-05-05'),
    ]);
    expect(registry.replayRange()).toEqual({ start: '2024-04-29', end: '2024-05-05' });
    expect(new SourceRegistry(makeConfig()).replayRange()).toBeUndefined();
  });
});
