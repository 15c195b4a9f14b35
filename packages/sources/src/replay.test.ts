import { describe, it, expect } from 'vitest';
import type { RawDataset } from '@citeline/core';
import { createReplaySource, snapshotRange } from './replay.js';

const current = { start: '2024-06-03', end: '2024-06-09' };
const previous = { start: '2024-05-27', end: '2024-06-02' };

function makeDataset(overrides: Partial<RawDataset> = {}): RawDataset {
  return {
    source: 'traffic',
    dimension: 'device',
    schemaVersion: 'ga4-data-v1beta',
    dateRange: current,
    rows: [{ deviceCategory: 'mobile', sessions: 120 }],
    ...overrides,
  };
}

describe('createReplaySource', () => {
  const saved = [
    makeDataset(),
    makeDataset({ dateRange: previous, rows: [{ deviceCategory: 'mobile', sessions: 100 }] }),
    makeDataset({ source: 'search', dimension: 'query', rows: [{ query: 'trail shoes', clicks: 3, impressions: 40 }] }),
  ];

  it('returns the saved datasets of its source for the range', async () => {
    const source = createReplaySource('traffic', saved);
    expect(source.label).toBe('Site traffic (replay)');
    await expect(source.fetch(previous, {})).resolves.toEqual([saved[1]]);
  });

  it('fails for a range that was not saved', async () => {
    const source = createReplaySource('search', saved);
    await expect(source.fetch(previous, {})).rejects.toThrow('No saved search data for 2024-05-27 to 2024-06-02');
  });
});

describe('snapshotRange', () => {
  it('picks the current window over the comparison one', () => {
    expect(snapshotRange([makeDataset({ dateRange: previous }), makeDataset()])).toEqual(current);
  });

  it('is undefined for an empty snapshot', () => {
    expect(snapshotRange([])).toBeUndefined();
  });
});
