import { describe, it, expect, vi, beforeEach } from 'vitest';
import { normalize } from '@citeline/core';
import { createSearchSource } from './source.js';
import { findOpportunities } from './opportunities.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const range = { start: '2024-06-03', end: '2024-06-09' };

function jsonResponse(body: unknown): Response {
  return { ok: true, status: 200, statusText: 'OK', headers: new Headers(), json: async () => body } as unknown as Response;
}

function requestBody(call: unknown[]): { dimensions: string[]; rowLimit: number } {
  const init = call[1];
  if (typeof init !== 'object' || init === null || !('body' in init)) throw new Error('no body');
  return JSON.parse(String(init.body));
}

beforeEach(() => {
  mockFetch.mockReset();
});

describe('findOpportunities', () => {
  const rows = [
    { query: 'running socks', clicks: 2, impressions: 400, ctr: 0.005, position: 8.4 },
    { query: 'trail shoes', clicks: 30, impressions: 900, ctr: 0.033, position: 4.2 },
    { query: 'hiking boots', clicks: 1, impressions: 1200, ctr: 0.0008, position: 14 },
    { query: 'rare term', clicks: 0, impressions: 49, ctr: 0, position: 3 },
    { query: 'deep page', clicks: 0, impressions: 800, ctr: 0, position: 21 },
  ];

  it('keeps frequent, low-CTR queries ranked in the top 20', () => {
    const result = findOpportunities(rows);
    expect(result.map(r => r.query)).toEqual(['hiking boots', 'running socks']);
  });

  it('estimates potential clicks at a 5% CTR', () => {
    const result = findOpportunities(rows);
    expect(result.map(r => r.potentialClicks)).toEqual([60, 20]);
  });

  it('caps the list', () => {
    const many = Array.from({ length: 15 }, (_, i) => ({ query: `q${i}`, impressions: 100 + i, ctr: 0.01, position: 5 }));
    const result = findOpportunities(many);
    expect(result).toHaveLength(10);
    expect(result[0]?.query).toBe('q14');
  });
});

describe('createSearchSource', () => {
  it('queries the encoded site URL for every breakdown', async () => {
    mockFetch.mockResolvedValue(jsonResponse({}));
    const source = createSearchSource({ siteUrl: 'https://www.example.com/', accessToken: 'test-secret' });

    const datasets = await source.fetch(range, {});

    expect(datasets.map(d => d.dimension)).toEqual(['overview', 'query', 'opportunity', 'page', 'device', 'geography']);
    expect(mockFetch).toHaveBeenCalledTimes(5);
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      'https://searchconsole.googleapis.com/webmasters/v3/sites/https%3A%2F%2Fwww.example.com%2F/searchAnalytics/query',
    );
    expect(mockFetch.mock.calls.map(call => requestBody(call).dimensions)).toEqual([
      [], ['query'], ['page'], ['device'], ['country'],
    ]);
    expect(requestBody(mockFetch.mock.calls[1] ?? []).rowLimit).toBe(100);
  });

  it('keys rows by dimension name and derives opportunities from the query pool', async () => {
    const queryRows = Array.from({ length: 25 }, (_, i) => ({
      keys: [`query ${i}`],
      clicks: 100 - i,
      impressions: 1000 + i,
      ctr: i === 24 ? 0.01 : 0.1,
      position: 3,
    }));
    mockFetch.mockImplementation(async (_url: string, init: { body: string }) => {
      const body = JSON.parse(init.body);
      if (body.dimensions[0] === 'query') return jsonResponse({ rows: queryRows });
      if (body.dimensions.length === 0) return jsonResponse({ rows: [{ clicks: 500, impressions: 20000, ctr: 0.025, position: 7.25 }] });
      return jsonResponse({ rows: [] });
    });
    const source = createSearchSource({ siteUrl: 'sc-domain:example.com', accessToken: 'test-secret' });

    const datasets = await source.fetch(range, {});
    const byDimension = new Map(datasets.map(d => [d.dimension, d]));

    expect(byDimension.get('overview')?.rows).toEqual([{ clicks: 500, impressions: 20000, ctr: 0.025, position: 7.25 }]);
    expect(byDimension.get('query')?.rows).toHaveLength(20);
    expect(byDimension.get('query')?.rows[0]).toEqual({ query: 'query 0', clicks: 100, impressions: 1000, ctr: 0.1, position: 3 });
    expect(byDimension.get('opportunity')?.rows).toEqual([
      { query: 'query 24', clicks: 76, impressions: 1024, ctr: 0.01, position: 3, potentialClicks: 51 },
    ]);

    const overview = byDimension.get('overview');
    if (!overview) throw new Error('overview missing');
    expect(normalize(overview).records[0]?.metrics).toEqual({ clicks: 500, impressions: 20000, ctr: 2.5, position: 7.25 });
  });
});
