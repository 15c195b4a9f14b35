import { z } from 'zod';
import type { DateRange, RawRow } from '@citeline/core';
import { postJson } from '../retry.js';

export const SEARCH_CONSOLE_API_BASE = 'https://searchconsole.googleapis.com/webmasters/v3';

const SearchAnalyticsResponseSchema = z.object({
  rows: z
    .array(
      z.object({
        keys: z.array(z.string()).optional(),
        clicks: z.number(),
        impressions: z.number(),
        ctr: z.number(),
        position: z.number(),
      }),
    )
    .optional(),
  responseAggregationType: z.string().optional(),
});

export type SearchDimension = 'query' | 'page' | 'device' | 'country';

export interface SearchQuery {
  dimensions: SearchDimension[];
  rowLimit: number;
}

/** Rows keyed by the requested dimension names plus the four performance metrics. */
export async function querySearchAnalytics(
  siteUrl: string,
  accessToken: string,
  range: DateRange,
  query: SearchQuery,
  signal?: AbortSignal,
): Promise<RawRow[]> {
  const response = await postJson({
    url: `${SEARCH_CONSOLE_API_BASE}/sites/${encodeURIComponent(siteUrl)}/searchAnalytics/query`,
    headers: { Authorization: `Bearer ${accessToken}` },
    body: {
      startDate: range.start,
      endDate: range.end,
      dimensions: query.dimensions,
      rowLimit: query.rowLimit,
    },
    schema: SearchAnalyticsResponseSchema,
    signal,
  });

  return (response.rows ?? []).map(row => {
    const out: RawRow = {};
    query.dimensions.forEach((name, i) => {
      out[name] = row.keys?.[i] ?? null;
    });
    out.clicks = row.clicks;
    out.impressions = row.impressions;
    out.ctr = row.ctr;
    out.position = row.position;
    return out;
  });
}
