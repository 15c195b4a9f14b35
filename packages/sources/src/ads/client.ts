import { z } from 'zod';
import type { DateRange, RawRow } from '@citeline/core';
import { postJson } from '../retry.js';

export const GOOGLE_ADS_API_VERSION = 'v18';
export const GOOGLE_ADS_API_BASE = `https://googleads.googleapis.com/${GOOGLE_ADS_API_VERSION}`;

const SearchStreamResponseSchema = z.array(
  z.object({
    results: z.array(z.record(z.string(), z.unknown())).optional(),
    fieldMask: z.string().optional(),
  }),
);

export interface AdsCredentials {
  customerId: string;
  developerToken: string;
  accessToken: string;
  loginCustomerId?: string;
}

const PERFORMANCE_FIELDS = [
  'metrics.cost_micros',
  'metrics.clicks',
  'metrics.impressions',
  'metrics.ctr',
  'metrics.average_cpc',
  'metrics.conversions',
  'metrics.conversions_from_interactions_rate',
  'metrics.cost_per_conversion',
];

function during(range: DateRange): string {
  return `segments.date BETWEEN '${range.start}' AND '${range.end}'`;
}

export function accountQuery(range: DateRange): string {
  return `SELECT customer.resource_name, ${PERFORMANCE_FIELDS.join(', ')} FROM customer WHERE ${during(range)}`;
}

export function campaignQuery(range: DateRange, limit: number): string {
  return (
    `SELECT campaign.id, campaign.name, campaign.status, ${PERFORMANCE_FIELDS.join(', ')} FROM campaign ` +
    `WHERE ${during(range)} AND campaign.status != 'REMOVED' ORDER BY metrics.cost_micros DESC LIMIT ${limit}`
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `{ campaign: { name } }` becomes `{ 'campaign.name': ... }`. Arrays are skipped. */
export function flattenRow(value: Record<string, unknown>, prefix = ''): RawRow {
  const out: RawRow = {};
  for (const [key, field] of Object.entries(value)) {
    const name = prefix ? `${prefix}.${key}` : key;
    if (isRecord(field)) {
      Object.assign(out, flattenRow(field, name));
    } else if (typeof field === 'string' || typeof field === 'number' || typeof field === 'boolean' || field === null) {
      out[name] = field;
    }
  }
  return out;
}

function stripDashes(id: string): string {
  return id.replace(/-/g, '');
}

/** Run a GAQL query through searchStream and flatten every result row. */
export async function searchStream(
  credentials: AdsCredentials,
  query: string,
  signal?: AbortSignal,
): Promise<RawRow[]> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${credentials.accessToken}`,
    'developer-token': credentials.developerToken,
  };
  if (credentials.loginCustomerId) headers['login-customer-id'] = stripDashes(credentials.loginCustomerId);

  const batches = await postJson({
    url: `${GOOGLE_ADS_API_BASE}/customers/${stripDashes(credentials.customerId)}/googleAds:searchStream`,
    headers,
    body: { query },
    schema: SearchStreamResponseSchema,
    signal,
  });

  return batches.flatMap(batch => (batch.results ?? []).map(result => flattenRow(result)));
}
