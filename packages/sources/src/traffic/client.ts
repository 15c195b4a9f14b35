import { z } from 'zod';
import type { DateRange, RawRow } from '@citeline/core';
import { postJson } from '../retry.js';

export const GA4_API_BASE = 'https://analyticsdata.googleapis.com/v1beta';

const RunReportResponseSchema = z.object({
  dimensionHeaders: z.array(z.object({ name: z.string() })).optional(),
  metricHeaders: z.array(z.object({ name: z.string(), type: z.string().optional() })).optional(),
  rows: z
    .array(
      z.object({
        dimensionValues: z.array(z.object({ value: z.string().optional() })).optional(),
        metricValues: z.array(z.object({ value: z.string().optional() })).optional(),
      }),
    )
    .optional(),
  rowCount: z.number().optional(),
});

export type RunReportResponse = z.infer<typeof RunReportResponseSchema>;

export interface RunReportRequest {
  dimensions: string[];
  metrics: string[];
  /** Metric to sort by, descending. */
  orderBy?: string;
  limit?: number;
}

export function propertyPath(propertyId: string): string {
  return propertyId.startsWith('properties/') ? propertyId : `properties/${propertyId}`;
}

/**
 * Flatten a runReport response into rows keyed by the header names the
 * API returned.
 */
export function reportRows(response: RunReportResponse): RawRow[] {
  const dimensionNames = (response.dimensionHeaders ?? []).map(h => h.name);
  const metricNames = (response.metricHeaders ?? []).map(h => h.name);

  return (response.rows ?? []).map(row => {
    const out: RawRow = {};
    dimensionNames.forEach((name, i) => {
      out[name] = row.dimensionValues?.[i]?.value ?? null;
    });
    metricNames.forEach((name, i) => {
      out[name] = row.metricValues?.[i]?.value ?? null;
    });
    return out;
  });
}

export async function runReport(
  propertyId: string,
  accessToken: string,
  range: DateRange,
  request: RunReportRequest,
  signal?: AbortSignal,
): Promise<RawRow[]> {
  const body: Record<string, unknown> = {
    dateRanges: [{ startDate: range.start, endDate: range.end }],
    dimensions: request.dimensions.map(name => ({ name })),
    metrics: request.metrics.map(name => ({ name })),
  };
  if (request.orderBy) body.orderBys = [{ metric: { metricName: request.orderBy }, desc: true }];
  if (request.limit !== undefined) body.limit = String(request.limit);

  const response = await postJson({
    url: `${GA4_API_BASE}/${propertyPath(propertyId)}:runReport`,
    headers: { Authorization: `Bearer ${accessToken}` },
    body,
    schema: RunReportResponseSchema,
    signal,
  });
  return reportRows(response);
}
