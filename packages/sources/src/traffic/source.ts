import {
  GA4_SCHEMA_VERSION,
  SOURCE_LABELS,
  type DateRange,
  type Dimension,
  type FetchContext,
  type RawDataset,
  type SourceFetcher,
} from '@citeline/core';
import type { TrafficSourceConfig } from '../types.js';
import { runReport, type RunReportRequest } from './client.js';

const DEFAULT_ROW_LIMIT = 10;

function reports(limit: number): Array<[Dimension, RunReportRequest]> {
  return [
    ['overview', {
      dimensions: [],
      metrics: ['activeUsers', 'newUsers', 'sessions', 'screenPageViews', 'bounceRate', 'engagementRate', 'averageSessionDuration'],
    }],
    ['channel', {
      dimensions: ['sessionSource', 'sessionMedium'],
      metrics: ['sessions', 'activeUsers', 'bounceRate'],
      orderBy: 'sessions',
      limit,
    }],
    ['page', {
      dimensions: ['pagePath'],
      metrics: ['screenPageViews', 'activeUsers', 'bounceRate', 'averageSessionDuration'],
      orderBy: 'screenPageViews',
      limit,
    }],
    ['device', {
      dimensions: ['deviceCategory'],
      metrics: ['sessions', 'activeUsers', 'bounceRate', 'averageSessionDuration'],
      orderBy: 'sessions',
    }],
    ['geography', {
      dimensions: ['country'],
      metrics: ['sessions', 'activeUsers'],
      orderBy: 'sessions',
      limit,
    }],
  ];
}

/** GA4 Data API: overview, channels, pages, devices and countries. */
export function createTrafficSource(config: TrafficSourceConfig): SourceFetcher {
  const limit = config.rowLimit ?? DEFAULT_ROW_LIMIT;

  return {
    id: 'traffic',
    label: SOURCE_LABELS.traffic,
    async fetch(range: DateRange, context: FetchContext): Promise<RawDataset[]> {
      const fetchedAt = new Date().toISOString();
      return Promise.all(
        reports(limit).map(async ([dimension, request]) => ({
          source: 'traffic' as const,
          dimension,
          schemaVersion: GA4_SCHEMA_VERSION,
          dateRange: range,
          rows: await runReport(config.propertyId, config.accessToken, range, request, context.abortSignal),
          fetchedAt,
        })),
      );
    },
  };
}
