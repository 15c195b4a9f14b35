import {
  GADS_SCHEMA_VERSION,
  SOURCE_LABELS,
  type DateRange,
  type FetchContext,
  type RawDataset,
  type SourceFetcher,
} from '@citeline/core';
import type { AdsSourceConfig } from '../types.js';
import { accountQuery, campaignQuery, searchStream } from './client.js';

const DEFAULT_ROW_LIMIT = 10;

/** Google Ads: account totals and the most expensive campaigns. */
export function createAdsSource(config: AdsSourceConfig): SourceFetcher {
  const limit = config.rowLimit ?? DEFAULT_ROW_LIMIT;

  return {
    id: 'ads',
    label: SOURCE_LABELS.ads,
    async fetch(range: DateRange, context: FetchContext): Promise<RawDataset[]> {
      const [account, campaigns] = await Promise.all([
        searchStream(config, accountQuery(range), context.abortSignal),
        searchStream(config, campaignQuery(range, limit), context.abortSignal),
      ]);

      const fetchedAt = new Date().toISOString();
      return [
        { source: 'ads', dimension: 'overview', schemaVersion: GADS_SCHEMA_VERSION, dateRange: range, rows: account, fetchedAt },
        { source: 'ads', dimension: 'campaign', schemaVersion: GADS_SCHEMA_VERSION, dateRange: range, rows: campaigns, fetchedAt },
      ];
    },
  };
}
