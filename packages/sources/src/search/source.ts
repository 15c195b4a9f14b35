import {
  GSC_SCHEMA_VERSION,
  SOURCE_LABELS,
  type DateRange,
  type Dimension,
  type FetchContext,
  type RawDataset,
  type RawRow,
  type SourceFetcher,
} from '@citeline/core';
import type { SearchSourceConfig } from '../types.js';
import { querySearchAnalytics, type SearchDimension } from './client.js';
import { findOpportunities } from './opportunities.js';

const DEFAULT_ROW_LIMIT = 10;
const QUERY_ROW_LIMIT = 20;
/** Wider pool the opportunity filter picks from. */
const OPPORTUNITY_POOL = 100;

/** Search Console: overview, queries, opportunities, pages, devices and countries. */
export function createSearchSource(config: SearchSourceConfig): SourceFetcher {
  const limit = config.rowLimit ?? DEFAULT_ROW_LIMIT;

  return {
    id: 'search',
    label: SOURCE_LABELS.search,
    async fetch(range: DateRange, context: FetchContext): Promise<RawDataset[]> {
      const run = (dimensions: SearchDimension[], rowLimit: number) =>
        querySearchAnalytics(config.siteUrl, config.accessToken, range, { dimensions, rowLimit }, context.abortSignal);

      const [overview, queries, pages, devices, countries] = await Promise.all([
        run([], 1),
        run(['query'], OPPORTUNITY_POOL),
        run(['page'], limit),
        run(['device'], limit),
        run(['country'], limit),
      ]);

      const fetchedAt = new Date().toISOString();
      const dataset = (dimension: Dimension, rows: RawRow[]): RawDataset => ({
        source: 'search',
        dimension,
        schemaVersion: GSC_SCHEMA_VERSION,
        dateRange: range,
        rows,
        fetchedAt,
      });

      return [
        dataset('overview', overview),
        dataset('query', queries.slice(0, QUERY_ROW_LIMIT)),
        dataset('opportunity', findOpportunities(queries)),
        dataset('page', pages),
        dataset('device', devices),
        dataset('geography', countries),
      ];
    },
  };
}
