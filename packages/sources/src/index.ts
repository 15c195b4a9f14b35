export {
  type GoogleAuth,
  type TrafficSourceConfig,
  type SearchSourceConfig,
  type AdsSourceConfig,
  type SourceEntryConfig,
  type SourcesConfig,
  type SourceStatus,
} from './types.js';

export { fetchWithRetry, postJson, HttpError, type FetchRetryConfig, type JsonRequest } from './retry.js';

export { createTrafficSource } from './traffic/source.js';
export { runReport, reportRows, propertyPath, GA4_API_BASE, type RunReportRequest } from './traffic/client.js';

export { createSearchSource } from './search/source.js';
export { querySearchAnalytics, SEARCH_CONSOLE_API_BASE, type SearchDimension } from './search/client.js';
export { findOpportunities, OPPORTUNITY_CRITERIA } from './search/opportunities.js';

export { createAdsSource } from './ads/source.js';
export { searchStream, flattenRow, accountQuery, campaignQuery, GOOGLE_ADS_API_BASE } from './ads/client.js';

export { createReplaySource, loadSnapshot, snapshotRange } from './replay.js';
export { SourceRegistry } from './registry.js';
