/**
 * Canonical vocabulary shared by every stage: sources, dimensions and the
 * metric names a normalized record may carry.
 *
 * Bump VOCABULARY_VERSION whenever a metric is added, removed or renamed.
 */

export const VOCABULARY_VERSION = '2024.1';

export const SOURCE_IDS = ['traffic', 'search', 'ads'] as const;
export type SourceId = (typeof SOURCE_IDS)[number];

export const DIMENSIONS = [
  'overview',
  'channel',
  'page',
  'device',
  'geography',
  'query',
  'opportunity',
  'campaign',
] as const;
export type Dimension = (typeof DIMENSIONS)[number];

/** Short codes used inside record IDs (`GA4-DEV-001`). */
export const SOURCE_CODES: Record<SourceId, string> = {
  traffic: 'GA4',
  search: 'GSC',
  ads: 'ADS',
};

export const DIMENSION_CODES: Record<Dimension, string> = {
  overview: 'OV',
  channel: 'SRC',
  page: 'PAGE',
  device: 'DEV',
  geography: 'GEO',
  query: 'KW',
  opportunity: 'OPP',
  campaign: 'CMP',
};

export const SOURCE_LABELS: Record<SourceId, string> = {
  traffic: 'Site traffic',
  search: 'Search performance',
  ads: 'Ad spend',
};

export const DIMENSION_LABELS: Record<Dimension, string> = {
  overview: 'Overview',
  channel: 'Traffic channels',
  page: 'Top pages',
  device: 'Devices',
  geography: 'Countries',
  query: 'Top queries',
  opportunity: 'Query opportunities',
  campaign: 'Campaigns',
};

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export type MetricKind = 'count' | 'percent' | 'decimal' | 'duration' | 'currency';

export interface MetricDefinition {
  label: string;
  kind: MetricKind;
}

/**
 * Declared metric order. Table columns follow the order of this object.
 */
export const METRICS = {
  activeUsers: { label: 'Active users', kind: 'count' },
  newUsers: { label: 'New users', kind: 'count' },
  sessions: { label: 'Sessions', kind: 'count' },
  pageViews: { label: 'Page views', kind: 'count' },
  clicks: { label: 'Clicks', kind: 'count' },
  impressions: { label: 'Impressions', kind: 'count' },
  potentialClicks: { label: 'Potential clicks', kind: 'count' },
  conversions: { label: 'Conversions', kind: 'decimal' },
  share: { label: 'Share', kind: 'percent' },
  ctr: { label: 'CTR', kind: 'percent' },
  bounceRate: { label: 'Bounce rate', kind: 'percent' },
  engagementRate: { label: 'Engagement rate', kind: 'percent' },
  conversionRate: { label: 'Conversion rate', kind: 'percent' },
  position: { label: 'Avg. position', kind: 'decimal' },
  avgSessionDuration: { label: 'Avg. session duration (s)', kind: 'duration' },
  avgEngagementTime: { label: 'Avg. engagement time (s)', kind: 'duration' },
  cost: { label: 'Cost', kind: 'currency' },
  costPerConversion: { label: 'Cost / conversion', kind: 'currency' },
  averageCpc: { label: 'Avg. CPC', kind: 'currency' },
} as const satisfies Record<string, MetricDefinition>;

export type MetricName = keyof typeof METRICS;

export const METRIC_ORDER: readonly MetricName[] = Object.keys(METRICS).filter(isMetricName);

export function isMetricName(name: string): name is MetricName {
  return Object.prototype.hasOwnProperty.call(METRICS, name);
}

export function isSourceId(value: string): value is SourceId {
  return SOURCE_IDS.some(id => id === value);
}

export function isDimension(value: string): value is Dimension {
  return DIMENSIONS.some(d => d === value);
}

/** Metrics whose raw values arrive as 0–1 ratios. */
export const DEFAULT_PERCENT_METRICS: readonly MetricName[] = [
  'bounceRate',
  'engagementRate',
  'ctr',
  'conversionRate',
];

// ---------------------------------------------------------------------------
// Section order
// ---------------------------------------------------------------------------

export const SECTION_ORDER: ReadonlyArray<readonly [SourceId, Dimension]> = [
  ['traffic', 'overview'],
  ['traffic', 'channel'],
  ['traffic', 'page'],
  ['traffic', 'device'],
  ['traffic', 'geography'],
  ['search', 'overview'],
  ['search', 'query'],
  ['search', 'opportunity'],
  ['search', 'page'],
  ['search', 'device'],
  ['search', 'geography'],
  ['ads', 'overview'],
  ['ads', 'campaign'],
];

export function sectionRank(source: SourceId, dimension: Dimension): number {
  const idx = SECTION_ORDER.findIndex(([s, d]) => s === source && d === dimension);
  return idx === -1 ? SECTION_ORDER.length : idx;
}
