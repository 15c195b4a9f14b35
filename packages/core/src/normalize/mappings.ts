import { z } from 'zod';
import {
  DIMENSIONS,
  SOURCE_IDS,
  isMetricName,
  type Dimension,
  type MetricName,
  type SourceId,
} from '../schema/vocabulary.js';

/**
 * Field-mapping tables, one per (source, dimension, provider schema version).
 *
 * These are the only place that knows provider field names. Every canonical
 * metric names exactly one raw field; raw fields that are expected but not
 * wanted go in `drop`.
 */

export const GA4_SCHEMA_VERSION = 'ga4-data-v1beta';
export const GSC_SCHEMA_VERSION = 'gsc-v3';
export const GADS_SCHEMA_VERSION = 'gads-v18';

const MICROS = 1e-6;

const MetricSourceSchema = z.union([
  z.string().min(1),
  z.object({ field: z.string().min(1), scale: z.number().positive() }).strict(),
]);

export const FieldMappingSchema = z
  .object({
    source: z.enum(SOURCE_IDS),
    dimension: z.enum(DIMENSIONS),
    schemaVersion: z.string().min(1),
    naturalKey: z.array(z.string().min(1)),
    metrics: z.record(z.string(), MetricSourceSchema),
    required: z.array(z.string().min(1)),
    drop: z.array(z.string().min(1)).default([]),
    shareOf: z.string().optional(),
  })
  .strict()
  .superRefine((mapping, ctx) => {
    const seen = new Map<string, string>();
    const claim = (field: string, owner: string) => {
      const previous = seen.get(field);
      if (previous !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Raw field "${field}" is used by both ${previous} and ${owner}`,
        });
      }
      seen.set(field, owner);
    };

    for (const field of mapping.naturalKey) claim(field, 'naturalKey');
    for (const [metric, source] of Object.entries(mapping.metrics)) {
      if (!isMetricName(metric)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Metric "${metric}" is not in the canonical vocabulary`,
        });
      }
      claim(typeof source === 'string' ? source : source.field, `metric ${metric}`);
    }
    for (const field of mapping.drop) claim(field, 'drop');

    const known = new Set(seen.keys());
    for (const field of mapping.required) {
      if (!known.has(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Required field "${field}" is not mapped`,
        });
      }
    }
    if (mapping.shareOf !== undefined && !(mapping.shareOf in mapping.metrics)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `shareOf "${mapping.shareOf}" is not a mapped metric`,
      });
    }
  });

export type MetricSource = z.infer<typeof MetricSourceSchema>;

export interface FieldMapping {
  source: SourceId;
  dimension: Dimension;
  schemaVersion: string;
  /** Raw fields joined with " / " to form the natural key; empty means a totals row. */
  naturalKey: string[];
  metrics: Partial<Record<MetricName, MetricSource>>;
  required: string[];
  drop: string[];
  /** When set, each row also gets a `share` metric: its share of this metric's total. */
  shareOf?: MetricName;
}

// ---------------------------------------------------------------------------
// Mapping tables
// ---------------------------------------------------------------------------

const GA4_ENGAGEMENT = {
  sessions: 'sessions',
  activeUsers: 'activeUsers',
  bounceRate: 'bounceRate',
  avgSessionDuration: 'averageSessionDuration',
} satisfies Partial<Record<MetricName, MetricSource>>;

const GSC_PERFORMANCE = {
  clicks: 'clicks',
  impressions: 'impressions',
  ctr: 'ctr',
  position: 'position',
} satisfies Partial<Record<MetricName, MetricSource>>;

const GADS_PERFORMANCE = {
  cost: { field: 'metrics.costMicros', scale: MICROS },
  clicks: 'metrics.clicks',
  impressions: 'metrics.impressions',
  ctr: 'metrics.ctr',
  averageCpc: { field: 'metrics.averageCpc', scale: MICROS },
  conversions: 'metrics.conversions',
  conversionRate: 'metrics.conversionsFromInteractionsRate',
  costPerConversion: { field: 'metrics.costPerConversion', scale: MICROS },
} satisfies Partial<Record<MetricName, MetricSource>>;

const RAW_MAPPINGS: Array<z.input<typeof FieldMappingSchema>> = [
  // GA4 Data API
  {
    source: 'traffic',
    dimension: 'overview',
    schemaVersion: GA4_SCHEMA_VERSION,
    naturalKey: [],
    metrics: {
      activeUsers: 'activeUsers',
      newUsers: 'newUsers',
      sessions: 'sessions',
      pageViews: 'screenPageViews',
      bounceRate: 'bounceRate',
      engagementRate: 'engagementRate',
      avgSessionDuration: 'averageSessionDuration',
    },
    required: ['sessions', 'activeUsers'],
  },
  {
    source: 'traffic',
    dimension: 'channel',
    schemaVersion: GA4_SCHEMA_VERSION,
    naturalKey: ['sessionSource', 'sessionMedium'],
    metrics: { sessions: 'sessions', activeUsers: 'activeUsers', bounceRate: 'bounceRate' },
    required: ['sessionSource', 'sessionMedium', 'sessions'],
  },
  {
    source: 'traffic',
    dimension: 'page',
    schemaVersion: GA4_SCHEMA_VERSION,
    naturalKey: ['pagePath'],
    metrics: {
      pageViews: 'screenPageViews',
      activeUsers: 'activeUsers',
      bounceRate: 'bounceRate',
      avgSessionDuration: 'averageSessionDuration',
    },
    required: ['pagePath', 'screenPageViews'],
    drop: ['pageTitle'],
  },
  {
    source: 'traffic',
    dimension: 'device',
    schemaVersion: GA4_SCHEMA_VERSION,
    naturalKey: ['deviceCategory'],
    metrics: GA4_ENGAGEMENT,
    required: ['deviceCategory', 'sessions'],
    shareOf: 'sessions',
  },
  {
    source: 'traffic',
    dimension: 'geography',
    schemaVersion: GA4_SCHEMA_VERSION,
    naturalKey: ['country'],
    metrics: { sessions: 'sessions', activeUsers: 'activeUsers' },
    required: ['country', 'sessions'],
    drop: ['countryId'],
    shareOf: 'sessions',
  },

  // Search Console searchAnalytics
  {
    source: 'search',
    dimension: 'overview',
    schemaVersion: GSC_SCHEMA_VERSION,
    naturalKey: [],
    metrics: GSC_PERFORMANCE,
    required: ['clicks', 'impressions'],
  },
  {
    source: 'search',
    dimension: 'query',
    schemaVersion: GSC_SCHEMA_VERSION,
    naturalKey: ['query'],
    metrics: GSC_PERFORMANCE,
    required: ['query', 'clicks', 'impressions'],
  },
  {
    source: 'search',
    dimension: 'opportunity',
    schemaVersion: GSC_SCHEMA_VERSION,
    naturalKey: ['query'],
    metrics: { ...GSC_PERFORMANCE, potentialClicks: 'potentialClicks' },
    required: ['query', 'impressions', 'potentialClicks'],
  },
  {
    source: 'search',
    dimension: 'page',
    schemaVersion: GSC_SCHEMA_VERSION,
    naturalKey: ['page'],
    metrics: GSC_PERFORMANCE,
    required: ['page', 'clicks'],
  },
  {
    source: 'search',
    dimension: 'device',
    schemaVersion: GSC_SCHEMA_VERSION,
    naturalKey: ['device'],
    metrics: GSC_PERFORMANCE,
    required: ['device', 'clicks'],
    shareOf: 'clicks',
  },
  {
    source: 'search',
    dimension: 'geography',
    schemaVersion: GSC_SCHEMA_VERSION,
    naturalKey: ['country'],
    metrics: GSC_PERFORMANCE,
    required: ['country', 'clicks'],
    shareOf: 'clicks',
  },

  // Google Ads searchStream, flattened to dotted paths
  {
    source: 'ads',
    dimension: 'overview',
    schemaVersion: GADS_SCHEMA_VERSION,
    naturalKey: [],
    metrics: GADS_PERFORMANCE,
    required: ['metrics.costMicros', 'metrics.clicks'],
    drop: ['customer.resourceName'],
  },
  {
    source: 'ads',
    dimension: 'campaign',
    schemaVersion: GADS_SCHEMA_VERSION,
    naturalKey: ['campaign.name'],
    metrics: GADS_PERFORMANCE,
    required: ['campaign.name', 'metrics.costMicros'],
    drop: ['campaign.resourceName', 'campaign.id', 'campaign.status'],
  },
];

function narrowMetrics(metrics: Record<string, MetricSource>): Partial<Record<MetricName, MetricSource>> {
  const result: Partial<Record<MetricName, MetricSource>> = {};
  for (const [name, source] of Object.entries(metrics)) {
    if (isMetricName(name)) result[name] = source;
  }
  return result;
}

/** Validate a list of mapping definitions; throws on the first invalid one. */
export function parseMappings(raw: unknown[]): FieldMapping[] {
  return raw.map((entry, index) => {
    const parsed = FieldMappingSchema.safeParse(entry);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new Error(`Invalid field mapping #${index}:\n  ${issues.join('\n  ')}`);
    }
    const { shareOf, metrics, ...rest } = parsed.data;
    return {
      ...rest,
      metrics: narrowMetrics(metrics),
      shareOf: shareOf !== undefined && isMetricName(shareOf) ? shareOf : undefined,
    };
  });
}

export const FIELD_MAPPINGS: readonly FieldMapping[] = parseMappings(RAW_MAPPINGS);

export function findMapping(
  source: SourceId,
  dimension: Dimension,
  schemaVersion: string,
  mappings: readonly FieldMapping[] = FIELD_MAPPINGS,
): FieldMapping | undefined {
  return mappings.find(
    m => m.source === source && m.dimension === dimension && m.schemaVersion === schemaVersion,
  );
}
