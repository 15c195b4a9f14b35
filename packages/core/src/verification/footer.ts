import { DIMENSION_LABELS, SOURCE_LABELS, type Dimension, type MetricName, type SourceId } from '../schema/vocabulary.js';
import { formatRange, type ReportPeriod } from '../period.js';
import { CURRENT_PERIOD, type CitationResolver, type IdentifiedRecord } from '../registry/id-registry.js';
import { TOTALS_KEY } from '../normalize/normalizer.js';
import { formatValue, metricLabel } from '../format/values.js';
import { findCounterpart, formatChange, metricChange, type MetricChange } from '../format/changes.js';
import type { CoverageReport, Omission } from './types.js';

interface KeyMetricSpec {
  source: SourceId;
  dimension: Dimension;
  metrics: MetricName[];
  /** Records taken from the top of the section. */
  limit: number;
}

export const KEY_METRICS: KeyMetricSpec[] = [
  { source: 'traffic', dimension: 'overview', metrics: ['activeUsers', 'sessions', 'pageViews', 'bounceRate', 'engagementRate'], limit: 1 },
  { source: 'search', dimension: 'overview', metrics: ['clicks', 'impressions', 'ctr', 'position'], limit: 1 },
  { source: 'search', dimension: 'query', metrics: ['clicks', 'impressions'], limit: 5 },
  { source: 'ads', dimension: 'overview', metrics: ['cost', 'clicks', 'conversions'], limit: 1 },
];

export interface FooterInput {
  resolver: CitationResolver;
  coverage: CoverageReport;
  period: ReportPeriod;
  generatedAt: Date;
  omissions?: Omission[];
}

export interface KeyMetricRow {
  id: string;
  label: string;
  metric: MetricName;
  current: number;
  comparison?: number;
  change?: MetricChange;
}

function subject(record: IdentifiedRecord): string {
  if (record.naturalKey === TOTALS_KEY) return SOURCE_LABELS[record.source];
  return `${DIMENSION_LABELS[record.dimension]} "${record.naturalKey}"`;
}

/**
 * Pick the footer's key figures straight from identified records. Narrative
 * text is never consulted.
 */
export function collectKeyMetrics(resolver: CitationResolver): KeyMetricRow[] {
  const all = resolver.records();
  const current = all.filter(r => r.period === CURRENT_PERIOD);
  const previous = all.filter(r => r.period !== CURRENT_PERIOD);

  const rows: KeyMetricRow[] = [];
  for (const spec of KEY_METRICS) {
    const records = current
      .filter(r => r.source === spec.source && r.dimension === spec.dimension)
      .slice(0, spec.limit);

    for (const record of records) {
      const match = findCounterpart(record, previous);
      for (const metric of spec.metrics) {
        const value = record.metrics[metric];
        if (value === undefined) continue;
        const comparison = match?.metrics[metric];
        rows.push({
          id: record.id,
          label: `${subject(record)}: ${metricLabel(metric)}`,
          metric,
          current: value,
          comparison,
          change: comparison === undefined ? undefined : metricChange(metric, value, comparison),
        });
      }
    }
  }
  return rows;
}

function percent(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}

function omissionLine(omission: Omission): string {
  const scope = omission.dimension ? `${omission.source}/${omission.dimension}` : omission.source;
  const when = omission.period === CURRENT_PERIOD ? 'current period' : 'comparison period';
  return `- ${scope} (${when}): ${omission.reason}`;
}

/** Build the verification appendix. Pure: same input, same text. */
export function buildFooter(input: FooterInput): string {
  const { coverage, period } = input;
  const withComparison = period.comparison !== undefined;
  const lines: string[] = [
    '## Data verification',
    '',
    `- Current period: ${formatRange(period.current)}`,
  ];
  if (period.comparison) lines.push(`- Comparison period: ${formatRange(period.comparison)}`);
  lines.push(`- Generated at: ${input.generatedAt.toISOString()}`, '');

  const keyMetrics = collectKeyMetrics(input.resolver);
  lines.push('### Key metrics', '');
  if (keyMetrics.length === 0) {
    lines.push('No key metrics available.');
  } else {
    lines.push(
      withComparison ? '| Record | Metric | Current | Comparison | Change |' : '| Record | Metric | Current |',
      withComparison ? '| --- | --- | ---: | ---: | ---: |' : '| --- | --- | ---: |',
    );
    for (const row of keyMetrics) {
      const cells = [row.id, row.label.replace(/\|/g, '\\|'), formatValue(row.metric, row.current)];
      if (withComparison) cells.push(formatValue(row.metric, row.comparison), formatChange(row.change));
      lines.push(`| ${cells.join(' | ')} |`);
    }
    if (withComparison && keyMetrics.some(row => row.change?.kind === 'difference')) {
      lines.push('', 'Change is relative to the comparison period; for average position it is the number of places gained.');
    }
  }

  lines.push(
    '',
    '### Citation coverage',
    '',
    `- Citations in narrative: ${coverage.totalCitations} (${coverage.validCitations} valid)`,
    `- Claims with citations: ${coverage.claimsWithCitations}`,
    `- Records cited: ${coverage.citedIds.length} of ${coverage.availableIds} (${percent(coverage.coverage)})`,
  );
  if (coverage.uncitedNumericClaims > 0) {
    lines.push(`- Numeric statements without a citation: ${coverage.uncitedNumericClaims}`);
  }
  if (coverage.invalidCitations.length > 0) {
    lines.push(`- Removed unresolved citations: ${coverage.invalidCitations.join(', ')}`);
  }

  const omissions = input.omissions ?? [];
  lines.push('', '### Omitted data', '');
  if (omissions.length === 0) lines.push('- None');
  else lines.push(...omissions.map(omissionLine));

  return lines.join('\n');
}
