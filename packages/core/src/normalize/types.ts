import type { Dimension, MetricName, SourceId } from '../schema/vocabulary.js';

/** Inclusive ISO date range (`YYYY-MM-DD`). */
export interface DateRange {
  start: string;
  end: string;
}

export type RawValue = string | number | boolean | null;
export type RawRow = Record<string, RawValue>;

/**
 * One provider response for one dimension, as returned by a fetch
 * capability. Field names are whatever the provider uses.
 */
export interface RawDataset {
  source: SourceId;
  dimension: Dimension;
  /** Provider schema version; selects the mapping table. */
  schemaVersion: string;
  dateRange: DateRange;
  rows: RawRow[];
  fetchedAt?: string;
}

export type MetricValues = Partial<Record<MetricName, number>>;

export interface CanonicalRecord {
  source: SourceId;
  dimension: Dimension;
  naturalKey: string;
  metrics: MetricValues;
  dateRange: DateRange;
}

export interface NormalizeOptions {
  /** Decimal places kept on every metric. Default 2. */
  precision?: number;
  /** Metrics whose raw values are 0–1 ratios and get multiplied by 100. */
  percentMetrics?: readonly MetricName[];
}

export interface NormalizeResult {
  records: CanonicalRecord[];
  warnings: string[];
}
