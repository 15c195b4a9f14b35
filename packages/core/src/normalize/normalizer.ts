import { SchemaMappingError } from '../errors.js';
import { DEFAULT_PERCENT_METRICS, METRIC_ORDER, type MetricName } from '../schema/vocabulary.js';
import { findMapping, FIELD_MAPPINGS, type FieldMapping, type MetricSource } from './mappings.js';
import type {
  CanonicalRecord,
  MetricValues,
  NormalizeOptions,
  NormalizeResult,
  RawDataset,
  RawRow,
  RawValue,
} from './types.js';

export const DEFAULT_PRECISION = 2;
export const TOTALS_KEY = 'total';
const KEY_SEPARATOR = ' / ';

/** Round half away from zero to `precision` decimal places. */
export function roundTo(value: number, precision: number): number {
  const shifted = Math.round(Number(`${Math.abs(value)}e${precision}`));
  const rounded = Number(`${shifted}e-${precision}`);
  if (!Number.isFinite(rounded)) {
    const factor = 10 ** precision;
    return Math.round(value * factor) / factor;
  }
  return value < 0 ? -rounded : rounded;
}

function isPresent(value: RawValue | undefined): value is string | number | boolean {
  return value !== undefined && value !== null && value !== '';
}

function toNumber(
  value: string | number | boolean,
  dataset: RawDataset,
  field: string,
): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (typeof value === 'boolean' || !Number.isFinite(parsed)) {
    throw new SchemaMappingError(
      `Field "${field}" holds non-numeric value ${JSON.stringify(value)}`,
      dataset.source,
      dataset.dimension,
      field,
    );
  }
  return parsed;
}

function sourceField(source: MetricSource): { field: string; scale: number } {
  return typeof source === 'string' ? { field: source, scale: 1 } : source;
}

/** Every raw field the mapping knows about, mapped or explicitly dropped. */
function knownFields(mapping: FieldMapping): Set<string> {
  const fields = new Set<string>([...mapping.naturalKey, ...mapping.drop]);
  for (const source of Object.values(mapping.metrics)) {
    if (source !== undefined) fields.add(sourceField(source).field);
  }
  return fields;
}

function checkRequired(row: RawRow, mapping: FieldMapping, dataset: RawDataset, index: number): void {
  for (const field of mapping.required) {
    if (!isPresent(row[field])) {
      throw new SchemaMappingError(
        `Required field "${field}" is missing in row ${index + 1} of ${dataset.source}/${dataset.dimension}`,
        dataset.source,
        dataset.dimension,
        field,
      );
    }
  }
}

/**
 * Map one raw dataset onto canonical records.
 *
 * Percentage metrics are converted from ratios exactly once here, and every
 * metric is rounded here; nothing downstream re-rounds.
 */
export function normalize(
  dataset: RawDataset,
  options: NormalizeOptions = {},
  mappings: readonly FieldMapping[] = FIELD_MAPPINGS,
): NormalizeResult {
  const precision = options.precision ?? DEFAULT_PRECISION;
  const percentMetrics = new Set<MetricName>(options.percentMetrics ?? DEFAULT_PERCENT_METRICS);

  const mapping = findMapping(dataset.source, dataset.dimension, dataset.schemaVersion, mappings);
  if (!mapping) {
    throw new SchemaMappingError(
      `No field mapping for ${dataset.source}/${dataset.dimension} at schema version "${dataset.schemaVersion}"`,
      dataset.source,
      dataset.dimension,
    );
  }

  const known = knownFields(mapping);
  const unknown = new Set<string>();
  const mapped = METRIC_ORDER.filter(metric => mapping.metrics[metric] !== undefined);

  const unrounded: Array<{ naturalKey: string; metrics: MetricValues }> = dataset.rows.map((row, index) => {
    checkRequired(row, mapping, dataset, index);

    for (const field of Object.keys(row)) {
      if (!known.has(field)) unknown.add(field);
    }

    const naturalKey = mapping.naturalKey.length === 0
      ? TOTALS_KEY
      : mapping.naturalKey.map(field => String(row[field] ?? '')).join(KEY_SEPARATOR);

    const metrics: MetricValues = {};
    for (const metric of mapped) {
      const source = mapping.metrics[metric];
      if (source === undefined) continue;
      const { field, scale } = sourceField(source);
      const value = row[field];
      if (!isPresent(value)) continue;
      let numeric = toNumber(value, dataset, field) * scale;
      if (percentMetrics.has(metric)) numeric *= 100;
      metrics[metric] = numeric;
    }
    return { naturalKey, metrics };
  });

  if (mapping.shareOf !== undefined) {
    const base = mapping.shareOf;
    const total = unrounded.reduce((sum, r) => sum + (r.metrics[base] ?? 0), 0);
    for (const r of unrounded) {
      r.metrics.share = total > 0 ? ((r.metrics[base] ?? 0) / total) * 100 : 0;
    }
  }

  const records: CanonicalRecord[] = unrounded.map(r => {
    const metrics: MetricValues = {};
    for (const metric of METRIC_ORDER) {
      const value = r.metrics[metric];
      if (value !== undefined) metrics[metric] = roundTo(value, precision);
    }
    return {
      source: dataset.source,
      dimension: dataset.dimension,
      naturalKey: r.naturalKey,
      metrics,
      dateRange: { ...dataset.dateRange },
    };
  });

  const warnings = [...unknown].sort().map(
    field => `${dataset.source}/${dataset.dimension}: dropped unmapped field "${field}"`,
  );

  return { records, warnings };
}
