import { METRICS, type MetricName } from '../schema/vocabulary.js';

export const DISPLAY_DECIMALS = 2;
export const MISSING_VALUE = 'n/a';

/**
 * Display form of a stored metric value. Shared by the section tables and
 * the verification footer so both show the same figure for a record.
 */
export function formatValue(metric: MetricName, value: number | undefined): string {
  if (value === undefined) return MISSING_VALUE;

  switch (METRICS[metric].kind) {
    case 'percent':
      return `${value.toFixed(DISPLAY_DECIMALS)}%`;
    case 'count':
      return Number.isInteger(value) ? String(value) : value.toFixed(DISPLAY_DECIMALS);
    case 'decimal':
    case 'duration':
    case 'currency':
      return value.toFixed(DISPLAY_DECIMALS);
  }
}

export function metricLabel(metric: MetricName): string {
  return METRICS[metric].label;
}
