import { METRIC_ORDER, type MetricName } from '../schema/vocabulary.js';
import type { IdentifiedRecord } from '../registry/id-registry.js';
import { DISPLAY_DECIMALS, MISSING_VALUE } from './values.js';

/**
 * `percent`: relative change against the comparison value.
 * `difference`: comparison minus current, for metrics where lower is better.
 */
export type ChangeKind = 'percent' | 'difference';

export interface MetricChange {
  metric: MetricName;
  kind: ChangeKind;
  value: number;
}

/** Metrics compared as an absolute difference; a positive value is an improvement. */
export const DIFFERENCE_METRICS: readonly MetricName[] = ['position'];

function round(value: number): number {
  const factor = 10 ** DISPLAY_DECIMALS;
  return Math.round(value * factor) / factor;
}

export function metricChange(metric: MetricName, current: number, previous: number): MetricChange {
  if (DIFFERENCE_METRICS.includes(metric)) {
    return { metric, kind: 'difference', value: previous > 0 ? round(previous - current) : 0 };
  }
  if (previous > 0) {
    return { metric, kind: 'percent', value: round(((current - previous) / previous) * 100) };
  }
  return { metric, kind: 'percent', value: current === 0 ? 0 : 100 };
}

/** Change for every metric both records carry, in declared metric order. */
export function recordChanges(current: IdentifiedRecord, previous: IdentifiedRecord): MetricChange[] {
  const changes: MetricChange[] = [];
  for (const metric of METRIC_ORDER) {
    const now = current.metrics[metric];
    const before = previous.metrics[metric];
    if (now === undefined || before === undefined) continue;
    changes.push(metricChange(metric, now, before));
  }
  return changes;
}

/** The comparison-period record for the same entity, if one was identified. */
export function findCounterpart(
  record: IdentifiedRecord,
  candidates: readonly IdentifiedRecord[],
): IdentifiedRecord | undefined {
  return candidates.find(
    c =>
      c.period !== record.period &&
      c.source === record.source &&
      c.dimension === record.dimension &&
      c.naturalKey === record.naturalKey,
  );
}

export function formatChange(change: MetricChange | undefined): string {
  if (change === undefined) return MISSING_VALUE;
  const sign = change.value > 0 ? '+' : change.value < 0 ? '-' : '';
  const magnitude = Math.abs(change.value).toFixed(DISPLAY_DECIMALS);
  return change.kind === 'percent' ? `${sign}${magnitude}%` : `${sign}${magnitude}`;
}
