import {
  DIMENSION_LABELS,
  SOURCE_CODES,
  SOURCE_LABELS,
  sectionRank,
  type Dimension,
  type SourceId,
} from '../schema/vocabulary.js';
import type { DateRange } from '../normalize/types.js';
import type { IdRegistry, IdentifiedRecord } from '../registry/id-registry.js';

export interface Section {
  /** Unique per run; used in the boundary markers. */
  name: string;
  title: string;
  source: SourceId;
  dimension: Dimension;
  period: string;
  dateRange: DateRange;
  records: IdentifiedRecord[];
}

export function sectionName(source: SourceId, dimension: Dimension, prefix?: string): string {
  const body = `${SOURCE_CODES[source]}-${dimension.toUpperCase()}`;
  return prefix ? `${prefix}-${body}` : body;
}

/**
 * Group a registry's records into one section per (source, dimension), in
 * declared section order. Record order inside a section is ID order.
 */
export function buildSections(registry: IdRegistry, options: { comparison?: boolean } = {}): Section[] {
  const groups = new Map<string, IdentifiedRecord[]>();
  for (const record of registry.records()) {
    const key = `${record.source}:${record.dimension}`;
    const group = groups.get(key);
    if (group) group.push(record);
    else groups.set(key, [record]);
  }

  const sections: Section[] = [];
  for (const records of groups.values()) {
    const first = records[0];
    if (!first) continue;
    const baseTitle = `${SOURCE_LABELS[first.source]}: ${DIMENSION_LABELS[first.dimension]}`;
    sections.push({
      name: sectionName(first.source, first.dimension, registry.prefix),
      title: options.comparison ? `${baseTitle} (comparison period)` : baseTitle,
      source: first.source,
      dimension: first.dimension,
      period: registry.period,
      dateRange: first.dateRange,
      records,
    });
  }

  return sections.sort(
    (a, b) => sectionRank(a.source, a.dimension) - sectionRank(b.source, b.dimension),
  );
}

/** Current-period sections first, each group in declared order. */
export function orderSections(current: Section[], comparison: Section[] = []): Section[] {
  return [...current, ...comparison];
}
