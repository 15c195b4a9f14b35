import {
  SOURCE_LABELS,
  formatRange,
  loadDatasets,
  type DateRange,
  type RawDataset,
  type SourceFetcher,
  type SourceId,
} from '@citeline/core';

function sameRange(a: DateRange, b: DateRange): boolean {
  return a.start === b.start && a.end === b.end;
}

/**
 * Serve previously saved datasets instead of calling the provider. A range
 * with nothing saved fails like an unreachable source would.
 */
export function createReplaySource(id: SourceId, datasets: RawDataset[]): SourceFetcher {
  const own = datasets.filter(d => d.source === id);

  return {
    id,
    label: `${SOURCE_LABELS[id]} (replay)`,
    async fetch(range: DateRange): Promise<RawDataset[]> {
      const matching = own.filter(d => sameRange(d.dateRange, range));
      if (matching.length === 0) {
        throw new Error(`No saved ${id} data for ${formatRange(range)}`);
      }
      return matching;
    },
  };
}

/**
 * The report window a snapshot was saved for: the range with the latest
 * start, the comparison window always preceding it.
 */
export function snapshotRange(datasets: RawDataset[]): DateRange | undefined {
  let latest: DateRange | undefined;
  for (const { dateRange } of datasets) {
    if (!latest || dateRange.start > latest.start || (dateRange.start === latest.start && dateRange.end > latest.end)) {
      latest = dateRange;
    }
  }
  return latest;
}

/** Read a snapshot written with `saveDatasets`. */
export function loadSnapshot(path: string): RawDataset[] {
  return loadDatasets(path);
}
