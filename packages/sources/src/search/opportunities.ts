import type { RawRow } from '@citeline/core';

/** Queries seen often enough, ranking on the first two pages, but rarely clicked. */
export const OPPORTUNITY_CRITERIA = {
  minImpressions: 50,
  maxCtr: 0.03,
  maxPosition: 20,
  /** CTR assumed reachable when estimating potential clicks. */
  targetCtr: 0.05,
  limit: 10,
} as const;

function numberField(row: RawRow, field: string): number {
  const value = row[field];
  return typeof value === 'number' ? value : Number(value ?? NaN);
}

/**
 * Pick high-impression, low-CTR queries and estimate the clicks a better
 * snippet could earn. Ordered by impressions, largest first.
 */
export function findOpportunities(queryRows: RawRow[], criteria = OPPORTUNITY_CRITERIA): RawRow[] {
  return queryRows
    .filter(row => {
      const impressions = numberField(row, 'impressions');
      return (
        impressions >= criteria.minImpressions &&
        numberField(row, 'ctr') < criteria.maxCtr &&
        numberField(row, 'position') <= criteria.maxPosition
      );
    })
    .sort((a, b) => numberField(b, 'impressions') - numberField(a, 'impressions'))
    .slice(0, criteria.limit)
    .map(row => ({
      ...row,
      potentialClicks: Math.round(numberField(row, 'impressions') * criteria.targetCtr),
    }));
}
