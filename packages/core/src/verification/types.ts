/**
 * Citation verification types.
 *
 * The narrative is untrusted input: every `[ID]` token it contains is
 * checked against the run's registries before the report is assembled.
 */

import type { SourceId } from '../schema/vocabulary.js';
import type { DegradedSourceWarning } from '../errors.js';

export type CitationMode = 'strict' | 'lenient';

/** One citation token found in narrative text. */
export interface CitationMatch {
  id: string;
  /** The token as written, brackets included. */
  raw: string;
  /** Offset of the opening bracket. */
  index: number;
}

export interface CoverageReport {
  /** Citation tokens in the narrative as generated. */
  totalCitations: number;
  /** Tokens that resolved to a record. */
  validCitations: number;
  /** Sentences or lines that carry at least one valid citation. */
  claimsWithCitations: number;
  /** Sentences that state a number but cite nothing. */
  uncitedNumericClaims: number;
  /** IDs available across the run's registries. */
  availableIds: number;
  /** Distinct valid IDs cited, in first-seen order. */
  citedIds: string[];
  /** citedIds / availableIds, 0 when nothing was available. */
  coverage: number;
  /** Distinct unresolved IDs, in first-seen order. */
  invalidCitations: string[];
}

export interface ValidationResult {
  narrative: string;
  coverage: CoverageReport;
}

/** A section or source left out of the report, and why. */
export interface Omission {
  source: SourceId;
  dimension?: string;
  period: string;
  reason: string;
}

export function omissionFromWarning(warning: DegradedSourceWarning, period: string): Omission {
  return {
    source: warning.source,
    dimension: warning.dimension,
    period,
    reason: warning.reason,
  };
}
