import { InvalidCitationError } from '../errors.js';
import type { CitationResolver } from '../registry/id-registry.js';
import type { CitationMatch, CitationMode, CoverageReport, ValidationResult } from './types.js';

/**
 * `[<SOURCE>-<DIM>-<NNN>]`, optionally period-prefixed (`[PREV-GA4-DEV-001]`).
 * Case-sensitive.
 */
export const CITATION_PATTERN = /\[((?:[A-Z]+-)?[A-Z][A-Z0-9]*-[A-Z]+-\d{3,})\]/g;

/** Same pattern with the horizontal whitespace in front of the token, for stripping. */
const STRIPPABLE_CITATION = /[ \t]*\[((?:[A-Z]+-)?[A-Z][A-Z0-9]*-[A-Z]+-\d{3,})\]/g;
const LEADING_CITATION = /^\[((?:[A-Z]+-)?[A-Z][A-Z0-9]*-[A-Z]+-\d{3,})\][ \t]*/gm;

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
const HAS_DIGIT = /\d/;

export function extractCitations(text: string): CitationMatch[] {
  const matches: CitationMatch[] = [];
  for (const match of text.matchAll(CITATION_PATTERN)) {
    const id = match[1];
    if (id === undefined || match.index === undefined) continue;
    matches.push({ id, raw: match[0], index: match.index });
  }
  return matches;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/** Split narrative prose into claim units: sentences within non-heading lines. */
export function splitClaims(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#') && !/^\|?\s*-{3,}/.test(line))
    .flatMap(line => line.split(SENTENCE_BOUNDARY))
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 0);
}

function stripInvalid(text: string, invalid: Set<string>): string {
  const drop = (token: string, id: string): string => (invalid.has(id) ? '' : token);
  return text.replace(LEADING_CITATION, drop).replace(STRIPPABLE_CITATION, drop);
}

function measure(
  narrative: string,
  resolver: CitationResolver,
  totalCitations: number,
  validCitations: number,
  invalidCitations: string[],
): CoverageReport {
  let claimsWithCitations = 0;
  let uncitedNumericClaims = 0;
  for (const claim of splitClaims(narrative)) {
    const cited = extractCitations(claim).some(c => resolver.resolve(c.id) !== undefined);
    if (cited) claimsWithCitations++;
    else if (HAS_DIGIT.test(claim)) uncitedNumericClaims++;
  }

  const citedIds = unique(
    extractCitations(narrative)
      .map(c => c.id)
      .filter(id => resolver.resolve(id) !== undefined),
  );
  const availableIds = resolver.size;

  return {
    totalCitations,
    validCitations,
    claimsWithCitations,
    uncitedNumericClaims,
    availableIds,
    citedIds,
    coverage: availableIds > 0 ? citedIds.length / availableIds : 0,
    invalidCitations,
  };
}

/**
 * Check every citation token in `narrative` against `resolver`.
 *
 * strict: any unresolved ID throws InvalidCitationError naming all of them.
 * lenient: unresolved tokens are removed and listed in the coverage report.
 */
export function validateCitations(
  narrative: string,
  resolver: CitationResolver,
  options: { mode: CitationMode },
): ValidationResult {
  const citations = extractCitations(narrative);
  const invalid = unique(citations.map(c => c.id).filter(id => resolver.resolve(id) === undefined));
  const validCount = citations.filter(c => resolver.resolve(c.id) !== undefined).length;

  if (invalid.length > 0 && options.mode === 'strict') {
    throw new InvalidCitationError(invalid);
  }

  const validated = invalid.length > 0 ? stripInvalid(narrative, new Set(invalid)) : narrative;

  return {
    narrative: validated,
    coverage: measure(validated, resolver, citations.length, validCount, invalid),
  };
}
