export {
  type CitationMode,
  type CitationMatch,
  type CoverageReport,
  type ValidationResult,
  type Omission,
  omissionFromWarning,
} from './types.js';

export {
  CITATION_PATTERN,
  extractCitations,
  splitClaims,
  validateCitations,
} from './citations.js';

export {
  type FooterInput,
  type KeyMetricRow,
  KEY_METRICS,
  collectKeyMetrics,
  buildFooter,
} from './footer.js';
