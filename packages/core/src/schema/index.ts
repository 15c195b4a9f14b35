export {
  VOCABULARY_VERSION,
  SOURCE_IDS,
  DIMENSIONS,
  SOURCE_CODES,
  DIMENSION_CODES,
  SOURCE_LABELS,
  DIMENSION_LABELS,
  METRICS,
  METRIC_ORDER,
  DEFAULT_PERCENT_METRICS,
  SECTION_ORDER,
  type SourceId,
  type Dimension,
  type MetricKind,
  type MetricDefinition,
  type MetricName,
  isMetricName,
  isSourceId,
  isDimension,
  sectionRank,
} from './vocabulary.js';
