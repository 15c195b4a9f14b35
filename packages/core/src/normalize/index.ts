export {
  type DateRange,
  type RawValue,
  type RawRow,
  type RawDataset,
  type MetricValues,
  type CanonicalRecord,
  type NormalizeOptions,
  type NormalizeResult,
} from './types.js';

export {
  type FieldMapping,
  type MetricSource,
  FieldMappingSchema,
  FIELD_MAPPINGS,
  GA4_SCHEMA_VERSION,
  GSC_SCHEMA_VERSION,
  GADS_SCHEMA_VERSION,
  parseMappings,
  findMapping,
} from './mappings.js';

export { normalize, roundTo, DEFAULT_PRECISION, TOTALS_KEY } from './normalizer.js';
