export * from './schema/index.js';
export * from './normalize/index.js';
export * from './registry/index.js';
export * from './format/index.js';
export * from './prompt/index.js';
export * from './router/index.js';
export * from './generate/index.js';
export * from './verification/index.js';
export * from './pipeline/index.js';
export * from './output/index.js';

export {
  type ReportStage,
  ReportError,
  SchemaMappingError,
  EmptyInputError,
  InvalidCitationError,
  ExternalCallError,
  SourceFetchError,
  PromptTooLargeError,
  PeriodError,
  DegradedSourceWarning,
} from './errors.js';

export {
  type PeriodPreset,
  type ReportPeriod,
  type ResolvePeriodOptions,
  type ResolvedPeriod,
  PERIOD_PRESETS,
  resolvePeriod,
  previousPeriod,
  formatRange,
  rangeLength,
  addDays,
  parseIsoDate,
  toIsoDate,
} from './period.js';
