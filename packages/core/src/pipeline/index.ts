export {
  type FetchContext,
  type SourceFetcher,
  type SourceSpec,
  type ReportContext,
  type ReportUsage,
  type ReportDocument,
  type StageStartEvent,
  type StageCompleteEvent,
  type StageErrorEvent,
  type StageSkippedEvent,
  type DatasetsFetchedEvent,
  type SourceDegradedEvent,
  type NormalizeWarningEvent,
  type ReportCompleteEvent,
  type ReportErrorEvent,
  type ReportEvents,
} from './types.js';

export { ReportPipeline, REPORT_STAGES } from './engine.js';
