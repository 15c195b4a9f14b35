import type { SourceId, MetricName } from '../schema/vocabulary.js';
import type { DateRange, RawDataset } from '../normalize/types.js';
import type { ReportPeriod } from '../period.js';
import type { PromptInstructions } from '../prompt/composer.js';
import type { ProviderConfig } from '../router/providers.js';
import type { CitationMode, CoverageReport, Omission } from '../verification/types.js';
import type { Section } from '../format/sections.js';
import type { DegradedSourceWarning, ReportStage } from '../errors.js';

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

export interface FetchContext {
  abortSignal?: AbortSignal;
}

/** A data provider's fetch capability: one call per date range. */
export interface SourceFetcher {
  readonly id: SourceId;
  readonly label: string;
  fetch(range: DateRange, context: FetchContext): Promise<RawDataset[]>;
}

export interface SourceSpec {
  id: SourceId;
  /** A required source that fails aborts the run; an optional one is omitted. */
  required: boolean;
  /** Absent when the source is not configured. */
  fetcher?: SourceFetcher;
}

// ---------------------------------------------------------------------------
// Run context
// ---------------------------------------------------------------------------

export interface ReportContext {
  sources: SourceSpec[];
  period: ReportPeriod;
  citationMode: CitationMode;
  modelId: string;
  providerConfig: ProviderConfig;
  maxBudgetUsd: number;
  precision?: number;
  percentMetrics?: readonly MetricName[];
  instructions?: PromptInstructions;
  timeoutMs?: number;
  maxOutputTokens?: number;
  title?: string;
  /** Stop after composing the prompt; no model call. */
  dryRun?: boolean;
  abortSignal?: AbortSignal;
  /** Clock for the footer timestamp. */
  now?: () => Date;
}

export interface ReportUsage {
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
}

export interface ReportDocument {
  title: string;
  period: ReportPeriod;
  modelId: string;
  citationMode: CitationMode;
  generatedAt: string;
  dryRun: boolean;
  /** Final Markdown body: notice, narrative, sections, footer. In a dry run, the prompt. */
  markdown: string;
  prompt: string;
  narrative?: string;
  footer?: string;
  sections: Section[];
  coverage?: CoverageReport;
  omissions: Omission[];
  warnings: string[];
  datasets: RawDataset[];
  usage: ReportUsage;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface StageStartEvent {
  stage: ReportStage;
  stageIndex: number;
  totalStages: number;
}

export interface StageCompleteEvent {
  stage: ReportStage;
  durationMs: number;
  /** Short human-readable summary, e.g. "3 sources, 9 datasets". */
  detail: string;
}

export interface StageErrorEvent {
  stage: ReportStage;
  error: Error;
}

export interface StageSkippedEvent {
  stage: ReportStage;
  reason: string;
}

export interface DatasetsFetchedEvent {
  /** Every dataset a fetch returned, across periods, before any is dropped. */
  datasets: RawDataset[];
}

export interface SourceDegradedEvent {
  warning: DegradedSourceWarning;
  period: string;
}

export interface NormalizeWarningEvent {
  source: SourceId;
  message: string;
}

export interface ReportCompleteEvent {
  report: ReportDocument;
  totalDurationMs: number;
}

export interface ReportErrorEvent {
  error: Error;
  stage?: ReportStage;
}

export interface ReportEvents {
  'stage:start': (event: StageStartEvent) => void;
  'stage:complete': (event: StageCompleteEvent) => void;
  'stage:error': (event: StageErrorEvent) => void;
  'stage:skipped': (event: StageSkippedEvent) => void;
  'datasets:fetched': (event: DatasetsFetchedEvent) => void;
  'source:degraded': (event: SourceDegradedEvent) => void;
  'normalize:warning': (event: NormalizeWarningEvent) => void;
  'report:complete': (event: ReportCompleteEvent) => void;
  'report:error': (event: ReportErrorEvent) => void;
}
