import type { ReportDocument, ReportPipeline, ReportStage } from '@citeline/core';

export type { ReportPipeline };

export type StageStatus = 'pending' | 'running' | 'done' | 'skipped' | 'error';

export interface StageState {
  name: ReportStage;
  status: StageStatus;
  elapsedMs?: number;
  /** Short summary from the stage, or the reason it was skipped. */
  detail?: string;
}

export interface Notice {
  level: 'warning' | 'info';
  message: string;
}

export interface ReportState {
  title: string;
  periodLabel: string;
  model: string;
  budgetUsd: number;
  totalCostUsd: number;
  stages: StageState[];
  currentStageIndex: number;
  notices: Notice[];
  done: boolean;
  error?: string;
  report?: ReportDocument;
}

export interface ReportViewProps {
  title: string;
  periodLabel: string;
  model: string;
  budgetUsd: number;
  pipeline: ReportPipeline;
  verbose?: boolean;
}
