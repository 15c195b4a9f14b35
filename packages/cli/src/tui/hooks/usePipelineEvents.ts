import { useState, useEffect } from 'react';
import {
  REPORT_STAGES,
  type ReportCompleteEvent,
  type ReportErrorEvent,
  type SourceDegradedEvent,
  type NormalizeWarningEvent,
  type StageStartEvent,
  type StageCompleteEvent,
  type StageErrorEvent,
  type StageSkippedEvent,
} from '@citeline/core';
import type { ReportState, ReportViewProps, StageState } from '../types.js';

export function initialReportState(props: ReportViewProps): ReportState {
  return {
    title: props.title,
    periodLabel: props.periodLabel,
    model: props.model,
    budgetUsd: props.budgetUsd,
    totalCostUsd: 0,
    stages: REPORT_STAGES.map(name => ({ name, status: 'pending' as const })),
    currentStageIndex: 0,
    notices: [],
    done: false,
  };
}

function updateStage(prev: ReportState, index: number, patch: Partial<StageState>): StageState[] {
  return prev.stages.map((stage, i) => (i === index ? { ...stage, ...patch } : stage));
}

export function usePipelineEvents(props: ReportViewProps): ReportState {
  const { pipeline, verbose } = props;
  const [state, setState] = useState<ReportState>(() => initialReportState(props));

  useEffect(() => {
    const indexOf = (stage: StageState['name']) => REPORT_STAGES.indexOf(stage);

    const onStageStart = (event: StageStartEvent) => {
      setState(prev => ({
        ...prev,
        stages: updateStage(prev, event.stageIndex, { status: 'running', elapsedMs: 0 }),
        currentStageIndex: event.stageIndex,
      }));
    };

    const onStageComplete = (event: StageCompleteEvent) => {
      setState(prev => ({
        ...prev,
        stages: updateStage(prev, indexOf(event.stage), {
          status: 'done',
          elapsedMs: event.durationMs,
          detail: event.detail || undefined,
        }),
      }));
    };

    const onStageSkipped = (event: StageSkippedEvent) => {
      setState(prev => ({
        ...prev,
        stages: updateStage(prev, indexOf(event.stage), { status: 'skipped', detail: event.reason }),
      }));
    };

    const onStageError = (event: StageErrorEvent) => {
      setState(prev => ({
        ...prev,
        stages: updateStage(prev, indexOf(event.stage), { status: 'error' }),
      }));
    };

    const onDegraded = (event: SourceDegradedEvent) => {
      setState(prev => ({
        ...prev,
        notices: [...prev.notices, { level: 'warning', message: `${event.warning.message} (${event.period})` }],
      }));
    };

    const onNormalizeWarning = (event: NormalizeWarningEvent) => {
      if (!verbose) return;
      setState(prev => ({
        ...prev,
        notices: [...prev.notices, { level: 'info', message: `${event.source}: ${event.message}` }],
      }));
    };

    const onComplete = (event: ReportCompleteEvent) => {
      setState(prev => ({
        ...prev,
        done: true,
        report: event.report,
        totalCostUsd: event.report.usage.costUsd,
      }));
    };

    const onError = (event: ReportErrorEvent) => {
      setState(prev => ({
        ...prev,
        error: event.error.message,
        done: true,
        totalCostUsd: pipeline.totalCost,
      }));
    };

    pipeline.on('stage:start', onStageStart);
    pipeline.on('stage:complete', onStageComplete);
    pipeline.on('stage:skipped', onStageSkipped);
    pipeline.on('stage:error', onStageError);
    pipeline.on('source:degraded', onDegraded);
    pipeline.on('normalize:warning', onNormalizeWarning);
    pipeline.on('report:complete', onComplete);
    pipeline.on('report:error', onError);

    pipeline.run().catch((err: unknown) => {
      // Usually already set by report:error
      const message = err instanceof Error ? err.message : String(err);
      setState(prev => (prev.error ? prev : { ...prev, error: message, done: true }));
    });

    return () => {
      pipeline.off('stage:start', onStageStart);
      pipeline.off('stage:complete', onStageComplete);
      pipeline.off('stage:skipped', onStageSkipped);
      pipeline.off('stage:error', onStageError);
      pipeline.off('source:degraded', onDegraded);
      pipeline.off('normalize:warning', onNormalizeWarning);
      pipeline.off('report:complete', onComplete);
      pipeline.off('report:error', onError);
    };
  }, [pipeline]);

  return state;
}
