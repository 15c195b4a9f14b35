import React from 'react';
import { Box, Text, useApp } from 'ink';
import { useEffect } from 'react';
import { Header } from '../components/Header.js';
import { CostTrackerDisplay } from '../components/CostTracker.js';
import { StageList } from '../components/StageList.js';
import { Notices } from '../components/Notices.js';
import { usePipelineEvents } from '../hooks/usePipelineEvents.js';
import type { ReportViewProps } from '../types.js';

export function ReportView(props: ReportViewProps): React.ReactElement {
  const { exit } = useApp();
  const state = usePipelineEvents(props);
  const coverage = state.report?.coverage;

  useEffect(() => {
    if (state.done) {
      // Small delay so the user sees the final state
      const timeout = setTimeout(() => exit(), 500);
      return () => clearTimeout(timeout);
    }
    return undefined;
  }, [state.done, exit]);

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
      <Header title={state.title} periodLabel={state.periodLabel} model={state.model} />
      <CostTrackerDisplay spent={state.totalCostUsd} budget={state.budgetUsd} />
      <StageList stages={state.stages} currentStageIndex={state.currentStageIndex} />
      <Notices notices={state.notices} />

      {state.done && !state.error && (
        <Box flexDirection="column">
          <Text color="green" bold>
            {'✓'} Report complete, cost ${state.totalCostUsd.toFixed(4)}
          </Text>
          {coverage && (
            <Text dimColor>
              {'  '}{coverage.validCitations}/{coverage.totalCitations} citations valid, {coverage.citedIds.length}/{coverage.availableIds} data points cited
            </Text>
          )}
        </Box>
      )}

      {state.error && (
        <Box flexDirection="column">
          <Text color="red" bold>{'✗'} Error: {state.error}</Text>
        </Box>
      )}
    </Box>
  );
}
