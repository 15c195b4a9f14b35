import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { StageState } from '../types.js';

interface StageListProps {
  stages: StageState[];
  currentStageIndex: number;
}

export function formatElapsed(ms: number | undefined): string {
  if (ms === undefined) return '';
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

function StatusIcon({ status }: { status: StageState['status'] }): React.ReactElement {
  switch (status) {
    case 'done':
      return <Text color="green">{'✓'}</Text>;
    case 'running':
      return <Text color="cyan"><Spinner type="dots" /></Text>;
    case 'error':
      return <Text color="red">{'✗'}</Text>;
    case 'skipped':
      return <Text dimColor>-</Text>;
    case 'pending':
    default:
      return <Text dimColor>{'○'}</Text>;
  }
}

function StageRow({ stage, isCurrent }: { stage: StageState; isCurrent: boolean }): React.ReactElement {
  const nameWidth = 10;
  const timeWidth = 7;
  const inactive = stage.status === 'pending' || stage.status === 'skipped';

  return (
    <Box gap={1}>
      <StatusIcon status={stage.status} />
      <Box width={nameWidth}>
        <Text bold={isCurrent} dimColor={inactive}>{stage.name}</Text>
      </Box>
      <Box width={timeWidth} justifyContent="flex-end">
        <Text dimColor={inactive}>
          {stage.status === 'done' ? formatElapsed(stage.elapsedMs) : ''}
        </Text>
      </Box>
      <Box>
        <Text dimColor>{stage.detail ?? ''}</Text>
      </Box>
      {isCurrent && stage.status === 'running' && (
        <Text color="yellow">{' ← current'}</Text>
      )}
    </Box>
  );
}

export function StageList({ stages, currentStageIndex }: StageListProps): React.ReactElement {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text bold dimColor>Stages:</Text>
      {stages.map((stage, i) => (
        <StageRow key={stage.name} stage={stage} isCurrent={i === currentStageIndex} />
      ))}
    </Box>
  );
}
