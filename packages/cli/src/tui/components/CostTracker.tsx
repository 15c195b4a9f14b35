import React from 'react';
import { Box, Text } from 'ink';

interface CostTrackerProps {
  spent: number;
  budget: number;
}

export function budgetBar(spent: number, budget: number, width = 20): { bar: string; color: string } {
  const share = budget > 0 ? Math.min(spent / budget, 1) : 1;
  const filled = Math.round(share * width);
  const color = share > 0.8 ? 'red' : share > 0.5 ? 'yellow' : 'green';
  return { bar: '█'.repeat(filled) + '░'.repeat(width - filled), color };
}

export function CostTrackerDisplay({ spent, budget }: CostTrackerProps): React.ReactElement {
  const { bar, color } = budgetBar(spent, budget);

  return (
    <Box gap={1} marginBottom={1}>
      <Text dimColor>Cost:</Text>
      <Text bold>${spent.toFixed(4)}</Text>
      <Text dimColor>of</Text>
      <Text>${budget.toFixed(2)}</Text>
      <Text color={color}>{bar}</Text>
    </Box>
  );
}
