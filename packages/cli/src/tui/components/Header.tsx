import React from 'react';
import { Box, Text } from 'ink';

interface HeaderProps {
  title: string;
  periodLabel: string;
  model: string;
}

export function Header({ title, periodLabel, model }: HeaderProps): React.ReactElement {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box>
        <Text bold color="cyan">citeline</Text>
        <Text dimColor> | </Text>
        <Text bold color="green">{title}</Text>
      </Box>
      <Box gap={2}>
        <Box>
          <Text dimColor>Period: </Text>
          <Text>{periodLabel}</Text>
        </Box>
        <Box>
          <Text dimColor>Model: </Text>
          <Text>{model}</Text>
        </Box>
      </Box>
    </Box>
  );
}
