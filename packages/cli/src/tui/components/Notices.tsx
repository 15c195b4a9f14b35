import React from 'react';
import { Box, Text } from 'ink';
import type { Notice } from '../types.js';

interface NoticesProps {
  notices: Notice[];
}

export function Notices({ notices }: NoticesProps): React.ReactElement | null {
  if (notices.length === 0) return null;

  return (
    <Box flexDirection="column" marginBottom={1}>
      {notices.map((notice, i) => (
        <Box key={i} gap={1}>
          {notice.level === 'warning'
            ? <Text color="yellow">!</Text>
            : <Text dimColor>i</Text>}
          <Text dimColor={notice.level === 'info'}>{notice.message}</Text>
        </Box>
      ))}
    </Box>
  );
}
