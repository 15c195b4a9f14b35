import React from 'react';
import { render } from 'ink';
import { App } from './App.js';
import type { ReportViewProps } from './types.js';

export type { ReportViewProps, ReportState, StageState, Notice } from './types.js';
export { runHeadless } from './headless.js';

export async function renderReport(props: ReportViewProps): Promise<void> {
  const { waitUntilExit } = render(
    React.createElement(App, {
      view: 'report',
      reportProps: props,
    }),
  );
  await waitUntilExit();
}
