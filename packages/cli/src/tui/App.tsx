import React from 'react';
import { ReportView } from './views/ReportView.js';
import type { ReportViewProps } from './types.js';

interface AppProps {
  view: 'report';
  reportProps: ReportViewProps;
}

export function App({ view, reportProps }: AppProps): React.ReactElement {
  switch (view) {
    case 'report':
      return <ReportView {...reportProps} />;
  }
}
