import { METRIC_ORDER, type Dimension, type MetricName } from '../schema/vocabulary.js';
import { formatRange } from '../period.js';
import type { Section } from './sections.js';
import { formatValue, metricLabel } from './values.js';

const KEY_LABELS: Record<Dimension, string> = {
  overview: 'Scope',
  channel: 'Source / medium',
  page: 'Page',
  device: 'Device',
  geography: 'Country',
  query: 'Query',
  opportunity: 'Query',
  campaign: 'Campaign',
};

export function startMarker(name: string): string {
  return `<!-- ${name}-START -->`;
}

export function endMarker(name: string): string {
  return `<!-- ${name}-END -->`;
}

function escapeCell(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/** Metrics present in at least one record, in declared order. */
export function sectionMetrics(section: Section): MetricName[] {
  return METRIC_ORDER.filter(metric =>
    section.records.some(record => record.metrics[metric] !== undefined),
  );
}

function row(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

/**
 * Render one section as a boundary-marked Markdown table. Tables are plain
 * Markdown; they are never fenced.
 */
export function formatSection(section: Section): string {
  const metrics = sectionMetrics(section);
  const header = ['ID', KEY_LABELS[section.dimension], ...metrics.map(metricLabel)];
  const align = ['---', '---', ...metrics.map(() => '---:')];

  const lines = [
    startMarker(section.name),
    `### ${section.title} (${formatRange(section.dateRange)})`,
    '',
    row(header),
    row(align),
    ...section.records.map(record =>
      row([
        record.id,
        escapeCell(record.naturalKey),
        ...metrics.map(metric => formatValue(metric, record.metrics[metric])),
      ]),
    ),
    endMarker(section.name),
  ];

  return lines.join('\n');
}

export function formatSections(sections: Section[]): string {
  return sections.map(formatSection).join('\n\n');
}
