import { EmptyInputError } from '../errors.js';
import { SOURCE_LABELS, sectionRank } from '../schema/vocabulary.js';
import { formatRange, rangeLength, type ReportPeriod } from '../period.js';
import { COMPARISON_PREFIX, CURRENT_PERIOD, type IdentifiedRecord } from '../registry/id-registry.js';
import { TOTALS_KEY } from '../normalize/normalizer.js';
import { formatSection, sectionMetrics } from '../format/table.js';
import { formatValue, metricLabel } from '../format/values.js';
import { findCounterpart, formatChange, recordChanges } from '../format/changes.js';
import type { Section } from '../format/sections.js';

export interface PromptInstructions {
  /** Who the model is writing as. */
  role: string;
  task: string;
  /** Natural language of the report. */
  language: string;
  /** Headings the report should follow, in order. */
  outline: string[];
  /** Additional house rules appended to the framing. */
  notes?: string[];
}

export const DEFAULT_INSTRUCTIONS: PromptInstructions = {
  role: 'You are a senior web analytics analyst preparing a weekly performance report for a website team.',
  task: 'Analyze the data tables below and write a concise report with findings and actionable recommendations.',
  language: 'English',
  outline: [
    'Executive summary',
    'Traffic overview and channels',
    'Content and device performance',
    'Search performance and query opportunities',
    'Recommendations for next week',
  ],
};

export const CITATION_TOKEN_SHAPE = '[<ID>]';
const MAX_EXAMPLES = 2;

function framing(instructions: PromptInstructions): string {
  const lines = [
    '# Role and task',
    instructions.role,
    instructions.task,
    `Write the report in ${instructions.language}, in Markdown.`,
    '',
    'Structure the report under these headings:',
    ...instructions.outline.map((heading, i) => `${i + 1}. ${heading}`),
  ];
  if (instructions.notes?.length) {
    lines.push('', ...instructions.notes.map(note => `- ${note}`));
  }
  return lines.join('\n');
}

function periodStatement(period: ReportPeriod, hasComparisonData: boolean): string {
  const lines = [
    '# Reporting period',
    `Current period: ${formatRange(period.current)} (${rangeLength(period.current)} days). Record IDs without a prefix belong to this period.`,
  ];
  if (period.comparison) {
    lines.push(
      `Comparison period: ${formatRange(period.comparison)} (${rangeLength(period.comparison)} days). Record IDs starting with "${COMPARISON_PREFIX}-" belong to this period.`,
    );
    if (!hasComparisonData) {
      lines.push('No comparison data is available; do not describe changes between periods.');
    }
    lines.push(
      'Never conflate the two periods: say which period every figure belongs to, and only compare a current record with the comparison record for the same entity.',
    );
  }
  return lines.join('\n');
}

/**
 * Precomputed overview changes, so the model quotes a figure instead of
 * working one out. Undefined when no overview record has a counterpart.
 */
function changeTable(sections: Section[]): string | undefined {
  const comparison = sections.filter(s => s.period !== CURRENT_PERIOD).flatMap(s => s.records);
  const rows: string[] = [];
  for (const section of sections) {
    if (section.period !== CURRENT_PERIOD || section.dimension !== 'overview') continue;
    for (const record of section.records) {
      const counterpart = findCounterpart(record, comparison);
      if (!counterpart) continue;
      for (const change of recordChanges(record, counterpart)) {
        const cells = [
          `[${record.id}][${counterpart.id}]`,
          `${SOURCE_LABELS[record.source]}: ${metricLabel(change.metric)}`,
          formatValue(change.metric, record.metrics[change.metric]),
          formatValue(change.metric, counterpart.metrics[change.metric]),
          formatChange(change),
        ];
        rows.push(`| ${cells.join(' | ')} |`);
      }
    }
  }
  if (rows.length === 0) return undefined;

  return [
    '## Period-over-period change',
    'Changes are relative to the comparison period; for average position the change is the number of places gained. Quote these figures with both citations rather than computing your own.',
    '',
    '| Records | Metric | Current | Comparison | Change |',
    '| --- | --- | ---: | ---: | ---: |',
    ...rows,
  ].join('\n');
}

function exampleSentence(record: IdentifiedRecord, section: Section): string | undefined {
  const metric = sectionMetrics(section).find(m => record.metrics[m] !== undefined);
  if (metric === undefined) return undefined;
  const subject = record.naturalKey === TOTALS_KEY
    ? `${SOURCE_LABELS[record.source]} overall`
    : `"${record.naturalKey}"`;
  return `${subject} recorded ${metricLabel(metric).toLowerCase()} of ${formatValue(metric, record.metrics[metric])} [${record.id}].`;
}

function citationInstruction(sections: Section[]): string {
  const examples: string[] = [];
  const usedSources = new Set<string>();
  for (const section of sections) {
    if (examples.length >= MAX_EXAMPLES) break;
    const record = section.records[0];
    if (!record || usedSources.has(record.source)) continue;
    const sentence = exampleSentence(record, section);
    if (sentence) {
      examples.push(sentence);
      usedSources.add(record.source);
    }
  }

  const firstId = sections[0]?.records[0]?.id ?? '';
  return [
    '# Citation format',
    `Cite the record behind every figure with the token ${CITATION_TOKEN_SHAPE}, using the ID exactly as it appears in the ID column, e.g. [${firstId}].`,
    'When a claim draws on several records, cite each one: [A][B].',
    '',
    'Examples:',
    ...examples.map(example => `- ${example}`),
  ].join('\n');
}

const CLOSING = [
  '# Rules',
  'Every analytical claim must end with a citation token.',
  'Use only the data in the tables above. Do not invent an ID, change an ID, or attach a figure to a record that does not contain it.',
  'If the data does not support a conclusion, say so instead of guessing.',
].join('\n');

/**
 * Build the model-facing prompt. The parts always appear in the same order:
 * framing, period statement, data sections, citation format, rules.
 */
export function compose(
  sections: Section[],
  instructions: PromptInstructions,
  period: ReportPeriod,
): string {
  if (sections.length === 0) {
    throw new EmptyInputError();
  }

  const ordered = [...sections].sort(
    (a, b) =>
      Number(a.period !== CURRENT_PERIOD) - Number(b.period !== CURRENT_PERIOD) ||
      sectionRank(a.source, a.dimension) - sectionRank(b.source, b.dimension),
  );
  const hasComparisonData = ordered.some(s => s.period !== CURRENT_PERIOD);
  const current = ordered.filter(s => s.period === CURRENT_PERIOD);
  const changes = changeTable(ordered);

  return [
    framing(instructions),
    periodStatement(period, hasComparisonData),
    ['# Data', ...ordered.map(formatSection), ...(changes ? [changes] : [])].join('\n\n'),
    citationInstruction(current.length > 0 ? current : ordered),
    CLOSING,
  ].join('\n\n');
}
