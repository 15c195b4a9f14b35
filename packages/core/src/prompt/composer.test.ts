import { describe, it, expect } from 'vitest';
import { compose, DEFAULT_INSTRUCTIONS } from './composer.js';
import { buildSections } from '../format/sections.js';
import { IdRegistry } from '../registry/id-registry.js';
import { EmptyInputError } from '../errors.js';
import type { CanonicalRecord } from '../normalize/types.js';

const current = { start: '2024-06-03', end: '2024-06-09' };
const previous = { start: '2024-05-27', end: '2024-06-02' };

function makeRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    source: 'traffic',
    dimension: 'device',
    naturalKey: 'mobile',
    metrics: { sessions: 120 },
    dateRange: current,
    ...overrides,
  };
}

function makeSections() {
  const registry = new IdRegistry();
  registry.assign(makeRecord());
  registry.assign(makeRecord({ naturalKey: 'desktop', metrics: { sessions: 80 } }));
  registry.assign(makeRecord({ source: 'search', dimension: 'query', naturalKey: 'running shoes', metrics: { clicks: 31 } }));
  return buildSections(registry);
}

describe('compose', () => {
  it('fails on zero sections', () => {
    expect(() => compose([], DEFAULT_INSTRUCTIONS, { current })).toThrow(EmptyInputError);
  });

  it('places framing, period, data, citation format and rules in order', () => {
    const prompt = compose(makeSections(), DEFAULT_INSTRUCTIONS, { current });
    const positions = [
      prompt.indexOf('# Role and task'),
      prompt.indexOf('# Reporting period'),
      prompt.indexOf('# Data'),
      prompt.indexOf('<!-- GA4-DEVICE-START -->'),
      prompt.indexOf('<!-- GSC-QUERY-START -->'),
      prompt.indexOf('# Citation format'),
      prompt.indexOf('# Rules'),
    ];
    expect(positions.every(p => p >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it('states the active date range', () => {
    const prompt = compose(makeSections(), DEFAULT_INSTRUCTIONS, { current });
    expect(prompt).toContain('Current period: 2024-06-03 to 2024-06-09 (7 days).');
    expect(prompt).not.toContain('Comparison period');
  });

  it('uses real IDs and values in the citation examples', () => {
    const prompt = compose(makeSections(), DEFAULT_INSTRUCTIONS, { current });
    expect(prompt).toContain('e.g. [GA4-DEV-001]');
    expect(prompt).toContain('- "mobile" recorded sessions of 120 [GA4-DEV-001].');
    expect(prompt).toContain('- "running shoes" recorded clicks of 31 [GSC-KW-001].');
  });

  it('ends with the citation rule', () => {
    const prompt = compose(makeSections(), DEFAULT_INSTRUCTIONS, { current });
    expect(prompt).toContain('Every analytical claim must end with a citation token.');
    expect(prompt.trimEnd().endsWith('say so instead of guessing.')).toBe(true);
  });

  it('labels the comparison period and forbids conflating it', () => {
    const prev = new IdRegistry({ prefix: 'PREV', period: 'previous' });
    prev.assign(makeRecord({ dateRange: previous, metrics: { sessions: 90 } }));
    const sections = [...buildSections(prev, { comparison: true }), ...makeSections()];

    const prompt = compose(sections, DEFAULT_INSTRUCTIONS, { current, comparison: previous });
    expect(prompt).toContain('Comparison period: 2024-05-27 to 2024-06-02 (7 days). Record IDs starting with "PREV-" belong to this period.');
    expect(prompt).toContain('Never conflate the two periods');
    // Current sections come first even when passed after comparison ones.
    expect(prompt.indexOf('<!-- GSC-QUERY-START -->')).toBeLessThan(prompt.indexOf('<!-- PREV-GA4-DEVICE-START -->'));
    expect(prompt).toContain('e.g. [GA4-DEV-001]');
  });

  it('notes when a comparison period has no data', () => {
    const prompt = compose(makeSections(), DEFAULT_INSTRUCTIONS, { current, comparison: previous });
    expect(prompt).toContain('No comparison data is available');
  });

  it('precomputes overview changes against the comparison period', () => {
    const registry = new IdRegistry();
    registry.assign(makeRecord({ dimension: 'overview', naturalKey: 'total', metrics: { sessions: 1200, bounceRate: 41.5 } }));
    registry.assign(makeRecord());
    const prev = new IdRegistry({ prefix: 'PREV', period: 'previous' });
    prev.assign(makeRecord({ dimension: 'overview', naturalKey: 'total', dateRange: previous, metrics: { sessions: 1100, bounceRate: 43 } }));
    prev.assign(makeRecord({ dateRange: previous, metrics: { sessions: 90 } }));
    const sections = [...buildSections(registry), ...buildSections(prev, { comparison: true })];

    const prompt = compose(sections, DEFAULT_INSTRUCTIONS, { current, comparison: previous });
    expect(prompt).toContain([
      '## Period-over-period change',
      'Changes are relative to the comparison period; for average position the change is the number of places gained. Quote these figures with both citations rather than computing your own.',
      '',
      '| Records | Metric | Current | Comparison | Change |',
      '| --- | --- | ---: | ---: | ---: |',
      '| [GA4-OV-001][PREV-GA4-OV-001] | Site traffic: Sessions | 1200 | 1100 | +9.09% |',
      '| [GA4-OV-001][PREV-GA4-OV-001] | Site traffic: Bounce rate | 41.50% | 43.00% | -3.49% |',
    ].join('\n'));
    // Only overview records get a change row.
    expect(prompt).not.toContain('[GA4-DEV-001][PREV-GA4-DEV-001]');
    expect(prompt.indexOf('## Period-over-period change')).toBeLessThan(prompt.indexOf('# Citation format'));
  });

  it('omits the change table without comparison data', () => {
    const prompt = compose(makeSections(), DEFAULT_INSTRUCTIONS, { current, comparison: previous });
    expect(prompt).not.toContain('Period-over-period change');
  });

  it('is deterministic', () => {
    const a = compose(makeSections(), DEFAULT_INSTRUCTIONS, { current });
    const b = compose(makeSections(), DEFAULT_INSTRUCTIONS, { current });
    expect(a).toBe(b);
  });

  it('includes the configured language and outline', () => {
    const prompt = compose(makeSections(), { ...DEFAULT_INSTRUCTIONS, language: 'German', outline: ['Summary'] }, { current });
    expect(prompt).toContain('Write the report in German, in Markdown.');
    expect(prompt).toContain('1. Summary');
  });
});
