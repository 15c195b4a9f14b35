import { describe, it, expect } from 'vitest';
import { formatMarkdown } from './markdown.js';
import type { ReportDocument } from '../pipeline/types.js';

function makeReport(overrides: Partial<ReportDocument> = {}): ReportDocument {
  return {
    title: 'Weekly report: "shop"',
    period: { current: { start: '2024-06-03', end: '2024-06-09' } },
    modelId: 'gemini-2.0-flash',
    citationMode: 'strict',
    generatedAt: '2024-06-10T08:00:00.000Z',
    dryRun: false,
    markdown: '# Weekly report\n\nBody.\n',
    prompt: 'prompt',
    sections: [],
    omissions: [],
    warnings: [],
    datasets: [],
    usage: { inputTokens: 0, outputTokens: 0, costUsd: 0 },
    ...overrides,
  };
}

describe('formatMarkdown', () => {
  it('writes frontmatter before the body', () => {
    expect(formatMarkdown(makeReport())).toBe([
      '---',
      'title: "Weekly report: \\"shop\\""',
      'period_start: 2024-06-03',
      'period_end: 2024-06-09',
      'generated_at: 2024-06-10T08:00:00.000Z',
      'model: gemini-2.0-flash',
      'citation_mode: strict',
      '---',
      '',
      '# Weekly report',
      '',
      'Body.',
      '',
    ].join('\n'));
  });

  it('adds comparison, coverage, omissions and cost when present', () => {
    const text = formatMarkdown(makeReport({
      period: {
        current: { start: '2024-06-03', end: '2024-06-09' },
        comparison: { start: '2024-05-27', end: '2024-06-02' },
      },
      coverage: {
        totalCitations: 5,
        validCitations: 4,
        claimsWithCitations: 4,
        uncitedNumericClaims: 0,
        availableIds: 10,
        citedIds: ['GA4-OV-001', 'GA4-DEV-001', 'GA4-DEV-002'],
        coverage: 0.3,
        invalidCitations: [],
      },
      omissions: [{ source: 'ads', period: 'current', reason: 'source not configured' }],
      usage: { inputTokens: 1000, outputTokens: 500, costUsd: 0.0003 },
    }));

    expect(text).toContain('comparison_start: 2024-05-27\ncomparison_end: 2024-06-02\n');
    expect(text).toContain('citations: 4\ncoverage: 30.00%\n');
    expect(text).toContain('omitted_sections: 1\n');
    expect(text).toContain('cost: $0.0003\n');
    expect(text).not.toContain('dry_run');
  });

  it('flags dry runs', () => {
    expect(formatMarkdown(makeReport({ dryRun: true }))).toContain('dry_run: true\n---');
  });
});
