/**
 * Markdown output: YAML frontmatter followed by the report body.
 */

import type { ReportDocument } from '../pipeline/types.js';

function quote(value: string): string {
  return JSON.stringify(value);
}

function buildFrontmatter(report: ReportDocument): string {
  const fields: string[] = ['---'];
  fields.push(`title: ${quote(report.title)}`);
  fields.push(`period_start: ${report.period.current.start}`);
  fields.push(`period_end: ${report.period.current.end}`);
  if (report.period.comparison) {
    fields.push(`comparison_start: ${report.period.comparison.start}`);
    fields.push(`comparison_end: ${report.period.comparison.end}`);
  }
  fields.push(`generated_at: ${report.generatedAt}`);
  fields.push(`model: ${report.modelId}`);
  fields.push(`citation_mode: ${report.citationMode}`);
  if (report.coverage) {
    fields.push(`citations: ${report.coverage.validCitations}`);
    fields.push(`coverage: ${(report.coverage.coverage * 100).toFixed(2)}%`);
  }
  if (report.omissions.length > 0) fields.push(`omitted_sections: ${report.omissions.length}`);
  if (report.usage.costUsd > 0) fields.push(`cost: $${report.usage.costUsd.toFixed(4)}`);
  if (report.dryRun) fields.push('dry_run: true');
  fields.push('---', '');
  return fields.join('\n');
}

export function formatMarkdown(report: ReportDocument): string {
  return `${buildFrontmatter(report)}\n${report.markdown}`;
}
