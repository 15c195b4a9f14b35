/**
 * Machine-readable report: metadata, narrative, coverage and every section's
 * records with their IDs.
 */

import type { ReportDocument } from '../pipeline/types.js';
import type { CoverageReport, Omission } from '../verification/types.js';
import type { IdentifiedRecord } from '../registry/id-registry.js';

export interface JsonSectionOutput {
  name: string;
  title: string;
  source: string;
  dimension: string;
  period: string;
  records: Array<Pick<IdentifiedRecord, 'id' | 'naturalKey' | 'metrics' | 'dateRange'>>;
}

export interface JsonOutput {
  metadata: {
    title: string;
    generatedAt: string;
    model: string;
    citationMode: string;
    period: ReportDocument['period'];
    costUsd: number;
    inputTokens: number;
    outputTokens: number;
    dryRun: boolean;
  };
  narrative: string | null;
  coverage: CoverageReport | null;
  omissions: Omission[];
  warnings: string[];
  sections: JsonSectionOutput[];
  markdown: string;
}

export function toJsonOutput(report: ReportDocument): JsonOutput {
  return {
    metadata: {
      title: report.title,
      generatedAt: report.generatedAt,
      model: report.modelId,
      citationMode: report.citationMode,
      period: report.period,
      costUsd: report.usage.costUsd,
      inputTokens: report.usage.inputTokens,
      outputTokens: report.usage.outputTokens,
      dryRun: report.dryRun,
    },
    narrative: report.narrative ?? null,
    coverage: report.coverage ?? null,
    omissions: report.omissions,
    warnings: report.warnings,
    sections: report.sections.map(section => ({
      name: section.name,
      title: section.title,
      source: section.source,
      dimension: section.dimension,
      period: section.period,
      records: section.records.map(({ id, naturalKey, metrics, dateRange }) => ({
        id,
        naturalKey,
        metrics,
        dateRange,
      })),
    })),
    markdown: report.markdown,
  };
}

export function formatJson(report: ReportDocument): string {
  return JSON.stringify(toJsonOutput(report), null, 2);
}
