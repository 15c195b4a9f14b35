import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { DIMENSIONS, SOURCE_IDS } from '../schema/vocabulary.js';
import type { RawDataset } from '../normalize/types.js';
import type { ReportDocument } from '../pipeline/types.js';
import { formatMarkdown } from './markdown.js';
import { formatJson } from './json.js';

export type OutputFormat = 'markdown' | 'json';

export interface WriteReportOptions {
  outputDir: string;
  format?: OutputFormat;
  /** Base name without extension; `{start}`, `{end}` and `{date}` are substituted. */
  filenameTemplate?: string;
}

export const DEFAULT_FILENAME_TEMPLATE = 'report-{start}-to-{end}';

export function resolveFilename(report: ReportDocument, template = DEFAULT_FILENAME_TEMPLATE): string {
  const variables: Record<string, string> = {
    start: report.period.current.start,
    end: report.period.current.end,
    date: report.generatedAt.slice(0, 10),
  };
  return template.replace(/\{(\w+)\}/g, (match, name: string) => variables[name] ?? match);
}

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/** Write the report and return the file path. */
export function writeReport(report: ReportDocument, options: WriteReportOptions): string {
  const format = options.format ?? 'markdown';
  ensureDir(options.outputDir);

  const baseName = resolveFilename(report, options.filenameTemplate);
  const suffix = report.dryRun ? '.prompt' : '';
  const path = join(options.outputDir, `${baseName}${suffix}${format === 'json' ? '.json' : '.md'}`);
  const content = format === 'json' ? formatJson(report) : formatMarkdown(report);
  writeFileSync(path, content, 'utf-8');
  return path;
}

// ---------------------------------------------------------------------------
// Raw dataset snapshots (--save-data / --replay)
// ---------------------------------------------------------------------------

const DateRangeSchema = z.object({
  start: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  end: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});

export const RawDatasetSchema = z.object({
  source: z.enum(SOURCE_IDS),
  dimension: z.enum(DIMENSIONS),
  schemaVersion: z.string(),
  dateRange: DateRangeSchema,
  rows: z.array(z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]))),
  fetchedAt: z.string().optional(),
});

export const DatasetSnapshotSchema = z.object({
  savedAt: z.string(),
  datasets: z.array(RawDatasetSchema),
});

export type DatasetSnapshot = z.infer<typeof DatasetSnapshotSchema>;

export function saveDatasets(datasets: RawDataset[], dir: string, name = 'datasets'): string {
  ensureDir(dir);
  const path = join(dir, `${name}.json`);
  const snapshot: DatasetSnapshot = { savedAt: new Date().toISOString(), datasets };
  writeFileSync(path, JSON.stringify(snapshot, null, 2), 'utf-8');
  return path;
}

export function loadDatasets(path: string): RawDataset[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read dataset snapshot ${path}: ${message}`);
  }
  const parsed = DatasetSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid dataset snapshot ${path}: ${issues}`);
  }
  return parsed.data.datasets;
}
