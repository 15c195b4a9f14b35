import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'path';
import {
  ReportPipeline,
  formatRange,
  previousPeriod,
  resolvePeriod,
  saveDatasets,
  writeReport,
  type CitationMode,
  type OutputFormat,
  type PeriodPreset,
  type ReportContext,
  type ReportDocument,
  type ReportPeriod,
} from '@citeline/core';
import { SourceRegistry, loadSnapshot } from '@citeline/sources';
import { getConfig, type GlobalOptions } from '../context.js';
import {
  expandTilde,
  toInstructions,
  toProviderConfig,
  toSourcesConfig,
  type Config,
} from '../config/index.js';
import { renderReport, runHeadless, type ReportViewProps } from '../tui/index.js';

export interface ReportOptions {
  period?: string;
  startDate?: string;
  endDate?: string;
  compare?: boolean;
  model?: string;
  mode?: string;
  output?: string;
  outputDir?: string;
  budget?: string;
  title?: string;
  dryRun?: boolean;
  saveData?: boolean;
  replay?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const PRESETS: readonly PeriodPreset[] = ['last-week', 'last-month', 'last-quarter'];
const MODES: readonly CitationMode[] = ['strict', 'lenient'];
const FORMATS: readonly OutputFormat[] = ['markdown', 'json'];

function pick<T extends string>(value: string | undefined, allowed: readonly T[], flag: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find(a => a === value);
  if (!match) {
    throw new UsageError(`Invalid ${flag} "${value}". Expected one of: ${allowed.join(', ')}`);
  }
  return match;
}

function parseBudget(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const budget = Number(value);
  if (!Number.isFinite(budget) || budget <= 0) {
    throw new UsageError(`Invalid --budget "${value}". Expected a positive number of USD`);
  }
  return budget;
}

export interface ResolvedReportPlan {
  period: ReportPeriod;
  warnings: string[];
  format: OutputFormat;
  outputDir: string;
  context: ReportContext;
}

/** Merge command-line flags over config into a pipeline context. */
export function planReport(
  config: Config,
  options: ReportOptions,
  registry: SourceRegistry,
  today?: Date,
): ResolvedReportPlan {
  const preset = pick(options.period, PRESETS, '--period') ?? config.report.period;
  const citationMode = pick(options.mode, MODES, '--mode') ?? config.report.citation_mode;
  const format = pick(options.output, FORMATS, '--output') ?? config.defaults.output_format;

  // A replay without an explicit window reports on the window it saved.
  const replayRange = options.period === undefined && options.startDate === undefined && options.endDate === undefined
    ? registry.replayRange()
    : undefined;
  const { range, warnings } = replayRange
    ? { range: replayRange, warnings: [] }
    : resolvePeriod({ preset, start: options.startDate, end: options.endDate, today });
  const compare = options.compare !== false && config.report.compare;
  const period: ReportPeriod = {
    current: range,
    comparison: compare ? previousPeriod(range) : undefined,
  };

  const context: ReportContext = {
    sources: registry.specs(),
    period,
    citationMode,
    modelId: options.model ?? config.defaults.model,
    providerConfig: toProviderConfig(config),
    maxBudgetUsd: parseBudget(options.budget, config.defaults.max_budget_usd),
    precision: config.report.precision,
    percentMetrics: config.report.percent_metrics,
    instructions: toInstructions(config),
    timeoutMs: config.defaults.timeout_ms,
    maxOutputTokens: config.defaults.max_output_tokens,
    title: options.title ?? config.report.title,
    dryRun: options.dryRun === true,
  };

  return {
    period,
    warnings,
    format,
    outputDir: resolve(expandTilde(options.outputDir ?? config.defaults.output_dir)),
    context,
  };
}

function periodLabel(period: ReportPeriod): string {
  const current = formatRange(period.current);
  return period.comparison ? `${current} (vs ${formatRange(period.comparison)})` : current;
}

async function runInteractive(props: ReportViewProps): Promise<ReportDocument | undefined> {
  let report: ReportDocument | undefined;
  props.pipeline.on('report:complete', event => {
    report = event.report;
  });
  await renderReport(props);
  return report;
}

export async function runReportCommand(options: ReportOptions, globalOpts: GlobalOptions): Promise<void> {
  const config = getConfig();
  const sourcesConfig = toSourcesConfig(config);
  const registry = options.replay
    ? SourceRegistry.fromSnapshot(sourcesConfig, loadSnapshot(resolve(expandTilde(options.replay))))
    : new SourceRegistry(sourcesConfig);

  const plan = planReport(config, options, registry);
  const abort = new AbortController();
  const onSigint = () => abort.abort();
  process.once('SIGINT', onSigint);

  const pipeline = new ReportPipeline({ ...plan.context, abortSignal: abort.signal });

  // Saved as soon as the fetches settle, so a run that fails later can be replayed.
  const saved: { path?: string } = {};
  if (options.saveData) {
    pipeline.on('datasets:fetched', ({ datasets }) => {
      saved.path = saveDatasets(
        datasets,
        plan.outputDir,
        `data-${plan.period.current.start}-to-${plan.period.current.end}`,
      );
    });
  }

  if (!globalOpts.json) {
    for (const warning of plan.warnings) {
      console.error(chalk.yellow(`Warning: ${warning}`));
    }
    if (registry.isReplay && options.replay) {
      console.error(chalk.dim(`  Replaying saved datasets from ${options.replay}`));
    }
  }

  const viewProps: ReportViewProps = {
    title: plan.context.title ?? `Website performance report: ${formatRange(plan.period.current)}`,
    periodLabel: periodLabel(plan.period),
    model: plan.context.modelId,
    budgetUsd: plan.context.maxBudgetUsd,
    pipeline,
    verbose: globalOpts.verbose,
  };

  let report: ReportDocument | undefined;
  try {
    if (globalOpts.json) {
      report = await pipeline.run();
    } else if (process.stdout.isTTY === true && globalOpts.tui !== false) {
      report = await runInteractive(viewProps);
    } else {
      report = await runHeadless(viewProps);
    }
  } catch (err) {
    if (saved.path && !globalOpts.json) {
      console.error(chalk.dim(`  Fetched data saved to ${saved.path}`));
    }
    if (globalOpts.json) throw err;
    // The headless runner has already printed the failure
    process.exitCode = 1;
    return;
  } finally {
    process.off('SIGINT', onSigint);
  }

  if (!report) {
    process.exitCode = 1;
    return;
  }

  const dataPath = saved.path;
  const outputPath = writeReport(report, {
    outputDir: plan.outputDir,
    format: plan.format,
    filenameTemplate: config.defaults.filename_template,
  });

  if (globalOpts.json) {
    console.log(JSON.stringify({
      command: 'report',
      period: report.period,
      model: report.modelId,
      citationMode: report.citationMode,
      dryRun: report.dryRun,
      outputPath,
      dataPath,
      usage: report.usage,
      coverage: report.coverage,
      omissions: report.omissions,
    }, null, 2));
    return;
  }

  console.log(chalk.dim(`  Output: ${outputPath}`));
  if (dataPath) {
    console.log(chalk.dim(`  Data: ${dataPath}`));
  }
}

export function registerReportCommand(program: Command): void {
  program
    .command('report')
    .description('Generate a cited analytics report for a period')
    .option('-p, --period <preset>', `Period preset (${PRESETS.join('|')})`)
    .option('--start-date <date>', 'Custom period start (YYYY-MM-DD)')
    .option('--end-date <date>', 'Custom period end (YYYY-MM-DD), defaults to yesterday')
    .option('--no-compare', 'Skip the previous-period comparison')
    .option('-m, --model <model>', 'Override default model')
    .option('--mode <mode>', 'Citation mode (strict|lenient)')
    .option('-o, --output <format>', 'Output format (markdown|json)')
    .option('--output-dir <dir>', 'Output directory')
    .option('--budget <usd>', 'Budget cap in USD')
    .option('--title <title>', 'Report title')
    .option('--dry-run', 'Fetch and compose the prompt without calling the model')
    .option('--save-data', 'Save fetched datasets next to the report')
    .option('--replay <file>', 'Use datasets saved with --save-data instead of fetching')
    .action(async (options: ReportOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      try {
        await runReportCommand(options, globalOpts);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        if (globalOpts.json) {
          console.error(JSON.stringify({ error: message }));
        } else {
          console.error(chalk.red(`Error: ${message}`));
        }
        process.exitCode = 1;
      }
    });
}
