import chalk from 'chalk';
import ora from 'ora';
import type {
  ReportDocument,
  StageStartEvent,
  StageCompleteEvent,
  StageErrorEvent,
  StageSkippedEvent,
  SourceDegradedEvent,
  NormalizeWarningEvent,
} from '@citeline/core';
import type { ReportViewProps } from './types.js';
import { formatElapsed } from './components/StageList.js';

export async function runHeadless(props: ReportViewProps): Promise<ReportDocument> {
  const { title, periodLabel, model, budgetUsd, pipeline, verbose } = props;

  console.log('');
  console.log(chalk.cyan.bold('citeline') + chalk.dim(' | headless mode'));
  console.log(`Report: ${chalk.green.bold(title)}`);
  console.log(`Period: ${chalk.white(periodLabel)}  Model: ${chalk.white(model)}`);
  console.log(`Budget: ${chalk.white('$' + budgetUsd.toFixed(2))}`);
  console.log('');

  let currentStage = '';
  let activeSpinner = ora();

  pipeline.on('stage:start', (event: StageStartEvent) => {
    currentStage = event.stage;
    activeSpinner = ora({
      text: `${chalk.bold(event.stage)} ${chalk.dim(`(${event.stageIndex + 1}/${event.totalStages})`)}`,
      prefixText: chalk.dim(' '),
    }).start();
  });

  pipeline.on('stage:complete', (event: StageCompleteEvent) => {
    activeSpinner.succeed(
      `${chalk.bold(event.stage)}` +
      chalk.dim(`  ${formatElapsed(event.durationMs)}`) +
      (event.detail ? chalk.dim(`  ${event.detail}`) : ''),
    );
  });

  pipeline.on('stage:skipped', (event: StageSkippedEvent) => {
    console.log(chalk.dim(`  - ${event.stage} skipped (${event.reason})`));
  });

  pipeline.on('stage:error', (event: StageErrorEvent) => {
    activeSpinner.fail(`${chalk.bold(event.stage)} ${chalk.red(event.error.message)}`);
  });

  pipeline.on('source:degraded', (event: SourceDegradedEvent) => {
    activeSpinner.warn(chalk.yellow(`${event.warning.message} (${event.period})`));
    activeSpinner = ora({ text: chalk.bold(currentStage), prefixText: chalk.dim(' ') }).start();
  });

  pipeline.on('normalize:warning', (event: NormalizeWarningEvent) => {
    if (verbose) {
      console.log(chalk.dim(`    ${event.source}: ${event.message}`));
    }
  });

  try {
    const report = await pipeline.run();

    console.log('');
    console.log(chalk.green.bold('✓ Report complete'));
    console.log(chalk.dim(`  Cost: $${report.usage.costUsd.toFixed(4)} / $${budgetUsd.toFixed(2)}`));
    console.log(chalk.dim(`  Tokens: ${report.usage.inputTokens} in, ${report.usage.outputTokens} out`));
    if (report.coverage) {
      const { validCitations, totalCitations, citedIds, availableIds } = report.coverage;
      console.log(chalk.dim(`  Citations: ${validCitations}/${totalCitations} valid, ${citedIds.length}/${availableIds} data points cited`));
    }
    if (report.omissions.length > 0) {
      console.log(chalk.yellow(`  Omitted: ${report.omissions.length} section(s), listed in the footer`));
    }
    console.log('');
    return report;
  } catch (err) {
    if (activeSpinner.isSpinning) activeSpinner.fail(chalk.red('Report failed'));
    console.log('');
    const message = err instanceof Error ? err.message : String(err);
    console.log(chalk.red.bold('✗ Report failed'));
    console.log(chalk.red(`  ${message}`));
    if (currentStage) {
      console.log(chalk.dim(`  Failed during stage: ${currentStage}`));
    }
    console.log('');
    throw err;
  }
}
