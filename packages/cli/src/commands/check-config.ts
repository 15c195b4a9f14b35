import { Command } from 'commander';
import chalk from 'chalk';
import { SOURCE_LABELS, addDays, formatRange, toIsoDate, type DateRange, type SourceId } from '@citeline/core';
import { SourceRegistry, type SourceStatus } from '@citeline/sources';
import { getRunContext, type GlobalOptions } from '../context.js';
import { toSourcesConfig, type Config } from '../config/index.js';

interface CheckConfigOptions {
  testConnections?: boolean;
}

export interface ConnectionResult {
  id: SourceId;
  ok: boolean;
  /** Datasets returned on success. */
  datasets?: number;
  error?: string;
}

/** A single complete day, the cheapest range every source accepts. */
export function connectionTestRange(today: Date = new Date()): DateRange {
  const yesterday = addDays(toIsoDate(today), -1);
  return { start: yesterday, end: yesterday };
}

export async function checkConnections(registry: SourceRegistry, range: DateRange): Promise<ConnectionResult[]> {
  const results: ConnectionResult[] = [];
  for (const spec of registry.specs()) {
    if (!spec.fetcher) {
      results.push({ id: spec.id, ok: false, error: 'not configured' });
      continue;
    }
    try {
      const datasets = await spec.fetcher.fetch(range, {});
      results.push({ id: spec.id, ok: true, datasets: datasets.length });
    } catch (err) {
      results.push({ id: spec.id, ok: false, error: err instanceof Error ? err.message : String(err) });
    }
  }
  return results;
}

/** Problems that would stop `citeline report` before any data is fetched. */
export function configProblems(config: Config, statuses: SourceStatus[]): string[] {
  const problems: string[] = [];
  const provider = config.defaults.provider;
  if (!config.providers[provider].api_key) {
    problems.push(`No API key for provider "${provider}" (providers.${provider}.api_key)`);
  }
  for (const status of statuses) {
    if (status.enabled && status.required && !status.configured) {
      problems.push(`Required source "${status.id}" is missing ${status.missing.join(', ')}`);
    }
  }
  return problems;
}

function statusLine(status: SourceStatus): string {
  const label = `${SOURCE_LABELS[status.id]} (${status.id})`;
  if (!status.enabled) return `  ${chalk.dim('-')} ${chalk.dim(label)} ${chalk.dim('disabled')}`;
  const role = status.required ? 'required' : 'optional';
  if (status.configured) return `  ${chalk.green('✓')} ${label} ${chalk.dim(role)}`;
  const icon = status.required ? chalk.red('✗') : chalk.yellow('!');
  return `  ${icon} ${label} ${chalk.dim(role)} ${chalk.dim(`missing ${status.missing.join(', ')}`)}`;
}

export function registerCheckConfigCommand(program: Command): void {
  program
    .command('check-config')
    .description('Check provider keys and data source settings')
    .option('--test-connections', 'Fetch one day from each configured source')
    .action(async (options: CheckConfigOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const { config, configPath, configFileExists } = getRunContext();
      const registry = new SourceRegistry(toSourcesConfig(config));
      const statuses = registry.statuses();
      const problems = configProblems(config, statuses);

      const range = connectionTestRange();
      const connections = options.testConnections ? await checkConnections(registry, range) : undefined;
      const failed = connections?.some(c => !c.ok && registry.status(c.id).required) ?? false;

      if (problems.length > 0 || failed) {
        process.exitCode = 1;
      }

      if (globalOpts.json) {
        console.log(JSON.stringify({
          configPath,
          configFileExists,
          provider: config.defaults.provider,
          model: config.defaults.model,
          sources: statuses,
          problems,
          connections,
        }, null, 2));
        return;
      }

      console.log(chalk.bold('Configuration'));
      console.log(chalk.dim(`  File: ${configPath}${configFileExists ? '' : ' (not found, using defaults and environment)'}`));
      console.log(`  Provider: ${config.defaults.provider}  Model: ${config.defaults.model}`);
      console.log('');
      console.log(chalk.bold('Sources'));
      for (const status of statuses) {
        console.log(statusLine(status));
      }

      if (connections) {
        console.log('');
        console.log(chalk.bold(`Connections (${formatRange(range)})`));
        for (const result of connections) {
          console.log(result.ok
            ? `  ${chalk.green('✓')} ${result.id} ${chalk.dim(`${result.datasets ?? 0} datasets`)}`
            : `  ${chalk.red('✗')} ${result.id} ${chalk.red(result.error ?? 'failed')}`);
        }
      }

      if (problems.length > 0) {
        console.log('');
        for (const problem of problems) {
          console.log(chalk.red(`  ${problem}`));
        }
      }
    });
}
