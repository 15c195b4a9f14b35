import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { initCommand } from './init.js';
import { getConfig, type GlobalOptions } from '../context.js';
import { setConfigValue, getConfigPath, PROVIDER_IDS, type Config } from '../config/index.js';

function mask(value: string | undefined): string | undefined {
  if (!value) return value;
  return value.length <= 8 ? '****' : `${value.slice(0, 4)}...${value.slice(-4)}`;
}

/** Copy of the config with keys and tokens shortened for display. */
export function redactSecrets(config: Config): Config {
  const copy = structuredClone(config);
  for (const id of PROVIDER_IDS) {
    copy.providers[id].api_key = mask(copy.providers[id].api_key);
  }
  copy.sources.access_token = mask(copy.sources.access_token);
  copy.sources.ads.developer_token = mask(copy.sources.ads.developer_token);
  return copy;
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage citeline configuration');

  config
    .command('init')
    .description('Create a config file in ~/.citeline/')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await initCommand({ configPath: globalOpts.config });
    });

  config
    .command('show')
    .description('Show current configuration')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const cfg = getConfig();

      const shown = redactSecrets(cfg);

      if (globalOpts.json) {
        console.log(JSON.stringify(shown, null, 2));
      } else {
        console.log(chalk.bold('Current configuration:\n'));
        console.log(stringify(shown));
      }
    });

  config
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key (dot-notation, e.g. report.citation_mode)')
    .argument('<value>', 'Value to set')
    .action(async (key: string, value: string, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      setConfigValue(key, value, { configPath: globalOpts.config });

      const configPath = getConfigPath(globalOpts.config);
      console.log(chalk.green(`Set ${chalk.bold(key)} = ${chalk.bold(value)}`));
      console.log(chalk.dim(`Config: ${configPath}`));
    });
}
