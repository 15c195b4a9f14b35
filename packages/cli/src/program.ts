import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath, loadConfigWithMeta } from './config/index.js';
import { setRunContext, type GlobalOptions } from './context.js';
import { registerReportCommand } from './commands/report.js';
import { registerCheckConfigCommand } from './commands/check-config.js';
import { registerConfigCommand } from './commands/config.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('citeline')
    .description('Weekly analytics reports with every number cited back to its source')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Machine-readable JSON output')
    .option('--no-tui', 'Force headless mode (no TUI)')
    .option('-c, --config <path>', 'Path to config file');

  registerReportCommand(program);
  registerCheckConfigCommand(program);
  registerConfigCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const chain = getCommandChain(actionCommand, program);

    // Skip config loading for 'config init'
    if (chain[0] === 'config' && chain[1] === 'init') {
      return;
    }

    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: opts.config });

    // First-run onboarding: no config file, but env vars detected
    if (!configFileExists && envKeysUsed.length > 0 && !opts.json) {
      console.error(chalk.cyan(`  Using ${envKeysUsed.join(', ')} from environment.`));
      console.error(chalk.dim(`  Run "citeline config init" to create a config file for more options.\n`));
    }

    const provider = config.defaults.provider;
    const needsApiKey = chain[0] === 'report' && actionCommand.opts<{ dryRun?: boolean }>().dryRun !== true;

    if (needsApiKey && !config.providers[provider].api_key) {
      console.error(chalk.red(`No API key found for provider "${provider}".\n`));
      console.error(chalk.white('Quick start (no config needed):'));
      console.error(chalk.green('  export GEMINI_API_KEY=...\n'));
      console.error(chalk.white('Or create a config file:'));
      console.error(chalk.green('  citeline config init\n'));
      process.exit(1);
    }

    setRunContext({ config, configPath: getConfigPath(opts.config), configFileExists });
  });

  return program;
}

export function getCommandChain(cmd: Command, root: Command): string[] {
  const chain: string[] = [];
  let current: Command | null = cmd;
  while (current && current !== root) {
    chain.unshift(current.name());
    current = current.parent;
  }
  return chain;
}
