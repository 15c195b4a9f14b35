import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, resolve } from 'path';

export interface InitCommandOptions {
  configPath?: string;
  homeDir?: string;
  logger?: (...args: unknown[]) => void;
}

function expandTilde(pathValue: string, homeDirectory: string): string {
  if (pathValue === '~') {
    return homeDirectory;
  }
  if (pathValue.startsWith('~/')) {
    return resolve(homeDirectory, pathValue.slice(2));
  }
  return pathValue;
}

function resolveConfigPath(configPath: string | undefined, homeDirectory: string): string {
  if (configPath) {
    return expandTilde(configPath, homeDirectory);
  }
  return resolve(homeDirectory, '.citeline', 'config.yaml');
}

export const CONFIG_TEMPLATE = `# citeline configuration

# LLM providers. Use "env:NAME" or "$NAME" to read a value from the environment.
providers:
  google:
    api_key: env:GEMINI_API_KEY
    default_model: "gemini-2.0-flash"

  anthropic:
    api_key: env:ANTHROPIC_API_KEY
    default_model: "claude-sonnet-4-20250514"

  openai:
    api_key: env:OPENAI_API_KEY
    default_model: "gpt-4o"

defaults:
  provider: google             # google | anthropic | openai
  model: gemini-2.0-flash
  max_budget_usd: 1.0          # Cost cap per report run
  timeout_ms: 120000
  output_format: markdown      # markdown | json
  output_dir: "~/citeline-reports"
  filename_template: "report-{start}-to-{end}"

report:
  period: last-week            # last-week | last-month | last-quarter
  compare: true                # Include the previous period of equal length
  citation_mode: strict        # strict | lenient
  precision: 2
  language: English
  notes: []

# Data sources. A required source that fails stops the report;
# an optional one is left out and listed in the footer.
sources:
  access_token: env:GOOGLE_ACCESS_TOKEN
  traffic:
    enabled: true
    required: true
    property_id: env:GA4_PROPERTY_ID
  search:
    enabled: true
    required: true
    site_url: env:GSC_SITE_URL
  ads:
    enabled: true
    required: false
    customer_id: env:GOOGLE_ADS_CUSTOMER_ID
    developer_token: env:GOOGLE_ADS_DEVELOPER_TOKEN
`;

export async function initCommand(options: InitCommandOptions = {}): Promise<void> {
  const log = options.logger ?? console.log;
  const homeDirectory = options.homeDir ?? homedir();

  const configPath = resolveConfigPath(options.configPath, homeDirectory);
  const configDir = dirname(configPath);

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    log(chalk.green('Created directory:'), configDir);
  }

  if (existsSync(configPath)) {
    log(chalk.yellow('Config already exists at:'), configPath);
    log(chalk.yellow('Run with --config <path> to use a different location.'));
    return;
  }

  writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  log(chalk.green('Created config file:'), configPath);
  log('');
  log(chalk.cyan('Next steps:'));
  log('  1. Edit', configPath);
  log('  2. Add your API keys and source settings, or set environment variables');
  log('  3. Run', chalk.green('citeline check-config --test-connections'));
  log('  4. Run', chalk.green('citeline report'));
}
