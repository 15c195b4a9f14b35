import type { Config } from './config/index.js';
import { ConfigError } from './config/index.js';

export interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  tui?: boolean;
  config?: string;
}

/** Config for the running command, loaded once by the preAction hook. */
export interface RunContext {
  config: Config;
  configPath: string;
  configFileExists: boolean;
}

let current: RunContext | null = null;

export function getRunContext(): RunContext {
  if (!current) {
    throw new ConfigError('Config not loaded. Run "citeline config init" first.');
  }
  return current;
}

export function getConfig(): Config {
  return getRunContext().config;
}

export function setRunContext(context: RunContext): void {
  current = context;
}

/** Shorthand for tests: a context with no config file behind it. */
export function setConfig(config: Config, configPath = ''): void {
  current = { config, configPath, configFileExists: false };
}

export function resetConfig(): void {
  current = null;
}
