import { readFileSync, existsSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { parse, stringify } from 'yaml';
import { ConfigSchema, ConfigDefaults, PROVIDER_IDS, type RawConfig, type Config } from './schema.js';

const DEFAULT_CONFIG_PATH = '.citeline/config.yaml';

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  let envKey: string | undefined;
  if (value.startsWith('env:')) envKey = value.slice(4);
  else if (value.startsWith('${') && value.endsWith('}')) envKey = value.slice(2, -1);
  else if (value.startsWith('$')) envKey = value.slice(1);

  if (envKey === undefined) return value;
  const envVal = process.env[envKey];
  return envVal ? envVal : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (isRecord(obj)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

/** A config-file value, or the named environment variable when the file leaves it unset. */
function withFallback(value: string | undefined, envNames: string[], used: string[]): string | undefined {
  if (value && !isUnresolvedEnvRef(value)) return value;
  for (const name of envNames) {
    const envVal = process.env[name];
    if (envVal) {
      used.push(name);
      return envVal;
    }
  }
  return undefined;
}

const PROVIDER_ENV: Record<keyof Config['providers'], string[]> = {
  anthropic: ['ANTHROPIC_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  google: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
};

function applyEnvVarFallbacks(config: Config): string[] {
  const used: string[] = [];

  for (const id of PROVIDER_IDS) {
    config.providers[id].api_key = withFallback(config.providers[id].api_key, PROVIDER_ENV[id], used);
  }

  const sources = config.sources;
  sources.access_token = withFallback(sources.access_token, ['GOOGLE_ACCESS_TOKEN'], used);
  sources.traffic.property_id = withFallback(sources.traffic.property_id, ['GA4_PROPERTY_ID'], used);
  sources.search.site_url = withFallback(sources.search.site_url, ['GSC_SITE_URL'], used);
  sources.ads.customer_id = withFallback(sources.ads.customer_id, ['GOOGLE_ADS_CUSTOMER_ID'], used);
  sources.ads.developer_token = withFallback(sources.ads.developer_token, ['GOOGLE_ADS_DEVELOPER_TOKEN'], used);
  sources.ads.login_customer_id = withFallback(sources.ads.login_customer_id, ['GOOGLE_ADS_LOGIN_CUSTOMER_ID'], used);

  return used;
}

function optionalString(value: string | number | undefined): string | undefined {
  return value === undefined ? undefined : String(value);
}

function mergeConfig(raw: RawConfig): Config {
  const result = structuredClone(ConfigDefaults);

  if (raw.defaults) {
    result.defaults = { ...result.defaults, ...raw.defaults };
  }
  if (raw.report) {
    result.report = { ...result.report, ...raw.report };
  }
  if (raw.providers) {
    result.providers = {
      anthropic: { ...result.providers.anthropic, ...raw.providers.anthropic },
      openai: { ...result.providers.openai, ...raw.providers.openai },
      google: { ...result.providers.google, ...raw.providers.google },
    };
  }
  if (raw.sources) {
    const { traffic, search, ads } = raw.sources;
    result.sources = {
      access_token: raw.sources.access_token,
      traffic: {
        ...result.sources.traffic,
        ...traffic,
        property_id: optionalString(traffic?.property_id),
      },
      search: { ...result.sources.search, ...search },
      ads: {
        ...result.sources.ads,
        ...ads,
        customer_id: optionalString(ads?.customer_id),
        login_customer_id: optionalString(ads?.login_customer_id),
      },
    };
  }
  return result;
}

function readConfigDocument(configPath: string): unknown {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  try {
    return parse(fileContent);
  } catch (error) {
    const detail = error instanceof Error ? `: ${error.message}` : '';
    throw new ConfigError(`Failed to parse config file: ${configPath}${detail}`);
  }
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  let result = structuredClone(ConfigDefaults);

  if (configFileExists) {
    const rawConfig = readConfigDocument(configPath);
    if (rawConfig !== null && rawConfig !== undefined) {
      const validated = ConfigSchema.safeParse(resolveEnvVarsInObject(stripNullValues(rawConfig)));
      if (!validated.success) {
        throw new ConfigError(`Invalid config: ${formatIssues(validated.error.issues)}`);
      }
      result = mergeConfig(validated.data);
    }
  }

  const envKeysUsed = applyEnvVarFallbacks(result);

  // Auto-select provider if the default provider has no API key
  if (!result.providers[result.defaults.provider].api_key) {
    const available = PROVIDER_IDS.find(p => result.providers[p].api_key);
    if (available) {
      result.defaults.provider = available;
      result.defaults.model = result.providers[available].default_model;
    }
  }

  return { config: result, configFileExists, envKeysUsed };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

function coerce(value: string): string | number | boolean {
  const numValue = Number(value);
  if (!isNaN(numValue) && value.trim() !== '') return numValue;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = getConfigPath(options.configPath);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}. Run 'citeline config init' first.`);
  }

  const parsed = readConfigDocument(configPath);
  const doc: Record<string, unknown> = isRecord(parsed) ? parsed : {};

  // Navigate dot-notation key
  const keys = key.split('.');
  const lastKey = keys.pop();
  if (!lastKey) throw new ConfigError('Config key must not be empty');

  let current = doc;
  for (const part of keys) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastKey] = coerce(value);

  // Validate modified config (strip nulls from YAML comments)
  const validated = ConfigSchema.safeParse(stripNullValues(doc));
  if (!validated.success) {
    throw new ConfigError(`Invalid config after setting ${key}: ${formatIssues(validated.error.issues)}`);
  }

  writeFileSync(configPath, stringify(doc), 'utf-8');
}
