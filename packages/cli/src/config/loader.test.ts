import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadConfig, loadConfigWithMeta, setConfigValue, ConfigError } from './loader.js';
import { writeFileSync, mkdtempSync, rmSync } from 'fs';
import { resolve } from 'path';
import { tmpdir } from 'os';

const ENV_NAMES = [
  'ANTHROPIC_API_KEY',
  'OPENAI_API_KEY',
  'GEMINI_API_KEY',
  'GOOGLE_API_KEY',
  'GOOGLE_ACCESS_TOKEN',
  'GA4_PROPERTY_ID',
  'GSC_SITE_URL',
  'GOOGLE_ADS_CUSTOMER_ID',
  'GOOGLE_ADS_DEVELOPER_TOKEN',
  'GOOGLE_ADS_LOGIN_CUSTOMER_ID',
];

describe('config loader', () => {
  let testDir = '';
  let testConfigPath = '';

  beforeEach(() => {
    testDir = mkdtempSync(resolve(tmpdir(), 'citeline-config-'));
    testConfigPath = resolve(testDir, 'config.yaml');
    for (const name of ENV_NAMES) vi.stubEnv(name, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns defaults when no config file exists', () => {
    const { config, configFileExists, envKeysUsed } = loadConfigWithMeta({ configPath: testConfigPath });

    expect(configFileExists).toBe(false);
    expect(envKeysUsed).toEqual([]);
    expect(config.defaults.provider).toBe('google');
    expect(config.defaults.model).toBe('gemini-2.0-flash');
    expect(config.defaults.max_budget_usd).toBe(1);
    expect(config.defaults.output_dir).toBe('~/citeline-reports');
    expect(config.report.period).toBe('last-week');
    expect(config.report.citation_mode).toBe('strict');
    expect(config.report.compare).toBe(true);
    expect(config.sources.traffic).toEqual({ enabled: true, required: true, property_id: undefined });
    expect(config.sources.ads.required).toBe(false);
  });

  it('treats an empty file as defaults', () => {
    writeFileSync(testConfigPath, '');

    const { config, configFileExists } = loadConfigWithMeta({ configPath: testConfigPath });

    expect(configFileExists).toBe(true);
    expect(config.report.precision).toBe(2);
  });

  it('loads and merges custom config', () => {
    writeFileSync(testConfigPath, `
defaults:
  provider: openai
  max_budget_usd: 3.0
report:
  citation_mode: lenient
  notes:
    - Spring sale ran all week
`);

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.defaults.provider).toBe('openai');
    expect(config.defaults.max_budget_usd).toBe(3);
    expect(config.defaults.model).toBe('gemini-2.0-flash');
    expect(config.report.citation_mode).toBe('lenient');
    expect(config.report.precision).toBe(2);
    expect(config.report.notes).toEqual(['Spring sale ran all week']);
  });

  it('resolves env: prefix from environment variable', () => {
    writeFileSync(testConfigPath, `
providers:
  anthropic:
    api_key: env:TEST_API_KEY
`);
    vi.stubEnv('TEST_API_KEY', 'test-secret');

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.providers.anthropic.api_key).toBe('test-secret');
  });

  it('resolves ${} references from environment variable', () => {
    writeFileSync(testConfigPath, `
sources:
  access_token: \${TEST_TOKEN}
`);
    vi.stubEnv('TEST_TOKEN', 'test-token');

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.sources.access_token).toBe('test-token');
  });

  it('drops an unresolved env reference', () => {
    writeFileSync(testConfigPath, `
sources:
  traffic:
    property_id: env:UNSET_PROPERTY_FOR_TEST
`);

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.sources.traffic.property_id).toBeUndefined();
  });

  it('falls back to well-known environment variables', () => {
    vi.stubEnv('GOOGLE_ACCESS_TOKEN', 'test-token');
    vi.stubEnv('GA4_PROPERTY_ID', '123456');

    const { config, envKeysUsed } = loadConfigWithMeta({ configPath: testConfigPath });

    expect(config.sources.access_token).toBe('test-token');
    expect(config.sources.traffic.property_id).toBe('123456');
    expect(envKeysUsed).toEqual(['GOOGLE_ACCESS_TOKEN', 'GA4_PROPERTY_ID']);
  });

  it('switches to a provider that has a key when the default has none', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.defaults.provider).toBe('anthropic');
    expect(config.defaults.model).toBe('claude-sonnet-4-20250514');
  });

  it('keeps numeric ids as strings', () => {
    writeFileSync(testConfigPath, `
sources:
  traffic:
    property_id: 987654
  ads:
    customer_id: 1234567890
`);

    const config = loadConfig({ configPath: testConfigPath });

    expect(config.sources.traffic.property_id).toBe('987654');
    expect(config.sources.ads.customer_id).toBe('1234567890');
    expect(config.sources.ads.required).toBe(false);
  });

  it('rejects an unknown citation mode', () => {
    writeFileSync(testConfigPath, 'report:\n  citation_mode: loose\n');

    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(ConfigError);
    expect(() => loadConfig({ configPath: testConfigPath })).toThrow(/^Invalid config: report\.citation_mode/);
  });

  it('rejects an unknown period preset', () => {
    writeFileSync(testConfigPath, 'report:\n  period: last-year\n');

    expect(() => loadConfig({ configPath: testConfigPath }))
      .toThrow('report.period: Must be one of last-week, last-month, last-quarter');
  });

  it('rejects unknown percent metrics', () => {
    writeFileSync(testConfigPath, 'report:\n  percent_metrics: [ctr, bounce]\n');

    expect(() => loadConfig({ configPath: testConfigPath }))
      .toThrow('report.percent_metrics.1: Unknown metric');
  });

  it('rejects unknown keys', () => {
    writeFileSync(testConfigPath, 'defaults:\n  colour: red\n');

    expect(() => loadConfig({ configPath: testConfigPath }))
      .toThrow("Unrecognized key(s) in object: 'colour'");
  });

  it('reports YAML syntax errors', () => {
    writeFileSync(testConfigPath, 'defaults: [unclosed\n');

    expect(() => loadConfig({ configPath: testConfigPath }))
      .toThrow(`Failed to parse config file: ${testConfigPath}`);
  });

  describe('setConfigValue', () => {
    it('sets a nested value and coerces numbers', () => {
      writeFileSync(testConfigPath, 'report:\n  precision: 2\n');

      setConfigValue('report.precision', '1', { configPath: testConfigPath });
      setConfigValue('sources.ads.enabled', 'false', { configPath: testConfigPath });

      const config = loadConfig({ configPath: testConfigPath });
      expect(config.report.precision).toBe(1);
      expect(config.sources.ads.enabled).toBe(false);
    });

    it('refuses a value the schema rejects', () => {
      writeFileSync(testConfigPath, 'report:\n  precision: 2\n');

      expect(() => setConfigValue('report.citation_mode', 'loose', { configPath: testConfigPath }))
        .toThrow(/^Invalid config after setting report\.citation_mode/);
      expect(loadConfig({ configPath: testConfigPath }).report.citation_mode).toBe('strict');
    });

    it('requires an existing config file', () => {
      expect(() => setConfigValue('report.precision', '1', { configPath: testConfigPath }))
        .toThrow(`Config file not found: ${testConfigPath}. Run 'citeline config init' first.`);
    });
  });
});
