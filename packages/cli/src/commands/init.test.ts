import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { resolve } from 'path';
import { parse } from 'yaml';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { initCommand, CONFIG_TEMPLATE } from './init.js';
import { ConfigSchema } from '../config/index.js';

describe('initCommand', () => {
  let testHomeDir = '';

  beforeEach(() => {
    testHomeDir = mkdtempSync(resolve(tmpdir(), 'citeline-init-'));
  });

  afterEach(() => {
    if (testHomeDir && existsSync(testHomeDir)) {
      rmSync(testHomeDir, { recursive: true, force: true });
    }
  });

  it('writes the template under the home directory by default', async () => {
    await initCommand({ homeDir: testHomeDir, logger: () => undefined });

    const configPath = resolve(testHomeDir, '.citeline', 'config.yaml');
    expect(readFileSync(configPath, 'utf-8')).toBe(CONFIG_TEMPLATE);
  });

  it('uses the provided config path override', async () => {
    const customConfigPath = resolve(testHomeDir, 'custom', 'config.yaml');

    await initCommand({
      homeDir: testHomeDir,
      configPath: customConfigPath,
      logger: () => undefined,
    });

    expect(existsSync(customConfigPath)).toBe(true);
    expect(existsSync(resolve(testHomeDir, '.citeline'))).toBe(false);
  });

  it('leaves an existing config untouched', async () => {
    const configDir = resolve(testHomeDir, '.citeline');
    const configPath = resolve(configDir, 'config.yaml');

    mkdirSync(configDir, { recursive: true });
    writeFileSync(configPath, 'defaults:\n  provider: anthropic\n', 'utf-8');

    const lines: string[] = [];
    await initCommand({
      homeDir: testHomeDir,
      logger: (...args) => lines.push(args.map(String).join(' ')),
    });

    expect(readFileSync(configPath, 'utf-8')).toBe('defaults:\n  provider: anthropic\n');
    expect(lines.some(l => l.includes(configPath))).toBe(true);
  });

  it('produces a template that passes schema validation', () => {
    const result = ConfigSchema.safeParse(parse(CONFIG_TEMPLATE));
    expect(result.success).toBe(true);
  });
});
