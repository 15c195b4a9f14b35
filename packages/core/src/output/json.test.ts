import { describe, it, expect } from 'vitest';
import { formatJson, toJsonOutput } from './json.js';
import type { ReportDocument } from '../pipeline/types.js';
import type { Section } from '../format/sections.js';

const range = { start: '2024-06-03', end: '2024-06-09' };

function makeSection(): Section {
  return {
    name: 'GA4-DEVICE',
    title: 'Site traffic: Devices',
    source: 'traffic',
    dimension: 'device',
    period: 'current',
    dateRange: range,
    records: [{
      id: 'GA4-DEV-001',
      period: 'current',
      source: 'traffic',
      dimension: 'device',
      naturalKey: 'mobile',
      metrics: { sessions: 120, share: 60 },
      dateRange: range,
    }],
  };
}

function makeReport(overrides: Partial<ReportDocument> = {}): ReportDocument {
  return {
    title: 'Weekly report',
    period: { current: range },
    modelId: 'gpt-4o',
    citationMode: 'lenient',
    generatedAt: '2024-06-10T08:00:00.000Z',
    dryRun: false,
    markdown: '# Weekly report\n',
    prompt: 'prompt',
    narrative: 'Mobile led [GA4-DEV-001].',
    sections: [makeSection()],
    omissions: [],
    warnings: ['traffic/device: dropped unmapped field "deviceModel"'],
    datasets: [],
    usage: { inputTokens: 10, outputTokens: 20, costUsd: 0.5 },
    ...overrides,
  };
}

describe('toJsonOutput', () => {
  it('carries metadata and usage', () => {
    const output = toJsonOutput(makeReport());
    expect(output.metadata).toEqual({
      title: 'Weekly report',
      generatedAt: '2024-06-10T08:00:00.000Z',
      model: 'gpt-4o',
      citationMode: 'lenient',
      period: { current: range },
      costUsd: 0.5,
      inputTokens: 10,
      outputTokens: 20,
      dryRun: false,
    });
    expect(output.narrative).toBe('Mobile led [GA4-DEV-001].');
    expect(output.coverage).toBeNull();
    expect(output.warnings).toEqual(['traffic/device: dropped unmapped field "deviceModel"']);
  });

  it('lists section records by ID', () => {
    const [section] = toJsonOutput(makeReport()).sections;
    expect(section).toEqual({
      name: 'GA4-DEVICE',
      title: 'Site traffic: Devices',
      source: 'traffic',
      dimension: 'device',
      period: 'current',
      records: [{ id: 'GA4-DEV-001', naturalKey: 'mobile', metrics: { sessions: 120, share: 60 }, dateRange: range }],
    });
  });

  it('uses null for a dry run without narrative', () => {
    expect(toJsonOutput(makeReport({ narrative: undefined, dryRun: true })).narrative).toBeNull();
  });
});

describe('formatJson', () => {
  it('produces parseable, indented JSON', () => {
    const text = formatJson(makeReport());
    expect(text.startsWith('{\n  "metadata": {')).toBe(true);
    expect(JSON.parse(text)).toEqual(toJsonOutput(makeReport()));
  });
});
