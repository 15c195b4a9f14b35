import { z } from 'zod';
import { METRIC_ORDER, PERIOD_PRESETS, type MetricName, type PeriodPreset, type ProviderId } from '@citeline/core';

const envVarPattern = /^(env:|\\?\$\{?)/;

const envVarSchema = z.string().refine(
  (val) => envVarPattern.test(val),
  { message: 'Must start with env:, $, or ${' }
).brand('envVar');

export type EnvVar = z.infer<typeof envVarSchema>;

const secretSchema = z.union([
  envVarSchema,
  z.string().min(1),
]);

const providerConfigSchema = z.object({
  api_key: secretSchema.optional(),
  default_model: z.string().optional(),
}).strict();

const providersSchema = z.object({
  anthropic: providerConfigSchema.optional(),
  openai: providerConfigSchema.optional(),
  google: providerConfigSchema.optional(),
}).strict();

const PROVIDER_IDS = ['anthropic', 'openai', 'google'] as const satisfies readonly ProviderId[];
const OUTPUT_FORMATS = ['markdown', 'json'] as const;
const CITATION_MODES = ['strict', 'lenient'] as const;
const PRESET_NAMES = Object.keys(PERIOD_PRESETS);

function isPreset(value: string): value is PeriodPreset {
  return PRESET_NAMES.includes(value);
}

function isMetric(value: string): value is MetricName {
  return METRIC_ORDER.some(m => m === value);
}

const defaultsSchema = z.object({
  provider: z.enum(PROVIDER_IDS).optional(),
  model: z.string().optional(),
  max_budget_usd: z.number().positive().optional(),
  timeout_ms: z.number().int().positive().optional(),
  max_output_tokens: z.number().int().positive().optional(),
  output_format: z.enum(OUTPUT_FORMATS).optional(),
  output_dir: z.string().optional(),
  filename_template: z.string().min(1).optional(),
}).strict();

const reportSchema = z.object({
  title: z.string().min(1).optional(),
  period: z.string().refine(isPreset, { message: `Must be one of ${PRESET_NAMES.join(', ')}` }).optional(),
  compare: z.boolean().optional(),
  citation_mode: z.enum(CITATION_MODES).optional(),
  precision: z.number().int().min(0).max(6).optional(),
  percent_metrics: z.array(z.string().refine(isMetric, { message: 'Unknown metric' })).optional(),
  language: z.string().min(1).optional(),
  notes: z.array(z.string()).optional(),
}).strict();

const sourceEntrySchema = {
  enabled: z.boolean().optional(),
  required: z.boolean().optional(),
};

const sourcesSchema = z.object({
  access_token: secretSchema.optional(),
  traffic: z.object({ ...sourceEntrySchema, property_id: z.union([z.string(), z.number()]).optional() }).strict().optional(),
  search: z.object({ ...sourceEntrySchema, site_url: z.string().optional() }).strict().optional(),
  ads: z.object({
    ...sourceEntrySchema,
    customer_id: z.union([z.string(), z.number()]).optional(),
    developer_token: secretSchema.optional(),
    login_customer_id: z.union([z.string(), z.number()]).optional(),
  }).strict().optional(),
}).strict();

const ConfigSchema = z.object({
  providers: providersSchema.optional(),
  defaults: defaultsSchema.optional(),
  report: reportSchema.optional(),
  sources: sourcesSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export type OutputFormat = typeof OUTPUT_FORMATS[number];
export type CitationModeSetting = typeof CITATION_MODES[number];

export interface ResolvedProviderConfig {
  api_key?: string;
  default_model: string;
}

export interface ResolvedSourceEntry {
  enabled: boolean;
  required: boolean;
}

export interface Config {
  providers: Record<ProviderId, ResolvedProviderConfig>;
  defaults: {
    provider: ProviderId;
    model: string;
    max_budget_usd: number;
    timeout_ms: number;
    max_output_tokens: number;
    output_format: OutputFormat;
    output_dir: string;
    filename_template: string;
  };
  report: {
    title?: string;
    period: PeriodPreset;
    compare: boolean;
    citation_mode: CitationModeSetting;
    precision: number;
    percent_metrics?: MetricName[];
    language: string;
    notes: string[];
  };
  sources: {
    access_token?: string;
    traffic: ResolvedSourceEntry & { property_id?: string };
    search: ResolvedSourceEntry & { site_url?: string };
    ads: ResolvedSourceEntry & { customer_id?: string; developer_token?: string; login_customer_id?: string };
  };
}

export const ConfigDefaults: Config = {
  providers: {
    google: { default_model: 'gemini-2.0-flash' },
    anthropic: { default_model: 'claude-sonnet-4-20250514' },
    openai: { default_model: 'gpt-4o' },
  },
  defaults: {
    provider: 'google',
    model: 'gemini-2.0-flash',
    max_budget_usd: 1.0,
    timeout_ms: 120_000,
    max_output_tokens: 8000,
    output_format: 'markdown',
    output_dir: '~/citeline-reports',
    filename_template: 'report-{start}-to-{end}',
  },
  report: {
    period: 'last-week',
    compare: true,
    citation_mode: 'strict',
    precision: 2,
    language: 'English',
    notes: [],
  },
  sources: {
    traffic: { enabled: true, required: true },
    search: { enabled: true, required: true },
    ads: { enabled: true, required: false },
  },
};

export { ConfigSchema, PROVIDER_IDS };
