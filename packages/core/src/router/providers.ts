import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';

export type ProviderId = 'anthropic' | 'openai' | 'google';

export interface ProviderConfig {
  providers: {
    anthropic?: { apiKey?: string };
    openai?: { apiKey?: string };
    google?: { apiKey?: string };
  };
}

/** Default model per provider, used when the configured model's provider has no key. */
export const PROVIDER_DEFAULT_MODELS: Record<ProviderId, string> = {
  google: 'gemini-2.0-flash',
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o',
};

const PROVIDER_PRIORITY: ProviderId[] = ['google', 'anthropic', 'openai'];

/** Determine which provider a model string belongs to. */
export function detectProvider(modelId: string): ProviderId {
  if (modelId.startsWith('claude-')) return 'anthropic';
  if (modelId.startsWith('gpt-') || /^o\d/.test(modelId)) return 'openai';
  if (modelId.startsWith('gemini-')) return 'google';
  throw new Error(`Cannot determine provider for model: ${modelId}`);
}

/**
 * Keep `modelId` when its provider has a key; otherwise fall back to the
 * default model of the first provider that does.
 */
export function remapModelForProvider(modelId: string, config: ProviderConfig): string {
  let provider: ProviderId;
  try {
    provider = detectProvider(modelId);
  } catch {
    return modelId;
  }
  if (config.providers[provider]?.apiKey) return modelId;

  const available = PROVIDER_PRIORITY.find(p => config.providers[p]?.apiKey);
  return available ? PROVIDER_DEFAULT_MODELS[available] : modelId;
}

/**
 * Lazily initialises AI SDK providers and hands out LanguageModel
 * instances by model-id string.
 */
export class ProviderRegistry {
  private anthropicProvider: ReturnType<typeof createAnthropic> | null = null;
  private openaiProvider: ReturnType<typeof createOpenAI> | null = null;
  private googleProvider: ReturnType<typeof createGoogleGenerativeAI> | null = null;

  constructor(private readonly config: ProviderConfig) {}

  remapModel(modelId: string): string {
    return remapModelForProvider(modelId, this.config);
  }

  getModel(modelId: string): LanguageModel {
    const providerId = detectProvider(modelId);
    const apiKey = this.config.providers[providerId]?.apiKey;
    if (!apiKey) {
      throw new Error(
        `${providerId} API key not configured. Set providers.${providerId}.api_key in ~/.citeline/config.yaml`,
      );
    }

    switch (providerId) {
      case 'anthropic':
        if (!this.anthropicProvider) this.anthropicProvider = createAnthropic({ apiKey });
        return this.anthropicProvider(modelId);
      case 'openai':
        if (!this.openaiProvider) this.openaiProvider = createOpenAI({ apiKey });
        return this.openaiProvider(modelId);
      case 'google':
        if (!this.googleProvider) this.googleProvider = createGoogleGenerativeAI({ apiKey });
        return this.googleProvider(modelId);
    }
  }
}
