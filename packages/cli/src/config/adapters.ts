import { DEFAULT_INSTRUCTIONS, type PromptInstructions, type ProviderConfig } from '@citeline/core';
import type { SourcesConfig } from '@citeline/sources';
import type { Config } from './schema.js';

export function toProviderConfig(config: Config): ProviderConfig {
  return {
    providers: {
      anthropic: { apiKey: config.providers.anthropic.api_key },
      openai: { apiKey: config.providers.openai.api_key },
      google: { apiKey: config.providers.google.api_key },
    },
  };
}

export function toSourcesConfig(config: Config): SourcesConfig {
  const { sources } = config;
  return {
    accessToken: sources.access_token,
    traffic: {
      enabled: sources.traffic.enabled,
      required: sources.traffic.required,
      propertyId: sources.traffic.property_id,
    },
    search: {
      enabled: sources.search.enabled,
      required: sources.search.required,
      siteUrl: sources.search.site_url,
    },
    ads: {
      enabled: sources.ads.enabled,
      required: sources.ads.required,
      customerId: sources.ads.customer_id,
      developerToken: sources.ads.developer_token,
      loginCustomerId: sources.ads.login_customer_id,
    },
  };
}

export function toInstructions(config: Config): PromptInstructions {
  return {
    ...DEFAULT_INSTRUCTIONS,
    language: config.report.language,
    notes: config.report.notes.length > 0 ? config.report.notes : undefined,
  };
}
