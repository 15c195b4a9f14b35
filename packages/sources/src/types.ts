import type { SourceId } from '@citeline/core';

/** Connection settings shared by the Google APIs. */
export interface GoogleAuth {
  /** OAuth 2.0 access token with read scopes for the configured APIs. */
  accessToken: string;
}

export interface TrafficSourceConfig extends GoogleAuth {
  /** GA4 property, either `123456789` or `properties/123456789`. */
  propertyId: string;
  /** Rows kept for ranked breakdowns (channels, pages, countries). */
  rowLimit?: number;
}

export interface SearchSourceConfig extends GoogleAuth {
  /** Search Console property, e.g. `https://www.example.com/` or `sc-domain:example.com`. */
  siteUrl: string;
  rowLimit?: number;
}

export interface AdsSourceConfig extends GoogleAuth {
  customerId: string;
  developerToken: string;
  /** Manager account ID when access goes through one. */
  loginCustomerId?: string;
  rowLimit?: number;
}

export interface SourceEntryConfig {
  enabled: boolean;
  required: boolean;
}

/** Everything the source registry needs; values already resolved from config and env. */
export interface SourcesConfig {
  accessToken?: string;
  traffic: SourceEntryConfig & { propertyId?: string };
  search: SourceEntryConfig & { siteUrl?: string };
  ads: SourceEntryConfig & { customerId?: string; developerToken?: string; loginCustomerId?: string };
}

export interface SourceStatus {
  id: SourceId;
  enabled: boolean;
  required: boolean;
  configured: boolean;
  /** Settings still needed before the source can fetch. */
  missing: string[];
}
